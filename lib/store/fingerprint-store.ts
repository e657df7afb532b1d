import type { FingerprintRecord } from "@/lib/domain/models";
import { parseHashPayload } from "@/lib/infra/upstash";
import type { RedisCommand, UpstashClient } from "@/lib/infra/upstash";

const RECORD_KEY_PREFIX = "dedupe:fingerprint";
const CANONICAL_INDEX_KEY = "dedupe:canonical_url";
const TITLE_INDEX_PREFIX = "dedupe:title";

export interface FingerprintStore {
  get(fingerprintId: string): Promise<FingerprintRecord | null>;
  findByCanonicalUrl(canonicalUrl: string): Promise<FingerprintRecord | null>;
  findByTitleFingerprint(titleFingerprint: string): Promise<FingerprintRecord[]>;
  /** Atomic; a record with the same id is replaced. */
  upsert(record: FingerprintRecord): Promise<void>;
}

export class MemoryFingerprintStore implements FingerprintStore {
  private readonly records = new Map<string, FingerprintRecord>();

  async get(fingerprintId: string): Promise<FingerprintRecord | null> {
    const record = this.records.get(fingerprintId);
    return record ? { ...record } : null;
  }

  async findByCanonicalUrl(canonicalUrl: string): Promise<FingerprintRecord | null> {
    let latest: FingerprintRecord | null = null;
    for (const record of this.records.values()) {
      if (record.canonicalUrl === canonicalUrl) latest = record;
    }
    return latest ? { ...latest } : null;
  }

  async findByTitleFingerprint(titleFingerprint: string): Promise<FingerprintRecord[]> {
    return Array.from(this.records.values())
      .filter((record) => record.titleFingerprint === titleFingerprint)
      .map((record) => ({ ...record }));
  }

  async upsert(record: FingerprintRecord): Promise<void> {
    // delete first so iteration order reflects the latest write
    this.records.delete(record.fingerprintId);
    this.records.set(record.fingerprintId, { ...record });
  }

  get size(): number {
    return this.records.size;
  }
}

function recordKey(fingerprintId: string): string {
  return `${RECORD_KEY_PREFIX}:${fingerprintId}`;
}

function titleIndexKey(titleFingerprint: string): string {
  return `${TITLE_INDEX_PREFIX}:${titleFingerprint}`;
}

export function parseFingerprintRow(row: Record<string, string>): FingerprintRecord | null {
  const fingerprintId = String(row.fingerprint_id || "").trim();
  if (!fingerprintId) return null;
  return {
    fingerprintId,
    canonicalUrl: String(row.canonical_url || ""),
    normalizedTitle: String(row.normalized_title || ""),
    titleFingerprint: String(row.title_fingerprint || ""),
    bodyFingerprint: row.body_fingerprint ? String(row.body_fingerprint) : null,
    createdAt: String(row.created_at || ""),
    publishedId: row.published_id ? String(row.published_id) : null,
  };
}

export class UpstashFingerprintStore implements FingerprintStore {
  constructor(private readonly upstash: UpstashClient) {}

  async get(fingerprintId: string): Promise<FingerprintRecord | null> {
    const row = await this.upstash.hgetall(recordKey(fingerprintId));
    return parseFingerprintRow(row);
  }

  async findByCanonicalUrl(canonicalUrl: string): Promise<FingerprintRecord | null> {
    const fingerprintId = await this.upstash.hget(CANONICAL_INDEX_KEY, canonicalUrl);
    if (!fingerprintId) return null;
    return this.get(fingerprintId);
  }

  async findByTitleFingerprint(titleFingerprint: string): Promise<FingerprintRecord[]> {
    const ids = await this.upstash.smembers(titleIndexKey(titleFingerprint));
    if (!ids.length) return [];
    const rows = await this.upstash.pipeline(ids.map((id): RedisCommand => ["HGETALL", recordKey(id)]));
    const records: FingerprintRecord[] = [];
    rows.forEach((payload) => {
      const record = parseFingerprintRow(parseHashPayload(payload));
      if (record) records.push(record);
    });
    return records;
  }

  async upsert(record: FingerprintRecord): Promise<void> {
    const hash: RedisCommand = [
      "HSET",
      recordKey(record.fingerprintId),
      "fingerprint_id",
      record.fingerprintId,
      "canonical_url",
      record.canonicalUrl,
      "normalized_title",
      record.normalizedTitle,
      "title_fingerprint",
      record.titleFingerprint,
      "body_fingerprint",
      record.bodyFingerprint ?? "",
      "created_at",
      record.createdAt,
      "published_id",
      record.publishedId ?? "",
    ];
    await this.upstash.multiExec([
      hash,
      ["HSET", CANONICAL_INDEX_KEY, record.canonicalUrl, record.fingerprintId],
      ["SADD", titleIndexKey(record.titleFingerprint), record.fingerprintId],
    ]);
  }
}
