import type { SeenUrlRecord } from "@/lib/domain/models";
import type { UpstashClient } from "@/lib/infra/upstash";
import { urlFingerprint } from "@/lib/process/normalize";

const SEEN_KEY_PREFIX = "seen_url";

export interface SeenUrlStore {
  get(url: string): Promise<SeenUrlRecord | null>;
  isProcessed(url: string): Promise<boolean>;
  /** Keeps `firstSeenAt` of an existing record; `processed` is overwritten. */
  markSeen(url: string, processed?: boolean): Promise<void>;
}

function nowIso(): string {
  return new Date().toISOString();
}

export class MemorySeenUrlStore implements SeenUrlStore {
  private readonly records = new Map<string, SeenUrlRecord>();

  async get(url: string): Promise<SeenUrlRecord | null> {
    const record = this.records.get(urlFingerprint(url));
    return record ? { ...record } : null;
  }

  async isProcessed(url: string): Promise<boolean> {
    return Boolean(this.records.get(urlFingerprint(url))?.processed);
  }

  async markSeen(url: string, processed = false): Promise<void> {
    const key = urlFingerprint(url);
    const now = nowIso();
    const existing = this.records.get(key);
    this.records.set(key, {
      urlFingerprint: key,
      url,
      firstSeenAt: existing?.firstSeenAt || now,
      lastSeenAt: now,
      processed,
    });
  }
}

export class UpstashSeenUrlStore implements SeenUrlStore {
  constructor(private readonly upstash: UpstashClient) {}

  async get(url: string): Promise<SeenUrlRecord | null> {
    const key = urlFingerprint(url);
    const row = await this.upstash.hgetall(`${SEEN_KEY_PREFIX}:${key}`);
    if (!row.url) return null;
    return {
      urlFingerprint: key,
      url: row.url,
      firstSeenAt: row.first_seen_at || "",
      lastSeenAt: row.last_seen_at || "",
      processed: row.processed === "1",
    };
  }

  async isProcessed(url: string): Promise<boolean> {
    const value = await this.upstash.hget(`${SEEN_KEY_PREFIX}:${urlFingerprint(url)}`, "processed");
    return value === "1";
  }

  async markSeen(url: string, processed = false): Promise<void> {
    const key = `${SEEN_KEY_PREFIX}:${urlFingerprint(url)}`;
    const now = nowIso();
    await this.upstash.multiExec([
      ["HSETNX", key, "first_seen_at", now],
      ["HSET", key, "url", url, "last_seen_at", now, "processed", processed ? "1" : "0"],
    ]);
  }
}
