import {
  DUPLICATE_EXACT_MATCH,
  DUPLICATE_SAME_CANONICAL_URL,
  DUPLICATE_SEMANTIC_TITLE_MATCH,
} from "@/lib/domain/models";
import type { DuplicateDecision, FingerprintRecord } from "@/lib/domain/models";
import type { Logger } from "@/lib/infra/logger";
import { createSilentLogger } from "@/lib/infra/logger";
import type { SimilarityOracle } from "@/lib/llm/similarity-oracle";
import { UnavailableSimilarityOracle } from "@/lib/llm/similarity-oracle";
import { fingerprintId, normalizeTitle, sha256Hex, titleFingerprint } from "@/lib/process/normalize";
import type { FingerprintStore } from "@/lib/store/fingerprint-store";

const MAX_EMBED_CHARS = 1000;

export interface DeduplicatorOptions {
  similarityThreshold?: number;
  oracle?: SimilarityOracle;
  logger?: Logger;
}

function notDuplicate(): DuplicateDecision {
  return {
    isDuplicate: false,
    reason: null,
    matchedFingerprintId: null,
    similarityScore: null,
    publishedId: null,
  };
}

function matched(reason: DuplicateDecision["reason"], record: FingerprintRecord, score: number): DuplicateDecision {
  return {
    isDuplicate: true,
    reason,
    matchedFingerprintId: record.fingerprintId,
    similarityScore: score,
    publishedId: record.publishedId,
  };
}

export class Deduplicator {
  readonly similarityThreshold: number;

  private readonly oracle: SimilarityOracle;

  private readonly logger: Logger;

  constructor(
    private readonly store: FingerprintStore,
    options: DeduplicatorOptions = {},
  ) {
    this.similarityThreshold = options.similarityThreshold ?? 0.85;
    this.oracle = options.oracle ?? new UnavailableSimilarityOracle();
    this.logger = options.logger ?? createSilentLogger();
  }

  async checkDuplicate(canonicalUrl: string, title: string, _body?: string): Promise<DuplicateDecision> {
    const normalized = normalizeTitle(title);
    const id = fingerprintId(canonicalUrl, normalized);

    const exact = await this.store.get(id);
    if (exact) {
      return matched(DUPLICATE_EXACT_MATCH, exact, 1.0);
    }

    const sameUrl = await this.store.findByCanonicalUrl(canonicalUrl);
    if (sameUrl) {
      return matched(DUPLICATE_SAME_CANONICAL_URL, sameUrl, 1.0);
    }

    const candidates = await this.store.findByTitleFingerprint(titleFingerprint(normalized));
    if (!candidates.length) {
      return notDuplicate();
    }

    const best = await this.bestSemanticMatch(normalized, candidates);
    if (best && best.score >= this.similarityThreshold) {
      return matched(DUPLICATE_SEMANTIC_TITLE_MATCH, best.record, best.score);
    }
    return notDuplicate();
  }

  /** Returns null when the oracle is unavailable or fails for this call. */
  private async bestSemanticMatch(
    normalized: string,
    candidates: FingerprintRecord[],
  ): Promise<{ record: FingerprintRecord; score: number } | null> {
    const subject = normalized.slice(0, MAX_EMBED_CHARS);
    let best: { record: FingerprintRecord; score: number } | null = null;
    try {
      for (const candidate of candidates) {
        const result = await this.oracle.compare(subject, candidate.normalizedTitle.slice(0, MAX_EMBED_CHARS));
        if (!result.available) {
          this.logger.debug(`semantic title check skipped: ${result.reason}`);
          return null;
        }
        if (!best || result.score > best.score) {
          best = { record: candidate, score: result.score };
        }
      }
    } catch (error) {
      this.logger.warn(`similarity oracle ${this.oracle.name} failed, semantic title check skipped`, error);
      return null;
    }
    return best;
  }

  async register(canonicalUrl: string, title: string, body?: string, publishedId?: string | null): Promise<string> {
    const normalized = normalizeTitle(title);
    const id = fingerprintId(canonicalUrl, normalized);

    await this.store.upsert({
      fingerprintId: id,
      canonicalUrl,
      normalizedTitle: normalized,
      titleFingerprint: titleFingerprint(normalized),
      bodyFingerprint: body ? sha256Hex(body) : null,
      createdAt: new Date().toISOString(),
      publishedId: publishedId ?? null,
    });

    this.logger.info(`article registered: ${id}`);
    return id;
  }
}
