import { LRUCache } from "lru-cache";
import type { LlmClient } from "@/lib/llm/llm-client";

export type SimilarityResult = { available: true; score: number } | { available: false; reason: string };

/**
 * Semantic similarity between two texts. Callers treat a thrown error the same
 * as `available: false`.
 */
export interface SimilarityOracle {
  readonly name: string;
  compare(left: string, right: string): Promise<SimilarityResult>;
}

export class UnavailableSimilarityOracle implements SimilarityOracle {
  readonly name = "unavailable";

  constructor(private readonly reason = "no embedding provider configured") {}

  async compare(): Promise<SimilarityResult> {
    return { available: false, reason: this.reason };
  }
}

export function cosineSimilarity(left: number[], right: number[]): number {
  if (!left.length || left.length !== right.length) return 0;
  let dot = 0;
  let leftNorm = 0;
  let rightNorm = 0;
  for (let i = 0; i < left.length; i += 1) {
    dot += left[i] * right[i];
    leftNorm += left[i] * left[i];
    rightNorm += right[i] * right[i];
  }
  if (leftNorm === 0 || rightNorm === 0) return 0;
  const score = dot / (Math.sqrt(leftNorm) * Math.sqrt(rightNorm));
  return Math.max(0, Math.min(1, score));
}

export class EmbeddingSimilarityOracle implements SimilarityOracle {
  readonly name: string;

  private readonly cache: LRUCache<string, number[]>;

  constructor(
    private readonly client: Pick<LlmClient, "embed" | "embeddingModel">,
    cacheSize = 2000,
  ) {
    this.name = `embedding:${client.embeddingModel}`;
    this.cache = new LRUCache<string, number[]>({ max: Math.max(1, cacheSize) });
  }

  private async vectors(texts: string[]): Promise<number[][]> {
    const missing = Array.from(new Set(texts.filter((text) => !this.cache.has(text))));
    if (missing.length) {
      const embedded = await this.client.embed(missing);
      missing.forEach((text, index) => this.cache.set(text, embedded[index]));
    }
    return texts.map((text) => this.cache.get(text) ?? []);
  }

  async compare(left: string, right: string): Promise<SimilarityResult> {
    if (left === right && left) {
      return { available: true, score: 1 };
    }
    const [leftVector, rightVector] = await this.vectors([left, right]);
    return { available: true, score: cosineSimilarity(leftVector, rightVector) };
  }
}
