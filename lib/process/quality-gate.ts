import type { ExtractedArticle, QualityVerdict, RewrittenArticle, RiskKeywords, RiskLevel } from "@/lib/domain/models";
import type { Logger } from "@/lib/infra/logger";
import { createSilentLogger } from "@/lib/infra/logger";
import type { SimilarityOracle } from "@/lib/llm/similarity-oracle";
import { UnavailableSimilarityOracle } from "@/lib/llm/similarity-oracle";

const MAX_COMPARE_CHARS = 2000;
const MIN_BODY_CHARS = 100;
const MIN_HEADLINE_CHARS = 10;
const MIN_LEAD_CHARS = 20;
const REPETITION_MIN_WORD_LENGTH = 4;
const REPETITION_MAX_SHARE = 0.1;

export const DANGEROUS_PATTERNS: Array<{ label: string; re: RegExp }> = [
  { label: "<script", re: /<script/i },
  { label: "<iframe", re: /<iframe/i },
  { label: "javascript:", re: /javascript:/i },
  { label: "onclick=", re: /onclick\s*=/i },
  { label: "onerror=", re: /onerror\s*=/i },
  { label: "onload=", re: /onload\s*=/i },
];

export const SENSITIVE_DATA_PATTERNS: Array<{ label: string; re: RegExp }> = [
  { label: "card number", re: /\b\d{16}\b/ },
  { label: "tax code", re: /\b[a-z]{6}\d{2}[a-z]\d{2}[a-z]\d{3}[a-z]\b/i },
  { label: "spaced card number", re: /\b\d{4}\s?\d{4}\s?\d{4}\s?\d{4}\b/ },
];

export const DEFAULT_RISK_KEYWORDS: RiskKeywords = {
  high: ["diffamazione", "calunnia", "hate speech", "incitamento", "dati sensibili", "codice fiscale", "numero carta", "password"],
  medium: ["gossip", "scandalo", "polemica", "controversia"],
};

export interface QualityGateOptions {
  similarityThreshold?: number;
  minLength?: number;
  maxLength?: number;
  riskKeywords?: RiskKeywords;
  oracle?: SimilarityOracle;
  logger?: Logger;
}

export class QualityGate {
  readonly similarityThreshold: number;

  readonly minLength: number;

  readonly maxLength: number;

  readonly riskKeywords: RiskKeywords;

  private readonly oracle: SimilarityOracle;

  private readonly logger: Logger;

  constructor(options: QualityGateOptions = {}) {
    this.similarityThreshold = options.similarityThreshold ?? 0.85;
    this.minLength = options.minLength ?? 200;
    this.maxLength = options.maxLength ?? 2000;
    this.riskKeywords = options.riskKeywords ?? DEFAULT_RISK_KEYWORDS;
    this.oracle = options.oracle ?? new UnavailableSimilarityOracle();
    this.logger = options.logger ?? createSilentLogger();
  }

  async checkSimilarity(originalText: string, rewrittenText: string): Promise<{ isTooSimilar: boolean; score: number }> {
    try {
      const result = await this.oracle.compare(
        String(originalText || "").slice(0, MAX_COMPARE_CHARS),
        String(rewrittenText || "").slice(0, MAX_COMPARE_CHARS),
      );
      if (!result.available) {
        return { isTooSimilar: false, score: 0 };
      }
      return { isTooSimilar: result.score >= this.similarityThreshold, score: result.score };
    } catch (error) {
      this.logger.warn("similarity check failed, treating rewrite as original", error);
      return { isTooSimilar: false, score: 0 };
    }
  }

  checkSanity(rewritten: RewrittenArticle): string[] {
    const issues: string[] = [];
    const body = String(rewritten.bodyMarkdown || "");
    const headline = String(rewritten.headline || "");
    const lead = String(rewritten.lead || "");
    const wordCount = Number(rewritten.wordCount) || 0;

    if (wordCount < this.minLength) {
      issues.push(`Article too short: ${wordCount} words (min: ${this.minLength})`);
    }
    if (wordCount > this.maxLength) {
      issues.push(`Article too long: ${wordCount} words (max: ${this.maxLength})`);
    }

    if (body.trim().length < MIN_BODY_CHARS) {
      issues.push("Body empty or too short");
    }
    if (headline.trim().length < MIN_HEADLINE_CHARS) {
      issues.push("Headline empty or too short");
    }
    if (lead.trim().length < MIN_LEAD_CHARS) {
      issues.push("Lead empty or too short");
    }

    const words = body.toLowerCase().split(/\s+/).filter(Boolean);
    if (words.length) {
      const frequency = new Map<string, number>();
      for (const word of words) {
        if (word.length > REPETITION_MIN_WORD_LENGTH) {
          frequency.set(word, (frequency.get(word) || 0) + 1);
        }
      }
      const maxFrequency = Math.max(0, ...frequency.values());
      if (maxFrequency > words.length * REPETITION_MAX_SHARE) {
        issues.push("Excessive repetition in body");
      }
    }

    for (const pattern of DANGEROUS_PATTERNS) {
      if (pattern.re.test(body)) {
        issues.push(`Body contains dangerous pattern: ${pattern.label}`);
      }
    }

    return issues;
  }

  checkPolicy(rewritten: RewrittenArticle): { riskLevel: RiskLevel; issues: string[] } {
    const issues: string[] = [];
    let riskLevel: RiskLevel = "low";
    const combined = `${rewritten.headline} ${rewritten.lead} ${rewritten.bodyMarkdown}`.toLowerCase();

    for (const keyword of this.riskKeywords.high) {
      if (keyword && combined.includes(keyword.toLowerCase())) {
        issues.push(`High-risk content: keyword '${keyword}' found`);
        riskLevel = "high";
      }
    }

    if (riskLevel !== "high") {
      for (const keyword of this.riskKeywords.medium) {
        if (keyword && combined.includes(keyword.toLowerCase())) {
          issues.push(`Medium-risk content: keyword '${keyword}' found`);
          riskLevel = "medium";
        }
      }
    }

    for (const pattern of SENSITIVE_DATA_PATTERNS) {
      if (pattern.re.test(combined)) {
        issues.push(`Sensitive data detected: ${pattern.label}`);
        riskLevel = "high";
      }
    }

    return { riskLevel, issues };
  }

  async check(original: ExtractedArticle, rewritten: RewrittenArticle): Promise<QualityVerdict> {
    const issues: string[] = [];

    const similarity = await this.checkSimilarity(original.text, rewritten.bodyMarkdown);
    if (similarity.isTooSimilar) {
      issues.push(`Text too similar to the source (similarity: ${similarity.score.toFixed(2)})`);
    }

    const sanityIssues = this.checkSanity(rewritten);
    issues.push(...sanityIssues);

    const policy = this.checkPolicy(rewritten);
    issues.push(...policy.issues);

    const passed = issues.length === 0 && policy.riskLevel !== "high";
    const needsReview =
      policy.riskLevel === "medium" || policy.riskLevel === "high" || similarity.isTooSimilar || sanityIssues.length > 0;

    if (passed) {
      this.logger.info(
        `quality gate passed (similarity: ${similarity.score.toFixed(2)}, risk: ${policy.riskLevel})`,
      );
    } else {
      this.logger.warn(`quality gate failed: ${issues.length} issues, risk: ${policy.riskLevel}`);
    }

    return {
      passed,
      riskLevel: policy.riskLevel,
      issues,
      similarityScore: similarity.score,
      isTooSimilar: similarity.isTooSimilar,
      needsReview,
    };
  }
}
