export const DUPLICATE_EXACT_MATCH = "exact_match";
export const DUPLICATE_SAME_CANONICAL_URL = "same_canonical_url";
export const DUPLICATE_SEMANTIC_TITLE_MATCH = "semantic_title_match";

export type DuplicateReason =
  | typeof DUPLICATE_EXACT_MATCH
  | typeof DUPLICATE_SAME_CANONICAL_URL
  | typeof DUPLICATE_SEMANTIC_TITLE_MATCH;

export type RiskLevel = "low" | "medium" | "high";

export type OutcomeStatus = "skipped" | "created" | "failed";

export interface FeedConfig {
  name: string;
  url: string;
  enabled: boolean;
}

export interface SourcesConfig {
  feeds: FeedConfig[];
  whitelistEnabled: boolean;
  whitelistDomains: string[];
  delayBetweenRequestsMs: number;
  downloadTimeoutSeconds: number;
  maxAgeHours: number;
}

export interface RiskKeywords {
  high: string[];
  medium: string[];
}

export interface FingerprintRecord {
  fingerprintId: string;
  canonicalUrl: string;
  normalizedTitle: string;
  titleFingerprint: string;
  bodyFingerprint: string | null;
  createdAt: string;
  publishedId: string | null;
}

export interface SeenUrlRecord {
  urlFingerprint: string;
  url: string;
  firstSeenAt: string;
  lastSeenAt: string;
  processed: boolean;
}

export interface DuplicateDecision {
  isDuplicate: boolean;
  reason: DuplicateReason | null;
  matchedFingerprintId: string | null;
  similarityScore: number | null;
  publishedId: string | null;
}

export interface QualityVerdict {
  passed: boolean;
  riskLevel: RiskLevel;
  issues: string[];
  similarityScore: number;
  isTooSimilar: boolean;
  needsReview: boolean;
}

export interface Candidate {
  url: string;
  source: string;
  title: string;
  publishedAt: string | null;
  description: string;
}

export interface ExtractedArticle {
  url: string;
  canonicalUrl: string;
  title: string;
  text: string;
  images: string[];
  publishedAt: string | null;
  author: string | null;
  sourceName: string | null;
}

export interface RewrittenArticle {
  headline: string;
  lead: string;
  bodyMarkdown: string;
  tags: string[];
  category: string;
  metaTitle: string;
  metaDescription: string;
  wordCount: number;
  rewrittenAt: string;
  stubMode: boolean;
}

export interface ArticleOutcome {
  status: OutcomeStatus;
  reason: string | null;
  publishedId: string | null;
  timing: Record<string, number>;
}

export interface CurrentArticle {
  url: string;
  title: string;
  index: number;
  total: number;
}

export interface RunMessage {
  timestamp: string;
  step: string;
  message: string;
}

export interface RunCounters {
  total_candidates: number;
  processed: number;
  created: number;
  skipped: number;
  failed: number;
}

export interface RunState extends RunCounters {
  run_id: string;
  status: "running" | "completed";
  current_step: "fetching" | "processing" | "completed";
  current_article: CurrentArticle | null;
  started_at: string;
  completed_at: string | null;
  messages: RunMessage[];
}

export interface RunReport {
  runId: string;
  outcome: "completed" | "cancelled" | "errored";
  error: string | null;
  stats: RunCounters;
  reportPath: string;
}

export interface ProcessedArticleSummary {
  url: string;
  title: string;
  source: string;
  status: OutcomeStatus;
  published_id: string | null;
  processed_at: string;
}

export interface MonitorState {
  running: boolean;
  started_at: string | null;
  last_check: string | null;
  poll_interval_seconds: number;
  total_checks: number;
  total_articles_found: number;
  total_articles_processed: number;
  total_articles_created: number;
  last_articles: ProcessedArticleSummary[];
}

export interface AuditEntry {
  operation: string;
  url: string;
  status: OutcomeStatus;
  details?: Record<string, unknown>;
  timing?: Record<string, number>;
  publishedId?: string | null;
}

export interface NotificationArticle {
  url: string;
  title: string;
  source: string;
}
