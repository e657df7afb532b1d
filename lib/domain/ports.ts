import type {
  ArticleOutcome,
  AuditEntry,
  Candidate,
  ExtractedArticle,
  NotificationArticle,
  QualityVerdict,
  RewrittenArticle,
} from "@/lib/domain/models";

export type FetchStatusCallback = (step: string, message: string) => void;

export interface CandidateSource {
  fetchAll(limit?: number, onStatus?: FetchStatusCallback): Promise<Candidate[]>;
}

export interface ArticleExtractor {
  extract(url: string, sourceName?: string): Promise<ExtractedArticle>;
}

/** Implementations must fall back to a stub document instead of throwing. */
export interface ArticleRewriter {
  rewrite(extracted: ExtractedArticle): Promise<RewrittenArticle>;
}

export interface Publisher {
  createPostFromPipeline(
    rewritten: RewrittenArticle,
    original: ExtractedArticle,
    verdict: QualityVerdict,
    categoryMapping: Record<string, number>,
  ): Promise<string | null>;
}

export interface Notifier {
  sendNewArticlesNotification(articles: NotificationArticle[]): Promise<boolean>;
}

export interface AuditSink {
  logOperation(entry: AuditEntry): Promise<void>;
  writeReport(runId: string, stats: Record<string, unknown>): Promise<string>;
}

export interface RewriteArchive {
  save(original: ExtractedArticle, rewritten: RewrittenArticle, verdict: QualityVerdict): Promise<void>;
}

export interface StateStore<T> {
  read(): Promise<T | null>;
  write(state: T): Promise<void>;
}

export interface ArticleProcessor {
  process(candidate: Candidate): Promise<ArticleOutcome>;
}
