import type { ArticleOutcome, Candidate, ExtractedArticle, OutcomeStatus, RewrittenArticle } from "@/lib/domain/models";
import type { ArticleExtractor, ArticleProcessor, ArticleRewriter, Publisher, RewriteArchive } from "@/lib/domain/ports";
import type { Logger } from "@/lib/infra/logger";
import { createSilentLogger, errorMessage } from "@/lib/infra/logger";
import { buildFallbackRewrite } from "@/lib/llm/rewriter";
import type { Deduplicator } from "@/lib/process/dedupe";
import type { QualityGate } from "@/lib/process/quality-gate";
import type { SeenUrlStore } from "@/lib/store/seen-url-store";

const MIN_TITLE_CHARS = 10;
const MIN_TEXT_CHARS = 100;

export interface ArticleProcessorDeps {
  extractor: ArticleExtractor;
  deduplicator: Deduplicator;
  rewriter: ArticleRewriter;
  qualityGate: QualityGate;
  publisher?: Publisher | null;
  categoryMapping?: Record<string, number>;
  seenUrls?: SeenUrlStore | null;
  archive?: RewriteArchive | null;
  logger?: Logger;
}

class StepTimer {
  readonly timing: Record<string, number> = {};

  private readonly startedAt = performance.now();

  async measure<T>(step: string, fn: () => Promise<T>): Promise<T> {
    const start = performance.now();
    try {
      return await fn();
    } finally {
      this.timing[step] = (performance.now() - start) / 1000;
    }
  }

  finish(): Record<string, number> {
    this.timing.total = (performance.now() - this.startedAt) / 1000;
    return { ...this.timing };
  }
}

/**
 * Takes one candidate through extract, content check, dedupe, rewrite, quality
 * gate, publish and register. The first failing step decides the outcome.
 */
export class PipelineArticleProcessor implements ArticleProcessor {
  private readonly logger: Logger;

  constructor(private readonly deps: ArticleProcessorDeps) {
    this.logger = deps.logger ?? createSilentLogger();
  }

  async process(candidate: Candidate): Promise<ArticleOutcome> {
    const timer = new StepTimer();
    let outcome: ArticleOutcome;
    try {
      outcome = await this.runSteps(candidate, timer);
    } catch (error) {
      this.logger.error(`[FAILED] ${candidate.url}`, error);
      outcome = this.outcome("failed", errorMessage(error), null, timer);
    }
    await this.markProcessed(candidate.url);
    return outcome;
  }

  private async runSteps(candidate: Candidate, timer: StepTimer): Promise<ArticleOutcome> {
    const { url } = candidate;

    let extracted: ExtractedArticle;
    try {
      this.logger.info(`[EXTRACT] ${url}`);
      extracted = await timer.measure("extract", () => this.deps.extractor.extract(url, candidate.source));
    } catch (error) {
      this.logger.warn(`[EXTRACT] failed for ${url}`, error);
      return this.outcome("failed", `extract_failed: ${errorMessage(error)}`, null, timer);
    }

    const contentIssue = await timer.measure("content_check", async () => checkContent(extracted));
    if (contentIssue) {
      this.logger.warn(`[SKIP] ${contentIssue}: ${url}`);
      return this.outcome("skipped", contentIssue, null, timer);
    }

    this.logger.info(`[DEDUPE] ${extracted.canonicalUrl}`);
    const decision = await timer.measure("dedupe", () =>
      this.deps.deduplicator.checkDuplicate(extracted.canonicalUrl, extracted.title, extracted.text),
    );
    if (decision.isDuplicate) {
      this.logger.info(`[SKIP] duplicate (${decision.reason}): ${url}`);
      return this.outcome("skipped", `duplicate:${decision.reason}`, null, timer);
    }

    this.logger.info(`[REWRITE] ${url}`);
    const rewritten = await timer.measure("rewrite", () => this.rewrite(extracted));

    this.logger.info(`[QUALITY] ${url}`);
    const verdict = await timer.measure("quality", () => this.deps.qualityGate.check(extracted, rewritten));
    await this.archive(extracted, rewritten, verdict);

    if (!verdict.passed || verdict.riskLevel === "high") {
      const reason = `quality_gate_failed:${verdict.issues.join("; ")}`;
      this.logger.warn(`[SKIP] ${reason}`);
      return this.outcome("skipped", reason, null, timer);
    }

    const { publisher } = this.deps;
    if (!publisher) {
      this.logger.warn("[SKIP] publisher not configured");
      return this.outcome("skipped", "wp_client_not_configured", null, timer);
    }

    this.logger.info(`[PUBLISH] ${url}`);
    const publishedId = await timer.measure("publish", () =>
      publisher.createPostFromPipeline(rewritten, extracted, verdict, this.deps.categoryMapping ?? {}),
    );
    if (!publishedId) {
      return this.outcome("failed", "publish_creation_failed", null, timer);
    }

    await timer.measure("register", () =>
      this.deps.deduplicator.register(extracted.canonicalUrl, extracted.title, extracted.text, publishedId),
    );

    this.logger.info(`[SUCCESS] published ${publishedId}: ${url}`);
    return this.outcome("created", null, publishedId, timer);
  }

  private async rewrite(extracted: ExtractedArticle): Promise<RewrittenArticle> {
    try {
      return await this.deps.rewriter.rewrite(extracted);
    } catch (error) {
      this.logger.error(`[REWRITE] failed for ${extracted.url}, using source text`, error);
      return buildFallbackRewrite(extracted);
    }
  }

  private async archive(...args: Parameters<RewriteArchive["save"]>): Promise<void> {
    if (!this.deps.archive) return;
    try {
      await this.deps.archive.save(...args);
    } catch (error) {
      this.logger.error(`[SAVE] rewrite archive write failed for ${args[0].url}`, error);
    }
  }

  private async markProcessed(url: string): Promise<void> {
    if (!this.deps.seenUrls) return;
    try {
      await this.deps.seenUrls.markSeen(url, true);
    } catch (error) {
      this.logger.error(`could not mark ${url} as processed`, error);
    }
  }

  private outcome(
    status: OutcomeStatus,
    reason: string | null,
    publishedId: string | null,
    timer: StepTimer,
  ): ArticleOutcome {
    return { status, reason, publishedId, timing: timer.finish() };
  }
}

function checkContent(extracted: ExtractedArticle): string | null {
  const title = String(extracted.title || "").trim();
  if (title.length < MIN_TITLE_CHARS) {
    return `title_too_short: ${title.length} chars`;
  }
  const text = String(extracted.text || "").trim();
  if (text.length < MIN_TEXT_CHARS) {
    return `content_too_short: ${text.length} chars`;
  }
  return null;
}
