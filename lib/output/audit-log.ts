import fs from "node:fs/promises";
import path from "node:path";
import type { AuditEntry, ExtractedArticle, QualityVerdict, RewrittenArticle } from "@/lib/domain/models";
import type { AuditSink, RewriteArchive } from "@/lib/domain/ports";
import type { Logger } from "@/lib/infra/logger";
import { createSilentLogger } from "@/lib/infra/logger";
import { sha256Hex } from "@/lib/process/normalize";

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** YYYYMMDD in UTC. */
export function compactDate(date: Date): string {
  return `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`;
}

/** YYYYMMDD_HHMMSS in UTC. */
export function compactTimestamp(date: Date): string {
  return `${compactDate(date)}_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
}

/**
 * Audit trail: one JSON line per operation in `audit_YYYYMMDD.jsonl`, one JSON
 * report per run.
 */
export class JsonlAuditLog implements AuditSink {
  private queue: Promise<void> = Promise.resolve();

  constructor(
    readonly logDir: string,
    private readonly logger: Logger = createSilentLogger(),
    private readonly now: () => Date = () => new Date(),
  ) {}

  auditFilePath(date = this.now()): string {
    return path.join(this.logDir, `audit_${compactDate(date)}.jsonl`);
  }

  logOperation(entry: AuditEntry): Promise<void> {
    const timestamp = this.now();
    const line = JSON.stringify({
      timestamp: timestamp.toISOString(),
      operation: entry.operation,
      url: entry.url,
      status: entry.status,
      published_id: entry.publishedId ?? null,
      timing: entry.timing ?? {},
      details: entry.details ?? {},
    });

    let message = `[${entry.operation}] ${entry.url} - ${entry.status}`;
    if (entry.publishedId) message += ` (published_id: ${entry.publishedId})`;
    if (entry.details && Object.keys(entry.details).length) message += ` - ${JSON.stringify(entry.details)}`;
    if (entry.status === "failed") {
      this.logger.error(message);
    } else if (entry.status === "skipped") {
      this.logger.warn(message);
    } else {
      this.logger.info(message);
    }

    const filePath = this.auditFilePath(timestamp);
    const write = this.queue.then(async () => {
      await fs.mkdir(this.logDir, { recursive: true });
      await fs.appendFile(filePath, `${line}\n`, "utf-8");
    });
    this.queue = write.catch(() => undefined);
    return write;
  }

  async writeReport(runId: string, stats: Record<string, unknown>): Promise<string> {
    const timestamp = this.now();
    const reportPath = path.join(this.logDir, `report_${runId}_${compactTimestamp(timestamp)}.json`);
    const report = { run_id: runId, timestamp: timestamp.toISOString(), stats };
    await fs.mkdir(this.logDir, { recursive: true });
    await fs.writeFile(reportPath, `${JSON.stringify(report, null, 2)}\n`, "utf-8");
    this.logger.info(`report written: ${reportPath}`);
    return reportPath;
  }
}

export function rewriteArchiveFileName(url: string): string {
  return `rewritten_${sha256Hex(url).slice(0, 16)}.json`;
}

/** Side record of each rewrite, kept even when the quality gate rejects it. */
export class FileRewriteArchive implements RewriteArchive {
  constructor(
    readonly cacheDir: string,
    private readonly logger: Logger = createSilentLogger(),
  ) {}

  async save(original: ExtractedArticle, rewritten: RewrittenArticle, verdict: QualityVerdict): Promise<void> {
    const filePath = path.join(this.cacheDir, rewriteArchiveFileName(original.url));
    const record = {
      url: original.url,
      source_name: original.sourceName,
      processed_at: new Date().toISOString(),
      original: {
        url: original.url,
        canonical_url: original.canonicalUrl,
        title: original.title,
        text: original.text,
        images: original.images,
        published_at: original.publishedAt,
        author: original.author,
        source_name: original.sourceName,
      },
      rewritten: {
        headline: rewritten.headline,
        lead: rewritten.lead,
        body_markdown: rewritten.bodyMarkdown,
        tags: rewritten.tags,
        category: rewritten.category,
        meta_title: rewritten.metaTitle,
        meta_description: rewritten.metaDescription,
        word_count: rewritten.wordCount,
        rewritten_at: rewritten.rewrittenAt,
        stub_mode: rewritten.stubMode,
      },
      quality_gate: {
        passed: verdict.passed,
        similarity_score: verdict.similarityScore,
        risk_level: verdict.riskLevel,
        needs_review: verdict.needsReview,
        issues: verdict.issues,
      },
    };

    await fs.mkdir(this.cacheDir, { recursive: true });
    await fs.writeFile(filePath, `${JSON.stringify(record, null, 2)}\n`, "utf-8");
    this.logger.info(`[SAVE] ${path.basename(filePath)} (similarity: ${verdict.similarityScore.toFixed(2)})`);
  }
}
