import type { Candidate, MonitorState, ProcessedArticleSummary } from "@/lib/domain/models";
import type { ArticleProcessor, CandidateSource, Notifier, StateStore } from "@/lib/domain/ports";
import { isRecord, readNumber, readString } from "@/lib/infra/json";
import type { Logger } from "@/lib/infra/logger";
import { createSilentLogger } from "@/lib/infra/logger";

export const LAST_ARTICLES_LIMIT = 10;

export interface FeedMonitorDeps {
  source: CandidateSource;
  processor: ArticleProcessor;
  stateStore: StateStore<MonitorState>;
  notifier?: Notifier | null;
  pollIntervalSeconds?: number;
  batchLimit?: number;
  notifyLimit?: number;
  sleepStepMs?: number;
  logger?: Logger;
}

export function emptyMonitorState(pollIntervalSeconds: number): MonitorState {
  return {
    running: false,
    started_at: null,
    last_check: null,
    poll_interval_seconds: pollIntervalSeconds,
    total_checks: 0,
    total_articles_found: 0,
    total_articles_processed: 0,
    total_articles_created: 0,
    last_articles: [],
  };
}

function parseSummary(row: Record<string, unknown>): ProcessedArticleSummary {
  const status = row.status;
  return {
    url: readString(row, "url"),
    title: readString(row, "title"),
    source: readString(row, "source"),
    status: status === "created" || status === "failed" ? status : "skipped",
    published_id: typeof row.published_id === "string" ? row.published_id : null,
    processed_at: readString(row, "processed_at"),
  };
}

export function parseMonitorState(value: unknown): MonitorState | null {
  if (!isRecord(value)) return null;
  const rows = Array.isArray(value.last_articles) ? value.last_articles : [];
  return {
    running: value.running === true,
    started_at: typeof value.started_at === "string" ? value.started_at : null,
    last_check: typeof value.last_check === "string" ? value.last_check : null,
    poll_interval_seconds: readNumber(value, "poll_interval_seconds"),
    total_checks: readNumber(value, "total_checks"),
    total_articles_found: readNumber(value, "total_articles_found"),
    total_articles_processed: readNumber(value, "total_articles_processed"),
    total_articles_created: readNumber(value, "total_articles_created"),
    last_articles: rows.filter(isRecord).map(parseSummary),
  };
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Repeats fetch + process on a timer. One loop at most; state is mutated only
 * by that loop and by start/stop.
 */
export class FeedMonitor {
  private readonly logger: Logger;

  private readonly pollIntervalSeconds: number;

  private readonly batchLimit: number;

  private readonly notifyLimit: number;

  private readonly sleepStepMs: number;

  private state: MonitorState;

  private loop: Promise<void> | null = null;

  constructor(private readonly deps: FeedMonitorDeps) {
    this.logger = deps.logger ?? createSilentLogger();
    this.pollIntervalSeconds = Math.max(0, deps.pollIntervalSeconds ?? 300);
    this.batchLimit = Math.max(1, deps.batchLimit ?? 20);
    this.notifyLimit = Math.max(0, deps.notifyLimit ?? 10);
    this.sleepStepMs = Math.max(1, deps.sleepStepMs ?? 1000);
    this.state = emptyMonitorState(this.pollIntervalSeconds);
  }

  get isRunning(): boolean {
    return this.state.running;
  }

  getState(): MonitorState {
    return structuredClone(this.state);
  }

  async start(): Promise<boolean> {
    if (this.state.running) {
      this.logger.warn("monitor already running");
      return false;
    }
    if (this.loop) {
      this.logger.info("waiting for the previous loop to exit");
      await this.loop;
      if (this.state.running) {
        this.logger.warn("monitor already running");
        return false;
      }
    }

    this.state.running = true;
    this.state.started_at = new Date().toISOString();
    await this.persist();

    const loop = this.runLoop().finally(() => {
      this.loop = null;
    });
    this.loop = loop;
    this.logger.info(`monitor started (check every ${this.pollIntervalSeconds}s)`);
    return true;
  }

  async stop(): Promise<boolean> {
    if (!this.state.running) {
      this.logger.warn("monitor not running");
      return false;
    }

    this.state.running = false;
    await this.persist();
    this.logger.info("monitor stopped");
    return true;
  }

  /** Resolves once the loop has exited after a stop. */
  async waitUntilIdle(): Promise<void> {
    if (this.loop) {
      await this.loop;
    }
  }

  private async runLoop(): Promise<void> {
    while (this.state.running) {
      try {
        await this.tick();
      } catch (error) {
        this.logger.error("feed check failed", error);
      }
      await this.persist();
      await this.idle();
    }
  }

  private async idle(): Promise<void> {
    const deadline = Date.now() + this.pollIntervalSeconds * 1000;
    while (this.state.running && Date.now() < deadline) {
      await sleep(Math.min(this.sleepStepMs, Math.max(0, deadline - Date.now())));
    }
  }

  private async tick(): Promise<void> {
    this.state.last_check = new Date().toISOString();
    this.state.total_checks += 1;
    this.logger.info("checking feeds");

    const candidates = await this.deps.source.fetchAll(this.batchLimit);
    if (!candidates.length) {
      this.logger.info("no new articles");
      return;
    }

    this.state.total_articles_found += candidates.length;
    this.logger.info(`${candidates.length} new articles, processing`);
    await this.notify(candidates);

    let created = 0;
    for (const candidate of candidates) {
      if (!this.state.running) break;
      try {
        const outcome = await this.deps.processor.process(candidate);
        this.state.total_articles_processed += 1;
        if (outcome.status === "created") {
          this.state.total_articles_created += 1;
          created += 1;
        }
        this.remember({
          url: candidate.url,
          title: candidate.title,
          source: candidate.source,
          status: outcome.status,
          published_id: outcome.publishedId,
          processed_at: new Date().toISOString(),
        });
      } catch (error) {
        this.logger.error(`processing ${candidate.url} failed`, error);
      }
    }

    if (created > 0) {
      this.logger.info(`${created} articles published`);
    } else {
      this.logger.info("no article published (all discarded or already known)");
    }
  }

  private async notify(candidates: Candidate[]): Promise<void> {
    if (!this.deps.notifier || this.notifyLimit === 0) return;
    try {
      await this.deps.notifier.sendNewArticlesNotification(
        candidates.slice(0, this.notifyLimit).map((candidate) => ({
          url: candidate.url,
          title: candidate.title || "Untitled",
          source: candidate.source || "Unknown",
        })),
      );
    } catch (error) {
      this.logger.warn("new articles notification failed", error);
    }
  }

  private remember(summary: ProcessedArticleSummary): void {
    this.state.last_articles = [summary, ...this.state.last_articles].slice(0, LAST_ARTICLES_LIMIT);
  }

  private async persist(): Promise<void> {
    try {
      await this.deps.stateStore.write(this.getState());
    } catch (error) {
      this.logger.warn("could not save monitor state", error);
    }
  }
}
