import { randomUUID } from "node:crypto";
import type { ArticleOutcome, Candidate, RunReport, RunState } from "@/lib/domain/models";
import type { ArticleProcessor, AuditSink, CandidateSource, StateStore } from "@/lib/domain/ports";
import type { Logger } from "@/lib/infra/logger";
import { createSilentLogger, errorMessage } from "@/lib/infra/logger";
import { RunStateRecorder } from "@/lib/pipeline/run-state";

export interface RunOrchestratorDeps {
  source: CandidateSource;
  processor: ArticleProcessor;
  stateStore: StateStore<RunState>;
  audit: AuditSink;
  interArticleDelayMs?: number;
  logger?: Logger;
}

export interface RunOptions {
  signal?: AbortSignal;
}

export function newRunId(): string {
  return randomUUID().slice(0, 8);
}

/** Resolves after `ms`, or early when the signal aborts. */
export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0 || signal?.aborted) return Promise.resolve();
  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export class RunOrchestrator {
  private readonly logger: Logger;

  private readonly interArticleDelayMs: number;

  constructor(private readonly deps: RunOrchestratorDeps) {
    this.logger = deps.logger ?? createSilentLogger();
    this.interArticleDelayMs = Math.max(0, deps.interArticleDelayMs ?? 2000);
  }

  async run(limit?: number, options: RunOptions = {}): Promise<RunReport> {
    const { signal } = options;
    const recorder = new RunStateRecorder(this.deps.stateStore, newRunId());
    let outcome: RunReport["outcome"] = "completed";
    let failure: string | null = null;

    this.logger.info(`=== pipeline run ${recorder.runId} started ===`);

    try {
      await recorder.start();

      this.logger.info("[FETCH] collecting candidates");
      const pendingMessages: Array<Promise<void>> = [];
      const candidates = await this.deps.source.fetchAll(limit, (step, message) => {
        pendingMessages.push(
          recorder.addMessage(step, message).catch((error: unknown) => {
            this.logger.warn("could not record fetch status", error);
          }),
        );
      });
      await Promise.all(pendingMessages);
      await recorder.setTotalCandidates(candidates.length);
      this.logger.info(`[FETCH] ${candidates.length} candidates`);

      await recorder.setStep("processing");
      for (let index = 0; index < candidates.length; index += 1) {
        if (signal?.aborted) {
          outcome = "cancelled";
          this.logger.warn("run cancelled, remaining articles skipped");
          break;
        }

        const candidate = candidates[index];
        await this.bookkeep(candidate.url, "current_article", () =>
          recorder.setCurrentArticle({
            url: candidate.url,
            title: candidate.title,
            index: index + 1,
            total: candidates.length,
          }),
        );
        this.logger.info(`--- ${index + 1}/${candidates.length}: ${candidate.url} ---`);

        const result = await this.processOne(candidate);
        await this.bookkeep(candidate.url, "record_outcome", () => recorder.recordOutcome(result.status));
        await this.bookkeep(candidate.url, "audit", () =>
          this.deps.audit.logOperation({
            operation: "pipeline",
            url: candidate.url,
            status: result.status,
            details: { reason: result.reason },
            timing: result.timing,
            publishedId: result.publishedId,
          }),
        );

        if (index < candidates.length - 1) {
          await abortableSleep(this.interArticleDelayMs, signal);
        }
      }
    } catch (error) {
      outcome = "errored";
      failure = errorMessage(error);
      this.logger.error(`pipeline run ${recorder.runId} failed`, error);
    }

    const finalState = await this.finalize(recorder);
    const stats = {
      total_candidates: finalState.total_candidates,
      processed: finalState.processed,
      created: finalState.created,
      skipped: finalState.skipped,
      failed: finalState.failed,
    };
    const reportPath = await this.deps.audit.writeReport(recorder.runId, {
      ...stats,
      status: finalState.status,
      outcome,
      error: failure,
      started_at: finalState.started_at,
      completed_at: finalState.completed_at,
    });

    this.logger.info(
      `=== pipeline run ${recorder.runId} ${outcome}: ${stats.created} created, ${stats.skipped} skipped, ${stats.failed} failed ===`,
    );
    return { runId: recorder.runId, outcome, error: failure, stats, reportPath };
  }

  private async processOne(candidate: Candidate): Promise<ArticleOutcome> {
    try {
      return await this.deps.processor.process(candidate);
    } catch (error) {
      this.logger.error(`processing ${candidate.url} threw`, error);
      return { status: "failed", reason: errorMessage(error), publishedId: null, timing: {} };
    }
  }

  /** State and audit writes for one article; a failure is logged and the run goes on. */
  private async bookkeep(url: string, step: string, write: () => Promise<void>): Promise<void> {
    try {
      await write();
    } catch (error) {
      this.logger.error(`[${step}] ${url}: ${errorMessage(error)}`);
    }
  }

  private async finalize(recorder: RunStateRecorder): Promise<RunState> {
    try {
      return await recorder.finish();
    } catch (error) {
      this.logger.error("could not persist final run state", error);
      return recorder.snapshot();
    }
  }
}
