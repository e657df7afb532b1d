import type { CurrentArticle, OutcomeStatus, RunMessage, RunState } from "@/lib/domain/models";
import type { StateStore } from "@/lib/domain/ports";
import { isRecord, readNumber, readString } from "@/lib/infra/json";

export const MAX_RUN_MESSAGES = 20;

const TITLE_MAX_CHARS = 80;

export function emptyRunState(runId: string, startedAt = new Date().toISOString()): RunState {
  return {
    run_id: runId,
    status: "running",
    current_step: "fetching",
    current_article: null,
    total_candidates: 0,
    processed: 0,
    created: 0,
    skipped: 0,
    failed: 0,
    started_at: startedAt,
    completed_at: null,
    messages: [],
  };
}

function parseStatus(value: unknown): RunState["status"] {
  return value === "completed" ? "completed" : "running";
}

function parseStep(value: unknown): RunState["current_step"] {
  if (value === "processing" || value === "completed") return value;
  return "fetching";
}

function parseCurrentArticle(value: unknown): CurrentArticle | null {
  if (!isRecord(value)) return null;
  return {
    url: readString(value, "url"),
    title: readString(value, "title"),
    index: readNumber(value, "index"),
    total: readNumber(value, "total"),
  };
}

/** Reads a persisted run state document; null when the payload is not one. */
export function parseRunState(value: unknown): RunState | null {
  if (!isRecord(value) || typeof value.run_id !== "string") return null;
  const messages = Array.isArray(value.messages) ? value.messages : [];
  return {
    run_id: value.run_id,
    status: parseStatus(value.status),
    current_step: parseStep(value.current_step),
    current_article: parseCurrentArticle(value.current_article),
    total_candidates: readNumber(value, "total_candidates"),
    processed: readNumber(value, "processed"),
    created: readNumber(value, "created"),
    skipped: readNumber(value, "skipped"),
    failed: readNumber(value, "failed"),
    started_at: readString(value, "started_at"),
    completed_at: typeof value.completed_at === "string" ? value.completed_at : null,
    messages: messages.filter(isRecord).map((row) => ({
      timestamp: readString(row, "timestamp"),
      step: readString(row, "step"),
      message: readString(row, "message"),
    })),
  };
}

/**
 * Holds the live state of one run and persists every change. Writes go through
 * the store one at a time, in call order.
 */
export class RunStateRecorder {
  private state: RunState;

  constructor(
    private readonly store: StateStore<RunState>,
    runId: string,
  ) {
    this.state = emptyRunState(runId);
  }

  get runId(): string {
    return this.state.run_id;
  }

  snapshot(): RunState {
    return structuredClone(this.state);
  }

  async start(): Promise<void> {
    this.state = emptyRunState(this.state.run_id);
    await this.persist();
  }

  async setStep(step: RunState["current_step"]): Promise<void> {
    this.state.current_step = step;
    await this.persist();
  }

  async setTotalCandidates(total: number): Promise<void> {
    this.state.total_candidates = Math.max(0, Math.trunc(total));
    await this.persist();
  }

  async addMessage(step: string, message: string): Promise<void> {
    const entry: RunMessage = { timestamp: new Date().toISOString(), step, message };
    this.state.messages = [...this.state.messages, entry].slice(-MAX_RUN_MESSAGES);
    await this.persist();
  }

  async setCurrentArticle(article: CurrentArticle | null): Promise<void> {
    this.state.current_article = article
      ? { ...article, title: String(article.title || "").slice(0, TITLE_MAX_CHARS) }
      : null;
    await this.persist();
  }

  async recordOutcome(status: OutcomeStatus): Promise<void> {
    this.state.processed += 1;
    this.state[status] += 1;
    await this.persist();
  }

  async finish(): Promise<RunState> {
    this.state.status = "completed";
    this.state.current_step = "completed";
    this.state.current_article = null;
    this.state.completed_at = new Date().toISOString();
    await this.persist();
    return this.snapshot();
  }

  private persist(): Promise<void> {
    return this.store.write(this.snapshot());
  }
}
