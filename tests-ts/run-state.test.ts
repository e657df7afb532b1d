import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { RunState } from "@/lib/domain/models";
import type { StateStore } from "@/lib/domain/ports";
import { JsonStateFile } from "@/lib/infra/state-file";
import { emptyRunState, MAX_RUN_MESSAGES, parseRunState, RunStateRecorder } from "@/lib/pipeline/run-state";

class RecordingStore implements StateStore<RunState> {
  writes: RunState[] = [];

  async read(): Promise<RunState | null> {
    return this.writes.at(-1) ?? null;
  }

  async write(state: RunState): Promise<void> {
    this.writes.push(state);
  }
}

let tmpDir = "";

beforeEach(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "feedpress-state-"));
});

afterEach(async () => {
  await fs.rm(tmpDir, { recursive: true, force: true });
});

describe("JsonStateFile", () => {
  it("returns null before the first write", async () => {
    const file = new JsonStateFile(path.join(tmpDir, "state.json"), parseRunState);
    expect(await file.read()).toBeNull();
  });

  it("round-trips a document and leaves no temp files", async () => {
    const file = new JsonStateFile(path.join(tmpDir, "nested", "state.json"), parseRunState);
    const state = emptyRunState("abc12345", "2026-03-01T10:00:00.000Z");

    await file.write(state);

    expect(await file.read()).toEqual(state);
    expect(await fs.readdir(path.join(tmpDir, "nested"))).toEqual(["state.json"]);
  });

  it("applies concurrent writes in call order", async () => {
    const file = new JsonStateFile(path.join(tmpDir, "state.json"), parseRunState);
    const writes = [1, 2, 3, 4, 5].map((processed) =>
      file.write({ ...emptyRunState("abc12345", "2026-03-01T10:00:00.000Z"), processed }),
    );
    await Promise.all(writes);

    expect((await file.read())?.processed).toBe(5);
  });

  it("parse rejects documents that are not run states", async () => {
    const filePath = path.join(tmpDir, "state.json");
    await fs.writeFile(filePath, JSON.stringify({ hello: "world" }), "utf-8");
    expect(await new JsonStateFile(filePath, parseRunState).read()).toBeNull();
  });
});

describe("parseRunState", () => {
  it("fills defaults for missing fields", () => {
    expect(parseRunState({ run_id: "r1", status: "weird", messages: [{ step: "fetch" }, 3] })).toEqual({
      run_id: "r1",
      status: "running",
      current_step: "fetching",
      current_article: null,
      total_candidates: 0,
      processed: 0,
      created: 0,
      skipped: 0,
      failed: 0,
      started_at: "",
      completed_at: null,
      messages: [{ timestamp: "", step: "fetch", message: "" }],
    });
  });
});

describe("RunStateRecorder", () => {
  it("persists every change", async () => {
    const store = new RecordingStore();
    const recorder = new RunStateRecorder(store, "run00001");

    await recorder.start();
    await recorder.setTotalCandidates(3);
    await recorder.setStep("processing");
    await recorder.setCurrentArticle({ url: "https://example.com/a", title: "A", index: 1, total: 3 });
    await recorder.recordOutcome("created");
    await recorder.recordOutcome("skipped");
    await recorder.recordOutcome("failed");

    expect(store.writes).toHaveLength(7);
    const last = store.writes[6];
    expect(last).toMatchObject({
      run_id: "run00001",
      status: "running",
      current_step: "processing",
      total_candidates: 3,
      processed: 3,
      created: 1,
      skipped: 1,
      failed: 1,
    });
    expect(last.processed).toBe(last.created + last.skipped + last.failed);
  });

  it("keeps only the latest messages", async () => {
    const recorder = new RunStateRecorder(new RecordingStore(), "run00001");
    for (let i = 1; i <= MAX_RUN_MESSAGES + 5; i += 1) {
      await recorder.addMessage("fetching", `message ${i}`);
    }
    const { messages } = recorder.snapshot();
    expect(messages).toHaveLength(20);
    expect(messages[0].message).toBe("message 6");
    expect(messages[19].message).toBe("message 25");
  });

  it("truncates the current article title", async () => {
    const recorder = new RunStateRecorder(new RecordingStore(), "run00001");
    await recorder.setCurrentArticle({ url: "https://example.com/a", title: "x".repeat(120), index: 1, total: 1 });
    expect(recorder.snapshot().current_article?.title).toHaveLength(80);
  });

  it("finish marks the run completed and clears the current article", async () => {
    const store = new RecordingStore();
    const recorder = new RunStateRecorder(store, "run00001");
    await recorder.setCurrentArticle({ url: "https://example.com/a", title: "A", index: 1, total: 1 });

    const final = await recorder.finish();

    expect(final.status).toBe("completed");
    expect(final.current_step).toBe("completed");
    expect(final.current_article).toBeNull();
    expect(final.completed_at).toEqual(expect.any(String));
    expect(store.writes.at(-1)).toEqual(final);
  });

  it("snapshots are detached copies", () => {
    const recorder = new RunStateRecorder(new RecordingStore(), "run00001");
    const snapshot = recorder.snapshot();
    snapshot.processed = 99;
    expect(recorder.snapshot().processed).toBe(0);
  });
});
