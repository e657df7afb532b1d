import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { createSilentLogger } from "@/lib/infra/logger";
import { executeMonitorCommand } from "../src/commands/monitor";
import { executeRunCommand } from "../src/commands/run";
import { executeStatusCommand } from "../src/commands/status";
import { CliError } from "../src/errors";

let workDir = "";
let configDir = "";
let dataDir = "";

const logger = createSilentLogger();

beforeEach(async () => {
  workDir = await fs.mkdtemp(path.join(os.tmpdir(), "feedpress-cli-"));
  configDir = path.join(workDir, "config");
  dataDir = path.join(workDir, "data");
  await fs.mkdir(configDir, { recursive: true });
  await fs.writeFile(path.join(configDir, "sources.yaml"), "rss_feeds: []\n", "utf-8");
});

afterEach(async () => {
  await fs.rm(workDir, { recursive: true, force: true });
});

describe("executeRunCommand", () => {
  it("completes an empty run and writes a report", async () => {
    const result = await executeRunCommand({ configDir, dataDir, dryRun: true }, { env: {}, logger });

    expect(result.payload).toMatchObject({
      ok: true,
      outcome: "completed",
      dry_run: true,
      storage: "memory",
      stats: { total_candidates: 0, processed: 0, created: 0, skipped: 0, failed: 0 },
    });

    const reports = await fs.readdir(path.join(dataDir, "logs"));
    expect(reports).toHaveLength(1);
    expect(reports[0]).toMatch(/^report_[0-9a-f]{8}_\d{8}_\d{6}\.json$/);
  });

  it("reports a broken sources file as a configuration error", async () => {
    await fs.writeFile(path.join(configDir, "sources.yaml"), "rss_feeds: nope\n", "utf-8");

    const error = await executeRunCommand({ configDir, dataDir }, { env: {}, logger }).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(CliError);
    expect(error instanceof CliError && error.code).toBe(2);
  });
});

describe("executeStatusCommand", () => {
  it("reports missing state as no data", async () => {
    const result = await executeStatusCommand({ dataDir }, { env: {} });

    expect(result.payload).toEqual({ ok: true, run: null, monitor: null });
    expect(result.lines).toHaveLength(2);
    expect(result.lines?.[0]).toContain("Last run: no data");
    expect(result.lines?.[1]).toContain("Monitor: no data");
  });

  it("shows the state left by the last run", async () => {
    const runResult = await executeRunCommand({ configDir, dataDir, dryRun: true }, { env: {}, logger });

    const result = await executeStatusCommand({ dataDir }, { env: {} });
    expect(result.payload).toMatchObject({
      ok: true,
      run: {
        run_id: runResult.payload.run_id,
        status: "completed",
        current_step: "completed",
        current_article: null,
        total_candidates: 0,
      },
      monitor: null,
    });
    expect(result.lines?.[0]).toContain(`Last run ${runResult.payload.run_id}: completed (step: completed)`);
  });
});

describe("executeMonitorCommand", () => {
  it("requires a stop signal", async () => {
    await expect(executeMonitorCommand({ configDir, dataDir }, { env: {}, logger })).rejects.toThrowError(
      "monitor needs an abort signal to know when to stop",
    );
  });

  it("runs one check and stops when the signal aborts", async () => {
    const controller = new AbortController();
    controller.abort();

    const result = await executeMonitorCommand(
      { configDir, dataDir, dryRun: true, interval: 60 },
      { env: {}, logger, signal: controller.signal },
    );

    expect(result.payload).toMatchObject({
      ok: true,
      running: false,
      poll_interval_seconds: 60,
      total_checks: 1,
      total_articles_found: 0,
    });

    const persisted = JSON.parse(await fs.readFile(path.join(dataDir, "monitor_status.json"), "utf-8"));
    expect(persisted.running).toBe(false);
    expect(persisted.total_checks).toBe(1);
  });
});
