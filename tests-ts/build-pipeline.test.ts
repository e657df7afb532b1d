import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigError } from "@/lib/domain/errors";
import { createSilentLogger } from "@/lib/infra/logger";
import { buildPipeline, openStateFiles } from "@/lib/pipeline/build-pipeline";

const originalFetch = globalThis.fetch;
const logger = createSilentLogger();

let workDir = "";

beforeEach(async () => {
  workDir = await fs.mkdtemp(path.join(os.tmpdir(), "feedpress-build-"));
  await fs.writeFile(path.join(workDir, "sources.yaml"), "rss_feeds: []\n", "utf-8");
});

afterEach(async () => {
  globalThis.fetch = originalFetch;
  await fs.rm(workDir, { recursive: true, force: true });
});

function env(extra: NodeJS.ProcessEnv = {}): NodeJS.ProcessEnv {
  return { FEEDPRESS_CONFIG_DIR: workDir, FEEDPRESS_DATA_DIR: path.join(workDir, "data"), ...extra };
}

describe("buildPipeline", () => {
  it("falls back to memory stores without Upstash credentials", async () => {
    const pipeline = await buildPipeline({ env: env(), logger });
    expect(pipeline.storage).toBe("memory");
    expect(pipeline.settings.configDir).toBe(workDir);
    expect(pipeline.stateFiles.run.filePath).toBe(path.join(workDir, "data", "pipeline_status.json"));

    const monitor = pipeline.createMonitor({ pollIntervalSeconds: 42 });
    expect(monitor.getState().poll_interval_seconds).toBe(42);
  });

  it("uses Upstash when it answers PING", async () => {
    const bodies: unknown[] = [];
    globalThis.fetch = async (_input: RequestInfo | URL, init?: RequestInit) => {
      bodies.push(JSON.parse(String(init?.body)));
      return new Response(JSON.stringify([{ result: "PONG" }]), { status: 200 });
    };

    const pipeline = await buildPipeline({
      env: env({ UPSTASH_REDIS_REST_URL: "https://redis.example.com", UPSTASH_REDIS_REST_TOKEN: "test-secret" }),
      logger,
    });

    expect(pipeline.storage).toBe("upstash");
    expect(bodies).toEqual([[["PING"]]]);
  });

  it("fails fast when Upstash is unreachable", async () => {
    globalThis.fetch = async () => new Response("unauthorized", { status: 401 });

    await expect(
      buildPipeline({
        env: env({ UPSTASH_REDIS_REST_URL: "https://redis.example.com", UPSTASH_REDIS_REST_TOKEN: "test-secret" }),
        logger,
      }),
    ).rejects.toThrowError(ConfigError);
  });

  it("applies explicit setting overrides", async () => {
    const pipeline = await buildPipeline({ env: env(), settings: { dryRun: true, interArticleDelayMs: 0 }, logger });
    expect(pipeline.settings.dryRun).toBe(true);
    expect(pipeline.settings.interArticleDelayMs).toBe(0);
  });
});

describe("openStateFiles", () => {
  it("places both documents in the data directory", () => {
    const files = openStateFiles("/srv/data");
    expect(files.run.filePath).toBe(path.join("/srv/data", "pipeline_status.json"));
    expect(files.monitor.filePath).toBe(path.join("/srv/data", "monitor_status.json"));
  });
});
