import path from "node:path";
import type { MonitorState, RunState } from "@/lib/domain/models";
import type { Notifier, Publisher } from "@/lib/domain/ports";
import { ConfigError } from "@/lib/domain/errors";
import { loadCategoryMapping, loadRiskKeywords, loadSourcesConfig } from "@/lib/config-loader";
import { ReadabilityExtractor } from "@/lib/fetch/article-extractor";
import { RssSourceFetcher } from "@/lib/fetch/rss-fetcher";
import type { Logger } from "@/lib/infra/logger";
import { createLogger, errorMessage } from "@/lib/infra/logger";
import { JsonStateFile } from "@/lib/infra/state-file";
import { buildUpstashClientOrNone } from "@/lib/infra/upstash";
import { EmailNotifier } from "@/lib/integrations/email-notifier";
import { WordPressClient } from "@/lib/integrations/wordpress-client";
import { LlmClient } from "@/lib/llm/llm-client";
import { LlmArticleRewriter } from "@/lib/llm/rewriter";
import type { SimilarityOracle } from "@/lib/llm/similarity-oracle";
import { EmbeddingSimilarityOracle, UnavailableSimilarityOracle } from "@/lib/llm/similarity-oracle";
import { FileRewriteArchive, JsonlAuditLog } from "@/lib/output/audit-log";
import { PipelineArticleProcessor } from "@/lib/pipeline/article-processor";
import { FeedMonitor, parseMonitorState } from "@/lib/pipeline/monitor";
import { RunOrchestrator } from "@/lib/pipeline/run-orchestrator";
import { parseRunState } from "@/lib/pipeline/run-state";
import { Deduplicator } from "@/lib/process/dedupe";
import { QualityGate } from "@/lib/process/quality-gate";
import type { Settings } from "@/lib/settings";
import { resolveSettings } from "@/lib/settings";
import type { FingerprintStore } from "@/lib/store/fingerprint-store";
import { MemoryFingerprintStore, UpstashFingerprintStore } from "@/lib/store/fingerprint-store";
import type { SeenUrlStore } from "@/lib/store/seen-url-store";
import { MemorySeenUrlStore, UpstashSeenUrlStore } from "@/lib/store/seen-url-store";

export interface StateFiles {
  run: JsonStateFile<RunState>;
  monitor: JsonStateFile<MonitorState>;
}

export function openStateFiles(dataDir: string): StateFiles {
  return {
    run: new JsonStateFile(path.join(dataDir, "pipeline_status.json"), parseRunState),
    monitor: new JsonStateFile(path.join(dataDir, "monitor_status.json"), parseMonitorState),
  };
}

export interface BuildPipelineOptions {
  env?: NodeJS.ProcessEnv;
  settings?: Partial<Settings>;
  logger?: Logger;
}

export interface Pipeline {
  settings: Settings;
  logger: Logger;
  storage: "upstash" | "memory";
  fingerprints: FingerprintStore;
  seenUrls: SeenUrlStore;
  source: RssSourceFetcher;
  processor: PipelineArticleProcessor;
  orchestrator: RunOrchestrator;
  stateFiles: StateFiles;
  createMonitor(overrides?: { pollIntervalSeconds?: number; batchLimit?: number }): FeedMonitor;
}

function buildOracle(settings: Settings, logger: Logger): SimilarityOracle {
  if (!settings.llm.apiKey) {
    return new UnavailableSimilarityOracle("no LLM API key configured");
  }
  if (!settings.llm.embeddingsEnabled) {
    return new UnavailableSimilarityOracle("embeddings disabled");
  }
  const client = new LlmClient({
    apiKey: settings.llm.apiKey,
    baseUrl: settings.llm.baseUrl,
    embeddingModel: settings.llm.embeddingModel,
  });
  logger.info(`semantic similarity via ${client.embeddingModel}`);
  return new EmbeddingSimilarityOracle(client);
}

function buildPublisher(settings: Settings, logger: Logger): Publisher | null {
  if (settings.dryRun) {
    logger.info("dry run: no WordPress post will be created");
    return null;
  }
  if (!settings.wordpress.url) {
    logger.warn("WORDPRESS_URL not configured, posts will not be created");
    return null;
  }
  return new WordPressClient({
    baseUrl: settings.wordpress.url,
    username: settings.wordpress.username,
    appPassword: settings.wordpress.appPassword,
    jwtToken: settings.wordpress.jwtToken,
    postStatus: settings.wordpress.postStatus,
    logger: logger.child("wordpress"),
  });
}

/**
 * Composition root: builds every component once. Fails with ConfigError when a
 * configured store cannot be reached or a config file is invalid.
 */
export async function buildPipeline(options: BuildPipelineOptions = {}): Promise<Pipeline> {
  const settings: Settings = { ...resolveSettings(options.env ?? process.env), ...options.settings };
  const logger = options.logger ?? createLogger("feedpress", settings.logLevel);

  const sourcesConfig = loadSourcesConfig(settings.configDir);
  const categoryMapping = loadCategoryMapping(settings.configDir);
  const riskKeywords = loadRiskKeywords(settings.configDir);

  let fingerprints: FingerprintStore;
  let seenUrls: SeenUrlStore;
  let storage: Pipeline["storage"];
  const upstash = buildUpstashClientOrNone(options.env ?? process.env);
  if (upstash) {
    try {
      await upstash.ping();
    } catch (error) {
      throw new ConfigError(`Upstash store unreachable: ${errorMessage(error)}`);
    }
    fingerprints = new UpstashFingerprintStore(upstash);
    seenUrls = new UpstashSeenUrlStore(upstash);
    storage = "upstash";
  } else {
    logger.warn("no Upstash credentials, fingerprints are kept in memory for this process only");
    fingerprints = new MemoryFingerprintStore();
    seenUrls = new MemorySeenUrlStore();
    storage = "memory";
  }

  const oracle = buildOracle(settings, logger.child("similarity"));
  const deduplicator = new Deduplicator(fingerprints, {
    similarityThreshold: settings.similarityThreshold,
    oracle,
    logger: logger.child("dedupe"),
  });
  const qualityGate = new QualityGate({
    similarityThreshold: settings.similarityThreshold,
    minLength: settings.minArticleLength,
    maxLength: settings.maxArticleLength,
    riskKeywords,
    oracle,
    logger: logger.child("quality"),
  });

  const llm = settings.llm.apiKey
    ? new LlmClient({ apiKey: settings.llm.apiKey, baseUrl: settings.llm.baseUrl, model: settings.llm.model })
    : null;
  const audit = new JsonlAuditLog(path.join(settings.dataDir, "logs"), logger.child("audit"));

  const source = new RssSourceFetcher(sourcesConfig, { seenUrls, logger: logger.child("fetch") });
  const processor = new PipelineArticleProcessor({
    extractor: new ReadabilityExtractor(sourcesConfig.downloadTimeoutSeconds, logger.child("extract")),
    deduplicator,
    rewriter: new LlmArticleRewriter(llm, logger.child("rewrite")),
    qualityGate,
    publisher: buildPublisher(settings, logger),
    categoryMapping,
    seenUrls,
    archive: new FileRewriteArchive(path.join(settings.dataDir, "cache"), logger.child("archive")),
    logger: logger.child("article"),
  });

  const stateFiles = openStateFiles(settings.dataDir);
  const orchestrator = new RunOrchestrator({
    source,
    processor,
    stateStore: stateFiles.run,
    audit,
    interArticleDelayMs: settings.interArticleDelayMs,
    logger: logger.child("run"),
  });

  const notifier: Notifier = new EmailNotifier({
    provider: settings.email.provider,
    apiKey: settings.email.apiKey,
    from: settings.email.from,
    to: settings.email.to,
    logger: logger.child("email"),
  });

  return {
    settings,
    logger,
    storage,
    fingerprints,
    seenUrls,
    source,
    processor,
    orchestrator,
    stateFiles,
    createMonitor(overrides = {}) {
      return new FeedMonitor({
        source,
        processor,
        stateStore: stateFiles.monitor,
        notifier,
        pollIntervalSeconds: overrides.pollIntervalSeconds ?? settings.monitorPollIntervalSeconds,
        batchLimit: overrides.batchLimit ?? settings.monitorBatchLimit,
        logger: logger.child("monitor"),
      });
    },
  };
}
