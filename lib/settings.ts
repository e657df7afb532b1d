import path from "node:path";
import type { LogLevel } from "@/lib/infra/logger";
import { parseLogLevel } from "@/lib/infra/logger";

export interface Settings {
  dataDir: string;
  configDir: string;
  similarityThreshold: number;
  minArticleLength: number;
  maxArticleLength: number;
  articlesLimit: number | undefined;
  dryRun: boolean;
  interArticleDelayMs: number;
  monitorPollIntervalSeconds: number;
  monitorBatchLimit: number;
  llm: {
    apiKey: string;
    baseUrl: string;
    model: string;
    embeddingModel: string;
    embeddingsEnabled: boolean;
  };
  wordpress: {
    url: string;
    username: string;
    appPassword: string;
    jwtToken: string;
    postStatus: string;
  };
  email: {
    provider: string;
    apiKey: string;
    from: string;
    to: string;
  };
  logLevel: LogLevel;
}

function text(value: string | undefined): string {
  return String(value || "").trim();
}

export function isEnabled(value: string | undefined, defaultValue = "true"): boolean {
  const normalized = String(value || defaultValue || "").trim().toLowerCase();
  return !["0", "false", "no", "off"].includes(normalized);
}

function numberOr(value: string | undefined, fallback: number, min = 0): number {
  const parsed = Number(text(value));
  if (!text(value) || !Number.isFinite(parsed) || parsed < min) return fallback;
  return parsed;
}

function intOr(value: string | undefined, fallback: number, min = 0): number {
  return Math.trunc(numberOr(value, fallback, min));
}

export function resolveSettings(env: NodeJS.ProcessEnv = process.env, cwd = process.cwd()): Settings {
  const limit = Number.parseInt(text(env.ARTICLES_LIMIT), 10);
  return {
    dataDir: path.resolve(cwd, text(env.FEEDPRESS_DATA_DIR) || "data"),
    configDir: path.resolve(cwd, text(env.FEEDPRESS_CONFIG_DIR) || "config"),
    similarityThreshold: Math.min(1, numberOr(env.SIMILARITY_THRESHOLD, 0.85)),
    minArticleLength: intOr(env.MIN_ARTICLE_LENGTH, 200),
    maxArticleLength: intOr(env.MAX_ARTICLE_LENGTH, 2000, 1),
    articlesLimit: Number.isFinite(limit) && limit > 0 ? limit : undefined,
    dryRun: isEnabled(env.DRY_RUN, "false"),
    interArticleDelayMs: intOr(env.INTER_ARTICLE_DELAY_MS, 2000),
    monitorPollIntervalSeconds: intOr(env.MONITOR_POLL_INTERVAL, 300, 1),
    monitorBatchLimit: intOr(env.MONITOR_BATCH_LIMIT, 20, 1),
    llm: {
      apiKey: text(env.LLM_API_KEY) || text(env.OPENAI_API_KEY),
      baseUrl: text(env.LLM_BASE_URL) || "https://api.openai.com/v1",
      model: text(env.LLM_MODEL) || "gpt-4o-mini",
      embeddingModel: text(env.EMBEDDING_MODEL) || "text-embedding-3-small",
      embeddingsEnabled: isEnabled(env.EMBEDDINGS_ENABLED, "true"),
    },
    wordpress: {
      url: text(env.WORDPRESS_URL),
      username: text(env.WORDPRESS_USERNAME),
      appPassword: text(env.WORDPRESS_APP_PASSWORD),
      jwtToken: text(env.WORDPRESS_JWT_TOKEN),
      postStatus: text(env.WORDPRESS_POST_STATUS) || "draft",
    },
    email: {
      provider: text(env.EMAIL_PROVIDER),
      apiKey: text(env.EMAIL_API_KEY),
      from: text(env.EMAIL_FROM),
      to: text(env.EMAIL_TO),
    },
    logLevel: parseLogLevel(env.LOG_LEVEL),
  };
}
