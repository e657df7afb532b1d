import fs from "node:fs";
import path from "node:path";
import yaml from "js-yaml";
import type { FeedConfig, RiskKeywords, SourcesConfig } from "@/lib/domain/models";
import { ConfigError } from "@/lib/domain/errors";
import { isRecord, readStringList } from "@/lib/infra/json";
import { DEFAULT_RISK_KEYWORDS } from "@/lib/process/quality-gate";

const DEFAULT_CONFIG_DIR = path.join(process.cwd(), "config");

export function loadYaml(filePath: string): Record<string, unknown> {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
  }

  let data: unknown;
  try {
    data = yaml.load(raw) || {};
  } catch (error) {
    throw new ConfigError(`Invalid YAML in ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (!isRecord(data)) {
    throw new ConfigError(`YAML root must be a mapping: ${filePath}`);
  }
  return data;
}

/** Like loadYaml, but a missing file yields an empty mapping. */
function loadOptionalYaml(filePath: string): Record<string, unknown> {
  if (!fs.existsSync(filePath)) {
    return {};
  }
  return loadYaml(filePath);
}

function positiveNumber(value: unknown, fallback: number): number {
  const n = Number(value);
  return Number.isFinite(n) && n >= 0 ? n : fallback;
}

export function loadSourcesConfig(configDir = DEFAULT_CONFIG_DIR): SourcesConfig {
  const configPath = path.join(configDir, "sources.yaml");
  const raw = loadYaml(configPath);

  if (!Array.isArray(raw.rss_feeds)) {
    throw new ConfigError(`rss_feeds must be a list: ${configPath}`);
  }

  const feeds: FeedConfig[] = [];
  const seenUrls = new Set<string>();
  for (const row of raw.rss_feeds) {
    if (!isRecord(row)) continue;
    const url = String(row.url || "").trim();
    if (!url || seenUrls.has(url)) {
      continue;
    }
    feeds.push({
      name: String(row.name || "").trim() || url,
      url,
      enabled: row.enabled !== false,
    });
    seenUrls.add(url);
  }

  const whitelist = isRecord(raw.whitelist_domains) ? raw.whitelist_domains : {};
  const rateLimit = isRecord(raw.rate_limit) ? raw.rate_limit : {};
  const timeouts = isRecord(raw.timeouts) ? raw.timeouts : {};

  return {
    feeds,
    whitelistEnabled: whitelist.enabled === true,
    whitelistDomains: readStringList(whitelist, "domains").map((domain) => domain.toLowerCase()),
    delayBetweenRequestsMs: Math.round(positiveNumber(rateLimit.delay_between_requests, 1) * 1000),
    downloadTimeoutSeconds: positiveNumber(timeouts.download, 30) || 30,
    maxAgeHours: positiveNumber(raw.max_age_hours, 48) || 48,
  };
}

export function loadCategoryMapping(configDir = DEFAULT_CONFIG_DIR): Record<string, number> {
  const configPath = path.join(configDir, "categories.yaml");
  const raw = loadOptionalYaml(configPath);
  const mapping = raw.category_mapping;
  if (mapping === undefined || mapping === null) {
    return {};
  }
  if (!isRecord(mapping)) {
    throw new ConfigError(`category_mapping must be a mapping: ${configPath}`);
  }

  const result: Record<string, number> = {};
  for (const [name, value] of Object.entries(mapping)) {
    const id = Number(value);
    if (Number.isInteger(id) && id > 0) {
      result[name.trim().toLowerCase()] = id;
    }
  }
  return result;
}

export function loadRiskKeywords(configDir = DEFAULT_CONFIG_DIR): RiskKeywords {
  const configPath = path.join(configDir, "quality.yaml");
  const raw = loadOptionalYaml(configPath);
  if (!isRecord(raw.risk_keywords)) {
    return DEFAULT_RISK_KEYWORDS;
  }
  return {
    high: readStringList(raw.risk_keywords, "high"),
    medium: readStringList(raw.risk_keywords, "medium"),
  };
}
