import Parser from "rss-parser";
import type { Candidate, SourcesConfig } from "@/lib/domain/models";
import type { CandidateSource, FetchStatusCallback } from "@/lib/domain/ports";
import type { Logger } from "@/lib/infra/logger";
import { createSilentLogger, errorMessage } from "@/lib/infra/logger";
import type { SeenUrlStore } from "@/lib/store/seen-url-store";

const TAG_RE = /<[^>]+>/g;
const MULTISPACE_RE = /\s+/g;

interface FeedItemExtras {
  description?: string;
  published?: string;
  updated?: string;
}

type FeedItem = Parser.Item & FeedItemExtras;

const parser = new Parser<Record<string, unknown>, FeedItemExtras>({
  customFields: {
    item: ["description", "published", "updated"],
  },
});

async function fetchFeedWithTimeout(feedUrl: string, timeoutMs: number): Promise<FeedItem[]> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(feedUrl, {
      method: "GET",
      redirect: "follow",
      headers: {
        Accept: "application/rss+xml, application/xml, text/xml;q=0.9, */*;q=0.8",
      },
      signal: controller.signal,
    });

    if (!response.ok) {
      throw new Error(`RSS fetch failed: ${response.status}`);
    }

    const xml = await response.text();
    const feed = await parser.parseString(xml);
    return feed.items || [];
  } finally {
    clearTimeout(timer);
  }
}

export function cleanHtmlText(value: string): string {
  return String(value || "")
    .replace(TAG_RE, " ")
    .replace(/&nbsp;/g, " ")
    .replace(/&amp;/g, "&")
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(MULTISPACE_RE, " ")
    .trim();
}

function parsePublishedAt(item: FeedItem): Date | null {
  const candidates = [item.isoDate, item.pubDate, item.published, item.updated];
  for (const candidate of candidates) {
    if (!candidate) continue;
    const parsed = new Date(String(candidate));
    if (!Number.isNaN(parsed.getTime())) {
      return parsed;
    }
  }
  return null;
}

export function isDomainAllowed(url: string, allowedDomains: string[]): boolean {
  if (!allowedDomains.length) return true;
  let host: string;
  try {
    host = new URL(url).hostname.toLowerCase();
  } catch {
    return false;
  }
  host = host.replace(/^www\./, "");
  return allowedDomains.some((raw) => {
    const allowed = raw.toLowerCase().replace(/^www\./, "");
    return host === allowed || host.endsWith(`.${allowed}`);
  });
}

function publishedTime(candidate: Candidate): number {
  if (!candidate.publishedAt) return Number.NEGATIVE_INFINITY;
  const time = new Date(candidate.publishedAt).getTime();
  return Number.isNaN(time) ? Number.NEGATIVE_INFINITY : time;
}

/** Newest first; undated candidates last. Stable for equal dates. */
export function sortNewestFirst(candidates: Candidate[]): Candidate[] {
  return [...candidates].sort((a, b) => {
    const left = publishedTime(a);
    const right = publishedTime(b);
    if (left === right) return 0;
    return right > left ? 1 : -1;
  });
}

/**
 * Picks up to `limit` candidates, one per source per round, sources in the
 * order they first appear. A source that runs out drops out of the rotation.
 */
export function distributeBySource(candidates: Candidate[], limit: number): Candidate[] {
  const bySource = new Map<string, Candidate[]>();
  for (const candidate of candidates) {
    const key = candidate.source || "Unknown";
    const bucket = bySource.get(key);
    if (bucket) {
      bucket.push(candidate);
    } else {
      bySource.set(key, [candidate]);
    }
  }

  const queues = Array.from(bySource.values()).map((bucket) => sortNewestFirst(bucket));
  const picked: Candidate[] = [];
  let round = 0;
  while (picked.length < limit && queues.some((queue) => queue.length > round)) {
    for (const queue of queues) {
      if (picked.length >= limit) break;
      if (queue.length > round) {
        picked.push(queue[round]);
      }
    }
    round += 1;
  }
  return sortNewestFirst(picked);
}

export interface RssSourceFetcherOptions {
  seenUrls?: SeenUrlStore | null;
  logger?: Logger;
  now?: () => Date;
}

export class RssSourceFetcher implements CandidateSource {
  private readonly logger: Logger;

  private readonly now: () => Date;

  constructor(
    private readonly config: SourcesConfig,
    private readonly options: RssSourceFetcherOptions = {},
  ) {
    this.logger = options.logger ?? createSilentLogger();
    this.now = options.now ?? (() => new Date());
  }

  async fetchAll(limit?: number, onStatus?: FetchStatusCallback): Promise<Candidate[]> {
    const report = (message: string) => {
      if (!onStatus) return;
      try {
        onStatus("fetching", message);
      } catch (error) {
        this.logger.debug(`status callback failed: ${errorMessage(error)}`);
      }
    };

    const candidates: Candidate[] = [];
    const feeds = this.config.feeds.filter((feed) => feed.enabled);
    for (let index = 0; index < feeds.length; index += 1) {
      const feed = feeds[index];
      if (index > 0 && this.config.delayBetweenRequestsMs > 0) {
        await new Promise((resolve) => setTimeout(resolve, this.config.delayBetweenRequestsMs));
      }

      report(`Downloading feed: ${feed.name}`);
      let items: FeedItem[];
      try {
        items = await fetchFeedWithTimeout(feed.url, Math.max(1_000, this.config.downloadTimeoutSeconds * 1_000));
      } catch (error) {
        this.logger.error(`feed ${feed.name} failed`, error);
        report(`Feed error ${feed.name}: ${errorMessage(error).slice(0, 100)}`);
        continue;
      }
      report(`Found ${items.length} articles in feed '${feed.name}'`);

      const added = await this.collect(feed.name, items, candidates);
      this.logger.info(
        `feed '${feed.name}': ${added.added} candidates (skipped: ${added.processed} processed, ${added.old} too old, ${added.whitelist} outside whitelist)`,
      );
    }

    const selected =
      limit !== undefined && limit > 0 ? distributeBySource(candidates, limit) : sortNewestFirst(candidates);
    this.logger.info(`${selected.length} candidates collected`);
    return selected;
  }

  private async collect(
    sourceName: string,
    items: FeedItem[],
    into: Candidate[],
  ): Promise<{ added: number; processed: number; old: number; whitelist: number }> {
    const counts = { added: 0, processed: 0, old: 0, whitelist: 0 };
    const cutoff = this.now().getTime() - this.config.maxAgeHours * 3_600_000;
    const allowed = this.config.whitelistEnabled ? this.config.whitelistDomains : [];
    const { seenUrls } = this.options;

    for (const item of items) {
      const url = String(item.link || "").trim();
      if (!url) continue;

      if (!isDomainAllowed(url, allowed)) {
        counts.whitelist += 1;
        continue;
      }
      if (seenUrls && (await seenUrls.isProcessed(url))) {
        counts.processed += 1;
        continue;
      }
      const publishedAt = parsePublishedAt(item);
      if (publishedAt && publishedAt.getTime() < cutoff) {
        counts.old += 1;
        continue;
      }

      into.push({
        url,
        source: sourceName,
        title: cleanHtmlText(String(item.title || "")),
        publishedAt: publishedAt ? publishedAt.toISOString() : null,
        description: cleanHtmlText(String(item.description || item.contentSnippet || "")),
      });
      counts.added += 1;
      if (seenUrls) {
        await seenUrls.markSeen(url, false);
      }
    }
    return counts;
  }
}
