import { Readability } from "@mozilla/readability";
import { parseHTML } from "linkedom";
import type { ExtractedArticle } from "@/lib/domain/models";
import type { ArticleExtractor } from "@/lib/domain/ports";
import { ExtractionError } from "@/lib/domain/errors";
import type { Logger } from "@/lib/infra/logger";
import { createSilentLogger, errorMessage } from "@/lib/infra/logger";
import { canonicalizeUrl, collapseWhitespace } from "@/lib/process/normalize";

const USER_AGENT = "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0 Safari/537.36";
const MAX_IMAGES = 5;
const MIN_IMAGE_SIDE = 200;
const DECORATIVE_ALT_RE = /icon|logo|avatar|button/i;

interface PageMeta {
  title: string;
  canonical: string;
  images: string[];
  publishedAt: string | null;
  author: string | null;
}

function absoluteUrl(value: string, baseUrl: string): string | null {
  try {
    return new URL(value, baseUrl).toString();
  } catch {
    return null;
  }
}

function metaContent(document: Document, selector: string): string {
  return collapseWhitespace(document.querySelector(selector)?.getAttribute("content") || "");
}

function parseDate(value: string): string | null {
  if (!value) return null;
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? null : parsed.toISOString();
}

function readMeta(document: Document, baseUrl: string): PageMeta {
  const ogTitle = metaContent(document, 'meta[property="og:title"]');
  const docTitle = collapseWhitespace(document.querySelector("title")?.textContent || "");
  const h1 = collapseWhitespace(document.querySelector("h1")?.textContent || "");
  const title = ogTitle || (docTitle.length >= 10 ? docTitle : h1 || docTitle);

  const images: string[] = [];
  const pushImage = (raw: string | null | undefined) => {
    const absolute = raw ? absoluteUrl(raw, baseUrl) : null;
    if (absolute && !images.includes(absolute)) images.push(absolute);
  };
  pushImage(metaContent(document, 'meta[property="og:image"]'));
  for (const img of Array.from(document.querySelectorAll("img"))) {
    const width = Number(img.getAttribute("width"));
    const height = Number(img.getAttribute("height"));
    if (width && height && (width < MIN_IMAGE_SIDE || height < MIN_IMAGE_SIDE)) continue;
    if (DECORATIVE_ALT_RE.test(img.getAttribute("alt") || "")) continue;
    pushImage(img.getAttribute("src") || img.getAttribute("data-src"));
  }

  const timeElement = document.querySelector("time[datetime]");
  const publishedAt =
    parseDate(metaContent(document, 'meta[property="article:published_time"]')) ||
    parseDate(metaContent(document, 'meta[property="og:published_time"]')) ||
    parseDate(metaContent(document, 'meta[name="date"]')) ||
    parseDate(timeElement?.getAttribute("datetime") || "");

  const author =
    metaContent(document, 'meta[name="author"]') || metaContent(document, 'meta[property="article:author"]') || null;

  return {
    title,
    canonical: document.querySelector('link[rel="canonical"]')?.getAttribute("href") || "",
    images: images.slice(0, MAX_IMAGES),
    publishedAt,
    author,
  };
}

function cleanLines(text: string): string {
  return text
    .split("\n")
    .map((line) => line.replace(/\s+/g, " ").trim())
    .filter((line) => line.length > 0)
    .join("\n")
    .trim();
}

/** Regex text extraction for pages Readability cannot parse. */
export function fallbackExtractText(html: string): string {
  let cleaned = html
    .replace(/<script[\s\S]*?<\/script>/gi, "")
    .replace(/<style[\s\S]*?<\/style>/gi, "")
    .replace(/<nav[\s\S]*?<\/nav>/gi, "")
    .replace(/<footer[\s\S]*?<\/footer>/gi, "")
    .replace(/<aside[\s\S]*?<\/aside>/gi, "");

  const articleMatch = cleaned.match(/<(?:article|main)[^>]*>([\s\S]*?)<\/(?:article|main)>/i);
  if (articleMatch) cleaned = articleMatch[1];

  cleaned = cleaned
    .replace(/<br\s*\/?>/gi, "\n")
    .replace(/<\/(?:p|div|h[1-6]|li|tr|blockquote|section)>/gi, "\n")
    .replace(/<[^>]+>/g, " ")
    .replace(/&nbsp;/gi, " ")
    .replace(/&amp;/gi, "&")
    .replace(/&lt;/gi, "<")
    .replace(/&gt;/gi, ">")
    .replace(/&quot;/gi, '"')
    .replace(/&#39;/gi, "'");

  return cleanLines(cleaned);
}

export class ReadabilityExtractor implements ArticleExtractor {
  private readonly timeoutMs: number;

  constructor(
    timeoutSeconds = 30,
    private readonly logger: Logger = createSilentLogger(),
  ) {
    this.timeoutMs = Math.max(1_000, Math.trunc(timeoutSeconds * 1_000));
  }

  private async download(url: string): Promise<{ html: string; finalUrl: string }> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const response = await fetch(url, {
        method: "GET",
        redirect: "follow",
        headers: {
          "User-Agent": USER_AGENT,
          Accept: "text/html,application/xhtml+xml;q=0.9,*/*;q=0.8",
        },
        signal: controller.signal,
      });
      if (!response.ok) {
        throw new ExtractionError(`HTTP ${response.status}`, url, response.status);
      }
      return { html: await response.text(), finalUrl: response.url || url };
    } catch (error) {
      if (error instanceof ExtractionError) throw error;
      throw new ExtractionError(errorMessage(error), url);
    } finally {
      clearTimeout(timer);
    }
  }

  async extract(url: string, sourceName?: string): Promise<ExtractedArticle> {
    const started = performance.now();
    this.logger.info(`downloading ${url}`);
    const { html, finalUrl } = await this.download(url);

    const { document } = parseHTML(html);
    const meta = readMeta(document, finalUrl);

    let text = "";
    let readableTitle = "";
    try {
      const article = new Readability(document, { charThreshold: 100 }).parse();
      if (article) {
        text = cleanLines(String(article.textContent || ""));
        readableTitle = collapseWhitespace(String(article.title || ""));
      }
    } catch (error) {
      this.logger.warn(`readability failed for ${url}`, error);
    }
    if (text.length <= 100) {
      text = fallbackExtractText(html);
    }

    const canonicalSource = meta.canonical ? absoluteUrl(meta.canonical, finalUrl) : null;
    const extracted: ExtractedArticle = {
      url,
      canonicalUrl: canonicalizeUrl(canonicalSource || url),
      title: meta.title || readableTitle,
      text,
      images: meta.images,
      publishedAt: meta.publishedAt,
      author: meta.author,
      sourceName: sourceName ?? null,
    };

    const elapsed = (performance.now() - started) / 1000;
    this.logger.info(`extracted ${url} (${text.length} chars, ${elapsed.toFixed(2)}s)`);
    return extracted;
  }
}
