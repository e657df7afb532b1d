import type { ExtractedArticle, QualityVerdict, RewrittenArticle } from "@/lib/domain/models";
import type { Publisher } from "@/lib/domain/ports";
import { PublishError } from "@/lib/domain/errors";
import { isRecord } from "@/lib/infra/json";
import type { Logger } from "@/lib/infra/logger";
import { createSilentLogger } from "@/lib/infra/logger";
import { markdownToHtml } from "@/lib/output/markdown-html";

const RETRYABLE_STATUSES = [408, 429, 500, 502, 503, 504];

export interface WordPressClientOptions {
  baseUrl: string;
  username?: string;
  appPassword?: string;
  jwtToken?: string;
  postStatus?: string;
  timeoutSeconds?: number;
  maxRetries?: number;
  backoffMs?: number;
  logger?: Logger;
}

function slugify(value: string): string {
  return String(value || "")
    .trim()
    .toLowerCase()
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

function readId(payload: unknown): number | null {
  if (!isRecord(payload)) return null;
  const id = Number(payload.id);
  return Number.isInteger(id) && id > 0 ? id : null;
}

function imageFilename(imageUrl: string, contentType: string): string {
  let name = "";
  try {
    name = new URL(imageUrl).pathname.split("/").pop() || "";
  } catch {
    name = "";
  }
  if (name && name.includes(".")) return name;
  const extension = contentType.includes("png") ? "png" : contentType.includes("webp") ? "webp" : "jpg";
  return `image_${Date.now()}.${extension}`;
}

/** WordPress REST API v2 client. */
export class WordPressClient implements Publisher {
  readonly apiBase: string;

  private readonly authHeader: string | null;

  private readonly postStatus: string;

  private readonly timeoutMs: number;

  private readonly maxRetries: number;

  private readonly backoffMs: number;

  private readonly logger: Logger;

  constructor(options: WordPressClientOptions) {
    const baseUrl = String(options.baseUrl || "").trim().replace(/\/+$/, "");
    if (!baseUrl) {
      throw new PublishError("Missing WORDPRESS_URL");
    }
    this.apiBase = `${baseUrl}/wp-json/wp/v2`;
    this.postStatus = options.postStatus || "draft";
    this.timeoutMs = Math.max(1_000, Math.trunc((options.timeoutSeconds ?? 60) * 1_000));
    this.maxRetries = Math.max(1, Math.trunc(options.maxRetries ?? 3));
    this.backoffMs = Math.max(0, options.backoffMs ?? 1_000);
    this.logger = options.logger ?? createSilentLogger();

    if (options.jwtToken) {
      this.authHeader = `Bearer ${options.jwtToken}`;
    } else if (options.username && options.appPassword) {
      const encoded = Buffer.from(`${options.username}:${options.appPassword}`, "utf-8").toString("base64");
      this.authHeader = `Basic ${encoded}`;
    } else {
      this.authHeader = null;
      this.logger.warn("no WordPress authentication configured, requests may be refused");
    }
  }

  private async request(
    method: "GET" | "POST",
    endpoint: string,
    body?: { json: unknown } | { raw: ArrayBuffer; headers: Record<string, string> },
    maxRetries = this.maxRetries,
  ): Promise<unknown> {
    const url = `${this.apiBase}/${endpoint.replace(/^\/+/, "")}`;
    const headers: Record<string, string> = { Accept: "application/json" };
    if (this.authHeader) headers.Authorization = this.authHeader;

    let payload: string | ArrayBuffer | undefined;
    if (body && "json" in body) {
      headers["Content-Type"] = "application/json";
      payload = JSON.stringify(body.json);
    } else if (body) {
      Object.assign(headers, body.headers);
      payload = body.raw;
    }

    let backoffMs = this.backoffMs;
    let lastError: unknown;

    for (let attempt = 1; attempt <= maxRetries; attempt += 1) {
      const controller = new AbortController();
      const timer = setTimeout(() => controller.abort(), this.timeoutMs);
      try {
        const response = await fetch(url, { method, headers, body: payload, signal: controller.signal });
        const text = await response.text();

        if (RETRYABLE_STATUSES.includes(response.status)) {
          throw new PublishError(`temporary error (${response.status}): ${text.slice(0, 200)}`, response.status);
        }
        if (!response.ok) {
          // Client errors are not retried.
          throw new PublishError(`WordPress request failed (${response.status}): ${text.slice(0, 200)}`, response.status);
        }
        return text.trim() ? JSON.parse(text) : {};
      } catch (error) {
        lastError = error;
        const status = error instanceof PublishError ? error.status : undefined;
        if (status !== undefined && !RETRYABLE_STATUSES.includes(status)) {
          throw error;
        }
        if (attempt < maxRetries) {
          this.logger.warn(`${method} ${endpoint} failed (attempt ${attempt}/${maxRetries}), retrying`, error);
          await new Promise((resolve) => setTimeout(resolve, backoffMs));
          backoffMs *= 2;
        }
      } finally {
        clearTimeout(timer);
      }
    }

    throw new PublishError(
      `WordPress request failed after retries: ${lastError instanceof Error ? lastError.message : String(lastError)}`,
    );
  }

  async getOrCreateCategory(name: string): Promise<number | null> {
    const slug = slugify(name) || "news";
    try {
      const found = await this.request("GET", `categories?slug=${encodeURIComponent(slug)}`, undefined, 1);
      if (Array.isArray(found)) {
        const match = found.map(readId).find((id): id is number => id !== null);
        if (match) return match;
      }
    } catch (error) {
      this.logger.warn(`category lookup failed for ${slug}`, error);
    }

    try {
      const created = await this.request("POST", "categories", { json: { name, slug } });
      const id = readId(created);
      if (id) this.logger.info(`category created: ${name} (ID: ${id})`);
      return id;
    } catch (error) {
      this.logger.error(`category creation failed for ${name}`, error);
      return null;
    }
  }

  async uploadMedia(imageUrl: string, title?: string): Promise<number | null> {
    try {
      const image = await fetch(imageUrl, { signal: AbortSignal.timeout(this.timeoutMs) });
      if (!image.ok) {
        throw new PublishError(`image download failed (${image.status})`, image.status);
      }
      const contentType = image.headers.get("content-type") || "image/jpeg";
      const filename = imageFilename(imageUrl, contentType);
      const query = title ? `?title=${encodeURIComponent(title)}` : "";
      const media = await this.request("POST", `media${query}`, {
        raw: await image.arrayBuffer(),
        headers: {
          "Content-Type": contentType,
          "Content-Disposition": `attachment; filename="${filename}"`,
        },
      });
      const id = readId(media);
      this.logger.info(`media uploaded: ${imageUrl} -> ID ${id}`);
      return id;
    } catch (error) {
      this.logger.error(`media upload failed for ${imageUrl}`, error);
      return null;
    }
  }

  async createPostFromPipeline(
    rewritten: RewrittenArticle,
    original: ExtractedArticle,
    verdict: QualityVerdict,
    categoryMapping: Record<string, number>,
  ): Promise<string | null> {
    const category = String(rewritten.category || "news").trim().toLowerCase();
    const categoryId = categoryMapping[category] ?? categoryMapping.default ?? (await this.getOrCreateCategory(category));

    const featuredMedia = original.images.length ? await this.uploadMedia(original.images[0], rewritten.headline) : null;

    const post: Record<string, unknown> = {
      title: rewritten.headline,
      content: markdownToHtml(rewritten.bodyMarkdown),
      excerpt: rewritten.lead,
      status: this.postStatus,
      categories: categoryId ? [categoryId] : [],
      meta: {
        source_name: original.sourceName || "",
        source_url: original.url,
        source_published_at: original.publishedAt || "",
        ingest_timestamp: rewritten.rewrittenAt,
        source_hash: original.canonicalUrl,
        risk_level: verdict.riskLevel,
        needs_review: verdict.needsReview ? "1" : "0",
        original_title: original.title,
      },
    };
    if (featuredMedia) {
      post.featured_media = featuredMedia;
    }

    try {
      const created = await this.request("POST", "posts", { json: post });
      const id = readId(created);
      if (!id) {
        this.logger.error(`post response carried no id for ${original.url}`);
        return null;
      }
      this.logger.info(`post created: ${rewritten.headline} -> ID ${id}`);
      return String(id);
    } catch (error) {
      this.logger.error(`post creation failed for ${original.url}`, error);
      return null;
    }
  }
}
