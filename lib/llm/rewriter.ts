import type { ExtractedArticle, RewrittenArticle } from "@/lib/domain/models";
import type { ArticleRewriter } from "@/lib/domain/ports";
import { readString, readStringList } from "@/lib/infra/json";
import type { Logger } from "@/lib/infra/logger";
import { createSilentLogger } from "@/lib/infra/logger";
import type { ChatMessage, LlmClient } from "@/lib/llm/llm-client";

const SOURCE_TEXT_MAX_CHARS = 5000;
const STUB_BODY_MAX_CHARS = 2000;

export function countWords(markdown: string): number {
  return String(markdown || "")
    .replace(/[#*]/g, "")
    .split(/\s+/)
    .filter(Boolean).length;
}

/** Deterministic rewrite built from the source text alone. */
export function buildFallbackRewrite(extracted: ExtractedArticle): RewrittenArticle {
  const title = String(extracted.title || "");
  const text = String(extracted.text || "");
  const sentences = text.split(". ").slice(0, 3);
  const lead = text ? `${sentences.join(". ")}.` : "";
  const body = text.slice(0, STUB_BODY_MAX_CHARS);

  return {
    headline: title.slice(0, 100),
    lead: lead.slice(0, 300),
    bodyMarkdown: body,
    tags: [],
    category: "news",
    metaTitle: title.slice(0, 60),
    metaDescription: lead.slice(0, 160),
    wordCount: body.split(/\s+/).filter(Boolean).length,
    rewrittenAt: new Date().toISOString(),
    stubMode: true,
  };
}

export function completeRewrite(result: Record<string, unknown>, extracted: ExtractedArticle): RewrittenArticle {
  const headline = readString(result, "headline", extracted.title);
  const lead = readString(result, "lead");
  const bodyMarkdown = readString(result, "body_markdown");
  return {
    headline,
    lead,
    bodyMarkdown,
    tags: readStringList(result, "tags"),
    category: readString(result, "category", "news") || "news",
    metaTitle: readString(result, "meta_title", headline),
    metaDescription: readString(result, "meta_description", lead),
    wordCount: countWords(bodyMarkdown),
    rewrittenAt: new Date().toISOString(),
    stubMode: false,
  };
}

function buildMessages(extracted: ExtractedArticle): ChatMessage[] {
  const systemPrompt =
    "You are a professional journalist who rewrites news articles so they read as written from scratch. " +
    "Answer only with valid JSON, no extra text.";

  const userPrompt = `Rewrite the article below. Keep only verifiable facts from the source and change the structure,
wording and angle completely. Never invent data, numbers, quotes or details; omit anything the source does not state.
Write in the language of the source.

Structure:
- lead: 2-3 sentences with a different approach from the original
- body_markdown: thematic paragraphs with ## subheadings, 400-800 words (shorter when the source is short)

SOURCE (facts only, not a writing model):
Title: ${extracted.title}
Author: ${extracted.author || "not specified"}
Date: ${extracted.publishedAt || "not specified"}

Text:
${String(extracted.text || "").slice(0, SOURCE_TEXT_MAX_CHARS)}

Return JSON:
{
  "headline": "new headline, max 100 chars",
  "lead": "...",
  "body_markdown": "...",
  "tags": ["tag1", "tag2", "tag3"],
  "category": "one of technology, politics, economy, sport, culture, health, news",
  "meta_title": "SEO title, max 60 chars",
  "meta_description": "SEO description, max 160 chars"
}`;

  return [
    { role: "system", content: systemPrompt },
    { role: "user", content: userPrompt },
  ];
}

export class LlmArticleRewriter implements ArticleRewriter {
  constructor(
    private readonly client: Pick<LlmClient, "chatJson"> | null,
    private readonly logger: Logger = createSilentLogger(),
    private readonly temperature = 0.9,
  ) {}

  async rewrite(extracted: ExtractedArticle): Promise<RewrittenArticle> {
    if (!this.client) {
      this.logger.warn("LLM not configured, using stub rewrite");
      return buildFallbackRewrite(extracted);
    }

    try {
      const result = await this.client.chatJson(buildMessages(extracted), this.temperature);
      return completeRewrite(result, extracted);
    } catch (error) {
      this.logger.error(`rewrite failed for ${extracted.url}, using stub rewrite`, error);
      return buildFallbackRewrite(extracted);
    }
  }
}
