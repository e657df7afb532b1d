import { describe, expect, it, vi } from "vitest";
import type {
  Candidate,
  ExtractedArticle,
  QualityVerdict,
  RewrittenArticle,
} from "@/lib/domain/models";
import type { ArticleExtractor, ArticleRewriter, Publisher, RewriteArchive } from "@/lib/domain/ports";
import { ExtractionError } from "@/lib/domain/errors";
import { PipelineArticleProcessor } from "@/lib/pipeline/article-processor";
import type { ArticleProcessorDeps } from "@/lib/pipeline/article-processor";
import { Deduplicator } from "@/lib/process/dedupe";
import { QualityGate } from "@/lib/process/quality-gate";
import { MemoryFingerprintStore } from "@/lib/store/fingerprint-store";
import { MemorySeenUrlStore } from "@/lib/store/seen-url-store";

const BODY =
  "The city council approved a new budget for public transport on Monday. " +
  "Officials said bus routes will expand across northern districts while ticket prices remain unchanged for students and seniors.";

const CANDIDATE: Candidate = {
  url: "https://example.com/budget?utm_source=rss",
  source: "Example News",
  title: "Budget approved",
  publishedAt: "2026-03-01T08:00:00.000Z",
  description: "",
};

function extracted(overrides: Partial<ExtractedArticle> = {}): ExtractedArticle {
  return {
    url: CANDIDATE.url,
    canonicalUrl: "https://example.com/budget",
    title: "Council approves the transport budget",
    text: BODY,
    images: [],
    publishedAt: null,
    author: null,
    sourceName: "Example News",
    ...overrides,
  };
}

function rewritten(overrides: Partial<RewrittenArticle> = {}): RewrittenArticle {
  return {
    headline: "Transport budget clears the council",
    lead: "Bus routes grow while fares stay put.",
    bodyMarkdown: BODY,
    tags: [],
    category: "politics",
    metaTitle: "Transport budget clears the council",
    metaDescription: "Bus routes grow while fares stay put.",
    wordCount: 300,
    rewrittenAt: "2026-03-01T09:00:00.000Z",
    stubMode: false,
    ...overrides,
  };
}

class FakeExtractor implements ArticleExtractor {
  constructor(private readonly result: ExtractedArticle | Error) {}

  async extract(): Promise<ExtractedArticle> {
    if (this.result instanceof Error) throw this.result;
    return this.result;
  }
}

class FakeRewriter implements ArticleRewriter {
  calls = 0;

  constructor(private readonly result: RewrittenArticle | Error) {}

  async rewrite(): Promise<RewrittenArticle> {
    this.calls += 1;
    if (this.result instanceof Error) throw this.result;
    return this.result;
  }
}

class FakePublisher implements Publisher {
  posts: Array<{ headline: string; mapping: Record<string, number> }> = [];

  constructor(private readonly result: string | null | Error = "101") {}

  async createPostFromPipeline(
    rewrite: RewrittenArticle,
    _original: ExtractedArticle,
    _verdict: QualityVerdict,
    mapping: Record<string, number>,
  ): Promise<string | null> {
    this.posts.push({ headline: rewrite.headline, mapping });
    if (this.result instanceof Error) throw this.result;
    return this.result;
  }
}

class FakeArchive implements RewriteArchive {
  saved: QualityVerdict[] = [];

  constructor(private readonly fail = false) {}

  async save(_original: ExtractedArticle, _rewrite: RewrittenArticle, verdict: QualityVerdict): Promise<void> {
    if (this.fail) throw new Error("disk full");
    this.saved.push(verdict);
  }
}

function setup(overrides: Partial<ArticleProcessorDeps> = {}) {
  const fingerprints = new MemoryFingerprintStore();
  const seenUrls = new MemorySeenUrlStore();
  const deps: ArticleProcessorDeps = {
    extractor: new FakeExtractor(extracted()),
    deduplicator: new Deduplicator(fingerprints),
    rewriter: new FakeRewriter(rewritten()),
    qualityGate: new QualityGate(),
    publisher: new FakePublisher(),
    categoryMapping: { politics: 3 },
    seenUrls,
    archive: new FakeArchive(),
    ...overrides,
  };
  return { processor: new PipelineArticleProcessor(deps), fingerprints, seenUrls, deps };
}

describe("PipelineArticleProcessor", () => {
  it("publishes and registers a new article", async () => {
    const publisher = new FakePublisher("101");
    const { processor, fingerprints, seenUrls } = setup({ publisher });

    const outcome = await processor.process(CANDIDATE);

    expect(outcome.status).toBe("created");
    expect(outcome.reason).toBeNull();
    expect(outcome.publishedId).toBe("101");
    expect(Object.keys(outcome.timing).sort()).toEqual(
      ["content_check", "dedupe", "extract", "publish", "quality", "register", "rewrite", "total"],
    );
    expect(publisher.posts).toEqual([{ headline: "Transport budget clears the council", mapping: { politics: 3 } }]);
    expect(fingerprints.size).toBe(1);
    expect(await seenUrls.isProcessed(CANDIDATE.url)).toBe(true);
  });

  it("skips an article already published", async () => {
    const { processor } = setup();
    await processor.process(CANDIDATE);

    const again = await processor.process(CANDIDATE);
    expect(again.status).toBe("skipped");
    expect(again.reason).toBe("duplicate:exact_match");
  });

  it("fails when extraction fails and still marks the url", async () => {
    const rewriter = new FakeRewriter(rewritten());
    const publisher = new FakePublisher();
    const { processor, seenUrls, deps } = setup({
      extractor: new FakeExtractor(new ExtractionError("HTTP 404", CANDIDATE.url, 404)),
      rewriter,
      publisher,
    });
    const checkDuplicate = vi.spyOn(deps.deduplicator, "checkDuplicate");
    const register = vi.spyOn(deps.deduplicator, "register");

    const outcome = await processor.process(CANDIDATE);

    expect(outcome).toMatchObject({ status: "failed", reason: "extract_failed: HTTP 404", publishedId: null });
    expect(Object.keys(outcome.timing).sort()).toEqual(["extract", "total"]);
    expect(checkDuplicate).not.toHaveBeenCalled();
    expect(register).not.toHaveBeenCalled();
    expect(rewriter.calls).toBe(0);
    expect(publisher.posts).toEqual([]);
    expect(await seenUrls.isProcessed(CANDIDATE.url)).toBe(true);
  });

  it("checks the title before the text and stops there", async () => {
    const rewriter = new FakeRewriter(rewritten());
    const publisher = new FakePublisher();
    const { processor, deps } = setup({
      extractor: new FakeExtractor(extracted({ title: " Short ", text: "tiny" })),
      rewriter,
      publisher,
    });
    const checkDuplicate = vi.spyOn(deps.deduplicator, "checkDuplicate");

    const outcome = await processor.process(CANDIDATE);

    expect(outcome).toMatchObject({ status: "skipped", reason: "title_too_short: 5 chars" });
    expect(checkDuplicate).not.toHaveBeenCalled();
    expect(rewriter.calls).toBe(0);
    expect(publisher.posts).toEqual([]);
  });

  it("skips thin content", async () => {
    const { processor } = setup({ extractor: new FakeExtractor(extracted({ text: "tiny" })) });
    const outcome = await processor.process(CANDIDATE);
    expect(outcome).toMatchObject({ status: "skipped", reason: "content_too_short: 4 chars" });
  });

  it("archives the rewrite and skips when the quality gate fails", async () => {
    const archive = new FakeArchive();
    const publisher = new FakePublisher();
    const { processor, fingerprints } = setup({
      archive,
      publisher,
      rewriter: new FakeRewriter(rewritten({ headline: "Scandalo over the transport budget" })),
    });

    const outcome = await processor.process(CANDIDATE);

    expect(outcome).toMatchObject({
      status: "skipped",
      reason: "quality_gate_failed:Medium-risk content: keyword 'scandalo' found",
    });
    expect(archive.saved).toHaveLength(1);
    expect(archive.saved[0].riskLevel).toBe("medium");
    expect(publisher.posts).toEqual([]);
    expect(fingerprints.size).toBe(0);
  });

  it("falls back to the source text when the rewriter throws", async () => {
    const { processor } = setup({ rewriter: new FakeRewriter(new Error("model offline")) });
    const outcome = await processor.process(CANDIDATE);
    expect(outcome.status).toBe("skipped");
    expect(outcome.reason).toMatch(/^quality_gate_failed:Article too short: \d+ words \(min: 200\)/);
  });

  it("skips without a publisher and does not register", async () => {
    const { processor, fingerprints } = setup({ publisher: null });
    const outcome = await processor.process(CANDIDATE);
    expect(outcome).toMatchObject({ status: "skipped", reason: "wp_client_not_configured" });
    expect(fingerprints.size).toBe(0);
  });

  it("fails when the publisher returns no id", async () => {
    const { processor, fingerprints } = setup({ publisher: new FakePublisher(null) });
    const outcome = await processor.process(CANDIDATE);
    expect(outcome).toMatchObject({ status: "failed", reason: "publish_creation_failed" });
    expect(fingerprints.size).toBe(0);
  });

  it("turns an unexpected error into a failed outcome", async () => {
    const { processor, seenUrls } = setup({ publisher: new FakePublisher(new Error("socket hang up")) });
    const outcome = await processor.process(CANDIDATE);
    expect(outcome).toMatchObject({ status: "failed", reason: "socket hang up", publishedId: null });
    expect(await seenUrls.isProcessed(CANDIDATE.url)).toBe(true);
  });

  it("keeps going when the archive cannot be written", async () => {
    const { processor } = setup({ archive: new FakeArchive(true) });
    expect((await processor.process(CANDIDATE)).status).toBe("created");
  });
});
