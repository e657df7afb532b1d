import { afterEach, describe, expect, it } from "vitest";
import type { ExtractedArticle, QualityVerdict, RewrittenArticle } from "@/lib/domain/models";
import { PublishError } from "@/lib/domain/errors";
import { WordPressClient } from "@/lib/integrations/wordpress-client";

const originalFetch = globalThis.fetch;

afterEach(() => {
  globalThis.fetch = originalFetch;
});

interface Call {
  method: string;
  url: string;
  headers: Headers;
  body: RequestInit["body"];
}

type Route = (call: Call) => Response;

function stubWordPress(route: Route): Call[] {
  const calls: Call[] = [];
  globalThis.fetch = async (input: RequestInfo | URL, init?: RequestInit) => {
    const call: Call = {
      method: init?.method ?? "GET",
      url: String(input),
      headers: new Headers(init?.headers),
      body: init?.body,
    };
    calls.push(call);
    return route(call);
  };
  return calls;
}

function json(payload: unknown, status = 200): Response {
  return new Response(JSON.stringify(payload), { status, headers: { "content-type": "application/json" } });
}

function jsonBody(call: Call | undefined): unknown {
  return JSON.parse(String(call?.body));
}

const ORIGINAL: ExtractedArticle = {
  url: "https://news.example.com/story",
  canonicalUrl: "https://news.example.com/story",
  title: "Harbour reopens",
  text: "Source text",
  images: [],
  publishedAt: "2026-03-01T07:30:00.000Z",
  author: null,
  sourceName: "Example News",
};

const REWRITE: RewrittenArticle = {
  headline: "Boats return to the harbour",
  lead: "Repairs are finished.",
  bodyMarkdown: "## Repairs\n\nThe **breakwater** is fixed.",
  tags: ["port"],
  category: "Politics",
  metaTitle: "Boats return",
  metaDescription: "Repairs are finished.",
  wordCount: 5,
  rewrittenAt: "2026-03-01T09:00:00.000Z",
  stubMode: false,
};

const VERDICT: QualityVerdict = {
  passed: true,
  riskLevel: "low",
  issues: [],
  similarityScore: 0.4,
  isTooSimilar: false,
  needsReview: false,
};

function client(overrides: Partial<ConstructorParameters<typeof WordPressClient>[0]> = {}): WordPressClient {
  return new WordPressClient({
    baseUrl: "https://blog.example.com/",
    username: "editor",
    appPassword: "test-secret",
    backoffMs: 0,
    ...overrides,
  });
}

describe("WordPressClient", () => {
  it("requires a site url", () => {
    expect(() => new WordPressClient({ baseUrl: " " })).toThrowError(PublishError);
  });

  it("creates a draft post with mapped category and source meta", async () => {
    const calls = stubWordPress(() => json({ id: 55 }, 201));

    const id = await client().createPostFromPipeline(REWRITE, ORIGINAL, VERDICT, { politics: 3 });

    expect(id).toBe("55");
    expect(calls).toHaveLength(1);
    expect(calls[0].method).toBe("POST");
    expect(calls[0].url).toBe("https://blog.example.com/wp-json/wp/v2/posts");
    expect(calls[0].headers.get("authorization")).toBe(
      `Basic ${Buffer.from("editor:test-secret").toString("base64")}`,
    );
    expect(jsonBody(calls[0])).toEqual({
      title: "Boats return to the harbour",
      content: "<h2>Repairs</h2>\n<p>The <strong>breakwater</strong> is fixed.</p>",
      excerpt: "Repairs are finished.",
      status: "draft",
      categories: [3],
      meta: {
        source_name: "Example News",
        source_url: "https://news.example.com/story",
        source_published_at: "2026-03-01T07:30:00.000Z",
        ingest_timestamp: "2026-03-01T09:00:00.000Z",
        source_hash: "https://news.example.com/story",
        risk_level: "low",
        needs_review: "0",
        original_title: "Harbour reopens",
      },
    });
  });

  it("looks up or creates an unmapped category", async () => {
    const calls = stubWordPress((call) => {
      if (call.method === "GET") return json([]);
      if (call.url.endsWith("/categories")) return json({ id: 9 }, 201);
      return json({ id: 56 }, 201);
    });

    const id = await client({ jwtToken: "test-secret" }).createPostFromPipeline(
      { ...REWRITE, category: "Sport News" },
      ORIGINAL,
      VERDICT,
      {},
    );

    expect(id).toBe("56");
    expect(calls.map((call) => `${call.method} ${call.url}`)).toEqual([
      "GET https://blog.example.com/wp-json/wp/v2/categories?slug=sport-news",
      "POST https://blog.example.com/wp-json/wp/v2/categories",
      "POST https://blog.example.com/wp-json/wp/v2/posts",
    ]);
    expect(calls[0].headers.get("authorization")).toBe("Bearer test-secret");
    expect(jsonBody(calls[1])).toEqual({ name: "sport news", slug: "sport-news" });
    expect(jsonBody(calls[2])).toMatchObject({ categories: [9] });
  });

  it("falls back to the default category", async () => {
    const calls = stubWordPress(() => json({ id: 57 }, 201));
    await client().createPostFromPipeline(REWRITE, ORIGINAL, VERDICT, { default: 1 });
    expect(jsonBody(calls[0])).toMatchObject({ categories: [1] });
  });

  it("uploads the first image as featured media", async () => {
    const calls = stubWordPress((call) => {
      if (call.url === "https://cdn.example.com/photo.png") {
        return new Response(new Uint8Array([137, 80, 78, 71]), { status: 200, headers: { "content-type": "image/png" } });
      }
      if (call.url.includes("/media")) return json({ id: 77 }, 201);
      return json({ id: 58 }, 201);
    });

    const id = await client().createPostFromPipeline(
      REWRITE,
      { ...ORIGINAL, images: ["https://cdn.example.com/photo.png", "https://cdn.example.com/other.png"] },
      { ...VERDICT, riskLevel: "medium", needsReview: true },
      { politics: 3 },
    );

    expect(id).toBe("58");
    const upload = calls[1];
    expect(upload.url).toBe(
      "https://blog.example.com/wp-json/wp/v2/media?title=Boats%20return%20to%20the%20harbour",
    );
    expect(upload.headers.get("content-type")).toBe("image/png");
    expect(upload.headers.get("content-disposition")).toBe('attachment; filename="photo.png"');
    expect(jsonBody(calls[2])).toMatchObject({
      featured_media: 77,
      meta: { risk_level: "medium", needs_review: "1" },
    });
  });

  it("retries temporary errors", async () => {
    let attempts = 0;
    const calls = stubWordPress(() => {
      attempts += 1;
      return attempts === 1 ? json({ code: "busy" }, 503) : json({ id: 60 }, 201);
    });

    expect(await client().createPostFromPipeline(REWRITE, ORIGINAL, VERDICT, { politics: 3 })).toBe("60");
    expect(calls).toHaveLength(2);
  });

  it("does not retry client errors and reports no id", async () => {
    const calls = stubWordPress(() => json({ code: "rest_forbidden" }, 403));
    expect(await client().createPostFromPipeline(REWRITE, ORIGINAL, VERDICT, { politics: 3 })).toBeNull();
    expect(calls).toHaveLength(1);
  });

  it("gives up after the retry budget", async () => {
    const calls = stubWordPress(() => json({}, 502));
    expect(await client({ maxRetries: 2 }).createPostFromPipeline(REWRITE, ORIGINAL, VERDICT, { politics: 3 })).toBeNull();
    expect(calls).toHaveLength(2);
  });
});
