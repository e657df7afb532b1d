import { describe, expect, it } from "vitest";
import {
  canonicalizeUrl,
  collapseWhitespace,
  fingerprintId,
  normalizeTitle,
  sha256Hex,
  titleFingerprint,
} from "@/lib/process/normalize";

describe("normalize", () => {
  it("canonicalizeUrl strips tracking params, fragment and trailing slash", () => {
    expect(canonicalizeUrl("https://Example.COM/news/story/?utm_source=rss&id=7&fbclid=abc#comments")).toBe(
      "https://example.com/news/story?id=7",
    );
  });

  it("canonicalizeUrl drops ref and source params", () => {
    expect(canonicalizeUrl("https://example.com/a?ref=home&source=feed&page=2")).toBe("https://example.com/a?page=2");
  });

  it("canonicalizeUrl keeps the root path", () => {
    expect(canonicalizeUrl("https://example.com/")).toBe("https://example.com/");
  });

  it("canonicalizeUrl returns unparseable input trimmed", () => {
    expect(canonicalizeUrl("  not a url  ")).toBe("not a url");
  });

  it("normalizeTitle lower-cases and removes punctuation", () => {
    expect(normalizeTitle("  Breaking: Rates Rise, Again!  ")).toBe("breaking rates rise again");
    expect(normalizeTitle("Long-term plan_v2")).toBe("long term plan v2");
  });

  it("fingerprints are sha256 hex digests", () => {
    expect(sha256Hex("abc")).toBe("ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad");
    expect(titleFingerprint("abc")).toBe(sha256Hex("abc"));
    expect(fingerprintId("https://example.com/a", "title")).toBe(sha256Hex("https://example.com/a|title"));
  });

  it("collapseWhitespace joins runs of whitespace", () => {
    expect(collapseWhitespace("  a \n\t b  ")).toBe("a b");
  });
});
