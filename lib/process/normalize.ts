import crypto from "node:crypto";

const TRACKING_PARAM_PREFIXES = ["utm_", "fbclid", "gclid", "mc_cid", "mc_eid"];
const TRACKING_PARAMS = new Set(["ref", "source"]);
const TITLE_PUNCTUATION_RE = /[.,;:!?\-_]/g;
const MULTISPACE_RE = /\s+/g;

export function sha256Hex(text: string): string {
  return crypto.createHash("sha256").update(text, "utf-8").digest("hex");
}

function isTrackingParam(key: string): boolean {
  const lowered = key.toLowerCase();
  return TRACKING_PARAMS.has(lowered) || TRACKING_PARAM_PREFIXES.some((prefix) => lowered.startsWith(prefix));
}

/** Strips tracking params, fragment and trailing slash; lower-cases scheme and host. */
export function canonicalizeUrl(url: string): string {
  try {
    const parsed = new URL(String(url || "").trim());
    const kept: Array<[string, string]> = [];
    parsed.searchParams.forEach((value, key) => {
      if (isTrackingParam(key)) return;
      kept.push([key, value]);
    });
    const normalized = new URL(parsed.toString());
    normalized.protocol = parsed.protocol.toLowerCase();
    normalized.hostname = parsed.hostname.toLowerCase();
    normalized.pathname = parsed.pathname.replace(/\/$/, "") || "/";
    normalized.hash = "";
    normalized.search = new URLSearchParams(kept).toString();
    return normalized.toString();
  } catch {
    return String(url || "").trim();
  }
}

export function normalizeTitle(title: string): string {
  return String(title || "")
    .toLowerCase()
    .trim()
    .replace(TITLE_PUNCTUATION_RE, " ")
    .replace(MULTISPACE_RE, " ")
    .trim();
}

export function fingerprintId(canonicalUrl: string, normalizedTitle: string): string {
  return sha256Hex(`${canonicalUrl}|${normalizedTitle}`);
}

export function titleFingerprint(normalizedTitle: string): string {
  return sha256Hex(normalizedTitle);
}

export function urlFingerprint(url: string): string {
  return sha256Hex(url);
}

export function collapseWhitespace(value: string): string {
  return String(value || "").replace(MULTISPACE_RE, " ").trim();
}
