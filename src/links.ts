/**
 * Link discovery for tables of contents.
 *
 * Turns the raw anchors of a rendered page into an ordered, de-duplicated list
 * of same-site content pages:
 * - relative and scheme-relative hrefs are resolved against the page URL
 * - fragments, default ports and trailing slashes are normalized away
 * - links to other hosts, non-http(s) schemes and static assets are dropped
 */

import type { PageLink, TocEntry } from "./types.js";

const ASSET_EXTENSIONS = new Set([
  // images
  "png", "jpg", "jpeg", "gif", "svg", "webp", "ico", "bmp", "avif",
  // styles and scripts
  "css", "js", "mjs", "map",
  // fonts
  "woff", "woff2", "ttf", "otf", "eot",
  // archives
  "zip", "tar", "gz", "tgz", "bz2", "xz", "7z", "rar",
  // media
  "mp4", "webm", "mp3", "wav", "ogg",
  // documents the renderer cannot serve as HTML
  "pdf", "epub", "doc", "docx", "xls", "xlsx", "ppt", "pptx",
]);

/**
 * Normalizes a URL into its cache/comparison key: no fragment, no default
 * port, no trailing slash except on the bare root.
 *
 * @throws {TypeError} when `url` is not an absolute URL.
 */
export function canonicalizeUrl(url: string): string {
  const parsed = new URL(url);
  parsed.hash = "";
  if (parsed.pathname.length > 1 && parsed.pathname.endsWith("/")) {
    parsed.pathname = parsed.pathname.replace(/\/+$/, "") || "/";
  }
  return parsed.href;
}

/**
 * Resolves an href found on a page to a canonical absolute http(s) URL.
 * Returns null for empty, fragment-only, malformed or non-http(s) links
 * (mailto:, javascript:, tel:, data:).
 */
export function resolveHref(href: string, baseUrl: string): string | null {
  const trimmed = href.trim();
  if (!trimmed || trimmed.startsWith("#")) {
    return null;
  }

  let resolved: URL;
  try {
    resolved = new URL(trimmed, baseUrl);
  } catch {
    return null;
  }

  if (resolved.protocol !== "http:" && resolved.protocol !== "https:") {
    return null;
  }
  return canonicalizeUrl(resolved.href);
}

/**
 * Domain-level scope: same scheme and host (including port) as the root.
 */
export function isSameScope(url: string, rootUrl: string): boolean {
  try {
    const target = new URL(url);
    const root = new URL(rootUrl);
    return target.protocol === root.protocol && target.host === root.host;
  } catch {
    return false;
  }
}

export function isAssetPath(pathname: string): boolean {
  const lastSegment = pathname.split("/").pop() ?? "";
  const dot = lastSegment.lastIndexOf(".");
  if (dot <= 0) {
    return false;
  }
  return ASSET_EXTENSIONS.has(lastSegment.slice(dot + 1).toLowerCase());
}

function titleFromUrl(url: string): string {
  const parsed = new URL(url);
  const segments = parsed.pathname.split("/").filter(Boolean);
  const last = segments[segments.length - 1];
  if (!last) {
    return parsed.hostname;
  }
  try {
    return decodeURIComponent(last);
  } catch {
    return last;
  }
}

/**
 * Builds a table of contents from the anchors of the page at `baseUrl`.
 *
 * Entries keep first-discovery order; for duplicates the first anchor text
 * wins. Blank anchor text falls back to the last path segment. The page
 * itself is never listed.
 */
export function extractToc(baseUrl: string, links: PageLink[]): TocEntry[] {
  const base = canonicalizeUrl(baseUrl);
  const entries = new Map<string, TocEntry>();

  for (const link of links) {
    const url = resolveHref(link.href, baseUrl);
    if (!url || url === base || entries.has(url)) {
      continue;
    }
    if (!isSameScope(url, base) || isAssetPath(new URL(url).pathname)) {
      continue;
    }

    const text = link.text.replace(/\s+/g, " ").trim();
    entries.set(url, { url, title: text || titleFromUrl(url) });
  }

  return Array.from(entries.values());
}
