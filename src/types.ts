export interface DocumentationSite {
  index: number;
  rootUrl: string;
  displayName: string;
}

/**
 * A raw anchor as found on a rendered page: the unresolved `href` attribute
 * and its visible text.
 */
export interface PageLink {
  href: string;
  text: string;
}

export interface RenderOptions {
  userAgent: string;
  /** Navigation timeout in milliseconds. */
  timeout: number;
}

export interface RenderResult {
  url: string;
  title: string;
  html: string;
  markdown: string;
  links: PageLink[];
  fetchedAt: Date;
}

export interface CacheEntry {
  key: string;
  content: string;
  /** Epoch milliseconds. */
  storedAt: number;
  ttlSeconds: number;
}

export interface TocEntry {
  url: string;
  title: string;
}

export interface SiteSummary {
  index: number;
  name: string;
  url: string;
}
