import { SiteIndexError } from "./errors.js";
import type { DocumentationSite } from "./types.js";

export interface SiteEntry {
  url: string;
  name?: string;
}

/**
 * Display name for a site configured without one: host plus path,
 * e.g. `docs.python.org/3` for `https://docs.python.org/3/`.
 */
export function defaultDisplayName(url: string): string {
  const parsed = new URL(url);
  const pathname = parsed.pathname.replace(/\/+$/, "");
  return `${parsed.host}${pathname}`;
}

/**
 * The configured documentation sites, in configured order. Built once at
 * startup and never mutated.
 */
export class SiteRegistry {
  private readonly sites: readonly DocumentationSite[];

  private constructor(sites: DocumentationSite[]) {
    this.sites = Object.freeze(sites.map((site) => Object.freeze(site)));
  }

  static fromEntries(entries: SiteEntry[]): SiteRegistry {
    return new SiteRegistry(
      entries.map((entry, index) => ({
        index,
        rootUrl: entry.url,
        displayName: entry.name?.trim() || defaultDisplayName(entry.url),
      }))
    );
  }

  get count(): number {
    return this.sites.length;
  }

  /**
   * @throws {SiteIndexError} when `index` is not an integer in `[0, count)`.
   */
  resolve(index: number): DocumentationSite {
    const site = Number.isInteger(index) ? this.sites[index] : undefined;
    if (!site) {
      throw new SiteIndexError(index, this.sites.length);
    }
    return site;
  }

  listAll(): readonly DocumentationSite[] {
    return this.sites;
  }
}
