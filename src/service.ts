import { z } from "zod";
import type { Renderer } from "./browser.js";
import type { DocumentCache } from "./cache.js";
import { ScopeError } from "./errors.js";
import { canonicalizeUrl, extractToc, isSameScope } from "./links.js";
import type { SiteRegistry } from "./registry.js";
import type {
  DocumentationSite,
  RenderOptions,
  SiteSummary,
  TocEntry,
} from "./types.js";
import { logger } from "./utils.js";

const TOC_KEY_SUFFIX = "#toc";

const tocSchema = z.array(z.object({ url: z.string(), title: z.string() }));

export function tocCacheKey(rootUrl: string): string {
  return `${canonicalizeUrl(rootUrl)}${TOC_KEY_SUFFIX}`;
}

/**
 * The page as served to clients: a title heading over the rendered markdown.
 */
export function formatPage(title: string, markdown: string): string {
  return title ? `# ${title}\n\n${markdown}` : markdown;
}

/**
 * Implements the three documentation operations on top of the site
 * registry, the document cache and a renderer.
 */
export class DocumentationService {
  constructor(
    private readonly registry: SiteRegistry,
    private readonly cache: DocumentCache,
    private readonly renderer: Renderer,
    private readonly renderOptions: RenderOptions
  ) {}

  listDocumentation(): SiteSummary[] {
    return this.registry.listAll().map((site) => ({
      index: site.index,
      name: site.displayName,
      url: site.rootUrl,
    }));
  }

  async getDocToc(docIndex: number): Promise<TocEntry[]> {
    const site = this.registry.resolve(docIndex);
    const key = tocCacheKey(site.rootUrl);

    const parsed = tocSchema.safeParse(await this.loadToc(key, site));
    if (parsed.success) {
      return parsed.data;
    }

    logger.warn("Docs", `Discarding malformed cached TOC for ${site.rootUrl}`);
    await this.cache.invalidate(key);
    const rebuilt = await this.cache.refresh(key, () => this.buildToc(site));
    return tocSchema.parse(JSON.parse(rebuilt));
  }

  /**
   * Renders the site root and serializes its table of contents. Links are
   * resolved and scoped against the configured root, not a redirect target,
   * so every entry passes the page scope check.
   */
  private async buildToc(site: DocumentationSite): Promise<string> {
    logger.info("Docs", `Building table of contents for ${site.rootUrl}`);
    const result = await this.renderer.render(site.rootUrl, this.renderOptions);
    if (result.url !== site.rootUrl) {
      logger.debug("Docs", `${site.rootUrl} rendered as ${result.url}`);
    }
    const toc = extractToc(site.rootUrl, result.links);
    logger.info("Docs", `Found ${toc.length} pages on ${site.rootUrl}`);
    return JSON.stringify(toc);
  }

  private async loadToc(key: string, site: DocumentationSite): Promise<unknown> {
    const content = await this.cache.getOrRender(key, () => this.buildToc(site));
    try {
      return JSON.parse(content);
    } catch {
      return undefined;
    }
  }

  async getDocPage(docIndex: number, url: string): Promise<string> {
    const site = this.registry.resolve(docIndex);
    const pageUrl = this.resolvePageUrl(site, url);

    return this.cache.getOrRender(canonicalizeUrl(pageUrl), async () => {
      logger.info("Docs", `Fetching page ${pageUrl}`);
      const result = await this.renderer.render(pageUrl, this.renderOptions);
      return formatPage(result.title, result.markdown);
    });
  }

  /**
   * Resolves `url` (absolute, or relative to the site root) to a URL on the
   * site's scheme and host, without its fragment.
   *
   * @throws {ScopeError}
   */
  private resolvePageUrl(site: DocumentationSite, url: string): string {
    let resolved: URL;
    try {
      resolved = new URL(url.trim(), site.rootUrl);
    } catch {
      throw new ScopeError(url, site.rootUrl, `Invalid documentation URL: ${url}`);
    }
    if (
      (resolved.protocol !== "http:" && resolved.protocol !== "https:") ||
      !isSameScope(resolved.href, site.rootUrl)
    ) {
      throw new ScopeError(url, site.rootUrl);
    }
    resolved.hash = "";
    return resolved.href;
  }
}
