/**
 * Puppeteer-based page renderer.
 *
 * This module provides:
 * - The `Renderer` capability the rest of the server depends on
 * - A headless Chrome implementation that renders one page per call,
 *   collects its anchors and converts the main content to Markdown
 * - Classification of navigation and launch failures into `RenderError`s
 *
 * The adapter never retries; a failed render is reported once to the caller.
 */

import puppeteer, { TimeoutError } from "puppeteer-core";
import type { Browser, HTTPResponse, Page } from "puppeteer-core";
import PQueue from "p-queue";
import TurndownService from "turndown";

import { RenderError } from "./errors.js";
import type { PageLink, RenderOptions, RenderResult } from "./types.js";
import { errorMessage, logger } from "./utils.js";

export interface Renderer {
  render(url: string, options: RenderOptions): Promise<RenderResult>;
  /** Fails with an `EngineUnavailable` render error when no browser can start. */
  checkSetup(): Promise<void>;
  close(): Promise<void>;
}

export interface PuppeteerRendererConfig {
  /** Chrome/Chromium binary; the installed stable Chrome channel otherwise. */
  executablePath?: string;
  /** Pages rendered at the same time. */
  concurrency: number;
}

const turndownService = new TurndownService({
  headingStyle: "atx",
  codeBlockStyle: "fenced",
  bulletListMarker: "-",
});

/**
 * Converts an HTML fragment into Markdown.
 */
export function htmlToMarkdown(html: string): string {
  return turndownService.turndown(html).trim();
}

const LAUNCH_FAILURE_PATTERNS = [
  /failed to launch/i,
  /could not find (expected )?(browser|chrome)/i,
  /executablePath/i,
  /browser was not found/i,
  /ENOENT/,
  // the browser died under an open session
  /target closed/i,
  /session closed/i,
  /browser has disconnected/i,
];

/**
 * Maps anything thrown while rendering `url` onto a `RenderError`.
 */
export function classifyRenderError(error: unknown, url: string): RenderError {
  if (error instanceof RenderError) {
    return error;
  }
  const message = errorMessage(error);
  if (error instanceof TimeoutError || /timeout .*exceeded/i.test(message)) {
    return new RenderError("Timeout", url, `Timed out rendering ${url}: ${message}`, {
      cause: error,
    });
  }
  if (LAUNCH_FAILURE_PATTERNS.some((pattern) => pattern.test(message))) {
    return new RenderError(
      "EngineUnavailable",
      url,
      `Rendering engine unavailable: ${message}`,
      { cause: error }
    );
  }
  return new RenderError("NetworkFailure", url, `Failed to load ${url}: ${message}`, {
    cause: error,
  });
}

/**
 * Collects every anchor on the page as written in the markup. Must run
 * before `extractContentHtml`, which removes navigation.
 */
async function collectLinks(page: Page): Promise<PageLink[]> {
  return page.evaluate(() =>
    Array.from(document.querySelectorAll("a[href]")).map((a) => ({
      href: a.getAttribute("href") || "",
      text: (a.textContent || "").trim(),
    }))
  );
}

/**
 * Strips scripts and page chrome from the DOM and returns the HTML of the
 * main content element.
 */
async function extractContentHtml(page: Page): Promise<string> {
  return page.evaluate(() => {
    document
      .querySelectorAll("script, style, noscript, template, iframe")
      .forEach((el) => el.remove());

    const unwantedSelectors = [
      "nav",
      "footer",
      "aside",
      "header",
      "[role='navigation']",
      "[role='banner']",
      "[role='contentinfo']",
      ".navbar",
      ".sidebar",
      ".menu",
      ".search",
      ".breadcrumb",
      ".breadcrumbs",
      ".toc",
      ".pagination",
      ".skip-link",
      ".skip-to-content",
      ".cookie",
      ".consent",
      ".newsletter",
      ".share",
      ".social",
      ".headerlink",
    ];
    unwantedSelectors.forEach((selector) => {
      document.querySelectorAll(selector).forEach((el) => el.remove());
    });

    const contentSelectors = [
      "main",
      "article",
      "[role='main']",
      ".markdown-body",
      ".documentation",
      ".docs-content",
      ".content",
      "#content",
    ];
    for (const selector of contentSelectors) {
      const root = document.querySelector(selector);
      if (root && (root.textContent || "").trim()) {
        return root.innerHTML;
      }
    }
    return document.body ? document.body.innerHTML : "";
  });
}

function assertHtmlResponse(response: HTTPResponse | null, url: string): void {
  if (!response) {
    throw new RenderError("NetworkFailure", url, `No response received for ${url}`);
  }
  const status = response.status();
  if (status >= 400) {
    throw new RenderError("NetworkFailure", url, `Failed to load ${url}: HTTP ${status}`);
  }
  const contentType = response.headers()["content-type"] ?? "";
  if (contentType && !/html/i.test(contentType)) {
    throw new RenderError(
      "InvalidContent",
      url,
      `Expected an HTML page at ${url}, got ${contentType}`
    );
  }
}

export class PuppeteerRenderer implements Renderer {
  private browser: Promise<Browser> | null = null;
  private readonly queue: PQueue;

  constructor(private readonly config: PuppeteerRendererConfig) {
    this.queue = new PQueue({ concurrency: Math.max(1, config.concurrency) });
  }

  /**
   * Launches the shared headless browser on first use, and again after it
   * disconnects.
   */
  private launchBrowser(): Promise<Browser> {
    if (!this.browser) {
      const { executablePath } = this.config;
      logger.info(
        "Browser",
        `Launching headless browser (${executablePath ?? "chrome channel"})`
      );
      const launching = puppeteer
        .launch({
          headless: true,
          args: ["--no-sandbox", "--disable-setuid-sandbox"],
          ...(executablePath ? { executablePath } : { channel: "chrome" as const }),
        })
        .then((browser) => {
          browser.on("disconnected", () => {
            logger.warn("Browser", "Browser disconnected");
            this.browser = null;
          });
          return browser;
        })
        .catch((error: unknown) => {
          this.browser = null;
          throw new RenderError(
            "EngineUnavailable",
            "",
            `Rendering engine unavailable: ${errorMessage(error)}`,
            { cause: error }
          );
        });
      this.browser = launching;
    }
    return this.browser;
  }

  async checkSetup(): Promise<void> {
    const browser = await this.launchBrowser();
    logger.info("Browser", `Renderer ready: ${await browser.version()}`);
  }

  render(url: string, options: RenderOptions): Promise<RenderResult> {
    return this.queue.add(() => this.renderPage(url, options), {
      throwOnTimeout: true,
    });
  }

  private async renderPage(
    url: string,
    options: RenderOptions
  ): Promise<RenderResult> {
    logger.debug("Browser", `Rendering ${url}`);
    let page: Page | undefined;
    try {
      const browser = await this.launchBrowser();
      page = await browser.newPage();
      await page.setUserAgent(options.userAgent);
      page.setDefaultTimeout(options.timeout);

      const response = await page.goto(url, {
        waitUntil: "networkidle2",
        timeout: options.timeout,
      });
      assertHtmlResponse(response, url);

      const html = await page.content();
      const title = (await page.title()).trim();
      const links = await collectLinks(page);
      const markdown = htmlToMarkdown(await extractContentHtml(page));

      if (!markdown) {
        throw new RenderError("InvalidContent", url, `Page at ${url} has no content`);
      }

      logger.debug(
        "Browser",
        `Rendered ${url}: ${markdown.length} chars, ${links.length} links`
      );
      return {
        url: page.url() || url,
        title,
        html,
        markdown,
        links,
        fetchedAt: new Date(),
      };
    } catch (error: unknown) {
      throw classifyRenderError(error, url);
    } finally {
      if (page) {
        await page.close().catch((error: unknown) => {
          logger.error("Browser", `Failed to close page for ${url}: ${errorMessage(error)}`);
        });
      }
    }
  }

  async close(): Promise<void> {
    this.queue.clear();
    const pending = this.browser;
    this.browser = null;
    if (!pending) {
      return;
    }
    try {
      const browser = await pending;
      await browser.close();
    } catch (error: unknown) {
      logger.error("Browser", `Failed to close browser: ${errorMessage(error)}`);
    }
  }
}
