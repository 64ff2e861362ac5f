import { vi } from "vitest";
import type { Renderer } from "../browser.js";
import type { PageLink, RenderOptions, RenderResult } from "../types.js";

export type RenderFn = (url: string, options: RenderOptions) => Promise<RenderResult>;

export function renderResult(
  url: string,
  overrides: Partial<Omit<RenderResult, "url">> = {}
): RenderResult {
  return {
    url,
    title: "",
    html: "<html><body></body></html>",
    markdown: "",
    links: [],
    fetchedAt: new Date(0),
    ...overrides,
  };
}

export function pageWithLinks(url: string, links: PageLink[]): RenderResult {
  return renderResult(url, { title: "Index", markdown: "Index", links });
}

/**
 * In-process stand-in for the headless browser.
 */
export function fakeRenderer(render: RenderFn) {
  const renderer = {
    render: vi.fn<RenderFn>(render),
    checkSetup: vi.fn(async () => {}),
    close: vi.fn(async () => {}),
  };
  return renderer satisfies Renderer;
}
