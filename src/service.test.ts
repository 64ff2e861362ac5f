import { beforeEach, describe, expect, it } from "vitest";
import { DocumentCache, MemoryCacheStore } from "./cache.js";
import { RenderError, ScopeError, SiteIndexError, StorageError } from "./errors.js";
import { SiteRegistry } from "./registry.js";
import { DocumentationService, formatPage, tocCacheKey } from "./service.js";
import { fakeRenderer, pageWithLinks, renderResult, type RenderFn } from "./__tests__/fakes.js";

const ROOT = "https://docs.python.org/3/";
const OPTIONS = { userAgent: "test-agent", timeout: 1000 };

const rootLinks = [
  { href: "tutorial/", text: "Tutorial" },
  { href: "library/index.html", text: "Library" },
  { href: "tutorial", text: "Tutorial (again)" },
  { href: "https://www.python.org/", text: "python.org" },
];

describe("DocumentationService", () => {
  let now: number;
  let store: MemoryCacheStore;

  beforeEach(() => {
    now = 50_000;
    store = new MemoryCacheStore();
  });

  function setup(render: RenderFn) {
    const renderer = fakeRenderer(render);
    const cache = new DocumentCache(store, { ttlSeconds: 3600, now: () => now });
    const registry = SiteRegistry.fromEntries([{ name: "Python", url: ROOT }]);
    const service = new DocumentationService(registry, cache, renderer, OPTIONS);
    return { renderer, service };
  }

  describe("listDocumentation", () => {
    it("lists the configured sites", () => {
      const { service } = setup(async (url) => renderResult(url));
      expect(service.listDocumentation()).toEqual([
        { index: 0, name: "Python", url: "https://docs.python.org/3/" },
      ]);
    });

    it("returns an empty list without sites", () => {
      const cache = new DocumentCache(store, { ttlSeconds: 60 });
      const service = new DocumentationService(
        SiteRegistry.fromEntries([]),
        cache,
        fakeRenderer(async (url) => renderResult(url)),
        OPTIONS
      );
      expect(service.listDocumentation()).toEqual([]);
    });
  });

  describe("getDocToc", () => {
    it("rejects an unknown site index without rendering", async () => {
      const { renderer, service } = setup(async (url) => pageWithLinks(url, rootLinks));
      await expect(service.getDocToc(1)).rejects.toBeInstanceOf(SiteIndexError);
      expect(renderer.render).not.toHaveBeenCalled();
    });

    it("renders the root once and serves the TOC from cache afterwards", async () => {
      const { renderer, service } = setup(async (url) => pageWithLinks(url, rootLinks));

      const first = await service.getDocToc(0);
      const second = await service.getDocToc(0);

      expect(first).toEqual([
        { url: "https://docs.python.org/3/tutorial", title: "Tutorial" },
        { url: "https://docs.python.org/3/library/index.html", title: "Library" },
      ]);
      expect(second).toEqual(first);
      expect(renderer.render).toHaveBeenCalledTimes(1);
      expect(renderer.render).toHaveBeenCalledWith(ROOT, OPTIONS);
      expect(await store.get("https://docs.python.org/3#toc")).toMatchObject({
        content: JSON.stringify(first),
      });
    });

    it("coalesces concurrent TOC requests", async () => {
      const { renderer, service } = setup(async (url) => pageWithLinks(url, rootLinks));
      const results = await Promise.all([
        service.getDocToc(0),
        service.getDocToc(0),
        service.getDocToc(0),
      ]);
      expect(renderer.render).toHaveBeenCalledTimes(1);
      expect(results[1]).toEqual(results[0]);
      expect(results[2]).toEqual(results[0]);
    });

    it("rebuilds a malformed cached TOC", async () => {
      await store.put({ key: tocCacheKey(ROOT), content: "not json", storedAt: now, ttlSeconds: 3600 });
      const { renderer, service } = setup(async (url) => pageWithLinks(url, rootLinks));

      expect(await service.getDocToc(0)).toHaveLength(2);
      expect(renderer.render).toHaveBeenCalledTimes(1);
    });

    it("rebuilds a malformed cached TOC even when it cannot be deleted", async () => {
      class UndeletableStore extends MemoryCacheStore {
        override async delete(key: string): Promise<void> {
          throw new StorageError(`read-only store, cannot delete ${key}`);
        }
      }
      store = new UndeletableStore();
      await store.put({ key: tocCacheKey(ROOT), content: "not json", storedAt: now, ttlSeconds: 3600 });
      const { renderer, service } = setup(async (url) => pageWithLinks(url, rootLinks));

      expect(await service.getDocToc(0)).toEqual([
        { url: "https://docs.python.org/3/tutorial", title: "Tutorial" },
        { url: "https://docs.python.org/3/library/index.html", title: "Library" },
      ]);
      expect(renderer.render).toHaveBeenCalledTimes(1);
      expect((await store.get(tocCacheKey(ROOT)))?.content).not.toBe("not json");
    });

    it("keeps TOC entries in scope when the root redirects to another scheme", async () => {
      const root = "http://docs.example.org/guide/";
      const renderer = fakeRenderer(async (url) =>
        url === root
          ? pageWithLinks("https://docs.example.org/guide/", [
              { href: "intro/", text: "Intro" },
              { href: "https://docs.example.org/guide/api", text: "API" },
            ])
          : renderResult(url, { title: "Intro", markdown: "Welcome" })
      );
      const service = new DocumentationService(
        SiteRegistry.fromEntries([{ url: root }]),
        new DocumentCache(store, { ttlSeconds: 3600, now: () => now }),
        renderer,
        OPTIONS
      );

      const toc = await service.getDocToc(0);

      expect(toc).toEqual([{ url: "http://docs.example.org/guide/intro", title: "Intro" }]);
      expect(await service.getDocPage(0, toc[0].url)).toBe("# Intro\n\nWelcome");
    });

    it("re-renders after the TTL", async () => {
      const { renderer, service } = setup(async (url) => pageWithLinks(url, rootLinks));
      await service.getDocToc(0);
      now += 3_600_000;
      await service.getDocToc(0);
      expect(renderer.render).toHaveBeenCalledTimes(2);
    });
  });

  describe("getDocPage", () => {
    it("renders a page and prefixes its title", async () => {
      const { renderer, service } = setup(async (url) =>
        renderResult(url, { title: "The Python Tutorial", markdown: "Python is easy." })
      );

      expect(await service.getDocPage(0, "https://docs.python.org/3/tutorial/#intro")).toBe(
        "# The Python Tutorial\n\nPython is easy."
      );
      expect(renderer.render).toHaveBeenCalledWith(
        "https://docs.python.org/3/tutorial/",
        OPTIONS
      );
      expect(await store.get("https://docs.python.org/3/tutorial")).toBeDefined();
    });

    it("shares one cache entry between URL spellings", async () => {
      const { renderer, service } = setup(async (url) =>
        renderResult(url, { markdown: "body" })
      );
      await service.getDocPage(0, "https://docs.python.org/3/tutorial/");
      await service.getDocPage(0, "https://docs.python.org/3/tutorial");
      await service.getDocPage(0, "tutorial/");
      expect(renderer.render).toHaveBeenCalledTimes(1);
    });

    it("rejects URLs outside the site", async () => {
      const { renderer, service } = setup(async (url) => renderResult(url));
      await expect(service.getDocPage(0, "https://other-domain.com/x")).rejects.toBeInstanceOf(
        ScopeError
      );
      await expect(service.getDocPage(0, "http://docs.python.org/3/")).rejects.toBeInstanceOf(
        ScopeError
      );
      await expect(service.getDocPage(0, "ftp://docs.python.org/3/")).rejects.toBeInstanceOf(
        ScopeError
      );
      expect(renderer.render).not.toHaveBeenCalled();
    });

    it("rejects an unknown site index", async () => {
      const { service } = setup(async (url) => renderResult(url));
      await expect(service.getDocPage(4, ROOT)).rejects.toBeInstanceOf(SiteIndexError);
    });

    it("reports a timeout, caches nothing and retries afresh on the next call", async () => {
      const timeout = new RenderError("Timeout", "https://docs.python.org/3/tutorial/", "timed out");
      const { renderer, service } = setup(async () => {
        throw timeout;
      });

      await expect(service.getDocPage(0, "https://docs.python.org/3/tutorial/")).rejects.toBe(timeout);
      expect(await store.entries()).toEqual([]);

      await expect(service.getDocPage(0, "https://docs.python.org/3/tutorial/")).rejects.toMatchObject({
        reason: "Timeout",
      });
      expect(renderer.render).toHaveBeenCalledTimes(2);
    });
  });
});

describe("formatPage", () => {
  it("omits the heading for untitled pages", () => {
    expect(formatPage("", "body")).toBe("body");
    expect(formatPage("Title", "body")).toBe("# Title\n\nbody");
  });
});
