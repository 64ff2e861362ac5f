import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { canonicalizeUrl } from "./links.js";
import type { SiteEntry } from "./registry.js";

export const SERVER_NAME = "doc-atlas";
export const SERVER_VERSION = "0.1.0";
export const DEFAULT_USER_AGENT = `ModelContextProtocol/1.0 ${SERVER_NAME} (+https://github.com/modelcontextprotocol/servers)`;
export const DEFAULT_URLS_FILE = ".doc-atlas.urls";

const ENV_PREFIX = "DOC_ATLAS_";

const flagSchema = z
  .enum(["true", "false", "1", "0", "yes", "no", "on", "off"])
  .transform((value) => ["true", "1", "yes", "on"].includes(value));

const siteEntrySchema = z.object({
  url: z
    .string()
    .url()
    .refine((url) => /^https?:\/\//i.test(url), "must be an http(s) URL"),
  name: z.string().optional(),
});

export const configSchema = z.object({
  sites: z.array(siteEntrySchema).default([]),
  cacheTtl: z.coerce.number().int().nonnegative().default(3600),
  userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
  debug: flagSchema.default("false"),
  skipRendererSetup: flagSchema.default("false"),
  cacheDirectory: z.string().min(1).default(".doc-atlas.cache"),
  renderTimeout: z.coerce.number().int().positive().default(30000),
  renderConcurrency: z.coerce.number().int().positive().default(2),
  browserExecutablePath: z.string().min(1).optional(),
});

export type Config = z.infer<typeof configSchema>;

type Env = Record<string, string | undefined>;

function readEnv(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/**
 * Parses one site entry: either a bare URL or `Name=URL`.
 */
export function parseSiteEntry(raw: string): SiteEntry {
  const entry = raw.trim();
  const named = /^([^=]+?)\s*=\s*(https?:\/\/\S+)$/i.exec(entry);
  if (named && !/^https?:\/\//i.test(entry)) {
    return { name: named[1], url: named[2] };
  }
  return { url: entry };
}

/**
 * Parses a comma- or newline-separated site list. Lines starting with `#`
 * are comments.
 */
export function parseSiteList(value: string | undefined): SiteEntry[] {
  if (!value) {
    return [];
  }
  return value
    .split(/[\n,]/)
    .map((item) => item.trim())
    .filter((item) => item && !item.startsWith("#"))
    .map(parseSiteEntry);
}

function readUrlsFile(env: Env, cwd: string): SiteEntry[] {
  const configured = readEnv(env, `${ENV_PREFIX}URLS_FILE`);
  const filePath = path.resolve(cwd, configured ?? DEFAULT_URLS_FILE);
  if (!fs.existsSync(filePath)) {
    if (configured) {
      throw new ConfigError([`URLS_FILE: ${filePath} does not exist`]);
    }
    return [];
  }
  try {
    return parseSiteList(fs.readFileSync(filePath, "utf-8"));
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError([`URLS_FILE: cannot read ${filePath}: ${message}`]);
  }
}

function dedupeSites(sites: SiteEntry[]): SiteEntry[] {
  const seen = new Set<string>();
  return sites.filter((site) => {
    const key = canonicalizeUrl(site.url);
    if (seen.has(key)) {
      return false;
    }
    seen.add(key);
    return true;
  });
}

/**
 * Load configuration from environment variables and the URL list file.
 * Sites from the environment come first, then those from the file.
 *
 * @throws {ConfigError} listing every invalid value.
 */
export function loadConfig(
  env: Env = process.env,
  cwd: string = process.cwd()
): Config {
  const read = (name: string) => readEnv(env, `${ENV_PREFIX}${name}`);

  const input = {
    sites: [
      ...parseSiteList(read("DOCUMENTATION_URLS")),
      ...readUrlsFile(env, cwd),
    ],
    cacheTtl: read("CACHE_TTL"),
    userAgent: read("USER_AGENT"),
    debug: read("DEBUG")?.toLowerCase(),
    skipRendererSetup: read("SKIP_RENDERER_SETUP")?.toLowerCase(),
    cacheDirectory: read("CACHE_DIRECTORY"),
    renderTimeout: read("RENDER_TIMEOUT"),
    renderConcurrency: read("RENDER_CONCURRENCY"),
    browserExecutablePath:
      read("BROWSER_PATH") ?? readEnv(env, "PUPPETEER_EXECUTABLE_PATH"),
  };

  const result = configSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map(
        (issue) => `${issue.path.join(".") || "config"}: ${issue.message}`
      )
    );
  }

  return {
    ...result.data,
    cacheDirectory: path.resolve(cwd, result.data.cacheDirectory),
    sites: dedupeSites(result.data.sites),
  };
}
