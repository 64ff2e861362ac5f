#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { PuppeteerRenderer } from "./browser.js";
import { DocumentCache, FileCacheStore } from "./cache.js";
import { loadConfig } from "./config.js";
import { SiteRegistry } from "./registry.js";
import { createServer } from "./server.js";
import { DocumentationService } from "./service.js";
import { errorMessage, logger, setDebugLogging } from "./utils.js";

/**
 * Start the server using stdio transport.
 */
async function main() {
  const config = loadConfig();
  setDebugLogging(config.debug);
  logger.info("Startup", "Starting doc-atlas MCP server");

  const registry = SiteRegistry.fromEntries(config.sites);
  if (registry.count === 0) {
    logger.warn(
      "Startup",
      "No documentation URLs configured. The server will have no content to serve."
    );
  } else {
    logger.info("Startup", `Configured ${registry.count} documentation sites`);
  }

  const renderer = new PuppeteerRenderer({
    executablePath: config.browserExecutablePath,
    concurrency: config.renderConcurrency,
  });
  if (config.skipRendererSetup) {
    logger.info("Startup", "Skipping renderer setup check");
  } else {
    await renderer.checkSetup();
  }

  const cache = new DocumentCache(new FileCacheStore(config.cacheDirectory), {
    ttlSeconds: config.cacheTtl,
  });
  logger.info(
    "Startup",
    `Cache at ${config.cacheDirectory} with TTL ${config.cacheTtl}s`
  );
  await cache.purgeExpired();

  const service = new DocumentationService(registry, cache, renderer, {
    userAgent: config.userAgent,
    timeout: config.renderTimeout,
  });
  const server = createServer(service);

  const shutdown = async () => {
    logger.info("Shutdown", "Closing browser and server");
    await renderer.close();
    await server.close();
    process.exit(0);
  };
  const onSignal = () => {
    shutdown().catch((error: unknown) => {
      logger.error("Shutdown", errorMessage(error));
      process.exit(1);
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info("Startup", "Server ready on stdio");
}

main().catch((error: unknown) => {
  logger.error("Startup", errorMessage(error));
  process.exit(1);
});
