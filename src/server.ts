/**
 * MCP server exposing the documentation tools and prompts.
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  GetPromptRequestSchema,
  ListPromptsRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";

import { SERVER_NAME, SERVER_VERSION } from "./config.js";
import { getPrompt, prompts } from "./prompts.js";
import type { DocumentationService } from "./service.js";
import tools, { callTool } from "./tools.js";
import { errorMessage, logger } from "./utils.js";

export function createServer(service: DocumentationService): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
        prompts: {},
      },
    }
  );

  server.onerror = (error) => logger.error("MCP", errorMessage(error));

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    logger.info(
      "MCP",
      `Tool call: ${request.params.name} ${JSON.stringify(request.params.arguments ?? {})}`
    );
    return callTool(service, request.params.name, request.params.arguments);
  });

  server.setRequestHandler(ListPromptsRequestSchema, async () => ({ prompts }));

  server.setRequestHandler(GetPromptRequestSchema, async (request) => {
    logger.info("MCP", `Prompt request: ${request.params.name}`);
    return getPrompt(service, request.params.name, request.params.arguments);
  });

  return server;
}
