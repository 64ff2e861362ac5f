import {
  ErrorCode,
  McpError,
  type CallToolResult,
  type Tool,
} from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { toErrorPayload } from "./errors.js";
import type { DocumentationService } from "./service.js";
import { logger } from "./utils.js";

export const getDocTocArgsSchema = z.object({
  doc_index: z.number().int(),
});

export const getDocPageArgsSchema = z.object({
  doc_index: z.number().int(),
  url: z.string().min(1),
});

const tools: Tool[] = [
  {
    name: "list_documentation",
    description: `List the documentation sites this server can read.

Takes no arguments. Returns a JSON array of { index, name, url }. Use the index with get_doc_toc and get_doc_page.`,
    inputSchema: {
      type: "object",
      properties: {},
    },
  },
  {
    name: "get_doc_toc",
    description: `Get the table of contents of a documentation site: the pages linked from its root page.

Returns a JSON array of { url, title } in page order. Pass a url to get_doc_page to read it.`,
    inputSchema: {
      type: "object",
      properties: {
        doc_index: {
          type: "integer",
          description: "Index of the site, as returned by list_documentation",
        },
      },
      required: ["doc_index"],
    },
  },
  {
    name: "get_doc_page",
    description: `Fetch one page of a documentation site as markdown.

The url must be on the same host as the site (relative URLs are resolved against the site root).`,
    inputSchema: {
      type: "object",
      properties: {
        doc_index: {
          type: "integer",
          description: "Index of the site, as returned by list_documentation",
        },
        url: {
          type: "string",
          description: "URL of the page, usually taken from get_doc_toc",
        },
      },
      required: ["doc_index", "url"],
    },
  },
];

export default tools;

function textResult(text: string): CallToolResult {
  return { content: [{ type: "text", text }] };
}

/**
 * A failed tool call as seen by the client: `{ error: { kind, message } }`.
 */
export function errorResult(error: unknown): CallToolResult {
  return {
    content: [
      {
        type: "text",
        text: JSON.stringify({ error: toErrorPayload(error) }, null, 2),
      },
    ],
    isError: true,
  };
}

export function parseArgs<T extends z.ZodTypeAny>(
  schema: T,
  args: unknown,
  name: string
): z.infer<T> {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    throw new McpError(
      ErrorCode.InvalidParams,
      `Invalid arguments for ${name}: ${parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ")}`
    );
  }
  return parsed.data;
}

/**
 * Dispatches a tool call to the documentation service. Argument problems
 * are protocol errors; failures inside the service become error results.
 */
export async function callTool(
  service: DocumentationService,
  name: string,
  args: unknown
): Promise<CallToolResult> {
  switch (name) {
    case "list_documentation":
      return textResult(JSON.stringify(service.listDocumentation(), null, 2));

    case "get_doc_toc": {
      const { doc_index } = parseArgs(getDocTocArgsSchema, args, name);
      try {
        const toc = await service.getDocToc(doc_index);
        return textResult(JSON.stringify(toc, null, 2));
      } catch (error: unknown) {
        logger.error("Tools", `get_doc_toc(${doc_index}) failed: ${toErrorPayload(error).message}`);
        return errorResult(error);
      }
    }

    case "get_doc_page": {
      const { doc_index, url } = parseArgs(getDocPageArgsSchema, args, name);
      try {
        return textResult(await service.getDocPage(doc_index, url));
      } catch (error: unknown) {
        logger.error("Tools", `get_doc_page(${doc_index}, ${url}) failed: ${toErrorPayload(error).message}`);
        return errorResult(error);
      }
    }

    default:
      throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
  }
}
