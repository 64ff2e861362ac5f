import {
  ErrorCode,
  McpError,
  type GetPromptResult,
  type Prompt,
} from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { toErrorPayload } from "./errors.js";
import type { DocumentationService } from "./service.js";
import { logger } from "./utils.js";

export const prompts: Prompt[] = [
  {
    name: "list_documentation",
    description: "List the available documentation sites with their index, name and URL",
    arguments: [],
  },
  {
    name: "get_doc_page",
    description: "Read a documentation page as markdown",
    arguments: [
      {
        name: "doc_index",
        description: "Index of the site, as returned by list_documentation",
        required: true,
      },
      {
        name: "url",
        description: "URL of the page on that site",
        required: true,
      },
    ],
  },
];

// Prompt arguments always arrive as strings.
const getDocPagePromptArgs = z.object({
  doc_index: z
    .string()
    .trim()
    .regex(/^-?\d+$/, "must be an integer")
    .transform(Number),
  url: z.string().min(1),
});

function userMessage(description: string, text: string): GetPromptResult {
  return {
    description,
    messages: [{ role: "user", content: { type: "text", text } }],
  };
}

export async function getPrompt(
  service: DocumentationService,
  name: string,
  args: Record<string, string> | undefined
): Promise<GetPromptResult> {
  if (name === "list_documentation") {
    const sites = service.listDocumentation();
    return userMessage(
      "Available documentation sites",
      `Available documentation sites:\n${JSON.stringify(sites, null, 2)}`
    );
  }

  if (name === "get_doc_page") {
    const parsed = getDocPagePromptArgs.safeParse(args ?? {});
    if (!parsed.success) {
      throw new McpError(
        ErrorCode.InvalidParams,
        "get_doc_page needs a numeric doc_index and a url"
      );
    }
    const { doc_index, url } = parsed.data;
    try {
      const page = await service.getDocPage(doc_index, url);
      return userMessage(`Documentation page ${url}`, page);
    } catch (error: unknown) {
      const { message } = toErrorPayload(error);
      logger.error("Prompts", `get_doc_page prompt failed for ${url}: ${message}`);
      return userMessage(`Failed to fetch ${url}`, message);
    }
  }

  throw new McpError(ErrorCode.InvalidParams, `Unknown prompt: ${name}`);
}
