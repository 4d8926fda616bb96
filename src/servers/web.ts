import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { timedFetch } from "../utils/timed-fetch.js";
import { asError } from "../errors.js";
import { Logger } from "../logger.js";

export const DEFAULT_MAX_LENGTH = 5_000;
const FETCH_TIMEOUT_MS = 30_000;
const USER_AGENT = "tasker/0.1 (+autonomous tool use)";

export interface FetchArgs {
  url: string;
  max_length?: number;
  start_index?: number;
}

/**
 * Fetch a URL and return a window of its body as text.
 * Non-2xx statuses and network failures come back as "Error: ..." text.
 */
export async function fetchUrl(args: FetchArgs, signal?: AbortSignal): Promise<string> {
  let parsed: URL;
  try {
    parsed = new URL(args.url);
  } catch {
    return `Error: Invalid URL: ${args.url}`;
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    return `Error: Only http and https URLs are supported, got ${parsed.protocol}`;
  }

  let body: string;
  let contentType: string;
  try {
    const res = await timedFetch(parsed.toString(), {
      headers: { "User-Agent": USER_AGENT },
      redirect: "follow",
      timeoutMs: FETCH_TIMEOUT_MS,
      where: "web.fetch",
      signal,
    });
    if (!res.ok) {
      return `Error: Failed to fetch ${args.url} - status code ${res.status}`;
    }
    contentType = res.headers.get("content-type") ?? "";
    body = await res.text();
  } catch (e: unknown) {
    Logger.debug(`web.fetch failed: ${asError(e).message}`);
    return `Error: Failed to fetch ${args.url}: ${asError(e).message}`;
  }

  const maxLength = args.max_length ?? DEFAULT_MAX_LENGTH;
  const start = args.start_index ?? 0;
  if (start >= body.length && body.length > 0) {
    return "Error: No more content available.";
  }
  const window = body.slice(start, start + maxLength);
  const remaining = body.length - (start + window.length);

  let out = `Contents of ${args.url}${contentType ? ` (${contentType})` : ""}:\n${window}`;
  if (remaining > 0) {
    out += `\n\n<error>Content truncated. Call the fetch tool with a start_index of ${start + window.length} to get more content.</error>`;
  }
  return out;
}

export function createWebServer(): McpServer {
  const server = new McpServer(
    { name: "WebServer", version: "0.1.0" },
    { instructions: "Interacts with websites. Use fetch to read a page's raw contents." },
  );

  server.registerTool(
    "fetch",
    {
      description:
        "Fetch a URL from the internet and return its contents as text. " +
        "Long pages are returned in windows; use start_index to continue reading.",
      inputSchema: {
        url: z.string().describe("URL to fetch (http or https)"),
        max_length: z.number().int().positive().optional().describe(`Maximum characters to return (default ${DEFAULT_MAX_LENGTH})`),
        start_index: z.number().int().min(0).optional().describe("Character offset to start from (default 0)"),
      },
    },
    async ({ url, max_length, start_index }, extra) => ({
      content: [{ type: "text" as const, text: await fetchUrl({ url, max_length, start_index }, extra.signal) }],
    }),
  );

  return server;
}
