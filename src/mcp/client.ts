/**
 * MCP client: connects to MCP servers, discovers tools, routes tool calls.
 * Server configs use the common `mcpServers` shape ({ command, args, env, cwd }),
 * plus an optional `prefix` that namespaces the server's tool names.
 */
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StdioClientTransport } from "@modelcontextprotocol/sdk/client/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import { Logger } from "../logger.js";
import { taskerError, asError, errorLogFields, isTaskerError } from "../errors.js";

export interface McpServerConfig {
  command: string;
  args?: string[];
  env?: Record<string, string>;
  cwd?: string;
  /** Tools are exposed as `${prefix}_${name}`. */
  prefix?: string;
}

export interface AttachOptions {
  prefix?: string;
  /** Built into tasker; its instructions go under the native servers heading. */
  native?: boolean;
}

export interface ToolDescriptor {
  name: string;
  description?: string;
  /** JSON schema for the arguments, as the server reported it. */
  inputSchema: unknown;
  /** Which MCP server provides this tool. */
  serverName: string;
}

/** A tagged MCP content block. Only `type: "text"` is interpreted natively. */
export interface ContentBlock {
  type: string;
  [key: string]: unknown;
}

export interface CallToolOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/** What the agent needs from a tool transport. */
export interface ToolTransport {
  listTools(): Promise<ToolDescriptor[]>;
  callTool(name: string, args: Record<string, unknown>, opts: CallToolOptions): Promise<ContentBlock[]>;
}

interface ConnectedServer {
  name: string;
  client: Client;
  tools: ToolDescriptor[];
  prefix?: string;
  native: boolean;
}

const NATIVE_HEADER = "## Native MCP Servers\nThese servers are provided by default by tasker.";

export function prefixedName(prefix: string | undefined, name: string): string {
  return prefix ? `${prefix}_${name}` : name;
}

/** The name the server itself knows an exposed tool by. */
function remoteName(server: ConnectedServer, exposed: string): string {
  const head = server.prefix ? `${server.prefix}_` : "";
  return head && exposed.startsWith(head) ? exposed.slice(head.length) : exposed;
}

const CLIENT_INFO = { name: "tasker", version: "0.1.0" };

function isContentBlock(v: unknown): v is ContentBlock {
  return typeof v === "object" && v !== null && "type" in v && typeof v.type === "string";
}

function firstText(blocks: ContentBlock[]): string {
  for (const b of blocks) {
    if (b.type === "text" && typeof b.text === "string") return b.text;
  }
  return "tool reported an error";
}

export class McpManager implements ToolTransport {
  private servers = new Map<string, ConnectedServer>();
  private configs = new Map<string, McpServerConfig>();

  /**
   * Connect to all configured stdio servers and discover their tools.
   * A server that fails to start is logged and skipped.
   */
  async connectAll(configs: Record<string, McpServerConfig>): Promise<void> {
    const entries = Object.entries(configs);
    if (entries.length === 0) return;

    Logger.debug(`Connecting to ${entries.length} MCP server(s)...`);

    await Promise.all(
      entries.map(([name, cfg]) => {
        this.configs.set(name, cfg);
        return this.connectStdio(name, cfg).catch((e: unknown) => {
          const te = taskerError("mcp_error", `MCP server "${name}" failed to connect: ${asError(e).message}`, {
            retryable: true,
            cause: e,
          });
          Logger.warn(te.message, errorLogFields(te));
        });
      })
    );
  }

  /** Connect a server reachable over an already-built transport (in-process servers). */
  async attach(name: string, transport: Transport, opts: AttachOptions = {}): Promise<void> {
    const client = new Client(CLIENT_INFO, { capabilities: {} });
    await client.connect(transport);
    await this.register(name, client, opts);
  }

  private async connectStdio(name: string, cfg: McpServerConfig): Promise<void> {
    const env: Record<string, string> = {};
    for (const [k, v] of Object.entries(process.env)) {
      if (v !== undefined) env[k] = v;
    }
    const transport = new StdioClientTransport({
      command: cfg.command,
      args: cfg.args ?? [],
      env: { ...env, ...cfg.env },
      cwd: cfg.cwd,
      stderr: "pipe",
    });
    await this.attach(name, transport, { prefix: cfg.prefix });
  }

  private async register(name: string, client: Client, opts: AttachOptions): Promise<void> {
    const tools = await this.discover(name, client, opts.prefix);
    this.servers.set(name, { name, client, tools, prefix: opts.prefix, native: opts.native ?? false });
    Logger.debug(`MCP "${name}": ${tools.length} tool(s) available`);
  }

  private async discover(name: string, client: Client, prefix: string | undefined): Promise<ToolDescriptor[]> {
    const result = await client.listTools();
    return result.tools.map((t) => ({
      name: prefixedName(prefix, t.name),
      description: t.description,
      inputSchema: t.inputSchema,
      serverName: name,
    }));
  }

  /**
   * Re-discover tools on every connected server.
   * When two servers expose the same name, the first connected one wins.
   */
  async listTools(): Promise<ToolDescriptor[]> {
    const seen = new Set<string>();
    const out: ToolDescriptor[] = [];
    for (const server of this.servers.values()) {
      try {
        server.tools = await this.discover(server.name, server.client, server.prefix);
      } catch (e: unknown) {
        Logger.warn(`MCP "${server.name}": tool discovery failed, using cached list: ${asError(e).message}`);
      }
      for (const tool of server.tools) {
        if (seen.has(tool.name)) {
          Logger.warn(`MCP "${server.name}": tool "${tool.name}" shadowed by an earlier server`);
          continue;
        }
        seen.add(tool.name);
        out.push(tool);
      }
    }
    return out;
  }

  /**
   * Instructions advertised by the connected servers, one markdown section
   * each. Native servers come first, under their own heading.
   */
  instructions(): string {
    const native: string[] = [];
    const external: string[] = [];
    let anyNative = false;
    for (const server of this.servers.values()) {
      if (server.native) anyNative = true;
      const text = server.client.getInstructions();
      if (!text) continue;
      const display = server.client.getServerVersion()?.name ?? server.name;
      if (server.native) native.push(`### ${display} Server\n${text}`);
      else external.push(`## ${display} Server\n${text}`);
    }
    const body = [...native, ...external].join("\n\n");
    return anyNative ? `${NATIVE_HEADER}\n\n${body}` : body;
  }

  /**
   * Route a tool call to the server that provides it.
   * Stdio servers that dropped their connection are reconnected once and retried.
   * A result flagged `isError` is raised as a tool_error.
   */
  async callTool(name: string, args: Record<string, unknown>, opts: CallToolOptions): Promise<ContentBlock[]> {
    const owner = this.findOwner(name);
    if (!owner) {
      throw taskerError("mcp_error", `No MCP server provides tool "${name}"`, { retryable: false });
    }

    const attempt = async (): Promise<ContentBlock[]> => {
      const current = this.servers.get(owner.name) ?? owner;
      const result = await current.client.callTool(
        { name: remoteName(current, name), arguments: args },
        undefined,
        { timeout: opts.timeoutMs, signal: opts.signal },
      );
      const content: unknown[] = Array.isArray(result.content) ? result.content : [];
      const blocks = content.filter(isContentBlock);
      if (result.isError === true) {
        throw taskerError("tool_error", firstText(blocks), { retryable: false });
      }
      return blocks;
    };

    try {
      return await attempt();
    } catch (e: unknown) {
      if (isTaskerError(e)) throw e;
      const err = asError(e);
      if (e instanceof McpError && e.code === ErrorCode.RequestTimeout) {
        throw taskerError("timeout_error", `timed out after ${opts.timeoutMs}ms`, { retryable: true, cause: e });
      }
      const isDisconnect = err.message.includes("Not connected") || err.message.includes("Connection closed");
      const cfg = this.configs.get(owner.name);
      if (isDisconnect && cfg) {
        Logger.warn(`MCP "${owner.name}": disconnected — reconnecting and retrying ${name}...`);
        try {
          await this.reconnect(owner.name, cfg);
          return await attempt();
        } catch (retryErr: unknown) {
          if (isTaskerError(retryErr)) throw retryErr;
          throw taskerError("mcp_error", `${asError(retryErr).message} (server: ${owner.name}, after reconnect)`, {
            retryable: true,
            cause: retryErr,
          });
        }
      }
      throw taskerError("mcp_error", `${err.message} (server: ${owner.name})`, { retryable: true, cause: e });
    }
  }

  private findOwner(name: string): ConnectedServer | undefined {
    for (const server of this.servers.values()) {
      if (server.tools.some((t) => t.name === name)) return server;
    }
    return undefined;
  }

  private async reconnect(name: string, cfg: McpServerConfig): Promise<void> {
    const old = this.servers.get(name);
    if (old) {
      await old.client.close().catch((e: unknown) => {
        Logger.debug(`MCP "${name}" close error: ${asError(e).message}`);
      });
      this.servers.delete(name);
    }
    await this.connectStdio(name, cfg);
    Logger.info(`MCP "${name}": reconnected`);
  }

  async disconnectAll(): Promise<void> {
    for (const server of this.servers.values()) {
      try {
        await server.client.close();
      } catch (e: unknown) {
        Logger.debug(`MCP server "${server.name}" close error: ${asError(e).message}`);
      }
    }
    this.servers.clear();
  }
}
