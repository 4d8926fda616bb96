/**
 * CLI argument parsing, configuration loading, and help text.
 */

import { readFileSync, existsSync } from "node:fs";
import { resolve } from "node:path";
import { Logger } from "../logger.js";
import { DEFAULT_MODEL_ID } from "../model-config.js";
import { DEFAULT_MAX_STEPS } from "../agent.js";
import { DEFAULT_TOOL_TIMEOUT_MS } from "../tool-adapter.js";
import { taskerError, asError, errorLogFields } from "../errors.js";
import { isRecord } from "../utils/guards.js";
import { getVersion } from "../version.js";
import { NATIVE_SERVERS, isNativeServerName } from "../servers/index.js";
import type { NativeServerName } from "../servers/index.js";
import type { TaskerConfig } from "../types.js";
import type { McpServerConfig } from "../mcp/index.js";

export const DEFAULT_TEMPERATURE = 0.7;
export const DEFAULT_MAX_TOKENS = 4000;
export const DEFAULT_NUM_CTX = 32000;
export const DEFAULT_REQUEST_TIMEOUT_MS = 300_000;

export type CliCommand =
  | { kind: "run"; config: TaskerConfig }
  | { kind: "help" }
  | { kind: "version" };

function stringArray(v: unknown): v is string[] {
  return Array.isArray(v) && v.every((x) => typeof x === "string");
}

function stringMap(v: unknown): v is Record<string, string> {
  return isRecord(v) && Object.values(v).every((x) => typeof x === "string");
}

/** Validate one `mcpServers` entry; null when it is not a usable stdio config. */
export function toServerConfig(v: unknown): McpServerConfig | null {
  if (!isRecord(v) || typeof v.command !== "string" || v.command === "") return null;
  if (v.args !== undefined && !stringArray(v.args)) return null;
  if (v.env !== undefined && !stringMap(v.env)) return null;
  if (v.cwd !== undefined && typeof v.cwd !== "string") return null;
  if (v.prefix !== undefined && (typeof v.prefix !== "string" || !/^[A-Za-z0-9_-]+$/.test(v.prefix))) return null;
  return {
    command: v.command,
    ...(v.args !== undefined ? { args: v.args } : {}),
    ...(v.env !== undefined ? { env: v.env } : {}),
    ...(v.cwd !== undefined ? { cwd: v.cwd } : {}),
    ...(v.prefix !== undefined ? { prefix: v.prefix } : {}),
  };
}

/**
 * Merge MCP server maps from JSON files or inline JSON strings.
 * Missing files and malformed entries are logged and skipped.
 */
export function loadMcpServers(sources: string[]): Record<string, McpServerConfig> {
  const merged: Record<string, McpServerConfig> = {};

  for (const p of sources) {
    let raw: string;
    if (p.trimStart().startsWith("{")) {
      raw = p;
    } else if (existsSync(p)) {
      raw = readFileSync(p, "utf-8");
    } else {
      Logger.warn(`MCP config not found: ${p}`);
      continue;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (e: unknown) {
      const te = taskerError("config_error", `Failed to parse MCP config ${p}: ${asError(e).message}`, { cause: e });
      Logger.warn(te.message, errorLogFields(te));
      continue;
    }

    const servers = isRecord(parsed) && isRecord(parsed.mcpServers) ? parsed.mcpServers : parsed;
    if (!isRecord(servers)) {
      Logger.warn(`MCP config ${p} has no mcpServers map`);
      continue;
    }
    for (const [name, entry] of Object.entries(servers)) {
      const cfg = toServerConfig(entry);
      if (!cfg) {
        Logger.warn(`MCP config ${p}: server "${name}" needs a "command" string (and a word-character "prefix", if any); skipping`);
        continue;
      }
      merged[name] = cfg;
    }
  }

  return merged;
}

/** Comma-separated native server names; empty means none. */
export function parseNativeList(raw: string): NativeServerName[] {
  const out: NativeServerName[] = [];
  for (const part of raw.split(",")) {
    const name = part.trim();
    if (name === "") continue;
    if (!isNativeServerName(name)) {
      throw taskerError("config_error", `--native: unknown server "${name}" (expected ${NATIVE_SERVERS.join(", ")})`);
    }
    if (!out.includes(name)) out.push(name);
  }
  return out;
}

function parseNumber(flag: string, raw: string | undefined, fallback: number, opts: { integer?: boolean; min?: number } = {}): number {
  if (raw === undefined) return fallback;
  const n = Number(raw.trim());
  if (raw.trim() === "" || !Number.isFinite(n) || (opts.integer && !Number.isInteger(n)) || (opts.min !== undefined && n < opts.min)) {
    const what = opts.integer ? "an integer" : "a number";
    const bound = opts.min !== undefined ? ` >= ${opts.min}` : "";
    throw taskerError("config_error", `${flag} expects ${what}${bound}, got "${raw}"`);
  }
  return n;
}

/**
 * Parse argv (without the node and script entries) and the environment.
 * Throws config_error on a bad value or a flag missing its value.
 */
export function loadConfig(argv: string[], env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): CliCommand {
  const flags: Record<string, string> = {};
  const mcpConfigPaths: string[] = [];

  const value = (i: number, flag: string): string => {
    const v = argv[i];
    if (v === undefined) throw taskerError("config_error", `${flag} requires a value`);
    return v;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === "--model" || arg === "-m") { flags.model = value(++i, arg); }
    else if (arg === "--base-url") { flags.baseUrl = value(++i, arg); }
    else if (arg === "--temperature") { flags.temperature = value(++i, arg); }
    else if (arg === "--max-tokens") { flags.maxTokens = value(++i, arg); }
    else if (arg === "--num-ctx") { flags.numCtx = value(++i, arg); }
    else if (arg === "--max-steps") { flags.maxSteps = value(++i, arg); }
    else if (arg === "--tool-timeout") { flags.toolTimeout = value(++i, arg); }
    else if (arg === "--work-dir") { flags.workDir = value(++i, arg); }
    else if (arg === "--mcp-config") { mcpConfigPaths.push(value(++i, arg)); }
    else if (arg === "--native") { flags.native = value(++i, arg); }
    else if (arg === "--no-native") { flags.native = ""; }
    else if (arg === "--no-strict-tools") { flags.noStrictTools = "true"; }
    else if (arg === "--verbose") { flags.verbose = "true"; }
    else if (arg === "-V" || arg === "--version") { return { kind: "version" }; }
    else if (arg === "-h" || arg === "--help") { return { kind: "help" }; }
    else { Logger.warn(`Unknown argument: ${arg}`); }
  }

  const numCtx = parseNumber("--num-ctx", flags.numCtx, DEFAULT_NUM_CTX, { integer: true, min: 0 });

  return {
    kind: "run",
    config: {
      agent: {
        maxSteps: parseNumber("--max-steps", flags.maxSteps, DEFAULT_MAX_STEPS, { integer: true, min: 1 }),
        toolTimeoutMs: parseNumber("--tool-timeout", flags.toolTimeout, DEFAULT_TOOL_TIMEOUT_MS, { integer: true, min: 1 }),
        strictTools: flags.noStrictTools !== "true",
        llm: {
          modelId: flags.model || env.TASKER_MODEL || DEFAULT_MODEL_ID,
          baseUrl: flags.baseUrl || env.TASKER_BASE_URL || null,
          apiKey: env.TASKER_API_KEY || env.OPENAI_API_KEY || null,
          temperature: parseNumber("--temperature", flags.temperature, DEFAULT_TEMPERATURE, { min: 0 }),
          maxTokens: parseNumber("--max-tokens", flags.maxTokens, DEFAULT_MAX_TOKENS, { integer: true, min: 1 }),
          numCtx: numCtx === 0 ? null : numCtx,
          requestTimeoutMs: DEFAULT_REQUEST_TIMEOUT_MS,
        },
      },
      workingDirectory: resolve(cwd, flags.workDir ?? "."),
      nativeServers: flags.native !== undefined ? parseNativeList(flags.native) : [...NATIVE_SERVERS],
      mcpServers: loadMcpServers(mcpConfigPaths),
      verbose: flags.verbose === "true",
    },
  };
}

export function usage(): string {
  return `tasker ${getVersion()} — a terminal agent that works through MCP tools

usage:
  tasker [options]

options:
  -m, --model <id>        model id, provider-prefixed for Ollama
                          (default: ${DEFAULT_MODEL_ID}, env: TASKER_MODEL)
  --base-url <url>        backend URL (env: TASKER_BASE_URL)
  --temperature <n>       sampling temperature (default: ${DEFAULT_TEMPERATURE})
  --max-tokens <n>        max response tokens per completion (default: ${DEFAULT_MAX_TOKENS})
  --num-ctx <n>           context window for Ollama; 0 leaves the server default (default: ${DEFAULT_NUM_CTX})
  --max-steps <n>         completion requests allowed per turn (default: ${DEFAULT_MAX_STEPS})
  --tool-timeout <ms>     timeout for one tool call (default: ${DEFAULT_TOOL_TIMEOUT_MS})
  --work-dir <path>       directory the filesystem tools may write in (default: cwd)
  --mcp-config <src>      MCP servers from a JSON file or inline JSON; repeatable.
                          An entry's "prefix" exposes its tools as <prefix>_<tool>
  --native <list>         built-in servers to start, comma-separated
                          (default: ${NATIVE_SERVERS.join(",")})
  --no-native             start no built-in servers (same as --native "")
  --no-strict-tools       send tool schemas without strict mode
  --verbose               verbose output (debug logs need TASKER_LOG_LEVEL=DEBUG)
  -V, --version           show version
  -h, --help              show this help

API key: TASKER_API_KEY or OPENAI_API_KEY.
Type "quit" or "exit" to leave; Ctrl+C cancels a running turn, twice quits.`;
}
