import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { AttachOptions, McpManager } from "../mcp/index.js";
import { createFilesystemServer } from "./filesystem.js";
import { createWebServer } from "./web.js";

export { createFilesystemServer } from "./filesystem.js";
export { createWebServer, fetchUrl } from "./web.js";

export const NATIVE_SERVERS = ["filesystem", "web"] as const;

export type NativeServerName = (typeof NATIVE_SERVERS)[number];

export function isNativeServerName(v: string): v is NativeServerName {
  return NATIVE_SERVERS.some((n) => n === v);
}

/** Run `server` in-process and attach it to `manager` under `name`. */
export async function attachInProcess(
  manager: McpManager,
  name: string,
  server: McpServer,
  opts: AttachOptions = {},
): Promise<void> {
  const [clientSide, serverSide] = InMemoryTransport.createLinkedPair();
  await server.connect(serverSide);
  await manager.attach(name, clientSide, opts);
}

/** Start the built-in servers named in `enabled` (all of them by default). */
export async function attachNativeServers(
  manager: McpManager,
  opts: { workingDirectory: string; enabled?: readonly NativeServerName[] },
): Promise<void> {
  const enabled = new Set(opts.enabled ?? NATIVE_SERVERS);
  if (enabled.has("filesystem")) {
    await attachInProcess(manager, "filesystem", createFilesystemServer(opts), { native: true });
  }
  if (enabled.has("web")) {
    await attachInProcess(manager, "web", createWebServer(), { native: true });
  }
}
