export { McpManager, prefixedName } from "./client.js";
export type { AttachOptions, McpServerConfig, ToolDescriptor, ContentBlock, CallToolOptions, ToolTransport } from "./client.js";
