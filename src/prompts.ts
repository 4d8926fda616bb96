import { readFileSync } from "node:fs";
import { join } from "node:path";
import { findPackageRoot } from "./utils/package-root.js";

export interface SystemPromptVars {
  workingDirectory: string;
  mcpInstructions: string;
  /** Defaults to today, YYYY-MM-DD. */
  currentDate?: string;
  knowledgeCutoff?: string;
}

export const TEMPLATE_PATH = join(findPackageRoot(), "prompts", "system.md");

let cachedTemplate: string | null = null;

export function loadSystemTemplate(): string {
  if (cachedTemplate === null) cachedTemplate = readFileSync(TEMPLATE_PATH, "utf-8").trimEnd();
  return cachedTemplate;
}

/** Replace {{name}} placeholders; unknown names are left as written. */
export function renderTemplate(template: string, vars: Record<string, string>): string {
  return template.replace(/\{\{\s*([a-z_]+)\s*\}\}/g, (whole, key: string) =>
    Object.prototype.hasOwnProperty.call(vars, key) ? vars[key] : whole);
}

export function buildSystemPrompt(vars: SystemPromptVars): string {
  return renderTemplate(loadSystemTemplate(), {
    knowledge_cutoff: vars.knowledgeCutoff ?? "unknown",
    current_date: vars.currentDate ?? new Date().toISOString().slice(0, 10),
    working_directory: vars.workingDirectory,
    mcp_instructions: vars.mcpInstructions || "(none)",
  });
}
