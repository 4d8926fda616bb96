/**
 * Built-in filesystem tools: view, insert, str_replace, create.
 *
 * Reads resolve relative to the working directory and may go anywhere;
 * writes must stay inside it. Failures are returned as "Error: ..." text,
 * which the model reads like any other result.
 */
import { existsSync, lstatSync, mkdirSync, readFileSync, readdirSync, readlinkSync, realpathSync, statSync, writeFileSync } from "node:fs";
import { basename, dirname, extname, isAbsolute, join, relative, resolve, sep } from "node:path";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { Logger } from "../logger.js";
import { asError } from "../errors.js";

const CONTEXT_LINES = 2;

type Resolved = { ok: true; path: string } | { ok: false; error: string };

const MAX_LINK_HOPS = 40;

/**
 * Follow symlinks in `path` as far as the filesystem has them. Components
 * that do not exist yet are appended unchanged; a dangling link is followed
 * to where it would create its target.
 */
export function realPathOf(path: string): string {
  const missing: string[] = [];
  let current = path;
  for (let hops = 0; ; ) {
    try {
      return join(realpathSync(current), ...missing.reverse());
    } catch (e: unknown) {
      if (errorCode(e) !== "ENOENT") throw e;
      const link = lstatSync(current, { throwIfNoEntry: false });
      if (link?.isSymbolicLink()) {
        if (++hops > MAX_LINK_HOPS) throw e;
        current = resolve(dirname(current), readlinkSync(current));
        continue;
      }
      const parent = dirname(current);
      if (parent === current) throw e;
      missing.push(basename(current));
      current = parent;
    }
  }
}

function isWithin(base: string, target: string): boolean {
  const rel = relative(base, target);
  return !(rel === ".." || rel.startsWith(`..${sep}`) || isAbsolute(rel));
}

/**
 * Resolve `path` against `root`. With `confine`, anything that lands
 * outside `root` once symlinks are followed is refused.
 */
export function resolveInRoot(root: string, path: string, confine: boolean): Resolved {
  const base = resolve(root);
  const target = isAbsolute(path) ? resolve(path) : resolve(base, path);
  if (confine) {
    let inside: boolean;
    try {
      inside = isWithin(realPathOf(base), realPathOf(target));
    } catch (e: unknown) {
      return { ok: false, error: `Error: Cannot resolve ${target}: ${asError(e).message}` };
    }
    if (!inside) {
      return { ok: false, error: `Error: Path must be within the configured root directory: ${target}` };
    }
  }
  return { ok: true, path: target };
}

/** `- dir/` followed by its immediate children, directories suffixed with `/`. */
export function formatDirectory(dir: string): string {
  const lines = [`- ${dir}/`];
  try {
    const entries = readdirSync(dir, { withFileTypes: true }).sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    for (const entry of entries) {
      lines.push(`  - ${entry.name}${entry.isDirectory() ? "/" : ""}`);
    }
  } catch (e: unknown) {
    Logger.debug(`view: cannot list ${dir}: ${asError(e).message}`);
    lines.push("  (Permission denied)");
  }
  return lines.join("\n");
}

/** Number lines from `offset + 1`, right-aligned to the widest number. */
export function numberLines(lines: string[], offset: number): string {
  const width = String(offset + lines.length).length;
  return lines.map((line, i) => `${String(offset + i + 1).padStart(width)}→${line}`).join("\n");
}

interface TextFile {
  lines: string[];
  trailingNewline: boolean;
}

function splitText(content: string): TextFile {
  if (content === "") return { lines: [], trailingNewline: false };
  const trailingNewline = content.endsWith("\n");
  const body = trailingNewline ? content.slice(0, -1) : content;
  return { lines: body.split(/\r?\n/), trailingNewline };
}

function joinText(file: TextFile): string {
  return file.lines.join("\n") + (file.trailingNewline ? "\n" : "");
}

const utf8 = new TextDecoder("utf-8", { fatal: true });

/** Read a file as UTF-8 text; null when the bytes are not valid UTF-8. */
function readText(path: string): string | null {
  try {
    return utf8.decode(readFileSync(path));
  } catch (e: unknown) {
    if (e instanceof TypeError) return null;
    throw e;
  }
}

function errorCode(e: unknown): string | undefined {
  const err = asError(e);
  return "code" in err && typeof err.code === "string" ? err.code : undefined;
}

function ioError(action: string, path: string, e: unknown): string {
  if (errorCode(e) === "EACCES" || errorCode(e) === "EPERM") return `Error: Permission denied: ${path}`;
  return `Error ${action} ${path}: ${asError(e).message}`;
}

export interface ViewArgs {
  path: string;
  /** [start, end], 1-indexed and inclusive; end -1 reads to the end. */
  view_range?: number[];
}

export function viewPath(root: string, args: ViewArgs): string {
  const resolved = resolveInRoot(root, args.path, false);
  if (!resolved.ok) return resolved.error;
  const path = resolved.path;

  try {
    if (!existsSync(path)) return `Error: Path not found: ${args.path}`;
    if (statSync(path).isDirectory()) return formatDirectory(path);

    const content = readText(path);
    if (content === null) {
      return `Error: This tool cannot read binary files. The file appears to be a binary ${extname(path)} file`;
    }
    const { lines } = splitText(content);
    if (!args.view_range) return numberLines(lines, 0);

    if (args.view_range.length !== 2) return "Error: view_range must contain exactly two integers [start, end]";
    const [startLine, endLine] = args.view_range;
    const startIdx = Math.max(0, startLine - 1);
    const endIdx = endLine === -1 ? lines.length : Math.min(lines.length, endLine);
    return numberLines(lines.slice(startIdx, endIdx), startIdx);
  } catch (e: unknown) {
    return ioError("reading", path, e);
  }
}

type Editable = { ok: true; path: string; file: TextFile } | { ok: false; error: string };

function openForEditing(root: string, path: string): Editable {
  const resolved = resolveInRoot(root, path, true);
  if (!resolved.ok) return resolved;
  const target = resolved.path;
  try {
    if (!existsSync(target)) return { ok: false, error: `Error: File not found at ${target}` };
    if (statSync(target).isDirectory()) return { ok: false, error: `Error: Cannot edit directory: ${target}` };
    const content = readText(target);
    if (content === null) {
      return { ok: false, error: `Error: Cannot edit binary files. The file appears to be a binary ${extname(target)} file` };
    }
    return { ok: true, path: target, file: splitText(content) };
  } catch (e: unknown) {
    return { ok: false, error: ioError("reading", target, e) };
  }
}

function excerpt(lines: string[], around: number): string {
  const start = Math.max(0, around - CONTEXT_LINES);
  const end = Math.min(lines.length, around + CONTEXT_LINES + 1);
  return numberLines(lines.slice(start, end), start);
}

export interface InsertArgs {
  path: string;
  /** Line after which to insert; 0 inserts at the top. */
  insert_line: number;
  new_str: string;
}

export function insertText(root: string, args: InsertArgs): string {
  const opened = openForEditing(root, args.path);
  if (!opened.ok) return opened.error;
  const { path, file } = opened;

  if (args.insert_line < 0) return `Error: insert_line must be >= 0, got ${args.insert_line}`;
  const at = Math.min(args.insert_line, file.lines.length);

  try {
    const lines = [...file.lines.slice(0, at), args.new_str, ...file.lines.slice(at)];
    writeFileSync(path, joinText({ lines, trailingNewline: file.trailingNewline }), "utf-8");
    return `Successfully inserted text at line ${at} in ${path}:\n${excerpt(lines, at)}`;
  } catch (e: unknown) {
    return ioError("inserting into", path, e);
  }
}

export interface StrReplaceArgs {
  path: string;
  old_str: string;
  new_str: string;
  replace_all?: boolean;
}

function countOccurrences(haystack: string, needle: string): number {
  let count = 0;
  for (let i = haystack.indexOf(needle); i !== -1; i = haystack.indexOf(needle, i + needle.length)) count++;
  return count;
}

export function replaceText(root: string, args: StrReplaceArgs): string {
  const opened = openForEditing(root, args.path);
  if (!opened.ok) return opened.error;
  const { path, file } = opened;
  const content = joinText(file);

  if (args.old_str === "" || !content.includes(args.old_str)) {
    return `Error: String not found in ${args.path}: '${args.old_str}'`;
  }
  const occurrences = countOccurrences(content, args.old_str);
  const replaceAll = args.replace_all ?? false;
  if (!replaceAll && occurrences > 1) {
    return `Error: replace_all is false, but ${occurrences} occurrences were found. Set replace_all to true to replace all of them, or make old_str more specific to replace only one.`;
  }

  try {
    const updated = replaceAll
      ? content.split(args.old_str).join(args.new_str)
      : content.replace(args.old_str, () => args.new_str);
    writeFileSync(path, updated, "utf-8");

    const before = file.lines;
    const after = splitText(updated).lines;
    let changed = 0;
    while (changed < Math.min(before.length, after.length) && before[changed] === after[changed]) changed++;
    if (changed === Math.min(before.length, after.length)) changed = Math.max(0, Math.min(changed, after.length - 1));

    const header = replaceAll
      ? `Successfully replaced ${occurrences} occurrences in ${path}:`
      : `Successfully replaced text in ${path}:`;
    return `${header}\n${excerpt(after, changed)}`;
  } catch (e: unknown) {
    return ioError("replacing in", path, e);
  }
}

export interface CreateArgs {
  path: string;
  file_text: string;
}

export function createFile(root: string, args: CreateArgs): string {
  const resolved = resolveInRoot(root, args.path, true);
  if (!resolved.ok) return resolved.error;
  const path = resolved.path;
  try {
    if (existsSync(path) && statSync(path).isDirectory()) return `Error: Cannot create file at directory: ${path}`;
    if (existsSync(path)) return `Error: File already exists at ${path} use str_replace or insert to modify it.`;
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, args.file_text, "utf-8");
    return `File successfully created at ${path}`;
  } catch (e: unknown) {
    return ioError("creating", path, e);
  }
}

function text(s: string) {
  return { content: [{ type: "text" as const, text: s }] };
}

export const FILESYSTEM_INSTRUCTIONS =
  "Reads and edits files. Paths may be relative to the working directory; edits and new files must stay inside it.";

export function createFilesystemServer(opts: { workingDirectory: string }): McpServer {
  const root = resolve(opts.workingDirectory);
  const server = new McpServer(
    { name: "FilesystemServer", version: "0.1.0" },
    { instructions: FILESYSTEM_INSTRUCTIONS },
  );

  server.registerTool(
    "view",
    {
      description:
        "Examine a file's contents (with line numbers) or list a directory. " +
        "Reads the whole file or a range of lines.",
      inputSchema: {
        path: z.string().describe("File or directory to view, absolute or relative to the working directory"),
        view_range: z.array(z.number().int()).optional()
          .describe("[start, end] line numbers, 1-indexed and inclusive; -1 as end reads to the end. Files only."),
      },
    },
    async ({ path, view_range }) => text(viewPath(root, { path, view_range })),
  );

  server.registerTool(
    "insert",
    {
      description: "Insert text after a given line of a file inside the working directory.",
      inputSchema: {
        path: z.string().describe("File to modify"),
        insert_line: z.number().int().describe("Line after which to insert (0 for the beginning of the file)"),
        new_str: z.string().describe("Text to insert"),
      },
    },
    async ({ path, insert_line, new_str }) => text(insertText(root, { path, insert_line, new_str })),
  );

  server.registerTool(
    "str_replace",
    {
      description: "Replace an exact string in a file inside the working directory. Used for precise edits.",
      inputSchema: {
        path: z.string().describe("File to modify"),
        old_str: z.string().describe("Text to replace; must match exactly, whitespace and indentation included"),
        new_str: z.string().describe("Replacement text"),
        replace_all: z.boolean().optional().describe("Replace every occurrence instead of requiring exactly one"),
      },
    },
    async ({ path, old_str, new_str, replace_all }) => text(replaceText(root, { path, old_str, new_str, replace_all })),
  );

  server.registerTool(
    "create",
    {
      description: "Create a new file inside the working directory. Fails if the file already exists.",
      inputSchema: {
        path: z.string().describe("Path of the new file"),
        file_text: z.string().describe("Content of the new file"),
      },
    },
    async ({ path, file_text }) => text(createFile(root, { path, file_text })),
  );

  return server;
}
