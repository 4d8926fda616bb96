import { test, describe } from "node:test";
import assert from "node:assert";
import { buildSystemPrompt, loadSystemTemplate, renderTemplate } from "../src/prompts.js";

describe("renderTemplate", () => {
  test("replaces known placeholders and tolerates inner spaces", () => {
    assert.strictEqual(renderTemplate("a {{x}} b {{ y }}", { x: "1", y: "2" }), "a 1 b 2");
  });

  test("unknown placeholders are left as written", () => {
    assert.strictEqual(renderTemplate("{{x}} {{missing}}", { x: "1" }), "1 {{missing}}");
  });

  test("replacement text is inserted literally", () => {
    assert.strictEqual(renderTemplate("{{x}}", { x: "$& $1" }), "$& $1");
  });
});

describe("buildSystemPrompt", () => {
  test("the shipped template has every placeholder", () => {
    const template = loadSystemTemplate();
    for (const key of ["knowledge_cutoff", "current_date", "working_directory", "mcp_instructions"]) {
      assert.ok(template.includes(`{{${key}}}`), `template should contain {{${key}}}`);
    }
  });

  test("fills working directory, date and server instructions", () => {
    const prompt = buildSystemPrompt({
      workingDirectory: "/home/user/project",
      mcpInstructions: "## FilesystemServer Server\nReads and edits files.",
      currentDate: "2026-01-02",
      knowledgeCutoff: "2024-06",
    });
    assert.ok(prompt.includes("Working directory: /home/user/project"));
    assert.ok(prompt.includes("Current date: 2026-01-02"));
    assert.ok(prompt.includes("Knowledge cutoff: 2024-06"));
    assert.ok(prompt.endsWith("## FilesystemServer Server\nReads and edits files."));
    assert.strictEqual(prompt.includes("{{"), false);
  });

  test("no server instructions renders as (none)", () => {
    const prompt = buildSystemPrompt({ workingDirectory: "/w", mcpInstructions: "" });
    assert.ok(prompt.endsWith("# Enabled Servers\n(none)"));
    assert.ok(prompt.includes("Knowledge cutoff: unknown"));
  });
});
