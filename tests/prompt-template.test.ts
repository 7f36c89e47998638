import assert from "node:assert/strict";
import { mkdtemp, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import test from "node:test";
import { fileURLToPath } from "node:url";

import {
  DEFAULT_PROMPTS_DIR,
  formatPromptTemplate,
  loadPromptTemplate,
} from "../src/review/prompt-template.js";

test("formatPromptTemplate substitutes known keys once and keeps unknown ones", () => {
  assert.equal(
    formatPromptTemplate("{title} has {file_count} files; {missing}", {
      title: "PR uses {file_count}",
      file_count: 3,
    }),
    "PR uses {file_count} has 3 files; {missing}",
  );
});

test("loadPromptTemplate reads the template from the directory", async () => {
  const directory = await mkdtemp(path.join(os.tmpdir(), "prguard-prompts-"));
  await writeFile(path.join(directory, "custom.md"), "Hello {name}");

  assert.equal(await loadPromptTemplate("custom.md", "fallback", { directory }), "Hello {name}");
});

test("loadPromptTemplate falls back and reports a missing template", async () => {
  const directory = await mkdtemp(path.join(os.tmpdir(), "prguard-prompts-"));
  const missing: string[] = [];

  const template = await loadPromptTemplate("absent.md", "fallback {x}", {
    directory,
    onMissing: (templatePath) => missing.push(templatePath),
  });

  assert.equal(template, "fallback {x}");
  assert.deepEqual(missing, [path.join(directory, "absent.md")]);
});

test("bundled prompt templates carry their placeholders", async () => {
  const summary = await loadPromptTemplate("pr_summary.md", "");
  const tests = await loadPromptTemplate("test_generation.md", "");
  const release = await loadPromptTemplate("release_notes.md", "");

  assert.equal(DEFAULT_PROMPTS_DIR, fileURLToPath(new URL("../prompts", import.meta.url)));
  for (const key of ["{title}", "{body}", "{file_count}", "{diff_content}"]) {
    assert.ok(summary.includes(key), key);
  }
  for (const key of ["{pr_title}", "{file_count}", "{file_list}", "{file_details}"]) {
    assert.ok(tests.includes(key), key);
  }
  for (const key of ["{tag}", "{changes}", "{context_note}"]) {
    assert.ok(release.includes(key), key);
  }
});
