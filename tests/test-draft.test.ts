import assert from "node:assert/strict";
import { readFile } from "node:fs/promises";
import path from "node:path";
import test from "node:test";

import { runTestDraft } from "../src/tools/test-draft.js";
import { createFakeGitHub } from "./helpers/fake-github.js";
import { createFakeChat, createTestToolContext } from "./helpers/tool-context.js";

const ENV = {
  OPENAI_API_KEY: "test-secret",
  GITHUB_TOKEN: "test-secret",
  REPO: "acme/widgets",
  PR_NUMBER: "7",
};

const MODEL_OUTPUT = [
  "Tests for the cache:",
  "",
  "```ts",
  'import test from "node:test";',
  "```",
].join("\n");

function file(filename: string, status = "modified") {
  return { filename, status, additions: 1, deletions: 0, patch: "+x" };
}

test("test draft filters files, saves the artifact and posts a short comment", async () => {
  const { context, logs } = await createTestToolContext(ENV);
  const github = createFakeGitHub({
    "GET /repos/acme/widgets/pulls/7": { title: "Add cache", body: "" },
    "GET /repos/acme/widgets/pulls/7/files?per_page=100": [
      file("src/cache.ts", "added"),
      file("src/cache.test.ts"),
      file("README.md"),
      file("src/legacy.ts", "removed"),
    ],
    "GET /repos/acme/widgets/issues/7/comments?per_page=100": [],
    "POST /repos/acme/widgets/issues/7/comments": { id: 40 },
  });
  const chat = createFakeChat(MODEL_OUTPUT);

  const outcome = await runTestDraft(context, {
    createGitHubClient: () => github.client,
    createChatClient: () => chat,
  });

  assert.deepEqual(outcome, { status: "completed", detail: "Created comment 40" });
  assert.ok(logs.includes("Found 1 relevant source files"));
  assert.ok(chat.requests[0]?.userPrompt.includes("- src/cache.ts"));
  assert.equal(chat.requests[0]?.userPrompt.includes("src/cache.test.ts"), false);

  const artifact = await readFile(path.join(context.cwd, "artifacts", "draft_tests.md"), "utf8");
  assert.ok(artifact.startsWith("# Draft Test Suggestions\n\n## PR: Add cache\n\n**Files analyzed:** 1\n"));
  assert.ok(artifact.includes(MODEL_OUTPUT));

  const posted = github.requests.at(-1)?.body;
  assert.ok(typeof posted === "object" && posted !== null && "body" in posted);
  assert.ok(String(posted.body).startsWith("<!-- ai-test-draft-bot -->\n\n## 🧪 Draft Test Suggestions\n"));
  assert.ok(String(posted.body).includes('```ts\nimport test from "node:test";\n```'));
});

test("test draft skips when no source file is relevant", async () => {
  const { context, annotations } = await createTestToolContext(ENV);
  const github = createFakeGitHub({
    "GET /repos/acme/widgets/pulls/7": { title: "Docs", body: null },
    "GET /repos/acme/widgets/pulls/7/files?per_page=100": [file("docs/guide.md")],
  });
  const chat = createFakeChat("unused");

  const outcome = await runTestDraft(context, {
    createGitHubClient: () => github.client,
    createChatClient: () => chat,
  });

  assert.deepEqual(outcome, { status: "skipped", reason: "no relevant source files" });
  assert.deepEqual(annotations, [
    "notice: No relevant source files found. Skipping test generation.",
  ]);
  assert.equal(chat.requests.length, 0);
});
