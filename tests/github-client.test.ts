import assert from "node:assert/strict";
import test from "node:test";

import { UpstreamServiceError } from "../src/core/errors.js";
import {
  createGitHubClient,
  createIssueCommentStore,
  fetchPullRequestData,
  parseRepo,
  reconcileManagedComment,
} from "../src/integrations/github/index.js";
import { createFakeGitHub, FakeReply, FakeSequence, linkedPages } from "./helpers/fake-github.js";

test("github client sends the token to the configured base url", async () => {
  let seenUrl = "";
  let seenHeaders: Headers | undefined;
  const client = createGitHubClient({
    token: "test-secret",
    baseUrl: "https://github.example.test/api/",
    retry: {
      retries: 0,
      timeoutMs: 1_000,
      fetch: async (input, init) => {
        seenUrl = String(input);
        seenHeaders = new Headers(init?.headers);
        return new Response(JSON.stringify({ title: "Add cache", body: null }), {
          status: 200,
          headers: { "content-type": "application/json" },
        });
      },
    },
  });

  const { data } = await client.rest.pulls.get({ owner: "acme", repo: "widgets", pull_number: 7 });

  assert.equal(data.title, "Add cache");
  assert.equal(seenUrl, "https://github.example.test/api/repos/acme/widgets/pulls/7");
  assert.equal(seenHeaders?.get("authorization"), "token test-secret");
  assert.equal(seenHeaders?.get("accept"), "application/vnd.github.v3+json");
});

test("github error responses become upstream errors carrying the status and api message", async () => {
  const github = createFakeGitHub({
    "POST /repos/acme/widgets/issues/7/comments": new FakeReply(403, {
      message: "Resource not accessible",
    }),
  });
  const store = createIssueCommentStore({ client: github.client, repo: "acme/widgets", issueNumber: 7 });

  await assert.rejects(
    () => store.createComment("hello"),
    (error: unknown) => {
      assert.ok(error instanceof UpstreamServiceError);
      assert.equal(error.service, "github");
      assert.equal(error.status, 403);
      assert.equal(
        error.message,
        "GitHub POST acme/widgets#7 comment returned 403: Resource not accessible",
      );
      return true;
    },
  );
});

test("github transport failures become upstream errors without a status", async () => {
  const client = createGitHubClient({
    token: "test-secret",
    retry: {
      retries: 0,
      timeoutMs: 1_000,
      fetch: async () => {
        throw new TypeError("socket hang up");
      },
    },
  });
  const store = createIssueCommentStore({ client, repo: "acme/widgets", issueNumber: 7 });

  await assert.rejects(
    () => store.updateComment(5, "edited"),
    (error: unknown) => {
      assert.ok(error instanceof UpstreamServiceError);
      assert.equal(error.status, undefined);
      assert.equal(error.message, "GitHub PATCH acme/widgets comment 5 failed: socket hang up");
      return true;
    },
  );
});

test("fetchPullRequestData follows every linked file page and maps null bodies", async () => {
  const github = createFakeGitHub({
    "GET /repos/acme/widgets/pulls/7": { title: "Add cache", body: null },
    ...linkedPages("/repos/acme/widgets/pulls/7/files?per_page=100", [
      [{ filename: "src/cache.ts", status: "modified", additions: 1, deletions: 0, patch: "+x" }],
      [{ filename: "assets/logo.png", status: "added", additions: 0, deletions: 0 }],
    ]),
  });

  const pull = await fetchPullRequestData({ client: github.client, repo: "acme/widgets", pullNumber: 7 });

  assert.equal(pull.title, "Add cache");
  assert.equal(pull.body, "");
  assert.deepEqual(
    pull.files.map((file) => file.path),
    ["src/cache.ts", "assets/logo.png"],
  );
  assert.equal(pull.files[1]?.patch, undefined);
  assert.equal(pull.reachedPageLimit, false);
  assert.deepEqual(
    github.requests.map((request) => request.path),
    [
      "/repos/acme/widgets/pulls/7",
      "/repos/acme/widgets/pulls/7/files?per_page=100",
      "/repos/acme/widgets/pulls/7/files?per_page=100&page=2",
    ],
  );
});

test("issue comment store lists, creates and updates through the rest endpoints", async () => {
  const github = createFakeGitHub({
    "GET /repos/acme/widgets/issues/7/comments?per_page=100": [
      { id: 11, body: null },
      { id: 12, body: "hello" },
    ],
    "POST /repos/acme/widgets/issues/7/comments": new FakeReply(201, { id: 13 }),
    "PATCH /repos/acme/widgets/issues/comments/12": { id: 12 },
  });
  const store = createIssueCommentStore({ client: github.client, repo: "acme/widgets", issueNumber: 7 });

  const pages: unknown[] = [];
  for await (const page of store.listComments()) {
    pages.push(page);
  }
  assert.deepEqual(pages, [[{ id: 11, body: "" }, { id: 12, body: "hello" }]]);

  assert.deepEqual(await store.createComment("new"), { id: 13 });
  await store.updateComment(12, "edited");
  assert.deepEqual(
    github.requests.slice(1).map((request) => [request.method, request.path, request.body]),
    [
      ["POST", "/repos/acme/widgets/issues/7/comments", { body: "new" }],
      ["PATCH", "/repos/acme/widgets/issues/comments/12", { body: "edited" }],
    ],
  );
});

test("a comment create that fails with 502 is not sent again", async () => {
  const github = createFakeGitHub({
    "GET /repos/acme/widgets/issues/7/comments?per_page=100": [],
    "POST /repos/acme/widgets/issues/7/comments": new FakeSequence([
      new FakeReply(502, { message: "Bad Gateway" }),
      new FakeReply(201, { id: 40 }),
    ]),
  });
  const store = createIssueCommentStore({ client: github.client, repo: "acme/widgets", issueNumber: 7 });

  await assert.rejects(
    () => reconcileManagedComment({ store, marker: "<!-- ai-pr-summary-bot -->", body: "summary" }),
    (error: unknown) => error instanceof UpstreamServiceError && error.status === 502,
  );
  assert.equal(github.requests.filter((request) => request.method === "POST").length, 1);
});

test("comment reads are retried after a 502", async () => {
  const github = createFakeGitHub({
    "GET /repos/acme/widgets/issues/7/comments?per_page=100": new FakeSequence([
      new FakeReply(502, { message: "Bad Gateway" }),
      new FakeReply(200, [{ id: 5, body: "<!-- ai-pr-summary-bot -->\n\nold" }]),
    ]),
    "PATCH /repos/acme/widgets/issues/comments/5": { id: 5 },
  });
  const store = createIssueCommentStore({ client: github.client, repo: "acme/widgets", issueNumber: 7 });

  const outcome = await reconcileManagedComment({
    store,
    marker: "<!-- ai-pr-summary-bot -->",
    body: "new",
  });

  assert.deepEqual(outcome, { action: "updated", commentId: 5 });
  assert.deepEqual(
    github.requests.map((request) => request.method),
    ["GET", "GET", "PATCH"],
  );
});

test("the marker scan reads past twenty pages of comments", async () => {
  const pages = Array.from({ length: 25 }, (_, index) => [{ id: index + 1, body: `comment ${index + 1}` }]);
  pages[24] = [{ id: 25, body: "<!-- ai-pr-summary-bot -->\n\nold" }];
  const github = createFakeGitHub({
    ...linkedPages("/repos/acme/widgets/issues/7/comments?per_page=100", pages),
    "PATCH /repos/acme/widgets/issues/comments/25": { id: 25 },
  });
  const store = createIssueCommentStore({ client: github.client, repo: "acme/widgets", issueNumber: 7 });

  const outcome = await reconcileManagedComment({
    store,
    marker: "<!-- ai-pr-summary-bot -->",
    body: "new",
  });

  assert.deepEqual(outcome, { action: "updated", commentId: 25 });
  assert.equal(github.requests.filter((request) => request.method === "POST").length, 0);
});

test("parseRepo splits owner and name", () => {
  assert.deepEqual(parseRepo("acme/widgets"), { owner: "acme", repo: "widgets" });
  assert.deepEqual(parseRepo("acme"), { owner: "acme", repo: "" });
});
