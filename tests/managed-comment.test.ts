import assert from "node:assert/strict";
import test from "node:test";

import {
  composeManagedCommentBody,
  createCommentMarker,
  paginate,
  reconcileManagedComment,
  type CommentStore,
  type ManagedComment,
  type PageResponse,
} from "../src/integrations/github/index.js";

const MARKER = "<!-- ai-pr-summary-bot -->";

class InMemoryCommentStore implements CommentStore {
  readonly comments: ManagedComment[];
  readonly pagesRequested: number[] = [];
  readonly created: string[] = [];
  readonly updated: Array<{ id: number; body: string }> = [];
  private nextId = 1000;

  constructor(comments: ManagedComment[], private readonly perPage = 2) {
    this.comments = comments;
  }

  listComments(): AsyncIterable<ManagedComment[]> {
    return paginate(() => this.pages());
  }

  async createComment(body: string): Promise<{ id: number }> {
    this.created.push(body);
    this.nextId += 1;
    this.comments.push({ id: this.nextId, body });
    return { id: this.nextId };
  }

  async updateComment(id: number, body: string): Promise<void> {
    this.updated.push({ id, body });
    const comment = this.comments.find((candidate) => candidate.id === id);
    if (comment) {
      comment.body = body;
    }
  }

  private async *pages(): AsyncGenerator<PageResponse<ManagedComment>> {
    for (let start = 0, page = 1; start < this.comments.length; start += this.perPage, page += 1) {
      this.pagesRequested.push(page);
      const more = start + this.perPage < this.comments.length;
      yield {
        data: this.comments.slice(start, start + this.perPage).map((comment) => ({ ...comment })),
        headers: more ? { link: `<https://api.example.test/comments?page=${page + 1}>; rel="next"` } : {},
      };
    }
  }
}

test("createCommentMarker normalizes the name into an html comment", () => {
  assert.equal(createCommentMarker("AI PR Summary Bot"), MARKER);
  assert.equal(createCommentMarker("ai-test-draft-bot"), "<!-- ai-test-draft-bot -->");
  assert.throws(() => createCommentMarker("   "), RangeError);
  assert.throws(() => createCommentMarker("!!!"), RangeError);
});

test("reconcile creates a comment when none carries the marker", async () => {
  const store = new InMemoryCommentStore([
    { id: 1, body: "looks good" },
    { id: 2, body: "<!-- other-bot -->\n\nhello" },
  ]);

  const outcome = await reconcileManagedComment({ store, marker: MARKER, body: "summary" });

  assert.deepEqual(outcome, { action: "created", commentId: 1001 });
  assert.deepEqual(store.created, [`${MARKER}\n\nsummary`]);
  assert.deepEqual(store.updated, []);
});

test("reconcile updates the existing marked comment", async () => {
  const store = new InMemoryCommentStore([
    { id: 1, body: "first" },
    { id: 2, body: "second" },
    { id: 3, body: `${MARKER}\n\nold summary` },
  ]);

  const outcome = await reconcileManagedComment({ store, marker: MARKER, body: "new summary" });

  assert.deepEqual(outcome, { action: "updated", commentId: 3 });
  assert.deepEqual(store.updated, [{ id: 3, body: composeManagedCommentBody(MARKER, "new summary") }]);
  assert.deepEqual(store.created, []);
});

test("reconcile touches only the first marked comment and stops listing there", async () => {
  const store = new InMemoryCommentStore([
    { id: 1, body: `${MARKER}\n\nfirst` },
    { id: 2, body: "noise" },
    { id: 3, body: "noise" },
    { id: 4, body: `${MARKER}\n\nduplicate` },
  ]);

  const outcome = await reconcileManagedComment({ store, marker: MARKER, body: "fresh" });

  assert.deepEqual(outcome, { action: "updated", commentId: 1 });
  assert.deepEqual(store.updated.map((update) => update.id), [1]);
  assert.deepEqual(store.pagesRequested, [1]);
});

test("reconcile run twice leaves a single managed comment", async () => {
  const store = new InMemoryCommentStore([]);

  const first = await reconcileManagedComment({ store, marker: MARKER, body: "v1" });
  const second = await reconcileManagedComment({ store, marker: MARKER, body: "v2" });

  assert.equal(first.action, "created");
  assert.deepEqual(second, { action: "updated", commentId: first.commentId });
  assert.equal(store.comments.length, 1);
  assert.equal(store.comments[0]?.body, composeManagedCommentBody(MARKER, "v2"));
  assert.equal(store.created.length, 1);
});

test("reconcile propagates listing failures without creating a comment", async () => {
  const store = new InMemoryCommentStore([]);
  store.listComments = () =>
    paginate(async function* (): AsyncGenerator<PageResponse<ManagedComment>> {
      throw new Error("listing failed");
    });

  await assert.rejects(
    () => reconcileManagedComment({ store, marker: MARKER, body: "x" }),
    /listing failed/,
  );
  assert.deepEqual(store.created, []);
});
