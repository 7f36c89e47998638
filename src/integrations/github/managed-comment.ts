export interface ManagedComment {
  id: number;
  body: string;
}

/**
 * The three operations reconciliation needs from a comment host. `listComments`
 * returns pages in listing order and may be iterated more than once.
 */
export interface CommentStore {
  listComments(): AsyncIterable<ManagedComment[]>;
  createComment(body: string): Promise<{ id: number }>;
  updateComment(id: number, body: string): Promise<void>;
}

export type ReconcileAction = "created" | "updated";

export interface ReconcileOutcome {
  action: ReconcileAction;
  commentId: number;
}

export const MANAGED_COMMENT_SEPARATOR = "\n\n";

export function createCommentMarker(name: string): string {
  const normalized = name.trim().toLowerCase().replace(/[^a-z0-9._-]+/g, "-");
  if (!normalized || normalized.replace(/-/g, "") === "") {
    throw new RangeError(`invalid comment marker name: ${JSON.stringify(name)}`);
  }
  return `<!-- ${normalized} -->`;
}

export function composeManagedCommentBody(marker: string, body: string): string {
  return `${marker}${MANAGED_COMMENT_SEPARATOR}${body}`;
}

export async function findManagedComment(
  pages: AsyncIterable<ManagedComment[]>,
  marker: string,
): Promise<ManagedComment | undefined> {
  for await (const page of pages) {
    const existing = page.find((comment) => comment.body.includes(marker));
    if (existing) {
      return existing;
    }
  }
  return undefined;
}

/**
 * Keeps one comment per marker on the resource: updates the first comment that
 * carries the marker, or creates one when none does. Not safe against a
 * concurrent caller reconciling the same marker; both may create.
 */
export async function reconcileManagedComment(params: {
  store: CommentStore;
  marker: string;
  body: string;
}): Promise<ReconcileOutcome> {
  const existing = await findManagedComment(params.store.listComments(), params.marker);
  const fullBody = composeManagedCommentBody(params.marker, params.body);

  if (existing) {
    await params.store.updateComment(existing.id, fullBody);
    return { action: "updated", commentId: existing.id };
  }

  const created = await params.store.createComment(fullBody);
  return { action: "created", commentId: created.id };
}
