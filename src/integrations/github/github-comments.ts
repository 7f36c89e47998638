import { callGitHub, mapPages, parseRepo, type GitHubClient } from "./github-client.js";
import type { CommentStore, ManagedComment } from "./managed-comment.js";
import { paginate, type PaginateOptions } from "./pagination.js";

/**
 * Issue comments as a reconcile store. The listing reads every page unless
 * `pagination.maxPages` says otherwise: a marker comment past a cut-off would
 * be missed and duplicated.
 */
export function createIssueCommentStore(params: {
  client: GitHubClient;
  repo: string;
  issueNumber: number;
  pagination?: PaginateOptions;
}): CommentStore {
  const { client, issueNumber } = params;
  const coordinates = parseRepo(params.repo);
  const listing = `GET ${params.repo}#${issueNumber} comments`;

  return {
    listComments() {
      return paginate<ManagedComment>(
        () =>
          mapPages(
            client.paginate.iterator(client.rest.issues.listComments, {
              ...coordinates,
              issue_number: issueNumber,
              per_page: 100,
            }),
            listing,
            (comment) => ({ id: comment.id, body: comment.body ?? "" }),
          ),
        params.pagination,
      );
    },

    async createComment(body) {
      const { data } = await callGitHub(`POST ${params.repo}#${issueNumber} comment`, () =>
        client.rest.issues.createComment({ ...coordinates, issue_number: issueNumber, body }),
      );
      return { id: data.id };
    },

    async updateComment(id, body) {
      await callGitHub(`PATCH ${params.repo} comment ${id}`, () =>
        client.rest.issues.updateComment({ ...coordinates, comment_id: id, body }),
      );
    },
  };
}
