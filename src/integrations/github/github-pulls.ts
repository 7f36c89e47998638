import type { FileChange, PullRequestData } from "../../review/review-types.js";
import { callGitHub, mapPages, parseRepo, type GitHubClient } from "./github-client.js";
import { collectPages, type PaginateOptions } from "./pagination.js";

// GitHub stops listing pull request files after 3000 entries.
export const PULL_FILE_MAX_PAGES = 30;

export interface PullRequestFiles {
  files: FileChange[];
  reachedPageLimit: boolean;
}

export async function listPullRequestFiles(params: {
  client: GitHubClient;
  repo: string;
  pullNumber: number;
  pagination?: PaginateOptions;
}): Promise<PullRequestFiles> {
  const { client, pullNumber } = params;
  const collected = await collectPages<FileChange>(
    () =>
      mapPages(
        client.paginate.iterator(client.rest.pulls.listFiles, {
          ...parseRepo(params.repo),
          pull_number: pullNumber,
          per_page: 100,
        }),
        `GET ${params.repo}#${pullNumber} files`,
        (file) => ({
          path: file.filename,
          status: file.status,
          additions: file.additions,
          deletions: file.deletions,
          patch: file.patch,
        }),
      ),
    { maxPages: PULL_FILE_MAX_PAGES, ...params.pagination },
  );

  return { files: collected.items, reachedPageLimit: collected.reachedPageLimit };
}

export async function fetchPullRequestData(params: {
  client: GitHubClient;
  repo: string;
  pullNumber: number;
}): Promise<PullRequestData & { reachedPageLimit: boolean }> {
  const { data: pull } = await callGitHub(`GET ${params.repo}#${params.pullNumber}`, () =>
    params.client.rest.pulls.get({ ...parseRepo(params.repo), pull_number: params.pullNumber }),
  );
  const { files, reachedPageLimit } = await listPullRequestFiles(params);

  return {
    title: pull.title,
    body: pull.body ?? "",
    files,
    reachedPageLimit,
  };
}
