import { UpstreamServiceError } from "../../core/index.js";
import { callGitHub, mapPages, parseRepo, type GitHubClient } from "./github-client.js";
import { collectPages, paginate } from "./pagination.js";

const ASSOCIATED_PULLS_ACCEPT_HEADERS = ["application/vnd.github+json", "application/json"];
const COMMITS_PER_PAGE = 100;

export interface CommitSummary {
  sha: string;
  subject: string;
}

export interface AssociatedPullRequest {
  number: number;
  title: string;
}

export interface CommitRange {
  commits: CommitSummary[];
  totalCount: number;
}

export interface ReleaseUpsertOutcome {
  action: "created" | "updated";
  releaseId: number;
}

export async function listTagNames(client: GitHubClient, repo: string): Promise<string[]> {
  const { data } = await callGitHub(`GET ${repo} tags`, () =>
    client.rest.repos.listTags({ ...parseRepo(repo), per_page: 100 }),
  );
  return data.map((tag) => tag.name);
}

/** Tags come newest first; the previous tag is the one listed right after `currentTag`. */
export function findPreviousTag(tagNames: readonly string[], currentTag: string): string | undefined {
  const index = tagNames.indexOf(currentTag);
  if (index === -1) {
    return undefined;
  }
  return tagNames[index + 1];
}

export async function getCommitsBetween(params: {
  client: GitHubClient;
  repo: string;
  base?: string;
  head: string;
  maxCommits: number;
}): Promise<CommitRange> {
  const { client } = params;
  const coordinates = parseRepo(params.repo);

  if (params.base) {
    const basehead = `${params.base}...${params.head}`;
    const { data } = await callGitHub(`GET ${params.repo} compare ${basehead}`, () =>
      client.request("GET /repos/{owner}/{repo}/compare/{basehead}", { ...coordinates, basehead }),
    );
    return {
      commits: data.commits.slice(0, params.maxCommits).map(toCommitSummary),
      totalCount: data.total_commits,
    };
  }

  // Without a base the whole history is in range; only the first maxCommits are read.
  const perPage = Math.min(COMMITS_PER_PAGE, params.maxCommits);
  const { items } = await collectPages(
    () =>
      mapPages(
        client.paginate.iterator(client.rest.repos.listCommits, {
          ...coordinates,
          sha: params.head,
          per_page: perPage,
        }),
        `GET ${params.repo} commits`,
        toCommitSummary,
      ),
    { maxPages: Math.ceil(params.maxCommits / perPage) },
  );
  const commits = items.slice(0, params.maxCommits);
  return { commits, totalCount: commits.length };
}

/**
 * Looks up the pull request a commit landed through. Some hosts reject the
 * versioned media type on this endpoint, so an HTTP error moves on to the
 * next Accept header; transport failures propagate.
 */
export async function findPullRequestForCommit(
  client: GitHubClient,
  repo: string,
  sha: string,
): Promise<AssociatedPullRequest | undefined> {
  for (const accept of ASSOCIATED_PULLS_ACCEPT_HEADERS) {
    try {
      const { data } = await callGitHub(`GET ${repo} commit ${sha} pulls`, () =>
        client.rest.repos.listPullRequestsAssociatedWithCommit({
          ...parseRepo(repo),
          commit_sha: sha,
          headers: { accept },
        }),
      );
      const [pull] = data;
      return pull ? { number: pull.number, title: pull.title } : undefined;
    } catch (error) {
      if (error instanceof UpstreamServiceError && error.status !== undefined) {
        continue;
      }
      throw error;
    }
  }

  return undefined;
}

export async function buildChangesList(
  commits: readonly CommitSummary[],
  lookupPullRequest: (sha: string) => Promise<AssociatedPullRequest | undefined>,
): Promise<string> {
  const changes: string[] = [];

  for (const commit of commits) {
    const pull = await lookupPullRequest(commit.sha);
    if (pull && pull.title.trim()) {
      changes.push(`- ${pull.title.trim()} (#${pull.number})`);
      continue;
    }
    if (commit.subject) {
      changes.push(`- ${commit.subject}`);
    }
  }

  return changes.join("\n");
}

/**
 * Draft releases are invisible to `/releases/tags/{tag}`, so the existing
 * release is found by listing.
 */
export async function upsertDraftRelease(params: {
  client: GitHubClient;
  repo: string;
  tag: string;
  body: string;
}): Promise<ReleaseUpsertOutcome> {
  const { client } = params;
  const coordinates = parseRepo(params.repo);
  const pages = paginate(() =>
    mapPages(
      client.paginate.iterator(client.rest.repos.listReleases, { ...coordinates, per_page: 100 }),
      `GET ${params.repo} releases`,
      (release) => ({ id: release.id, tagName: release.tag_name }),
    ),
  );

  for await (const page of pages) {
    const existing = page.find((release) => release.tagName === params.tag);
    if (existing) {
      await callGitHub(`PATCH ${params.repo} release ${existing.id}`, () =>
        client.rest.repos.updateRelease({
          ...coordinates,
          release_id: existing.id,
          body: params.body,
          draft: true,
        }),
      );
      return { action: "updated", releaseId: existing.id };
    }
  }

  const { data } = await callGitHub(`POST ${params.repo} release`, () =>
    client.rest.repos.createRelease({
      ...coordinates,
      tag_name: params.tag,
      name: params.tag,
      body: params.body,
      draft: true,
    }),
  );
  return { action: "created", releaseId: data.id };
}

function toCommitSummary(commit: { sha: string; commit: { message: string } }): CommitSummary {
  return {
    sha: commit.sha,
    subject: (commit.commit.message.split("\n")[0] ?? "").trim(),
  };
}
