import { Octokit } from "@octokit/rest";
import { RequestError } from "@octokit/request-error";

import {
  fetchWithRetry,
  getErrorMessage,
  readNumberEnv,
  UpstreamServiceError,
  type FetchLike,
  type FetchRetryOptions,
} from "../../core/index.js";
import type { PageResponse } from "./pagination.js";

export type GitHubClient = Octokit;

export interface GitHubClientOptions {
  token: string;
  baseUrl?: string;
  retry?: FetchRetryOptions;
}

/**
 * Octokit whose requests go through `fetchWithRetry`, so reads get timeouts and
 * retries while creates are sent once.
 */
export function createGitHubClient(options: GitHubClientOptions): GitHubClient {
  const retry: FetchRetryOptions = {
    timeoutMs: readNumberEnv("GITHUB_HTTP_TIMEOUT_MS", 30_000),
    ...options.retry,
  };
  const retryingFetch: FetchLike = (input, init) => fetchWithRetry(input, init, retry);

  return new Octokit({
    auth: options.token,
    userAgent: "prguard",
    ...(options.baseUrl ? { baseUrl: options.baseUrl.replace(/\/+$/, "") } : {}),
    request: { fetch: retryingFetch },
  });
}

export interface RepoCoordinates {
  owner: string;
  repo: string;
}

export function parseRepo(repo: string): RepoCoordinates {
  const [owner = "", name = ""] = repo.split("/");
  return { owner, repo: name };
}

/**
 * Runs one GitHub call and rewraps its failure. `status` is set only when the
 * API answered; transport failures carry none.
 */
export async function callGitHub<T>(operation: string, work: () => Promise<T>): Promise<T> {
  try {
    return await work();
  } catch (error) {
    throw toUpstreamError(operation, error);
  }
}

export function toUpstreamError(operation: string, error: unknown): UpstreamServiceError {
  if (error instanceof UpstreamServiceError) {
    return error;
  }
  if (error instanceof RequestError && error.response) {
    return new UpstreamServiceError(
      "github",
      `GitHub ${operation} returned ${error.status}: ${readApiMessage(error)}`,
      { status: error.status, cause: error },
    );
  }
  return new UpstreamServiceError(
    "github",
    `GitHub ${operation} failed: ${readTransportMessage(error)}`,
    { cause: error },
  );
}

/** Maps each page's items and rewraps a failed page fetch. */
export async function* mapPages<Source, Target>(
  pages: AsyncIterable<PageResponse<Source>>,
  operation: string,
  map: (item: Source) => Target,
): AsyncGenerator<PageResponse<Target>> {
  const iterator = pages[Symbol.asyncIterator]();
  try {
    while (true) {
      const next = await callGitHub(operation, () => iterator.next());
      if (next.done) {
        return;
      }
      yield { data: next.value.data.map(map), headers: next.value.headers };
    }
  } finally {
    await iterator.return?.();
  }
}

function readApiMessage(error: RequestError): string {
  const data = error.response?.data;
  if (typeof data === "object" && data !== null && "message" in data && typeof data.message === "string") {
    return data.message;
  }
  return error.message;
}

function readTransportMessage(error: unknown): string {
  if (error instanceof RequestError && error.cause instanceof Error) {
    return error.cause.message;
  }
  return getErrorMessage(error);
}
