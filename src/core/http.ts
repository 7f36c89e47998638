import { readNumberEnv } from "./env.js";

const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_RETRY_COUNT = 2;
const DEFAULT_RETRY_BACKOFF_MS = 400;
const DEFAULT_RETRY_STATUSES = [408, 425, 429, 500, 502, 503, 504];

/**
 * Methods that are safe to send twice. A POST that timed out or answered 5xx
 * may still have been applied, so it is never resent.
 */
export const IDEMPOTENT_METHODS: readonly string[] = ["GET", "HEAD", "OPTIONS", "PUT", "DELETE"];

export type FetchLike = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

export interface FetchRetryOptions {
  timeoutMs?: number;
  retries?: number;
  backoffMs?: number;
  retryOnStatuses?: readonly number[];
  retryMethods?: readonly string[];
  fetch?: FetchLike;
}

export async function fetchWithRetry(
  input: string | URL | Request,
  init: RequestInit = {},
  options: FetchRetryOptions = {},
): Promise<Response> {
  const timeoutMs = options.timeoutMs ?? readNumberEnv("HTTP_TIMEOUT_MS", DEFAULT_TIMEOUT_MS);
  const backoffMs =
    options.backoffMs ?? readNumberEnv("HTTP_RETRY_BACKOFF_MS", DEFAULT_RETRY_BACKOFF_MS);
  const retryOnStatuses = options.retryOnStatuses ?? DEFAULT_RETRY_STATUSES;
  const send = options.fetch ?? fetch;
  const retries = isRetryableMethod(init.method, options.retryMethods)
    ? (options.retries ?? readNumberEnv("HTTP_RETRIES", DEFAULT_RETRY_COUNT))
    : 0;

  let lastError: unknown;

  for (let attempt = 0; attempt <= retries; attempt += 1) {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(new Error("request timeout")), timeoutMs);
    const signal = mergeAbortSignals([controller.signal, init.signal]);

    try {
      const response = await send(input, { ...init, signal });
      clearTimeout(timeout);

      if (response.ok || !retryOnStatuses.includes(response.status) || attempt === retries) {
        return response;
      }

      await wait(computeRetryDelayMs(attempt, backoffMs));
    } catch (error) {
      clearTimeout(timeout);
      lastError = error;

      if (init.signal?.aborted || attempt === retries) {
        break;
      }

      await wait(computeRetryDelayMs(attempt, backoffMs));
    }
  }

  if (lastError instanceof Error) {
    throw lastError;
  }

  throw new Error("request failed after retries");
}

export function isRetryableMethod(
  method: string | undefined,
  retryMethods: readonly string[] = IDEMPOTENT_METHODS,
): boolean {
  return retryMethods.includes((method ?? "GET").toUpperCase());
}

export function computeRetryDelayMs(
  attempt: number,
  backoffMs: number,
  randomValue = Math.random(),
): number {
  const safeAttempt = Math.max(0, Math.floor(attempt));
  const safeBackoffMs = Math.max(0, Math.floor(backoffMs));
  const baseDelay = safeBackoffMs * 2 ** safeAttempt;
  const jitterMax = safeBackoffMs * 0.2;
  const normalizedRandom = Number.isFinite(randomValue)
    ? Math.min(1, Math.max(0, randomValue))
    : 0;
  const jitter = Math.floor(jitterMax * normalizedRandom);
  return Math.floor(baseDelay + jitter);
}

function wait(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

function mergeAbortSignals(signals: Array<AbortSignal | null | undefined>): AbortSignal {
  const active = signals.filter((signal): signal is AbortSignal => Boolean(signal));
  const [only] = active;
  if (!only) {
    return new AbortController().signal;
  }
  return active.length === 1 ? only : AbortSignal.any(active);
}
