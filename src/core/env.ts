import { z } from "zod";

import { ConfigurationError } from "./errors.js";

export type EnvSource = Record<string, string | undefined>;

export function readNumberEnv(
  name: string,
  fallback: number,
  env: EnvSource = process.env,
): number {
  const raw = env[name];
  if (!raw) {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    return fallback;
  }

  return Math.floor(value);
}

export function readOptionalEnv(
  name: string,
  env: EnvSource = process.env,
): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

const repoSlugSchema = z
  .string()
  .regex(/^[A-Za-z0-9_.-]+\/[A-Za-z0-9_.-]+$/, "expected owner/name");

const githubTokenSchema = z.string().min(1);

export const pullRequestToolEnvSchema = z.object({
  GITHUB_TOKEN: githubTokenSchema,
  REPO: repoSlugSchema,
  PR_NUMBER: z.coerce.number().int().positive(),
});

export const releaseToolEnvSchema = z.object({
  GITHUB_TOKEN: githubTokenSchema,
  REPO: repoSlugSchema,
  TAG: z.string().min(1),
});

export interface PullRequestToolEnv {
  githubToken: string;
  repo: string;
  prNumber: number;
}

export interface ReleaseToolEnv {
  githubToken: string;
  repo: string;
  tag: string;
}

export function parsePullRequestToolEnv(env: EnvSource = process.env): PullRequestToolEnv {
  const parsed = parseEnv(
    pullRequestToolEnvSchema,
    Object.keys(pullRequestToolEnvSchema.shape),
    env,
  );
  return {
    githubToken: parsed.GITHUB_TOKEN,
    repo: parsed.REPO,
    prNumber: parsed.PR_NUMBER,
  };
}

export function parseReleaseToolEnv(env: EnvSource = process.env): ReleaseToolEnv {
  const parsed = parseEnv(
    releaseToolEnvSchema,
    Object.keys(releaseToolEnvSchema.shape),
    env,
  );
  return {
    githubToken: parsed.GITHUB_TOKEN,
    repo: parsed.REPO,
    tag: parsed.TAG,
  };
}

function parseEnv<Output>(
  schema: z.ZodType<Output, z.ZodTypeDef, unknown>,
  names: readonly string[],
  env: EnvSource,
): Output {
  const picked: Record<string, string> = {};
  for (const name of names) {
    const value = readOptionalEnv(name, env);
    if (value === undefined) {
      throw new ConfigurationError(`Missing required environment variable: ${name}`);
    }
    picked[name] = value;
  }

  const validated = schema.safeParse(picked);
  if (!validated.success) {
    const issue = validated.error.issues[0];
    const name = issue?.path.join(".") ?? "environment";
    throw new ConfigurationError(
      `Invalid environment variable ${name}: ${issue?.message ?? "validation failed"}`,
    );
  }

  return validated.data;
}
