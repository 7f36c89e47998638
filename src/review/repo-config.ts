import { readFile } from "node:fs/promises";
import path from "node:path";
import { load as loadYaml } from "js-yaml";
import { z } from "zod";

import {
  ConfigurationError,
  type EnvSource,
  isMissingFileError,
  readOptionalEnv,
} from "../core/index.js";
import { DEFAULT_TEST_DRAFT_PATTERNS, type FileFilterPatterns } from "./file-filter.js";
import type { BudgetLimits } from "./review-types.js";

const CONFIG_PATH_CANDIDATES = [".prguard.yml", ".prguard.yaml"];
const DEFAULT_MODEL = "gpt-4o-mini";

const positiveInt = z.number().int().positive();

const budgetSchema = z.object({
  maxTotalChars: positiveInt.optional(),
  maxPatchCharsPerFile: positiveInt.optional(),
});

export const repoConfigSchema = z.object({
  model: z.string().trim().min(1).optional(),
  secretPatterns: z.array(z.string()).max(20).optional(),
  summary: budgetSchema.optional(),
  testDraft: budgetSchema
    .extend({
      include: z.array(z.string().min(1)).optional(),
      exclude: z.array(z.string().min(1)).optional(),
    })
    .optional(),
  releaseNotes: z
    .object({
      maxCommits: positiveInt.max(250).optional(),
    })
    .optional(),
});

export type RepoConfig = z.infer<typeof repoConfigSchema>;

export interface ResolvedRepoConfig {
  model: string;
  secretPatterns: string[];
  summary: BudgetLimits;
  testDraft: BudgetLimits & FileFilterPatterns;
  releaseNotes: { maxCommits: number };
}

export function parseRepoConfig(raw: string): RepoConfig {
  const trimmed = raw.trim();
  if (!trimmed) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = trimmed.startsWith("{") ? JSON.parse(trimmed) : loadYaml(trimmed, { json: true });
  } catch (error) {
    throw new ConfigurationError(
      `Invalid repository config: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }

  const validated = repoConfigSchema.safeParse(parsed);
  if (!validated.success) {
    const issue = validated.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new ConfigurationError(
      `Invalid repository config${where}: ${issue?.message ?? "schema validation failed"}`,
    );
  }
  return validated.data;
}

export async function loadRepoConfig(directory: string = process.cwd()): Promise<RepoConfig> {
  for (const candidate of CONFIG_PATH_CANDIDATES) {
    const configPath = path.join(directory, candidate);
    let raw: string;
    try {
      raw = await readFile(configPath, "utf8");
    } catch (error) {
      if (isMissingFileError(error)) {
        continue;
      }
      throw error;
    }
    return parseRepoConfig(raw);
  }

  return {};
}

export function resolveRepoConfig(
  config: RepoConfig,
  env: EnvSource = process.env,
): ResolvedRepoConfig {
  return {
    model:
      readOptionalEnv("AI_MODEL", env) ??
      readOptionalEnv("OPENAI_MODEL", env) ??
      config.model ??
      DEFAULT_MODEL,
    secretPatterns: config.secretPatterns ?? [],
    summary: {
      maxTotalChars: config.summary?.maxTotalChars ?? 50_000,
      maxPatchCharsPerFile: config.summary?.maxPatchCharsPerFile ?? 500,
    },
    testDraft: {
      maxTotalChars: config.testDraft?.maxTotalChars ?? 30_000,
      maxPatchCharsPerFile: config.testDraft?.maxPatchCharsPerFile ?? 2_000,
      include: config.testDraft?.include ?? [...DEFAULT_TEST_DRAFT_PATTERNS.include],
      exclude: config.testDraft?.exclude ?? [...DEFAULT_TEST_DRAFT_PATTERNS.exclude],
    },
    releaseNotes: {
      maxCommits: config.releaseNotes?.maxCommits ?? 50,
    },
  };
}
