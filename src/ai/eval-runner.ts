import { readFile } from "node:fs/promises";
import { z } from "zod";

import {
  ConfigurationError,
  DeadlineExceededError,
  getErrorMessage,
  InvalidInputError,
  isMissingFileError,
  ModelOutputValidationError,
  RunBudget,
  runWithDeadline,
  UpstreamServiceError,
  type Clock,
  type Deadline,
} from "../core/index.js";
import { intentSchema, type Intent } from "./intent.js";

export const DEFAULT_PER_CASE_TIMEOUT_MS = 30_000;
export const DEFAULT_TOTAL_TIMEOUT_MS = 300_000;

export const goldenCaseSchema = z.object({
  id: z.string().min(1),
  input_text: z.string(),
  expected_intent: intentSchema,
});

export const goldenFileSchema = z.array(goldenCaseSchema).min(1, "Golden file is empty");

export type GoldenCase = z.infer<typeof goldenCaseSchema>;

export interface EvalCaseResult {
  id: string;
  expected: Intent;
  actual: string;
  passed: boolean;
}

export interface EvalRunResult {
  results: EvalCaseResult[];
  passedCount: number;
  failedCount: number;
  skippedCount: number;
  timedOut: boolean;
  elapsedMs: number;
}

export type IntentClassifier = (text: string, deadline: Deadline) => Promise<Intent>;

export function parseGoldenFile(raw: string, source = "golden file"): GoldenCase[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Invalid JSON in ${source}: ${getErrorMessage(error)}`);
  }

  const validated = goldenFileSchema.safeParse(parsed);
  if (!validated.success) {
    const issue = validated.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new ConfigurationError(
      `Invalid ${source}${where}: ${issue?.message ?? "schema validation failed"}`,
    );
  }
  return validated.data;
}

export async function loadGoldenFile(filePath: string): Promise<GoldenCase[]> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (error) {
    if (isMissingFileError(error)) {
      throw new ConfigurationError(`Golden file not found: ${filePath}`);
    }
    throw error;
  }
  return parseGoldenFile(raw, filePath);
}

/**
 * Runs cases one at a time. Each case gets its own deadline; the cumulative
 * budget is checked before a case starts, and once it is spent the remaining
 * cases are skipped.
 */
export async function runEvalSuite(params: {
  cases: readonly GoldenCase[];
  classify: IntentClassifier;
  perCaseTimeoutMs?: number;
  totalTimeoutMs?: number;
  clock?: Clock;
  onResult?: (result: EvalCaseResult) => void;
}): Promise<EvalRunResult> {
  const perCaseTimeoutMs = params.perCaseTimeoutMs ?? DEFAULT_PER_CASE_TIMEOUT_MS;
  const clock = params.clock ?? Date;
  const budget = new RunBudget(params.totalTimeoutMs ?? DEFAULT_TOTAL_TIMEOUT_MS, clock);
  const results: EvalCaseResult[] = [];
  let timedOut = false;

  for (const testCase of params.cases) {
    if (budget.exhausted) {
      timedOut = true;
      break;
    }

    const actual = await runCase(testCase, params.classify, perCaseTimeoutMs, clock);
    const result: EvalCaseResult = {
      id: testCase.id,
      expected: testCase.expected_intent,
      actual,
      passed: actual === testCase.expected_intent,
    };
    results.push(result);
    params.onResult?.(result);
  }

  const passedCount = results.filter((result) => result.passed).length;
  return {
    results,
    passedCount,
    failedCount: results.length - passedCount,
    skippedCount: params.cases.length - results.length,
    timedOut,
    elapsedMs: budget.elapsedMs(),
  };
}

export function formatEvalCaseLine(result: EvalCaseResult): string {
  if (result.passed) {
    return `[PASS] ${result.id}: ${result.actual} == ${result.expected}`;
  }
  return `[FAIL] ${result.id}: got ${result.actual}, expected ${result.expected}`;
}

async function runCase(
  testCase: GoldenCase,
  classify: IntentClassifier,
  perCaseTimeoutMs: number,
  clock: Clock,
): Promise<string> {
  try {
    return await runWithDeadline(
      (deadline) => classify(testCase.input_text, deadline),
      perCaseTimeoutMs,
      clock,
    );
  } catch (error) {
    if (error instanceof DeadlineExceededError) {
      return `TIMEOUT (>${formatSeconds(perCaseTimeoutMs)}s)`;
    }
    if (
      error instanceof ModelOutputValidationError ||
      error instanceof UpstreamServiceError ||
      error instanceof InvalidInputError
    ) {
      return `ERROR: ${error.message}`;
    }
    return `UNEXPECTED ERROR: ${getErrorMessage(error)}`;
  }
}

function formatSeconds(ms: number): string {
  const seconds = ms / 1_000;
  return Number.isInteger(seconds) ? String(seconds) : seconds.toFixed(2);
}
