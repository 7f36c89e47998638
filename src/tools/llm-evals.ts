import path from "node:path";

import {
  classifyIntent,
  DEFAULT_PER_CASE_TIMEOUT_MS,
  DEFAULT_TOTAL_TIMEOUT_MS,
  formatEvalCaseLine,
  loadGoldenFile,
  runEvalSuite,
} from "../ai/index.js";
import { readNumberEnv, readOptionalEnv, type Clock } from "../core/index.js";
import {
  chatClientFor,
  loadToolSettings,
  readApiKeyOrSkip,
  type ToolClientFactories,
  type ToolContext,
  type ToolOutcome,
} from "./tool-runner.js";

export const DEFAULT_GOLDEN_FILE = "evals/golden_intent.json";

export async function runLlmEvals(
  context: ToolContext,
  factories: ToolClientFactories & { clock?: Clock } = {},
): Promise<ToolOutcome> {
  const key = readApiKeyOrSkip(
    context,
    "Skipping LLM evals. Set OPENAI_API_KEY to run them locally.",
  );
  if ("skipped" in key) {
    return key.skipped;
  }

  const goldenPath = path.resolve(
    context.cwd,
    readOptionalEnv("GOLDEN_FILE", context.env) ?? DEFAULT_GOLDEN_FILE,
  );
  const cases = await loadGoldenFile(goldenPath);
  const { config } = await loadToolSettings(context);
  const perCaseTimeoutMs = readNumberEnv(
    "EVAL_PER_CASE_TIMEOUT_MS",
    DEFAULT_PER_CASE_TIMEOUT_MS,
    context.env,
  );
  const totalTimeoutMs = readNumberEnv("EVAL_TOTAL_TIMEOUT_MS", DEFAULT_TOTAL_TIMEOUT_MS, context.env);
  const client = chatClientFor(key.apiKey, factories);

  context.logger.log(`Running ${cases.length} intent cases against ${config.model}`);
  const run = await runEvalSuite({
    cases,
    classify: (text, deadline) =>
      classifyIntent(text, { client, model: config.model, signal: deadline.signal }),
    perCaseTimeoutMs,
    totalTimeoutMs,
    clock: factories.clock,
    onResult: (result) => context.logger.log(formatEvalCaseLine(result)),
  });

  const summary = `Results: ${run.passedCount}/${run.results.length} passed in ${(run.elapsedMs / 1_000).toFixed(2)}s`;
  context.logger.log(summary);

  if (run.timedOut) {
    context.commands.error(
      `Total timeout of ${totalTimeoutMs / 1_000}s exceeded; ${run.skippedCount} cases not run`,
    );
    return { status: "failed", reason: "total timeout exceeded" };
  }
  if (run.failedCount > 0) {
    for (const result of run.results.filter((item) => !item.passed)) {
      context.logger.error(`  ${result.id}: expected ${result.expected}, got ${result.actual}`);
    }
    context.commands.error(`${run.failedCount} LLM eval(s) failed`);
    return { status: "failed", reason: `${run.failedCount} cases failed` };
  }

  context.logger.log("All LLM evals passed");
  return { status: "completed", detail: summary };
}
