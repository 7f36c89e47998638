import { Logger, type LoggerService } from "@nestjs/common";

import {
  ConfigurationError,
  createWorkflowCommands,
  ensureError,
  getErrorMessage,
  readOptionalEnv,
  type EnvSource,
  type WorkflowCommands,
} from "../core/index.js";
import { createOpenAIChatClient, type ChatCompletionClient } from "../ai/index.js";
import { createGitHubClient, type GitHubClient } from "../integrations/github/index.js";
import {
  configuredRedactionRules,
  createRedactor,
  findRedactionCategories,
  type RedactionRule,
  type Redactor,
} from "../redaction/index.js";
import {
  loadPromptTemplate,
  loadRepoConfig,
  resolveRepoConfig,
  type ResolvedRepoConfig,
} from "../review/index.js";

export type ToolLogger = Pick<LoggerService, "log" | "warn" | "error">;

export interface ToolContext {
  env: EnvSource;
  cwd: string;
  logger: ToolLogger;
  commands: WorkflowCommands;
}

export type ToolOutcome =
  | { status: "completed"; detail: string }
  | { status: "skipped"; reason: string }
  | { status: "failed"; reason: string };

export type Tool = (context: ToolContext) => Promise<ToolOutcome>;

export interface ToolClientFactories {
  createGitHubClient?: (token: string) => GitHubClient;
  createChatClient?: (apiKey: string) => ChatCompletionClient;
  promptsDirectory?: string;
}

export interface ToolSettings {
  config: ResolvedRepoConfig;
  rules: readonly RedactionRule[];
  redactText: Redactor;
}

export function createToolContext(name: string): ToolContext {
  return {
    env: process.env,
    cwd: process.cwd(),
    logger: new Logger(name),
    commands: createWorkflowCommands(),
  };
}

/** Absent key is a deliberate skip, not a failure. */
export function readApiKeyOrSkip(
  context: ToolContext,
  skipMessage: string,
): { apiKey: string } | { skipped: ToolOutcome } {
  const apiKey = readOptionalEnv("OPENAI_API_KEY", context.env);
  if (apiKey) {
    return { apiKey };
  }

  context.commands.notice(`OPENAI_API_KEY not configured. ${skipMessage}`);
  return { skipped: { status: "skipped", reason: "OPENAI_API_KEY not configured" } };
}

export async function loadToolSettings(context: ToolContext): Promise<ToolSettings> {
  const config = resolveRepoConfig(await loadRepoConfig(context.cwd), context.env);
  const rules = configuredRedactionRules(config.secretPatterns);
  return { config, rules, redactText: createRedactor(rules) };
}

export function githubClientFor(token: string, factories: ToolClientFactories): GitHubClient {
  return factories.createGitHubClient?.(token) ?? createGitHubClient({ token });
}

export function chatClientFor(apiKey: string, factories: ToolClientFactories): ChatCompletionClient {
  return factories.createChatClient?.(apiKey) ?? createOpenAIChatClient({ apiKey });
}

export function loadToolPrompt(
  context: ToolContext,
  factories: ToolClientFactories,
  fileName: string,
  fallback: string,
): Promise<string> {
  return loadPromptTemplate(fileName, fallback, {
    directory: factories.promptsDirectory,
    onMissing: (templatePath) =>
      context.commands.warning(`Prompt template not found at ${templatePath}, using built-in prompt`),
  });
}

/** Logs which rule categories fired; never the matched values. */
export function logRedactionCategories(
  context: ToolContext,
  rules: readonly RedactionRule[],
  texts: readonly string[],
): void {
  const categories = new Set(texts.flatMap((text) => findRedactionCategories(text, rules)));
  if (categories.size > 0) {
    context.logger.log(`Redacted secret categories: ${[...categories].join(", ")}`);
  }
}

export async function runTool(tool: Tool, context: ToolContext): Promise<number> {
  try {
    const outcome = await tool(context);
    if (outcome.status === "failed") {
      return 1;
    }
    return 0;
  } catch (error) {
    context.commands.error(getErrorMessage(error));
    if (error instanceof ConfigurationError) {
      return error.exitCode;
    }
    const failure = ensureError(error);
    context.logger.error(failure.stack ?? failure.message);
    return 1;
  }
}

export function runCli(name: string, tool: Tool): void {
  const context = createToolContext(name);
  runTool(tool, context)
    .then((exitCode) => {
      process.exitCode = exitCode;
    })
    .catch((error: unknown) => {
      Logger.error(`${name} crashed: ${getErrorMessage(error)}`, "", name);
      process.exitCode = 1;
    });
}
