import { parsePullRequestToolEnv } from "../core/index.js";
import {
  createCommentMarker,
  createIssueCommentStore,
  fetchPullRequestData,
  reconcileManagedComment,
} from "../integrations/github/index.js";
import {
  budgetFileContext,
  buildTestDraftComment,
  filterRelevantFiles,
  formatPromptTemplate,
  renderTestDraftArtifact,
  TEST_DRAFT_ARTIFACT_NAME,
  writeArtifact,
} from "../review/index.js";
import {
  chatClientFor,
  githubClientFor,
  loadToolPrompt,
  loadToolSettings,
  logRedactionCategories,
  readApiKeyOrSkip,
  type ToolClientFactories,
  type ToolContext,
  type ToolOutcome,
} from "./tool-runner.js";

export const TEST_DRAFT_MARKER = createCommentMarker("ai-test-draft-bot");

export const TEST_DRAFT_SYSTEM_PROMPT =
  "You are an expert TypeScript developer who writes focused unit tests. Suggest tests only; never claim they were run.";

const FALLBACK_TEST_DRAFT_PROMPT = `Draft unit tests for the source files changed in this pull request.

## PR Title
{pr_title}

## Files ({file_count})
{file_list}

## File Details
{file_details}

Return TypeScript test code in fenced \`\`\`ts blocks, one block per file, with a short note on what each test covers.`;

export async function runTestDraft(
  context: ToolContext,
  factories: ToolClientFactories = {},
): Promise<ToolOutcome> {
  const key = readApiKeyOrSkip(context, "Skipping test draft generation.");
  if ("skipped" in key) {
    return key.skipped;
  }

  const env = parsePullRequestToolEnv(context.env);
  const { config, rules, redactText } = await loadToolSettings(context);
  const github = githubClientFor(env.githubToken, factories);

  context.logger.log(`Drafting tests for PR #${env.prNumber} in ${env.repo}`);
  const pull = await fetchPullRequestData({
    client: github,
    repo: env.repo,
    pullNumber: env.prNumber,
  });
  if (pull.reachedPageLimit) {
    context.commands.warning("Changed file listing hit the page limit; some files are not considered");
  }

  const relevant = filterRelevantFiles(pull.files, config.testDraft);
  context.logger.log(`Found ${relevant.length} relevant source files`);
  if (relevant.length === 0) {
    context.commands.notice("No relevant source files found. Skipping test generation.");
    return { status: "skipped", reason: "no relevant source files" };
  }

  const fileContext = budgetFileContext(relevant, { ...config.testDraft, sanitize: redactText });
  if (fileContext.truncated) {
    context.commands.notice(
      `File context was truncated (${fileContext.includedPaths.length} of ${relevant.length} files included)`,
    );
  }
  logRedactionCategories(context, rules, relevant.map((file) => file.patch ?? ""));

  const title = redactText(pull.title);
  const template = await loadToolPrompt(context, factories, "test_generation.md", FALLBACK_TEST_DRAFT_PROMPT);
  const prompt = formatPromptTemplate(template, {
    pr_title: title,
    file_count: fileContext.includedPaths.length,
    file_list: fileContext.includedPaths.map((path) => `- ${path}`).join("\n"),
    file_details: fileContext.content,
  });

  context.logger.log(`Calling model ${config.model}`);
  const output = redactText(
    await chatClientFor(key.apiKey, factories).complete({
      systemPrompt: TEST_DRAFT_SYSTEM_PROMPT,
      userPrompt: prompt,
      model: config.model,
      temperature: 0.3,
      maxTokens: 3_000,
    }),
  );

  const report = { title, filePaths: fileContext.includedPaths, output };
  const artifactPath = await writeArtifact(
    context.cwd,
    TEST_DRAFT_ARTIFACT_NAME,
    renderTestDraftArtifact(report),
  );
  context.logger.log(`Saved full output to ${artifactPath}`);

  const outcome = await reconcileManagedComment({
    store: createIssueCommentStore({ client: github, repo: env.repo, issueNumber: env.prNumber }),
    marker: TEST_DRAFT_MARKER,
    body: buildTestDraftComment(report),
  });
  const detail =
    outcome.action === "updated"
      ? `Updated existing comment ${outcome.commentId}`
      : `Created comment ${outcome.commentId}`;
  context.logger.log(detail);
  return { status: "completed", detail };
}
