import { parsePullRequestToolEnv } from "../core/index.js";
import {
  createCommentMarker,
  createIssueCommentStore,
  fetchPullRequestData,
  reconcileManagedComment,
} from "../integrations/github/index.js";
import { budgetDiff, formatPromptTemplate } from "../review/index.js";
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

export const PR_SUMMARY_MARKER = createCommentMarker("ai-pr-summary-bot");

export const PR_SUMMARY_SYSTEM_PROMPT =
  "You are a helpful code reviewer that provides clear, concise PR summaries.";

const FALLBACK_PR_SUMMARY_PROMPT = `Summarize this pull request for reviewers.

## PR Title
{title}

## PR Description
{body}

## Changed Files ({file_count} files)
{diff_content}

Respond with a short overview, the key changes as bullets, and anything reviewers should look at closely.`;

export async function runPrSummary(
  context: ToolContext,
  factories: ToolClientFactories = {},
): Promise<ToolOutcome> {
  const key = readApiKeyOrSkip(context, "Skipping AI PR summary.");
  if ("skipped" in key) {
    return key.skipped;
  }

  const env = parsePullRequestToolEnv(context.env);
  const { config, rules, redactText } = await loadToolSettings(context);
  const github = githubClientFor(env.githubToken, factories);

  context.logger.log(`Generating AI summary for PR #${env.prNumber} in ${env.repo}`);
  const pull = await fetchPullRequestData({
    client: github,
    repo: env.repo,
    pullNumber: env.prNumber,
  });
  context.logger.log(`Fetched PR: ${redactText(pull.title)} (${pull.files.length} files)`);
  if (pull.reachedPageLimit) {
    context.commands.warning("Changed file listing hit the page limit; some files are not summarized");
  }

  const diff = budgetDiff(pull.files, { ...config.summary, sanitize: redactText });
  if (diff.truncated) {
    context.commands.notice(
      `Diff was truncated due to size (${diff.includedPaths.length} of ${pull.files.length} files included)`,
    );
  }
  logRedactionCategories(context, rules, [
    pull.title,
    pull.body,
    ...pull.files.map((file) => file.patch ?? ""),
  ]);

  const template = await loadToolPrompt(context, factories, "pr_summary.md", FALLBACK_PR_SUMMARY_PROMPT);
  const prompt = formatPromptTemplate(template, {
    title: redactText(pull.title),
    body: redactText(pull.body) || "(No description provided)",
    file_count: pull.files.length,
    diff_content: diff.content,
  });

  context.logger.log(`Calling model ${config.model}`);
  const summary = await chatClientFor(key.apiKey, factories).complete({
    systemPrompt: PR_SUMMARY_SYSTEM_PROMPT,
    userPrompt: prompt,
    model: config.model,
    temperature: 0.3,
    maxTokens: 1_500,
  });

  const outcome = await reconcileManagedComment({
    store: createIssueCommentStore({ client: github, repo: env.repo, issueNumber: env.prNumber }),
    marker: PR_SUMMARY_MARKER,
    body: redactText(summary),
  });
  const detail =
    outcome.action === "updated"
      ? `Updated existing comment ${outcome.commentId}`
      : `Created comment ${outcome.commentId}`;
  context.logger.log(detail);
  return { status: "completed", detail };
}
