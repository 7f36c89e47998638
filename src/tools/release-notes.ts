import { parseReleaseToolEnv } from "../core/index.js";
import {
  buildChangesList,
  findPreviousTag,
  findPullRequestForCommit,
  getCommitsBetween,
  listTagNames,
  upsertDraftRelease,
} from "../integrations/github/index.js";
import { formatPromptTemplate, writeArtifact } from "../review/index.js";
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

export const RELEASE_NOTES_ARTIFACT_NAME = "release_notes.md";

export const RELEASE_NOTES_SYSTEM_PROMPT =
  "You are a technical writer who writes clear, user-facing release notes grouped by kind of change.";

const FALLBACK_RELEASE_NOTES_PROMPT = `Write release notes for {tag}.{context_note}

## Changes
{changes}

Group the changes under Features, Fixes and Maintenance headings, omit empty groups, and keep each bullet to one line.`;

export function emptyReleaseNotes(tag: string): string {
  return `## ${tag}\n\nNo changes detected.`;
}

export function buildReleaseContextNote(params: {
  previousTag: string | undefined;
  includedCount: number;
  totalCount: number;
}): string {
  const notes: string[] = [];
  if (!params.previousTag) {
    notes.push("This is the first release; there is no previous tag to compare against.");
  }
  if (params.totalCount > params.includedCount) {
    notes.push(
      `Only the first ${params.includedCount} of ${params.totalCount} commits are listed; mention that the list is partial.`,
    );
  }
  return notes.length > 0 ? `\n\n${notes.join("\n")}` : "";
}

export async function runReleaseNotes(
  context: ToolContext,
  factories: ToolClientFactories = {},
): Promise<ToolOutcome> {
  const key = readApiKeyOrSkip(context, "Skipping release notes generation.");
  if ("skipped" in key) {
    return key.skipped;
  }

  const env = parseReleaseToolEnv(context.env);
  const { config, rules, redactText } = await loadToolSettings(context);
  const github = githubClientFor(env.githubToken, factories);

  context.logger.log(`Generating release notes for ${env.tag} in ${env.repo}`);
  const previousTag = findPreviousTag(await listTagNames(github, env.repo), env.tag);
  context.logger.log(previousTag ? `Previous tag: ${previousTag}` : "No previous tag found");

  const range = await getCommitsBetween({
    client: github,
    repo: env.repo,
    base: previousTag,
    head: env.tag,
    maxCommits: config.releaseNotes.maxCommits,
  });
  context.logger.log(`Found ${range.totalCount} commits`);

  let notes: string;
  if (range.commits.length === 0) {
    context.commands.warning(`No commits found for ${env.tag}`);
    notes = emptyReleaseNotes(env.tag);
  } else {
    if (range.totalCount > range.commits.length) {
      context.commands.notice(
        `Release spans ${range.totalCount} commits; only the first ${range.commits.length} are used`,
      );
    }

    const rawChanges = await buildChangesList(range.commits, (sha) =>
      findPullRequestForCommit(github, env.repo, sha),
    );
    logRedactionCategories(context, rules, [rawChanges]);

    const template = await loadToolPrompt(
      context,
      factories,
      "release_notes.md",
      FALLBACK_RELEASE_NOTES_PROMPT,
    );
    const prompt = formatPromptTemplate(template, {
      tag: env.tag,
      changes: redactText(rawChanges),
      context_note: buildReleaseContextNote({
        previousTag,
        includedCount: range.commits.length,
        totalCount: range.totalCount,
      }),
    });

    context.logger.log(`Calling model ${config.model}`);
    notes = redactText(
      await chatClientFor(key.apiKey, factories).complete({
        systemPrompt: RELEASE_NOTES_SYSTEM_PROMPT,
        userPrompt: prompt,
        model: config.model,
        temperature: 0.3,
        maxTokens: 2_000,
      }),
    );
  }

  const release = await upsertDraftRelease({
    client: github,
    repo: env.repo,
    tag: env.tag,
    body: notes,
  });
  const artifactPath = await writeArtifact(context.cwd, RELEASE_NOTES_ARTIFACT_NAME, notes);
  context.logger.log(`Saved release notes to ${artifactPath}`);

  const detail =
    release.action === "updated"
      ? `Updated draft release ${release.releaseId}`
      : `Created draft release ${release.releaseId}`;
  context.logger.log(detail);
  return { status: "completed", detail };
}
