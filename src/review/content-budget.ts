import type {
  BudgetedContent,
  BudgetOptions,
  FileChange,
} from "./review-types.js";

export const NO_PATCH_NOTE = "*(no patch available; possibly binary or too large)*";
export const DIFF_TRUNCATED_NOTICE = "**Note: Diff truncated due to size.**\n";
export const EXCERPT_TRUNCATED_MARKER = "\n... (truncated)";

interface Excerpt {
  text: string;
  cut: boolean;
}

interface Accumulated {
  blocks: string[];
  includedPaths: string[];
  omittedCount: number;
}

/**
 * Renders every patch in full when the whole rendering fits `maxTotalChars`.
 * Otherwise falls back to one summary line per file with a capped excerpt,
 * still bounded by `maxTotalChars`; files that no longer fit are counted in a
 * trailing note.
 */
export function budgetDiff(
  files: readonly FileChange[],
  options: BudgetOptions,
): BudgetedContent {
  const sanitize = options.sanitize ?? identity;
  const fullBlocks = files.map((file) => renderFullBlock(file, sanitize));
  const fullDiff = fullBlocks.join("\n");

  if (fullDiff.length <= options.maxTotalChars) {
    return {
      content: fullDiff,
      truncated: false,
      includedPaths: files.map((file) => file.path),
      omittedCount: 0,
    };
  }

  const compact = accumulateWithinBudget(
    files,
    files.map((file) =>
      renderCompactBlock(file, cutExcerpt(file.patch, options.maxPatchCharsPerFile, sanitize)),
    ),
    options.maxTotalChars,
  );

  return {
    content: [DIFF_TRUNCATED_NOTICE, ...compact.blocks, ...omittedNote(compact.omittedCount)].join(
      "\n",
    ),
    truncated: true,
    includedPaths: compact.includedPaths,
    omittedCount: compact.omittedCount,
  };
}

/**
 * Renders each file with its own excerpt cap and stops at the first file that
 * would push the total past `maxTotalChars`. Files already taken are kept as
 * they are.
 */
export function budgetFileContext(
  files: readonly FileChange[],
  options: BudgetOptions,
): BudgetedContent {
  const sanitize = options.sanitize ?? identity;
  const excerpts = files.map((file) =>
    cutExcerpt(file.patch, options.maxPatchCharsPerFile, sanitize),
  );
  const accumulated = accumulateWithinBudget(
    files,
    files.map((file, index) => renderContextBlock(file, excerpts[index])),
    options.maxTotalChars,
  );
  const anyExcerptCut = excerpts
    .slice(0, accumulated.includedPaths.length)
    .some((excerpt) => excerpt?.cut === true);

  return {
    content: [...accumulated.blocks, ...omittedNote(accumulated.omittedCount)].join("\n"),
    truncated: anyExcerptCut || accumulated.omittedCount > 0,
    includedPaths: accumulated.includedPaths,
    omittedCount: accumulated.omittedCount,
  };
}

export function formatFileStats(file: FileChange): string {
  return `${file.status}: +${file.additions}/-${file.deletions}`;
}

function accumulateWithinBudget(
  files: readonly FileChange[],
  blocks: readonly string[],
  maxTotalChars: number,
): Accumulated {
  const included: string[] = [];
  const includedPaths: string[] = [];
  let usedChars = 0;

  for (const [index, file] of files.entries()) {
    const block = blocks[index] ?? "";
    const addition = block.length + (included.length > 0 ? 1 : 0);
    if (usedChars + addition > maxTotalChars) {
      return { blocks: included, includedPaths, omittedCount: files.length - index };
    }

    included.push(block);
    includedPaths.push(file.path);
    usedChars += addition;
  }

  return { blocks: included, includedPaths, omittedCount: 0 };
}

function renderFullBlock(file: FileChange, sanitize: (text: string) => string): string {
  if (!file.patch) {
    return `### ${file.path}\n${NO_PATCH_NOTE}\n`;
  }
  return `### ${file.path}\n\`\`\`diff\n${sanitize(file.patch)}\n\`\`\`\n`;
}

function renderCompactBlock(file: FileChange, excerpt: Excerpt | undefined): string {
  const summary = `- \`${file.path}\` (${formatFileStats(file)})`;
  if (!excerpt) {
    return `${summary} ${NO_PATCH_NOTE}`;
  }
  return `${summary}\n\`\`\`diff\n${excerpt.text}\n\`\`\`\n`;
}

function renderContextBlock(file: FileChange, excerpt: Excerpt | undefined): string {
  const header = `### ${file.path}\n**Status**: ${file.status} (+${file.additions}/-${file.deletions})\n\n`;
  if (!excerpt) {
    return `${header}${NO_PATCH_NOTE}\n`;
  }
  return `${header}\`\`\`diff\n${excerpt.text}\n\`\`\`\n`;
}

function cutExcerpt(
  patch: string | undefined,
  maxChars: number,
  sanitize: (text: string) => string,
): Excerpt | undefined {
  if (!patch) {
    return undefined;
  }

  // Cut after sanitizing: a secret straddling the cut must still match whole.
  const sanitized = sanitize(patch);
  const limit = Math.max(0, Math.floor(maxChars));
  if (sanitized.length <= limit) {
    return { text: sanitized, cut: false };
  }
  return { text: `${sanitized.slice(0, limit)}${EXCERPT_TRUNCATED_MARKER}`, cut: true };
}

function omittedNote(omittedCount: number): string[] {
  if (omittedCount === 0) {
    return [];
  }
  return [`**Note:** ${omittedCount} additional files omitted due to size constraints.\n`];
}

function identity(text: string): string {
  return text;
}
