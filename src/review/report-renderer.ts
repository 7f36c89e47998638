export const TEST_DRAFT_ARTIFACT_NAME = "draft_tests.md";

const MAX_COMMENT_FILES = 10;
const MAX_COMMENT_CODE_BLOCKS = 2;
const MAX_CODE_BLOCK_CHARS = 800;
const MAX_CODE_BLOCK_LINES = 20;
const MAX_PREVIEW_LINES = 40;
const CODE_FENCE_OPENERS = ["```ts", "```typescript", "```js", "```javascript"];

export interface TestDraftReport {
  title: string;
  filePaths: readonly string[];
  output: string;
}

export function renderTestDraftArtifact(report: TestDraftReport): string {
  const footer =
    "*Generated by the AI test draft tool. These are suggestions only - review and adapt before use.*";

  return `# Draft Test Suggestions

## PR: ${report.title}

**Files analyzed:** ${report.filePaths.length}

### Files Touched
${renderFileList(report.filePaths)}

---

${report.output}

---

${footer}
`;
}

export function buildTestDraftComment(report: TestDraftReport): string {
  const lines = [
    "## 🧪 Draft Test Suggestions",
    "",
    `**PR:** ${report.title}`,
    `**Files analyzed:** ${report.filePaths.length}`,
    "",
    "### Files Covered",
    renderFileList(report.filePaths.slice(0, MAX_COMMENT_FILES)),
  ];
  if (report.filePaths.length > MAX_COMMENT_FILES) {
    lines.push(`- ... and ${report.filePaths.length - MAX_COMMENT_FILES} more`);
  }
  lines.push("", "### Sample Test Suggestions", "");

  const blocks = extractCodeBlocks(report.output);
  if (blocks.length > 0) {
    for (const block of blocks.slice(0, MAX_COMMENT_CODE_BLOCKS)) {
      lines.push(shortenCodeBlock(block), "");
    }
  } else {
    const outputLines = report.output.split("\n");
    lines.push(outputLines.slice(0, MAX_PREVIEW_LINES).join("\n"));
    if (outputLines.length > MAX_PREVIEW_LINES) {
      lines.push("", "... (see artifact for full output)");
    }
  }

  lines.push(
    "",
    "---",
    "",
    `📦 **Full output available in workflow artifacts** (\`${TEST_DRAFT_ARTIFACT_NAME}\`)`,
    "",
    "*These are AI-generated suggestions. Review and adapt before adding to your test suite.*",
    "",
  );
  return lines.join("\n");
}

export function extractCodeBlocks(markdown: string): string[] {
  const blocks: string[] = [];
  let current: string[] | undefined;

  for (const line of markdown.split("\n")) {
    const trimmed = line.trim();
    if (!current) {
      if (CODE_FENCE_OPENERS.some((opener) => trimmed.startsWith(opener))) {
        current = [line];
      }
      continue;
    }

    current.push(line);
    if (trimmed === "```") {
      blocks.push(current.join("\n"));
      current = undefined;
    }
  }

  return blocks;
}

function shortenCodeBlock(block: string): string {
  if (block.length <= MAX_CODE_BLOCK_CHARS) {
    return block;
  }

  const head = block.split("\n").slice(0, MAX_CODE_BLOCK_LINES).join("\n");
  return head.endsWith("```") ? head : `${head}\n// ... (truncated)\n\`\`\``;
}

function renderFileList(paths: readonly string[]): string {
  return paths.map((path) => `- \`${path}\``).join("\n");
}
