import { minimatch } from "minimatch";

import type { FileChange } from "./review-types.js";

export interface FileFilterPatterns {
  include: readonly string[];
  exclude: readonly string[];
}

export const DEFAULT_TEST_DRAFT_PATTERNS: FileFilterPatterns = {
  include: ["src/**/*.ts", "src/**/*.tsx"],
  exclude: [
    "**/node_modules/**",
    "**/dist/**",
    "**/*.d.ts",
    "**/*.test.ts",
    "**/*.spec.ts",
    "**/tests/**",
    "**/__tests__/**",
    "**/*.md",
    "**/*.lock",
  ],
};

export function matchesAnyPattern(path: string, patterns: readonly string[]): boolean {
  return patterns.some((pattern) => minimatch(path, pattern, { dot: true }));
}

export function filterRelevantFiles(
  files: readonly FileChange[],
  patterns: FileFilterPatterns = DEFAULT_TEST_DRAFT_PATTERNS,
): FileChange[] {
  return files.filter(
    (file) =>
      file.status !== "removed" &&
      matchesAnyPattern(file.path, patterns.include) &&
      !matchesAnyPattern(file.path, patterns.exclude),
  );
}
