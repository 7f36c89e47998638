export type FileChangeStatus =
  | "added"
  | "removed"
  | "modified"
  | "renamed"
  | "copied"
  | "changed"
  | "unchanged";

export interface FileChange {
  path: string;
  status: FileChangeStatus | string;
  additions: number;
  deletions: number;
  patch?: string;
}

export interface BudgetLimits {
  maxTotalChars: number;
  maxPatchCharsPerFile: number;
}

export interface BudgetOptions extends BudgetLimits {
  sanitize?: (text: string) => string;
}

export interface BudgetedContent {
  content: string;
  truncated: boolean;
  includedPaths: string[];
  omittedCount: number;
}

export interface PullRequestData {
  title: string;
  body: string;
  files: FileChange[];
}
