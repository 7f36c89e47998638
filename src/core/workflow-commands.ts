import * as core from "@actions/core";

export type WorkflowCommandLevel = "notice" | "warning" | "error";

/** Run annotations for the GitHub Actions log. */
export interface WorkflowCommands {
  notice(message: string): void;
  warning(message: string): void;
  error(message: string): void;
}

export function createWorkflowCommands(): WorkflowCommands {
  return {
    notice: (message) => core.notice(message),
    warning: (message) => core.warning(message),
    error: (message) => core.error(message),
  };
}
