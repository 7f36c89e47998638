export class ConfigurationError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode = 1) {
    super(message);
    this.name = "ConfigurationError";
    this.exitCode = exitCode;
  }
}

export class InvalidInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidInputError";
  }
}

export type UpstreamService = "github" | "openai";

export class UpstreamServiceError extends Error {
  readonly service: UpstreamService;
  readonly status?: number;

  constructor(
    service: UpstreamService,
    message: string,
    options: { status?: number; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "UpstreamServiceError";
    this.service = service;
    this.status = options.status;
  }
}

export class ModelOutputValidationError extends Error {
  readonly received: string;

  constructor(message: string, received: string) {
    super(message);
    this.name = "ModelOutputValidationError";
    this.received = received;
  }
}

export function ensureError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }

  return new Error(String(error));
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isMissingFileError(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}
