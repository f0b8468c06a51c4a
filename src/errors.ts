import type { ZodError, ZodIssue } from "zod";

/** Base for failures of the host layers; the core never throws these. */
export class SpanwiseError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly issues: readonly ZodIssue[] = [],
  ) {
    super(message);
    this.name = "SpanwiseError";
  }
}

export class ConfigError extends SpanwiseError {
  constructor(message: string, path: string, issues?: readonly ZodIssue[]) {
    super(message, path, issues);
    this.name = "ConfigError";
  }
}

export class InputError extends SpanwiseError {
  constructor(message: string, path: string, issues?: readonly ZodIssue[]) {
    super(message, path, issues);
    this.name = "InputError";
  }
}

/** "events.3.openTime: Expected number, received string; …" */
export function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}
