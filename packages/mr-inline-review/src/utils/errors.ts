import type { z } from "zod";

export class ReviewToolError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ReviewToolError";
  }
}

export class ReviewInputError extends ReviewToolError {
  constructor(message: string) {
    super(message);
    this.name = "ReviewInputError";
  }
}

export class MissingDiffVersionError extends ReviewToolError {
  constructor(public readonly target: string) {
    super(`No diff versions found for MR !${target}.`);
    this.name = "MissingDiffVersionError";
  }
}

export class GlabCommandError extends ReviewToolError {
  constructor(
    message: string,
    public readonly command?: string,
    public readonly exitCode?: number
  ) {
    super(message);
    this.name = "GlabCommandError";
  }
}

export class ConfigError extends ReviewToolError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function formatIssues(issues: z.ZodIssue[]) {
  const limit = 8;
  return issues.slice(0, limit).map((issue) => {
    const path = issue.path.length ? issue.path.join(".") : "<root>";
    return `${path}: ${issue.message}`;
  });
}

export function truncate(value: string, limit = 2000) {
  if (value.length <= limit) {
    return value;
  }
  return `${value.slice(0, limit)}…`;
}
