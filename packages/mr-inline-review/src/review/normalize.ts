import type { Review, ReviewComment, Severity } from "../types/review";
import { SEVERITIES } from "../types/review";
import { reviewPayloadSchema } from "../types/schemas";
import { formatIssues, ReviewInputError } from "../utils/errors";

export const DEFAULT_SEVERITY: Severity = "suggestion";
export const DEFAULT_SUMMARY = "No summary provided.";

export interface ParsedReview {
  review: Review;
  warnings: string[];
}

export function normalizeSeverity(value: unknown): {
  severity: Severity;
  recognized: boolean;
} {
  if (value === undefined || value === null) {
    return { severity: DEFAULT_SEVERITY, recognized: true };
  }
  if (typeof value !== "string") {
    return { severity: DEFAULT_SEVERITY, recognized: false };
  }
  const key = value.trim().toLowerCase();
  if (!key) {
    return { severity: DEFAULT_SEVERITY, recognized: true };
  }
  const match = SEVERITIES.find((severity) => severity === key);
  return match
    ? { severity: match, recognized: true }
    : { severity: DEFAULT_SEVERITY, recognized: false };
}

export function parseReview(payload: unknown): ParsedReview {
  const parsed = reviewPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    throw new ReviewInputError(
      [
        "Review JSON did not match the expected shape.",
        ...formatIssues(parsed.error.issues).map((issue) => `- ${issue}`)
      ].join("\n")
    );
  }

  const warnings: string[] = [];
  const comments: ReviewComment[] = (parsed.data.comments ?? []).map((comment) => {
    const { severity, recognized } = normalizeSeverity(comment.severity);
    if (!recognized) {
      warnings.push(
        `Unrecognized severity ${JSON.stringify(comment.severity)} for ${comment.file}:${comment.line}; treating it as ${severity}.`
      );
    }
    return { file: comment.file, line: comment.line, severity, body: comment.body };
  });

  return {
    review: { summary: parsed.data.summary ?? DEFAULT_SUMMARY, comments },
    warnings
  };
}
