import type { Review, ReviewComment, Severity, SeverityTally } from "../types/review";

export const SEVERITY_MARKERS: Record<Severity, string> = {
  critical: "❗",
  warning: "⚠️",
  suggestion: "\u{1F4A1}"
};

export const DEFAULT_NOTE_HEADER = "## AI Code Review";

const HEAVY_RULE = "=".repeat(60);
const LIGHT_RULE = "-".repeat(60);

export function emptyTally(): SeverityTally {
  return { critical: 0, warning: 0, suggestion: 0 };
}

export function countBySeverity(comments: ReviewComment[]): SeverityTally {
  const tally = emptyTally();
  for (const comment of comments) {
    tally[comment.severity] += 1;
  }
  return tally;
}

export function formatTally(tally: SeverityTally) {
  return `${tally.critical} critical, ${tally.warning} warnings, ${tally.suggestion} suggestions`;
}

export function buildInlineBody(comment: ReviewComment) {
  return `${SEVERITY_MARKERS[comment.severity]} **[${comment.severity.toUpperCase()}]** ${comment.body}`;
}

export function buildSummaryNote(
  summary: string,
  tally: SeverityTally,
  header = DEFAULT_NOTE_HEADER
) {
  return `${header}\n\n${summary}\n\n**Inline comments:** ${formatTally(tally)}`;
}

export function renderDryRun(review: Review): string[] {
  const lines = [HEAVY_RULE, "SUMMARY", HEAVY_RULE, review.summary, ""];

  if (review.comments.length === 0) {
    lines.push("No inline comments.");
  } else {
    lines.push(HEAVY_RULE, `INLINE COMMENTS (${review.comments.length})`, HEAVY_RULE);
    for (const comment of review.comments) {
      lines.push(
        "",
        `${SEVERITY_MARKERS[comment.severity]} [${comment.severity.toUpperCase()}] ${comment.file}:${comment.line}`,
        `  ${comment.body}`
      );
    }
  }

  lines.push(
    "",
    LIGHT_RULE,
    `Total: ${formatTally(countBySeverity(review.comments))}`,
    "(dry run: nothing was posted)"
  );
  return lines;
}
