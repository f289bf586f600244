export const SEVERITIES = ["critical", "warning", "suggestion"] as const;

export type Severity = (typeof SEVERITIES)[number];

export type SeverityTally = Record<Severity, number>;

export interface ReviewComment {
  file: string;
  line: number;
  severity: Severity;
  body: string;
}

export interface Review {
  summary: string;
  comments: ReviewComment[];
}

/** Commit ids GitLab needs to anchor a discussion to one revision of the MR diff. */
export interface DiffVersion {
  baseSha: string;
  startSha: string;
  headSha: string;
}

export interface DiscussionPosition {
  position_type: "text";
  base_sha: string;
  start_sha: string;
  head_sha: string;
  old_path: string;
  new_path: string;
  new_line: number;
}

export interface DiscussionPayload {
  body: string;
  position: DiscussionPosition;
}

export type PostOutcome = { ok: true } | { ok: false; reason: string };

export interface FailedComment {
  comment: ReviewComment;
  reason: string;
}

export interface PublishResult {
  total: number;
  posted: number;
  failed: FailedComment[];
  tally: SeverityTally;
}

export interface MergeRequestRef {
  iid: number;
  title: string;
  sourceBranch: string;
  webUrl?: string;
}
