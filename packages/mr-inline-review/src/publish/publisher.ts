import type { MergeRequestGateway } from "../glab/gateway";
import { buildInlineBody, buildSummaryNote, emptyTally } from "../review/render";
import type {
  DiffVersion,
  DiscussionPayload,
  FailedComment,
  PublishResult,
  Review,
  ReviewComment
} from "../types/review";
import { MissingDiffVersionError } from "../utils/errors";
import type { Reporter } from "../utils/log";

export interface PublishOptions {
  target: string;
  noteHeader?: string;
  reporter: Reporter;
}

export function buildDiscussionPayload(
  version: DiffVersion,
  comment: ReviewComment
): DiscussionPayload {
  return {
    body: buildInlineBody(comment),
    position: {
      position_type: "text",
      base_sha: version.baseSha,
      start_sha: version.startSha,
      head_sha: version.headSha,
      // Renames are not tracked; both sides point at the reviewed path.
      old_path: comment.file,
      new_path: comment.file,
      new_line: comment.line
    }
  };
}

/**
 * Posts every comment as a positioned discussion, in order, then one summary note.
 * A rejected comment is reported and skipped. A missing diff version or a failed
 * summary note aborts the run.
 */
export async function publishReview(
  review: Review,
  gateway: MergeRequestGateway,
  options: PublishOptions
): Promise<PublishResult> {
  const { target, reporter } = options;
  const tally = emptyTally();

  if (review.comments.length === 0) {
    reporter.info("No inline comments to post.");
    await gateway.createNote(target, buildSummaryNote(review.summary, tally, options.noteHeader));
    reporter.success(`Summary posted to MR !${target}`);
    return { total: 0, posted: 0, failed: [], tally };
  }

  reporter.info(`Fetching MR !${target} diff metadata ...`);
  const version = await gateway.fetchLatestVersion(target);
  if (!version) {
    throw new MissingDiffVersionError(target);
  }

  let posted = 0;
  const failed: FailedComment[] = [];

  for (const comment of review.comments) {
    tally[comment.severity] += 1;
    const location = `${comment.file}:${comment.line}`;
    const outcome = await gateway.createPositionedDiscussion(
      target,
      buildDiscussionPayload(version, comment)
    );

    if (outcome.ok) {
      posted += 1;
      reporter.info(`  Posting [${comment.severity}] ${location} ... OK`);
    } else {
      failed.push({ comment, reason: outcome.reason });
      reporter.info(`  Posting [${comment.severity}] ${location} ... FAILED`);
      reporter.error(`  Failed: ${location} (${outcome.reason})`);
    }
  }

  await gateway.createNote(target, buildSummaryNote(review.summary, tally, options.noteHeader));

  reporter.success(
    `Done: ${posted}/${review.comments.length} inline comments + summary posted to MR !${target}`
  );
  return { total: review.comments.length, posted, failed, tally };
}
