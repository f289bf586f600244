import type { DiffVersion, DiscussionPayload, PostOutcome } from "../types/review";

/**
 * The three platform calls a publish run needs. `GlabClient` backs it with the glab CLI;
 * tests use an in-memory fake.
 */
export interface MergeRequestGateway {
  /** Resolves to null when the MR has no diff versions yet. */
  fetchLatestVersion(iid: string): Promise<DiffVersion | null>;
  /** Reports a rejected post as `{ ok: false }` instead of throwing. */
  createPositionedDiscussion(iid: string, payload: DiscussionPayload): Promise<PostOutcome>;
  createNote(iid: string, body: string): Promise<void>;
}
