import type { MergeRequestGateway } from "../src/glab/gateway";
import type { DiffVersion, DiscussionPayload, PostOutcome } from "../src/types/review";
import type { Reporter } from "../src/utils/log";

export const TEST_VERSION: DiffVersion = {
  baseSha: "base000",
  startSha: "start000",
  headSha: "head000"
};

export class FakeGateway implements MergeRequestGateway {
  version: DiffVersion | null = TEST_VERSION;
  failingFiles = new Set<string>();
  noteError: Error | null = null;

  readonly versionRequests: string[] = [];
  readonly discussions: Array<{ iid: string; payload: DiscussionPayload }> = [];
  readonly notes: Array<{ iid: string; body: string }> = [];

  get callCount() {
    return this.versionRequests.length + this.discussions.length + this.notes.length;
  }

  async fetchLatestVersion(iid: string) {
    this.versionRequests.push(iid);
    return this.version;
  }

  async createPositionedDiscussion(iid: string, payload: DiscussionPayload): Promise<PostOutcome> {
    this.discussions.push({ iid, payload });
    if (this.failingFiles.has(payload.position.new_path)) {
      return { ok: false, reason: "400 Bad Request: line_code can't be blank" };
    }
    return { ok: true };
  }

  async createNote(iid: string, body: string) {
    this.notes.push({ iid, body });
    if (this.noteError) {
      throw this.noteError;
    }
  }
}

export type ReportedLine = { level: keyof Reporter; message: string };

export function createMemoryReporter() {
  const lines: ReportedLine[] = [];
  const reporter: Reporter = {
    info: (message) => lines.push({ level: "info", message }),
    success: (message) => lines.push({ level: "success", message }),
    warn: (message) => lines.push({ level: "warn", message }),
    error: (message) => lines.push({ level: "error", message })
  };
  const messages = (level?: keyof Reporter) =>
    lines.filter((line) => !level || line.level === level).map((line) => line.message);
  return { reporter, lines, messages };
}
