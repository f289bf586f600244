import { execa } from "execa";
import type { z } from "zod";

import type {
  DiffVersion,
  DiscussionPayload,
  MergeRequestRef,
  PostOutcome
} from "../types/review";
import { diffVersionsSchema, mergeRequestListSchema } from "../types/schemas";
import { formatIssues, GlabCommandError, truncate } from "../utils/errors";
import type { MergeRequestGateway } from "./gateway";

export interface GlabClientOptions {
  bin?: string;
  cwd?: string;
}

interface CommandResult {
  command: string;
  exitCode?: number;
  failed: boolean;
  stdout: string;
  stderr: string;
}

export class GlabClient implements MergeRequestGateway {
  private readonly bin: string;
  private readonly cwd?: string;

  constructor(options: GlabClientOptions = {}) {
    this.bin = options.bin ?? "glab";
    this.cwd = options.cwd;
  }

  async fetchLatestVersion(iid: string): Promise<DiffVersion | null> {
    const action = "Fetch diff versions";
    const stdout = await this.run(action, ["api", `projects/:id/merge_requests/${iid}/versions`]);
    const versions = parseOutput(action, stdout, diffVersionsSchema);

    const latest = versions[0];
    if (!latest) {
      return null;
    }
    return {
      baseSha: latest.base_commit_sha,
      startSha: latest.start_commit_sha,
      headSha: latest.head_commit_sha
    };
  }

  async createPositionedDiscussion(
    iid: string,
    payload: DiscussionPayload
  ): Promise<PostOutcome> {
    const result = await this.exec(
      ["api", `projects/:id/merge_requests/${iid}/discussions`, "-X", "POST", "--input", "-"],
      JSON.stringify(payload)
    );
    if (result.failed) {
      return { ok: false, reason: describeFailure(result) };
    }
    return { ok: true };
  }

  async createNote(iid: string, body: string): Promise<void> {
    await this.run("Post summary note", ["mr", "note", iid, "-m", body]);
  }

  async findMergeRequestForBranch(branch: string): Promise<MergeRequestRef | null> {
    const action = "List merge requests for branch";
    const stdout = await this.run(action, ["mr", "list", `--source-branch=${branch}`, "-F", "json"]);
    const [first] = parseOutput(action, stdout, mergeRequestListSchema);
    if (!first) {
      return null;
    }
    return {
      iid: first.iid,
      title: first.title,
      sourceBranch: first.source_branch,
      ...(first.web_url ? { webUrl: first.web_url } : {})
    };
  }

  async listOpenMergeRequests(): Promise<string> {
    return await this.run("List merge requests", ["mr", "list"]);
  }

  async isAvailable(): Promise<boolean> {
    const result = await this.exec(["--version"]);
    return !result.failed;
  }

  private async exec(args: string[], input?: string): Promise<CommandResult> {
    return await execa(this.bin, args, { cwd: this.cwd, input, reject: false });
  }

  private async run(action: string, args: string[], input?: string) {
    const result = await this.exec(args, input);
    if (result.failed) {
      throw new GlabCommandError(formatFailure(action, result), result.command, result.exitCode);
    }
    return result.stdout;
  }
}

function parseOutput<T>(
  action: string,
  stdout: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): T {
  let json: unknown;
  try {
    json = JSON.parse(stdout);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new GlabCommandError(
      [
        `${action} returned invalid JSON.`,
        `JSON parse error: ${message}`,
        `Stdout: ${truncate(stdout)}`
      ].join("\n")
    );
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    throw new GlabCommandError(
      [
        `${action} returned unexpected data.`,
        ...formatIssues(parsed.error.issues).map((issue) => `- ${issue}`)
      ].join("\n")
    );
  }
  return parsed.data;
}

function describeFailure(result: CommandResult) {
  const stderr = result.stderr.trim();
  if (stderr) {
    return stderr;
  }
  return result.exitCode === undefined
    ? `could not run ${result.command}`
    : `exit code ${result.exitCode}`;
}

function formatFailure(action: string, result: CommandResult) {
  const lines = [
    `${action} failed.`,
    `Command: ${result.command}`,
    result.exitCode !== undefined ? `Exit code: ${result.exitCode}` : undefined,
    result.stderr ? `Stderr: ${truncate(result.stderr.trim())}` : undefined
  ].filter((line): line is string => line !== undefined);
  return lines.join("\n");
}
