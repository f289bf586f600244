import path from "node:path";

import { afterAll, beforeAll, beforeEach, describe, expect, it } from "vitest";

import { GlabClient } from "../src/glab/client";
import { buildDiscussionPayload } from "../src/publish/publisher";
import { GlabCommandError } from "../src/utils/errors";
import { createMockGlab, type MockGlab } from "./mock-glab";

let glab: MockGlab;
let client: GlabClient;

beforeAll(async () => {
  glab = await createMockGlab();
  client = new GlabClient({ bin: glab.bin });
});

beforeEach(async () => {
  await glab.resetCalls();
});

afterAll(async () => {
  await glab.cleanup();
});

describe("GlabClient", () => {
  it("returns the newest diff version", async () => {
    await expect(client.fetchLatestVersion("12")).resolves.toEqual({
      baseSha: "b2",
      startSha: "s2",
      headSha: "h2"
    });
    const calls = await glab.readCalls();
    expect(calls[0]?.args).toEqual(["api", "projects/:id/merge_requests/12/versions"]);
  });

  it("returns null when the MR has no versions", async () => {
    await expect(client.fetchLatestVersion("404")).resolves.toBeNull();
  });

  it("throws when fetching versions fails", async () => {
    await expect(client.fetchLatestVersion("500")).rejects.toMatchObject({
      name: "GlabCommandError",
      exitCode: 1
    });
    await expect(client.fetchLatestVersion("500")).rejects.toThrow(
      /Stderr: 500 Internal Server Error/
    );
  });

  it("throws when the versions output is not JSON", async () => {
    await expect(client.fetchLatestVersion("777")).rejects.toThrow(
      /Fetch diff versions returned invalid JSON/
    );
  });

  it("posts a discussion payload on stdin", async () => {
    const payload = buildDiscussionPayload(
      { baseSha: "b2", startSha: "s2", headSha: "h2" },
      { file: "src/a.ts", line: 8, severity: "warning", body: "Check bounds." }
    );

    await expect(client.createPositionedDiscussion("12", payload)).resolves.toEqual({ ok: true });

    const [call] = await glab.readCalls();
    expect(call?.args).toEqual([
      "api",
      "projects/:id/merge_requests/12/discussions",
      "-X",
      "POST",
      "--input",
      "-"
    ]);
    expect(JSON.parse(call?.stdin ?? "null")).toEqual(payload);
  });

  it("reports a rejected discussion instead of throwing", async () => {
    const version = { baseSha: "b2", startSha: "s2", headSha: "h2" };
    const rejected = buildDiscussionPayload(version, {
      file: "src/a.ts",
      line: 13,
      severity: "critical",
      body: "x"
    });
    const silent = buildDiscussionPayload(version, {
      file: "src/a.ts",
      line: 14,
      severity: "critical",
      body: "y"
    });

    await expect(client.createPositionedDiscussion("12", rejected)).resolves.toEqual({
      ok: false,
      reason: "400 Bad Request: line_code invalid"
    });
    await expect(client.createPositionedDiscussion("12", silent)).resolves.toEqual({
      ok: false,
      reason: "exit code 2"
    });
  });

  it("posts the summary note as an MR note", async () => {
    await client.createNote("12", "## AI Code Review\n\nok");
    const [call] = await glab.readCalls();
    expect(call?.args).toEqual(["mr", "note", "12", "-m", "## AI Code Review\n\nok"]);
  });

  it("throws when the summary note is rejected", async () => {
    await expect(client.createNote("500", "body")).rejects.toThrow(GlabCommandError);
  });

  it("finds the merge request for a branch", async () => {
    await expect(client.findMergeRequestForBranch("feature/parser")).resolves.toEqual({
      iid: 7,
      title: "Add parser",
      sourceBranch: "feature/parser",
      webUrl: "https://gitlab.example.com/mr/7"
    });
    await expect(client.findMergeRequestForBranch("main")).resolves.toBeNull();
  });

  it("lists open merge requests", async () => {
    await expect(client.listOpenMergeRequests()).resolves.toBe("!7  Add parser  (feature/parser)");
  });

  it("detects whether glab can run", async () => {
    await expect(client.isAvailable()).resolves.toBe(true);
    await expect(
      new GlabClient({ bin: path.join(path.dirname(glab.bin), "missing-glab") }).isAvailable()
    ).resolves.toBe(false);
  });
});
