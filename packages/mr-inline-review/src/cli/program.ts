import fs from "node:fs/promises";

import chalk from "chalk";
import { Command } from "commander";
import { execa } from "execa";

import { loadConfig } from "../config";
import { GlabClient } from "../glab/client";
import { getBranchName } from "../utils/git";
import { createConsoleReporter } from "../utils/log";
import { readStdin } from "../utils/stdin";
import { runPostCommand } from "./post";

interface PostOptions {
  dryRun?: boolean;
  input?: string;
}

export interface ProgramOptions {
  /** Source of the review output when `--input` is not given. */
  readInput?: () => Promise<string>;
}

export function createProgram(programOptions: ProgramOptions = {}) {
  const readInput = programOptions.readInput ?? readStdin;
  const program = new Command();

  program
    .name("mr-inline-review")
    .description("Post AI review output as inline comments on a GitLab merge request via glab.");

  program
    .command("post", { isDefault: true })
    .description("Extract the review JSON from stdin and post it to a merge request")
    .argument("<mr>", "Merge request IID")
    .option("--dry-run", "Print what would be posted without calling glab")
    .option("--input <path>", "Read review output from a file instead of stdin")
    .action(async (mr: string, options: PostOptions) => {
      const config = loadConfig();
      const rawInput = options.input
        ? await fs.readFile(options.input, "utf8")
        : await readInput();

      process.exitCode = await runPostCommand({
        target: mr,
        dryRun: options.dryRun === true,
        rawInput,
        gateway: new GlabClient({ bin: config.glabBin }),
        reporter: createConsoleReporter(),
        config
      });
    });

  program
    .command("current-mr")
    .description("Print the IID of the open merge request for the current branch")
    .action(async () => {
      const config = loadConfig();
      const branch = await getBranchName(process.cwd());
      const mergeRequest = await new GlabClient({ bin: config.glabBin }).findMergeRequestForBranch(
        branch
      );

      if (!mergeRequest) {
        console.warn(chalk.yellow(`No open merge request found for branch ${branch}.`));
        process.exitCode = 1;
        return;
      }
      console.log(String(mergeRequest.iid));
    });

  program
    .command("list")
    .description("List open merge requests")
    .action(async () => {
      const config = loadConfig();
      const output = await new GlabClient({ bin: config.glabBin }).listOpenMergeRequests();
      console.log(chalk.bold("Open Merge Requests:"));
      console.log(output);
    });

  program
    .command("doctor")
    .description("Check dependencies")
    .action(async () => {
      const config = loadConfig();
      const checks: Array<{ label: string; ok: boolean }> = [];
      checks.push({ label: "git", ok: await binaryOk("git", ["--version"]) });
      checks.push({
        label: config.glabBin,
        ok: await new GlabClient({ bin: config.glabBin }).isAvailable()
      });

      for (const check of checks) {
        const icon = check.ok ? chalk.green("✓") : chalk.red("✗");
        console.log(`${icon} ${check.label}`);
      }
      if (checks.some((check) => !check.ok)) {
        process.exitCode = 1;
      }
    });

  program
    .command("config")
    .description("Print effective config")
    .action(() => {
      console.log(JSON.stringify(loadConfig(), null, 2));
    });

  return program;
}

async function binaryOk(cmd: string, args: string[]) {
  const result = await execa(cmd, args, { reject: false });
  return !result.failed;
}
