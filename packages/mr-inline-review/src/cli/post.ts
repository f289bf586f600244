import type { ReviewToolConfig } from "../config";
import type { MergeRequestGateway } from "../glab/gateway";
import { publishReview } from "../publish/publisher";
import { extractReviewJson } from "../review/extract";
import { parseReview } from "../review/normalize";
import { renderDryRun } from "../review/render";
import { mergeRequestIidSchema } from "../types/schemas";
import { ReviewInputError, ReviewToolError } from "../utils/errors";
import type { Reporter } from "../utils/log";

export interface PostCommandOptions {
  target: string;
  dryRun: boolean;
  rawInput: string;
  gateway: MergeRequestGateway;
  reporter: Reporter;
  config: ReviewToolConfig;
}

/** Resolves to the process exit code. */
export async function runPostCommand(options: PostCommandOptions): Promise<number> {
  const { reporter } = options;

  try {
    await postReview(options);
    return 0;
  } catch (error) {
    if (error instanceof ReviewToolError) {
      reporter.error(`Error: ${error.message}`);
      return 1;
    }
    throw error;
  }
}

async function postReview(options: PostCommandOptions) {
  const { target, reporter, config } = options;

  const iid = mergeRequestIidSchema.safeParse(target);
  if (!iid.success) {
    throw new ReviewInputError(`Invalid merge request IID "${target}".`);
  }

  const raw = options.rawInput.trim();
  const payload = extractReviewJson(raw);
  if (!payload) {
    throw new ReviewInputError(
      `Could not find valid JSON in review output.\nRaw output:\n${raw.slice(0, config.excerptChars)}`
    );
  }

  const { review, warnings } = parseReview(payload);
  for (const warning of warnings) {
    reporter.warn(`Warning: ${warning}`);
  }

  if (options.dryRun) {
    reporter.info(`Dry run for MR !${iid.data}:`);
    for (const line of renderDryRun(review)) {
      reporter.info(line);
    }
    return;
  }

  await publishReview(review, options.gateway, {
    target: iid.data,
    noteHeader: config.noteHeader,
    reporter
  });
}
