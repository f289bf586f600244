import { z } from "zod";

import { ConfigError } from "./utils/errors";

const envSchema = z.object({
  MR_REVIEW_GLAB_BIN: z.string().min(1, "MR_REVIEW_GLAB_BIN must not be empty").default("glab"),
  MR_REVIEW_NOTE_HEADER: z
    .string()
    .min(1, "MR_REVIEW_NOTE_HEADER must not be empty")
    .default("## AI Code Review"),
  MR_REVIEW_EXCERPT_CHARS: z.coerce
    .number({ invalid_type_error: "MR_REVIEW_EXCERPT_CHARS must be a number" })
    .int()
    .positive()
    .default(500)
});

export interface ReviewToolConfig {
  glabBin: string;
  noteHeader: string;
  /** How much of the raw review output to echo when no JSON is found. */
  excerptChars: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ReviewToolConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    const formatted = result.error.errors
      .map((err) => `${err.path.join(".")}: ${err.message}`)
      .join("\n");

    throw new ConfigError(`Environment validation failed:\n${formatted}`);
  }

  return {
    glabBin: result.data.MR_REVIEW_GLAB_BIN,
    noteHeader: result.data.MR_REVIEW_NOTE_HEADER,
    excerptChars: result.data.MR_REVIEW_EXCERPT_CHARS
  };
}
