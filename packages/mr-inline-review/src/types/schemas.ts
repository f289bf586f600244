import { z } from "zod";

const nullableOptional = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => (value === null ? undefined : value), schema.optional()) as z.ZodType<
    z.output<T> | undefined,
    z.ZodTypeDef,
    z.input<T> | null | undefined
  >;

export const commentPayloadSchema = z.object({
  file: z.string().min(1),
  line: z.number().int().positive(),
  // Anything goes here; unrecognized values fall back to suggestion during normalization.
  severity: nullableOptional(z.unknown()),
  body: z.string()
});

export const reviewPayloadSchema = z.object({
  summary: nullableOptional(z.string()),
  comments: nullableOptional(z.array(commentPayloadSchema))
});

export const diffVersionSchema = z.object({
  id: nullableOptional(z.number()),
  base_commit_sha: z.string().min(1),
  start_commit_sha: z.string().min(1),
  head_commit_sha: z.string().min(1),
  created_at: nullableOptional(z.string())
});

// GitLab lists versions newest first.
export const diffVersionsSchema = z.array(diffVersionSchema);

export const mergeRequestListSchema = z.array(
  z.object({
    iid: z.number().int().positive(),
    title: z.string(),
    source_branch: z.string(),
    web_url: nullableOptional(z.string())
  })
);

export const mergeRequestIidSchema = z
  .string()
  .regex(/^[1-9]\d*$/, "merge request IID must be a positive integer");
