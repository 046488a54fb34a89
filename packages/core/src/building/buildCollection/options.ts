import { z } from "zod";

import { DEFAULT_MAX_REFERENCE_DEPTH } from "../../collection/resolveReferences.js";
import { DEFAULT_PAGE_PERMALINK, DEFAULT_POST_PERMALINK } from "../../content/slug.js";

export const MAX_SUPPORTED_REFERENCE_DEPTH = 4;

export const buildOptionsSchema = z.object({
  maxReferenceDepth: z
    .number()
    .int()
    .min(1)
    .max(MAX_SUPPORTED_REFERENCE_DEPTH)
    .default(DEFAULT_MAX_REFERENCE_DEPTH)
    .describe("Maximum number of `/`-separated steps in a reference target"),
  unknownFields: z
    .enum(["warn", "ignore"])
    .default("warn")
    .describe("Whether unrecognized front matter keys are reported as warnings"),
  includeUnpublished: z
    .boolean()
    .default(false)
    .describe("Keep documents marked `published: false` in the collection"),
  postPermalink: z
    .string()
    .min(1)
    .default(DEFAULT_POST_PERMALINK)
    .describe("Permalink pattern for posts (:year, :month, :day, :slug, :series)"),
  pagePermalink: z
    .string()
    .min(1)
    .default(DEFAULT_PAGE_PERMALINK)
    .describe("Permalink pattern for pages"),
});

export type BuildOptionsInput = z.input<typeof buildOptionsSchema>;
export type BuildOptions = z.output<typeof buildOptionsSchema>;

export function parseBuildOptions(input: BuildOptionsInput = {}): BuildOptions {
  const parsed = buildOptionsSchema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid build options: ${details}`);
  }
  return parsed.data;
}
