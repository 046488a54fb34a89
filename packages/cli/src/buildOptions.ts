import type { BuildOptionsInput, InkwellEnv, UnknownFieldPolicy } from "@inkwell/core";

// Flags shared by every command that builds the collection
export type BuildFlags = {
  includeUnpublished?: boolean;
  maxReferenceDepth?: number;
  unknownFields?: UnknownFieldPolicy;
};

// Flags win over INKWELL_* variables; anything unset falls through to the core defaults
export function resolveBuildOptions(flags: BuildFlags, env: InkwellEnv): BuildOptionsInput {
  const includeUnpublished = flags.includeUnpublished ?? env.includeUnpublished;
  const maxReferenceDepth = flags.maxReferenceDepth ?? env.maxReferenceDepth;
  return {
    ...(includeUnpublished !== undefined ? { includeUnpublished } : {}),
    ...(maxReferenceDepth !== undefined ? { maxReferenceDepth } : {}),
    ...(flags.unknownFields ? { unknownFields: flags.unknownFields } : {}),
  };
}
