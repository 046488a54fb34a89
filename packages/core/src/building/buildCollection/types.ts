import type { Collection } from "../../collection/collection.js";
import type { ContentDocument } from "../../content/normalize.js";
import type { BuildIssue } from "../../report.js";

import type { BuildOptionsInput } from "./options.js";

export type ContentSource = {
  // Content-root-relative path, `/`-separated
  path: string;
  text: string;
};

export type BuildLogger = {
  log?: (line: string) => void;
  warn?: (line: string) => void;
  error?: (line: string) => void;
};

export type BuildCollectionInput = {
  sources: readonly ContentSource[];
  options?: BuildOptionsInput;
  logger?: BuildLogger;
};

export type BuildResult = {
  // null when the build hit a fatal problem (duplicate identifiers)
  collection: Collection | null;
  issues: BuildIssue[];
  ok: boolean;
};

export type NormalizedSources = {
  documents: ContentDocument[];
  issues: BuildIssue[];
};

export type IdentifierCheck = {
  duplicateIds: Set<string>;
  issues: BuildIssue[];
};
