import { Collection } from "../collection/collection.js";
import { listMarkdownFiles, readUtf8File, relPathFromAbs } from "../content/filesystem.js";
import {
  CollectionBuildError,
  formatBuildIssue,
  hasErrors,
  type BuildIssue,
} from "../report.js";

import { parseBuildOptions } from "./buildCollection/options.js";
import { checkIdentifiersStage } from "./buildCollection/stages/checkIdentifiers.js";
import { normalizeSourcesStage } from "./buildCollection/stages/normalizeSources.js";
import { resolveReferencesStage } from "./buildCollection/stages/resolveReferences.js";
import type { BuildOptionsInput } from "./buildCollection/options.js";
import type {
  BuildCollectionInput,
  BuildLogger,
  BuildResult,
  ContentSource,
} from "./buildCollection/types.js";

function logLine(logger: BuildLogger | undefined, line: string): void {
  logger?.log?.(line);
}

function reportIssue(logger: BuildLogger | undefined, issue: BuildIssue): void {
  const line = formatBuildIssue(issue);
  if (issue.severity === "warn") logger?.warn?.(line);
  else logger?.error?.(line);
}

function comparePaths(a: ContentSource, b: ContentSource): number {
  if (a.path < b.path) return -1;
  if (a.path > b.path) return 1;
  return 0;
}

// parse -> normalize -> check identifiers -> resolve references -> assemble
// Every content problem ends up in `issues`; only programming errors throw.
export function buildCollection(input: BuildCollectionInput): BuildResult {
  const options = parseBuildOptions(input.options);
  const sources = [...input.sources].sort(comparePaths);
  const issues: BuildIssue[] = [];

  logLine(input.logger, `[inkwell] sources=${sources.length}`);

  const normalized = normalizeSourcesStage(sources, options);
  issues.push(...normalized.issues);

  // Unpublished documents claim identifiers as well
  const identifiers = checkIdentifiersStage(normalized.documents);
  issues.push(...identifiers.issues);

  const documents = options.includeUnpublished
    ? normalized.documents
    : normalized.documents.filter((document) => document.published);
  const skippedUnpublished = normalized.documents.length - documents.length;
  if (skippedUnpublished > 0) {
    logLine(input.logger, `[inkwell] skipped unpublished=${skippedUnpublished}`);
  }

  const references = resolveReferencesStage(documents, options.maxReferenceDepth);
  issues.push(...references.issues);

  const collection =
    identifiers.duplicateIds.size === 0
      ? Collection.assemble(documents, references.resolved)
      : null;

  for (const issue of issues) reportIssue(input.logger, issue);

  logLine(
    input.logger,
    `[inkwell] documents=${collection?.size ?? 0}, ` +
      `references=${references.resolved.length}, issues=${issues.length}`,
  );

  return { collection, issues, ok: collection !== null && !hasErrors(issues) };
}

export async function loadContentSources(contentDir: string): Promise<ContentSource[]> {
  const absPaths = await listMarkdownFiles(contentDir);
  const sources: ContentSource[] = [];
  // One file open at a time
  for (const absPath of absPaths) {
    sources.push({ path: relPathFromAbs(contentDir, absPath), text: await readUtf8File(absPath) });
  }
  return sources;
}

export async function buildCollectionFromDirectory(
  contentDir: string,
  options: BuildOptionsInput = {},
  logger?: BuildLogger,
): Promise<BuildResult> {
  const sources = await loadContentSources(contentDir);
  logLine(logger, `[inkwell] content=${contentDir}`);
  return buildCollection({ sources, options, ...(logger ? { logger } : {}) });
}

export function assertBuildOk(result: BuildResult): Collection {
  if (!result.ok || !result.collection) throw new CollectionBuildError(result.issues);
  return result.collection;
}
