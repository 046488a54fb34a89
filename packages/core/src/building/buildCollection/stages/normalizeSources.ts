import { parseDocument } from "../../../content/markdownFrontmatter.js";
import { normalizeDocumentDetailed } from "../../../content/normalize.js";
import { ContentError } from "../../../errors.js";
import { issueFromError, type BuildIssue } from "../../../report.js";

import type { BuildOptions } from "../options.js";
import type { ContentSource, NormalizedSources } from "../types.js";

// Each source is parsed and normalized on its own; one bad document never stops the others
// Unpublished documents are kept; the caller filters them after the identifier check
export function normalizeSourcesStage(
  sources: readonly ContentSource[],
  options: BuildOptions,
): NormalizedSources {
  const documents: NormalizedSources["documents"] = [];
  const issues: BuildIssue[] = [];

  for (const source of sources) {
    let parsed: ReturnType<typeof parseDocument>;
    try {
      parsed = parseDocument(source.text, source.path);
    } catch (error) {
      if (!(error instanceof ContentError)) throw error;
      issues.push(issueFromError(error));
      continue;
    }

    const outcome = normalizeDocumentDetailed(parsed, source.path, {
      postPermalink: options.postPermalink,
      pagePermalink: options.pagePermalink,
      unknownFields: options.unknownFields,
    });

    if (!outcome.ok) {
      issues.push(...outcome.errors.map(issueFromError));
      issues.push(...outcome.warnings);
      continue;
    }

    issues.push(...outcome.warnings);
    documents.push(outcome.document);
  }

  return { documents, issues };
}
