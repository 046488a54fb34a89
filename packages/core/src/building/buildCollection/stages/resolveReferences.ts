import {
  createReferenceIndex,
  resolveReferences,
  type ResolvedReference,
} from "../../../collection/resolveReferences.js";
import type { ContentDocument } from "../../../content/normalize.js";
import { issueFromError, type BuildIssue } from "../../../report.js";

// With duplicate identifiers present the index is provisional: the first claimant by path wins,
// so dangling references are still reported for a build that cannot produce a collection
export function resolveReferencesStage(
  documents: readonly ContentDocument[],
  maxDepth: number,
): { resolved: ResolvedReference[]; issues: BuildIssue[] } {
  const index = createReferenceIndex(documents);
  const { resolved, errors } = resolveReferences(documents, index, maxDepth);
  return { resolved, issues: errors.map(issueFromError) };
}
