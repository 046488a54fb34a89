// Aggregated build report
// - one row per problem, emitted once per build

import type { ContentError, ContentErrorKind } from "./errors.js";

export type BuildIssueKind = ContentErrorKind | "UnrecognizedField";

export type BuildIssue = {
  source: string;
  kind: BuildIssueKind;
  message: string;
  severity: "warn" | "error";
};

export function issueFromError(error: ContentError): BuildIssue {
  return {
    source: error.source,
    kind: error.kind,
    message: error.message,
    severity: "error",
  };
}

export function hasErrors(issues: readonly BuildIssue[]): boolean {
  return issues.some((issue) => issue.severity === "error");
}

export function formatBuildIssue(issue: BuildIssue): string {
  return `${issue.severity} ${issue.source} ${issue.kind}: ${issue.message}`;
}

export function formatBuildReport(issues: readonly BuildIssue[]): string {
  return issues.map(formatBuildIssue).join("\n");
}

export class CollectionBuildError extends Error {
  constructor(public readonly issues: readonly BuildIssue[]) {
    const errorCount = issues.filter((issue) => issue.severity === "error").length;
    super(`Content build failed with ${errorCount} error(s)\n${formatBuildReport(issues)}`);
    this.name = "CollectionBuildError";
    Object.setPrototypeOf(this, CollectionBuildError.prototype);
  }
}
