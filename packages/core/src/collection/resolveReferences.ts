// Reference resolution
// - per step: exact slug, then filename stem, then slugified text, then series selector
// - expressions deeper than maxDepth steps are rejected before any lookup, so nothing loops

import type { ContentDocument } from "../content/normalize.js";
import {
  parseReferenceExpression,
  type DocumentReference,
  type ReferenceStep,
} from "../content/references.js";
import { filenameStem, slugify } from "../content/slug.js";
import {
  ContentError,
  DanglingReferenceError,
  UnsupportedReferenceDepthError,
} from "../errors.js";

import { compareChronologically } from "./ordering.js";

export const DEFAULT_MAX_REFERENCE_DEPTH = 1;

export type ReferenceMatch = "slug" | "filename" | "series";

export type ResolvedReference = DocumentReference & {
  sourceId: string;
  targetId: string;
  matchedBy: ReferenceMatch;
};

export type ReferenceIndex = {
  byId: ReadonlyMap<string, ContentDocument>;
  byStem: ReadonlyMap<string, readonly ContentDocument[]>;
  bySeries: ReadonlyMap<string, readonly ContentDocument[]>;
};

export type ReferenceResolution = {
  resolved: ResolvedReference[];
  errors: ContentError[];
};

export function createReferenceIndex(documents: Iterable<ContentDocument>): ReferenceIndex {
  const byId = new Map<string, ContentDocument>();
  const byStem = new Map<string, ContentDocument[]>();
  const bySeries = new Map<string, ContentDocument[]>();

  for (const document of documents) {
    if (byId.has(document.id)) continue;
    byId.set(document.id, document);

    const stem = filenameStem(document.sourcePath);
    const stemMatches = byStem.get(stem) ?? [];
    stemMatches.push(document);
    byStem.set(stem, stemMatches);

    if (document.series) {
      const members = bySeries.get(document.series) ?? [];
      members.push(document);
      bySeries.set(document.series, members);
    }
  }

  for (const members of bySeries.values()) members.sort(compareChronologically);

  return { byId, byStem, bySeries };
}

type StepMatch = { document: ContentDocument; matchedBy: ReferenceMatch };

function resolveSeriesStep(
  context: ContentDocument,
  step: ReferenceStep,
  index: ReferenceIndex,
): StepMatch | string {
  const selector = step.seriesSelector;
  if (selector === null) return `no document with identifier or filename "${step.text}"`;
  if (selector === "invalid") return `unknown series selector "${step.text}"`;
  if (!context.series) return `"${context.id}" is not part of a series`;

  const members = index.bySeries.get(context.series) ?? [];
  const position = members.findIndex((member) => member.id === context.id);

  let target: ContentDocument | undefined;
  switch (selector) {
    case "first":
      target = members[0];
      break;
    case "last":
      target = members[members.length - 1];
      break;
    case "previous":
      target = position > 0 ? members[position - 1] : undefined;
      break;
    case "next":
      target = position >= 0 ? members[position + 1] : undefined;
      break;
    default:
      target = members[selector - 1];
      break;
  }

  if (!target) {
    const what = typeof selector === "number" ? `position ${selector}` : `${selector} document`;
    return `series "${context.series}" has no ${what} for "${context.id}"`;
  }
  return { document: target, matchedBy: "series" };
}

function resolveStep(
  context: ContentDocument,
  step: ReferenceStep,
  index: ReferenceIndex,
): StepMatch | string {
  const exact = index.byId.get(step.text);
  if (exact) return { document: exact, matchedBy: "slug" };

  const byStem = index.byStem.get(step.text) ?? [];
  if (byStem.length > 1) {
    return `filename "${step.text}" matches ${byStem.length} documents`;
  }
  const [stemMatch] = byStem;
  if (stemMatch) return { document: stemMatch, matchedBy: "filename" };

  const slugified = index.byId.get(slugify(step.text));
  if (slugified) return { document: slugified, matchedBy: "slug" };

  return resolveSeriesStep(context, step, index);
}

export function resolveReference(
  source: ContentDocument,
  reference: DocumentReference,
  index: ReferenceIndex,
  maxDepth: number = DEFAULT_MAX_REFERENCE_DEPTH,
): ResolvedReference {
  const steps = parseReferenceExpression(reference.target);
  if (steps.length === 0) {
    throw new DanglingReferenceError(source.id, reference.name, reference.raw, "empty target");
  }
  if (steps.length > maxDepth) {
    throw new UnsupportedReferenceDepthError(source.id, reference.target, steps.length, maxDepth);
  }

  let context = source;
  let matchedBy: ReferenceMatch = "slug";
  for (const step of steps) {
    const match = resolveStep(context, step, index);
    if (typeof match === "string") {
      throw new DanglingReferenceError(source.id, reference.name, reference.target, match);
    }
    context = match.document;
    matchedBy = match.matchedBy;
  }

  return { ...reference, sourceId: source.id, targetId: context.id, matchedBy };
}

// Never throws for content problems: every failure is collected
export function resolveReferences(
  documents: Iterable<ContentDocument>,
  index: ReferenceIndex,
  maxDepth: number = DEFAULT_MAX_REFERENCE_DEPTH,
): ReferenceResolution {
  const resolved: ResolvedReference[] = [];
  const errors: ContentError[] = [];

  for (const document of documents) {
    for (const reference of document.references) {
      try {
        resolved.push(resolveReference(document, reference, index, maxDepth));
      } catch (error) {
        if (!(error instanceof ContentError)) throw error;
        errors.push(error);
      }
    }
  }

  return { resolved, errors };
}
