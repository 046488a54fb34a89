import type { ContentDocument } from "../content/normalize.js";

function compareIds(a: ContentDocument, b: ContentDocument): number {
  if (a.id < b.id) return -1;
  if (a.id > b.id) return 1;
  return 0;
}

// Collection order: newest first, undated last, ties by identifier ascending
export function compareDocuments(a: ContentDocument, b: ContentDocument): number {
  if (a.publishedAt !== b.publishedAt) {
    if (a.publishedAt === null) return 1;
    if (b.publishedAt === null) return -1;
    return a.publishedAt < b.publishedAt ? 1 : -1;
  }
  return compareIds(a, b);
}

// Series/navigation order: oldest first, undated last, ties by identifier ascending
export function compareChronologically(a: ContentDocument, b: ContentDocument): number {
  if (a.publishedAt !== b.publishedAt) {
    if (a.publishedAt === null) return 1;
    if (b.publishedAt === null) return -1;
    return a.publishedAt < b.publishedAt ? -1 : 1;
  }
  return compareIds(a, b);
}
