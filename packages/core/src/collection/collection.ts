// Immutable document collection
// - built once per build, then only queried
// - sequence and identifier index are derived together in the constructor

import { parseContentDate } from "../content/dates.js";
import type { LayoutKind } from "../content/frontmatterFields.js";
import type { ContentDocument } from "../content/normalize.js";
import { DuplicateIdentifierError, NotFoundError } from "../errors.js";

import { compareChronologically, compareDocuments } from "./ordering.js";
import type { ResolvedReference } from "./resolveReferences.js";

export type CollectionJson = {
  documents: Array<ContentDocument & { resolvedReferences: readonly ResolvedReference[] }>;
};

const EMPTY_REFERENCES: readonly ResolvedReference[] = Object.freeze([]);
const DAY_MS = 24 * 60 * 60 * 1000;

// Returns every identifier claimed by more than one document, with the claiming paths sorted
export function findDuplicateIdentifiers(
  documents: Iterable<ContentDocument>,
): DuplicateIdentifierError[] {
  const pathsById = new Map<string, string[]>();
  for (const document of documents) {
    const paths = pathsById.get(document.id) ?? [];
    paths.push(document.sourcePath);
    pathsById.set(document.id, paths);
  }

  return [...pathsById.entries()]
    .filter(([, paths]) => paths.length > 1)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([id, paths]) => new DuplicateIdentifierError(id, [...paths].sort()));
}

function groupReferences(
  references: readonly ResolvedReference[],
  key: "sourceId" | "targetId",
): Map<string, readonly ResolvedReference[]> {
  const grouped = new Map<string, ResolvedReference[]>();
  for (const reference of references) {
    const list = grouped.get(reference[key]) ?? [];
    list.push(Object.freeze({ ...reference }));
    grouped.set(reference[key], list);
  }
  return new Map(
    [...grouped.entries()].map(([id, list]): [string, readonly ResolvedReference[]] => [
      id,
      Object.freeze(list),
    ]),
  );
}

export class Collection implements Iterable<ContentDocument> {
  readonly documents: readonly ContentDocument[];
  private readonly positionById: ReadonlyMap<string, number>;
  private readonly chronology: ReadonlyMap<LayoutKind, readonly ContentDocument[]>;
  private readonly outgoing: ReadonlyMap<string, readonly ResolvedReference[]>;
  private readonly incoming: ReadonlyMap<string, readonly ResolvedReference[]>;

  private constructor(documents: ContentDocument[], references: readonly ResolvedReference[]) {
    const [duplicate] = findDuplicateIdentifiers(documents);
    if (duplicate) throw duplicate;

    const sorted = [...documents].sort(compareDocuments);
    this.documents = Object.freeze(sorted);
    this.positionById = new Map(sorted.map((document, i): [string, number] => [document.id, i]));

    const chronology = new Map<LayoutKind, ContentDocument[]>();
    for (const document of sorted) {
      if (document.publishedAt === null) continue;
      const list = chronology.get(document.layout) ?? [];
      list.push(document);
      chronology.set(document.layout, list);
    }
    for (const list of chronology.values()) list.sort(compareChronologically);
    this.chronology = chronology;

    const known = references.filter(
      (reference) =>
        this.positionById.has(reference.sourceId) && this.positionById.has(reference.targetId),
    );
    this.outgoing = groupReferences(known, "sourceId");
    this.incoming = groupReferences(known, "targetId");
  }

  // Throws DuplicateIdentifierError when two documents share an identifier
  static assemble(
    documents: Iterable<ContentDocument>,
    references: readonly ResolvedReference[] = [],
  ): Collection {
    return new Collection([...documents], references);
  }

  get size(): number {
    return this.documents.length;
  }

  [Symbol.iterator](): Iterator<ContentDocument> {
    return this.documents[Symbol.iterator]();
  }

  has(id: string): boolean {
    return this.positionById.has(id);
  }

  find(id: string): ContentDocument | null {
    const position = this.positionById.get(id);
    if (position === undefined) return null;
    return this.documents[position] ?? null;
  }

  get(id: string): ContentDocument {
    const document = this.find(id);
    if (!document) throw new NotFoundError(id);
    return document;
  }

  // Next older document of the same layout; null for the oldest or an undated document
  previous(id: string): ContentDocument | null {
    return this.neighbor(id, -1);
  }

  // Next newer document of the same layout; null for the newest or an undated document
  next(id: string): ContentDocument | null {
    return this.neighbor(id, 1);
  }

  private neighbor(id: string, offset: -1 | 1): ContentDocument | null {
    const document = this.get(id);
    const timeline = this.chronology.get(document.layout) ?? [];
    const position = timeline.indexOf(document);
    if (position === -1) return null;
    return timeline[position + offset] ?? null;
  }

  ofLayout(layout: LayoutKind): ContentDocument[] {
    return this.documents.filter((document) => document.layout === layout);
  }

  inSeries(series: string): ContentDocument[] {
    return this.documents
      .filter((document) => document.series === series)
      .sort(compareChronologically);
  }

  // Inclusive range; a date-only `to` covers that whole day
  between(from: string | Date, to: string | Date): ContentDocument[] {
    const start = parseContentDate(from, "<between:from>");
    let end = parseContentDate(to, "<between:to>");
    if (typeof to === "string" && /^\d{4}-\d{2}-\d{2}$/.test(to.trim())) {
      end = new Date(Date.parse(end) + DAY_MS - 1).toISOString();
    }

    return this.documents.filter((document) => {
      const publishedAt = document.publishedAt;
      return publishedAt !== null && publishedAt >= start && publishedAt <= end;
    });
  }

  referencesOf(id: string): readonly ResolvedReference[] {
    this.get(id);
    return this.outgoing.get(id) ?? EMPTY_REFERENCES;
  }

  backlinks(id: string): readonly ResolvedReference[] {
    this.get(id);
    return this.incoming.get(id) ?? EMPTY_REFERENCES;
  }

  toJSON(): CollectionJson {
    return {
      documents: this.documents.map((document) => ({
        ...document,
        resolvedReferences: this.outgoing.get(document.id) ?? EMPTY_REFERENCES,
      })),
    };
  }
}
