// Front matter normalization
// - validates the closed field set into a typed, frozen ContentDocument
// - an explicit `date` field takes precedence over the filename date prefix

import { ContentError, InvalidFieldError, MissingFieldError } from "../errors.js";
import type { BuildIssue } from "../report.js";

import { readContentDate, splitFilenameDate, type ContentDate } from "./dates.js";
import {
  REFERENCE_KEYS,
  SINGLE_TARGET_REFERENCE_KEYS,
  isLayoutKind,
  listUnrecognizedKeys,
  type LayoutKind,
} from "./frontmatterFields.js";
import type { FrontmatterRecord, FrontmatterValue, ParsedDocument } from "./markdownFrontmatter.js";
import {
  extractBodyReferences,
  extractMetadataReferences,
  type DocumentReference,
} from "./references.js";
import {
  DEFAULT_PAGE_PERMALINK,
  DEFAULT_POST_PERMALINK,
  expandPermalink,
  filenameStem,
  slugify,
  type PermalinkFields,
} from "./slug.js";

export type ContentDocument = Readonly<{
  id: string;
  sourcePath: string;
  layout: LayoutKind;
  title: string;
  summary: string;
  publishedAt: string | null;
  url: string;
  series: string | null;
  tags: readonly string[];
  published: boolean;
  body: string;
  references: readonly DocumentReference[];
}>;

export type UnknownFieldPolicy = "warn" | "ignore";

export type NormalizeOptions = {
  postPermalink?: string;
  pagePermalink?: string;
  unknownFields?: UnknownFieldPolicy;
};

export type NormalizeOutcome =
  | { ok: true; document: ContentDocument; warnings: BuildIssue[] }
  | { ok: false; errors: ContentError[]; warnings: BuildIssue[] };

function coerceString(
  value: FrontmatterValue | undefined,
  key: string,
  source: string,
): string | null {
  if (value === undefined || value === null) return null;
  if (Array.isArray(value)) {
    throw new InvalidFieldError(source, key, "expected a single value, got a list");
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed ? trimmed : null;
  }

  // YAML infers types for unquoted scalars (`title: 1984`, `slug: 2015-08-12`)
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  if (typeof value === "boolean") return String(value);
  if (value instanceof Date && Number.isFinite(value.getTime())) {
    return value.toISOString().slice(0, 10);
  }

  return null;
}

function normalizeStringList(value: FrontmatterValue | undefined): string[] {
  if (value === undefined || value === null) return [];
  const items = Array.isArray(value) ? value : [value];

  const deduped: string[] = [];
  const seen = new Set<string>();
  for (const item of items) {
    const text =
      typeof item === "string" ? item.trim() : typeof item === "number" ? String(item) : "";
    if (!text || seen.has(text)) continue;
    seen.add(text);
    deduped.push(text);
  }

  return deduped;
}

function readLayout(metadata: FrontmatterRecord, source: string): LayoutKind {
  const layout = coerceString(metadata.layout, "layout", source);
  if (!layout) throw new MissingFieldError(source, "layout");
  if (!isLayoutKind(layout)) {
    throw new InvalidFieldError(source, "layout", `"${layout}" is not one of post, page`);
  }
  return layout;
}

function readTitle(metadata: FrontmatterRecord, source: string): string {
  const title = coerceString(metadata.title, "title", source);
  if (!title) throw new MissingFieldError(source, "title");
  return title;
}

function readPublished(metadata: FrontmatterRecord, source: string): boolean {
  const value = metadata.published;
  if (value === undefined || value === null) return true;
  if (typeof value === "boolean") return value;
  throw new InvalidFieldError(source, "published", "expected true or false");
}

function readSlug(metadata: FrontmatterRecord, sourcePath: string): string {
  const explicit = coerceString(metadata.slug, "slug", sourcePath);
  const stem = filenameStem(sourcePath);
  const fromFilename = splitFilenameDate(stem)?.rest ?? stem;

  const slug = slugify(explicit ?? fromFilename);
  if (!slug) throw new MissingFieldError(sourcePath, "slug");
  return slug;
}

function readPublicationDate(
  metadata: FrontmatterRecord,
  sourcePath: string,
  layout: LayoutKind | undefined,
): ContentDate | null {
  const explicit = metadata.date;
  if (explicit !== undefined && explicit !== null) {
    if (Array.isArray(explicit)) {
      throw new InvalidFieldError(sourcePath, "date", "expected a single value, got a list");
    }
    return readContentDate(explicit, sourcePath);
  }

  const filenameDate = splitFilenameDate(filenameStem(sourcePath));
  if (filenameDate) return readContentDate(filenameDate.dateToken, sourcePath);

  if (layout === "post") throw new MissingFieldError(sourcePath, "date");
  return null;
}

function readUrl(
  metadata: FrontmatterRecord,
  sourcePath: string,
  layout: LayoutKind,
  fields: PermalinkFields,
  options: NormalizeOptions,
): string {
  const explicit = coerceString(metadata.permalink, "permalink", sourcePath);
  if (explicit) {
    if (!explicit.startsWith("/")) {
      throw new InvalidFieldError(sourcePath, "permalink", `"${explicit}" must start with "/"`);
    }
    return explicit;
  }

  const pattern =
    layout === "post"
      ? (options.postPermalink ?? DEFAULT_POST_PERMALINK)
      : (options.pagePermalink ?? DEFAULT_PAGE_PERMALINK);
  const url = expandPermalink(pattern, fields);
  if (url === null) {
    throw new InvalidFieldError(
      sourcePath,
      "permalink",
      `pattern "${pattern}" needs a date or series the document does not have`,
    );
  }
  return url;
}

function unknownFieldWarnings(
  metadata: FrontmatterRecord,
  sourcePath: string,
  policy: UnknownFieldPolicy,
): BuildIssue[] {
  if (policy === "ignore") return [];
  return listUnrecognizedKeys(metadata).map((key): BuildIssue => ({
    source: sourcePath,
    kind: "UnrecognizedField",
    message: `Unrecognized front matter field "${key}" is ignored`,
    severity: "warn",
  }));
}

// Collects every field problem of one document instead of stopping at the first
export function normalizeDocumentDetailed(
  parsed: ParsedDocument,
  sourcePath: string,
  options: NormalizeOptions = {},
): NormalizeOutcome {
  const { metadata, body } = parsed;
  const errors: ContentError[] = [];
  const warnings = unknownFieldWarnings(metadata, sourcePath, options.unknownFields ?? "warn");

  const attempt = <T>(read: () => T): T | undefined => {
    try {
      return read();
    } catch (error) {
      if (error instanceof ContentError) {
        errors.push(error);
        return undefined;
      }
      throw error;
    }
  };

  const layout = attempt(() => readLayout(metadata, sourcePath));
  const title = attempt(() => readTitle(metadata, sourcePath));
  const summary = attempt(() => coerceString(metadata.summary, "summary", sourcePath) ?? "");
  const series = attempt(() => coerceString(metadata.series, "series", sourcePath));
  const published = attempt(() => readPublished(metadata, sourcePath));
  const slug = attempt(() => readSlug(metadata, sourcePath));
  const contentDate = attempt(() => readPublicationDate(metadata, sourcePath, layout));
  const metadataReferences = attempt(() => extractMetadataReferences(metadata, sourcePath));

  const url =
    layout !== undefined && slug !== undefined && contentDate !== undefined && series !== undefined
      ? attempt(() =>
          readUrl(
            metadata,
            sourcePath,
            layout,
            { slug, dateParts: contentDate?.dateParts ?? null, series },
            options,
          ),
        )
      : undefined;

  if (
    errors.length > 0 ||
    layout === undefined ||
    title === undefined ||
    summary === undefined ||
    series === undefined ||
    published === undefined ||
    slug === undefined ||
    contentDate === undefined ||
    metadataReferences === undefined ||
    url === undefined
  ) {
    return { ok: false, errors, warnings };
  }

  const references = [...metadataReferences, ...extractBodyReferences(body)].map((reference) =>
    Object.freeze(reference),
  );

  const document: ContentDocument = Object.freeze({
    id: slug,
    sourcePath,
    layout,
    title,
    summary,
    publishedAt: contentDate?.publishedAt ?? null,
    url,
    series,
    tags: Object.freeze(normalizeStringList(metadata.tags)),
    published,
    body,
    references: Object.freeze(references),
  });

  return { ok: true, document, warnings };
}

export function normalizeDocument(
  parsed: ParsedDocument,
  sourcePath: string,
  options: NormalizeOptions = {},
): ContentDocument {
  const outcome = normalizeDocumentDetailed(parsed, sourcePath, options);
  if (!outcome.ok) {
    const [first] = outcome.errors;
    if (first) throw first;
    throw new Error(`Normalization of ${sourcePath} failed without a reported error`);
  }
  return outcome.document;
}

// Canonical front matter for a normalized document
// - normalizing it again with the same path and body yields an equal document
export function toFrontmatter(document: ContentDocument): FrontmatterRecord {
  const record: FrontmatterRecord = {
    layout: document.layout,
    title: document.title,
    summary: document.summary,
    slug: document.id,
    permalink: document.url,
    tags: [...document.tags],
    published: document.published,
  };

  if (document.publishedAt) record.date = document.publishedAt;
  if (document.series) record.series = document.series;

  for (const key of REFERENCE_KEYS) {
    const raws = document.references
      .filter((reference) => reference.origin === "metadata" && reference.name === key)
      .map((reference) => reference.raw);
    if (raws.length === 0) continue;
    const [single] = raws;
    record[key] = SINGLE_TARGET_REFERENCE_KEYS.has(key) && single !== undefined ? single : raws;
  }

  return record;
}
