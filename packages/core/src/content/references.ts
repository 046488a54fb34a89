// Symbolic cross-document references
// - front matter: previous / next / related
// - body: wikilinks ([[target]], [[target|label]], [[target#heading]]) and {% post_url target %}
// - targets are `/`-separated step expressions, resolved later against the collection

import { InvalidFieldError } from "../errors.js";

import {
  BODY_REFERENCE_NAME,
  REFERENCE_KEYS,
  SINGLE_TARGET_REFERENCE_KEYS,
} from "./frontmatterFields.js";
import type { FrontmatterRecord, FrontmatterValue } from "./markdownFrontmatter.js";

export type ReferenceOrigin = "metadata" | "body";

export type DocumentReference = {
  name: string;
  target: string;
  raw: string;
  position: number;
  origin: ReferenceOrigin;
};

export const SERIES_SELECTOR_WORDS = ["previous", "next", "first", "last"] as const;
export type SeriesSelectorWord = (typeof SERIES_SELECTOR_WORDS)[number];
export type SeriesSelector = SeriesSelectorWord | number;

export type ReferenceStep = {
  text: string;
  // null: not a series selector; "invalid": `series:` prefix with an unknown selector
  seriesSelector: SeriesSelector | "invalid" | null;
};

const SERIES_PREFIX = "series:";
const SERIES_SELECTOR_WORD_SET = new Set<string>(SERIES_SELECTOR_WORDS);

function isSeriesSelectorWord(value: string): value is SeriesSelectorWord {
  return SERIES_SELECTOR_WORD_SET.has(value);
}

function isWikilink(value: string): boolean {
  return value.startsWith("[[") && value.endsWith("]]");
}

// `[[Target#Heading|Label]]` -> `Target`
export function wikilinkTarget(value: string): string {
  const trimmed = value.trim();
  const inner = isWikilink(trimmed) ? trimmed.slice(2, -2).trim() : trimmed;
  const noDisplay = inner.split("|")[0]?.trim() ?? "";
  const noHeading = noDisplay.split("#")[0]?.trim() ?? "";
  return noHeading || noDisplay || inner;
}

function parseSeriesSelector(raw: string): SeriesSelector | "invalid" {
  const value = raw.trim().toLowerCase();
  if (isSeriesSelectorWord(value)) return value;
  if (/^\d+$/.test(value)) {
    const position = Number.parseInt(value, 10);
    return position >= 1 ? position : "invalid";
  }
  return "invalid";
}

export function parseReferenceExpression(target: string): ReferenceStep[] {
  return target
    .split("/")
    .map((part) => part.trim())
    .filter(Boolean)
    .map((text) => {
      if (text.toLowerCase().startsWith(SERIES_PREFIX)) {
        return { text, seriesSelector: parseSeriesSelector(text.slice(SERIES_PREFIX.length)) };
      }
      const lower = text.toLowerCase();
      return { text, seriesSelector: isSeriesSelectorWord(lower) ? lower : null };
    });
}

function referenceValuesFromFrontmatter(
  value: FrontmatterValue | undefined,
  key: string,
  source: string,
): string[] {
  if (value === undefined || value === null) return [];
  const items = Array.isArray(value) ? value : [value];

  const values: string[] = [];
  const seen = new Set<string>();
  for (const item of items) {
    if (item === null) continue;
    // YAML reads `next: 404` as a number; page slugs can be numeric
    if (typeof item === "number" && Number.isFinite(item)) {
      const text = String(item);
      if (!seen.has(text)) {
        seen.add(text);
        values.push(text);
      }
      continue;
    }
    if (typeof item !== "string") {
      throw new InvalidFieldError(source, key, "reference targets must be strings");
    }
    const trimmed = item.trim();
    if (!trimmed || seen.has(trimmed)) continue;
    seen.add(trimmed);
    values.push(trimmed);
  }

  return values;
}

export function extractMetadataReferences(
  metadata: FrontmatterRecord,
  source: string,
): DocumentReference[] {
  const references: DocumentReference[] = [];

  for (const key of REFERENCE_KEYS) {
    const values = referenceValuesFromFrontmatter(metadata[key], key, source);
    if (SINGLE_TARGET_REFERENCE_KEYS.has(key) && values.length > 1) {
      throw new InvalidFieldError(source, key, `expected one target, got ${values.length}`);
    }

    for (const [position, raw] of values.entries()) {
      references.push({
        name: key,
        target: wikilinkTarget(raw),
        raw,
        position,
        origin: "metadata",
      });
    }
  }

  return references;
}

const WIKILINK_PATTERN = /\[\[([^[\]\n]+)\]\]/g;
const POST_URL_PATTERN = /\{%-?\s*post_url\s+([^\s%]+)\s*-?%\}/g;

// `2015/2015-08-12-mvvm` -> `2015-08-12-mvvm`: post_url names a file, so only its stem is a step
export function postUrlTarget(value: string): string {
  const segments = value.trim().split("/").filter(Boolean);
  return segments[segments.length - 1] ?? "";
}

function stripInlineCode(line: string): string {
  return line.replace(/`[^`]*`/g, "");
}

export function extractBodyReferences(body: string): DocumentReference[] {
  const references: DocumentReference[] = [];
  const seenTargets = new Set<string>();

  const push = (raw: string, target: string): void => {
    if (!target || seenTargets.has(target)) return;
    seenTargets.add(target);
    references.push({
      name: BODY_REFERENCE_NAME,
      target,
      raw,
      position: references.length,
      origin: "body",
    });
  };

  let fence: string | null = null;
  for (const line of body.replace(/\r\n/g, "\n").split("\n")) {
    const fenceMatch = line.match(/^\s*(```|~~~)/);
    if (fenceMatch) {
      const marker = fenceMatch[1] ?? "";
      if (fence === null) fence = marker;
      else if (fence === marker) fence = null;
      continue;
    }
    if (fence !== null) continue;

    // Links are collected in reading order within the line
    const text = stripInlineCode(line);
    const found: Array<{ index: number; raw: string; target: string }> = [];
    for (const match of text.matchAll(WIKILINK_PATTERN)) {
      found.push({ index: match.index ?? 0, raw: match[0], target: wikilinkTarget(match[0]) });
    }
    for (const match of text.matchAll(POST_URL_PATTERN)) {
      found.push({ index: match.index ?? 0, raw: match[0], target: postUrlTarget(match[1] ?? "") });
    }

    found.sort((a, b) => a.index - b.index);
    for (const item of found) push(item.raw, item.target);
  }

  return references;
}
