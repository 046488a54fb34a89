import matter from "gray-matter";

import { MalformedDocumentError } from "../errors.js";

export type FrontmatterScalar = string | number | boolean | Date | null;
export type FrontmatterValue = FrontmatterScalar | FrontmatterScalar[];
export type FrontmatterRecord = Record<string, FrontmatterValue>;

export type ParsedDocument = {
  metadata: FrontmatterRecord;
  body: string;
};

type FrontmatterSplit = { frontmatterRaw: string; body: string };

function normalizeNewlines(input: string): string {
  return input.replace(/\r\n/g, "\n");
}

function splitFrontmatter(text: string, source: string): FrontmatterSplit {
  const normalized = normalizeNewlines(text);
  const input = normalized.startsWith("\ufeff") ? normalized.slice(1) : normalized;

  const lines = input.split("\n");
  // Marker lines may carry trailing whitespace
  if ((lines[0] ?? "").trimEnd() !== "---") {
    throw new MalformedDocumentError(source, "missing front matter start marker");
  }

  let end = -1;
  for (let i = 1; i < lines.length; i += 1) {
    const line = (lines[i] ?? "").trimEnd();
    if (line === "---" || line === "...") {
      end = i;
      break;
    }
  }

  if (end === -1) {
    throw new MalformedDocumentError(source, "unterminated front matter");
  }

  return {
    frontmatterRaw: lines.slice(1, end).join("\n"),
    body: lines.slice(end + 1).join("\n"),
  };
}

function sanitizeFrontmatterForWikilinks(frontmatterRaw: string): string {
  // Quote unquoted wikilinks in YAML front matter.
  // - YAML treats leading `[` as flow collection syntax; `[[...]]` becomes a nested list.
  // - We rewrite:
  //   - `- [[Note]]` -> `- "[[Note]]"`
  //   - `key: [[Note]]` -> `key: "[[Note]]"`
  return frontmatterRaw
    .split("\n")
    .map((line) => {
      const trimmed = line.trim();
      if (!trimmed) return line;
      if (trimmed.startsWith("#")) return line;

      const listMatch = line.match(/^(\s*-\s*)(\[\[[^\r\n]*\]\])(\s*(#.*)?)$/);
      if (listMatch) {
        const prefix = listMatch[1] ?? "";
        const value = listMatch[2] ?? "";
        const suffix = listMatch[3] ?? "";
        return `${prefix}"${value}"${suffix}`;
      }

      const kvMatch = line.match(/^(\s*[^:\r\n]+:\s*)(\[\[[^\r\n]*\]\])(\s*(#.*)?)$/);
      if (kvMatch) {
        const prefix = kvMatch[1] ?? "";
        const value = kvMatch[2] ?? "";
        const suffix = kvMatch[3] ?? "";
        return `${prefix}"${value}"${suffix}`;
      }

      return line;
    })
    .join("\n");
}

function isFrontmatterScalar(value: unknown): value is FrontmatterScalar {
  if (value === null) return true;
  if (value instanceof Date) return true;
  return typeof value === "string" || typeof value === "number" || typeof value === "boolean";
}

function toFrontmatterRecord(data: unknown, source: string): FrontmatterRecord {
  if (typeof data !== "object" || data === null || Array.isArray(data) || data instanceof Date) {
    throw new MalformedDocumentError(source, "front matter is not a key-value mapping");
  }

  const record: FrontmatterRecord = {};
  for (const [key, value] of Object.entries(data)) {
    if (isFrontmatterScalar(value)) {
      record[key] = value;
      continue;
    }

    if (Array.isArray(value)) {
      const items: FrontmatterScalar[] = [];
      for (const item of value) {
        if (!isFrontmatterScalar(item)) {
          throw new MalformedDocumentError(source, `list "${key}" may only hold scalar values`);
        }
        items.push(item);
      }
      record[key] = items;
      continue;
    }

    throw new MalformedDocumentError(source, `value of "${key}" must be a scalar or a list`);
  }

  return record;
}

export function parseDocument(text: string, source = "<input>"): ParsedDocument {
  const split = splitFrontmatter(text, source);
  const sanitized = `---\n${sanitizeFrontmatterForWikilinks(split.frontmatterRaw)}\n---\n`;

  let data: unknown;
  try {
    // Passing options disables gray-matter's per-content cache
    data = matter(sanitized, { language: "yaml" }).data;
  } catch (error) {
    const message =
      error instanceof Error ? (error.message.split("\n")[0] ?? error.message) : String(error);
    throw new MalformedDocumentError(source, `front matter is not valid YAML (${message})`);
  }

  return {
    metadata: toFrontmatterRecord(data, source),
    body: split.body,
  };
}
