// Slugs and permalinks

import type { DateParts } from "./dates.js";

export const DEFAULT_POST_PERMALINK = "/:year/:month/:day/:slug/";
export const DEFAULT_PAGE_PERMALINK = "/:slug/";

const MARKDOWN_EXTENSIONS = [".markdown", ".md"] as const;

export function slugify(input: string): string {
  return input
    .normalize("NFKD")
    .replace(/\p{M}+/gu, "")
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

export function isMarkdownPath(filePath: string): boolean {
  const lower = filePath.toLowerCase();
  return MARKDOWN_EXTENSIONS.some((ext) => lower.endsWith(ext));
}

// `_posts/2015-08-12-mvvm.md` -> `2015-08-12-mvvm`
export function filenameStem(sourcePath: string): string {
  const base = sourcePath.split(/[\\/]/).pop() ?? sourcePath;
  const lower = base.toLowerCase();
  for (const ext of MARKDOWN_EXTENSIONS) {
    if (lower.endsWith(ext)) return base.slice(0, -ext.length);
  }
  return base;
}

export type PermalinkFields = {
  slug: string;
  // Calendar date as the author wrote it
  dateParts: DateParts | null;
  series: string | null;
};

// Returns null when the pattern names a token the document cannot fill
export function expandPermalink(pattern: string, fields: PermalinkFields): string | null {
  const { dateParts } = fields;
  let missing = false;

  const expanded = pattern.replace(/:(year|month|day|slug|series)\b/g, (match, token: string) => {
    switch (token) {
      case "slug":
        return fields.slug;
      case "series":
        if (!fields.series) {
          missing = true;
          return "";
        }
        return slugify(fields.series);
      case "year":
      case "month":
      case "day":
        if (!dateParts) {
          missing = true;
          return "";
        }
        return dateParts[token];
      default:
        return match;
    }
  });

  if (missing) return null;

  const collapsed = expanded.replace(/\/{2,}/g, "/");
  return collapsed.startsWith("/") ? collapsed : `/${collapsed}`;
}
