// Publication date parsing
// - accepted: YYYY-MM-DD[(T| )HH:MM[:SS[.mmm]][ ](Z|±HH[:]MM)]
// - YAML-native dates (gray-matter/js-yaml infers them for unquoted values) pass through
// - output is always an ISO-8601 UTC string, which sorts lexically
// - the written calendar date is kept for permalinks; the UTC instant can fall on another day

import { InvalidDateError } from "../errors.js";

import type { FrontmatterScalar } from "./markdownFrontmatter.js";

const DATE_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,3}))?)?(?:\s*(Z|[+-]\d{2}:?\d{2}))?)?$/;

const FILENAME_DATE_PATTERN = /^(\d{4}-\d{2}-\d{2})(?:-(.*))?$/;

function parseOffsetMinutes(raw: string | undefined): number | null {
  if (!raw || raw === "Z") return 0;
  const match = raw.match(/^([+-])(\d{2}):?(\d{2})$/);
  if (!match) return null;
  const hours = Number(match[2]);
  const minutes = Number(match[3]);
  if (hours > 23 || minutes > 59) return null;
  const total = hours * 60 + minutes;
  return match[1] === "-" ? -total : total;
}

export type DateParts = {
  year: string;
  month: string;
  day: string;
};

export type ContentDate = {
  publishedAt: string;
  dateParts: DateParts;
};

function parseDateString(input: string): ContentDate | null {
  const match = input.trim().match(DATE_PATTERN);
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const hours = Number(match[4] ?? "0");
  const minutes = Number(match[5] ?? "0");
  const seconds = Number(match[6] ?? "0");
  const millis = Number((match[7] ?? "0").padEnd(3, "0"));
  const offsetMinutes = parseOffsetMinutes(match[8]);

  if (offsetMinutes === null) return null;
  if (month < 1 || month > 12) return null;
  if (hours > 23 || minutes > 59 || seconds > 59) return null;

  // setUTCFullYear keeps years below 100 literal (Date.UTC would map them to 19xx)
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) return null;
  date.setUTCHours(hours, minutes, seconds, millis);

  return {
    publishedAt: new Date(date.getTime() - offsetMinutes * 60_000).toISOString(),
    dateParts: { year: match[1] ?? "", month: match[2] ?? "", day: match[3] ?? "" },
  };
}

export function readContentDate(value: FrontmatterScalar, source: string): ContentDate {
  // YAML-native dates are date-only or carry an explicit zone; their UTC day is the written one
  if (value instanceof Date) {
    if (!Number.isFinite(value.getTime())) {
      throw new InvalidDateError(source, String(value));
    }
    const publishedAt = value.toISOString();
    return { publishedAt, dateParts: datePartsFromIso(publishedAt) };
  }

  if (typeof value === "string") {
    const parsed = parseDateString(value);
    if (parsed) return parsed;
  }

  throw new InvalidDateError(source, String(value));
}

export function parseContentDate(value: FrontmatterScalar, source: string): string {
  return readContentDate(value, source).publishedAt;
}

export type FilenameDate = {
  dateToken: string;
  rest: string;
};

// `2015-08-12-mvvm-intro` -> { dateToken: "2015-08-12", rest: "mvvm-intro" }
export function splitFilenameDate(stem: string): FilenameDate | null {
  const match = stem.match(FILENAME_DATE_PATTERN);
  if (!match) return null;
  return { dateToken: match[1] ?? "", rest: match[2] ?? "" };
}

export function datePartsFromIso(iso: string): DateParts {
  return {
    year: iso.slice(0, 4),
    month: iso.slice(5, 7),
    day: iso.slice(8, 10),
  };
}
