// Environment variable loading
// - shared by the CLI and library callers; CLI flags take precedence

import { config as loadDotenv } from "dotenv";

export type InkwellEnv = {
  contentDir: string | undefined;
  outPath: string | undefined;
  includeUnpublished: boolean | undefined;
  maxReferenceDepth: number | undefined;
};

function parseBooleanEnv(name: string, raw: string | undefined): boolean | undefined {
  const value = (raw ?? "").trim().toLowerCase();
  if (!value) return undefined;
  if (value === "1" || value === "true" || value === "yes" || value === "on") return true;
  if (value === "0" || value === "false" || value === "no" || value === "off") return false;
  throw new Error(`Invalid ${name}: "${raw}"`);
}

function parseIntegerEnv(name: string, raw: string | undefined): number | undefined {
  const value = (raw ?? "").trim();
  if (!value) return undefined;
  const n = Number.parseInt(value, 10);
  if (!Number.isFinite(n) || String(n) !== value) {
    throw new Error(`Invalid ${name}: "${raw}"`);
  }
  return n;
}

function optionalString(raw: string | undefined): string | undefined {
  const value = (raw ?? "").trim();
  return value ? value : undefined;
}

export function readEnv(env: NodeJS.ProcessEnv): InkwellEnv {
  return {
    contentDir: optionalString(env.INKWELL_CONTENT_DIR),
    outPath: optionalString(env.INKWELL_OUT),
    includeUnpublished: parseBooleanEnv(
      "INKWELL_INCLUDE_UNPUBLISHED",
      env.INKWELL_INCLUDE_UNPUBLISHED,
    ),
    maxReferenceDepth: parseIntegerEnv(
      "INKWELL_MAX_REFERENCE_DEPTH",
      env.INKWELL_MAX_REFERENCE_DEPTH,
    ),
  };
}

export function loadEnv(): InkwellEnv {
  // .env is a development convenience; plain environment variables work on their own
  loadDotenv();
  return readEnv(process.env);
}
