import { promises as fs } from "node:fs";
import path from "node:path";

import {
  buildCollectionFromDirectory,
  ensureDir,
  type BuildLogger,
  type BuildOptionsInput,
  type BuildResult,
  type ContentDocument,
} from "@inkwell/core";

export type BuildSiteOptions = {
  contentDir: string;
  outPath?: string;
  build?: BuildOptionsInput;
  logger?: BuildLogger;
};

export type BuildSiteSummary = {
  ok: boolean;
  documents: number;
  errors: number;
  warnings: number;
  outPath: string | null;
};

export async function buildSite(
  options: BuildSiteOptions,
): Promise<{ summary: BuildSiteSummary; result: BuildResult }> {
  const result = await buildCollectionFromDirectory(
    options.contentDir,
    options.build ?? {},
    options.logger,
  );

  let writtenPath: string | null = null;
  if (options.outPath && result.collection) {
    const absOut = path.resolve(options.outPath);
    await ensureDir(path.dirname(absOut));
    await fs.writeFile(absOut, `${JSON.stringify(result.collection.toJSON(), null, 2)}\n`, "utf8");
    writtenPath = absOut;
    options.logger?.log?.(`[inkwell] wrote ${absOut}`);
  }

  const summary: BuildSiteSummary = {
    ok: result.ok,
    documents: result.collection?.size ?? 0,
    errors: result.issues.filter((issue) => issue.severity === "error").length,
    warnings: result.issues.filter((issue) => issue.severity === "warn").length,
    outPath: writtenPath,
  };

  return { summary, result };
}

// `2015-08-18  post  mvvm-part-2  MVVM, part 2`
export function formatDocumentLine(document: ContentDocument): string {
  const date = document.publishedAt ? document.publishedAt.slice(0, 10) : "----------";
  return `${date}  ${document.layout.padEnd(4)}  ${document.id}  ${document.title}`;
}
