#!/usr/bin/env tsx
// Inkwell CLI
// - content directory -> validated, ordered collection -> report (+ JSON for the rendering layer)

import { Command, InvalidArgumentError } from "commander";

import {
  buildCollectionFromDirectory,
  isLayoutKind,
  loadEnv,
  type LayoutKind,
  type UnknownFieldPolicy,
} from "@inkwell/core";

import { resolveBuildOptions, type BuildFlags } from "./buildOptions.js";
import { buildSite, formatDocumentLine } from "./buildSite.js";
import { createConsoleLogger } from "./logger.js";

type BuildCommandFlags = BuildFlags & {
  content?: string;
  out?: string;
  quiet?: boolean;
};

type ListCommandFlags = BuildFlags & {
  content?: string;
  layout?: LayoutKind;
};

function parsePositiveInt(value: string): number {
  const n = Number.parseInt(value, 10);
  if (!Number.isFinite(n) || n < 1) throw new InvalidArgumentError("Expected a positive integer.");
  return n;
}

function parseUnknownFields(value: string): UnknownFieldPolicy {
  if (value === "warn" || value === "ignore") return value;
  throw new InvalidArgumentError('Expected "warn" or "ignore".');
}

function parseLayout(value: string): LayoutKind {
  if (isLayoutKind(value)) return value;
  throw new InvalidArgumentError('Expected "post" or "page".');
}

function requireContentDir(flag: string | undefined, fromEnv: string | undefined): string {
  const contentDir = flag ?? fromEnv;
  if (!contentDir) {
    throw new Error("No content directory. Pass --content or set INKWELL_CONTENT_DIR.");
  }
  return contentDir;
}

async function runBuildCommand(flags: BuildCommandFlags): Promise<void> {
  const env = loadEnv();
  const contentDir = requireContentDir(flags.content, env.contentDir);
  const outPath = flags.out ?? env.outPath;

  const { summary } = await buildSite({
    contentDir,
    ...(outPath ? { outPath } : {}),
    build: resolveBuildOptions(flags, env),
    logger: createConsoleLogger(flags.quiet ? "quiet" : "normal"),
  });

  console.log(
    `[inkwell] ${summary.ok ? "ok" : "failed"}: documents=${summary.documents}, ` +
      `errors=${summary.errors}, warnings=${summary.warnings}`,
  );
  if (!summary.ok) process.exitCode = 1;
}

async function runListCommand(flags: ListCommandFlags): Promise<void> {
  const env = loadEnv();
  const contentDir = requireContentDir(flags.content, env.contentDir);
  const result = await buildCollectionFromDirectory(
    contentDir,
    resolveBuildOptions(flags, env),
    createConsoleLogger("quiet"),
  );
  if (!result.collection) {
    process.exitCode = 1;
    return;
  }

  const documents = flags.layout
    ? result.collection.ofLayout(flags.layout)
    : [...result.collection.documents];
  for (const document of documents) console.log(formatDocumentLine(document));
}

function withErrorExit<T>(run: (flags: T) => Promise<void>): (flags: T) => Promise<void> {
  return async (flags) => {
    try {
      await run(flags);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[inkwell] error: ${message}`);
      process.exitCode = 1;
    }
  };
}

const program = new Command();

program.name("inkwell").description("Build and check the site's Markdown content collection");

program
  .command("build")
  .description("Parse, validate and cross-reference every document; report all problems at once")
  .option("--content <dir>", "content directory (default: INKWELL_CONTENT_DIR)")
  .option("--out <file>", "write the collection as JSON (default: INKWELL_OUT)")
  .option("--include-unpublished", "keep documents marked `published: false`")
  .option("--max-reference-depth <n>", "maximum reference expression depth", parsePositiveInt)
  .option("--unknown-fields <mode>", "warn | ignore unrecognized front matter", parseUnknownFields)
  .option("--quiet", "only print problems and the final summary")
  .action(withErrorExit<BuildCommandFlags>(runBuildCommand));

program
  .command("list")
  .description("Print the ordered collection, newest first")
  .option("--content <dir>", "content directory (default: INKWELL_CONTENT_DIR)")
  .option("--layout <kind>", "only documents of this layout (post | page)", parseLayout)
  .option("--include-unpublished", "keep documents marked `published: false`")
  .option("--max-reference-depth <n>", "maximum reference expression depth", parsePositiveInt)
  .option("--unknown-fields <mode>", "warn | ignore unrecognized front matter", parseUnknownFields)
  .action(withErrorExit<ListCommandFlags>(runListCommand));

await program.parseAsync(process.argv);
