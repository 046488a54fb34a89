// Content directory access
// - lists Markdown sources and reads them for a build

import { promises as fs } from "node:fs";
import path from "node:path";

import { isMarkdownPath } from "./slug.js";

const DEFAULT_IGNORE_DIRS = new Set([
  ".git",
  ".jekyll-cache",
  ".sass-cache",
  "_site",
  "node_modules",
]);

export function relPathFromAbs(rootPath: string, absPath: string): string {
  return path.relative(rootPath, absPath).split(path.sep).join(path.posix.sep);
}

export async function listMarkdownFiles(rootPath: string): Promise<string[]> {
  const results: string[] = [];

  async function walk(currentDirAbsPath: string) {
    const entries = await fs.readdir(currentDirAbsPath, { withFileTypes: true });
    for (const entry of entries) {
      if (entry.isDirectory()) {
        if (DEFAULT_IGNORE_DIRS.has(entry.name)) continue;
        await walk(path.join(currentDirAbsPath, entry.name));
        continue;
      }

      if (!entry.isFile()) continue;
      if (!isMarkdownPath(entry.name)) continue;

      results.push(path.join(currentDirAbsPath, entry.name));
    }
  }

  await walk(rootPath);
  results.sort();
  return results;
}

export async function readUtf8File(absPath: string): Promise<string> {
  return await fs.readFile(absPath, "utf8");
}

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}
