import { describe, expect, it } from "vitest";

import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";

import { buildCollectionFromDirectory, loadContentSources } from "../src/index.js";

async function withTempDir<T>(prefix: string, fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
  try {
    return await fn(dir);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}

async function writeFile(root: string, relPath: string, lines: string[]): Promise<void> {
  const absPath = path.join(root, relPath);
  await fs.mkdir(path.dirname(absPath), { recursive: true });
  await fs.writeFile(absPath, lines.join("\n") + "\n", "utf8");
}

describe("loadContentSources()", () => {
  it("reads Markdown files with content-relative paths and skips build output", async () => {
    await withTempDir("inkwell-content-", async (dir) => {
      await writeFile(dir, "_posts/2015-08-12-a.md", ["---", "layout: post", "title: A", "---"]);
      await writeFile(dir, "about.md", ["---", "layout: page", "title: About", "---"]);
      await writeFile(dir, "_site/about.md", ["---", "layout: page", "title: Copy", "---"]);
      await writeFile(dir, "notes.txt", ["not content"]);

      const sources = await loadContentSources(dir);

      expect(sources.map((source) => source.path)).toEqual(["_posts/2015-08-12-a.md", "about.md"]);
      expect(sources[1]?.text).toBe("---\nlayout: page\ntitle: About\n---\n");
    });
  });

  it("feeds a directory build", async () => {
    await withTempDir("inkwell-content-", async (dir) => {
      await writeFile(dir, "_posts/2015-08-12-a.md", ["---", "layout: post", "title: A", "---"]);
      await writeFile(dir, "about.md", ["---", "layout: page", "title: About", "---", "[[a]]"]);

      const lines: string[] = [];
      const result = await buildCollectionFromDirectory(dir, {}, { log: (line) => lines.push(line) });

      expect(result.ok).toBe(true);
      expect(result.collection?.backlinks("a").map((reference) => reference.sourceId)).toEqual([
        "about",
      ]);
      expect(lines[0]).toBe(`[inkwell] content=${dir}`);
    });
  });
});
