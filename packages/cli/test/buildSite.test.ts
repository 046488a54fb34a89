import { describe, expect, it } from "vitest";

import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";

import { normalizeDocument, parseDocument } from "@inkwell/core";

import { buildSite, formatDocumentLine } from "../src/buildSite.js";

async function withTempDir<T>(prefix: string, fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
  try {
    return await fn(dir);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}

async function writeContent(root: string, relPath: string, lines: string[]): Promise<void> {
  const absPath = path.join(root, relPath);
  await fs.mkdir(path.dirname(absPath), { recursive: true });
  await fs.writeFile(absPath, lines.join("\n") + "\n", "utf8");
}

describe("buildSite()", () => {
  it("writes the collection as JSON and summarizes the build", async () => {
    await withTempDir("inkwell-cli-", async (dir) => {
      const contentDir = path.join(dir, "content");
      await writeContent(contentDir, "_posts/2015-08-12-intro.md", [
        "---",
        "layout: post",
        "title: Intro",
        "comments: true",
        "---",
        "See [[about]].",
      ]);
      await writeContent(contentDir, "about.md", ["---", "layout: page", "title: About", "---"]);

      const outPath = path.join(dir, "out", "collection.json");
      const logged: string[] = [];
      const { summary } = await buildSite({
        contentDir,
        outPath,
        logger: { log: (line) => logged.push(line) },
      });

      expect(summary).toEqual({ ok: true, documents: 2, errors: 0, warnings: 1, outPath });
      expect(logged[logged.length - 1]).toBe(`[inkwell] wrote ${outPath}`);

      const written: unknown = JSON.parse(await fs.readFile(outPath, "utf8"));
      expect(written).toMatchObject({
        documents: [
          {
            id: "intro",
            url: "/2015/08/12/intro/",
            resolvedReferences: [{ name: "links_to", targetId: "about", matchedBy: "slug" }],
          },
          { id: "about", url: "/about/", resolvedReferences: [] },
        ],
      });
    });
  });

  it("writes nothing when duplicate identifiers leave no collection", async () => {
    await withTempDir("inkwell-cli-", async (dir) => {
      await writeContent(dir, "_posts/2015-08-12-hello.md", ["---", "layout: post", "title: A", "---"]);
      await writeContent(dir, "hello.md", ["---", "layout: page", "title: B", "---"]);

      const outPath = path.join(dir, "collection.json");
      const { summary } = await buildSite({ contentDir: dir, outPath });

      expect(summary).toEqual({ ok: false, documents: 0, errors: 1, warnings: 0, outPath: null });
      await expect(fs.stat(outPath)).rejects.toThrowError();
    });
  });
});

describe("formatDocumentLine()", () => {
  it("aligns dated and undated documents", () => {
    const post = normalizeDocument(
      parseDocument("---\nlayout: post\ntitle: MVVM, part 2\n---\n"),
      "_posts/2015-08-18-mvvm-part-2.md",
    );
    const page = normalizeDocument(parseDocument("---\nlayout: page\ntitle: About\n---\n"), "about.md");

    expect(formatDocumentLine(post)).toBe("2015-08-18  post  mvvm-part-2  MVVM, part 2");
    expect(formatDocumentLine(page)).toBe("----------  page  about  About");
  });
});
