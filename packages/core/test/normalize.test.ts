// Front matter normalization tests

import { describe, expect, it } from "vitest";

import {
  InvalidDateError,
  InvalidFieldError,
  MissingFieldError,
  normalizeDocument,
  normalizeDocumentDetailed,
  parseDocument,
  slugify,
  toFrontmatter,
  type NormalizeOptions,
} from "../src/index.js";

function normalize(sourcePath: string, frontmatter: string[], body = "", options?: NormalizeOptions) {
  const text = ["---", ...frontmatter, "---", body].join("\n");
  return normalizeDocument(parseDocument(text, sourcePath), sourcePath, options);
}

describe("normalizeDocument()", () => {
  it("derives slug, date and permalink from a dated filename", () => {
    const document = normalize(
      "_posts/2015-08-12-mvvm-intro.md",
      ["layout: post", "title: MVVM intro"],
      "Body\n",
    );

    expect(document).toEqual({
      id: "mvvm-intro",
      sourcePath: "_posts/2015-08-12-mvvm-intro.md",
      layout: "post",
      title: "MVVM intro",
      summary: "",
      publishedAt: "2015-08-12T00:00:00.000Z",
      url: "/2015/08/12/mvvm-intro/",
      series: null,
      tags: [],
      published: true,
      body: "Body\n",
      references: [],
    });
    expect(Object.isFrozen(document)).toBe(true);
  });

  it("lets an explicit date override the filename date", () => {
    const document = normalize("_posts/2015-08-12-mvvm-intro.md", [
      "layout: post",
      "title: MVVM intro",
      "date: 2015-09-01",
    ]);

    expect(document.publishedAt).toBe("2015-09-01T00:00:00.000Z");
    expect(document.url).toBe("/2015/09/01/mvvm-intro/");
  });

  it("accepts times with a numeric offset", () => {
    const document = normalize("_posts/2015-08-12-mvvm-intro.md", [
      "layout: post",
      "title: MVVM intro",
      'date: "2015-08-12 10:30:00 +0200"',
    ]);

    expect(document.publishedAt).toBe("2015-08-12T08:30:00.000Z");
  });

  it("builds the permalink from the written day when the offset moves the UTC day", () => {
    const document = normalize("_posts/2015-08-12-x.md", [
      "layout: post",
      "title: Just after midnight",
      "date: 2015-08-12 00:30:00 +0200",
    ]);

    expect(document.publishedAt).toBe("2015-08-11T22:30:00.000Z");
    expect(document.url).toBe("/2015/08/12/x/");

    const again = normalizeDocument(
      { metadata: toFrontmatter(document), body: document.body },
      document.sourcePath,
    );
    expect(again).toEqual(document);
  });

  it.each(["2015-02-30", "next tuesday", "2015-08-12 25:00"])(
    "fails with InvalidDateError for %s",
    (value) => {
      expect(() =>
        normalize("_posts/mvvm.md", ["layout: post", "title: MVVM", `date: "${value}"`]),
      ).toThrowError(InvalidDateError);
    },
  );

  it("fails with InvalidDateError for a filename prefix that is not a calendar date", () => {
    expect(() =>
      normalize("_posts/2015-13-01-mvvm.md", ["layout: post", "title: MVVM"]),
    ).toThrowError(new InvalidDateError("_posts/2015-13-01-mvvm.md", "2015-13-01"));
  });

  it("names the filename when the title is missing", () => {
    expect(() => normalize("pages/about.md", ["layout: page"])).toThrowError(
      new MissingFieldError("pages/about.md", "title"),
    );
    expect(new MissingFieldError("pages/about.md", "title").message).toBe(
      'Missing required field "title" in pages/about.md',
    );
  });

  it("requires a date for posts but not for pages", () => {
    expect(() => normalize("_posts/untitled.md", ["layout: post", "title: Untitled"])).toThrowError(
      new MissingFieldError("_posts/untitled.md", "date"),
    );

    const page = normalize("about.md", ["layout: page", "title: About"]);
    expect(page.publishedAt).toBeNull();
    expect(page.url).toBe("/about/");
  });

  it("rejects layouts outside the enum", () => {
    expect(() => normalize("about.md", ["layout: draft", "title: About"])).toThrowError(
      InvalidFieldError,
    );
  });

  it("uses explicit slug and permalink overrides", () => {
    const document = normalize("_posts/2015-08-12-x.md", [
      "layout: post",
      "title: Hello",
      'slug: "Hello, World!"',
      "permalink: /custom/",
    ]);

    expect(document.id).toBe("hello-world");
    expect(document.url).toBe("/custom/");
  });

  it("expands configured permalink patterns", () => {
    const document = normalize(
      "_posts/2015-08-18-bindings.md",
      ["layout: post", "title: Bindings", "series: MVVM with RAC"],
      "",
      { postPermalink: "/:series/:slug" },
    );

    expect(document.url).toBe("/mvvm-with-rac/bindings");
  });

  it("normalizes tags and collects metadata and body references", () => {
    const document = normalize(
      "_posts/2015-08-18-bindings.md",
      [
        "layout: post",
        "title: Bindings",
        "tags:",
        "  - ios",
        '  - " ios "',
        "  - mvvm",
        "previous: [[mvvm-intro]]",
        "related:",
        "  - about",
      ],
      "See [[services|the services post]].",
    );

    expect(document.tags).toEqual(["ios", "mvvm"]);
    expect(document.references).toEqual([
      {
        name: "previous",
        target: "mvvm-intro",
        raw: "[[mvvm-intro]]",
        position: 0,
        origin: "metadata",
      },
      { name: "related", target: "about", raw: "about", position: 0, origin: "metadata" },
      {
        name: "links_to",
        target: "services",
        raw: "[[services|the services post]]",
        position: 0,
        origin: "body",
      },
    ]);
  });

  it("rejects more than one target for a single-target reference key", () => {
    expect(() =>
      normalize("about.md", ["layout: page", "title: About", "next:", "  - a", "  - b"]),
    ).toThrowError('Invalid field "next" in about.md: expected one target, got 2');
  });

  it("is idempotent through toFrontmatter()", () => {
    const document = normalize(
      "_posts/2015-08-18-bindings.md",
      [
        "layout: post",
        "title: Bindings",
        "summary: Two-way bindings",
        'date: "2015-08-18T10:00:00Z"',
        "series: MVVM",
        "tags: [ios, mvvm]",
        "previous: [[mvvm-intro]]",
        "next: series:next",
        "related:",
        "  - about",
        "  - series:first",
      ],
      "Body with [[about]].\n",
    );

    const again = normalizeDocument(
      { metadata: toFrontmatter(document), body: document.body },
      document.sourcePath,
    );

    expect(again).toEqual(document);
  });
});

describe("normalizeDocumentDetailed()", () => {
  it("reports every problem of one document", () => {
    const parsed = parseDocument("---\nsummary: nothing else\n---\n");
    const outcome = normalizeDocumentDetailed(parsed, "_posts/2015-08-12-x.md");

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.errors.map((error) => error.message)).toEqual([
      'Missing required field "layout" in _posts/2015-08-12-x.md',
      'Missing required field "title" in _posts/2015-08-12-x.md',
    ]);
  });

  it("warns about unrecognized fields unless told to ignore them", () => {
    const parsed = parseDocument("---\nlayout: page\ntitle: About\ncomments: true\n---\n");

    const warned = normalizeDocumentDetailed(parsed, "about.md");
    expect(warned.warnings).toEqual([
      {
        source: "about.md",
        kind: "UnrecognizedField",
        message: 'Unrecognized front matter field "comments" is ignored',
        severity: "warn",
      },
    ]);

    const ignored = normalizeDocumentDetailed(parsed, "about.md", { unknownFields: "ignore" });
    expect(ignored.ok).toBe(true);
    expect(ignored.warnings).toEqual([]);
  });
});

describe("slugify()", () => {
  it("strips diacritics and punctuation and is idempotent", () => {
    expect(slugify("Ça va? MVVM & RAC")).toBe("ca-va-mvvm-rac");
    expect(slugify("ca-va-mvvm-rac")).toBe("ca-va-mvvm-rac");
  });
});
