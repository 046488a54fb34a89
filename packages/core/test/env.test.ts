import { describe, expect, it } from "vitest";

import { readEnv } from "../src/index.js";

describe("readEnv()", () => {
  it("leaves unset and blank variables undefined", () => {
    expect(readEnv({ INKWELL_CONTENT_DIR: "  " })).toEqual({
      contentDir: undefined,
      outPath: undefined,
      includeUnpublished: undefined,
      maxReferenceDepth: undefined,
    });
  });

  it("parses every variable", () => {
    expect(
      readEnv({
        INKWELL_CONTENT_DIR: "site",
        INKWELL_OUT: "dist/collection.json",
        INKWELL_INCLUDE_UNPUBLISHED: "Yes",
        INKWELL_MAX_REFERENCE_DEPTH: "2",
      }),
    ).toEqual({
      contentDir: "site",
      outPath: "dist/collection.json",
      includeUnpublished: true,
      maxReferenceDepth: 2,
    });
    expect(readEnv({ INKWELL_INCLUDE_UNPUBLISHED: "off" }).includeUnpublished).toBe(false);
  });

  it("rejects values it cannot read", () => {
    expect(() => readEnv({ INKWELL_INCLUDE_UNPUBLISHED: "maybe" })).toThrowError(
      'Invalid INKWELL_INCLUDE_UNPUBLISHED: "maybe"',
    );
    expect(() => readEnv({ INKWELL_MAX_REFERENCE_DEPTH: "2.5" })).toThrowError(
      'Invalid INKWELL_MAX_REFERENCE_DEPTH: "2.5"',
    );
  });
});
