// Front matter field set + enum validation
// - single source for recognized keys and layout kinds

export const LAYOUT_KINDS = ["post", "page"] as const;
export type LayoutKind = (typeof LAYOUT_KINDS)[number];

// Keys whose values are symbolic references to other documents
export const REFERENCE_KEYS = ["previous", "next", "related"] as const;
export type ReferenceKey = (typeof REFERENCE_KEYS)[number];

// Reference name used for links found in the body
export const BODY_REFERENCE_NAME = "links_to";

// `related` takes a list, the others a single target
export const SINGLE_TARGET_REFERENCE_KEYS: ReadonlySet<ReferenceKey> = new Set([
  "previous",
  "next",
]);

export const RECOGNIZED_FRONTMATTER_KEYS = [
  "layout",
  "title",
  "summary",
  "date",
  "slug",
  "permalink",
  "series",
  "tags",
  "published",
  ...REFERENCE_KEYS,
] as const;
export type RecognizedFrontmatterKey = (typeof RECOGNIZED_FRONTMATTER_KEYS)[number];

const LAYOUT_KIND_SET = new Set<string>(LAYOUT_KINDS);
const RECOGNIZED_KEY_SET = new Set<string>(RECOGNIZED_FRONTMATTER_KEYS);

export function isLayoutKind(value: string): value is LayoutKind {
  return LAYOUT_KIND_SET.has(value);
}

export function isRecognizedFrontmatterKey(key: string): key is RecognizedFrontmatterKey {
  return RECOGNIZED_KEY_SET.has(key);
}

export function listUnrecognizedKeys(metadata: Record<string, unknown>): string[] {
  return Object.keys(metadata)
    .filter((key) => !isRecognizedFrontmatterKey(key))
    .sort();
}
