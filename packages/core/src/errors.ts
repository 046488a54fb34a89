// Content error taxonomy
// - every per-document problem is a ContentError with a stable `kind`
// - the build pipeline turns these into BuildIssue rows instead of throwing

export const CONTENT_ERROR_KINDS = [
  "MalformedDocument",
  "MissingField",
  "InvalidField",
  "InvalidDate",
  "DuplicateIdentifier",
  "DanglingReference",
  "UnsupportedReferenceDepth",
  "NotFound",
] as const;

export type ContentErrorKind = (typeof CONTENT_ERROR_KINDS)[number];

export class ContentError extends Error {
  constructor(
    message: string,
    public readonly kind: ContentErrorKind,
    // Document identifier or filename the problem belongs to
    public readonly source: string,
  ) {
    super(message);
    this.name = "ContentError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class MalformedDocumentError extends ContentError {
  constructor(source: string, detail: string) {
    super(`Malformed document: ${detail}`, "MalformedDocument", source);
    this.name = "MalformedDocumentError";
  }
}

export class MissingFieldError extends ContentError {
  constructor(
    source: string,
    public readonly field: string,
  ) {
    super(`Missing required field "${field}" in ${source}`, "MissingField", source);
    this.name = "MissingFieldError";
  }
}

export class InvalidFieldError extends ContentError {
  constructor(
    source: string,
    public readonly field: string,
    detail: string,
  ) {
    super(`Invalid field "${field}" in ${source}: ${detail}`, "InvalidField", source);
    this.name = "InvalidFieldError";
  }
}

export class InvalidDateError extends ContentError {
  constructor(
    source: string,
    public readonly value: string,
  ) {
    super(`Invalid date "${value}" in ${source}`, "InvalidDate", source);
    this.name = "InvalidDateError";
  }
}

export class DuplicateIdentifierError extends ContentError {
  constructor(
    public readonly identifier: string,
    public readonly paths: readonly string[],
  ) {
    super(
      `Identifier "${identifier}" is claimed by ${paths.length} documents: ${paths.join(", ")}`,
      "DuplicateIdentifier",
      identifier,
    );
    this.name = "DuplicateIdentifierError";
  }
}

export class DanglingReferenceError extends ContentError {
  constructor(
    source: string,
    public readonly reference: string,
    public readonly target: string,
    reason: string,
  ) {
    super(`Unresolved ${reference} reference "${target}": ${reason}`, "DanglingReference", source);
    this.name = "DanglingReferenceError";
  }
}

export class UnsupportedReferenceDepthError extends ContentError {
  constructor(
    source: string,
    public readonly target: string,
    public readonly depth: number,
    public readonly maxDepth: number,
  ) {
    super(
      `Reference "${target}" has depth ${depth} (max ${maxDepth})`,
      "UnsupportedReferenceDepth",
      source,
    );
    this.name = "UnsupportedReferenceDepthError";
  }
}

export class NotFoundError extends ContentError {
  constructor(identifier: string) {
    super(`Document not found: ${identifier}`, "NotFound", identifier);
    this.name = "NotFoundError";
  }
}
