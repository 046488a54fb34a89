import { findDuplicateIdentifiers } from "../../../collection/collection.js";
import type { ContentDocument } from "../../../content/normalize.js";
import { issueFromError } from "../../../report.js";

import type { IdentifierCheck } from "../types.js";

export function checkIdentifiersStage(documents: readonly ContentDocument[]): IdentifierCheck {
  const duplicates = findDuplicateIdentifiers(documents);
  return {
    duplicateIds: new Set(duplicates.map((duplicate) => duplicate.identifier)),
    issues: duplicates.map(issueFromError),
  };
}
