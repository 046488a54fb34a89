export * from "./errors.js";
export * from "./report.js";
export * from "./env.js";

export * from "./content/dates.js";
export * from "./content/filesystem.js";
export * from "./content/frontmatterFields.js";
export * from "./content/markdownFrontmatter.js";
export * from "./content/normalize.js";
export * from "./content/references.js";
export * from "./content/slug.js";

export * from "./collection/collection.js";
export * from "./collection/ordering.js";
export * from "./collection/resolveReferences.js";

export * from "./building/buildCollection.js";
export * from "./building/buildCollection/options.js";
export * from "./building/buildCollection/types.js";
