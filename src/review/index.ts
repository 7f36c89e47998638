export * from "./artifacts.js";
export * from "./content-budget.js";
export * from "./file-filter.js";
export * from "./prompt-template.js";
export * from "./repo-config.js";
export * from "./report-renderer.js";
export * from "./review-types.js";
