export * from "./deadline.js";
export * from "./env.js";
export * from "./errors.js";
export * from "./http.js";
export * from "./secret-patterns.js";
export * from "./workflow-commands.js";
