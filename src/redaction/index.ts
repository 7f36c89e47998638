export * from "./redaction-rules.js";
export * from "./redactor.js";
