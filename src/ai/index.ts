export * from "./eval-runner.js";
export * from "./intent.js";
export * from "./openai-client.js";
