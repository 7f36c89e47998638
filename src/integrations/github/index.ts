export * from "./github-client.js";
export * from "./github-comments.js";
export * from "./github-pulls.js";
export * from "./github-releases.js";
export * from "./managed-comment.js";
export * from "./pagination.js";
