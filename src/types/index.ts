export * from "./config.js";
export * from "./session.js";
export * from "./issue.js";
export * from "./pr.js";
export * from "./result.js";
