export * from "./contributions.js";
export * from "./warnings.js";
export * from "./moderationLogs.js";
export * from "./clubRoles.js";
export * from "./memberRoles.js";
