export { ResourceCleanupManager, createCleanupManager, parseTagFilter } from "./manager.js";
export type { CleanupManagerOptions, CleanupSummary, DestroyOptions, GroupCleanupOutcome } from "./manager.js";
