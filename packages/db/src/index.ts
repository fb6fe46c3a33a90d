export { createDb } from "./client.js";
export type { Database } from "./client.js";

// Re-export schema for convenience
export * from "./schema/index.js";

export { snapshotToRows, rowsToSnapshot, saveSnapshot, loadSnapshot } from "./snapshots.js";
export type { MarketSessionRow, MarketRecordRow, MarketRecordInsert } from "./snapshots.js";
