export * from "./market-sessions.js";
export * from "./market-records.js";
