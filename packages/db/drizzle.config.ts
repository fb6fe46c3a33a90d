/// <reference types="node" />
import { defineConfig } from "drizzle-kit";

export default defineConfig({
  dialect: "postgresql",
  // Explicit file list: drizzle-kit loads schemas as CJS and can't follow
  // the .js extension imports in the schema barrel.
  schema: ["./src/schema/market-sessions.ts", "./src/schema/market-records.ts"],
  out: "./drizzle",
  dbCredentials: {
    url: process.env.DATABASE_URL ?? "postgres://localhost:5432/used_market",
  },
});
