import { pgTable, text, integer, jsonb, primaryKey } from "drizzle-orm/pg-core";
import { RECORD_KINDS, type FlatRecord } from "@usedmarket/shared";
import { marketSessions } from "./market-sessions.js";

export const marketRecords = pgTable(
  "market_records",
  {
    sessionId: text("session_id")
      .notNull()
      .references(() => marketSessions.id, { onDelete: "cascade" }),
    kind: text("kind", { enum: RECORD_KINDS }).notNull(),
    // order within the kind; listings come back in the order they were saved
    position: integer("position").notNull(),
    recordId: text("record_id"),
    payload: jsonb("payload").$type<FlatRecord>().notNull(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.sessionId, table.kind, table.position] }),
  }),
);
