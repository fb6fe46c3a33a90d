import { pgTable, text, integer, timestamp } from "drizzle-orm/pg-core";

/** One saved marketplace clock per host session. */
export const marketSessions = pgTable("market_sessions", {
  id: text("id").primaryKey(),
  currentHour: integer("current_hour").notNull(),
  currentPeriod: integer("current_period").notNull(),
  savedAt: timestamp("saved_at", { withTimezone: true }).notNull().defaultNow(),
});
