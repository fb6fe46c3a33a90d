import { asc, eq } from "drizzle-orm";
import { RECORD_KINDS, type FlatRecord, type MarketplaceSnapshot, type RecordKind } from "@usedmarket/shared";
import type { Database } from "./client.js";
import { marketRecords, marketSessions } from "./schema/index.js";

export type MarketSessionRow = typeof marketSessions.$inferSelect;
export type MarketRecordRow = typeof marketRecords.$inferSelect;
export type MarketRecordInsert = typeof marketRecords.$inferInsert;

const SNAPSHOT_FIELDS = {
  listing: "listings",
  search: "searches",
  sale: "sales",
} as const satisfies Record<RecordKind, keyof MarketplaceSnapshot>;

function recordId(kind: RecordKind, payload: FlatRecord): string | null {
  const value = payload[`${kind}_id`];
  return typeof value === "string" ? value : null;
}

/** Flatten a snapshot into one row per record, keeping order within each kind. */
export function snapshotToRows(sessionId: string, snapshot: MarketplaceSnapshot): MarketRecordInsert[] {
  const rows: MarketRecordInsert[] = [];
  for (const kind of RECORD_KINDS) {
    snapshot[SNAPSHOT_FIELDS[kind]].forEach((payload, position) => {
      rows.push({ sessionId, kind, position, recordId: recordId(kind, payload), payload });
    });
  }
  return rows;
}

/** Rebuild a snapshot from its session row and record rows, in any row order. */
export function rowsToSnapshot(session: MarketSessionRow, rows: readonly MarketRecordRow[]): MarketplaceSnapshot {
  const snapshot: MarketplaceSnapshot = {
    current_hour: session.currentHour,
    current_period: session.currentPeriod,
    listings: [],
    searches: [],
    sales: [],
  };
  const sorted = [...rows].sort((a, b) => a.position - b.position);
  for (const row of sorted) {
    snapshot[SNAPSHOT_FIELDS[row.kind]].push(row.payload);
  }
  return snapshot;
}

/** Replace the saved state of a session. */
export async function saveSnapshot(db: Database, sessionId: string, snapshot: MarketplaceSnapshot) {
  const rows = snapshotToRows(sessionId, snapshot);
  await db.transaction(async (tx) => {
    await tx
      .insert(marketSessions)
      .values({ id: sessionId, currentHour: snapshot.current_hour, currentPeriod: snapshot.current_period })
      .onConflictDoUpdate({
        target: marketSessions.id,
        set: {
          currentHour: snapshot.current_hour,
          currentPeriod: snapshot.current_period,
          savedAt: new Date(),
        },
      });
    await tx.delete(marketRecords).where(eq(marketRecords.sessionId, sessionId));
    // drizzle rejects an empty values() list
    if (rows.length > 0) {
      await tx.insert(marketRecords).values(rows);
    }
  });
  return rows.length;
}

/** Returns null when the session was never saved. */
export async function loadSnapshot(db: Database, sessionId: string): Promise<MarketplaceSnapshot | null> {
  const [session] = await db.select().from(marketSessions).where(eq(marketSessions.id, sessionId)).limit(1);
  if (!session) return null;
  const rows = await db
    .select()
    .from(marketRecords)
    .where(eq(marketRecords.sessionId, sessionId))
    .orderBy(asc(marketRecords.kind), asc(marketRecords.position));
  return rowsToSnapshot(session, rows);
}
