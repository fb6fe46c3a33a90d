import type { FastifyInstance } from "fastify";
import { loadSnapshot, saveSnapshot } from "@usedmarket/db";
import { createApiError, createApiResponse } from "@usedmarket/shared";
import type { MarketContext } from "../context.js";
import { sendResult } from "../http.js";

const NO_DATABASE = createApiError("VALIDATION_ERROR", "No database configured");

export function registerAdminRoutes(app: FastifyInstance, ctx: MarketContext) {
  const { authority, market, sessionId } = ctx;

  // ─── POST /admin/save: Persist the whole market ────────
  app.post("/admin/save", async (_request, reply) => {
    if (!ctx.db) return sendResult(reply, NO_DATABASE);
    const records = await saveSnapshot(ctx.db, sessionId, market.snapshot());
    ctx.logger.info({ sessionId, records, hour: market.hour }, "market saved");
    return sendResult(reply, createApiResponse({ session_id: sessionId, records, hour: market.hour }));
  });

  // ─── POST /admin/load: Replace the market with the saved one ─
  app.post("/admin/load", async (_request, reply) => {
    if (!ctx.db) return sendResult(reply, NO_DATABASE);
    const snapshot = await loadSnapshot(ctx.db, sessionId);
    if (!snapshot) {
      return sendResult(reply, createApiError("VALIDATION_ERROR", `No saved market for session ${sessionId}`));
    }
    return sendResult(reply, createApiResponse(authority.restore(snapshot)));
  });
}
