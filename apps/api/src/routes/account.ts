import type { FastifyInstance } from "fastify";
import { createApiResponse } from "@usedmarket/shared";
import type { MarketContext } from "../context.js";
import { playerId, sendResult } from "../http.js";

export function registerAccountRoutes(app: FastifyInstance, ctx: MarketContext) {
  app.get("/account", async (request, reply) => {
    const actor = playerId(request);
    if (!actor.success) return sendResult(reply, actor);
    return sendResult(
      reply,
      createApiResponse({
        owner_id: actor.data,
        balance: ctx.ledger.balance(actor.data),
        statistics: ctx.market.getStatistics(actor.data),
      }),
    );
  });

  // Collecting notifications empties the inbox.
  app.get("/notifications", async (request, reply) => {
    const actor = playerId(request);
    if (!actor.success) return sendResult(reply, actor);
    return sendResult(reply, createApiResponse(ctx.inbox.drain(actor.data)));
  });
}
