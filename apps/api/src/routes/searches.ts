import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { createApiResponse } from "@usedmarket/shared";
import type { MarketContext } from "../context.js";
import { parseInput, playerId, sendResult } from "../http.js";

const searchBody = z.object({
  category_id: z.string().min(1),
  item_name: z.string().min(1),
  base_price: z.number(),
  // out-of-range tiers are the engine's call
  quality_tier: z.number(),
  agent_tier: z.number(),
});

export function registerSearchRoutes(app: FastifyInstance, ctx: MarketContext) {
  // ─── POST /searches: Hire a search agent ───────────────
  app.post("/searches", async (request, reply) => {
    const actor = playerId(request);
    if (!actor.success) return sendResult(reply, actor);
    const body = parseInput(searchBody, request.body);
    if (!body.success) return sendResult(reply, body);

    const { quality_tier, agent_tier, ...category } = body.data;
    const result = ctx.authority.dispatch({
      type: "REQUEST_SEARCH",
      actor_id: actor.data,
      category,
      quality_tier,
      agent_tier,
    });
    return sendResult(reply, result, 201);
  });

  app.get("/searches", async (request, reply) => {
    const actor = playerId(request);
    if (!actor.success) return sendResult(reply, actor);
    return sendResult(reply, createApiResponse(ctx.market.getActiveSearches(actor.data)));
  });

  app.post<{ Params: { searchId: string } }>("/searches/:searchId/renew", async (request, reply) => {
    const actor = playerId(request);
    if (!actor.success) return sendResult(reply, actor);
    const result = ctx.authority.dispatch({
      type: "RENEW_SEARCH",
      actor_id: actor.data,
      search_id: request.params.searchId,
    });
    return sendResult(reply, result, 201);
  });

  app.delete<{ Params: { searchId: string } }>("/searches/:searchId", async (request, reply) => {
    const actor = playerId(request);
    if (!actor.success) return sendResult(reply, actor);
    const result = ctx.authority.dispatch({
      type: "CANCEL_SEARCH",
      actor_id: actor.data,
      search_id: request.params.searchId,
    });
    return sendResult(reply, result);
  });
}
