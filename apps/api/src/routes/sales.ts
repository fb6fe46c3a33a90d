import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { createApiError, createApiResponse } from "@usedmarket/shared";
import type { MarketContext } from "../context.js";
import { parseInput, playerId, sendResult } from "../http.js";

type SaleParams = { Params: { saleId: string } };

const saleBody = z.object({
  item_id: z.string().min(1),
  item_name: z.string().min(1),
  category_id: z.string().min(1),
  vanilla_value: z.number(),
  age_years: z.number().min(0).optional(),
  damage: z.number().min(0).max(1).optional(),
  wear: z.number().min(0).max(1).optional(),
  operating_hours: z.number().min(0).optional(),
  agent_tier: z.number(),
});

export function registerSaleRoutes(app: FastifyInstance, ctx: MarketContext) {
  const { authority, market } = ctx;

  // ─── POST /sales: Hand an item to a sale agent ─────────
  app.post("/sales", async (request, reply) => {
    const actor = playerId(request);
    if (!actor.success) return sendResult(reply, actor);
    const body = parseInput(saleBody, request.body);
    if (!body.success) return sendResult(reply, body);

    const { agent_tier, ...item } = body.data;
    const result = authority.dispatch({ type: "LIST_FOR_SALE", actor_id: actor.data, item, agent_tier });
    return sendResult(reply, result, 201);
  });

  app.get("/sales", async (request, reply) => {
    const actor = playerId(request);
    if (!actor.success) return sendResult(reply, actor);
    return sendResult(reply, createApiResponse(market.getActiveSales(actor.data)));
  });

  app.get<SaleParams>("/sales/:saleId", async (request, reply) => {
    const actor = playerId(request);
    if (!actor.success) return sendResult(reply, actor);
    const sale = market.getSale(request.params.saleId);
    if (!sale || sale.owner_id !== actor.data) {
      return sendResult(reply, createApiError("VALIDATION_ERROR", `Sale ${request.params.saleId} not found`));
    }
    return sendResult(reply, createApiResponse(sale));
  });

  app.delete<SaleParams>("/sales/:saleId", async (request, reply) => {
    const actor = playerId(request);
    if (!actor.success) return sendResult(reply, actor);
    const result = authority.dispatch({ type: "CANCEL_SALE", actor_id: actor.data, sale_id: request.params.saleId });
    return sendResult(reply, result);
  });
}
