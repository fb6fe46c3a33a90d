import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { createApiResponse } from "@usedmarket/shared";
import type { MarketContext } from "../context.js";
import { parseInput, playerId, sendResult } from "../http.js";

type ListingParams = { Params: { listingId: string } };

const offerBody = z.object({ amount: z.number() });
const inspectionBody = z.object({ tier: z.number() });
const priceBody = z.object({ price: z.number() });

export function registerListingRoutes(app: FastifyInstance, ctx: MarketContext) {
  const { authority, market } = ctx;

  app.get("/listings", async (request, reply) => {
    const actor = playerId(request);
    if (!actor.success) return sendResult(reply, actor);
    return sendResult(reply, createApiResponse(market.getActiveListings(actor.data)));
  });

  // Opening a listing starts its offer window.
  app.get<ListingParams>("/listings/:listingId", async (request, reply) => {
    const actor = playerId(request);
    if (!actor.success) return sendResult(reply, actor);
    const result = authority.dispatch({
      type: "VIEW_LISTING",
      actor_id: actor.data,
      listing_id: request.params.listingId,
    });
    return sendResult(reply, result);
  });

  app.get<ListingParams>("/listings/:listingId/hours-remaining", async (request, reply) => {
    const actor = playerId(request);
    if (!actor.success) return sendResult(reply, actor);
    return sendResult(reply, market.getHoursRemaining(request.params.listingId, actor.data));
  });

  // ─── Negotiation ─────────────────────────────────────────
  app.post<ListingParams>("/listings/:listingId/offers", async (request, reply) => {
    const actor = playerId(request);
    if (!actor.success) return sendResult(reply, actor);
    const body = parseInput(offerBody, request.body);
    if (!body.success) return sendResult(reply, body);
    const result = authority.dispatch({
      type: "SUBMIT_OFFER",
      actor_id: actor.data,
      listing_id: request.params.listingId,
      amount: body.data.amount,
    });
    return sendResult(reply, result);
  });

  app.post<ListingParams>("/listings/:listingId/purchase", async (request, reply) => {
    const actor = playerId(request);
    if (!actor.success) return sendResult(reply, actor);
    const result = authority.dispatch({
      type: "PURCHASE_LISTING",
      actor_id: actor.data,
      listing_id: request.params.listingId,
    });
    return sendResult(reply, result);
  });

  // ─── Inspection ──────────────────────────────────────────
  app.post<ListingParams>("/listings/:listingId/inspection", async (request, reply) => {
    const actor = playerId(request);
    if (!actor.success) return sendResult(reply, actor);
    const body = parseInput(inspectionBody, request.body);
    if (!body.success) return sendResult(reply, body);
    const result = authority.dispatch({
      type: "REQUEST_INSPECTION",
      actor_id: actor.data,
      listing_id: request.params.listingId,
      tier: body.data.tier,
    });
    return sendResult(reply, result, 201);
  });

  app.get<ListingParams>("/listings/:listingId/inspection", async (request, reply) => {
    const actor = playerId(request);
    if (!actor.success) return sendResult(reply, actor);
    return sendResult(reply, market.getInspectionHoursRemaining(request.params.listingId, actor.data));
  });

  app.delete<ListingParams>("/listings/:listingId/inspection", async (request, reply) => {
    const actor = playerId(request);
    if (!actor.success) return sendResult(reply, actor);
    const result = authority.dispatch({
      type: "CANCEL_INSPECTION",
      actor_id: actor.data,
      listing_id: request.params.listingId,
    });
    return sendResult(reply, result);
  });

  // ─── Buyer offers on the player's own sale listings ──────
  app.post<ListingParams>("/listings/:listingId/accept", async (request, reply) => {
    const actor = playerId(request);
    if (!actor.success) return sendResult(reply, actor);
    const result = authority.dispatch({
      type: "ACCEPT_OFFER",
      actor_id: actor.data,
      listing_id: request.params.listingId,
    });
    return sendResult(reply, result);
  });

  app.post<ListingParams>("/listings/:listingId/decline", async (request, reply) => {
    const actor = playerId(request);
    if (!actor.success) return sendResult(reply, actor);
    const result = authority.dispatch({
      type: "DECLINE_OFFER",
      actor_id: actor.data,
      listing_id: request.params.listingId,
    });
    return sendResult(reply, result);
  });

  app.put<ListingParams>("/listings/:listingId/price", async (request, reply) => {
    const actor = playerId(request);
    if (!actor.success) return sendResult(reply, actor);
    const body = parseInput(priceBody, request.body);
    if (!body.success) return sendResult(reply, body);
    const result = authority.dispatch({
      type: "MODIFY_SALE_PRICE",
      actor_id: actor.data,
      listing_id: request.params.listingId,
      price: body.data.price,
    });
    return sendResult(reply, result);
  });
}
