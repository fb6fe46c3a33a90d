import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { WEATHER_CONDITIONS } from "@usedmarket/engine-core";
import { createApiError, createApiResponse } from "@usedmarket/shared";
import type { MarketContext } from "../context.js";
import { parseInput, sendResult } from "../http.js";

// Without a body the clock moves one step.
const hourBody = z.object({ hour: z.number().int().optional() });
const periodBody = z.object({ period: z.number().int().optional() });
const weatherBody = z.object({ condition: z.enum(WEATHER_CONDITIONS) });

/** Host-side controls for standalone runs. A game host drives these itself. */
export function registerClockRoutes(app: FastifyInstance, ctx: MarketContext) {
  const { authority, market, weather } = ctx;

  app.get("/clock", async (_request, reply) =>
    sendResult(reply, createApiResponse({ hour: market.hour, period: market.period, weather: weather.current() })),
  );

  app.post("/clock/hour", async (request, reply) => {
    const body = parseInput(hourBody, request.body ?? {});
    if (!body.success) return sendResult(reply, body);
    const hour = body.data.hour ?? market.hour + 1;
    if (!authority.onHourTick(hour)) {
      return sendResult(reply, createApiError("VALIDATION_ERROR", `Hour ${hour} is not after ${market.hour}`));
    }
    return sendResult(reply, createApiResponse({ hour: market.hour, period: market.period }));
  });

  app.post("/clock/period", async (request, reply) => {
    const body = parseInput(periodBody, request.body ?? {});
    if (!body.success) return sendResult(reply, body);
    const period = body.data.period ?? market.period + 1;
    if (!authority.onPeriodTick(period)) {
      return sendResult(reply, createApiError("VALIDATION_ERROR", `Period ${period} is not after ${market.period}`));
    }
    return sendResult(reply, createApiResponse({ hour: market.hour, period: market.period }));
  });

  app.put("/weather", async (request, reply) => {
    const body = parseInput(weatherBody, request.body);
    if (!body.success) return sendResult(reply, body);
    weather.set(body.data.condition);
    ctx.logger.info({ condition: body.data.condition }, "weather changed");
    return sendResult(reply, createApiResponse({ condition: weather.current() }));
  });
}
