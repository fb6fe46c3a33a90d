import type { FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";
import { createApiError, createApiResponse, type ApiResponse, type MarketErrorCode } from "@usedmarket/shared";

export const PLAYER_HEADER = "x-player-id";

const STATUS_BY_CODE: Record<MarketErrorCode, number> = {
  VALIDATION_ERROR: 400,
  FUNDS_ERROR: 402,
  RACE_REJECTED: 409,
  CORRUPT_RECORD: 500,
};

export function sendResult<T>(reply: FastifyReply, result: ApiResponse<T>, successStatus = 200) {
  const status = result.success ? successStatus : STATUS_BY_CODE[result.error.code];
  return reply.status(status).send(result);
}

/** The acting player, taken from the x-player-id header. */
export function playerId(request: FastifyRequest): ApiResponse<string> {
  const header = request.headers[PLAYER_HEADER];
  if (typeof header !== "string" || header.length === 0) {
    return createApiError("VALIDATION_ERROR", `Missing ${PLAYER_HEADER} header`);
  }
  return createApiResponse(header);
}

export function parseInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): ApiResponse<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    return createApiError("VALIDATION_ERROR", "Invalid request body", {
      issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    });
  }
  return createApiResponse(parsed.data);
}
