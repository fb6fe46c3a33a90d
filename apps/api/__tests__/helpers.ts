import type { FastifyInstance } from "fastify";
import type { RandomSource } from "@usedmarket/engine-core";
import { loadConfig } from "../src/config.js";
import { createServer } from "../src/server.js";

/** Returns queued values first, then 0.5. */
export class ScriptedRandom {
  private readonly queue: number[] = [];

  push(...values: number[]): void {
    this.queue.push(...values);
  }

  readonly source: RandomSource = () => this.queue.shift() ?? 0.5;
}

export async function makeServer(random = new ScriptedRandom()) {
  const config = loadConfig({ LOG_LEVEL: "silent", STARTING_BALANCE: "250000" });
  const app = await createServer(config, { random: random.source, db: null });
  return { app, random };
}

export const PLAYER = { "x-player-id": "player-1" };

export async function advanceHours(app: FastifyInstance, count: number): Promise<void> {
  for (let i = 0; i < count; i++) {
    await app.inject({ method: "POST", url: "/clock/hour" });
  }
}
