import Fastify, { type FastifyBaseLogger } from "fastify";
import cors from "@fastify/cors";
import { createDb, type Database } from "@usedmarket/db";
import type { RandomSource } from "@usedmarket/engine-core";
import { MarketAuthority, Marketplace } from "@usedmarket/engine-session";
import { createLogger } from "@usedmarket/shared";
import type { ApiConfig } from "./config.js";
import type { MarketContext } from "./context.js";
import { NotificationInbox } from "./host/inbox.js";
import { InMemoryLedger } from "./host/ledger.js";
import { SettableWeather } from "./host/weather.js";
import { PLAYER_HEADER } from "./http.js";
import { registerAccountRoutes } from "./routes/account.js";
import { registerAdminRoutes } from "./routes/admin.js";
import { registerClockRoutes } from "./routes/clock.js";
import { registerListingRoutes } from "./routes/listings.js";
import { registerSaleRoutes } from "./routes/sales.js";
import { registerSearchRoutes } from "./routes/searches.js";

export interface ServerOptions {
  /** Overrides the seeded generator. */
  random?: RandomSource;
  /** Overrides the connection built from DATABASE_URL. */
  db?: Database | null;
}

export async function createServer(config: ApiConfig, options: ServerOptions = {}) {
  const logger = createLogger({ level: config.LOG_LEVEL, name: "api" });
  const loggerInstance: FastifyBaseLogger = logger;
  const app = Fastify({ loggerInstance });

  // ─── Market ──────────────────────────────────────────────
  const ledger = new InMemoryLedger(config.STARTING_BALANCE);
  const weather = new SettableWeather();
  const inbox = new NotificationInbox(logger);
  const market = new Marketplace({
    ledger,
    weather,
    notifier: inbox,
    random: options.random,
    seed: config.MARKET_SEED,
    logger: logger.child({ module: "market" }),
  });
  const ctx: MarketContext = {
    market,
    authority: new MarketAuthority(market, inbox, logger.child({ module: "authority" })),
    ledger,
    weather,
    inbox,
    logger,
    db: options.db !== undefined ? options.db : config.DATABASE_URL ? createDb(config.DATABASE_URL) : null,
    sessionId: config.MARKET_SESSION_ID,
  };

  // ─── CORS ────────────────────────────────────────────────
  await app.register(cors, {
    origin: config.CORS_ORIGINS,
    methods: ["GET", "POST", "PUT", "DELETE", "OPTIONS"],
    allowedHeaders: ["Content-Type", PLAYER_HEADER],
  });

  // ─── Health Check ────────────────────────────────────────
  app.get("/health", async () => ({
    status: "ok",
    timestamp: new Date().toISOString(),
    hour: market.hour,
  }));

  // ─── Market Routes ───────────────────────────────────────
  registerSearchRoutes(app, ctx);
  registerListingRoutes(app, ctx);
  registerSaleRoutes(app, ctx);
  registerAccountRoutes(app, ctx);
  registerClockRoutes(app, ctx);
  registerAdminRoutes(app, ctx);

  return app;
}
