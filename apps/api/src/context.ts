import type { Database } from "@usedmarket/db";
import type { MarketAuthority, Marketplace } from "@usedmarket/engine-session";
import type { Logger } from "@usedmarket/shared";
import type { NotificationInbox } from "./host/inbox.js";
import type { InMemoryLedger } from "./host/ledger.js";
import type { SettableWeather } from "./host/weather.js";

/** Everything the routes share for one running market. */
export interface MarketContext {
  market: Marketplace;
  authority: MarketAuthority;
  ledger: InMemoryLedger;
  weather: SettableWeather;
  inbox: NotificationInbox;
  logger: Logger;
  /** Null when no DATABASE_URL is configured. */
  db: Database | null;
  sessionId: string;
}
