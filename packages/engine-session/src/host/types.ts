import type { WeatherCondition } from '@usedmarket/engine-core';
import type { NotificationSeverity } from '@usedmarket/shared';

/** Host money. Both calls return false when the transfer did not happen. */
export interface Ledger {
  debit(ownerId: string, amount: number): boolean;
  credit(ownerId: string, amount: number): boolean;
}

export interface WeatherProvider {
  current(): WeatherCondition;
}

export interface NotificationSink {
  notify(ownerId: string, message: string, severity: NotificationSeverity): void;
}
