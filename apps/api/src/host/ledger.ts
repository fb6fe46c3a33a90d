import type { Ledger } from "@usedmarket/engine-session";

/** Player cash for standalone runs. Every new account opens with the starting balance. */
export class InMemoryLedger implements Ledger {
  private readonly balances = new Map<string, number>();

  constructor(private readonly startingBalance: number) {}

  balance(ownerId: string): number {
    return this.balances.get(ownerId) ?? this.startingBalance;
  }

  debit(ownerId: string, amount: number): boolean {
    const balance = this.balance(ownerId);
    if (!Number.isFinite(amount) || amount < 0 || balance < amount) return false;
    this.balances.set(ownerId, balance - amount);
    return true;
  }

  credit(ownerId: string, amount: number): boolean {
    if (!Number.isFinite(amount) || amount < 0) return false;
    this.balances.set(ownerId, this.balance(ownerId) + amount);
    return true;
  }
}
