/**
 * Balance Ledger
 *
 * In-process stand-in for the chain's native value transfer. Follows the
 * same rules the chain applies to a transfer: the amount must be positive,
 * sender and recipient must differ, and the sender must cover the amount.
 */

import { Identity, TransferResult, ValueTransfer } from '../registry/registry-types';

export type TransferFailureReason = 'non-positive-amount' | 'same-sender-recipient' | 'insufficient-balance';

export interface TransferRecord {
  amount: number;
  from: Identity;
  to: Identity;
}

export class BalanceLedger implements ValueTransfer {
  private balances: Map<Identity, number> = new Map();
  private history: TransferRecord[] = [];

  constructor(initialBalances: Record<Identity, number> = {}) {
    for (const [identity, amount] of Object.entries(initialBalances)) {
      this.credit(identity, amount);
    }
  }

  credit(identity: Identity, amount: number): void {
    if (!Number.isSafeInteger(amount) || amount < 0) {
      throw new Error(`Credit must be a non-negative integer, got ${amount}`);
    }
    this.balances.set(identity, this.balanceOf(identity) + amount);
  }

  balanceOf(identity: Identity): number {
    return this.balances.get(identity) ?? 0;
  }

  get transfers(): readonly TransferRecord[] {
    return this.history;
  }

  transfer(amount: number, from: Identity, to: Identity): TransferResult {
    const rejected = this.checkTransfer(amount, from, to);
    if (rejected) {
      return { ok: false, reason: rejected };
    }

    this.balances.set(from, this.balanceOf(from) - amount);
    this.balances.set(to, this.balanceOf(to) + amount);
    this.history.push({ amount, from, to });
    return { ok: true };
  }

  private checkTransfer(amount: number, from: Identity, to: Identity): TransferFailureReason | null {
    if (!Number.isSafeInteger(amount) || amount <= 0) return 'non-positive-amount';
    if (from === to) return 'same-sender-recipient';
    if (this.balanceOf(from) < amount) return 'insufficient-balance';
    return null;
  }
}
