/**
 * Stake Ledger
 *
 * The market never moves funds itself: stakes go from a participant into
 * the escrow account on submission and rewards come back out on claim,
 * both through this interface.
 */

import type { Address } from 'viem';

export interface TransferResult {
  success: boolean;
  error?: string;
}

export interface StakeLedger {
  transfer(from: Address, to: Address, amount: bigint): Promise<TransferResult>;
  balanceOf(account: Address): Promise<bigint>;
}

export interface TransferRecord {
  from: Address;
  to: Address;
  amount: bigint;
}

/**
 * Non-zero balances keyed by lowercased account, sorted by account
 */
export interface LedgerSnapshot {
  balances: Array<[string, bigint]>;
}

/**
 * Balance map ledger for local runs and tests
 */
export class InMemoryLedger implements StakeLedger {
  private balances: Map<string, bigint> = new Map();
  private history: TransferRecord[] = [];

  constructor(initialBalances: Record<string, bigint> = {}) {
    for (const [account, amount] of Object.entries(initialBalances)) {
      this.balances.set(account.toLowerCase(), amount);
    }
  }

  mint(account: Address, amount: bigint): void {
    if (amount < 0n) {
      throw new RangeError('mint amount must not be negative');
    }
    const key = account.toLowerCase();
    this.balances.set(key, (this.balances.get(key) ?? 0n) + amount);
  }

  async balanceOf(account: Address): Promise<bigint> {
    return this.balances.get(account.toLowerCase()) ?? 0n;
  }

  async transfer(from: Address, to: Address, amount: bigint): Promise<TransferResult> {
    if (amount <= 0n) {
      return { success: false, error: 'Transfer amount must be greater than 0' };
    }
    if (from.toLowerCase() === to.toLowerCase()) {
      return { success: false, error: 'Sender and recipient are the same account' };
    }

    const fromKey = from.toLowerCase();
    const balance = this.balances.get(fromKey) ?? 0n;
    if (balance < amount) {
      return { success: false, error: `Insufficient balance: have ${balance}, need ${amount}` };
    }

    const toKey = to.toLowerCase();
    this.balances.set(fromKey, balance - amount);
    this.balances.set(toKey, (this.balances.get(toKey) ?? 0n) + amount);
    this.history.push({ from, to, amount });
    return { success: true };
  }

  getHistory(): TransferRecord[] {
    return [...this.history];
  }

  toSnapshot(): LedgerSnapshot {
    const balances = [...this.balances.entries()]
      .filter(([, amount]) => amount > 0n)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return { balances };
  }

  // Transfer history is not part of the snapshot
  static fromSnapshot(snapshot: LedgerSnapshot): InMemoryLedger {
    return new InMemoryLedger(Object.fromEntries(snapshot.balances));
  }
}
