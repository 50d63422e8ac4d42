// Core Types for Sentiment Rounds

export * from '../market/types.js';
export type { MarketErrorCode, MarketErrorKind, Result } from '../market/errors.js';

import type { LedgerSnapshot } from '../ledger/escrow.js';
import type { MarketSnapshot } from '../market/store.js';

/**
 * Contents of the state file: the store, plus the in-memory ledger's
 * balances when that ledger holds the stakes
 */
export interface PersistedState {
  market: MarketSnapshot;
  ledger?: LedgerSnapshot;
}

export interface MarketSnapshotInfo {
  network: string;
  clockMode: 'manual' | 'chain';
  persistState: boolean;
  lastUpdate: number;
}
