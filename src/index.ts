/**
 * Sentiment Rounds - staking-based price prediction market
 *
 * Core capabilities:
 * - Round lifecycle (create, submit, resolve, claim)
 * - Hybrid direction / price-proximity scoring
 * - Pool-weighted rewards net of a protocol fee
 * - Crowd sentiment and long-term reputation tracking
 */

export { SentimentMarket } from './SentimentMarket.js';
export type { SentimentMarketOptions } from './SentimentMarket.js';

export * from './market/index.js';

export { ManualBlockClock, ChainBlockClock } from './chain/clock.js';
export type { BlockClock } from './chain/clock.js';
export { InMemoryLedger } from './ledger/escrow.js';
export type { StakeLedger, TransferResult, TransferRecord, LedgerSnapshot } from './ledger/escrow.js';

export { getConfig, getRpcUrl, loadConfig, reloadConfig } from './config/index.js';
export type { Config } from './config/index.js';
export { MARKET_CONSTANTS, ESCROW_ACCOUNT, ZERO_ADDRESS } from './config/market.js';

export { createApp, startServer } from './api/server.js';
export type { MarketSnapshotInfo, PersistedState } from './types/index.js';
