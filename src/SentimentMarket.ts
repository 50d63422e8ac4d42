/**
 * SentimentMarket - staking-based price prediction market
 *
 * Wires the round controller to its collaborators:
 * - state store (optionally persisted to data/)
 * - stake ledger holding escrowed stakes (in-memory balances are persisted
 *   alongside the store)
 * - block clock (manual, or the head of a Base network)
 * and logs every committed lifecycle event.
 */

import type { Address } from 'viem';
import { getConfig, getRpcUrl, type Config } from './config/index.js';
import { ChainBlockClock, ManualBlockClock, type BlockClock } from './chain/clock.js';
import { InMemoryLedger, type LedgerSnapshot, type StakeLedger } from './ledger/escrow.js';
import { RoundController, type CreateRoundParams, type ResolveRoundParams, type SubmitPredictionParams } from './market/rounds.js';
import { StateStore, type MarketSnapshot } from './market/store.js';
import type { Result } from './market/errors.js';
import type {
  AccuracyBreakdown,
  ClaimResult,
  MarketStats,
  Prediction,
  Reputation,
  Round,
  RoundKey,
  RoundPhase,
  SentimentAggregate,
} from './market/types.js';
import type { MarketSnapshotInfo, PersistedState } from './types/index.js';
import { formatClaim, formatCrowdSentiment, formatRoundKey, getSentimentEmoji, sentimentLabel } from './utils/formatting.js';
import { loadJson, saveJson } from './utils/persistence.js';
import { parsePersistedState } from './utils/validation.js';

export interface SentimentMarketOptions {
  config?: Config;
  ledger?: StakeLedger;
  clock?: BlockClock;
  store?: StateStore;
  /** Directory for the persisted state file */
  dataDir?: string;
  /** Suppress lifecycle logging */
  quiet?: boolean;
}

export class SentimentMarket {
  private config: Config;
  private store: StateStore;
  private controller: RoundController;
  private ledger: StakeLedger;
  private clock: BlockClock;
  private quiet: boolean;
  private lastUpdate = Date.now();

  constructor(options: SentimentMarketOptions = {}) {
    this.config = options.config ?? getConfig();
    this.quiet = options.quiet ?? false;
    const persisted = this.loadState(options.dataDir);

    this.ledger = options.ledger ?? this.createLedger(persisted?.ledger);
    this.clock = options.clock ?? this.createClock();
    this.store = options.store ?? this.createStore(persisted?.market);

    if (this.config.persistState) {
      const { stateFile } = this.config;
      const ledger = this.ledger;
      this.store.onCommit((market) => {
        const state: PersistedState =
          ledger instanceof InMemoryLedger ? { market, ledger: ledger.toSnapshot() } : { market };
        saveJson(stateFile, state, options.dataDir);
      });
    }
    this.store.onCommit(() => {
      this.lastUpdate = Date.now();
    });

    this.controller = new RoundController({
      store: this.store,
      ledger: this.ledger,
      clock: this.clock,
    });
  }

  // ============ Lifecycle ============

  async createRound(caller: Address, params: CreateRoundParams): Promise<Result<bigint>> {
    const result = await this.controller.createRound(caller, params);
    if (result.ok) {
      const key = { assetId: params.assetId, roundId: result.value };
      this.log(`🎯 Round ${formatRoundKey(key)} created by ${caller} at price ${params.initialPrice}`);
    }
    return result;
  }

  async submitPrediction(caller: Address, params: SubmitPredictionParams): Promise<Result<Prediction>> {
    const result = await this.controller.submitPrediction(caller, params);
    if (result.ok) {
      this.log(
        `${getSentimentEmoji(result.value.sentiment)} ${caller} staked ${params.stakeAmount} on ${formatRoundKey(params)} ` +
          `(${sentimentLabel(result.value.sentiment)}, targeting ${params.predictedPrice})`
      );
    }
    return result;
  }

  async resolveRound(caller: Address, params: ResolveRoundParams): Promise<Result<Round>> {
    const result = await this.controller.resolveRound(caller, params);
    if (result.ok) {
      this.log(`🔔 Round ${formatRoundKey(params)} resolved at ${params.finalPrice} (pool ${result.value.totalStake})`);
      const aggregate = this.controller.getSentiment(params);
      if (aggregate.ok) {
        this.log(`   Crowd: ${formatCrowdSentiment(aggregate.value)}`);
      }
    }
    return result;
  }

  async claimReward(caller: Address, key: RoundKey): Promise<Result<ClaimResult>> {
    const result = await this.controller.claimReward(caller, key);
    if (result.ok) {
      this.log(`💰 ${caller} claimed on ${formatRoundKey(key)}: ${formatClaim(result.value)}`);
    }
    return result;
  }

  async setMinStake(caller: Address, amount: bigint): Promise<Result<bigint>> {
    const result = await this.controller.setMinStake(caller, amount);
    if (result.ok) this.log(`⚙️  Minimum stake set to ${amount}`);
    return result;
  }

  async setProtocolFee(caller: Address, percent: bigint): Promise<Result<bigint>> {
    const result = await this.controller.setProtocolFee(caller, percent);
    if (result.ok) this.log(`⚙️  Protocol fee set to ${percent}%`);
    return result;
  }

  // ============ Views ============

  getRound(key: RoundKey): Result<Round> {
    return this.controller.getRound(key);
  }

  getRoundPhase(key: RoundKey): Promise<Result<RoundPhase>> {
    return this.controller.getRoundPhase(key);
  }

  getPrediction(key: RoundKey, predictor: Address): Result<Prediction> {
    return this.controller.getPrediction(key, predictor);
  }

  getSentiment(key: RoundKey): Result<SentimentAggregate> {
    return this.controller.getSentiment(key);
  }

  getReputation(identity: Address): Result<Reputation> {
    return this.controller.getReputation(identity);
  }

  previewAccuracy(key: RoundKey, sentiment: number, predictedPrice: bigint): Result<AccuracyBreakdown> {
    return this.controller.previewAccuracy(key, sentiment, predictedPrice);
  }

  getMarketStats(): MarketStats {
    return this.controller.getMarketStats();
  }

  getBlockHeight(): Promise<bigint> {
    return this.clock.getBlockHeight();
  }

  getInfo(): MarketSnapshotInfo {
    return {
      network: this.config.network,
      clockMode: this.clock instanceof ChainBlockClock ? 'chain' : 'manual',
      persistState: this.config.persistState,
      lastUpdate: this.lastUpdate,
    };
  }

  getLedger(): StakeLedger {
    return this.ledger;
  }

  // ============ Internals ============

  private createClock(): BlockClock {
    return this.config.clockMode === 'chain'
      ? ChainBlockClock.forNetwork(this.config.network, getRpcUrl(this.config))
      : new ManualBlockClock();
  }

  /**
   * Restored balances, or a ledger funded from INITIAL_BALANCES
   */
  private createLedger(snapshot?: LedgerSnapshot): InMemoryLedger {
    if (snapshot) {
      return InMemoryLedger.fromSnapshot(snapshot);
    }
    const ledger = new InMemoryLedger();
    for (const [account, amount] of this.config.initialBalances) {
      ledger.mint(account, amount);
    }
    if (this.config.initialBalances.length > 0) {
      this.log(`🏦 Funded ${this.config.initialBalances.length} accounts on the in-memory ledger`);
    }
    return ledger;
  }

  private createStore(snapshot?: MarketSnapshot): StateStore {
    if (snapshot) {
      return StateStore.fromSnapshot(snapshot);
    }
    return new StateStore({
      owner: this.config.ownerAddress,
      minStake: this.config.minStake,
      protocolFeePercent: this.config.protocolFeePercent,
    });
  }

  private loadState(dataDir?: string): PersistedState | undefined {
    if (!this.config.persistState) return undefined;

    const raw = loadJson(this.config.stateFile, dataDir);
    if (raw === undefined) return undefined;

    const state = parsePersistedState(raw);
    this.log(`📂 Loaded market state from ${this.config.stateFile} (${state.market.counters.totalRounds} rounds)`);
    return state;
  }

  private log(message: string): void {
    if (!this.quiet) {
      console.log(message);
    }
  }
}
