/**
 * Round Lifecycle Controller
 *
 * Entry point for every state transition of a round:
 *   create -> open -> awaiting resolution -> resolved, and per entry
 *   submitted -> claimed.
 *
 * Each public operation is one transaction on the state store. Guards run
 * before any write, ledger transfers run after the guards, and the staged
 * writes are committed only when the operation returns ok.
 */

import type { Address } from 'viem';
import { ESCROW_ACCOUNT, MARKET_CONSTANTS } from '../config/market.js';
import type { BlockClock } from '../chain/clock.js';
import type { StakeLedger } from '../ledger/escrow.js';
import { accumulateSentiment, emptyAggregate } from './aggregate.js';
import { fail, ok, type Result } from './errors.js';
import { ReputationLedger } from './reputation.js';
import { applyProtocolFee, calculateReward, isCorrectCall } from './rewards.js';
import { scorePrediction } from './scoring.js';
import type { StateStore } from './store.js';
import {
  SENTIMENT,
  type AccuracyBreakdown,
  type ClaimResult,
  type MarketStats,
  type Prediction,
  type Reputation,
  type Round,
  type RoundKey,
  type RoundPhase,
  type Sentiment,
  type SentimentAggregate,
} from './types.js';

export interface CreateRoundParams {
  assetId: string;
  durationBlocks: bigint;
  evaluationBlocks: bigint;
  initialPrice: bigint;
}

export interface SubmitPredictionParams extends RoundKey {
  sentiment: number;
  predictedPrice: bigint;
  stakeAmount: bigint;
}

export interface ResolveRoundParams extends RoundKey {
  finalPrice: bigint;
}

export interface RoundControllerOptions {
  store: StateStore;
  ledger: StakeLedger;
  clock: BlockClock;
  escrowAccount?: Address;
}

export function isSentiment(value: number): value is Sentiment {
  return value === SENTIMENT.BEARISH || value === SENTIMENT.NEUTRAL || value === SENTIMENT.BULLISH;
}

/**
 * Phase of a round at `height`
 */
export function roundPhase(round: Round, height: bigint): RoundPhase {
  if (round.resolved) return 'resolved';
  if (height <= round.endHeight) return 'open';
  if (height < round.targetHeight) return 'awaiting-resolution';
  return 'resolvable';
}

function sameIdentity(a: Address, b: Address): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

export class RoundController {
  private store: StateStore;
  private ledger: StakeLedger;
  private clock: BlockClock;
  private escrowAccount: Address;
  private reputation = new ReputationLedger();

  constructor(options: RoundControllerOptions) {
    this.store = options.store;
    this.ledger = options.ledger;
    this.clock = options.clock;
    this.escrowAccount = options.escrowAccount ?? ESCROW_ACCOUNT;
  }

  // ============ State Transitions ============

  /**
   * Open a new round starting at the current height. Anyone may call.
   */
  createRound(caller: Address, params: CreateRoundParams): Promise<Result<bigint>> {
    return this.store.transaction(async (tx) => {
      const assetCheck = this.checkAssetId(params.assetId);
      if (!assetCheck.ok) return assetCheck;

      if (params.durationBlocks <= 0n || params.evaluationBlocks <= 0n || params.initialPrice <= 0n) {
        return fail('InvalidTimeframe');
      }

      const height = await this.clock.getBlockHeight();
      const counters = tx.getCounters();
      const roundId = counters.totalRounds + MARKET_CONSTANTS.FIRST_ROUND_ID;
      const key: RoundKey = { assetId: params.assetId, roundId };
      const endHeight = height + params.durationBlocks;

      tx.putRound(key, {
        startHeight: height,
        endHeight,
        targetHeight: endHeight + params.evaluationBlocks,
        initialPrice: params.initialPrice,
        finalPrice: 0n,
        totalStake: 0n,
        resolved: false,
        creator: caller,
      });
      tx.putAggregate(key, emptyAggregate());
      tx.setCounters({ ...counters, totalRounds: roundId });

      return ok(roundId);
    });
  }

  /**
   * Enter a round with a sentiment, a price target and a stake
   */
  submitPrediction(caller: Address, params: SubmitPredictionParams): Promise<Result<Prediction>> {
    return this.store.transaction(async (tx) => {
      const key: RoundKey = { assetId: params.assetId, roundId: params.roundId };
      const round = tx.getRound(key);
      if (!round) return fail('NotFound', `round ${params.assetId}/${params.roundId}`);

      const { sentiment } = params;
      if (!isSentiment(sentiment)) return fail('InvalidSentiment');

      const { minStake } = tx.getSettings();
      if (params.stakeAmount < minStake) {
        return fail('InsufficientStake', `minimum is ${minStake}`);
      }

      const height = await this.clock.getBlockHeight();
      if (height > round.endHeight) return fail('PredictionClosed');

      const predictionKey = { ...key, predictor: caller };
      if (tx.getPrediction(predictionKey)) return fail('AlreadyPredicted');
      if (round.resolved) return fail('AlreadyResolved');

      const transfer = await this.ledger.transfer(caller, this.escrowAccount, params.stakeAmount);
      if (!transfer.success) return fail('TransferFailed', transfer.error);

      const prediction: Prediction = {
        sentiment,
        predictedPrice: params.predictedPrice,
        stakeAmount: params.stakeAmount,
        submittedAt: height,
        rewarded: false,
      };
      tx.putPrediction(predictionKey, prediction);
      tx.putAggregate(key, accumulateSentiment(tx.getAggregate(key) ?? emptyAggregate(), sentiment));
      tx.putRound(key, { ...round, totalStake: round.totalStake + params.stakeAmount });

      const counters = tx.getCounters();
      tx.setCounters({ ...counters, totalVolume: counters.totalVolume + params.stakeAmount });

      return ok(prediction);
    });
  }

  /**
   * Record the realized price. Owner or round creator only, once, from the
   * target height on.
   */
  resolveRound(caller: Address, params: ResolveRoundParams): Promise<Result<Round>> {
    return this.store.transaction(async (tx) => {
      const key: RoundKey = { assetId: params.assetId, roundId: params.roundId };
      const round = tx.getRound(key);
      if (!round) return fail('NotFound', `round ${params.assetId}/${params.roundId}`);

      const { owner } = tx.getSettings();
      if (!sameIdentity(caller, owner) && !sameIdentity(caller, round.creator)) {
        return fail('OwnerOnly');
      }

      const height = await this.clock.getBlockHeight();
      if (height < round.targetHeight) {
        return fail('PredictionActive', `resolvable at height ${round.targetHeight}`);
      }
      if (round.resolved) return fail('AlreadyResolved');
      if (params.finalPrice <= 0n) return fail('InvalidTimeframe', 'final price must be positive');

      const resolved: Round = { ...round, finalPrice: params.finalPrice, resolved: true };
      tx.putRound(key, resolved);
      return ok(resolved);
    });
  }

  /**
   * Score the caller's entry against the resolved round and pay out the
   * net reward
   */
  claimReward(caller: Address, key: RoundKey): Promise<Result<ClaimResult>> {
    return this.store.transaction(async (tx) => {
      const round = tx.getRound(key);
      if (!round) return fail('NotFound', `round ${key.assetId}/${key.roundId}`);
      if (!round.resolved) return fail('PredictionActive', 'round not resolved');

      const predictionKey = { ...key, predictor: caller };
      const prediction = tx.getPrediction(predictionKey);
      if (!prediction) return fail('NotFound', `no prediction from ${caller}`);
      if (prediction.rewarded) return fail('AlreadyPredicted', 'reward already claimed');
      if (round.finalPrice <= 0n) return fail('PredictionActive', 'final price not set');

      const { accuracy } = scorePrediction(
        prediction.predictedPrice,
        round.finalPrice,
        prediction.sentiment,
        round.initialPrice
      );
      const gross = calculateReward(accuracy, prediction.stakeAmount, round.totalStake);
      const { fee, net } = applyProtocolFee(gross, tx.getSettings().protocolFeePercent);
      const isCorrect = isCorrectCall(accuracy);

      if (net > 0n) {
        const transfer = await this.ledger.transfer(this.escrowAccount, caller, net);
        if (!transfer.success) return fail('TransferFailed', transfer.error);
      }

      tx.putPrediction(predictionKey, { ...prediction, rewarded: true });
      this.reputation.update(tx, caller, isCorrect, net);

      return ok({ accuracyScore: accuracy, rewardAmount: net, protocolFee: fee, isCorrect });
    });
  }

  // ============ Owner Settings ============

  setMinStake(caller: Address, amount: bigint): Promise<Result<bigint>> {
    return this.store.transaction((tx) => {
      const settings = tx.getSettings();
      if (!sameIdentity(caller, settings.owner)) return fail('OwnerOnly');
      if (amount <= 0n) return fail('InsufficientStake', 'minimum stake must be positive');

      tx.setSettings({ ...settings, minStake: amount });
      return ok(amount);
    });
  }

  setProtocolFee(caller: Address, percent: bigint): Promise<Result<bigint>> {
    return this.store.transaction((tx) => {
      const settings = tx.getSettings();
      if (!sameIdentity(caller, settings.owner)) return fail('OwnerOnly');
      if (percent < 0n || percent > MARKET_CONSTANTS.MAX_FEE_PERCENT) return fail('InvalidFee');

      tx.setSettings({ ...settings, protocolFeePercent: percent });
      return ok(percent);
    });
  }

  // ============ Read-only Views ============

  getRound(key: RoundKey): Result<Round> {
    const round = this.store.getRound(key);
    return round ? ok(round) : fail('NotFound', `round ${key.assetId}/${key.roundId}`);
  }

  getPrediction(key: RoundKey, predictor: Address): Result<Prediction> {
    const prediction = this.store.getPrediction({ ...key, predictor });
    return prediction ? ok(prediction) : fail('NotFound', `no prediction from ${predictor}`);
  }

  getSentiment(key: RoundKey): Result<SentimentAggregate> {
    const aggregate = this.store.getAggregate(key);
    return aggregate ? ok(aggregate) : fail('NotFound', `round ${key.assetId}/${key.roundId}`);
  }

  getReputation(identity: Address): Result<Reputation> {
    return this.reputation.get(this.store, identity);
  }

  getMarketStats(): MarketStats {
    return { ...this.store.getSettings(), ...this.store.getCounters() };
  }

  async getRoundPhase(key: RoundKey): Promise<Result<RoundPhase>> {
    const round = this.store.getRound(key);
    if (!round) return fail('NotFound', `round ${key.assetId}/${key.roundId}`);
    return ok(roundPhase(round, await this.clock.getBlockHeight()));
  }

  /**
   * Score a hypothetical entry against a resolved round without touching state
   */
  previewAccuracy(key: RoundKey, sentiment: number, predictedPrice: bigint): Result<AccuracyBreakdown> {
    const round = this.store.getRound(key);
    if (!round) return fail('NotFound', `round ${key.assetId}/${key.roundId}`);
    if (!isSentiment(sentiment)) return fail('InvalidSentiment');
    if (!round.resolved) return fail('PredictionActive', 'round not resolved');

    return ok(scorePrediction(predictedPrice, round.finalPrice, sentiment, round.initialPrice));
  }

  /**
   * Entries of a round, ordered by predictor
   */
  listPredictions(key: RoundKey): Array<[Address, Prediction]> {
    return this.store.listPredictions(key);
  }

  private checkAssetId(assetId: string): Result<string> {
    if (assetId.length === 0 || assetId.length > MARKET_CONSTANTS.MAX_ASSET_ID_LENGTH) {
      return fail('InvalidAsset');
    }
    return ok(assetId);
  }
}
