/**
 * Market Core Module
 *
 * Round lifecycle, hybrid scoring and reward engines, crowd sentiment and
 * reputation bookkeeping.
 */

// Lifecycle
export { RoundController, roundPhase, isSentiment } from './rounds.js';
export type {
  CreateRoundParams,
  SubmitPredictionParams,
  ResolveRoundParams,
  RoundControllerOptions,
} from './rounds.js';

// Engines
export { calculateAccuracy, calculatePriceAccuracy, isDirectionCorrect, scorePrediction } from './scoring.js';
export { calculateReward, applyProtocolFee, isCorrectCall } from './rewards.js';
export type { FeeSplit } from './rewards.js';
export { accumulateSentiment, emptyAggregate, dominantSentiment } from './aggregate.js';
export { ReputationLedger, applyOutcome, defaultReputation } from './reputation.js';

// State
export { StateStore, roundKeyOf, predictionKeyOf } from './store.js';
export type { MarketCounters, MarketSnapshot, MarketReader, MarketWriter, CommitListener } from './store.js';

// Errors
export { MarketError, MARKET_ERRORS, ok, fail, isMarketError } from './errors.js';
export type { MarketErrorCode, MarketErrorKind, Result } from './errors.js';

export * from './types.js';
