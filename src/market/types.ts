/**
 * Market Module Type Definitions
 * Core records for prediction rounds, entries, crowd sentiment and reputation
 */

import type { Address } from 'viem';

// ============ Sentiment ============

/**
 * Directional belief submitted with a stake.
 * Numeric values are part of the wire contract and feed the weighted average.
 */
export const SENTIMENT = {
  BEARISH: 1,
  NEUTRAL: 2,
  BULLISH: 3,
} as const;

export type Sentiment = (typeof SENTIMENT)[keyof typeof SENTIMENT];

export type SentimentLabel = 'bearish' | 'neutral' | 'bullish';

// ============ Round Types ============

/**
 * Composite key of a round
 */
export interface RoundKey {
  assetId: string;
  roundId: bigint;
}

/**
 * Prediction round for one asset
 */
export interface Round {
  /** Height at which the round was created */
  startHeight: bigint;
  /** Last height at which predictions are accepted */
  endHeight: bigint;
  /** Height from which the round may be resolved */
  targetHeight: bigint;
  initialPrice: bigint;
  /** 0 until resolved */
  finalPrice: bigint;
  totalStake: bigint;
  resolved: boolean;
  creator: Address;
}

/**
 * Lifecycle phase of a round at a given height
 */
export type RoundPhase = 'open' | 'awaiting-resolution' | 'resolvable' | 'resolved';

// ============ Prediction Types ============

/**
 * Composite key of a prediction
 */
export interface PredictionKey extends RoundKey {
  predictor: Address;
}

/**
 * One participant's entry in a round
 */
export interface Prediction {
  sentiment: Sentiment;
  predictedPrice: bigint;
  stakeAmount: bigint;
  /** Height at which the entry was accepted */
  submittedAt: bigint;
  rewarded: boolean;
}

// ============ Aggregate Types ============

/**
 * Crowd sentiment for a round
 */
export interface SentimentAggregate {
  bearish: bigint;
  neutral: bigint;
  bullish: bigint;
  totalPredictions: bigint;
  /** Truncating running average of submitted sentiment values */
  weightedSentiment: bigint;
}

// ============ Reputation Types ============

export interface Reputation {
  totalPredictions: bigint;
  correctPredictions: bigint;
  /** Cumulative net reward */
  totalEarnings: bigint;
  /** correct * 100 / total, 50 without history */
  reputationScore: bigint;
}

// ============ Settlement Types ============

/**
 * Outcome of a successful claim
 */
export interface ClaimResult {
  accuracyScore: bigint;
  /** Net reward paid out */
  rewardAmount: bigint;
  protocolFee: bigint;
  isCorrect: boolean;
}

/**
 * Breakdown of a scored prediction
 */
export interface AccuracyBreakdown {
  directionCorrect: boolean;
  priceAccuracy: bigint;
  accuracy: bigint;
}

// ============ Protocol Types ============

/**
 * Process-wide settings and counters
 */
export interface MarketSettings {
  owner: Address;
  minStake: bigint;
  /** 0-100 */
  protocolFeePercent: bigint;
}

export interface MarketStats extends MarketSettings {
  totalRounds: bigint;
  totalVolume: bigint;
}
