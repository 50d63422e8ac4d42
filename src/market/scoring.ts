/**
 * Scoring Engine
 *
 * Hybrid accuracy score (0-100) combining directional correctness with
 * numeric proximity of the predicted price. Integer arithmetic only so any
 * verifier replaying a round gets the same score.
 */

import { MARKET_CONSTANTS } from '../config/market.js';
import { SENTIMENT, type AccuracyBreakdown, type Sentiment } from './types.js';

const HUNDRED = 100n;

function absDiff(a: bigint, b: bigint): bigint {
  return a > b ? a - b : b - a;
}

/**
 * Whether the sentiment called the move from initial to actual price.
 * Neutral wins when the absolute move is within the neutral band.
 */
export function isDirectionCorrect(sentiment: Sentiment, actualPrice: bigint, initialPrice: bigint): boolean {
  if (initialPrice <= 0n) {
    throw new RangeError('initial price must be positive');
  }

  switch (sentiment) {
    case SENTIMENT.BULLISH:
      return actualPrice >= initialPrice;
    case SENTIMENT.BEARISH:
      return actualPrice < initialPrice;
    case SENTIMENT.NEUTRAL:
      return (absDiff(actualPrice, initialPrice) * HUNDRED) / initialPrice <= MARKET_CONSTANTS.NEUTRAL_BAND_PERCENT;
  }
}

/**
 * 100 minus the percentage error of the predicted price, clamped at 0
 */
export function calculatePriceAccuracy(predictedPrice: bigint, actualPrice: bigint): bigint {
  if (actualPrice <= 0n) return 0n;

  const errorPercent = (absDiff(predictedPrice, actualPrice) * HUNDRED) / actualPrice;
  return errorPercent >= HUNDRED ? 0n : HUNDRED - errorPercent;
}

export function scorePrediction(
  predictedPrice: bigint,
  actualPrice: bigint,
  sentiment: Sentiment,
  initialPrice: bigint
): AccuracyBreakdown {
  const directionCorrect = isDirectionCorrect(sentiment, actualPrice, initialPrice);
  const priceAccuracy = calculatePriceAccuracy(predictedPrice, actualPrice);
  const accuracy = directionCorrect ? (priceAccuracy + HUNDRED) / 2n : priceAccuracy / 2n;

  return { directionCorrect, priceAccuracy, accuracy };
}

/**
 * Accuracy score in [0, 100]
 */
export function calculateAccuracy(
  predictedPrice: bigint,
  actualPrice: bigint,
  sentiment: Sentiment,
  initialPrice: bigint
): bigint {
  return scorePrediction(predictedPrice, actualPrice, sentiment, initialPrice).accuracy;
}
