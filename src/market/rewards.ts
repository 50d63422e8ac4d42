/**
 * Reward Engine
 *
 * Gross reward = stake-proportional part + pool-proportional bonus.
 * The protocol fee is taken from the gross amount by the caller.
 */

import { MARKET_CONSTANTS } from '../config/market.js';

export interface FeeSplit {
  fee: bigint;
  net: bigint;
}

export function calculateReward(accuracy: bigint, stake: bigint, totalPool: bigint): bigint {
  const base = (stake * accuracy) / 100n;
  const bonus = (totalPool * accuracy) / MARKET_CONSTANTS.POOL_BONUS_DIVISOR;
  return base + bonus;
}

export function applyProtocolFee(grossReward: bigint, feePercent: bigint): FeeSplit {
  if (feePercent < 0n || feePercent > MARKET_CONSTANTS.MAX_FEE_PERCENT) {
    throw new RangeError(`fee percent out of range: ${feePercent}`);
  }

  const fee = (grossReward * feePercent) / 100n;
  return { fee, net: grossReward - fee };
}

// Reputation counts a call as correct from this accuracy up
export function isCorrectCall(accuracy: bigint): boolean {
  return accuracy >= MARKET_CONSTANTS.CORRECT_THRESHOLD;
}
