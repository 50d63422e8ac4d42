/**
 * Market Constants
 *
 * Fixed protocol parameters shared by the scoring, reward and lifecycle code.
 * Tunable values (minimum stake, protocol fee) live in the env config and
 * in the state store, not here.
 */

export const MARKET_CONSTANTS = {
  /** Longest accepted asset identifier */
  MAX_ASSET_ID_LENGTH: 20,
  /** Largest value any uint input may take */
  MAX_UINT: 2n ** 128n - 1n,
  /** Neutral is correct when the move stays within this percentage */
  NEUTRAL_BAND_PERCENT: 5n,
  /** Accuracy at or above this counts as a correct call */
  CORRECT_THRESHOLD: 50n,
  /** Reputation score reported for identities without history */
  DEFAULT_REPUTATION: 50n,
  /** Pool bonus divisor: accuracy percent scaled down by a further 100 */
  POOL_BONUS_DIVISOR: 10_000n,
  MAX_FEE_PERCENT: 100n,
  DEFAULT_FEE_PERCENT: 5n,
  DEFAULT_MIN_STAKE: 1_000_000n,
  /** First allocated round id */
  FIRST_ROUND_ID: 1n,
} as const;

export const ZERO_ADDRESS = '0x0000000000000000000000000000000000000000' as const;

/** Account that holds staked funds between submission and claim */
export const ESCROW_ACCOUNT = '0x00000000000000000000000000000000000e5c40' as const;
