import { z } from 'zod';
import { type Address, getAddress, isAddress } from 'viem';
import { MARKET_CONSTANTS } from '../config/market.js';
import type { LedgerSnapshot } from '../ledger/escrow.js';
import type { MarketSnapshot } from '../market/store.js';
import type { PersistedState } from '../types/index.js';

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

/**
 * Unsigned integer input: a decimal string or a safe integer, at most 2^128 - 1
 */
export const uintSchema = z
  .union([
    z.string().trim().regex(/^\d+$/, 'Must be an unsigned integer'),
    z.number().int('Must be an integer').nonnegative('Must not be negative').max(Number.MAX_SAFE_INTEGER),
  ])
  .transform((value) => BigInt(value))
  .refine((value) => value <= MARKET_CONSTANTS.MAX_UINT, 'Must fit in 128 bits');

export const addressSchema = z
  .string()
  .trim()
  .refine((value): value is Address => isAddress(value), 'Invalid Ethereum address format')
  .transform((value) => getAddress(value));

export const assetIdSchema = z
  .string()
  .trim()
  .min(1, 'Asset id is required')
  .max(MARKET_CONSTANTS.MAX_ASSET_ID_LENGTH, `Asset id must not exceed ${MARKET_CONSTANTS.MAX_ASSET_ID_LENGTH} characters`);

// ============ Request Schemas ============

export const CreateRoundSchema = z.object({
  assetId: assetIdSchema,
  durationBlocks: uintSchema,
  evaluationBlocks: uintSchema,
  initialPrice: uintSchema,
});

// Sentiment range is a market guard, so any integer passes here
export const SubmitPredictionSchema = z.object({
  sentiment: z.coerce.number().int('Sentiment must be an integer'),
  predictedPrice: uintSchema,
  stakeAmount: uintSchema,
});

export const ResolveRoundSchema = z.object({
  finalPrice: uintSchema,
});

export const RoundParamsSchema = z.object({
  assetId: assetIdSchema,
  roundId: uintSchema,
});

export const MinStakeSchema = z.object({ amount: uintSchema });

export const ProtocolFeeSchema = z.object({ percent: uintSchema });

/**
 * Flatten zod issues into "path: message" strings
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message));
}

/**
 * Validates Ethereum address
 */
export function validateAddress(address: string | undefined): ValidationResult {
  const errors: string[] = [];

  if (!address) {
    errors.push('Address is required');
  } else if (!isAddress(address)) {
    errors.push('Invalid Ethereum address format');
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

// ============ Snapshot Schema ============

const storedAddress = z.string().refine((value): value is Address => isAddress(value), 'Invalid address');
const storedSentiment = z.union([z.literal(1), z.literal(2), z.literal(3)]);

const RoundRecordSchema = z.object({
  startHeight: z.bigint(),
  endHeight: z.bigint(),
  targetHeight: z.bigint(),
  initialPrice: z.bigint(),
  finalPrice: z.bigint(),
  totalStake: z.bigint(),
  resolved: z.boolean(),
  creator: storedAddress,
});

const PredictionRecordSchema = z.object({
  sentiment: storedSentiment,
  predictedPrice: z.bigint(),
  stakeAmount: z.bigint(),
  submittedAt: z.bigint(),
  rewarded: z.boolean(),
});

const AggregateRecordSchema = z.object({
  bearish: z.bigint(),
  neutral: z.bigint(),
  bullish: z.bigint(),
  totalPredictions: z.bigint(),
  weightedSentiment: z.bigint(),
});

const ReputationRecordSchema = z.object({
  totalPredictions: z.bigint(),
  correctPredictions: z.bigint(),
  totalEarnings: z.bigint(),
  reputationScore: z.bigint(),
});

export const MarketSnapshotSchema = z.object({
  rounds: z.array(z.tuple([z.string(), RoundRecordSchema])),
  predictions: z.array(z.tuple([z.string(), PredictionRecordSchema])),
  aggregates: z.array(z.tuple([z.string(), AggregateRecordSchema])),
  reputations: z.array(z.tuple([z.string(), ReputationRecordSchema])),
  counters: z.object({ totalRounds: z.bigint(), totalVolume: z.bigint() }),
  settings: z.object({
    owner: storedAddress,
    minStake: z.bigint(),
    protocolFeePercent: z.bigint(),
  }),
}) satisfies z.ZodType<MarketSnapshot, z.ZodTypeDef, unknown>;

export const LedgerSnapshotSchema = z.object({
  balances: z.array(z.tuple([z.string(), z.bigint().nonnegative()])),
}) satisfies z.ZodType<LedgerSnapshot, z.ZodTypeDef, unknown>;

export const PersistedStateSchema = z.object({
  market: MarketSnapshotSchema,
  ledger: LedgerSnapshotSchema.optional(),
}) satisfies z.ZodType<PersistedState, z.ZodTypeDef, unknown>;

/**
 * Validate a decoded state file before it is loaded into a store and ledger
 */
export function parsePersistedState(value: unknown): PersistedState {
  return PersistedStateSchema.parse(value);
}
