import { formatUnits } from 'viem';
import { dominantSentiment } from '../market/aggregate.js';
import type { ClaimResult, Round, RoundKey, Sentiment, SentimentAggregate, SentimentLabel } from '../market/types.js';

/**
 * Bigints rendered as decimal strings, recursively
 */
export type JsonSafe<T> = T extends bigint
  ? string
  : T extends Array<infer U>
    ? Array<JsonSafe<U>>
    : T extends object
      ? { [K in keyof T]: JsonSafe<T[K]> }
      : T;

export function toJsonSafe<T>(value: T): JsonSafe<T>;
export function toJsonSafe(value: unknown): unknown {
  if (typeof value === 'bigint') return value.toString();
  if (Array.isArray(value)) return value.map((item) => toJsonSafe(item));
  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(Object.entries(value).map(([key, item]) => [key, toJsonSafe(item)]));
  }
  return value;
}

const SENTIMENT_LABELS: Record<Sentiment, SentimentLabel> = {
  1: 'bearish',
  2: 'neutral',
  3: 'bullish',
};

export function sentimentLabel(sentiment: Sentiment): SentimentLabel {
  return SENTIMENT_LABELS[sentiment];
}

export function getSentimentEmoji(sentiment: Sentiment): string {
  switch (sentiment) {
    case 1:
      return '🐻';
    case 2:
      return '⚖️';
    case 3:
      return '🐂';
  }
}

/**
 * Formats a base-unit amount with the given number of decimals
 */
export function formatAmount(amount: bigint, decimals: number = 6, symbol: string = ''): string {
  const value = formatUnits(amount, decimals);
  return symbol ? `${value} ${symbol}` : value;
}

export function formatRoundKey(key: RoundKey): string {
  return `${key.assetId}#${key.roundId}`;
}

export function formatRoundSummary(key: RoundKey, round: Round): string {
  const status = round.resolved ? `resolved @ ${round.finalPrice}` : `open until ${round.endHeight}`;
  return `${formatRoundKey(key)} | start ${round.initialPrice} | ${status} | pool ${round.totalStake}`;
}

export function formatCrowdSentiment(aggregate: SentimentAggregate): string {
  const counts = `🐻 ${aggregate.bearish} ⚖️ ${aggregate.neutral} 🐂 ${aggregate.bullish}`;
  const leaning = dominantSentiment(aggregate) ?? 'split';
  return `${counts} (index ${aggregate.weightedSentiment}, ${leaning})`;
}

export function formatClaim(result: ClaimResult): string {
  const mark = result.isCorrect ? '✅' : '❌';
  return `${mark} accuracy ${result.accuracyScore}/100, paid ${result.rewardAmount} (fee ${result.protocolFee})`;
}
