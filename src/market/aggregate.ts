import { SENTIMENT, type Sentiment, type SentimentAggregate, type SentimentLabel } from './types.js';

export function emptyAggregate(): SentimentAggregate {
  return {
    bearish: 0n,
    neutral: 0n,
    bullish: 0n,
    totalPredictions: 0n,
    weightedSentiment: 0n,
  };
}

/**
 * Fold one accepted submission into the round's crowd sentiment.
 *
 * The weighted value is a streaming average that truncates on every step;
 * the recurrence must stay exactly this for replayed rounds to agree.
 */
export function accumulateSentiment(current: SentimentAggregate, sentiment: Sentiment): SentimentAggregate {
  const total = current.totalPredictions + 1n;
  const weightedSentiment =
    (current.weightedSentiment * current.totalPredictions + BigInt(sentiment)) / total;

  return {
    bearish: current.bearish + (sentiment === SENTIMENT.BEARISH ? 1n : 0n),
    neutral: current.neutral + (sentiment === SENTIMENT.NEUTRAL ? 1n : 0n),
    bullish: current.bullish + (sentiment === SENTIMENT.BULLISH ? 1n : 0n),
    totalPredictions: total,
    weightedSentiment,
  };
}

/**
 * Label of the dominant sentiment, or null when there are no entries or a tie
 */
export function dominantSentiment(aggregate: SentimentAggregate): SentimentLabel | null {
  const counts = [
    ['bearish', aggregate.bearish],
    ['neutral', aggregate.neutral],
    ['bullish', aggregate.bullish],
  ] as const;

  let best: (typeof counts)[number] | null = null;
  let tied = false;
  for (const entry of counts) {
    if (best === null || entry[1] > best[1]) {
      best = entry;
      tied = false;
    } else if (entry[1] === best[1]) {
      tied = true;
    }
  }

  if (best === null || best[1] === 0n || tied) return null;
  return best[0];
}
