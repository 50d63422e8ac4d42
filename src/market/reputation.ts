/**
 * Reputation Ledger
 *
 * Per-identity running record of claimed predictions, correct calls and
 * net earnings. Purely cumulative: no decay, no ageing of old rounds.
 */

import type { Address } from 'viem';
import { MARKET_CONSTANTS } from '../config/market.js';
import { fail, ok, type Result } from './errors.js';
import type { MarketReader, MarketWriter } from './store.js';
import type { Reputation } from './types.js';

export function defaultReputation(): Reputation {
  return {
    totalPredictions: 0n,
    correctPredictions: 0n,
    totalEarnings: 0n,
    reputationScore: MARKET_CONSTANTS.DEFAULT_REPUTATION,
  };
}

/**
 * Fold one claimed prediction into a record
 */
export function applyOutcome(current: Reputation, isCorrect: boolean, netEarnings: bigint): Reputation {
  const totalPredictions = current.totalPredictions + 1n;
  const correctPredictions = current.correctPredictions + (isCorrect ? 1n : 0n);

  return {
    totalPredictions,
    correctPredictions,
    totalEarnings: current.totalEarnings + netEarnings,
    reputationScore: (correctPredictions * 100n) / totalPredictions,
  };
}

export class ReputationLedger {
  /**
   * Stored record, or NotFound for identities that never claimed
   */
  get(reader: MarketReader, identity: Address): Result<Reputation> {
    const record = reader.getReputation(identity);
    return record ? ok(record) : fail('NotFound', `no reputation for ${identity}`);
  }

  /**
   * Stored record, or the default record for identities without history
   */
  peek(reader: MarketReader, identity: Address): Reputation {
    return reader.getReputation(identity) ?? defaultReputation();
  }

  update(writer: MarketWriter, identity: Address, isCorrect: boolean, netEarnings: bigint): Reputation {
    const next = applyOutcome(this.peek(writer, identity), isCorrect, netEarnings);
    writer.putReputation(identity, next);
    return next;
  }
}
