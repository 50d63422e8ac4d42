/**
 * Reputation Ledger Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ok } from '../errors.js';
import { ReputationLedger, applyOutcome, defaultReputation } from '../reputation.js';
import { StateStore } from '../store.js';

const USER = '0xabcdef1234567890abcdef1234567890abcdef12';

describe('Reputation Ledger', () => {
  let store: StateStore;
  let ledger: ReputationLedger;

  beforeEach(() => {
    store = new StateStore();
    ledger = new ReputationLedger();
  });

  describe('Score calculation', () => {
    it('should default to a neutral 50 without history', () => {
      expect(defaultReputation()).toEqual({
        totalPredictions: 0n,
        correctPredictions: 0n,
        totalEarnings: 0n,
        reputationScore: 50n,
      });
    });

    it('should accumulate outcomes and floor the score', () => {
      let record = applyOutcome(defaultReputation(), true, 921_120n);
      expect(record).toEqual({
        totalPredictions: 1n,
        correctPredictions: 1n,
        totalEarnings: 921_120n,
        reputationScore: 100n,
      });

      record = applyOutcome(record, false, 0n);
      expect(record.reputationScore).toBe(50n);

      record = applyOutcome(record, false, 10n);
      expect(record.totalPredictions).toBe(3n);
      expect(record.correctPredictions).toBe(1n);
      expect(record.totalEarnings).toBe(921_130n);
      expect(record.reputationScore).toBe(33n);
    });
  });

  describe('Stored records', () => {
    it('should report NotFound for identities that never claimed', () => {
      const result = ledger.get(store, USER);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe('NotFound');
      }
      expect(ledger.peek(store, USER).reputationScore).toBe(50n);
    });

    it('should persist updates made inside a transaction', async () => {
      await store.transaction((tx) => ok(ledger.update(tx, USER, true, 500n)));
      await store.transaction((tx) => ok(ledger.update(tx, USER, false, 100n)));

      expect(ledger.get(store, USER)).toEqual(
        ok({
          totalPredictions: 2n,
          correctPredictions: 1n,
          totalEarnings: 600n,
          reputationScore: 50n,
        })
      );
    });

    it('should key identities case-insensitively', async () => {
      await store.transaction((tx) => ok(ledger.update(tx, USER, true, 1n)));
      const upper = '0xABCDEF1234567890ABCDEF1234567890ABCDEF12';
      expect(ledger.peek(store, upper).totalPredictions).toBe(1n);
    });
  });
});
