import type { Address } from 'viem';
import { ManualBlockClock } from '../../src/chain/clock.js';
import { InMemoryLedger } from '../../src/ledger/escrow.js';
import { RoundController } from '../../src/market/rounds.js';
import { StateStore } from '../../src/market/store.js';

/**
 * Test fixtures for round lifecycle testing
 */

export const ADDRESSES = {
  owner: '0x1111111111111111111111111111111111111111',
  creator: '0x2222222222222222222222222222222222222222',
  alice: '0xaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaa',
  bob: '0xbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbb',
  carol: '0xcccccccccccccccccccccccccccccccccccccccc',
  dave: '0xdddddddddddddddddddddddddddddddddddddddd',
} as const satisfies Record<string, Address>;

export const START_HEIGHT = 1000n;
export const STARTING_BALANCE = 10_000_000n;
export const MIN_STAKE = 1_000_000n;

export interface Harness {
  store: StateStore;
  ledger: InMemoryLedger;
  clock: ManualBlockClock;
  controller: RoundController;
}

/**
 * Controller over a fresh store, a funded in-memory ledger (dave is left
 * unfunded) and a manual clock at START_HEIGHT
 */
export function createHarness(overrides: { minStake?: bigint; protocolFeePercent?: bigint } = {}): Harness {
  const store = new StateStore({
    owner: ADDRESSES.owner,
    minStake: overrides.minStake ?? MIN_STAKE,
    protocolFeePercent: overrides.protocolFeePercent ?? 5n,
  });
  const ledger = new InMemoryLedger();
  for (const who of [ADDRESSES.alice, ADDRESSES.bob, ADDRESSES.carol, ADDRESSES.creator]) {
    ledger.mint(who, STARTING_BALANCE);
  }
  const clock = new ManualBlockClock(START_HEIGHT);
  const controller = new RoundController({ store, ledger, clock });

  return { store, ledger, clock, controller };
}

/**
 * The reference round: initial price 100, 10 blocks of submissions,
 * 5 more until resolvable
 */
export async function createReferenceRound(harness: Harness, assetId: string = 'ETH'): Promise<{ assetId: string; roundId: bigint }> {
  const result = await harness.controller.createRound(ADDRESSES.creator, {
    assetId,
    durationBlocks: 10n,
    evaluationBlocks: 5n,
    initialPrice: 100n,
  });
  if (!result.ok) throw result.error;
  return { assetId, roundId: result.value };
}
