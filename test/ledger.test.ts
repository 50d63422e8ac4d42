import { describe, it, expect } from 'vitest';
import express from 'express';
import type { Server } from 'http';
import { ChainBlockClock, ManualBlockClock } from '../src/chain/clock.js';
import { loadConfig } from '../src/config/index.js';
import { SentimentMarket } from '../src/SentimentMarket.js';
import { InMemoryLedger } from '../src/ledger/escrow.js';
import { createFailingPublicClient, createMockPublicClient } from '../tests/mocks/provider.js';

const ALICE = '0xaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaa';
const BOB = '0xbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbb';

describe('InMemoryLedger', () => {
  it('should move funds between accounts and record the transfer', async () => {
    const ledger = new InMemoryLedger({ [ALICE]: 500n });

    const result = await ledger.transfer(ALICE, BOB, 200n);

    expect(result).toEqual({ success: true });
    expect(await ledger.balanceOf(ALICE)).toBe(300n);
    expect(await ledger.balanceOf(BOB)).toBe(200n);
    expect(ledger.getHistory()).toEqual([{ from: ALICE, to: BOB, amount: 200n }]);
  });

  it('should treat account casing as the same account', async () => {
    const ledger = new InMemoryLedger();
    ledger.mint('0xAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAA', 10n);

    expect(await ledger.balanceOf(ALICE)).toBe(10n);
  });

  it('should refuse overdrafts without changing balances', async () => {
    const ledger = new InMemoryLedger({ [ALICE]: 100n });

    const result = await ledger.transfer(ALICE, BOB, 101n);

    expect(result).toEqual({ success: false, error: 'Insufficient balance: have 100, need 101' });
    expect(await ledger.balanceOf(ALICE)).toBe(100n);
    expect(ledger.getHistory()).toEqual([]);
  });

  it('should refuse zero amounts and self transfers', async () => {
    const ledger = new InMemoryLedger({ [ALICE]: 100n });

    expect((await ledger.transfer(ALICE, BOB, 0n)).success).toBe(false);
    expect((await ledger.transfer(ALICE, ALICE, 1n)).success).toBe(false);
  });

  it('should rebuild balances from a snapshot', async () => {
    const ledger = new InMemoryLedger({ [BOB]: 40n, [ALICE]: 60n });
    await ledger.transfer(BOB, ALICE, 40n);

    const snapshot = ledger.toSnapshot();
    expect(snapshot).toEqual({ balances: [[ALICE, 100n]] });

    const restored = InMemoryLedger.fromSnapshot(snapshot);
    expect(await restored.balanceOf(ALICE)).toBe(100n);
    expect(await restored.balanceOf(BOB)).toBe(0n);
    expect(restored.getHistory()).toEqual([]);
  });

  it('should reject negative mints', () => {
    const ledger = new InMemoryLedger();
    expect(() => ledger.mint(ALICE, -1n)).toThrow(RangeError);
  });
});

describe('ManualBlockClock', () => {
  it('should only move forward', async () => {
    const clock = new ManualBlockClock(10n);

    expect(clock.advance()).toBe(11n);
    expect(clock.advance(4n)).toBe(15n);
    clock.setHeight(20n);
    expect(await clock.getBlockHeight()).toBe(20n);

    expect(() => clock.setHeight(19n)).toThrow(RangeError);
    expect(() => clock.advance(-1n)).toThrow(RangeError);
  });
});

describe('ChainBlockClock', () => {
  it('should read an uncached block number from the client', async () => {
    const client = createMockPublicClient(5_000n);
    const clock = new ChainBlockClock(client);

    expect(await clock.getBlockHeight()).toBe(5_000n);
    client.mine(3n);
    expect(await clock.getBlockHeight()).toBe(5_003n);
    expect(client.getBlockNumber).toHaveBeenCalledWith({ cacheTime: 0 });
  });

  it('should surface RPC failures', async () => {
    const clock = new ChainBlockClock(createFailingPublicClient('rpc down'));

    await expect(clock.getBlockHeight()).rejects.toThrow('rpc down');
  });
});

describe('SentimentMarket chain clock', () => {
  it('should follow the RPC endpoint named in its own configuration', async () => {
    // In-process JSON-RPC node answering eth_blockNumber
    const methods: string[] = [];
    const rpc = express();
    rpc.use(express.json());
    rpc.post('/', (req, res) => {
      methods.push(String(req.body.method));
      res.json({ jsonrpc: '2.0', id: req.body.id, result: '0x2a' });
    });
    const server = await new Promise<Server>((resolve) => {
      const listening = rpc.listen(0, () => resolve(listening));
    });
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('rpc stand-in is not listening on a TCP port');
    }

    try {
      const market = new SentimentMarket({
        config: {
          ...loadConfig({}),
          clockMode: 'chain',
          baseSepoliaRpc: `http://127.0.0.1:${address.port}/`,
          persistState: false,
        },
        quiet: true,
      });

      expect(await market.getBlockHeight()).toBe(42n);
      expect(methods).toEqual(['eth_blockNumber']);
      expect(market.getInfo().clockMode).toBe('chain');
    } finally {
      await new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      });
    }
  });
});
