import { afterAll, beforeAll, describe, it, expect } from 'vitest';
import type { Server } from 'http';
import { createApp } from '../src/api/server.js';
import { SentimentMarket } from '../src/SentimentMarket.js';
import { loadConfig } from '../src/config/index.js';
import { ManualBlockClock } from '../src/chain/clock.js';
import { InMemoryLedger } from '../src/ledger/escrow.js';
import { ADDRESSES } from '../tests/fixtures/rounds.js';

const { owner, creator, alice, bob } = ADDRESSES;

interface ApiResponse {
  status: number;
  body: unknown;
}

async function listen(market: SentimentMarket): Promise<{ server: Server; baseUrl: string }> {
  const server = await new Promise<Server>((resolve) => {
    const listening = createApp(market).listen(0, () => resolve(listening));
  });
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('server is not listening on a TCP port');
  }
  return { server, baseUrl: `http://127.0.0.1:${address.port}` };
}

function close(server: Server): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

async function request(
  baseUrl: string,
  method: string,
  path: string,
  options: { caller?: string; body?: unknown } = {}
): Promise<ApiResponse> {
  const headers: Record<string, string> = { 'content-type': 'application/json' };
  if (options.caller) headers['x-caller-address'] = options.caller;
  const response = await fetch(`${baseUrl}${path}`, {
    method,
    headers,
    body: options.body === undefined ? undefined : JSON.stringify(options.body),
  });
  return { status: response.status, body: await response.json() };
}

describe('Sentiment Rounds API', () => {
  const clock = new ManualBlockClock(1000n);
  const ledger = new InMemoryLedger({ [alice]: 10_000_000n, [creator]: 10_000_000n });
  const market = new SentimentMarket({
    config: { ...loadConfig({}), ownerAddress: owner, persistState: false },
    clock,
    ledger,
    quiet: true,
  });
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    ({ server, baseUrl } = await listen(market));
  });

  afterAll(() => close(server));

  function call(method: string, path: string, options: { caller?: string; body?: unknown } = {}): Promise<ApiResponse> {
    return request(baseUrl, method, path, options);
  }

  it('should report health with the current block height', async () => {
    const { status, body } = await call('GET', '/health');

    expect(status).toBe(200);
    expect(body).toMatchObject({
      status: 'ok',
      network: 'base-sepolia',
      clockMode: 'manual',
      persistState: false,
      blockHeight: '1000',
    });
  });

  it('should require a caller identity for state changes', async () => {
    const { status, body } = await call('POST', '/rounds', {
      body: { assetId: 'ETH', durationBlocks: 10, evaluationBlocks: 5, initialPrice: 100 },
    });

    expect(status).toBe(401);
    expect(body).toMatchObject({ error: 'Unauthorized' });
  });

  it('should reject malformed request bodies', async () => {
    const { status, body } = await call('POST', '/rounds', {
      caller: creator,
      body: { assetId: 'ETH', durationBlocks: '-1', evaluationBlocks: 5, initialPrice: 100 },
    });

    expect(status).toBe(400);
    expect(body).toEqual({
      error: 'ValidationError',
      message: 'Invalid request',
      details: ['durationBlocks: Must be an unsigned integer'],
    });
  });

  it('should answer unparseable JSON with 400', async () => {
    const response = await fetch(`${baseUrl}/rounds`, {
      method: 'POST',
      headers: { 'content-type': 'application/json', 'x-caller-address': creator },
      body: '{"assetId":',
    });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: 'ValidationError', message: 'Malformed JSON body' });
  });

  it('should map market errors to status codes', async () => {
    const { status, body } = await call('POST', '/rounds', {
      caller: creator,
      body: { assetId: 'ETH', durationBlocks: '0', evaluationBlocks: '5', initialPrice: '100' },
    });

    expect(status).toBe(400);
    expect(body).toEqual({
      error: 'InvalidTimeframe',
      code: 108,
      message: 'Durations and prices must be positive',
    });
  });

  describe('Round lifecycle', () => {
    it('should create a round', async () => {
      const { status, body } = await call('POST', '/rounds', {
        caller: creator,
        body: { assetId: 'ETH', durationBlocks: '10', evaluationBlocks: 5, initialPrice: '100' },
      });

      expect(status).toBe(201);
      expect(body).toEqual({ assetId: 'ETH', roundId: '1' });
    });

    it('should expose the round with its phase', async () => {
      const { status, body } = await call('GET', '/rounds/ETH/1');

      expect(status).toBe(200);
      expect(body).toEqual({
        startHeight: '1000',
        endHeight: '1010',
        targetHeight: '1015',
        initialPrice: '100',
        finalPrice: '0',
        totalStake: '0',
        resolved: false,
        creator,
        phase: 'open',
      });
    });

    it('should accept a prediction', async () => {
      const { status, body } = await call('POST', '/rounds/ETH/1/predictions', {
        caller: alice,
        body: { sentiment: 3, predictedPrice: '120', stakeAmount: '1000000' },
      });

      expect(status).toBe(201);
      expect(body).toEqual({
        sentiment: 3,
        predictedPrice: '120',
        stakeAmount: '1000000',
        submittedAt: '1000',
        rewarded: false,
      });
    });

    it('should reject a second prediction from the same caller', async () => {
      const { status, body } = await call('POST', '/rounds/ETH/1/predictions', {
        caller: alice,
        body: { sentiment: 1, predictedPrice: '80', stakeAmount: '1000000' },
      });

      expect(status).toBe(409);
      expect(body).toMatchObject({ error: 'AlreadyPredicted', code: 102 });
    });

    it('should report the crowd sentiment', async () => {
      const { body } = await call('GET', '/rounds/ETH/1/sentiment');

      expect(body).toEqual({
        bearish: '0',
        neutral: '0',
        bullish: '1',
        totalPredictions: '1',
        weightedSentiment: '3',
      });
    });

    it('should only let the owner or creator resolve', async () => {
      clock.setHeight(1015n);
      const { status, body } = await call('POST', '/rounds/ETH/1/resolve', {
        caller: alice,
        body: { finalPrice: '130' },
      });

      expect(status).toBe(403);
      expect(body).toMatchObject({ error: 'OwnerOnly', code: 100 });
    });

    it('should resolve the round', async () => {
      const { status, body } = await call('POST', '/rounds/ETH/1/resolve', {
        caller: creator,
        body: { finalPrice: '130' },
      });

      expect(status).toBe(200);
      expect(body).toMatchObject({ resolved: true, finalPrice: '130', totalStake: '1000000' });
    });

    it('should preview the score of a hypothetical entry', async () => {
      const { status, body } = await call('GET', '/rounds/ETH/1/preview?sentiment=3&predictedPrice=120');

      expect(status).toBe(200);
      expect(body).toEqual({ directionCorrect: true, priceAccuracy: '93', accuracy: '96' });
    });

    it('should pay out the claim net of the protocol fee', async () => {
      const { status, body } = await call('POST', '/rounds/ETH/1/claim', { caller: alice });

      expect(status).toBe(200);
      expect(body).toEqual({
        accuracyScore: '96',
        rewardAmount: '921120',
        protocolFee: '48480',
        isCorrect: true,
      });
      expect(await ledger.balanceOf(alice)).toBe(9_921_120n);
    });

    it('should expose the updated reputation', async () => {
      const { status, body } = await call('GET', `/reputation/${alice}`);

      expect(status).toBe(200);
      expect(body).toEqual({
        totalPredictions: '1',
        correctPredictions: '1',
        totalEarnings: '921120',
        reputationScore: '100',
      });
    });

    it('should return 404 for unknown rounds and endpoints', async () => {
      const missing = await call('GET', '/rounds/ETH/99');
      expect(missing.status).toBe(404);
      expect(missing.body).toMatchObject({ error: 'NotFound', code: 101 });

      const unknown = await call('GET', '/portfolio');
      expect(unknown.status).toBe(404);
      expect(unknown.body).toEqual({ error: 'NotFound', message: 'Unknown endpoint' });
    });
  });

  describe('Admin', () => {
    it('should report market stats', async () => {
      const { body } = await call('GET', '/stats');

      expect(body).toEqual({
        owner,
        minStake: '1000000',
        protocolFeePercent: '5',
        totalRounds: '1',
        totalVolume: '1000000',
      });
    });

    it('should validate and apply fee changes', async () => {
      const invalid = await call('PUT', '/admin/protocol-fee', { caller: owner, body: { percent: 101 } });
      expect(invalid.status).toBe(400);
      expect(invalid.body).toMatchObject({ error: 'InvalidFee', code: 109 });

      const forbidden = await call('PUT', '/admin/protocol-fee', { caller: alice, body: { percent: 1 } });
      expect(forbidden.status).toBe(403);

      const applied = await call('PUT', '/admin/protocol-fee', { caller: owner, body: { percent: 2 } });
      expect(applied.status).toBe(200);
      expect(applied.body).toBe('2');
    });
  });
});

describe('Sentiment Rounds API with configured balances', () => {
  const clock = new ManualBlockClock(50n);
  // No ledger is injected: stakes are held by the ledger funded from config
  const market = new SentimentMarket({
    config: {
      ...loadConfig({ INITIAL_BALANCES: `${alice}:3000000, ${bob}:1000000` }),
      ownerAddress: owner,
      persistState: false,
    },
    clock,
    quiet: true,
  });
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    ({ server, baseUrl } = await listen(market));
  });

  afterAll(() => close(server));

  it('should accept stakes from funded accounts only', async () => {
    const created = await request(baseUrl, 'POST', '/rounds', {
      caller: owner,
      body: { assetId: 'SOL', durationBlocks: 5, evaluationBlocks: 5, initialPrice: '150' },
    });
    expect(created.status).toBe(201);

    const entry = { sentiment: 3, predictedPrice: '160', stakeAmount: '1000000' };
    const accepted = await request(baseUrl, 'POST', '/rounds/SOL/1/predictions', { caller: alice, body: entry });
    expect(accepted.status).toBe(201);
    expect(await market.getLedger().balanceOf(alice)).toBe(2_000_000n);

    const unfunded = await request(baseUrl, 'POST', '/rounds/SOL/1/predictions', {
      caller: creator,
      body: entry,
    });
    expect(unfunded.status).toBe(402);
    expect(unfunded.body).toMatchObject({ error: 'TransferFailed', code: 110 });
  });
});
