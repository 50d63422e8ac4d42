/**
 * Walk one round through its whole lifecycle against the in-memory ledger
 * and a manual clock.
 */
import type { Address } from 'viem';
import { loadConfig, type Config } from '../src/config/index.js';
import { ManualBlockClock } from '../src/chain/clock.js';
import { InMemoryLedger } from '../src/ledger/escrow.js';
import { SENTIMENT } from '../src/market/types.js';
import { SentimentMarket } from '../src/SentimentMarket.js';
import { formatAmount, formatRoundSummary, toJsonSafe } from '../src/utils/formatting.js';

const OWNER: Address = '0x1111111111111111111111111111111111111111';
const ALICE: Address = '0xaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaa';
const BOB: Address = '0xbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbb';

async function main(): Promise<void> {
  const config: Config = { ...loadConfig({}), ownerAddress: OWNER, persistState: false };
  const clock = new ManualBlockClock(100n);
  const ledger = new InMemoryLedger();
  ledger.mint(ALICE, 10_000_000n);
  ledger.mint(BOB, 10_000_000n);

  const market = new SentimentMarket({ config, clock, ledger });
  console.log(`\n🧪 Demo round on ${config.network}\n`);

  const created = await market.createRound(OWNER, {
    assetId: 'ETH',
    durationBlocks: 10n,
    evaluationBlocks: 5n,
    initialPrice: 100n,
  });
  if (!created.ok) throw created.error;
  const key = { assetId: 'ETH', roundId: created.value };

  clock.advance(2n);
  const entries = [
    { who: ALICE, sentiment: SENTIMENT.BULLISH, predictedPrice: 120n, stakeAmount: 1_000_000n },
    { who: BOB, sentiment: SENTIMENT.BEARISH, predictedPrice: 90n, stakeAmount: 2_000_000n },
  ];
  for (const entry of entries) {
    const submitted = await market.submitPrediction(entry.who, { ...key, ...entry });
    if (!submitted.ok) throw submitted.error;
  }

  clock.setHeight(115n);
  const resolved = await market.resolveRound(OWNER, { ...key, finalPrice: 130n });
  if (!resolved.ok) throw resolved.error;
  console.log(`  ${formatRoundSummary(key, resolved.value)}`);

  for (const who of [ALICE, BOB]) {
    const claim = await market.claimReward(who, key);
    if (!claim.ok) {
      console.log(`  ${who}: ${claim.error.message}`);
      continue;
    }
    console.log(`  ${who} received ${formatAmount(await ledger.balanceOf(who), 6, 'USDC')} in total`);
    const reputation = market.getReputation(who);
    if (reputation.ok) {
      console.log('  Reputation:', toJsonSafe(reputation.value));
    }
  }

  console.log('\n📊 Stats:', toJsonSafe(market.getMarketStats()));
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
