import { getConfig } from '../config/index.js';
import { SentimentMarket } from '../SentimentMarket.js';
import { startServer } from './server.js';

const config = getConfig();
const market = new SentimentMarket({ config });

startServer(market, config.apiPort).catch((error: unknown) => {
  console.error('❌ Failed to start API server:', error);
  process.exit(1);
});
