/**
 * Sentiment Rounds API Server
 *
 * HTTP API over the round lifecycle. Callers identify themselves with the
 * x-caller-address header; authenticating that header is left to the
 * gateway in front of this server.
 */

import express, { type Application, type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import type { Server } from 'http';
import { isMarketError } from '../market/errors.js';
import type { SentimentMarket } from '../SentimentMarket.js';
import { sendError } from './http.js';
import { createAdminRoutes } from './routes/admin.js';
import { createReputationRoutes } from './routes/reputation.js';
import { createRoundRoutes } from './routes/rounds.js';

export function createApp(market: SentimentMarket): Application {
  const app: Application = express();
  app.use(cors());
  app.use(express.json());

  // ============ Health & Status ============

  app.get('/health', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const height = await market.getBlockHeight();
      res.json({
        status: 'ok',
        ...market.getInfo(),
        blockHeight: height.toString(),
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      next(error);
    }
  });

  app.use(createRoundRoutes(market));
  app.use(createReputationRoutes(market));
  app.use(createAdminRoutes(market));

  // ============ Error Handling ============

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'NotFound', message: 'Unknown endpoint' });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    // express.json() reports malformed bodies as 400s
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: 'ValidationError', message: 'Malformed JSON body' });
      return;
    }
    if (isMarketError(err)) {
      sendError(res, err);
      return;
    }
    console.error('API Error:', err);
    res.status(500).json({
      error: 'Internal server error',
      message: err instanceof Error ? err.message : String(err),
    });
  });

  return app;
}

// ============ Start Server ============

export function startServer(market: SentimentMarket, port: number): Promise<Server> {
  const app = createApp(market);

  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => {
      const info = market.getInfo();
      console.log(`
🎯 ═══════════════════════════════════════════════════════
   Sentiment Rounds API Server Running

   URL: http://localhost:${port}
   Network: ${info.network} (${info.clockMode} clock)

   Rounds:
   POST /rounds                               - Create round
   POST /rounds/:asset/:id/predictions        - Submit prediction
   POST /rounds/:asset/:id/resolve            - Resolve round
   POST /rounds/:asset/:id/claim              - Claim reward
   GET  /rounds/:asset/:id                    - Round + phase
   GET  /rounds/:asset/:id/sentiment          - Crowd sentiment
   GET  /reputation/:address                  - Reputation
   GET  /stats                                - Market stats
═══════════════════════════════════════════════════════ 🎯
      `);
      resolve(server);
    });
    server.on('error', reject);
  });
}
