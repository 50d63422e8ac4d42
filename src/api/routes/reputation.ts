import { Router, type Request, type Response } from 'express';
import type { SentimentMarket } from '../../SentimentMarket.js';
import { addressSchema } from '../../utils/validation.js';
import { asyncHandler, parseOr400, sendResult } from '../http.js';

export function createReputationRoutes(market: SentimentMarket): Router {
  const router = Router();

  router.get(
    '/reputation/:address',
    asyncHandler(async (req: Request, res: Response) => {
      const identity = parseOr400(res, addressSchema, req.params.address);
      if (!identity) return;
      sendResult(res, market.getReputation(identity));
    })
  );

  return router;
}
