import { Router, type Request, type Response } from 'express';
import type { SentimentMarket } from '../../SentimentMarket.js';
import { toJsonSafe } from '../../utils/formatting.js';
import { MinStakeSchema, ProtocolFeeSchema } from '../../utils/validation.js';
import { asyncHandler, parseOr400, requireCaller, sendResult } from '../http.js';

export function createAdminRoutes(market: SentimentMarket): Router {
  const router = Router();

  router.get('/stats', (_req: Request, res: Response) => {
    res.json(toJsonSafe(market.getMarketStats()));
  });

  router.put(
    '/admin/min-stake',
    asyncHandler(async (req: Request, res: Response) => {
      const caller = requireCaller(req, res);
      if (!caller) return;
      const body = parseOr400(res, MinStakeSchema, req.body);
      if (!body) return;

      sendResult(res, await market.setMinStake(caller, body.amount));
    })
  );

  router.put(
    '/admin/protocol-fee',
    asyncHandler(async (req: Request, res: Response) => {
      const caller = requireCaller(req, res);
      if (!caller) return;
      const body = parseOr400(res, ProtocolFeeSchema, req.body);
      if (!body) return;

      sendResult(res, await market.setProtocolFee(caller, body.percent));
    })
  );

  return router;
}
