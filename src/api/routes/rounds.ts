import { Router, type Request, type Response } from 'express';
import type { SentimentMarket } from '../../SentimentMarket.js';
import { toJsonSafe } from '../../utils/formatting.js';
import {
  CreateRoundSchema,
  ResolveRoundSchema,
  SubmitPredictionSchema,
  addressSchema,
} from '../../utils/validation.js';
import { asyncHandler, parseOr400, parseRoundParams, requireCaller, sendError, sendResult } from '../http.js';

export function createRoundRoutes(market: SentimentMarket): Router {
  const router = Router();

  router.post(
    '/rounds',
    asyncHandler(async (req: Request, res: Response) => {
      const caller = requireCaller(req, res);
      if (!caller) return;
      const body = parseOr400(res, CreateRoundSchema, req.body);
      if (!body) return;

      const result = await market.createRound(caller, body);
      if (!result.ok) {
        sendError(res, result.error);
        return;
      }
      res.status(201).json({ assetId: body.assetId, roundId: result.value.toString() });
    })
  );

  router.get(
    '/rounds/:assetId/:roundId',
    asyncHandler(async (req: Request, res: Response) => {
      const key = parseRoundParams(req, res);
      if (!key) return;

      const round = market.getRound(key);
      if (!round.ok) {
        sendError(res, round.error);
        return;
      }
      const phase = await market.getRoundPhase(key);
      res.json({
        ...toJsonSafe(round.value),
        phase: phase.ok ? phase.value : null,
      });
    })
  );

  router.get(
    '/rounds/:assetId/:roundId/sentiment',
    asyncHandler(async (req: Request, res: Response) => {
      const key = parseRoundParams(req, res);
      if (!key) return;
      sendResult(res, market.getSentiment(key));
    })
  );

  router.get(
    '/rounds/:assetId/:roundId/predictions/:address',
    asyncHandler(async (req: Request, res: Response) => {
      const key = parseRoundParams(req, res);
      if (!key) return;
      const predictor = parseOr400(res, addressSchema, req.params.address);
      if (!predictor) return;
      sendResult(res, market.getPrediction(key, predictor));
    })
  );

  router.post(
    '/rounds/:assetId/:roundId/predictions',
    asyncHandler(async (req: Request, res: Response) => {
      const caller = requireCaller(req, res);
      if (!caller) return;
      const key = parseRoundParams(req, res);
      if (!key) return;
      const body = parseOr400(res, SubmitPredictionSchema, req.body);
      if (!body) return;

      sendResult(res, await market.submitPrediction(caller, { ...key, ...body }), 201);
    })
  );

  router.post(
    '/rounds/:assetId/:roundId/resolve',
    asyncHandler(async (req: Request, res: Response) => {
      const caller = requireCaller(req, res);
      if (!caller) return;
      const key = parseRoundParams(req, res);
      if (!key) return;
      const body = parseOr400(res, ResolveRoundSchema, req.body);
      if (!body) return;

      sendResult(res, await market.resolveRound(caller, { ...key, ...body }));
    })
  );

  router.post(
    '/rounds/:assetId/:roundId/claim',
    asyncHandler(async (req: Request, res: Response) => {
      const caller = requireCaller(req, res);
      if (!caller) return;
      const key = parseRoundParams(req, res);
      if (!key) return;

      sendResult(res, await market.claimReward(caller, key));
    })
  );

  router.get(
    '/rounds/:assetId/:roundId/preview',
    asyncHandler(async (req: Request, res: Response) => {
      const key = parseRoundParams(req, res);
      if (!key) return;
      const query = parseOr400(res, SubmitPredictionSchema.pick({ sentiment: true, predictedPrice: true }), req.query);
      if (!query) return;

      sendResult(res, market.previewAccuracy(key, query.sentiment, query.predictedPrice));
    })
  );

  return router;
}
