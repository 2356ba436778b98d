import type { Router } from 'express';
import express from 'express';
import type { VoucherContext } from '../services/context';
import { getPayMetadata, handlePayCallback } from '../services/funding-service';

/** LNURL-Pay endpoints. Failures are answered with HTTP 200 and an ERROR body. */
export const createPayRouter = (ctx: VoucherContext): Router => {
  const router = express.Router();

  router.get('/:payId', (req, res) => {
    res.json(getPayMetadata(ctx, req.params.payId));
  });

  router.get('/:payId/callback', async (req, res, next) => {
    try {
      res.json(await handlePayCallback(ctx, req.params.payId, req.query.amount));
    } catch (error) {
      next(error);
    }
  });

  return router;
};
