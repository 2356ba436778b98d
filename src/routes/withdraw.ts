import type { Router } from 'express';
import express from 'express';
import type { VoucherContext } from '../services/context';
import { getWithdrawMetadata, handleWithdrawCallback } from '../services/withdrawal-service';

/** LNURL-Withdraw endpoints. Failures are answered with HTTP 200 and an ERROR body. */
export const createWithdrawRouter = (ctx: VoucherContext): Router => {
  const router = express.Router();

  router.get('/:withdrawId', (req, res) => {
    res.json(getWithdrawMetadata(ctx, req.params.withdrawId));
  });

  router.get('/:withdrawId/callback', async (req, res, next) => {
    try {
      res.json(await handleWithdrawCallback(ctx, req.params.withdrawId, req.query.k1, req.query.pr));
    } catch (error) {
      next(error);
    }
  });

  return router;
};
