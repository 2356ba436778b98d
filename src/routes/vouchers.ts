import type { Router } from 'express';
import express from 'express';
import { createRateLimiter } from '../middleware/rate-limit';
import type { VoucherContext } from '../services/context';
import { createVoucherInvoice } from '../services/voucher-creation-service';
import { getCreationStatus, getVoucherInfo } from '../services/voucher-status-service';

export interface VouchersRouterOptions {
  invoiceRateLimitPerMinute: number;
}

export const createVouchersRouter = (ctx: VoucherContext, options: VouchersRouterOptions): Router => {
  const router = express.Router();
  const rateLimit = createRateLimiter({ windowMs: 60_000, max: options.invoiceRateLimitPerMinute });

  router.use(express.json());

  router.post('/invoice', rateLimit, async (req, res, next) => {
    try {
      const { lightning_address, count, expiry_seconds } = req.body ?? {};
      const invoice = await createVoucherInvoice(ctx, {
        lightningAddress: lightning_address,
        count,
        expirySeconds: expiry_seconds,
      });
      res.json(invoice);
    } catch (error) {
      next(error);
    }
  });

  router.get('/status/:paymentHash', async (req, res, next) => {
    try {
      const status = await getCreationStatus(ctx, req.params.paymentHash, req.query.include_qr === 'true');
      res.json(status);
    } catch (error) {
      next(error);
    }
  });

  router.get('/info', (req, res, next) => {
    try {
      res.json(getVoucherInfo(ctx, req.query.lightning));
    } catch (error) {
      next(error);
    }
  });

  return router;
};
