import type { Router } from 'express';
import express from 'express';
import type { VoucherSettings } from '../config';
import { satsToMsats } from '../utils';

export const createMetaRouter = (options: { sandbox: boolean; settings: VoucherSettings }): Router => {
  const router = express.Router();
  const { settings } = options;
  router.get('/', (_req, res) => {
    res.json({
      sandbox: options.sandbox,
      limits: {
        feePerVoucherSats: settings.feePerVoucherSats,
        fundingFeeMinMsats: settings.fundingFeeMinMsats,
        fundingFeePercent: settings.fundingFeePercent,
        maxVouchersPerRequest: settings.maxVouchersPerRequest,
        minSendableMsats: satsToMsats(settings.minPayAmountSats),
        maxSendableMsats: satsToMsats(settings.maxPayAmountSats),
        absoluteExpirySeconds: settings.absoluteExpirySeconds,
        defaultRelativeExpirySeconds: settings.defaultRelativeExpirySeconds,
      },
    });
  });
  return router;
};
