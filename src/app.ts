import express from 'express';
import cors from 'cors';
import { ServiceError, httpStatusFor } from './errors';
import { createMetaRouter } from './routes/meta';
import { createPayRouter } from './routes/pay';
import { createVouchersRouter } from './routes/vouchers';
import { createWithdrawRouter } from './routes/withdraw';
import type { VoucherContext } from './services/context';
import { logger } from './logger';

export interface AppOptions {
  sandbox: boolean;
  invoiceRateLimitPerMinute: number;
}

/** Status of a request body the JSON parser refused, such as malformed JSON or an oversized payload. */
const clientErrorStatus = (err: Error) => {
  if ('status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
    return err.status;
  }
  return null;
};

export const createApp = (ctx: VoucherContext, options: AppOptions) => {
  const app = express();

  app.use(cors());

  app.use('/api/vouchers', createVouchersRouter(ctx, options));
  app.use('/api/meta', createMetaRouter({ sandbox: options.sandbox, settings: ctx.settings }));
  app.use('/pay', createPayRouter(ctx));
  app.use('/withdraw', createWithdrawRouter(ctx));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', time: new Date().toISOString() });
  });

  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (err instanceof ServiceError && err.kind !== 'storage') {
      const status = httpStatusFor[err.kind];
      if (status >= 500) {
        logger.error('Request failed', { code: err.code, message: err.message });
      }
      res.status(status).json({ error: err.code, message: err.message });
      return;
    }
    const clientStatus = clientErrorStatus(err);
    if (clientStatus !== null) {
      const message = 'type' in err && err.type === 'entity.parse.failed' ? 'invalid JSON' : err.message;
      res.status(clientStatus).json({ error: 'INVALID_REQUEST', message });
      return;
    }
    logger.error('Unhandled error', { message: err.message });
    res.status(500).json({ error: 'INTERNAL_SERVER_ERROR' });
  });

  return app;
};
