import { config } from './config';
import { createApp } from './app';
import { logger, errorMessage } from './logger';
import { closeDatabase, getDatabase } from './db';
import { createGateway } from './payments';
import { systemClock, type VoucherContext } from './services/context';
import { RefundJob } from './services/refund-service';
import { BackgroundTasks } from './tasks/background-tasks';

const ctx: VoucherContext = {
  db: getDatabase(config.databasePath),
  gateway: createGateway(config),
  tasks: new BackgroundTasks(),
  settings: config.vouchers,
  clock: systemClock,
};

const app = createApp(ctx, { sandbox: config.sandbox, invoiceRateLimitPerMinute: config.invoiceRateLimitPerMinute });
const server = app.listen(config.port, () => {
  logger.info(`Server listening on port ${config.port}`);
});

const refundJob = new RefundJob(ctx, config.refundIntervalMs);
refundJob.start();

let shuttingDown = false;

const shutdown = () => {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  logger.info('Shutting down');
  server.close(() => {
    logger.info('Server closed');
  });
  Promise.all([refundJob.stop(), ctx.tasks.shutdown()])
    .then(() => {
      closeDatabase();
      process.exit(0);
    })
    .catch((error: unknown) => {
      logger.error('Shutdown failed', { message: errorMessage(error) });
      process.exit(1);
    });
};

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
