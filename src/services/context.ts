import type Database from 'better-sqlite3';
import type { VoucherSettings } from '../config';
import { ServiceError } from '../errors';
import { errorMessage, logger } from '../logger';
import type { LightningGateway } from '../payments';
import type { BackgroundTasks } from '../tasks/background-tasks';
import type { Clock, LnurlErrorBody } from '../types';

/** Everything a voucher flow needs, handed in by whoever wires the app. */
export interface VoucherContext {
  db: Database.Database;
  gateway: LightningGateway;
  tasks: BackgroundTasks;
  settings: VoucherSettings;
  clock: Clock;
}

export const systemClock: Clock = () => new Date();

export const payUrl = (settings: VoucherSettings, payId: string) => `${settings.baseUrl}/pay/${payId}`;

export const withdrawUrl = (settings: VoucherSettings, withdrawId: string) =>
  `${settings.baseUrl}/withdraw/${withdrawId}`;

export const lnurlError = (reason: string): LnurlErrorBody => ({ status: 'ERROR', reason });

/**
 * Converts anything thrown inside an LNURL flow into the protocol's error body.
 * Wallets only read the body, so nothing escapes as an HTTP failure.
 */
export const toLnurlError = (error: unknown, context: Record<string, unknown>): LnurlErrorBody => {
  if (error instanceof ServiceError) {
    if (error.kind === 'gateway' || error.kind === 'storage') {
      logger.error('LNURL request failed', { ...context, code: error.code, message: error.message });
    } else {
      logger.info('LNURL request rejected', { ...context, code: error.code });
    }
    return lnurlError(error.message);
  }
  logger.error('LNURL request failed unexpectedly', { ...context, message: errorMessage(error) });
  return lnurlError('internal error');
};
