import { randomBytes } from 'crypto';
import { setTimeout as delay } from 'timers/promises';
import { logger } from '../logger';
import type { GatewayInvoice, LightningGateway, PaymentOutcome, WaitResult } from './gateway';

/**
 * Stand-in gateway for local runs: invoices are fabricated, confirm themselves
 * after `confirmAfterMs`, and every outgoing payment succeeds.
 */
export class SandboxLightningGateway implements LightningGateway {
  constructor(private readonly confirmAfterMs = 1_000) {}

  async createInvoice(amountMsats: number, description: string): Promise<GatewayInvoice> {
    const paymentHash = randomBytes(32).toString('hex');
    logger.warn('Lightning gateway not configured, using sandbox invoice.', { amountMsats, description });
    return {
      paymentHash,
      invoice: `lnbcrt${Math.floor(amountMsats / 1000)}sandbox1${paymentHash.slice(0, 32)}`,
    };
  }

  async waitForPayment(paymentHash: string, signal: AbortSignal): Promise<WaitResult> {
    try {
      await delay(this.confirmAfterMs, undefined, { signal });
    } catch (error) {
      if (signal.aborted) {
        return 'cancelled';
      }
      throw error;
    }
    logger.info('Sandbox invoice confirmed', { paymentHash });
    return 'paid';
  }

  async payInvoice(bolt11: string): Promise<PaymentOutcome> {
    logger.warn('Sandbox gateway pretending to pay invoice.', { bolt11 });
    return { status: 'succeeded' };
  }
}
