import { requestInvoiceFromCallback, resolveLightningAddress } from '../lnurl/lightning-address';
import { errorMessage, logger } from '../logger';
import type { LightningGateway, PaymentOutcome } from '../payments';
import { deactivateForRefund, findExpiredFundedVouchers, reactivateWithBalance } from '../repositories/vouchers';
import type { Voucher } from '../types';
import type { VoucherContext } from './context';

export type RefundStatus = 'refunded' | 'failed' | 'unknown' | 'skipped';

export interface RefundResult {
  payId: string;
  status: RefundStatus;
  amountMsats?: number;
  reason?: string;
}

export interface RefundOptions {
  payTimeoutMs: number;
  resolveTimeoutMs?: number;
}

const failed = (reason: string): PaymentOutcome => ({ status: 'failed', reason });

/**
 * Pays `amountMsats` to a lightning address. Resolution and invoice errors are
 * definitive failures; so is an amount below the recipient's minimum, which is
 * rejected before the gateway is involved. Amounts above the maximum are
 * capped, then rounded down to whole sats.
 */
export const refundToLightningAddress = async (
  gateway: LightningGateway,
  address: string,
  amountMsats: number,
  options: RefundOptions,
): Promise<PaymentOutcome> => {
  let bolt11: string;
  try {
    const params = await resolveLightningAddress(address, options.resolveTimeoutMs);
    if (amountMsats < params.minSendable) {
      return failed(`dust: ${amountMsats} msats is below the minimum of ${params.minSendable} msats`);
    }
    const capped = Math.min(amountMsats, params.maxSendable);
    const rounded = Math.floor(capped / 1000) * 1000;
    if (rounded <= 0) {
      return failed(`dust: ${amountMsats} msats rounds down to zero sats`);
    }
    bolt11 = await requestInvoiceFromCallback(address, params.callback, rounded, options.resolveTimeoutMs);
  } catch (error) {
    return failed(errorMessage(error));
  }

  try {
    return await gateway.payInvoice(bolt11, AbortSignal.timeout(options.payTimeoutMs));
  } catch (error) {
    return { status: 'unknown', reason: errorMessage(error) };
  }
};

const refundVoucher = async (ctx: VoucherContext, voucher: Voucher): Promise<RefundResult> => {
  const payId = voucher.pay_id;
  const balance = deactivateForRefund(ctx.db, payId);
  if (balance === null) {
    return { payId, status: 'skipped' };
  }

  const outcome = await refundToLightningAddress(ctx.gateway, voucher.lightning_address, balance, {
    payTimeoutMs: ctx.settings.payTimeoutMs,
  });

  switch (outcome.status) {
    case 'succeeded':
      logger.info('Voucher refunded', { payId, amountMsats: balance, lightningAddress: voucher.lightning_address });
      return { payId, status: 'refunded', amountMsats: balance };
    case 'failed':
      reactivateWithBalance(ctx.db, payId, balance);
      logger.warn('Voucher refund failed, balance restored', { payId, amountMsats: balance, reason: outcome.reason });
      return { payId, status: 'failed', amountMsats: balance, reason: outcome.reason };
    case 'unknown':
      logger.error('CRITICAL: refund outcome unknown, voucher left deactivated for manual reconciliation', {
        payId,
        amountMsats: balance,
        lightningAddress: voucher.lightning_address,
        reason: outcome.reason,
      });
      return { payId, status: 'unknown', amountMsats: balance, reason: outcome.reason };
  }
};

/** Refunds every expired voucher that still holds funds, one at a time. */
export const runRefundSweep = async (ctx: VoucherContext): Promise<RefundResult[]> => {
  const expired = findExpiredFundedVouchers(ctx.db, ctx.settings.absoluteExpirySeconds, ctx.clock());
  logger.info('Refund sweep started', { candidates: expired.length });
  const results: RefundResult[] = [];
  for (const voucher of expired) {
    try {
      results.push(await refundVoucher(ctx, voucher));
    } catch (error) {
      const reason = errorMessage(error);
      logger.error('Refund of voucher failed', { payId: voucher.pay_id, message: reason });
      results.push({ payId: voucher.pay_id, status: 'failed', reason });
    }
  }
  return results;
};

export class RefundJob {
  private timer: NodeJS.Timeout | null = null;
  private current: Promise<RefundResult[] | null> | null = null;

  constructor(
    private readonly ctx: VoucherContext,
    private readonly intervalMs: number,
  ) {}

  /** Runs a sweep now and then once per interval. */
  start() {
    if (this.timer) {
      return;
    }
    void this.runOnce();
    this.timer = setInterval(() => {
      void this.runOnce();
    }, this.intervalMs);
  }

  /**
   * Runs one sweep unless another is still in progress. Resolves with null when
   * skipped or when the sweep itself failed.
   */
  runOnce(): Promise<RefundResult[] | null> {
    if (this.current) {
      logger.warn('Refund sweep still running, skipping this run');
      return Promise.resolve(null);
    }
    const run = runRefundSweep(this.ctx)
      .then((results) => {
        logger.info('Refund sweep finished', { processed: results.length });
        return results;
      })
      .catch((error: unknown) => {
        logger.error('Refund sweep failed', { message: errorMessage(error) });
        return null;
      })
      .finally(() => {
        this.current = null;
      });
    this.current = run;
    return run;
  }

  async stop() {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.current) {
      await this.current;
    }
  }
}
