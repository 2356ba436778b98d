import type { VoucherSettings } from '../config';
import { ServiceError, inactiveVoucher, validationError, voucherNotFound } from '../errors';
import { errorMessage, logger } from '../logger';
import type { GatewayInvoice } from '../payments';
import { createPayInvoice, markPayInvoicePaid } from '../repositories/pay-invoices';
import { creditIfActive, findVoucherByPayId, isVoucherActive } from '../repositories/vouchers';
import type { LnurlPayCallback, LnurlPayMetadata, LnurlResult, PayInvoice } from '../types';
import { satsToMsats } from '../utils';
import { type VoucherContext, payUrl, toLnurlError } from './context';
import { refundToLightningAddress } from './refund-service';

const PAY_DESCRIPTION = 'Fund tip voucher';

/** Funding fee in msats: a percentage of the gross amount with a floor. */
export const computeFundingFee = (settings: VoucherSettings, amountMsats: number) =>
  Math.max(settings.fundingFeeMinMsats, Math.floor(amountMsats * settings.fundingFeePercent));

const sendableBounds = (settings: VoucherSettings) => ({
  minSendable: satsToMsats(settings.minPayAmountSats),
  maxSendable: satsToMsats(settings.maxPayAmountSats),
});

const requireActiveVoucher = (ctx: VoucherContext, payId: string) => {
  const voucher = findVoucherByPayId(ctx.db, payId);
  if (!voucher) {
    throw voucherNotFound();
  }
  if (!isVoucherActive(voucher, ctx.settings.absoluteExpirySeconds, ctx.clock())) {
    throw inactiveVoucher();
  }
  return voucher;
};

const parseAmount = (value: unknown) => {
  if (typeof value !== 'string' || !/^\d+$/.test(value)) {
    throw validationError('invalid amount');
  }
  const amount = Number(value);
  if (!Number.isSafeInteger(amount) || amount <= 0) {
    throw validationError('invalid amount');
  }
  return amount;
};

export const getPayMetadata = (ctx: VoucherContext, payId: string): LnurlResult<LnurlPayMetadata> => {
  try {
    requireActiveVoucher(ctx, payId);
    return {
      tag: 'payRequest',
      callback: `${payUrl(ctx.settings, payId)}/callback`,
      ...sendableBounds(ctx.settings),
      metadata: JSON.stringify([['text/plain', PAY_DESCRIPTION]]),
    };
  } catch (error) {
    return toLnurlError(error, { payId });
  }
};

/**
 * LNURL-Pay step two: issues an invoice for the gross amount. The voucher is
 * credited the amount minus the funding fee once the invoice is paid.
 */
export const handlePayCallback = async (
  ctx: VoucherContext,
  payId: string,
  rawAmount: unknown,
): Promise<LnurlResult<LnurlPayCallback>> => {
  try {
    const amountMsats = parseAmount(rawAmount);
    const { minSendable, maxSendable } = sendableBounds(ctx.settings);
    if (amountMsats < minSendable || amountMsats > maxSendable) {
      throw validationError(`amount must be between ${minSendable} and ${maxSendable} msats`);
    }
    requireActiveVoucher(ctx, payId);

    const feeMsats = computeFundingFee(ctx.settings, amountMsats);
    const creditedMsats = amountMsats - feeMsats;
    if (creditedMsats <= 0) {
      throw validationError('amount does not cover the funding fee');
    }

    let invoice: GatewayInvoice;
    try {
      invoice = await ctx.gateway.createInvoice(amountMsats, PAY_DESCRIPTION);
    } catch (error) {
      logger.error('Gateway createInvoice failed for voucher funding', { payId, message: errorMessage(error) });
      throw new ServiceError('gateway', 'GATEWAY_UNAVAILABLE', 'failed to create invoice');
    }

    const payInvoice = createPayInvoice(
      ctx.db,
      { payId, paymentHash: invoice.paymentHash, amountMsats, creditedMsats },
      ctx.clock(),
    );
    ctx.tasks.spawn(
      `voucher-funding:${payInvoice.payment_hash}`,
      (signal) => awaitFundingPayment(ctx, payInvoice, signal),
      ctx.settings.paymentWaitTimeoutMs,
    );
    logger.info('Funding invoice issued', { payId, amountMsats, feeMsats });
    return { pr: invoice.invoice, routes: [] };
  } catch (error) {
    return toLnurlError(error, { payId });
  }
};

/**
 * Credits a paid funding invoice. Money that arrives for a voucher that went
 * inactive meanwhile is sent back to the voucher's lightning address.
 */
export const awaitFundingPayment = async (ctx: VoucherContext, invoice: PayInvoice, signal: AbortSignal) => {
  const paymentHash = invoice.payment_hash;
  const result = await ctx.gateway.waitForPayment(paymentHash, signal);
  if (result !== 'paid') {
    logger.info('Funding invoice not paid before deadline', { payId: invoice.pay_id, paymentHash });
    return;
  }

  const now = ctx.clock();
  const credit = creditIfActive(
    ctx.db,
    {
      payId: invoice.pay_id,
      creditedMsats: invoice.credited_msats,
      paymentHash,
      absoluteExpirySeconds: ctx.settings.absoluteExpirySeconds,
    },
    now,
  );

  if (credit.status === 'already_paid') {
    logger.info('Duplicate funding confirmation ignored', { payId: invoice.pay_id, paymentHash });
    return;
  }
  if (credit.status === 'credited') {
    logger.info('Voucher funded', {
      payId: invoice.pay_id,
      creditedMsats: invoice.credited_msats,
      balanceMsats: credit.voucher.total_paid_msats,
    });
    return;
  }

  // Claim the invoice first so a repeated confirmation cannot refund twice.
  if (!markPayInvoicePaid(ctx.db, paymentHash, now)) {
    return;
  }
  logger.warn('Funding arrived for inactive voucher, refunding', {
    payId: invoice.pay_id,
    creditedMsats: invoice.credited_msats,
  });
  const outcome = await refundToLightningAddress(ctx.gateway, credit.voucher.lightning_address, invoice.credited_msats, {
    payTimeoutMs: ctx.settings.payTimeoutMs,
  });
  if (outcome.status === 'succeeded') {
    logger.info('Funding refunded', { payId: invoice.pay_id, amountMsats: invoice.credited_msats });
  } else if (outcome.status === 'failed') {
    logger.error('Funding refund failed', { payId: invoice.pay_id, amountMsats: invoice.credited_msats, reason: outcome.reason });
  } else {
    logger.error('CRITICAL: funding refund outcome unknown', {
      payId: invoice.pay_id,
      amountMsats: invoice.credited_msats,
      reason: outcome.reason,
    });
  }
};
