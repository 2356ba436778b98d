import { ServiceError, inactiveVoucher, validationError, voucherNotFound } from '../errors';
import { invoiceAmountMsats } from '../lnurl/bolt11';
import { errorMessage, logger } from '../logger';
import type { PaymentOutcome } from '../payments';
import { deactivateForWithdrawal, findVoucherByPayId, findVoucherByWithdrawId, isVoucherActive } from '../repositories/vouchers';
import {
  createWithdrawSession,
  recordSessionOutcome,
  validateAndConsumeSession,
} from '../repositories/withdraw-sessions';
import type { LnurlOk, LnurlResult, LnurlWithdrawMetadata, SessionOutcome, Voucher } from '../types';
import type { VoucherContext } from './context';
import { lnurlError, toLnurlError, withdrawUrl } from './context';

const WITHDRAW_DESCRIPTION = 'Tip voucher withdrawal';

const emptyVoucher = () => new ServiceError('conflict', 'VOUCHER_EMPTY', 'voucher has no balance');

const requireWithdrawable = (ctx: VoucherContext, voucher: Voucher | undefined) => {
  if (!voucher) {
    throw voucherNotFound();
  }
  if (!isVoucherActive(voucher, ctx.settings.absoluteExpirySeconds, ctx.clock())) {
    throw inactiveVoucher();
  }
  if (voucher.total_paid_msats <= 0) {
    throw emptyVoucher();
  }
  return voucher;
};

const requireParam = (value: unknown, name: string) => {
  if (typeof value !== 'string' || !value) {
    throw validationError(`missing ${name} parameter`);
  }
  return value;
};

/** LNURL-Withdraw step one: mints a single-use `k1` for the whole balance. */
export const getWithdrawMetadata = (ctx: VoucherContext, withdrawId: string): LnurlResult<LnurlWithdrawMetadata> => {
  try {
    const voucher = requireWithdrawable(ctx, findVoucherByWithdrawId(ctx.db, withdrawId));
    const session = createWithdrawSession(ctx.db, withdrawId, ctx.clock());
    return {
      tag: 'withdrawRequest',
      callback: `${withdrawUrl(ctx.settings, withdrawId)}/callback`,
      k1: session.k1,
      defaultDescription: WITHDRAW_DESCRIPTION,
      minWithdrawable: voucher.total_paid_msats,
      maxWithdrawable: voucher.total_paid_msats,
    };
  } catch (error) {
    return toLnurlError(error, { withdrawId });
  }
};

/** The wallet's invoice must ask for exactly the voucher balance. */
const requireInvoiceForBalance = (paymentRequest: string, balanceMsats: number) => {
  const amountMsats = invoiceAmountMsats(paymentRequest);
  if (amountMsats === null) {
    throw validationError('invoice must specify an amount');
  }
  if (amountMsats !== balanceMsats) {
    throw validationError(`invoice amount must be ${balanceMsats} msats`);
  }
};

const recordOutcomeAfterPayout = (ctx: VoucherContext, k1: string, withdrawId: string, outcome: SessionOutcome) => {
  try {
    recordSessionOutcome(ctx.db, k1, outcome);
  } catch (error) {
    logger.error('CRITICAL: withdrawal outcome not recorded', {
      withdrawId,
      outcome,
      message: errorMessage(error),
    });
  }
};

const deactivateAfterPayout = (ctx: VoucherContext, payId: string, withdrawId: string) => {
  try {
    deactivateForWithdrawal(ctx.db, payId);
  } catch (error) {
    logger.error('CRITICAL: voucher paid out but not deactivated', {
      payId,
      withdrawId,
      message: errorMessage(error),
    });
  }
};

const payOut = async (ctx: VoucherContext, bolt11: string): Promise<PaymentOutcome> => {
  try {
    return await ctx.gateway.payInvoice(bolt11, AbortSignal.timeout(ctx.settings.payTimeoutMs));
  } catch (error) {
    return { status: 'unknown', reason: errorMessage(error) };
  }
};

/**
 * LNURL-Withdraw step two: consumes `k1` and pays the wallet's invoice. An
 * ambiguous payout deactivates the voucher anyway; paying twice is worse than
 * a manual reconciliation.
 */
export const handleWithdrawCallback = async (
  ctx: VoucherContext,
  withdrawId: string,
  rawK1: unknown,
  rawPr: unknown,
): Promise<LnurlResult<LnurlOk>> => {
  try {
    const k1 = requireParam(rawK1, 'k1');
    const pr = requireParam(rawPr, 'pr');
    const payId = validateAndConsumeSession(ctx.db, k1, withdrawId, ctx.clock());

    let voucher: Voucher;
    try {
      voucher = requireWithdrawable(ctx, findVoucherByPayId(ctx.db, payId));
      requireInvoiceForBalance(pr, voucher.total_paid_msats);
    } catch (error) {
      recordSessionOutcome(ctx.db, k1, 'failed');
      throw error;
    }

    const outcome = await payOut(ctx, pr);
    recordOutcomeAfterPayout(ctx, k1, withdrawId, outcome.status);

    switch (outcome.status) {
      case 'succeeded':
        deactivateAfterPayout(ctx, payId, withdrawId);
        logger.info('Voucher withdrawn', { payId, withdrawId, amountMsats: voucher.total_paid_msats });
        return { status: 'OK' };
      case 'failed':
        logger.warn('Withdrawal payment failed', { payId, withdrawId, reason: outcome.reason });
        return lnurlError('payment failed');
      case 'unknown':
        deactivateAfterPayout(ctx, payId, withdrawId);
        logger.error('CRITICAL: withdrawal outcome unknown, voucher deactivated for manual reconciliation', {
          payId,
          withdrawId,
          amountMsats: voucher.total_paid_msats,
          reason: outcome.reason,
        });
        return lnurlError('payment timed out');
    }
  } catch (error) {
    return toLnurlError(error, { withdrawId });
  }
};
