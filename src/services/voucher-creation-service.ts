import { ServiceError, validationError } from '../errors';
import { isLightningAddress } from '../lnurl/lightning-address';
import { errorMessage, logger } from '../logger';
import type { GatewayInvoice } from '../payments';
import { createCreationRequest, settleCreationRequest } from '../repositories/creation-requests';
import { createVoucherBatch } from '../repositories/vouchers';
import type { VoucherCreationRequest } from '../types';
import { satsToMsats } from '../utils';
import type { VoucherContext } from './context';

export interface CreateVoucherInvoiceInput {
  lightningAddress: unknown;
  count: unknown;
  expirySeconds: unknown;
}

export interface VoucherInvoice {
  invoice: string;
  payment_hash: string;
  fee_sats: number;
}

const parseExpirySeconds = (value: unknown, fallback: number) => {
  if (value === undefined || value === null) {
    return fallback;
  }
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw validationError('expiry_seconds must be an integer');
  }
  return value > 0 ? value : fallback;
};

/**
 * Issues the invoice that pays for a batch of vouchers and starts waiting for
 * it in the background. The vouchers themselves only exist once the invoice
 * is paid; callers poll the request status for them.
 */
export const createVoucherInvoice = async (
  ctx: VoucherContext,
  input: CreateVoucherInvoiceInput,
): Promise<VoucherInvoice> => {
  const { settings } = ctx;
  if (!isLightningAddress(input.lightningAddress)) {
    throw validationError('invalid lightning_address');
  }
  const lightningAddress = input.lightningAddress;
  const count = input.count;
  if (typeof count !== 'number' || !Number.isInteger(count) || count < 1 || count > settings.maxVouchersPerRequest) {
    throw validationError(`count must be between 1 and ${settings.maxVouchersPerRequest}`);
  }
  const expirySeconds = parseExpirySeconds(input.expirySeconds, settings.defaultRelativeExpirySeconds);

  const feeSats = settings.feePerVoucherSats * count;
  const feeMsats = satsToMsats(feeSats);

  let invoice: GatewayInvoice;
  try {
    invoice = await ctx.gateway.createInvoice(feeMsats, `Create ${count} tip voucher(s)`);
  } catch (error) {
    logger.error('Gateway createInvoice failed for voucher creation', { message: errorMessage(error) });
    throw new ServiceError('gateway', 'GATEWAY_UNAVAILABLE', 'failed to create payment invoice');
  }

  const request = createCreationRequest(
    ctx.db,
    {
      paymentHash: invoice.paymentHash,
      lightningAddress,
      count,
      expirySeconds,
      feeMsats,
    },
    ctx.clock(),
  );
  logger.info('Voucher creation invoice issued', { paymentHash: request.payment_hash, count, feeSats });

  ctx.tasks.spawn(
    `voucher-creation:${request.payment_hash}`,
    (signal) => awaitCreationPayment(ctx, request, signal),
    settings.paymentWaitTimeoutMs,
  );

  return {
    invoice: invoice.invoice,
    payment_hash: invoice.paymentHash,
    fee_sats: feeSats,
  };
};

/** Background half of {@link createVoucherInvoice}. */
export const awaitCreationPayment = async (
  ctx: VoucherContext,
  request: VoucherCreationRequest,
  signal: AbortSignal,
) => {
  let paid = false;
  try {
    paid = (await ctx.gateway.waitForPayment(request.payment_hash, signal)) === 'paid';
  } catch (error) {
    logger.warn('Waiting for voucher creation payment failed', {
      paymentHash: request.payment_hash,
      message: errorMessage(error),
    });
  }
  if (!paid) {
    settleCreationRequest(ctx.db, request.payment_hash, 'expired');
    logger.info('Voucher creation request expired', { paymentHash: request.payment_hash });
    return;
  }
  try {
    const vouchers = createVoucherBatch(ctx.db, request, ctx.clock());
    logger.info('Vouchers created', { paymentHash: request.payment_hash, count: vouchers.length });
  } catch (error) {
    logger.error('Voucher batch insert failed', { paymentHash: request.payment_hash, message: errorMessage(error) });
    settleCreationRequest(ctx.db, request.payment_hash, 'expired');
  }
};
