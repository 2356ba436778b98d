import QRCode from 'qrcode';
import { LnurlEncodingError, ServiceError, validationError, voucherNotFound } from '../errors';
import { decodeLnurl, encodeLnurl } from '../lnurl/bech32';
import { findCreationRequest } from '../repositories/creation-requests';
import { listPaidInvoicesByPayId } from '../repositories/pay-invoices';
import {
  effectiveExpiry,
  findVoucherByPayId,
  findVoucherByWithdrawId,
  isVoucherActive,
  listVouchersByCreationHash,
} from '../repositories/vouchers';
import type { CreationRequestStatus, Voucher } from '../types';
import { addSeconds, msatsToSats } from '../utils';
import type { VoucherContext } from './context';
import { payUrl, withdrawUrl } from './context';

export interface VoucherLinks {
  lnurl_pay: string;
  lnurl_withdraw: string;
  pay_info_url: string;
  withdraw_info_url: string;
  lightning_address: string;
  absolute_expiry: string;
  relative_expiry_seconds: number;
  lnurl_pay_qr?: string;
  lnurl_withdraw_qr?: string;
}

export interface CreationStatus {
  status: CreationRequestStatus;
  vouchers?: VoucherLinks[];
}

export interface FundingEntry {
  amount_sats: number;
  credited_sats: number;
  paid_at: string | null;
}

export type VoucherInfo =
  | {
      type: 'pay';
      balance_sats: number;
      active: boolean;
      expires_at: string;
      lightning_address: string;
      fundings: FundingEntry[];
    }
  | {
      type: 'withdraw';
      balance_sats: number;
      active: boolean;
    };

const infoUrl = (ctx: VoucherContext, lnurl: string) =>
  `${ctx.settings.baseUrl}/api/vouchers/info?lightning=${lnurl}`;

const toQrDataUrl = (lnurl: string) => QRCode.toDataURL(lnurl, { errorCorrectionLevel: 'M', margin: 1, width: 256 });

const describeVoucher = async (ctx: VoucherContext, voucher: Voucher, includeQr: boolean): Promise<VoucherLinks> => {
  const lnurlPay = encodeLnurl(payUrl(ctx.settings, voucher.pay_id));
  const lnurlWithdraw = encodeLnurl(withdrawUrl(ctx.settings, voucher.withdraw_id));
  const links: VoucherLinks = {
    lnurl_pay: lnurlPay,
    lnurl_withdraw: lnurlWithdraw,
    pay_info_url: infoUrl(ctx, lnurlPay),
    withdraw_info_url: infoUrl(ctx, lnurlWithdraw),
    lightning_address: voucher.lightning_address,
    absolute_expiry: addSeconds(voucher.created_at, ctx.settings.absoluteExpirySeconds).toISOString(),
    relative_expiry_seconds: voucher.expiry_seconds,
  };
  if (includeQr) {
    links.lnurl_pay_qr = await toQrDataUrl(lnurlPay);
    links.lnurl_withdraw_qr = await toQrDataUrl(lnurlWithdraw);
  }
  return links;
};

/** Status of a creation request and, once complete, the LNURL codes of its vouchers. */
export const getCreationStatus = async (
  ctx: VoucherContext,
  paymentHash: string,
  includeQr = false,
): Promise<CreationStatus> => {
  const request = findCreationRequest(ctx.db, paymentHash);
  if (!request) {
    throw new ServiceError('not_found', 'REQUEST_NOT_FOUND', 'creation request not found');
  }
  if (request.status !== 'complete') {
    return { status: request.status };
  }
  const vouchers = listVouchersByCreationHash(ctx.db, paymentHash);
  return {
    status: request.status,
    vouchers: await Promise.all(vouchers.map((voucher) => describeVoucher(ctx, voucher, includeQr))),
  };
};

const parseVoucherLink = (lightning: unknown) => {
  if (typeof lightning !== 'string' || !lightning.trim()) {
    throw validationError('missing lightning parameter');
  }
  let decoded: string;
  try {
    decoded = decodeLnurl(lightning);
  } catch (error) {
    if (error instanceof LnurlEncodingError) {
      throw validationError(error.message);
    }
    throw error;
  }
  let url: URL;
  try {
    url = new URL(decoded);
  } catch (error) {
    throw validationError('invalid URL in LNURL');
  }
  const segments = url.pathname.split('/').filter(Boolean);
  const [kind, id] = segments.slice(-2);
  if (segments.length < 2 || !id || (kind !== 'pay' && kind !== 'withdraw')) {
    throw validationError('not a voucher LNURL');
  }
  return { kind, id };
};

/** Decodes a voucher's LNURL and reports what it currently holds. */
export const getVoucherInfo = (ctx: VoucherContext, lightning: unknown): VoucherInfo => {
  const { kind, id } = parseVoucherLink(lightning);
  const now = ctx.clock();
  const { absoluteExpirySeconds } = ctx.settings;

  if (kind === 'withdraw') {
    const voucher = findVoucherByWithdrawId(ctx.db, id);
    if (!voucher) {
      throw voucherNotFound();
    }
    return {
      type: 'withdraw',
      balance_sats: msatsToSats(voucher.total_paid_msats),
      active: isVoucherActive(voucher, absoluteExpirySeconds, now),
    };
  }

  const voucher = findVoucherByPayId(ctx.db, id);
  if (!voucher) {
    throw voucherNotFound();
  }
  return {
    type: 'pay',
    balance_sats: msatsToSats(voucher.total_paid_msats),
    active: isVoucherActive(voucher, absoluteExpirySeconds, now),
    expires_at: effectiveExpiry(voucher, absoluteExpirySeconds).toISOString(),
    lightning_address: voucher.lightning_address,
    fundings: listPaidInvoicesByPayId(ctx.db, id).map((invoice) => ({
      amount_sats: msatsToSats(invoice.amount_msats),
      credited_sats: msatsToSats(invoice.credited_msats),
      paid_at: invoice.paid_at,
    })),
  };
};
