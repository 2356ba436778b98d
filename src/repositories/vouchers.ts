import type Database from 'better-sqlite3';
import type { Voucher, VoucherCreationRequest } from '../types';
import { voucherNotFound } from '../errors';
import { addSeconds, generateId, nowISOString } from '../utils';
import { settleCreationRequest } from './creation-requests';
import { findPayInvoiceByHash, markPayInvoicePaid } from './pay-invoices';

export type CreditResult =
  | { status: 'credited'; voucher: Voucher }
  | { status: 'inactive'; voucher: Voucher }
  | { status: 'already_paid' };

/** The moment a voucher stops accepting funds and withdrawals. */
export const effectiveExpiry = (voucher: Voucher, absoluteExpirySeconds: number) => {
  const absolute = addSeconds(voucher.created_at, absoluteExpirySeconds);
  if (!voucher.last_funded_at) {
    return absolute;
  }
  const relative = addSeconds(voucher.last_funded_at, voucher.expiry_seconds);
  return relative.getTime() < absolute.getTime() ? relative : absolute;
};

export const isVoucherActive = (voucher: Voucher, absoluteExpirySeconds: number, now: Date = new Date()) => {
  if (voucher.active !== 1) {
    return false;
  }
  return now.getTime() <= effectiveExpiry(voucher, absoluteExpirySeconds).getTime();
};

export const findVoucherByPayId = (db: Database.Database, payId: string): Voucher | undefined => {
  const statement = db.prepare<[string], Voucher>('SELECT * FROM vouchers WHERE pay_id = ?');
  return statement.get(payId);
};

export const findVoucherByWithdrawId = (db: Database.Database, withdrawId: string): Voucher | undefined => {
  const statement = db.prepare<[string], Voucher>('SELECT * FROM vouchers WHERE withdraw_id = ?');
  return statement.get(withdrawId);
};

export const listVouchersByCreationHash = (db: Database.Database, paymentHash: string): Voucher[] => {
  const statement = db.prepare<[string], Voucher>(
    'SELECT * FROM vouchers WHERE creation_request_hash = ? ORDER BY rowid ASC',
  );
  return statement.all(paymentHash);
};

/**
 * Inserts `request.count` fresh vouchers and completes the request in one
 * transaction. Either every voucher exists and the request is complete, or
 * nothing was written.
 */
export const createVoucherBatch = (
  db: Database.Database,
  request: VoucherCreationRequest,
  now: Date = new Date(),
): Voucher[] => {
  const insert = db.prepare<Voucher>(
    `INSERT INTO vouchers (
       pay_id, withdraw_id, creation_request_hash, lightning_address, total_paid_msats, last_funded_at, expiry_seconds, active, created_at
     ) VALUES (@pay_id, @withdraw_id, @creation_request_hash, @lightning_address, @total_paid_msats, @last_funded_at, @expiry_seconds, @active, @created_at)`,
  );
  const transaction = db.transaction((): Voucher[] => {
    const createdAt = nowISOString(now);
    const vouchers: Voucher[] = [];
    for (let i = 0; i < request.count; i += 1) {
      const voucher: Voucher = {
        pay_id: generateId(),
        withdraw_id: generateId(),
        creation_request_hash: request.payment_hash,
        lightning_address: request.lightning_address,
        total_paid_msats: 0,
        last_funded_at: null,
        expiry_seconds: request.expiry_seconds,
        active: 1,
        created_at: createdAt,
      };
      insert.run(voucher);
      vouchers.push(voucher);
    }
    if (!settleCreationRequest(db, request.payment_hash, 'complete')) {
      throw new Error('CREATION_REQUEST_NOT_PENDING');
    }
    return vouchers;
  });
  return transaction.immediate();
};

/**
 * Credits a confirmed pay invoice to its voucher, but only while the voucher is
 * still active. Nothing is written for an inactive voucher; the caller owns
 * the refund of money already received.
 */
export const creditIfActive = (
  db: Database.Database,
  params: { payId: string; creditedMsats: number; paymentHash: string; absoluteExpirySeconds: number },
  now: Date = new Date(),
): CreditResult => {
  const transaction = db.transaction((): CreditResult => {
    const invoice = findPayInvoiceByHash(db, params.paymentHash);
    if (!invoice || invoice.paid === 1 || invoice.pay_id !== params.payId) {
      return { status: 'already_paid' };
    }
    const voucher = findVoucherByPayId(db, params.payId);
    if (!voucher) {
      throw voucherNotFound();
    }
    if (!isVoucherActive(voucher, params.absoluteExpirySeconds, now)) {
      return { status: 'inactive', voucher };
    }
    const fundedAt = nowISOString(now);
    db.prepare<[number, string, string]>(
      'UPDATE vouchers SET total_paid_msats = total_paid_msats + ?, last_funded_at = ? WHERE pay_id = ?',
    ).run(params.creditedMsats, fundedAt, params.payId);
    markPayInvoicePaid(db, params.paymentHash, now);
    return {
      status: 'credited',
      voucher: {
        ...voucher,
        total_paid_msats: voucher.total_paid_msats + params.creditedMsats,
        last_funded_at: fundedAt,
      },
    };
  });
  return transaction.immediate();
};

export const deactivateForWithdrawal = (db: Database.Database, payId: string) => {
  const transaction = db.transaction(() => {
    const result = db
      .prepare<[string]>('UPDATE vouchers SET total_paid_msats = 0, active = 0 WHERE pay_id = ?')
      .run(payId);
    if (result.changes === 0) {
      throw voucherNotFound();
    }
  });
  transaction.immediate();
};

/**
 * Zeroes an active, funded voucher ahead of a refund payment and returns the
 * balance that was owed. Returns null when the voucher is no longer active or
 * has nothing to refund.
 */
export const deactivateForRefund = (db: Database.Database, payId: string): number | null => {
  const transaction = db.transaction((): number | null => {
    const voucher = findVoucherByPayId(db, payId);
    if (!voucher || voucher.active !== 1 || voucher.total_paid_msats <= 0) {
      return null;
    }
    db.prepare<[string]>('UPDATE vouchers SET total_paid_msats = 0, active = 0 WHERE pay_id = ?').run(payId);
    return voucher.total_paid_msats;
  });
  return transaction.immediate();
};

/** Undoes {@link deactivateForRefund} after a refund payment definitively failed. */
export const reactivateWithBalance = (db: Database.Database, payId: string, balanceMsats: number) => {
  const transaction = db.transaction(() => {
    const result = db
      .prepare<[number, string]>('UPDATE vouchers SET total_paid_msats = ?, active = 1 WHERE pay_id = ?')
      .run(balanceMsats, payId);
    if (result.changes === 0) {
      throw voucherNotFound();
    }
  });
  transaction.immediate();
};

export const findExpiredFundedVouchers = (
  db: Database.Database,
  absoluteExpirySeconds: number,
  now: Date = new Date(),
): Voucher[] => {
  const statement = db.prepare<{ now: string; absolute_expiry: number }, Voucher>(
    `SELECT * FROM vouchers
     WHERE active = 1
       AND total_paid_msats > 0
       AND (
         (last_funded_at IS NOT NULL
          AND CAST(strftime('%s', @now) AS INTEGER) - CAST(strftime('%s', last_funded_at) AS INTEGER) >= expiry_seconds)
         OR CAST(strftime('%s', @now) AS INTEGER) - CAST(strftime('%s', created_at) AS INTEGER) >= @absolute_expiry
       )
     ORDER BY created_at ASC`,
  );
  return statement.all({ now: nowISOString(now), absolute_expiry: absoluteExpirySeconds });
};
