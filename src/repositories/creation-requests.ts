import type Database from 'better-sqlite3';
import type { CreationRequestStatus, VoucherCreationRequest } from '../types';
import { nowISOString } from '../utils';

export interface CreateCreationRequestInput {
  paymentHash: string;
  lightningAddress: string;
  count: number;
  expirySeconds: number;
  feeMsats: number;
}

export const createCreationRequest = (
  db: Database.Database,
  input: CreateCreationRequestInput,
  now: Date = new Date(),
): VoucherCreationRequest => {
  const insert = db.prepare<VoucherCreationRequest>(
    `INSERT INTO voucher_creation_requests (payment_hash, lightning_address, count, expiry_seconds, fee_msats, status, created_at)
     VALUES (@payment_hash, @lightning_address, @count, @expiry_seconds, @fee_msats, @status, @created_at)`,
  );
  const request: VoucherCreationRequest = {
    payment_hash: input.paymentHash,
    lightning_address: input.lightningAddress,
    count: input.count,
    expiry_seconds: input.expirySeconds,
    fee_msats: input.feeMsats,
    status: 'pending',
    created_at: nowISOString(now),
  };
  insert.run(request);
  return request;
};

export const findCreationRequest = (db: Database.Database, paymentHash: string): VoucherCreationRequest | undefined => {
  const statement = db.prepare<[string], VoucherCreationRequest>(
    'SELECT * FROM voucher_creation_requests WHERE payment_hash = ?',
  );
  return statement.get(paymentHash);
};

/**
 * Moves a pending request to a terminal status. Returns false when the request
 * was already terminal (or unknown); terminal requests never change again.
 */
export const settleCreationRequest = (
  db: Database.Database,
  paymentHash: string,
  status: Exclude<CreationRequestStatus, 'pending'>,
) => {
  const statement = db.prepare<[CreationRequestStatus, string]>(
    `UPDATE voucher_creation_requests SET status = ? WHERE payment_hash = ? AND status = 'pending'`,
  );
  return statement.run(status, paymentHash).changes > 0;
};
