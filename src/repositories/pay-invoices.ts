import type Database from 'better-sqlite3';
import type { PayInvoice } from '../types';
import { generateId, nowISOString } from '../utils';

export interface CreatePayInvoiceInput {
  payId: string;
  paymentHash: string;
  amountMsats: number;
  creditedMsats: number;
}

export const createPayInvoice = (
  db: Database.Database,
  input: CreatePayInvoiceInput,
  now: Date = new Date(),
): PayInvoice => {
  const insert = db.prepare<PayInvoice>(
    `INSERT INTO pay_invoices (id, pay_id, payment_hash, amount_msats, credited_msats, paid, created_at, paid_at)
     VALUES (@id, @pay_id, @payment_hash, @amount_msats, @credited_msats, @paid, @created_at, @paid_at)`,
  );
  const invoice: PayInvoice = {
    id: generateId(),
    pay_id: input.payId,
    payment_hash: input.paymentHash,
    amount_msats: input.amountMsats,
    credited_msats: input.creditedMsats,
    paid: 0,
    created_at: nowISOString(now),
    paid_at: null,
  };
  insert.run(invoice);
  return invoice;
};

export const findPayInvoiceByHash = (db: Database.Database, paymentHash: string): PayInvoice | undefined => {
  const statement = db.prepare<[string], PayInvoice>('SELECT * FROM pay_invoices WHERE payment_hash = ?');
  return statement.get(paymentHash);
};

export const markPayInvoicePaid = (db: Database.Database, paymentHash: string, now: Date = new Date()) => {
  const statement = db.prepare<[string, string]>(
    'UPDATE pay_invoices SET paid = 1, paid_at = ? WHERE payment_hash = ? AND paid = 0',
  );
  return statement.run(nowISOString(now), paymentHash).changes > 0;
};

export const listPaidInvoicesByPayId = (db: Database.Database, payId: string): PayInvoice[] => {
  const statement = db.prepare<[string], PayInvoice>(
    'SELECT * FROM pay_invoices WHERE pay_id = ? AND paid = 1 ORDER BY paid_at ASC',
  );
  return statement.all(payId);
};
