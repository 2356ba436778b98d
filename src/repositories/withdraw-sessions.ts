import type Database from 'better-sqlite3';
import { WithdrawSessionError, voucherNotFound } from '../errors';
import type { SessionOutcome, WithdrawSession } from '../types';
import { generateK1, nowISOString } from '../utils';

export const createWithdrawSession = (
  db: Database.Database,
  withdrawId: string,
  now: Date = new Date(),
): WithdrawSession => {
  const session: WithdrawSession = {
    k1: generateK1(),
    withdraw_id: withdrawId,
    used: 0,
    outcome: null,
    created_at: nowISOString(now),
    used_at: null,
  };
  db.prepare<WithdrawSession>(
    `INSERT INTO withdraw_sessions (k1, withdraw_id, used, outcome, created_at, used_at)
     VALUES (@k1, @withdraw_id, @used, @outcome, @created_at, @used_at)`,
  ).run(session);
  return session;
};

export const findWithdrawSession = (db: Database.Database, k1: string): WithdrawSession | undefined => {
  const statement = db.prepare<[string], WithdrawSession>('SELECT * FROM withdraw_sessions WHERE k1 = ?');
  return statement.get(k1);
};

/**
 * Consumes `k1` for `withdrawId` and returns the voucher's pay id. A session is
 * consumed at most once, and not at all while another session of the same
 * voucher is still waiting on its payout.
 */
export const validateAndConsumeSession = (
  db: Database.Database,
  k1: string,
  withdrawId: string,
  now: Date = new Date(),
): string => {
  const transaction = db.transaction((): string => {
    const session = findWithdrawSession(db, k1);
    if (!session) {
      throw new WithdrawSessionError('SESSION_NOT_FOUND');
    }
    if (session.withdraw_id !== withdrawId) {
      throw new WithdrawSessionError('SESSION_MISMATCH');
    }
    if (session.used === 1) {
      throw new WithdrawSessionError('SESSION_ALREADY_USED');
    }
    const inFlight = db
      .prepare<[string], { k1: string }>(
        'SELECT k1 FROM withdraw_sessions WHERE withdraw_id = ? AND used = 1 AND outcome IS NULL LIMIT 1',
      )
      .get(withdrawId);
    if (inFlight) {
      throw new WithdrawSessionError('WITHDRAWAL_IN_PROGRESS');
    }
    db.prepare<[string, string]>('UPDATE withdraw_sessions SET used = 1, used_at = ? WHERE k1 = ?').run(
      nowISOString(now),
      k1,
    );
    const voucher = db
      .prepare<[string], { pay_id: string }>('SELECT pay_id FROM vouchers WHERE withdraw_id = ?')
      .get(withdrawId);
    if (!voucher) {
      throw voucherNotFound();
    }
    return voucher.pay_id;
  });
  return transaction.immediate();
};

export const recordSessionOutcome = (db: Database.Database, k1: string, outcome: SessionOutcome) => {
  db.prepare<[SessionOutcome, string]>('UPDATE withdraw_sessions SET outcome = ? WHERE k1 = ?').run(outcome, k1);
};
