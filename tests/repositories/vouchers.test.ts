import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { findCreationRequest, settleCreationRequest, createCreationRequest } from '../../src/repositories/creation-requests';
import { createPayInvoice, findPayInvoiceByHash, listPaidInvoicesByPayId } from '../../src/repositories/pay-invoices';
import {
  createVoucherBatch,
  creditIfActive,
  deactivateForRefund,
  deactivateForWithdrawal,
  effectiveExpiry,
  findExpiredFundedVouchers,
  findVoucherByPayId,
  findVoucherByWithdrawId,
  isVoucherActive,
  listVouchersByCreationHash,
  reactivateWithBalance,
} from '../../src/repositories/vouchers';
import type { Voucher } from '../../src/types';
import { START, createHarness, seedVoucher, type TestHarness } from '../helpers';

const at = (seconds: number) => new Date(START.getTime() + seconds * 1000);

const voucherFixture = (overrides: Partial<Voucher> = {}): Voucher => ({
  pay_id: 'p-1',
  withdraw_id: 'w-1',
  creation_request_hash: null,
  lightning_address: 'alice@wallet.example.com',
  total_paid_msats: 0,
  last_funded_at: null,
  expiry_seconds: 50,
  active: 1,
  created_at: START.toISOString(),
  ...overrides,
});

describe('isVoucherActive', () => {
  it('expires strictly after the absolute expiry when unfunded', () => {
    const voucher = voucherFixture();
    expect(isVoucherActive(voucher, 100, at(100))).toBe(true);
    expect(isVoucherActive(voucher, 100, new Date(at(100).getTime() + 1))).toBe(false);
  });

  it('expires strictly after the relative expiry once funded', () => {
    const voucher = voucherFixture({ last_funded_at: at(10).toISOString(), total_paid_msats: 1000 });
    expect(isVoucherActive(voucher, 1_000, at(60))).toBe(true);
    expect(isVoucherActive(voucher, 1_000, new Date(at(60).getTime() + 1))).toBe(false);
  });

  it('uses the absolute expiry when it comes first', () => {
    const voucher = voucherFixture({ last_funded_at: at(10).toISOString() });
    expect(effectiveExpiry(voucher, 30).toISOString()).toBe(at(30).toISOString());
    expect(isVoucherActive(voucher, 30, at(31))).toBe(false);
  });

  it('is false for a deactivated voucher regardless of time', () => {
    expect(isVoucherActive(voucherFixture({ active: 0 }), 1_000, START)).toBe(false);
  });
});

describe('voucher repository', () => {
  let harness: TestHarness;

  beforeEach(() => {
    harness = createHarness();
  });

  afterEach(() => {
    harness.db.close();
  });

  const credit = (payId: string, paymentHash: string, creditedMsats: number, now = harness.now()) =>
    creditIfActive(
      harness.db,
      { payId, paymentHash, creditedMsats, absoluteExpirySeconds: harness.ctx.settings.absoluteExpirySeconds },
      now,
    );

  const addInvoice = (payId: string, paymentHash: string, creditedMsats: number) =>
    createPayInvoice(harness.db, { payId, paymentHash, amountMsats: creditedMsats + 2000, creditedMsats }, harness.now());

  describe('createVoucherBatch', () => {
    it('creates the vouchers and completes the request atomically', () => {
      const request = createCreationRequest(
        harness.db,
        { paymentHash: 'h-create', lightningAddress: 'bob@wallet.example.com', count: 3, expirySeconds: 600, feeMsats: 30_000 },
        harness.now(),
      );
      const vouchers = createVoucherBatch(harness.db, request, harness.now());

      expect(vouchers).toHaveLength(3);
      expect(new Set(vouchers.map((voucher) => voucher.pay_id)).size).toBe(3);
      expect(listVouchersByCreationHash(harness.db, 'h-create').map((voucher) => voucher.pay_id)).toEqual(
        vouchers.map((voucher) => voucher.pay_id),
      );
      expect(findCreationRequest(harness.db, 'h-create')?.status).toBe('complete');
      const [first] = vouchers;
      expect(findVoucherByWithdrawId(harness.db, first.withdraw_id)).toEqual({
        ...first,
        creation_request_hash: 'h-create',
        lightning_address: 'bob@wallet.example.com',
        total_paid_msats: 0,
        last_funded_at: null,
        expiry_seconds: 600,
        active: 1,
      });
    });

    it('writes nothing for a request that is no longer pending', () => {
      const request = createCreationRequest(
        harness.db,
        { paymentHash: 'h-late', lightningAddress: 'bob@wallet.example.com', count: 2, expirySeconds: 600, feeMsats: 20_000 },
        harness.now(),
      );
      expect(settleCreationRequest(harness.db, 'h-late', 'expired')).toBe(true);
      expect(() => createVoucherBatch(harness.db, request, harness.now())).toThrow('CREATION_REQUEST_NOT_PENDING');
      expect(listVouchersByCreationHash(harness.db, 'h-late')).toEqual([]);
      expect(findCreationRequest(harness.db, 'h-late')?.status).toBe('expired');
    });

    it('never moves a terminal request', () => {
      createCreationRequest(
        harness.db,
        { paymentHash: 'h-done', lightningAddress: 'bob@wallet.example.com', count: 1, expirySeconds: 600, feeMsats: 10_000 },
        harness.now(),
      );
      expect(settleCreationRequest(harness.db, 'h-done', 'complete')).toBe(true);
      expect(settleCreationRequest(harness.db, 'h-done', 'expired')).toBe(false);
      expect(findCreationRequest(harness.db, 'h-done')?.status).toBe('complete');
    });
  });

  describe('creditIfActive', () => {
    it('sums credits while active', () => {
      const voucher = seedVoucher(harness);
      addInvoice(voucher.pay_id, 'h-1', 30_000);
      addInvoice(voucher.pay_id, 'h-2', 12_000);

      expect(credit(voucher.pay_id, 'h-1', 30_000).status).toBe('credited');
      harness.advanceSeconds(5);
      const second = credit(voucher.pay_id, 'h-2', 12_000);

      expect(second.status).toBe('credited');
      const stored = findVoucherByPayId(harness.db, voucher.pay_id);
      expect(stored?.total_paid_msats).toBe(42_000);
      expect(stored?.last_funded_at).toBe(at(5).toISOString());
      expect(listPaidInvoicesByPayId(harness.db, voucher.pay_id).map((invoice) => invoice.payment_hash)).toEqual([
        'h-1',
        'h-2',
      ]);
    });

    it('ignores a duplicate confirmation', () => {
      const voucher = seedVoucher(harness);
      addInvoice(voucher.pay_id, 'h-1', 30_000);
      credit(voucher.pay_id, 'h-1', 30_000);

      expect(credit(voucher.pay_id, 'h-1', 30_000)).toEqual({ status: 'already_paid' });
      expect(findVoucherByPayId(harness.db, voucher.pay_id)?.total_paid_msats).toBe(30_000);
    });

    it('never credits a deactivated voucher', () => {
      const voucher = seedVoucher(harness);
      addInvoice(voucher.pay_id, 'h-1', 30_000);
      addInvoice(voucher.pay_id, 'h-2', 5_000);
      credit(voucher.pay_id, 'h-1', 30_000);
      deactivateForWithdrawal(harness.db, voucher.pay_id);

      const result = credit(voucher.pay_id, 'h-2', 5_000);

      expect(result.status).toBe('inactive');
      expect(findVoucherByPayId(harness.db, voucher.pay_id)?.total_paid_msats).toBe(0);
      expect(findPayInvoiceByHash(harness.db, 'h-2')?.paid).toBe(0);
    });

    it('never credits an expired voucher', () => {
      const voucher = seedVoucher(harness, { expirySeconds: 60 });
      addInvoice(voucher.pay_id, 'h-1', 1_000);
      addInvoice(voucher.pay_id, 'h-2', 1_000);
      credit(voucher.pay_id, 'h-1', 1_000);

      expect(credit(voucher.pay_id, 'h-2', 1_000, at(61)).status).toBe('inactive');
      expect(findVoucherByPayId(harness.db, voucher.pay_id)?.total_paid_msats).toBe(1_000);
    });

    it('does not credit an invoice issued for another voucher', () => {
      const voucher = seedVoucher(harness);
      const other = seedVoucher(harness);
      addInvoice(other.pay_id, 'h-other', 1_000);

      expect(credit(voucher.pay_id, 'h-other', 1_000)).toEqual({ status: 'already_paid' });
      expect(findVoucherByPayId(harness.db, voucher.pay_id)?.total_paid_msats).toBe(0);
    });
  });

  describe('refund bookkeeping', () => {
    it('captures the balance once and can restore it', () => {
      const voucher = seedVoucher(harness);
      addInvoice(voucher.pay_id, 'h-1', 8_000);
      credit(voucher.pay_id, 'h-1', 8_000);

      expect(deactivateForRefund(harness.db, voucher.pay_id)).toBe(8_000);
      expect(deactivateForRefund(harness.db, voucher.pay_id)).toBeNull();
      expect(findVoucherByPayId(harness.db, voucher.pay_id)).toMatchObject({ total_paid_msats: 0, active: 0 });

      reactivateWithBalance(harness.db, voucher.pay_id, 8_000);
      expect(findVoucherByPayId(harness.db, voucher.pay_id)).toMatchObject({ total_paid_msats: 8_000, active: 1 });
    });

    it('has nothing to refund for an empty voucher', () => {
      const voucher = seedVoucher(harness);
      expect(deactivateForRefund(harness.db, voucher.pay_id)).toBeNull();
      expect(findVoucherByPayId(harness.db, voucher.pay_id)?.active).toBe(1);
    });

    it('rejects unknown vouchers', () => {
      expect(() => deactivateForWithdrawal(harness.db, 'missing')).toThrow('voucher not found');
      expect(() => reactivateWithBalance(harness.db, 'missing', 1)).toThrow('voucher not found');
    });
  });

  describe('findExpiredFundedVouchers', () => {
    const ABSOLUTE = 7_200;

    it('lists a funded voucher once its relative expiry has passed', () => {
      const voucher = seedVoucher(harness, { expirySeconds: 3_600 });
      const unfunded = seedVoucher(harness, { expirySeconds: 3_600 });
      addInvoice(voucher.pay_id, 'h-1', 1_000);
      credit(voucher.pay_id, 'h-1', 1_000);

      expect(findExpiredFundedVouchers(harness.db, ABSOLUTE, at(3_599))).toEqual([]);
      expect(findExpiredFundedVouchers(harness.db, ABSOLUTE, at(3_600)).map((v) => v.pay_id)).toEqual([voucher.pay_id]);
      expect(findExpiredFundedVouchers(harness.db, ABSOLUTE, at(9_000)).map((v) => v.pay_id)).not.toContain(
        unfunded.pay_id,
      );
    });

    it('lists a funded voucher once its absolute expiry has passed', () => {
      const voucher = seedVoucher(harness, { expirySeconds: 100_000 });
      addInvoice(voucher.pay_id, 'h-1', 1_000);
      credit(voucher.pay_id, 'h-1', 1_000, at(10));

      expect(findExpiredFundedVouchers(harness.db, ABSOLUTE, at(7_199))).toEqual([]);
      expect(findExpiredFundedVouchers(harness.db, ABSOLUTE, at(7_200)).map((v) => v.pay_id)).toEqual([voucher.pay_id]);
    });

    it('skips deactivated vouchers', () => {
      const voucher = seedVoucher(harness, { expirySeconds: 60 });
      addInvoice(voucher.pay_id, 'h-1', 1_000);
      credit(voucher.pay_id, 'h-1', 1_000);
      deactivateForRefund(harness.db, voucher.pay_id);

      expect(findExpiredFundedVouchers(harness.db, ABSOLUTE, at(120))).toEqual([]);
    });
  });
});
