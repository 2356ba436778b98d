import { describe, it, expect } from 'vitest';
import { ServiceError } from '../../src/errors';
import { invoiceAmountMsats } from '../../src/lnurl/bolt11';
import { AMOUNTLESS_WALLET_INVOICE, OVERSIZED_WALLET_INVOICE, WALLET_INVOICE } from '../helpers';

describe('invoiceAmountMsats', () => {
  it('reads the amount from the human-readable part', () => {
    expect(invoiceAmountMsats(WALLET_INVOICE)).toBe(48_000);
    expect(invoiceAmountMsats(OVERSIZED_WALLET_INVOICE)).toBe(50_000);
  });

  it('returns null for an invoice without an amount', () => {
    expect(invoiceAmountMsats(AMOUNTLESS_WALLET_INVOICE)).toBeNull();
  });

  it('rejects strings that are not BOLT-11 invoices', () => {
    expect(() => invoiceAmountMsats('lnbc1notaninvoice')).toThrow(ServiceError);
    expect(() => invoiceAmountMsats('hello')).toThrow('invalid payment request');
  });
});
