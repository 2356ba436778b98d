import type Database from 'better-sqlite3';
import { vi } from 'vitest';
import type { VoucherSettings } from '../src/config';
import { openDatabase } from '../src/db';
import type { GatewayInvoice, LightningGateway, PaymentOutcome, WaitResult } from '../src/payments';
import { createCreationRequest } from '../src/repositories/creation-requests';
import { createPayInvoice } from '../src/repositories/pay-invoices';
import { createVoucherBatch, creditIfActive } from '../src/repositories/vouchers';
import type { VoucherContext } from '../src/services/context';
import { BackgroundTasks } from '../src/tasks/background-tasks';
import type { Voucher } from '../src/types';

export const START = new Date('2026-01-15T12:00:00.000Z');

export const testSettings: VoucherSettings = {
  baseUrl: 'https://vouchers.example.com',
  feePerVoucherSats: 10,
  fundingFeeMinMsats: 2000,
  fundingFeePercent: 0.004,
  maxVouchersPerRequest: 10,
  absoluteExpirySeconds: 365 * 24 * 60 * 60,
  defaultRelativeExpirySeconds: 30 * 24 * 60 * 60,
  minPayAmountSats: 1,
  maxPayAmountSats: 200_000,
  paymentWaitTimeoutMs: 5_000,
  payTimeoutMs: 5_000,
};

/**
 * In-memory gateway. Invoices get sequential hashes; a wait stays pending
 * until the test calls {@link FakeGateway.settle} or the task is aborted.
 */
export class FakeGateway implements LightningGateway {
  private nextInvoice = 1;
  private readonly waiters = new Map<string, (result: WaitResult) => void>();

  createInvoice = vi.fn(async (amountMsats: number, _description: string): Promise<GatewayInvoice> => {
    const n = this.nextInvoice;
    this.nextInvoice += 1;
    return { paymentHash: `hash-${n}`, invoice: `lnbcrt${amountMsats}n1fake${n}` };
  });

  waitForPayment = vi.fn(
    (paymentHash: string, signal: AbortSignal) =>
      new Promise<WaitResult>((resolve) => {
        this.waiters.set(paymentHash, resolve);
        signal.addEventListener('abort', () => resolve('cancelled'), { once: true });
      }),
  );

  payInvoice = vi.fn(async (_bolt11: string, _signal?: AbortSignal): Promise<PaymentOutcome> => ({ status: 'succeeded' }));

  isWaiting(paymentHash: string) {
    return this.waiters.has(paymentHash);
  }

  settle(paymentHash: string, result: WaitResult = 'paid') {
    const resolve = this.waiters.get(paymentHash);
    if (!resolve) {
      throw new Error(`nothing is waiting on ${paymentHash}`);
    }
    this.waiters.delete(paymentHash);
    resolve(result);
  }
}

export interface TestHarness {
  ctx: VoucherContext;
  db: Database.Database;
  gateway: FakeGateway;
  tasks: BackgroundTasks;
  now: () => Date;
  setNow: (value: Date) => void;
  advanceSeconds: (seconds: number) => void;
}

export const createHarness = (overrides: Partial<VoucherSettings> = {}): TestHarness => {
  const db = openDatabase(':memory:');
  const gateway = new FakeGateway();
  const tasks = new BackgroundTasks();
  let current = START;
  const ctx: VoucherContext = {
    db,
    gateway,
    tasks,
    settings: { ...testSettings, ...overrides },
    clock: () => current,
  };
  return {
    ctx,
    db,
    gateway,
    tasks,
    now: () => current,
    setNow: (value) => {
      current = value;
    },
    advanceSeconds: (seconds) => {
      current = new Date(current.getTime() + seconds * 1000);
    },
  };
};

let seeded = 0;

/** Creates a completed creation request with `count` fresh vouchers. */
export const seedVouchers = (
  harness: TestHarness,
  options: { count?: number; expirySeconds?: number; lightningAddress?: string } = {},
): Voucher[] => {
  seeded += 1;
  const request = createCreationRequest(
    harness.db,
    {
      paymentHash: `seed-${seeded}`,
      lightningAddress: options.lightningAddress ?? 'alice@wallet.example.com',
      count: options.count ?? 1,
      expirySeconds: options.expirySeconds ?? 3600,
      feeMsats: 10_000,
    },
    harness.now(),
  );
  return createVoucherBatch(harness.db, request, harness.now());
};

export const seedVoucher = (
  harness: TestHarness,
  options: { expirySeconds?: number; lightningAddress?: string } = {},
): Voucher => {
  const [voucher] = seedVouchers(harness, { ...options, count: 1 });
  return voucher;
};

export const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

/** A fetch stub that serves a lightning address's LNURL-Pay endpoint and its callback. */
export const lightningAddressFetch = (params: { minSendable: number; maxSendable: number; pr?: string }) =>
  vi.fn(async (input: string | URL | Request) => {
    const url = String(input);
    if (url.includes('/.well-known/lnurlp/')) {
      return jsonResponse({
        tag: 'payRequest',
        callback: 'https://wallet.example.com/lnurlp/alice/callback',
        minSendable: params.minSendable,
        maxSendable: params.maxSendable,
        metadata: '[["text/plain","alice"]]',
      });
    }
    return jsonResponse({ pr: params.pr ?? 'lnbc-refund-invoice', routes: [] });
  });

/** Lets spawned background tasks reach their first await. */
export const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

export const addFundedInvoice = (harness: TestHarness, payId: string, paymentHash: string, creditedMsats: number) =>
  createPayInvoice(harness.db, { payId, paymentHash, amountMsats: creditedMsats + 2000, creditedMsats }, harness.now());

/** Funds a voucher directly through the store, as a confirmed invoice would. */
export const fundVoucher = (harness: TestHarness, payId: string, creditedMsats: number, paymentHash = `fund-${payId}`) => {
  addFundedInvoice(harness, payId, paymentHash, creditedMsats);
  return creditIfActive(
    harness.db,
    { payId, paymentHash, creditedMsats, absoluteExpirySeconds: harness.ctx.settings.absoluteExpirySeconds },
    harness.now(),
  );
};

/** Wallet invoices with made-up signatures, for 48,000 msats, 50,000 msats and no amount. */
export const WALLET_INVOICE =
  'lnbc480n1p5k34kqpp5quyqjzstpsxsurcszyfpx9q4zct3sxg6rvwp68slyqsjygeyy5nqpy82dsnkeulz9gtw35h6aqrxfv0j4cm7py82dsnkeulz9gtw35h6aqrxfv0j4cm7py82dsnkeulz9gtw35h6aqrxfv0j4cm7py82dsnkv4atkn';
export const OVERSIZED_WALLET_INVOICE =
  'lnbc500n1p5k34kqpp5pc83qygjzv2p29shrqv35xcur50p7gppyg3jgffxyu5zj23t9sksz9gtw35h6aqrxfv0j4cm7py82dsnkeulz9gtw35h6aqrxfv0j4cm7py82dsnkeulz9gtw35h6aqrxfv0j4cm7py82dsnkeulz9gtw35h4f2hhn';
export const AMOUNTLESS_WALLET_INVOICE =
  'lnbc1p5k34kqpp5z5tpwxqergd3c8g7ruszzg3rysjjvfeg9y4zktpd9chnqvfjxv6qrxfv0j4cm7py82dsnkeulz9gtw35h6aqrxfv0j4cm7py82dsnkeulz9gtw35h6aqrxfv0j4cm7py82dsnkeulz9gtw35h6aqrxfv0j4cnw8hcy';
