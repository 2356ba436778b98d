import dotenv from 'dotenv';
import path from 'path';

dotenv.config();

export interface VoucherSettings {
  baseUrl: string;
  feePerVoucherSats: number;
  fundingFeeMinMsats: number;
  fundingFeePercent: number;
  maxVouchersPerRequest: number;
  absoluteExpirySeconds: number;
  defaultRelativeExpirySeconds: number;
  minPayAmountSats: number;
  maxPayAmountSats: number;
  paymentWaitTimeoutMs: number;
  payTimeoutMs: number;
}

export interface ServiceConfig {
  port: number;
  databasePath: string;
  sandbox: boolean;
  invoiceRateLimitPerMinute: number;
  refundIntervalMs: number;
  gateway: {
    url: string;
    token: string;
    requestTimeoutMs: number;
    pollIntervalMs: number;
  };
  vouchers: VoucherSettings;
}

type Env = Record<string, string | undefined>;

const rootDir = process.cwd();

const resolvePath = (value: string, fallback: string) => {
  if (!value) {
    return fallback;
  }
  if (path.isAbsolute(value)) {
    return value;
  }
  return path.join(rootDir, value);
};

const readInt = (env: Env, key: string, fallback: number) => {
  const raw = env[key];
  if (!raw) {
    return fallback;
  }
  const value = Number.parseInt(raw, 10);
  if (!Number.isFinite(value)) {
    throw new Error(`INVALID_CONFIG:${key}`);
  }
  return value;
};

const readFloat = (env: Env, key: string, fallback: number) => {
  const raw = env[key];
  if (!raw) {
    return fallback;
  }
  const value = Number.parseFloat(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`INVALID_CONFIG:${key}`);
  }
  return value;
};

export const loadConfig = (env: Env = process.env): ServiceConfig => ({
  port: readInt(env, 'PORT', 3000),
  databasePath: resolvePath(env.DATABASE_PATH ?? '', path.join(rootDir, 'storage', 'vouchers.db')),
  sandbox: (env.PAYMENT_SANDBOX ?? 'true').toLowerCase() === 'true',
  invoiceRateLimitPerMinute: readInt(env, 'INVOICE_RATE_LIMIT_PER_MINUTE', 30),
  refundIntervalMs: readInt(env, 'REFUND_INTERVAL_MS', 24 * 60 * 60 * 1000),
  gateway: {
    url: (env.GATEWAY_URL ?? 'http://localhost:8080').replace(/\/+$/, ''),
    token: env.GATEWAY_TOKEN ?? '',
    requestTimeoutMs: readInt(env, 'GATEWAY_REQUEST_TIMEOUT_MS', 30_000),
    pollIntervalMs: readInt(env, 'PAYMENT_POLL_INTERVAL_MS', 2_000),
  },
  vouchers: {
    baseUrl: (env.BASE_URL ?? 'http://localhost:3000').replace(/\/+$/, ''),
    feePerVoucherSats: readInt(env, 'FEE_PER_VOUCHER_SATS', 10),
    fundingFeeMinMsats: readInt(env, 'FUNDING_FEE_MIN_MSATS', 2000),
    fundingFeePercent: readFloat(env, 'FUNDING_FEE_PERCENT', 0.004),
    maxVouchersPerRequest: readInt(env, 'MAX_VOUCHERS_PER_REQUEST', 10),
    absoluteExpirySeconds: readInt(env, 'VOUCHER_ABSOLUTE_EXPIRY_SECS', 365 * 24 * 60 * 60),
    defaultRelativeExpirySeconds: readInt(env, 'DEFAULT_RELATIVE_EXPIRY_SECS', 30 * 24 * 60 * 60),
    minPayAmountSats: readInt(env, 'MIN_VOUCHER_PAY_AMOUNT_SATS', 100),
    maxPayAmountSats: readInt(env, 'MAX_VOUCHER_PAY_AMOUNT_SATS', 200_000),
    paymentWaitTimeoutMs: readInt(env, 'PAYMENT_WAIT_TIMEOUT_MS', 60 * 60 * 1000),
    payTimeoutMs: readInt(env, 'PAY_TIMEOUT_MS', 60_000),
  },
});

export const config: ServiceConfig = loadConfig();
