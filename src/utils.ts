import { randomBytes, randomUUID } from 'crypto';

export const generateId = () => randomUUID();

/** 32 random bytes, hex encoded: the LNURL-Withdraw `k1`. */
export const generateK1 = () => randomBytes(32).toString('hex');

export const nowISOString = (now: Date = new Date()) => now.toISOString();

export const satsToMsats = (sats: number) => sats * 1000;

export const msatsToSats = (msats: number) => Math.floor(msats / 1000);

export const addSeconds = (iso: string, seconds: number) => new Date(Date.parse(iso) + seconds * 1000);

export const parseJSONSafe = (value: string | null): unknown => {
  if (!value) {
    return null;
  }
  try {
    return JSON.parse(value);
  } catch (error) {
    return null;
  }
};

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);
