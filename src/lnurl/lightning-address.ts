import { LightningAddressError } from '../errors';
import { errorMessage } from '../logger';
import { isRecord } from '../utils';

export const LIGHTNING_ADDRESS_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;

const DEFAULT_TIMEOUT_MS = 15_000;

export interface LnurlPayParams {
  callback: string;
  minSendable: number;
  maxSendable: number;
}

export const isLightningAddress = (value: unknown): value is string =>
  typeof value === 'string' && LIGHTNING_ADDRESS_PATTERN.test(value);

export const lightningAddressUrl = (address: string) => {
  const parts = address.split('@');
  if (parts.length !== 2 || !parts[0] || !parts[1]) {
    throw new LightningAddressError(address, 'invalid lightning address');
  }
  const [user, domain] = parts;
  return `https://${domain}/.well-known/lnurlp/${encodeURIComponent(user)}`;
};

const getJSON = async (address: string, url: string, timeoutMs: number) => {
  let response: Response;
  try {
    response = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
  } catch (error) {
    throw new LightningAddressError(address, `request failed: ${errorMessage(error)}`);
  }
  const text = await response.text();
  if (response.status !== 200) {
    throw new LightningAddressError(address, `status ${response.status}`);
  }
  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch (error) {
    throw new LightningAddressError(address, 'response is not JSON');
  }
  if (!isRecord(payload)) {
    throw new LightningAddressError(address, 'response is not a JSON object');
  }
  if (payload.status === 'ERROR') {
    const reason = typeof payload.reason === 'string' ? payload.reason : 'unknown';
    throw new LightningAddressError(address, `LNURL error: ${reason}`);
  }
  return payload;
};

/** Resolves `user@domain` to its LNURL-Pay endpoint (LUD-16). */
export const resolveLightningAddress = async (
  address: string,
  timeoutMs = DEFAULT_TIMEOUT_MS,
): Promise<LnurlPayParams> => {
  const payload = await getJSON(address, lightningAddressUrl(address), timeoutMs);
  const { callback, minSendable, maxSendable } = payload;
  if (typeof callback !== 'string' || !callback) {
    throw new LightningAddressError(address, 'empty callback');
  }
  if (typeof minSendable !== 'number' || typeof maxSendable !== 'number') {
    throw new LightningAddressError(address, 'missing sendable bounds');
  }
  return { callback, minSendable, maxSendable };
};

/** Asks an LNURL-Pay callback for a BOLT-11 invoice of `amountMsats`. */
export const requestInvoiceFromCallback = async (
  address: string,
  callback: string,
  amountMsats: number,
  timeoutMs = DEFAULT_TIMEOUT_MS,
) => {
  const separator = callback.includes('?') ? '&' : '?';
  const payload = await getJSON(address, `${callback}${separator}amount=${amountMsats}`, timeoutMs);
  if (typeof payload.pr !== 'string' || !payload.pr) {
    throw new LightningAddressError(address, 'empty invoice from callback');
  }
  return payload.pr;
};
