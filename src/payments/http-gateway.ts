import { setTimeout as delay } from 'timers/promises';
import { errorMessage, logger } from '../logger';
import { isRecord, parseJSONSafe } from '../utils';
import { GatewayError, type GatewayInvoice, type LightningGateway, type PaymentOutcome, type WaitResult } from './gateway';

export interface HttpGatewayOptions {
  url: string;
  token: string;
  requestTimeoutMs: number;
  pollIntervalMs: number;
}

/** Resolves true after `ms`, false if `signal` aborted first. */
const sleep = async (ms: number, signal: AbortSignal) => {
  try {
    await delay(ms, undefined, { signal });
    return true;
  } catch (error) {
    if (signal.aborted) {
      return false;
    }
    throw error;
  }
};

/**
 * REST client for a Lightning gateway exposing `POST /invoice`,
 * `GET /invoice/:hash` and `POST /pay`, authenticated with a bearer token.
 */
export class HttpLightningGateway implements LightningGateway {
  private readonly url: string;

  constructor(private readonly options: HttpGatewayOptions) {
    this.url = options.url.replace(/\/+$/, '');
  }

  async createInvoice(amountMsats: number, description: string, signal?: AbortSignal): Promise<GatewayInvoice> {
    const text = await this.request('POST', '/invoice', { amount_msats: amountMsats, description }, signal);
    const payload = parseJSONSafe(text);
    if (!isRecord(payload) || typeof payload.payment_hash !== 'string' || typeof payload.invoice !== 'string') {
      throw new GatewayError(`incomplete invoice response: ${text}`);
    }
    if (!payload.payment_hash || !payload.invoice) {
      throw new GatewayError(`incomplete invoice response: ${text}`);
    }
    return { paymentHash: payload.payment_hash, invoice: payload.invoice };
  }

  async waitForPayment(paymentHash: string, signal: AbortSignal): Promise<WaitResult> {
    while (!signal.aborted) {
      if (!(await sleep(this.options.pollIntervalMs, signal))) {
        break;
      }
      try {
        if (await this.isInvoicePaid(paymentHash, signal)) {
          return 'paid';
        }
      } catch (error) {
        logger.debug('Invoice status poll failed', { paymentHash, message: errorMessage(error) });
      }
    }
    return 'cancelled';
  }

  async payInvoice(bolt11: string, signal?: AbortSignal): Promise<PaymentOutcome> {
    let text: string;
    try {
      text = await this.request('POST', '/pay', { invoice: bolt11 }, signal);
    } catch (error) {
      if (error instanceof GatewayError && error.ambiguous) {
        return { status: 'unknown', reason: error.message };
      }
      return { status: 'failed', reason: errorMessage(error) };
    }
    const payload = parseJSONSafe(text);
    // some gateway builds answer a successful payment with an empty body
    if (!isRecord(payload)) {
      return { status: 'succeeded' };
    }
    if (payload.success !== true && typeof payload.error === 'string' && payload.error) {
      return { status: 'failed', reason: payload.error };
    }
    return { status: 'succeeded' };
  }

  private async isInvoicePaid(paymentHash: string, signal: AbortSignal) {
    const text = await this.request('GET', `/invoice/${encodeURIComponent(paymentHash)}`, undefined, signal);
    const payload = parseJSONSafe(text);
    if (!isRecord(payload)) {
      throw new GatewayError(`unreadable invoice status: ${text}`);
    }
    return payload.paid === true;
  }

  private async request(method: 'GET' | 'POST', path: string, body?: Record<string, unknown>, signal?: AbortSignal) {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.requestTimeoutMs);
    const forwardAbort = () => controller.abort();
    signal?.addEventListener('abort', forwardAbort, { once: true });
    if (signal?.aborted) {
      controller.abort();
    }
    const headers: Record<string, string> = {};
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }
    if (this.options.token) {
      headers.Authorization = `Bearer ${this.options.token}`;
    }
    try {
      const response = await fetch(`${this.url}${path}`, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      });
      const text = await response.text();
      if (response.status >= 400) {
        // 502/504 come from a proxy in front of the gateway, which may still have acted
        const ambiguous = response.status === 502 || response.status === 504;
        throw new GatewayError(`gateway ${method} ${path} status ${response.status}: ${text}`, ambiguous);
      }
      return text;
    } catch (error) {
      if (error instanceof GatewayError) {
        throw error;
      }
      if (controller.signal.aborted) {
        throw new GatewayError(`gateway ${method} ${path} timed out or was cancelled`, true);
      }
      throw new GatewayError(`gateway ${method} ${path}: ${errorMessage(error)}`);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', forwardAbort);
    }
  }
}
