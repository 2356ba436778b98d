export interface GatewayInvoice {
  paymentHash: string;
  /** BOLT-11 payment request. */
  invoice: string;
}

export type WaitResult = 'paid' | 'cancelled';

/**
 * Result of paying an invoice. `unknown` means the request timed out or was
 * cancelled after it may have reached the gateway: the payment may or may not
 * have gone through.
 */
export type PaymentOutcome =
  | { status: 'succeeded' }
  | { status: 'failed'; reason: string }
  | { status: 'unknown'; reason: string };

/** The Lightning backend that creates, confirms and sends payments. */
export interface LightningGateway {
  createInvoice(amountMsats: number, description: string, signal?: AbortSignal): Promise<GatewayInvoice>;
  /** Resolves once the invoice is paid, or with `cancelled` when `signal` aborts. */
  waitForPayment(paymentHash: string, signal: AbortSignal): Promise<WaitResult>;
  payInvoice(bolt11: string, signal?: AbortSignal): Promise<PaymentOutcome>;
}

export class GatewayError extends Error {
  constructor(
    message: string,
    public readonly ambiguous = false,
  ) {
    super(message);
    this.name = 'GatewayError';
  }
}
