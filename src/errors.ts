export type ServiceErrorKind = 'validation' | 'not_found' | 'conflict' | 'gateway' | 'storage';

export const httpStatusFor: Record<ServiceErrorKind, number> = {
  validation: 400,
  not_found: 404,
  conflict: 409,
  gateway: 502,
  storage: 500,
};

/** Base error for every failure a flow reports to its caller. */
export class ServiceError extends Error {
  constructor(
    public readonly kind: ServiceErrorKind,
    public readonly code: string,
    message?: string,
  ) {
    super(message ?? code);
    this.name = 'ServiceError';
  }
}

export type WithdrawSessionErrorCode =
  | 'SESSION_NOT_FOUND'
  | 'SESSION_MISMATCH'
  | 'SESSION_ALREADY_USED'
  | 'WITHDRAWAL_IN_PROGRESS';

/** A `k1` that cannot be consumed. Wallets see one reason for every code. */
export class WithdrawSessionError extends ServiceError {
  constructor(public readonly sessionCode: WithdrawSessionErrorCode) {
    super('conflict', sessionCode, 'invalid or already-used k1');
    this.name = 'WithdrawSessionError';
  }
}

/** Malformed bech32 / LNURL input. */
export class LnurlEncodingError extends Error {
  constructor(public readonly reason: string) {
    super(`Invalid LNURL: ${reason}`);
    this.name = 'LnurlEncodingError';
  }
}

/** Lightning address could not be resolved to a payable invoice. */
export class LightningAddressError extends Error {
  constructor(
    public readonly address: string,
    public readonly reason: string,
  ) {
    super(`Lightning address ${address}: ${reason}`);
    this.name = 'LightningAddressError';
  }
}

export const validationError = (message: string) => new ServiceError('validation', 'INVALID_REQUEST', message);

export const voucherNotFound = () => new ServiceError('not_found', 'VOUCHER_NOT_FOUND', 'voucher not found');

export const inactiveVoucher = () => new ServiceError('conflict', 'VOUCHER_INACTIVE', 'voucher is not active');
