export type CreationRequestStatus = 'pending' | 'complete' | 'expired';

export type SessionOutcome = 'succeeded' | 'failed' | 'unknown';

export interface VoucherCreationRequest {
  payment_hash: string;
  lightning_address: string;
  count: number;
  expiry_seconds: number;
  fee_msats: number;
  status: CreationRequestStatus;
  created_at: string;
}

export interface Voucher {
  pay_id: string;
  withdraw_id: string;
  creation_request_hash: string | null;
  lightning_address: string;
  total_paid_msats: number;
  last_funded_at: string | null;
  expiry_seconds: number;
  active: 0 | 1;
  created_at: string;
}

export interface PayInvoice {
  id: string;
  pay_id: string;
  payment_hash: string;
  amount_msats: number;
  credited_msats: number;
  paid: 0 | 1;
  created_at: string;
  paid_at: string | null;
}

export interface WithdrawSession {
  k1: string;
  withdraw_id: string;
  used: 0 | 1;
  outcome: SessionOutcome | null;
  created_at: string;
  used_at: string | null;
}

/** Body every LNURL endpoint answers with on failure, always over HTTP 200. */
export interface LnurlErrorBody {
  status: 'ERROR';
  reason: string;
}

export interface LnurlPayMetadata {
  tag: 'payRequest';
  callback: string;
  minSendable: number;
  maxSendable: number;
  metadata: string;
}

export interface LnurlPayCallback {
  pr: string;
  routes: [];
}

export interface LnurlWithdrawMetadata {
  tag: 'withdrawRequest';
  callback: string;
  k1: string;
  defaultDescription: string;
  minWithdrawable: number;
  maxWithdrawable: number;
}

export interface LnurlOk {
  status: 'OK';
}

export type LnurlResult<T> = T | LnurlErrorBody;

export type Clock = () => Date;
