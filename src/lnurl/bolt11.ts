import { decode } from 'light-bolt11-decoder';
import { validationError } from '../errors';

/**
 * Amount a BOLT-11 payment request asks for, in msats, or null when the
 * invoice leaves the amount to the payer.
 */
export const invoiceAmountMsats = (paymentRequest: string): number | null => {
  let sections: ReturnType<typeof decode>['sections'];
  try {
    sections = decode(paymentRequest).sections;
  } catch (error) {
    throw validationError('invalid payment request');
  }
  const amount = sections.find((section) => section.name === 'amount');
  if (!amount || !('value' in amount)) {
    return null;
  }
  const msats = Number(amount.value);
  if (!Number.isSafeInteger(msats) || msats <= 0) {
    throw validationError('invalid payment request amount');
  }
  return msats;
};
