import { bech32 } from 'bech32';
import { LnurlEncodingError } from '../errors';
import { errorMessage } from '../logger';

const HRP = 'lnurl';
const URI_SCHEME = /^lightning:/i;
// LNURLs routinely exceed the 90-character limit of segwit addresses.
const LENGTH_LIMIT = 2000;

/** Encodes a URL as an upper-case LNURL bech32 string. */
export const encodeLnurl = (url: string) => {
  const words = bech32.toWords(Buffer.from(url, 'utf8'));
  return bech32.encode(HRP, words, LENGTH_LIMIT).toUpperCase();
};

/** Decodes an LNURL bech32 string (optionally `lightning:`-prefixed) back to its URL. */
export const decodeLnurl = (lnurl: string) => {
  const input = lnurl.trim().replace(URI_SCHEME, '');
  let decoded: { prefix: string; words: number[] };
  try {
    decoded = bech32.decode(input, LENGTH_LIMIT);
  } catch (error) {
    throw new LnurlEncodingError(errorMessage(error));
  }
  if (decoded.prefix !== HRP) {
    throw new LnurlEncodingError(`unexpected prefix "${decoded.prefix}"`);
  }
  const bytes = bech32.fromWordsUnsafe(decoded.words);
  if (!bytes) {
    throw new LnurlEncodingError('invalid padding in bit conversion');
  }
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(Uint8Array.from(bytes));
  } catch (error) {
    throw new LnurlEncodingError('payload is not valid UTF-8');
  }
};
