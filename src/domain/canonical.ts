/**
 * Canonical signing string for QWeather request parameters
 */

import type { ParamMap } from './types.js';

/** Query key that carries the request signature */
export const SIGNATURE_KEY = 'sign';
/** Query key of the legacy API-key credential; never signed */
export const CREDENTIAL_KEY = 'key';

const EXCLUDED_KEYS = new Set([SIGNATURE_KEY, CREDENTIAL_KEY]);

/** True for the signature and credential keys, in any letter case */
export function isExcludedKey(key: string): boolean {
  return EXCLUDED_KEYS.has(key.toLowerCase());
}

/**
 * Byte-wise comparison of the UTF-8 encodings of two strings
 *
 * `Array.prototype.sort` compares UTF-16 code units, which orders
 * astral-plane characters differently from their UTF-8 bytes.
 */
export function compareBytes(a: string, b: string): number {
  return Buffer.compare(Buffer.from(a, 'utf8'), Buffer.from(b, 'utf8'));
}

/**
 * Build the string the signature is computed over
 *
 * Entries are sorted by key, the signature and credential keys are skipped
 * (case-insensitively), empty values are skipped, and the rest are joined as
 * `key=value` pairs separated by `&`. Values are used raw, not URL-encoded.
 *
 * @example
 * canonicalize({ t: '1700000000', location: '101010100', pollutant: '' })
 * // => 'location=101010100&t=1700000000'
 */
export function canonicalize(params: ParamMap): string {
  return Object.keys(params)
    .sort(compareBytes)
    .filter((key) => !isExcludedKey(key))
    .filter((key) => params[key] !== '')
    .map((key) => `${key}=${params[key]}`)
    .join('&');
}
