/**
 * Request signing
 *
 * signature = digest(canonicalString + secret), hex encoded in lowercase.
 * The provider uses MD5; the digest is a parameter so the canonicalization
 * contract stays the same if the algorithm changes.
 */

import { createHash } from 'node:crypto';
import { canonicalize, SIGNATURE_KEY } from './canonical.js';
import type { ParamMap } from './types.js';

/**
 * Hash function producing a lowercase hex digest
 */
export type DigestFn = (input: string) => string;

export const md5Hex: DigestFn = (input) =>
  createHash('md5').update(input, 'utf8').digest('hex');

/**
 * Compute the signature for a parameter map. Any `sign` entry already in
 * the map is ignored.
 */
export function computeSignature(
  params: ParamMap,
  secret: string,
  digest: DigestFn = md5Hex
): string {
  return digest(canonicalize(params) + secret).toLowerCase();
}

/**
 * Return a copy of the parameter map with a fresh signature under `sign`
 */
export function signParams(
  params: ParamMap,
  secret: string,
  digest: DigestFn = md5Hex
): ParamMap {
  return {
    ...params,
    [SIGNATURE_KEY]: computeSignature(params, secret, digest),
  };
}
