/**
 * Point ids
 * Qdrant accepts unsigned integers or UUIDs; pages are keyed by a stable integer
 */

import * as crypto from 'crypto';

/** 13 hex digits = 52 bits, below Number.MAX_SAFE_INTEGER */
const ID_HEX_DIGITS = 13;

/**
 * Deterministic non-negative integer from an MD5 digest of the key.
 * Collisions are unlikely but possible.
 */
export function pointIdFromKey(key: string): number {
  const hash = crypto.createHash('md5').update(key).digest('hex');
  return parseInt(hash.slice(0, ID_HEX_DIGITS), 16);
}

export function pagePointKey(documentId: string, pageNumber: number | string): string {
  return `${documentId}_page_${pageNumber}`;
}
