/**
 * Hash helpers for identities and content digests.
 */
import { createHash } from 'crypto';

/** Hex characters kept from the SHA-256 digest of an identity. */
export const IDENTITY_HASH_LENGTH = 12;

/**
 * SHA-256 over a list of parts. Parts are NUL-separated so that
 * ['ab', 'c'] and ['a', 'bc'] hash differently.
 */
export function hashParts(parts: readonly string[]): string {
  const hash = createHash('sha256');
  for (const part of parts) {
    hash.update(part);
    hash.update('\0');
  }
  return hash.digest('hex');
}

export function shortHash(parts: readonly string[]): string {
  return hashParts(parts).slice(0, IDENTITY_HASH_LENGTH);
}
