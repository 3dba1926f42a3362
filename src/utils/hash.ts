/**
 * SHA-256 Hash Utilities
 *
 * All hashes use the format: 'sha256:' + 64-character lowercase hex string.
 *
 * @module utils/hash
 */

import crypto from 'crypto';

const HASH_PREFIX = 'sha256:';

/**
 * Compute SHA-256 hash of content
 *
 * @example
 * computeHash('hello')
 * // Returns: 'sha256:2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824'
 */
export function computeHash(content: string | Buffer): string {
  return HASH_PREFIX + crypto.createHash('sha256').update(content).digest('hex');
}

/**
 * Derive the document_id for a listed path.
 *
 * Depends on the path only: the same across runs and known before the
 * document is read.
 */
export function documentIdForPath(documentPath: string): string {
  return computeHash(documentPath);
}
