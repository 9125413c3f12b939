import crypto from 'node:crypto';

const HASH_PREFIX = 'sha256:';

/** Raw hex SHA-256 of bytes or UTF-8 text. */
export function sha256Hex(data: string | Uint8Array): string {
  return crypto.createHash('sha256').update(data).digest('hex');
}

/** Prefixed content hash ("sha256:<hex>"). */
export function contentHash(content: string | Uint8Array): string {
  return `${HASH_PREFIX}${sha256Hex(content)}`;
}

export function stripHashPrefix(hash: string): string {
  return hash.startsWith(HASH_PREFIX) ? hash.slice(HASH_PREFIX.length) : hash;
}
