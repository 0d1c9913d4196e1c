import { createHash } from 'node:crypto'

/**
 * Lowercase hex SHA-256 of a byte sequence. Used for both the workspace state and
 * the stored object so the two can be compared.
 */
export function sha256Hex(contents: Uint8Array): string {
  return createHash('sha256').update(contents).digest('hex')
}
