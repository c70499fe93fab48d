import { createHash } from 'node:crypto';

/**
 * Calculate MD5 checksum of binary data
 *
 * @param buffer - Binary data to hash
 * @returns 32-character lowercase hex string
 */
export const calculateMD5 = (buffer: ArrayBuffer | Uint8Array): string => {
  const bytes = buffer instanceof Uint8Array ? buffer : new Uint8Array(buffer);
  return createHash('md5').update(bytes).digest('hex');
};
