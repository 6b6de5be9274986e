import { createHash } from 'node:crypto';

export type HashInput = string | Uint8Array;

/**
 * MD5 digest as a lowercase hex string.
 * Only used where a remote service dictates it (request signing); not for secrets at rest.
 */
export function md5(input: HashInput): string {
  const hash = createHash('md5');
  if (typeof input === 'string') {
    hash.update(input, 'utf8');
  } else {
    hash.update(input);
  }
  return hash.digest('hex');
}
