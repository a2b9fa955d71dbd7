/**
 * Short deterministic digests for signatures, reference ids and tenant keys.
 * MD5 prefixes; not a security boundary.
 */

import { createHash } from 'node:crypto';

export function shortHash(input: string, length: number): string {
  return createHash('md5').update(input).digest('hex').slice(0, length);
}
