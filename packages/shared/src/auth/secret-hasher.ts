import { createHmac, randomBytes, randomInt, timingSafeEqual } from 'node:crypto';
import { type SecretHasher } from '@bookwell/domain';

export function generateOpaqueToken(bytes = 32): string {
  return randomBytes(bytes).toString('base64url');
}

export function generateNumericCode(digits = 6): string {
  return randomInt(0, 10 ** digits).toString().padStart(digits, '0');
}

/**
 * HMAC-SHA256 keyed with a server-side pepper. A leaked table of hashes is
 * useless without the pepper, and lookups stay exact-match on the hex digest.
 */
export class PepperedSecretHasher implements SecretHasher {
  private readonly pepper: Buffer;

  constructor(
    pepper: string,
    private readonly generator: () => string = generateOpaqueToken,
  ) {
    if (pepper.length === 0) {
      throw new Error('pepper must not be empty');
    }
    this.pepper = Buffer.from(pepper, 'utf-8');
  }

  generate(): string {
    return this.generator();
  }

  hash(raw: string): string {
    return createHmac('sha256', this.pepper).update(raw, 'utf-8').digest('hex');
  }

  matches(raw: string, hash: string): boolean {
    const expected = Buffer.from(this.hash(raw), 'hex');
    const actual = Buffer.from(hash, 'hex');
    return expected.length === actual.length && timingSafeEqual(expected, actual);
  }
}
