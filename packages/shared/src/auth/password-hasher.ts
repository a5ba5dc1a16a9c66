import { hash, verify } from '@node-rs/argon2';
import { type PasswordHasher } from '@bookwell/domain';

export interface Argon2Params {
  /** KiB. */
  memoryCost: number;
  timeCost: number;
  parallelism: number;
}

// OWASP baseline for argon2id.
const DEFAULT_PARAMS: Argon2Params = {
  memoryCost: 19456,
  timeCost: 2,
  parallelism: 1,
};

const ARGON2ID_PHC = /^\$argon2id\$v=19\$m=(\d+),t=(\d+),p=(\d+)\$/;

export class Argon2PasswordHasher implements PasswordHasher {
  private readonly params: Argon2Params;

  constructor(params: Partial<Argon2Params> = {}) {
    this.params = { ...DEFAULT_PARAMS, ...params };
  }

  async hash(password: string): Promise<string> {
    return hash(password, { ...this.params, outputLen: 32 });
  }

  /** A malformed stored hash verifies as false rather than throwing. */
  async verify(password: string, passwordHash: string): Promise<boolean> {
    try {
      return await verify(passwordHash, password);
    } catch {
      return false;
    }
  }

  /**
   * Stored hashes carry the parameters they were made with; anything that is
   * not argon2id at the current cost gets upgraded on the next good login.
   */
  needsRehash(passwordHash: string): boolean {
    const match = ARGON2ID_PHC.exec(passwordHash);
    if (!match) return true;
    const [, memoryCost, timeCost, parallelism] = match;
    return (
      Number(memoryCost) !== this.params.memoryCost ||
      Number(timeCost) !== this.params.timeCost ||
      Number(parallelism) !== this.params.parallelism
    );
  }
}
