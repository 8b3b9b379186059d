/**
 * Credential hashing with bcrypt.
 *
 * Each hash embeds its own random salt and work factor, so hashing the same
 * secret twice gives different strings that both verify.
 */

import bcrypt from "bcrypt";

/** Default work factor: 2^10 iterations */
export const DEFAULT_BCRYPT_ROUNDS = 10;

/** Shape of a bcrypt hash: $2a$/$2b$/$2y$, two-digit cost, 53 chars of salt+digest */
const BCRYPT_HASH_PATTERN = /^\$2[aby]\$\d{2}\$[./A-Za-z0-9]{53}$/;

export class CredentialStore {
  readonly rounds: number;

  constructor(rounds: number = DEFAULT_BCRYPT_ROUNDS) {
    if (!Number.isInteger(rounds) || rounds < 4 || rounds > 31) {
      throw new RangeError(`bcrypt rounds must be an integer between 4 and 31 (got ${rounds})`);
    }
    this.rounds = rounds;
  }

  hash(secret: string): Promise<string> {
    return bcrypt.hash(secret, this.rounds);
  }

  /**
   * Compare a secret with a stored hash. bcrypt's compare is constant-time
   * over the digest. A hash that is not a bcrypt string verifies as false.
   */
  async verify(secret: string, hash: string): Promise<boolean> {
    if (!BCRYPT_HASH_PATTERN.test(hash)) {
      return false;
    }
    return bcrypt.compare(secret, hash);
  }
}
