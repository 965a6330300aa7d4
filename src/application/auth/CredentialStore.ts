// Application: Credential Store
// One-way salted hashing for passwords and verification codes alike

import bcrypt from 'bcryptjs';
import { authLogger, describeError } from '@/utils/logger.js';

export interface CredentialStoreConfig {
  bcryptRounds: number;
}

export class CredentialStore {
  constructor(private readonly config: CredentialStoreConfig = { bcryptRounds: 10 }) {}

  /**
   * Each call draws a fresh salt, so equal inputs give different digests
   */
  async hash(secret: string): Promise<string> {
    return bcrypt.hash(secret, this.config.bcryptRounds);
  }

  /**
   * Returns false for a wrong secret and for a digest that is not a bcrypt hash
   */
  async verify(secret: string, digest: string): Promise<boolean> {
    try {
      return await bcrypt.compare(secret, digest);
    } catch (error) {
      authLogger.debug('Digest comparison failed', { error: describeError(error) });
      return false;
    }
  }
}
