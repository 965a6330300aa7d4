// Domain: Account repository interface
// Defines the contract for account persistence

import type { Account, NewAccount } from './types.js';

export interface FailedLoginResult {
  attempts: number;
  locked: boolean;
  lockedUntil: Date | null;
}

/**
 * Repository interface for Account persistence.
 * Every mutating method is atomic: it either commits fully or leaves no trace.
 */
export interface IAccountRepository {
  findById(id: string): Promise<Account | null>;
  findByUsername(username: string): Promise<Account | null>;
  findByEmail(email: string): Promise<Account | null>;
  count(): Promise<number>;

  /** Rejects a username collision first, then an email collision (ConflictError). */
  create(data: NewAccount): Promise<Account>;

  /**
   * Marks the account verified and clears its code, provided the pending code
   * is still the one that was checked. Returns false when it changed meanwhile.
   */
  markVerified(id: string, expectedCodeHash: string): Promise<boolean>;
  /** Returns false, leaving the account untouched, once it is verified. */
  replaceVerificationCode(id: string, codeHash: string, expiresAt: Date): Promise<boolean>;

  // Lockout bookkeeping
  recordFailedLogin(
    id: string,
    maxAttempts: number,
    lockoutMinutes: number,
    now: Date
  ): Promise<FailedLoginResult>;
  /**
   * Clears the counter and any elapsed lock. Returns false when a lock is in
   * force or the counter moved away from `expectedFailedAttempts`.
   */
  recordSuccessfulLogin(id: string, expectedFailedAttempts: number, now: Date): Promise<boolean>;
}
