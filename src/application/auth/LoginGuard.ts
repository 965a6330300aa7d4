// Application: Login guard
// Lockout bookkeeping and the login decision, shared by HTTP and realtime logins

import type { IAccountRepository } from '@/domain/user/repository.js';
import { isAccountLocked, type Account, type LoginCredentials } from '@/domain/user/types.js';
import type { AuthFailureReason } from '@/utils/errors.js';
import { AuthError } from '@/utils/errors.js';
import { authLogger } from '@/utils/logger.js';
import type { CredentialStore } from './CredentialStore.js';

export interface LoginGuardConfig {
  maxLoginAttempts: number;
  lockoutMinutes: number;
  nowMs?: () => number;
}

export type LoginDecision =
  | { status: 'authenticated'; account: Account }
  | { status: 'rejected'; reason: AuthFailureReason };

export interface LoginMetadata {
  ip?: string;
  channel: 'http' | 'realtime';
}

export const LOGIN_REJECTION_MESSAGES: Record<AuthFailureReason, string> = {
  invalid_credentials: 'Invalid username or password',
  locked: 'Account is temporarily locked due to multiple failed login attempts. Please try again later.',
  unverified: 'Email not verified. Please verify your email first.',
};

export class LoginGuard {
  private readonly nowMs: () => number;

  constructor(
    private readonly accounts: IAccountRepository,
    private readonly credentials: CredentialStore,
    private readonly config: LoginGuardConfig = { maxLoginAttempts: 5, lockoutMinutes: 15 }
  ) {
    this.nowMs = config.nowMs ?? (() => Date.now());
  }

  /**
   * Decide a login attempt.
   *
   * The lock is checked before the password, so a locked account is rejected
   * even with the right password and without a hash comparison. An unknown
   * username is indistinguishable from a wrong password.
   */
  async attempt(credentials: LoginCredentials, metadata: LoginMetadata = { channel: 'http' }): Promise<LoginDecision> {
    const now = new Date(this.nowMs());
    const account = await this.accounts.findByUsername(credentials.username);

    if (!account) {
      authLogger.warn('Login failed: user not found', {
        username: credentials.username,
        channel: metadata.channel,
        ip: metadata.ip,
      });
      return { status: 'rejected', reason: 'invalid_credentials' };
    }

    if (isAccountLocked(account, now)) {
      authLogger.warn('Login failed: account locked', {
        accountId: account.id,
        channel: metadata.channel,
        lockedUntil: account.lockedUntil?.toISOString(),
      });
      return { status: 'rejected', reason: 'locked' };
    }

    const passwordMatches = await this.credentials.verify(credentials.password, account.passwordHash);

    if (!passwordMatches) {
      const result = await this.accounts.recordFailedLogin(
        account.id,
        this.config.maxLoginAttempts,
        this.config.lockoutMinutes,
        now
      );

      authLogger.warn('Login failed: invalid password', {
        accountId: account.id,
        channel: metadata.channel,
        ip: metadata.ip,
        attempts: result.attempts,
        locked: result.locked,
      });

      if (result.locked) {
        authLogger.warn('Account locked due to too many failed attempts', {
          accountId: account.id,
          lockedUntil: result.lockedUntil?.toISOString(),
        });
      }

      return { status: 'rejected', reason: 'invalid_credentials' };
    }

    if (!account.isVerified) {
      authLogger.warn('Login failed: email not verified', { accountId: account.id, channel: metadata.channel });
      return { status: 'rejected', reason: 'unverified' };
    }

    // Failures committed during the hash comparison are decided first
    let current = account;
    while (!(await this.accounts.recordSuccessfulLogin(current.id, current.failedLoginAttempts, now))) {
      const fresh = await this.accounts.findById(current.id);
      if (!fresh) {
        return { status: 'rejected', reason: 'invalid_credentials' };
      }
      if (isAccountLocked(fresh, now)) {
        authLogger.warn('Login failed: account locked concurrently', {
          accountId: fresh.id,
          channel: metadata.channel,
          lockedUntil: fresh.lockedUntil?.toISOString(),
        });
        return { status: 'rejected', reason: 'locked' };
      }
      current = fresh;
    }

    authLogger.info('Login succeeded', { accountId: current.id, channel: metadata.channel, ip: metadata.ip });

    return {
      status: 'authenticated',
      account: { ...current, failedLoginAttempts: 0, lockedUntil: null, lastLoginAt: now },
    };
  }

  /**
   * Like attempt(), but rejections surface as AuthError
   */
  async login(credentials: LoginCredentials, metadata?: LoginMetadata): Promise<Account> {
    const decision = await this.attempt(credentials, metadata);
    if (decision.status === 'rejected') {
      throw new AuthError(LOGIN_REJECTION_MESSAGES[decision.reason], decision.reason);
    }
    return decision.account;
  }
}
