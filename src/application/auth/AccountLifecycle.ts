// Application: Account lifecycle
// Signup, email verification and verification-code resend

import { randomInt } from 'crypto';
import type { IAccountRepository } from '@/domain/user/repository.js';
import type { SignupData } from '@/domain/user/types.js';
import type { MailDispatcher } from '@/infrastructure/mail/MailDispatcher.js';
import type { CredentialStore } from './CredentialStore.js';
import {
  EmailSchema,
  PasswordSchema,
  UsernameSchema,
  normalizeEmail,
  validate,
} from './validation.js';
import { NotFoundError, ValidationError } from '@/utils/errors.js';
import { authLogger, describeError, mailLogger } from '@/utils/logger.js';

export const VERIFICATION_CODE_LENGTH = 6;

export interface AccountLifecycleConfig {
  verificationCodeTtlHours: number;
  nowMs?: () => number;
  codeGenerator?: () => string;
}

export interface SignupResult {
  accountId: string;
  username: string;
  email: string;
}

export interface VerificationOutcome {
  alreadyVerified: boolean;
}

/**
 * Uniform six-digit code, leading zeros kept
 */
export function generateVerificationCode(): string {
  return String(randomInt(0, 10 ** VERIFICATION_CODE_LENGTH)).padStart(VERIFICATION_CODE_LENGTH, '0');
}

export class AccountLifecycle {
  private readonly nowMs: () => number;
  private readonly codeGenerator: () => string;

  constructor(
    private readonly accounts: IAccountRepository,
    private readonly credentials: CredentialStore,
    private readonly mailer: MailDispatcher,
    private readonly config: AccountLifecycleConfig = { verificationCodeTtlHours: 24 }
  ) {
    this.nowMs = config.nowMs ?? (() => Date.now());
    this.codeGenerator = config.codeGenerator ?? generateVerificationCode;
  }

  /**
   * Register an unverified account and mail it a verification code.
   * Mail failure is logged and never fails the signup.
   */
  async signup(data: SignupData): Promise<SignupResult> {
    const username = validate(UsernameSchema, data.username);
    const email = validate(EmailSchema, data.email);
    const password = validate(PasswordSchema, data.password);

    const passwordHash = await this.credentials.hash(password);
    const { code, codeHash, expiresAt } = await this.issueCode();

    const account = await this.accounts
      .create({
        username,
        email,
        passwordHash,
        verificationCodeHash: codeHash,
        verificationCodeExpiresAt: expiresAt,
      })
      .catch((error: unknown) => {
        authLogger.warn('Signup failed', { username, email, error: describeError(error) });
        throw error;
      });

    this.dispatchCode(account.email, code);
    authLogger.info('New user registered', { accountId: account.id, username: account.username });

    return {
      accountId: account.id,
      username: account.username,
      email: account.email,
    };
  }

  /**
   * Confirm an email address. Retrying after success is a no-op success.
   */
  async verifyEmail(email: string, code: string): Promise<VerificationOutcome> {
    const normalized = normalizeEmail(email);
    const account = await this.accounts.findByEmail(normalized);

    if (!account) {
      authLogger.warn('Email verification failed: user not found', { email: normalized });
      throw new NotFoundError('User not found');
    }

    if (account.isVerified) {
      return { alreadyVerified: true };
    }

    if (!account.verificationCodeHash || !account.verificationCodeExpiresAt) {
      authLogger.warn('Email verification failed: no code set', { accountId: account.id });
      throw new ValidationError('No verification code found. Please request a new one.');
    }

    if (this.nowMs() > account.verificationCodeExpiresAt.getTime()) {
      authLogger.warn('Email verification failed: code expired', { accountId: account.id });
      throw new ValidationError('Verification code expired. Please request a new one.');
    }

    const matches = await this.credentials.verify(code.trim(), account.verificationCodeHash);
    if (!matches) {
      authLogger.warn('Email verification failed: invalid code', { accountId: account.id });
      throw new ValidationError('Invalid verification code');
    }

    // A resend between the check and the commit invalidates the code just checked
    const committed = await this.accounts.markVerified(account.id, account.verificationCodeHash);
    if (!committed) {
      authLogger.warn('Email verification failed: code replaced concurrently', { accountId: account.id });
      throw new ValidationError('Invalid verification code');
    }

    authLogger.info('Email verified', { accountId: account.id });
    return { alreadyVerified: false };
  }

  /**
   * Replace any pending code with a fresh one and mail it again
   */
  async resendVerification(email: string): Promise<VerificationOutcome> {
    const normalized = normalizeEmail(email);
    const account = await this.accounts.findByEmail(normalized);

    if (!account) {
      authLogger.warn('Resend verification failed: user not found', { email: normalized });
      throw new NotFoundError('User not found');
    }

    if (account.isVerified) {
      return { alreadyVerified: true };
    }

    const { code, codeHash, expiresAt } = await this.issueCode();
    const replaced = await this.accounts.replaceVerificationCode(account.id, codeHash, expiresAt);
    if (!replaced) {
      // Verified while the new code was being hashed
      return { alreadyVerified: true };
    }

    this.dispatchCode(account.email, code);
    authLogger.info('Verification code resent', { accountId: account.id });

    return { alreadyVerified: false };
  }

  // ==================== Private Helpers ====================

  private async issueCode(): Promise<{ code: string; codeHash: string; expiresAt: Date }> {
    const code = this.codeGenerator();
    if (!/^\d{6}$/.test(code)) {
      throw new Error('Verification code generator must return a 6-digit code');
    }

    const codeHash = await this.credentials.hash(code);
    const expiresAt = new Date(this.nowMs() + this.config.verificationCodeTtlHours * 60 * 60 * 1000);

    return { code, codeHash, expiresAt };
  }

  private dispatchCode(recipient: string, code: string): void {
    let delivery: Promise<void>;
    try {
      delivery = this.mailer.sendVerificationCode(recipient, code);
    } catch (error) {
      delivery = Promise.reject(error);
    }

    delivery.catch((error: unknown) => {
      mailLogger.warn('Verification email could not be delivered', {
        recipient,
        error: describeError(error),
      });
    });
  }
}
