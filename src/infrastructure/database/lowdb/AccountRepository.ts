// Account Repository - LowDB implementation
// Account CRUD, verification codes and lockout counters on JSON storage

import { v4 as uuidv4 } from 'uuid';
import type { AccountRecord, DatabaseConnection, DatabaseSchema } from './connection.js';
import type { Account, NewAccount } from '@/domain/user/types.js';
import type { FailedLoginResult, IAccountRepository } from '@/domain/user/repository.js';
import { ConflictError, NotFoundError } from '@/utils/errors.js';

function sameName(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

function requireAccount(data: DatabaseSchema, id: string): AccountRecord {
  const account = data.accounts.find((a) => a.id === id);
  if (!account) {
    throw new NotFoundError('User not found', { accountId: id });
  }
  return account;
}

export class AccountRepository implements IAccountRepository {
  constructor(private db: DatabaseConnection) {}

  /**
   * Create a new, unverified account
   */
  async create(data: NewAccount): Promise<Account> {
    return this.db.transaction((draft) => {
      if (draft.accounts.some((a) => sameName(a.username, data.username))) {
        throw new ConflictError('Username already exists', { username: data.username });
      }
      if (draft.accounts.some((a) => a.email === data.email)) {
        throw new ConflictError('Email already registered', { email: data.email });
      }

      const record: AccountRecord = {
        id: uuidv4(),
        username: data.username,
        email: data.email,
        password_hash: data.passwordHash,
        is_verified: false,
        verification_code_hash: data.verificationCodeHash,
        verification_code_expires_at: data.verificationCodeExpiresAt.toISOString(),
        created_at: new Date().toISOString(),
        last_login_at: null,
        failed_login_attempts: 0,
        locked_until: null,
      };

      draft.accounts.push(record);
      return this.rowToAccount(record);
    });
  }

  async findById(id: string): Promise<Account | null> {
    const account = this.db.getData().accounts.find((a) => a.id === id);
    return account ? this.rowToAccount(account) : null;
  }

  /**
   * Usernames are unique regardless of case
   */
  async findByUsername(username: string): Promise<Account | null> {
    const account = this.db.getData().accounts.find((a) => sameName(a.username, username));
    return account ? this.rowToAccount(account) : null;
  }

  /**
   * Expects an already-normalized email
   */
  async findByEmail(email: string): Promise<Account | null> {
    const account = this.db.getData().accounts.find((a) => a.email === email);
    return account ? this.rowToAccount(account) : null;
  }

  async count(): Promise<number> {
    return this.db.getData().accounts.length;
  }

  async markVerified(id: string, expectedCodeHash: string): Promise<boolean> {
    return this.db.transaction((draft) => {
      const account = requireAccount(draft, id);
      if (account.is_verified) {
        return true;
      }
      if (account.verification_code_hash !== expectedCodeHash) {
        return false;
      }

      account.is_verified = true;
      account.verification_code_hash = null;
      account.verification_code_expires_at = null;
      return true;
    });
  }

  async replaceVerificationCode(id: string, codeHash: string, expiresAt: Date): Promise<boolean> {
    return this.db.transaction((draft) => {
      const account = requireAccount(draft, id);
      if (account.is_verified) {
        return false;
      }

      account.verification_code_hash = codeHash;
      account.verification_code_expires_at = expiresAt.toISOString();
      return true;
    });
  }

  /**
   * Atomic increment of failed login attempts with lockout check.
   * A lock that has already elapsed starts a fresh count.
   */
  async recordFailedLogin(
    id: string,
    maxAttempts: number,
    lockoutMinutes: number,
    now: Date
  ): Promise<FailedLoginResult> {
    return this.db.transaction((draft) => {
      const account = requireAccount(draft, id);
      const lockedUntil = account.locked_until ? new Date(account.locked_until) : null;

      if (lockedUntil && lockedUntil > now) {
        return {
          attempts: account.failed_login_attempts,
          locked: true,
          lockedUntil,
        };
      }

      if (lockedUntil) {
        account.failed_login_attempts = 0;
        account.locked_until = null;
      }

      account.failed_login_attempts += 1;

      if (account.failed_login_attempts >= maxAttempts) {
        const lockUntil = new Date(now.getTime() + lockoutMinutes * 60 * 1000);
        account.locked_until = lockUntil.toISOString();

        return {
          attempts: account.failed_login_attempts,
          locked: true,
          lockedUntil: lockUntil,
        };
      }

      return {
        attempts: account.failed_login_attempts,
        locked: false,
        lockedUntil: null,
      };
    });
  }

  /**
   * Resets the counter only if nothing changed since the login was decided:
   * no lock in force and the same failure count that was read.
   */
  async recordSuccessfulLogin(id: string, expectedFailedAttempts: number, now: Date): Promise<boolean> {
    return this.db.transaction((draft) => {
      const account = requireAccount(draft, id);
      if (account.locked_until && new Date(account.locked_until) > now) {
        return false;
      }
      if (account.failed_login_attempts !== expectedFailedAttempts) {
        return false;
      }

      account.failed_login_attempts = 0;
      account.locked_until = null;
      account.last_login_at = now.toISOString();
      return true;
    });
  }

  private rowToAccount(row: AccountRecord): Account {
    return {
      id: row.id,
      username: row.username,
      email: row.email,
      passwordHash: row.password_hash,
      isVerified: row.is_verified,
      verificationCodeHash: row.verification_code_hash,
      verificationCodeExpiresAt: row.verification_code_expires_at
        ? new Date(row.verification_code_expires_at)
        : null,
      createdAt: new Date(row.created_at),
      lastLoginAt: row.last_login_at ? new Date(row.last_login_at) : null,
      failedLoginAttempts: row.failed_login_attempts,
      lockedUntil: row.locked_until ? new Date(row.locked_until) : null,
    };
  }
}
