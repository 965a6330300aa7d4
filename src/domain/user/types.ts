// Domain: Account types
// Pure TypeScript interfaces for account management

/**
 * Account entity. `isVerified` implies both verification fields are null.
 */
export interface Account {
  id: string;                              // UUID
  username: string;                        // 3-20 chars, [A-Za-z0-9_]
  email: string;                           // Normalized (trimmed, lower-cased)
  passwordHash: string;                    // bcrypt hash
  isVerified: boolean;
  verificationCodeHash: string | null;     // bcrypt hash of the pending code
  verificationCodeExpiresAt: Date | null;
  createdAt: Date;
  lastLoginAt: Date | null;
  // Security fields
  failedLoginAttempts: number;
  lockedUntil: Date | null;                // In the past means "not locked"
}

export interface NewAccount {
  username: string;
  email: string;
  passwordHash: string;
  verificationCodeHash: string;
  verificationCodeExpiresAt: Date;
}

export interface SignupData {
  username: string;
  email: string;
  password: string;
}

export interface LoginCredentials {
  username: string;
  password: string;
}

/**
 * Account as exposed to clients (no secrets)
 */
export interface PublicAccount {
  id: string;
  username: string;
}

export function toPublicAccount(account: Pick<Account, 'id' | 'username'>): PublicAccount {
  return { id: account.id, username: account.username };
}

export function isAccountLocked(account: Pick<Account, 'lockedUntil'>, now: Date): boolean {
  return account.lockedUntil !== null && account.lockedUntil.getTime() > now.getTime();
}
