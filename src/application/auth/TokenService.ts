// Application: Token Service
// Issues HS256 session tokens after a successful login

import { createHmac, randomBytes, timingSafeEqual } from 'crypto';
import { authLogger, describeError } from '@/utils/logger.js';

export interface TokenPayload {
  userId: string;
  username: string;
  iat: number;   // seconds since epoch
  exp: number;   // seconds since epoch
}

export interface IssuedToken {
  token: string;
  expiresIn: number;  // seconds
}

export interface TokenServiceConfig {
  secret: string;
  tokenTtlHours: number;
  nowMs?: () => number;
}

const HEADER = { alg: 'HS256', typ: 'JWT' } as const;

function base64UrlEncode(value: string | Buffer): string {
  return Buffer.from(value).toString('base64url');
}

function isTokenPayload(value: unknown): value is TokenPayload {
  return (
    typeof value === 'object' &&
    value !== null &&
    'userId' in value &&
    typeof value.userId === 'string' &&
    'username' in value &&
    typeof value.username === 'string' &&
    'iat' in value &&
    typeof value.iat === 'number' &&
    'exp' in value &&
    typeof value.exp === 'number'
  );
}

/**
 * TokenService - signed session tokens
 *
 * Tokens are standard compact JWTs, so any consumer holding the same secret
 * can check them. Nothing is stored server-side after issuance.
 */
export class TokenService {
  private readonly config: TokenServiceConfig;
  private readonly nowMs: () => number;

  constructor(config: TokenServiceConfig) {
    if (!config.secret) {
      throw new Error('Token secret is required');
    }
    this.config = config;
    this.nowMs = config.nowMs ?? (() => Date.now());
  }

  /**
   * Sign a token for an account; the expiry is fixed at issuance
   */
  issue(accountId: string, username: string): IssuedToken {
    const iat = Math.floor(this.nowMs() / 1000);
    const expiresIn = this.config.tokenTtlHours * 60 * 60;

    const payload: TokenPayload = {
      userId: accountId,
      username,
      iat,
      exp: iat + expiresIn,
    };

    const data = `${base64UrlEncode(JSON.stringify(HEADER))}.${base64UrlEncode(JSON.stringify(payload))}`;
    const token = `${data}.${this.sign(data)}`;

    return { token, expiresIn };
  }

  /**
   * Check signature and expiry. Returns the claims, or null for any bad token.
   */
  verify(token: string): TokenPayload | null {
    const parts = token.split('.');
    if (parts.length !== 3) {
      authLogger.debug('Token verification failed: invalid format');
      return null;
    }

    const [encodedHeader, encodedPayload, encodedSignature] = parts;
    const expected = Buffer.from(this.sign(`${encodedHeader}.${encodedPayload}`));
    const actual = Buffer.from(encodedSignature);

    if (expected.length !== actual.length || !timingSafeEqual(expected, actual)) {
      authLogger.warn('Token verification failed: invalid signature');
      return null;
    }

    let payload: unknown;
    try {
      payload = JSON.parse(Buffer.from(encodedPayload, 'base64url').toString('utf8'));
    } catch (error) {
      authLogger.warn('Token verification failed: malformed payload', { error: describeError(error) });
      return null;
    }

    if (!isTokenPayload(payload)) {
      authLogger.warn('Token verification failed: missing claims');
      return null;
    }

    if (payload.exp <= Math.floor(this.nowMs() / 1000)) {
      authLogger.debug('Token verification failed: expired', {
        userId: payload.userId,
        expiredAt: new Date(payload.exp * 1000).toISOString(),
      });
      return null;
    }

    return payload;
  }

  private sign(data: string): string {
    return createHmac('sha256', this.config.secret).update(data).digest('base64url');
  }
}

/**
 * Build the process-wide token service. Without a configured secret a random
 * one is generated; tokens then stop verifying after a restart.
 */
export function createTokenService(secretKey: string | undefined, tokenTtlHours: number): TokenService {
  let secret = secretKey?.trim();

  if (!secret) {
    secret = randomBytes(32).toString('hex');
    authLogger.warn('SECRET_KEY not set - generated an ephemeral signing key');
  }

  return new TokenService({ secret, tokenTtlHours });
}
