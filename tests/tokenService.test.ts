import { TokenService, createTokenService } from '@/application/auth/TokenService.js';

import { TEST_SECRET, TestClock } from './support.js';

describe('TokenService', () => {
  it('Given an empty secret When constructing Then it throws', () => {
    expect(() => new TokenService({ secret: '', tokenTtlHours: 24 })).toThrow('Token secret is required');
  });

  it('Given an issued token When verified Then the claims come back with a 24 hour horizon', () => {
    const clock = new TestClock();
    const tokens = new TokenService({ secret: TEST_SECRET, tokenTtlHours: 24, nowMs: clock.nowMs });

    const { token, expiresIn } = tokens.issue('account-1', 'alice');
    const payload = tokens.verify(token);

    const iat = Math.floor(clock.now / 1000);
    expect(expiresIn).toBe(86400);
    expect(token.split('.')).toHaveLength(3);
    expect(payload).toEqual({ userId: 'account-1', username: 'alice', iat, exp: iat + 86400 });
  });

  it('Given a token at its expiry instant When verified Then it is rejected', () => {
    const clock = new TestClock();
    const tokens = new TokenService({ secret: TEST_SECRET, tokenTtlHours: 24, nowMs: clock.nowMs });
    const { token } = tokens.issue('account-1', 'alice');

    clock.advance(24 * 60 * 60 * 1000 - 1000);
    expect(tokens.verify(token)).not.toBeNull();

    clock.advance(1000);
    expect(tokens.verify(token)).toBeNull();
  });

  it('Given a token signed with another secret When verified Then it is rejected', () => {
    const issuer = new TokenService({ secret: 'other-secret', tokenTtlHours: 24 });
    const verifier = new TokenService({ secret: TEST_SECRET, tokenTtlHours: 24 });

    expect(verifier.verify(issuer.issue('account-1', 'alice').token)).toBeNull();
  });

  it('Given a token with a rewritten payload When verified Then the signature check rejects it', () => {
    const tokens = new TokenService({ secret: TEST_SECRET, tokenTtlHours: 24 });
    const [header, , signature] = tokens.issue('account-1', 'alice').token.split('.');
    const forged = Buffer.from(JSON.stringify({ userId: 'account-2', username: 'mallory', iat: 0, exp: 9999999999 })).toString('base64url');

    expect(tokens.verify(`${header}.${forged}.${signature}`)).toBeNull();
  });

  it('Given a malformed token When verified Then it is rejected', () => {
    const tokens = new TokenService({ secret: TEST_SECRET, tokenTtlHours: 24 });

    expect(tokens.verify('not-a-token')).toBeNull();
    expect(tokens.verify('a.b.c')).toBeNull();
  });

  it('Given no configured secret When creating the service Then it signs with a generated key', () => {
    const tokens = createTokenService(undefined, 1);
    const { token, expiresIn } = tokens.issue('account-1', 'alice');

    expect(expiresIn).toBe(3600);
    expect(tokens.verify(token)?.username).toBe('alice');
  });
});
