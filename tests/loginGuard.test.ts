import { LOGIN_REJECTION_MESSAGES, LoginGuard } from '@/application/auth/LoginGuard.js';
import { AuthError } from '@/utils/errors.js';

import {
  GatedCredentialStore,
  captureError,
  createTestContext,
  createVerifiedAccount,
  type TestContext,
} from './support.js';

const MINUTE_MS = 60 * 1000;

async function failTimes(ctx: TestContext, times: number): Promise<void> {
  for (let i = 0; i < times; i++) {
    const decision = await ctx.services.loginGuard.attempt({ username: 'alice', password: 'Wr0ngPass' });
    expect(decision).toEqual({ status: 'rejected', reason: 'invalid_credentials' });
  }
}

function gatedGuard(ctx: TestContext, credentials: GatedCredentialStore): LoginGuard {
  return new LoginGuard(ctx.database.accounts, credentials, {
    maxLoginAttempts: 5,
    lockoutMinutes: 15,
    nowMs: ctx.clock.nowMs,
  });
}

describe('LoginGuard', () => {
  it('Given a verified account When logging in with the right password Then it is authenticated', async () => {
    const ctx = await createTestContext();
    const accountId = await createVerifiedAccount(ctx);

    const decision = await ctx.services.loginGuard.attempt({ username: 'alice', password: 'Passw0rd' });

    expect(decision.status).toBe('authenticated');
    if (decision.status !== 'authenticated') throw new Error('unreachable');
    expect(decision.account.id).toBe(accountId);
    expect(decision.account.lastLoginAt?.getTime()).toBe(ctx.clock.now);

    const stored = await ctx.database.accounts.findById(accountId);
    expect(stored?.lastLoginAt?.getTime()).toBe(ctx.clock.now);
  });

  it('Given a username in another case When logging in Then the account is found', async () => {
    const ctx = await createTestContext();
    await createVerifiedAccount(ctx);

    const decision = await ctx.services.loginGuard.attempt({ username: 'ALICE', password: 'Passw0rd' });

    expect(decision.status).toBe('authenticated');
  });

  it('Given an unknown username When logging in Then the rejection matches a wrong password', async () => {
    const ctx = await createTestContext();
    await createVerifiedAccount(ctx);

    const unknown = await ctx.services.loginGuard.attempt({ username: 'nobody', password: 'Passw0rd' });
    const wrong = await ctx.services.loginGuard.attempt({ username: 'alice', password: 'Wr0ngPass' });

    expect(unknown).toEqual({ status: 'rejected', reason: 'invalid_credentials' });
    expect(wrong).toEqual(unknown);
  });

  it('Given four wrong passwords When checking the account Then it is counted but not locked', async () => {
    const ctx = await createTestContext();
    const accountId = await createVerifiedAccount(ctx);

    await failTimes(ctx, 4);

    const account = await ctx.database.accounts.findById(accountId);
    expect(account?.failedLoginAttempts).toBe(4);
    expect(account?.lockedUntil).toBeNull();
  });

  it('Given five wrong passwords When the right password follows Then the account is locked for fifteen minutes', async () => {
    const ctx = await createTestContext();
    const accountId = await createVerifiedAccount(ctx);

    await failTimes(ctx, 5);

    const account = await ctx.database.accounts.findById(accountId);
    expect(account?.failedLoginAttempts).toBe(5);
    expect(account?.lockedUntil?.getTime()).toBe(ctx.clock.now + 15 * MINUTE_MS);

    const decision = await ctx.services.loginGuard.attempt({ username: 'alice', password: 'Passw0rd' });
    expect(decision).toEqual({ status: 'rejected', reason: 'locked' });
  });

  it('Given a locked account When a wrong password arrives Then the counter does not move', async () => {
    const ctx = await createTestContext();
    const accountId = await createVerifiedAccount(ctx);
    await failTimes(ctx, 5);

    const decision = await ctx.services.loginGuard.attempt({ username: 'alice', password: 'Wr0ngPass' });

    expect(decision).toEqual({ status: 'rejected', reason: 'locked' });
    expect((await ctx.database.accounts.findById(accountId))?.failedLoginAttempts).toBe(5);
  });

  it('Given a lock that has run out When the right password arrives Then it authenticates and clears the counter', async () => {
    const ctx = await createTestContext();
    const accountId = await createVerifiedAccount(ctx);
    await failTimes(ctx, 5);

    ctx.clock.advance(15 * MINUTE_MS - 1);
    expect(await ctx.services.loginGuard.attempt({ username: 'alice', password: 'Passw0rd' })).toEqual({
      status: 'rejected',
      reason: 'locked',
    });

    ctx.clock.advance(1);
    const decision = await ctx.services.loginGuard.attempt({ username: 'alice', password: 'Passw0rd' });

    expect(decision.status).toBe('authenticated');
    const account = await ctx.database.accounts.findById(accountId);
    expect(account?.failedLoginAttempts).toBe(0);
    expect(account?.lockedUntil).toBeNull();
  });

  it('Given a lock that has run out When a wrong password arrives Then counting starts over', async () => {
    const ctx = await createTestContext();
    const accountId = await createVerifiedAccount(ctx);
    await failTimes(ctx, 5);

    ctx.clock.advance(16 * MINUTE_MS);
    await failTimes(ctx, 1);

    const account = await ctx.database.accounts.findById(accountId);
    expect(account?.failedLoginAttempts).toBe(1);
    expect(account?.lockedUntil).toBeNull();
  });

  it('Given earlier failures When a login succeeds Then the counter resets', async () => {
    const ctx = await createTestContext();
    const accountId = await createVerifiedAccount(ctx);
    await failTimes(ctx, 3);

    await ctx.services.loginGuard.attempt({ username: 'alice', password: 'Passw0rd' });

    expect((await ctx.database.accounts.findById(accountId))?.failedLoginAttempts).toBe(0);
  });

  it('Given an unverified account When the right password arrives Then it is rejected as unverified without counting', async () => {
    const ctx = await createTestContext();
    const { accountId } = await ctx.services.lifecycle.signup({
      username: 'alice',
      email: 'alice@example.com',
      password: 'Passw0rd',
    });

    const right = await ctx.services.loginGuard.attempt({ username: 'alice', password: 'Passw0rd' });
    expect(right).toEqual({ status: 'rejected', reason: 'unverified' });
    expect((await ctx.database.accounts.findById(accountId))?.failedLoginAttempts).toBe(0);

    const wrong = await ctx.services.loginGuard.attempt({ username: 'alice', password: 'Wr0ngPass' });
    expect(wrong).toEqual({ status: 'rejected', reason: 'invalid_credentials' });
    expect((await ctx.database.accounts.findById(accountId))?.failedLoginAttempts).toBe(1);
  });

  it('Given five wrong passwords at once When they settle Then no increment is lost', async () => {
    const ctx = await createTestContext();
    const accountId = await createVerifiedAccount(ctx);

    await Promise.all(
      Array.from({ length: 5 }, () => ctx.services.loginGuard.attempt({ username: 'alice', password: 'Wr0ngPass' }))
    );

    const account = await ctx.database.accounts.findById(accountId);
    expect(account?.failedLoginAttempts).toBe(5);
    expect(account?.lockedUntil).not.toBeNull();
  });

  it('Given a right password still comparing When the locking failure commits first Then the login is refused and the lock kept', async () => {
    const ctx = await createTestContext();
    const accountId = await createVerifiedAccount(ctx);
    await failTimes(ctx, 4);
    const credentials = new GatedCredentialStore();
    const guard = gatedGuard(ctx, credentials);

    const release = credentials.hold('Passw0rd');
    const right = guard.attempt({ username: 'alice', password: 'Passw0rd' });
    await expect(guard.attempt({ username: 'alice', password: 'Wr0ngPass' })).resolves.toEqual({
      status: 'rejected',
      reason: 'invalid_credentials',
    });
    release();

    await expect(right).resolves.toEqual({ status: 'rejected', reason: 'locked' });
    const account = await ctx.database.accounts.findById(accountId);
    expect(account?.failedLoginAttempts).toBe(5);
    expect(account?.lockedUntil?.getTime()).toBe(ctx.clock.now + 15 * MINUTE_MS);
    expect(account?.lastLoginAt).toBeNull();
  });

  it('Given a right password still comparing When a non-locking failure commits first Then the login succeeds and clears the counter', async () => {
    const ctx = await createTestContext();
    const accountId = await createVerifiedAccount(ctx);
    await failTimes(ctx, 2);
    const credentials = new GatedCredentialStore();
    const guard = gatedGuard(ctx, credentials);

    const release = credentials.hold('Passw0rd');
    const right = guard.attempt({ username: 'alice', password: 'Passw0rd' });
    await guard.attempt({ username: 'alice', password: 'Wr0ngPass' });
    expect((await ctx.database.accounts.findById(accountId))?.failedLoginAttempts).toBe(3);
    release();

    const decision = await right;
    expect(decision.status).toBe('authenticated');
    const account = await ctx.database.accounts.findById(accountId);
    expect(account?.failedLoginAttempts).toBe(0);
    expect(account?.lastLoginAt?.getTime()).toBe(ctx.clock.now);
  });

  it('Given a locked account When login() is used Then it throws a 403 AuthError', async () => {
    const ctx = await createTestContext();
    await createVerifiedAccount(ctx);
    await failTimes(ctx, 5);

    const error = await captureError(ctx.services.loginGuard.login({ username: 'alice', password: 'Passw0rd' }));

    expect(error).toBeInstanceOf(AuthError);
    if (!(error instanceof AuthError)) throw new Error('unreachable');
    expect(error.reason).toBe('locked');
    expect(error.statusCode).toBe(403);
    expect(error.message).toBe(LOGIN_REJECTION_MESSAGES.locked);
  });

  it('Given a wrong password When login() is used Then it throws a 401 AuthError', async () => {
    const ctx = await createTestContext();
    await createVerifiedAccount(ctx);

    const error = await captureError(ctx.services.loginGuard.login({ username: 'alice', password: 'Wr0ngPass' }));

    expect(error).toBeInstanceOf(AuthError);
    expect(error.message).toBe('Invalid username or password');
  });
});
