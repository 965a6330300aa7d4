import { RateLimiter, RateLimitPresets } from '@/api/middleware/rateLimiter.js';

import { TestClock } from './support.js';

describe('RateLimiter', () => {
  const config = { windowMs: 60 * 1000, maxAttempts: 3 };

  it('Given requests within the limit When counted Then they are allowed with a falling remainder', () => {
    const clock = new TestClock();
    const limiter = new RateLimiter(clock.nowMs);

    const decisions = [1, 2, 3].map(() => limiter.hit('login:127.0.0.1', config));

    expect(decisions.map((d) => [d.allowed, d.remaining])).toEqual([
      [true, 2],
      [true, 1],
      [true, 0],
    ]);
    expect(decisions[0]?.resetAt).toBe(clock.now + 60 * 1000);
  });

  it('Given the limit is used up When another request arrives Then it is refused with a retry delay', () => {
    const clock = new TestClock();
    const limiter = new RateLimiter(clock.nowMs);
    for (let i = 0; i < 3; i++) limiter.hit('login:127.0.0.1', config);

    clock.advance(20 * 1000);
    const decision = limiter.hit('login:127.0.0.1', config);

    expect(decision.allowed).toBe(false);
    expect(decision.remaining).toBe(0);
    expect(decision.retryAfterSeconds).toBe(40);
  });

  it('Given a finished window When a request arrives Then counting starts over', () => {
    const clock = new TestClock();
    const limiter = new RateLimiter(clock.nowMs);
    for (let i = 0; i < 4; i++) limiter.hit('login:127.0.0.1', config);

    clock.advance(60 * 1000);

    expect(limiter.hit('login:127.0.0.1', config)).toMatchObject({ allowed: true, remaining: 2 });
  });

  it('Given different keys When counted Then each has its own window', () => {
    const limiter = new RateLimiter();
    for (let i = 0; i < 3; i++) limiter.hit('login:10.0.0.1', config);

    expect(limiter.hit('login:10.0.0.1', config).allowed).toBe(false);
    expect(limiter.hit('login:10.0.0.2', config).allowed).toBe(true);
    expect(limiter.hit('signup:10.0.0.1', config).allowed).toBe(true);
  });

  it('Given expired windows When cleaning up Then only live entries remain', () => {
    const clock = new TestClock();
    const limiter = new RateLimiter(clock.nowMs);
    limiter.hit('a', { windowMs: 1000, maxAttempts: 1 });
    limiter.hit('b', { windowMs: 5000, maxAttempts: 1 });

    clock.advance(2000);

    expect(limiter.cleanup()).toBe(1);
    expect(limiter.size()).toBe(1);
  });

  it('Given the presets When read Then they carry the documented limits', () => {
    expect(RateLimitPresets.signup).toMatchObject({ windowMs: 3600000, maxAttempts: 3 });
    expect(RateLimitPresets.verifyEmail).toMatchObject({ windowMs: 3600000, maxAttempts: 10 });
    expect(RateLimitPresets.login).toMatchObject({ windowMs: 60000, maxAttempts: 5 });
    expect(RateLimitPresets.resendVerification).toMatchObject({ windowMs: 3600000, maxAttempts: 3 });
  });
});
