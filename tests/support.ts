import type { Server } from 'http';

import { CredentialStore } from '@/application/auth/CredentialStore.js';
import { DatabaseService } from '@/infrastructure/database/DatabaseService.js';
import type { MailDispatcher } from '@/infrastructure/mail/MailDispatcher.js';
import { createServices, type Services } from '@/services.js';
import type { AuthConfig } from '@/utils/config.js';

export const TEST_SECRET = 'test-secret-test-secret-test-secret';
export const START_MS = Date.parse('2026-01-01T00:00:00.000Z');

export class TestClock {
  constructor(public now: number = START_MS) {}

  readonly nowMs = (): number => this.now;

  advance(ms: number): void {
    this.now += ms;
  }
}

export class RecordingMailer implements MailDispatcher {
  readonly sent: Array<{ recipient: string; code: string }> = [];
  failWith: Error | null = null;

  async sendVerificationCode(recipient: string, code: string): Promise<void> {
    if (this.failWith) {
      throw this.failWith;
    }
    this.sent.push({ recipient, code });
  }

  lastCodeFor(recipient: string): string {
    const entry = [...this.sent].reverse().find((mail) => mail.recipient === recipient);
    if (!entry) throw new Error(`no code sent to ${recipient}`);
    return entry.code;
  }
}

/**
 * Holds the result of hash() or verify() for a chosen secret until released,
 * so concurrent calls can be interleaved deterministically
 */
export class GatedCredentialStore extends CredentialStore {
  private readonly gates = new Map<string, Promise<void>>();

  constructor() {
    super({ bcryptRounds: 4 });
  }

  hold(secret: string): () => void {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.gates.set(secret, gate);
    return () => {
      this.gates.delete(secret);
      release();
    };
  }

  override async hash(secret: string): Promise<string> {
    const digest = await super.hash(secret);
    await this.gates.get(secret);
    return digest;
  }

  override async verify(secret: string, digest: string): Promise<boolean> {
    const matches = await super.verify(secret, digest);
    await this.gates.get(secret);
    return matches;
  }
}

export const TEST_AUTH: AuthConfig = {
  secretKey: TEST_SECRET,
  bcryptRounds: 4,
  maxLoginAttempts: 5,
  lockoutMinutes: 15,
  verificationCodeTtlHours: 24,
  tokenTtlHours: 24,
};

export interface TestContext {
  services: Services;
  database: DatabaseService;
  clock: TestClock;
  mailer: RecordingMailer;
}

export async function createTestContext(
  options: { auth?: Partial<AuthConfig>; codeGenerator?: () => string } = {}
): Promise<TestContext> {
  const database = await DatabaseService.open();
  const clock = new TestClock();
  const mailer = new RecordingMailer();
  const services = createServices({
    database,
    auth: { ...TEST_AUTH, ...options.auth },
    mailer,
    nowMs: clock.nowMs,
    codeGenerator: options.codeGenerator,
  });
  return { services, database, clock, mailer };
}

/**
 * Sign up and verify an account, returning its id
 */
export async function createVerifiedAccount(
  ctx: TestContext,
  username = 'alice',
  email = 'alice@example.com',
  password = 'Passw0rd'
): Promise<string> {
  const { accountId } = await ctx.services.lifecycle.signup({ username, email, password });
  await ctx.services.lifecycle.verifyEmail(email, ctx.mailer.lastCodeFor(email));
  return accountId;
}

/**
 * Let pending promise callbacks run
 */
export async function flushMicrotasks(): Promise<void> {
  await new Promise<void>((resolve) => setImmediate(resolve));
}

export async function listen(server: Server): Promise<string> {
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', () => resolve()));
  const address = server.address();
  if (!address || typeof address === 'string') throw new Error('unexpected address');
  return `http://127.0.0.1:${address.port}`;
}

export async function close(server: Server): Promise<void> {
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
}

export async function captureError(promise: Promise<unknown>): Promise<Error> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof Error) return error;
    throw new Error(`non-Error rejection: ${String(error)}`);
  }
  throw new Error('expected the promise to reject');
}
