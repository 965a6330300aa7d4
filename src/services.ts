// Service wiring
// Builds every application service around one database and one session registry

import type { AuthConfig } from '@/utils/config.js';
import type { DatabaseService } from '@/infrastructure/database/DatabaseService.js';
import type { MailDispatcher } from '@/infrastructure/mail/MailDispatcher.js';
import { CredentialStore } from '@/application/auth/CredentialStore.js';
import { AccountLifecycle } from '@/application/auth/AccountLifecycle.js';
import { LoginGuard } from '@/application/auth/LoginGuard.js';
import { TokenService, createTokenService } from '@/application/auth/TokenService.js';
import { SessionRegistry } from '@/application/session/SessionRegistry.js';
import { CharacterService } from '@/application/character/CharacterService.js';
import { ServerStatus } from '@/application/status/ServerStatus.js';
import { CommandDispatcher } from '@/application/commands/CommandDispatcher.js';
import { RealtimeGateway } from '@/application/realtime/RealtimeGateway.js';

export interface ServiceOptions {
  database: DatabaseService;
  auth: AuthConfig;
  mailer: MailDispatcher;
  nowMs?: () => number;
  codeGenerator?: () => string;
}

export interface Services {
  database: DatabaseService;
  credentials: CredentialStore;
  lifecycle: AccountLifecycle;
  loginGuard: LoginGuard;
  tokens: TokenService;
  registry: SessionRegistry;
  characters: CharacterService;
  status: ServerStatus;
  commands: CommandDispatcher;
  gateway: RealtimeGateway;
}

export function createServices(options: ServiceOptions): Services {
  const { database, auth, mailer, nowMs, codeGenerator } = options;

  const credentials = new CredentialStore({ bcryptRounds: auth.bcryptRounds });
  const lifecycle = new AccountLifecycle(database.accounts, credentials, mailer, {
    verificationCodeTtlHours: auth.verificationCodeTtlHours,
    nowMs,
    codeGenerator,
  });
  const loginGuard = new LoginGuard(database.accounts, credentials, {
    maxLoginAttempts: auth.maxLoginAttempts,
    lockoutMinutes: auth.lockoutMinutes,
    nowMs,
  });
  const tokens = auth.secretKey
    ? new TokenService({ secret: auth.secretKey, tokenTtlHours: auth.tokenTtlHours, nowMs })
    : createTokenService(undefined, auth.tokenTtlHours);

  // The only registry in the process
  const registry = new SessionRegistry(nowMs);
  const characters = new CharacterService(database.characters);
  const status = new ServerStatus(registry, database.accounts, nowMs);
  const commands = new CommandDispatcher(registry, characters, status);
  const gateway = new RealtimeGateway({ registry, loginGuard, characters, commands, status });

  return {
    database,
    credentials,
    lifecycle,
    loginGuard,
    tokens,
    registry,
    characters,
    status,
    commands,
    gateway,
  };
}
