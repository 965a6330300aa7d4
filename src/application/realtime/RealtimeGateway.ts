// Application: Realtime gateway
// Turns client messages on a persistent connection into server events

import { z } from 'zod';
import type { SessionRegistry } from '@/application/session/SessionRegistry.js';
import type { LoginGuard } from '@/application/auth/LoginGuard.js';
import type { CharacterService } from '@/application/character/CharacterService.js';
import type { CommandDispatcher, CommandResult } from '@/application/commands/CommandDispatcher.js';
import type { ServerStatus, ServerStatusSnapshot } from '@/application/status/ServerStatus.js';
import { toCharacterView, type CharacterView } from '@/domain/character/types.js';
import { toPublicAccount, type PublicAccount } from '@/domain/user/types.js';
import type { AuthFailureReason } from '@/utils/errors.js';
import { describeError, sessionLogger } from '@/utils/logger.js';

// ==================== Client messages ====================

export type ClientMessage =
  | { type: 'connect'; ip?: string }
  | { type: 'disconnect' }
  | { type: 'authenticate'; payload: unknown }
  | { type: 'message'; payload: unknown }
  | { type: 'command'; payload: unknown };

// ==================== Server events ====================

export type ServerEvent =
  | { event: 'connected'; data: { message: string; sid: string; server_status: ServerStatusSnapshot } }
  | {
      event: 'auth_success';
      data: {
        message: string;
        user: PublicAccount;
        characters: CharacterView[];
        server_status: ServerStatusSnapshot;
      };
    }
  | { event: 'auth_error'; data: { error: string } }
  | { event: 'message'; data: { echo: unknown } }
  | { event: 'cmd_response'; data: CommandResult };

export const AUTH_ERROR_MESSAGES: Record<AuthFailureReason, string> = {
  invalid_credentials: 'Invalid credentials',
  locked: 'Account is temporarily locked',
  unverified: 'Email not verified',
};

const AuthenticatePayloadSchema = z.object({
  username: z.string().min(1),
  password: z.string().min(1),
});

const CommandPayloadSchema = z.object({
  cmd: z.string(),
  args: z.union([z.array(z.string()), z.string()]).optional(),
});

/**
 * Accepts args as a list or as one whitespace-separated string
 */
export function normalizeCommandArgs(args: string[] | string | undefined): string[] {
  if (args === undefined) return [];
  const parts = typeof args === 'string' ? args.split(/\s+/) : args;
  return parts.filter((part) => part.length > 0);
}

export interface RealtimeGatewayDeps {
  registry: SessionRegistry;
  loginGuard: LoginGuard;
  characters: CharacterService;
  commands: CommandDispatcher;
  status: ServerStatus;
}

/**
 * RealtimeGateway - transport-independent connection handling
 *
 * Each client message maps to zero or more events for the sending
 * connection. The transport binding only moves messages in and events out.
 */
export class RealtimeGateway {
  constructor(private readonly deps: RealtimeGatewayDeps) {}

  async handle(connectionId: string, message: ClientMessage): Promise<ServerEvent[]> {
    switch (message.type) {
      case 'connect':
        return this.onConnect(connectionId, message.ip);
      case 'disconnect':
        this.onDisconnect(connectionId);
        return [];
      case 'authenticate':
        return [await this.onAuthenticate(connectionId, message.payload)];
      case 'message':
        sessionLogger.debug('Message received', { connectionId });
        return [{ event: 'message', data: { echo: message.payload } }];
      case 'command':
        return [await this.onCommand(connectionId, message.payload)];
    }
  }

  private async onConnect(connectionId: string, ip?: string): Promise<ServerEvent[]> {
    this.deps.registry.connect(connectionId);
    sessionLogger.info('Client connected', { connectionId, ip });

    return [
      {
        event: 'connected',
        data: {
          message: 'Connected to server',
          sid: connectionId,
          server_status: await this.deps.status.snapshot(),
        },
      },
    ];
  }

  private onDisconnect(connectionId: string): void {
    if (this.deps.registry.disconnect(connectionId)) {
      sessionLogger.info('Client disconnected', { connectionId });
    }
  }

  private async onAuthenticate(connectionId: string, payload: unknown): Promise<ServerEvent> {
    const parsed = AuthenticatePayloadSchema.safeParse(payload);
    if (!parsed.success) {
      return authError('Missing credentials');
    }

    try {
      const decision = await this.deps.loginGuard.attempt(parsed.data, { channel: 'realtime' });
      if (decision.status === 'rejected') {
        return authError(AUTH_ERROR_MESSAGES[decision.reason]);
      }

      const user = toPublicAccount(decision.account);
      if (!this.deps.registry.authenticate(connectionId, user)) {
        return authError('Authentication failed');
      }

      const characters = await this.deps.characters.listActive(user.id);

      return {
        event: 'auth_success',
        data: {
          message: 'Authentication successful',
          user,
          characters: characters.map(toCharacterView),
          server_status: await this.deps.status.snapshot(),
        },
      };
    } catch (error) {
      sessionLogger.error('Realtime authentication error', { connectionId, error: describeError(error) });
      return authError('Authentication failed');
    }
  }

  private async onCommand(connectionId: string, payload: unknown): Promise<ServerEvent> {
    const parsed = CommandPayloadSchema.safeParse(payload);
    const result = parsed.success
      ? await this.deps.commands.dispatch(connectionId, parsed.data.cmd, normalizeCommandArgs(parsed.data.args))
      : { output: [], error: 'No command given' };

    return { event: 'cmd_response', data: result };
  }
}

function authError(error: string): ServerEvent {
  return { event: 'auth_error', data: { error } };
}
