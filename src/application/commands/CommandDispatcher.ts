// Application: Command dispatcher
// Interactive commands issued over a realtime connection

import type { SessionRegistry } from '@/application/session/SessionRegistry.js';
import type { CharacterService } from '@/application/character/CharacterService.js';
import type { ServerStatus } from '@/application/status/ServerStatus.js';
import { isAuthenticated } from '@/domain/session/types.js';
import type { Character } from '@/domain/character/types.js';
import { AppError } from '@/utils/errors.js';
import { describeError, sessionLogger } from '@/utils/logger.js';

export interface CommandResult {
  output: string[];
  error: string | null;
}

export const COMMAND_NAMES = ['who', 'server_info', 'characters', 'create', 'help'] as const;

export type CommandName = (typeof COMMAND_NAMES)[number];

export const NOT_LOGGED_IN = 'You must be logged in to use this command';

const COMMAND_HELP: Record<CommandName, string> = {
  who: 'who - list connected users',
  server_info: 'server_info - show server statistics',
  characters: 'characters - list your characters',
  create: 'create <name> [description] - create a character',
  help: 'help - show this list',
};

const KNOWN_COMMANDS: ReadonlySet<string> = new Set(COMMAND_NAMES);

function isCommandName(value: string): value is CommandName {
  return KNOWN_COMMANDS.has(value);
}

function ok(output: string[]): CommandResult {
  return { output, error: null };
}

function fail(error: string): CommandResult {
  return { output: [], error };
}

function describeCharacter(character: Character): string {
  const line = `  ${character.name} (level ${character.level})`;
  return character.description ? `${line} - ${character.description}` : line;
}

export class CommandDispatcher {
  constructor(
    private readonly registry: SessionRegistry,
    private readonly characters: CharacterService,
    private readonly status: ServerStatus
  ) {}

  /**
   * Run one command for a connection. Never throws: failures come back in
   * `error` with no output lines.
   */
  async dispatch(connectionId: string, commandName: string, args: readonly string[] = []): Promise<CommandResult> {
    const name = commandName.trim().toLowerCase();

    if (!name) {
      return fail('No command given');
    }
    if (!isCommandName(name)) {
      return fail(`Unknown command: ${commandName.trim()}`);
    }

    try {
      switch (name) {
        case 'who':
          return this.who(connectionId);
        case 'server_info':
          return await this.serverInfo();
        case 'characters':
          return await this.listCharacters(connectionId);
        case 'create':
          return await this.createCharacter(connectionId, args);
        case 'help':
          return ok(['Available commands:', ...COMMAND_NAMES.map((command) => `  ${COMMAND_HELP[command]}`)]);
      }
    } catch (error) {
      if (error instanceof AppError && error.statusCode < 500) {
        return fail(error.message);
      }
      sessionLogger.error('Command failed', { connectionId, command: name, error: describeError(error) });
      return fail('Command failed');
    }
  }

  private who(connectionId: string): CommandResult {
    const sessions = this.registry.list();
    const lines = sessions.map((session) => {
      const label = isAuthenticated(session) ? 'authenticated' : 'guest';
      const you = session.connectionId === connectionId ? ' (you)' : '';
      return `  ${session.username} [${session.connectionId}] ${label}${you}`;
    });

    return ok([`Connected users (${sessions.length}):`, ...lines]);
  }

  private async serverInfo(): Promise<CommandResult> {
    const snapshot = await this.status.snapshot();

    return ok([
      `Uptime: ${snapshot.uptime}`,
      `Connected users: ${snapshot.connected_users}`,
      `Authenticated users: ${this.registry.authenticatedCount()}`,
      `Registered accounts: ${snapshot.total_users}`,
    ]);
  }

  private async listCharacters(connectionId: string): Promise<CommandResult> {
    const accountId = this.requireAccount(connectionId);
    if (!accountId) {
      return fail(NOT_LOGGED_IN);
    }

    const characters = await this.characters.listActive(accountId);
    if (characters.length === 0) {
      return ok(['You have no characters. Use "create <name> [description]" to make one.']);
    }

    return ok([`Your characters (${characters.length}):`, ...characters.map(describeCharacter)]);
  }

  private async createCharacter(connectionId: string, args: readonly string[]): Promise<CommandResult> {
    const accountId = this.requireAccount(connectionId);
    if (!accountId) {
      return fail(NOT_LOGGED_IN);
    }

    const [name, ...rest] = args;
    if (!name) {
      return fail('Usage: create <name> [description]');
    }

    const character = await this.characters.create(accountId, name, rest.join(' '));
    return ok([`Character "${character.name}" created.`]);
  }

  private requireAccount(connectionId: string): string | null {
    return this.registry.lookup(connectionId)?.accountId ?? null;
  }
}
