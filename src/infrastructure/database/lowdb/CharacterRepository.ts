// Character Repository - LowDB implementation
// Handles character creation and listing with JSON storage

import { v4 as uuidv4 } from 'uuid';
import type { CharacterRecord, DatabaseConnection } from './connection.js';
import type { Character, NewCharacter } from '@/domain/character/types.js';
import type { ICharacterRepository } from '@/domain/character/repository.js';
import { ConflictError } from '@/utils/errors.js';

export class CharacterRepository implements ICharacterRepository {
  constructor(private db: DatabaseConnection) {}

  /**
   * Create a new character. Names are unique across all accounts.
   */
  async create(data: NewCharacter): Promise<Character> {
    return this.db.transaction((draft) => {
      const taken = draft.characters.some(
        (c) => c.name.toLowerCase() === data.name.toLowerCase()
      );
      if (taken) {
        throw new ConflictError(`Character name "${data.name}" is already taken`, {
          name: data.name,
        });
      }

      const record: CharacterRecord = {
        id: uuidv4(),
        account_id: data.accountId,
        name: data.name,
        description: data.description ?? '',
        level: data.level ?? 1,
        is_active: true,
        created_at: new Date().toISOString(),
        last_login_at: null,
      };

      draft.characters.push(record);
      return this.rowToCharacter(record);
    });
  }

  async listActiveByAccount(accountId: string): Promise<Character[]> {
    return this.db
      .getData()
      .characters.filter((c) => c.account_id === accountId && c.is_active)
      .map((c) => this.rowToCharacter(c));
  }

  private rowToCharacter(row: CharacterRecord): Character {
    return {
      id: row.id,
      accountId: row.account_id,
      name: row.name,
      description: row.description,
      level: row.level,
      isActive: row.is_active,
      createdAt: new Date(row.created_at),
      lastLoginAt: row.last_login_at ? new Date(row.last_login_at) : null,
    };
  }
}
