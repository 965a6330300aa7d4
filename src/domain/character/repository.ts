// Domain: Character repository interface

import type { Character, NewCharacter } from './types.js';

export interface ICharacterRepository {
  /** Rejects a name already used by any account (ConflictError). */
  create(data: NewCharacter): Promise<Character>;
  /** Active characters of one account, oldest first. */
  listActiveByAccount(accountId: string): Promise<Character[]>;
}
