// Application: Character service
// Character creation and listing for HTTP routes and realtime commands

import { z } from 'zod';
import type { ICharacterRepository } from '@/domain/character/repository.js';
import type { Character } from '@/domain/character/types.js';
import { validate } from '@/application/auth/validation.js';
import { authLogger } from '@/utils/logger.js';

export const CharacterNameSchema = z
  .string()
  .trim()
  .min(1, 'Character name is required')
  .max(30, 'Character name must be at most 30 characters');

export const CharacterDescriptionSchema = z
  .string()
  .trim()
  .max(500, 'Character description must be at most 500 characters');

export class CharacterService {
  constructor(private readonly characters: ICharacterRepository) {}

  /**
   * Create a character for an account; names are unique across all accounts
   */
  async create(accountId: string, name: string, description = ''): Promise<Character> {
    const character = await this.characters.create({
      accountId,
      name: validate(CharacterNameSchema, name),
      description: validate(CharacterDescriptionSchema, description),
    });

    authLogger.info('Character created', { accountId, characterId: character.id, name: character.name });
    return character;
  }

  async listActive(accountId: string): Promise<Character[]> {
    return this.characters.listActiveByAccount(accountId);
  }
}
