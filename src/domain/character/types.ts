// Domain layer: Character types
// Pure TypeScript - no external dependencies

export interface Character {
  id: string;
  accountId: string;
  name: string;              // Globally unique, case-insensitive
  description: string;
  level: number;             // >= 1
  isActive: boolean;
  createdAt: Date;
  lastLoginAt: Date | null;
}

export interface NewCharacter {
  accountId: string;
  name: string;
  description?: string;
  level?: number;
}

/**
 * Character as serialized in API responses and realtime events
 */
export interface CharacterView {
  id: string;
  name: string;
  description: string;
  level: number;
  is_active: boolean;
  created_at: string;
  last_login: string | null;
}

export function toCharacterView(character: Character): CharacterView {
  return {
    id: character.id,
    name: character.name,
    description: character.description,
    level: character.level,
    is_active: character.isActive,
    created_at: character.createdAt.toISOString(),
    last_login: character.lastLoginAt ? character.lastLoginAt.toISOString() : null,
  };
}
