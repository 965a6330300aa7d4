// LowDB Repository exports

export { DatabaseConnection, openDatabase } from './connection.js';
export { AccountRepository } from './AccountRepository.js';
export { CharacterRepository } from './CharacterRepository.js';

export type { DatabaseConfig, DatabaseSchema, AccountRecord, CharacterRecord } from './connection.js';
