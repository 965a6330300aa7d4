// Database Service - Main entry point for database operations
// Owns the LowDB connection and exposes the repositories built on it

import {
  openDatabase,
  AccountRepository,
  CharacterRepository,
  type DatabaseConfig,
  type DatabaseConnection,
} from './lowdb/index.js';

export type DatabaseHealth = 'healthy' | 'unhealthy';

export class DatabaseService {
  // Repositories
  public readonly accounts: AccountRepository;
  public readonly characters: CharacterRepository;

  private constructor(private readonly connection: DatabaseConnection) {
    this.accounts = new AccountRepository(connection);
    this.characters = new CharacterRepository(connection);
  }

  /**
   * Open the database. Omit the path for an in-memory store.
   */
  static async open(config: DatabaseConfig = {}): Promise<DatabaseService> {
    const connection = await openDatabase(config);
    return new DatabaseService(connection);
  }

  /**
   * Connectivity probe used by the health endpoint
   */
  checkHealth(): DatabaseHealth {
    try {
      const data = this.connection.getData();
      return Array.isArray(data.accounts) && Array.isArray(data.characters) ? 'healthy' : 'unhealthy';
    } catch {
      return 'unhealthy';
    }
  }

  /**
   * Flush pending writes before shutdown
   */
  async close(): Promise<void> {
    await this.connection.close();
  }
}
