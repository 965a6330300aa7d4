// LowDB connection and transaction management
// JSON-file storage with serialized, all-or-nothing writes

import { Low, Memory, type Adapter } from 'lowdb';
import { JSONFile } from 'lowdb/node';
import { dirname } from 'path';
import { mkdirSync } from 'fs';
import { InternalError } from '@/utils/errors.js';
import { describeError } from '@/utils/logger.js';

// Database schema definition with version field incremented on every commit
export interface DatabaseSchema {
  _version: number;
  accounts: AccountRecord[];
  characters: CharacterRecord[];
}

export interface AccountRecord {
  id: string;
  username: string;
  email: string;
  password_hash: string;
  is_verified: boolean;
  verification_code_hash: string | null;
  verification_code_expires_at: string | null;
  created_at: string;
  last_login_at: string | null;
  // Security fields for account lockout
  failed_login_attempts: number;
  locked_until: string | null;
}

export interface CharacterRecord {
  id: string;
  account_id: string;
  name: string;
  description: string;
  level: number;
  is_active: boolean;
  created_at: string;
  last_login_at: string | null;
}

function defaultData(): DatabaseSchema {
  return {
    _version: 1,
    accounts: [],
    characters: [],
  };
}

// Database configuration. Without a path the data lives in memory only.
export interface DatabaseConfig {
  path?: string;
}

export class DatabaseConnection {
  private db: Low<DatabaseSchema>;
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(adapter: Adapter<DatabaseSchema>) {
    this.db = new Low(adapter, defaultData());
  }

  /**
   * Initialize by reading data
   */
  async init(): Promise<void> {
    await this.db.read();

    // Older files may miss collections added later
    const data = this.db.data;
    data._version ??= 1;
    data.accounts ??= [];
    data.characters ??= [];
  }

  /**
   * Committed data. Callers must treat it as read-only;
   * all changes go through transaction().
   */
  getData(): Readonly<DatabaseSchema> {
    return this.db.data;
  }

  /**
   * Run `work` against a private copy of the data and commit it atomically.
   *
   * Transactions are queued, so a read-modify-write never interleaves with
   * another one. If `work` throws, or the adapter fails to persist, the copy
   * is discarded and the committed data stays untouched.
   */
  transaction<T>(work: (draft: DatabaseSchema) => T): Promise<T> {
    const run = this.writeQueue.then(async () => {
      const committed = this.db.data;
      const draft = structuredClone(committed);

      const result = work(draft);

      draft._version = committed._version + 1;
      this.db.data = draft;
      try {
        await this.db.write();
      } catch (error) {
        this.db.data = committed;
        throw new InternalError('Failed to persist data', { cause: describeError(error) });
      }
      return result;
    });

    this.writeQueue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  /**
   * Get current version
   */
  getVersion(): number {
    return this.db.data._version;
  }

  /**
   * Wait for queued writes to settle
   */
  async close(): Promise<void> {
    await this.writeQueue;
  }
}

/**
 * Open a connection backed by a JSON file, or by memory when no path is given
 */
export async function openDatabase(config: DatabaseConfig = {}): Promise<DatabaseConnection> {
  let adapter: Adapter<DatabaseSchema>;

  if (config.path) {
    mkdirSync(dirname(config.path), { recursive: true });
    adapter = new JSONFile<DatabaseSchema>(config.path);
  } else {
    adapter = new Memory<DatabaseSchema>();
  }

  const connection = new DatabaseConnection(adapter);
  await connection.init();
  return connection;
}
