// Application: Session registry
// Maps each live connection to its guest or authenticated identity

import { GUEST_USERNAME, isAuthenticated, type Session } from '@/domain/session/types.js';
import type { PublicAccount } from '@/domain/user/types.js';
import { sessionLogger } from '@/utils/logger.js';

export class SessionRegistryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SessionRegistryError';
  }
}

/**
 * SessionRegistry - the one piece of shared mutable state in the process
 *
 * Constructed once per service and handed to every connection handler.
 * Every method is synchronous, so each read or mutation completes on the
 * event loop without interleaving; callers do their storage and password
 * work before touching the registry.
 */
export class SessionRegistry {
  // Map iteration order is insertion order
  private readonly sessions = new Map<string, Session>();

  constructor(private readonly nowMs: () => number = () => Date.now()) {}

  /**
   * Register a new connection as a guest.
   * A duplicate id is a transport bug and throws.
   */
  connect(connectionId: string): Session {
    if (this.sessions.has(connectionId)) {
      throw new SessionRegistryError(`Connection ${connectionId} is already registered`);
    }

    const session: Session = {
      connectionId,
      accountId: null,
      username: GUEST_USERNAME,
      connectedAt: new Date(this.nowMs()),
    };
    this.sessions.set(connectionId, session);

    sessionLogger.debug('Connection registered', { connectionId, connected: this.sessions.size });
    return { ...session };
  }

  /**
   * Drop a connection. Unknown ids are ignored.
   */
  disconnect(connectionId: string): boolean {
    const removed = this.sessions.delete(connectionId);
    if (removed) {
      sessionLogger.debug('Connection removed', { connectionId, connected: this.sessions.size });
    }
    return removed;
  }

  /**
   * Bind an account to a connection in place, keeping connectedAt.
   * Returns false when the connection closed before the login finished.
   */
  authenticate(connectionId: string, account: PublicAccount): boolean {
    const session = this.sessions.get(connectionId);
    if (!session) {
      sessionLogger.warn('Authenticated connection is gone', { connectionId, accountId: account.id });
      return false;
    }

    session.accountId = account.id;
    session.username = account.username;

    sessionLogger.info('Connection authenticated', { connectionId, accountId: account.id });
    return true;
  }

  lookup(connectionId: string): Session | null {
    const session = this.sessions.get(connectionId);
    return session ? { ...session } : null;
  }

  /**
   * Snapshot of all sessions in connection order
   */
  list(): Session[] {
    return Array.from(this.sessions.values(), (session) => ({ ...session }));
  }

  count(): number {
    return this.sessions.size;
  }

  authenticatedCount(): number {
    let count = 0;
    for (const session of this.sessions.values()) {
      if (isAuthenticated(session)) count++;
    }
    return count;
  }
}
