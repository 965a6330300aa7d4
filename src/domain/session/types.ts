// Domain: Realtime session types
// Sessions live in process memory only

export const GUEST_USERNAME = 'guest';

export interface Session {
  connectionId: string;        // Assigned by the transport per connection
  accountId: string | null;    // null while the connection is a guest
  username: string;
  connectedAt: Date;
}

export function isAuthenticated(session: Session): boolean {
  return session.accountId !== null;
}
