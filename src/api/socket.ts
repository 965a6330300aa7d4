// API layer: Socket.IO binding
// Feeds socket events to the realtime gateway and emits what it returns

import type { Server, Socket } from 'socket.io';
import type { ClientMessage, RealtimeGateway, ServerEvent } from '@/application/realtime/RealtimeGateway.js';
import { describeError, sessionLogger } from '@/utils/logger.js';
import { RateLimitPresets, type RateLimiter } from './middleware/rateLimiter.js';

export const RATE_LIMITED_MESSAGE = 'Too many requests. Please try again later.';

export interface SocketServerOptions {
  rateLimiter?: RateLimiter;      // Shared with the HTTP routes; omitted means no login limit
}

function emitAll(socket: Socket, events: ServerEvent[]): void {
  for (const { event, data } of events) {
    socket.emit(event, data);
  }
}

export function attachSocketServer(io: Server, gateway: RealtimeGateway, options: SocketServerOptions = {}): void {
  const { rateLimiter } = options;

  io.on('connection', (socket) => {
    const address = socket.handshake.address;

    // Messages from one socket are handled in arrival order
    let queue: Promise<void> = Promise.resolve();

    const enqueue = (type: ClientMessage['type'], work: () => Promise<ServerEvent[]>): void => {
      queue = queue
        .then(async () => emitAll(socket, await work()))
        .catch((error: unknown) => {
          sessionLogger.error('Socket event failed', {
            connectionId: socket.id,
            type,
            error: describeError(error),
          });
        });
    };

    const deliver = (message: ClientMessage): void => {
      enqueue(message.type, () => gateway.handle(socket.id, message));
    };

    // Same per-address login budget as POST /api/login
    const authenticate = (payload: unknown): void => {
      const login = RateLimitPresets.login;
      const decision = rateLimiter?.hit(`${login.name}:${address}`, login);
      if (decision && !decision.allowed) {
        sessionLogger.warn('Rate limit exceeded', { connectionId: socket.id, limit: login.name, ip: address });
        enqueue('authenticate', async () => [{ event: 'auth_error', data: { error: RATE_LIMITED_MESSAGE } }]);
        return;
      }
      deliver({ type: 'authenticate', payload });
    };

    deliver({ type: 'connect', ip: address });

    socket.on('authenticate', authenticate);
    socket.on('message', (payload: unknown) => deliver({ type: 'message', payload }));
    socket.on('command', (payload: unknown) => deliver({ type: 'command', payload }));
    socket.on('disconnect', () => deliver({ type: 'disconnect' }));
  });
}
