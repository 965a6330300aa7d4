// Server entry point
// Bootstrap the HTTP and Socket.IO server

import 'dotenv/config';
import { createServer } from 'http';
import { Server } from 'socket.io';
import { createApp } from '@/api/app.js';
import { attachSocketServer } from '@/api/socket.js';
import { RateLimiter } from '@/api/middleware/rateLimiter.js';
import { buildAppConfig, validateConfig } from '@/utils/config.js';
import { DatabaseService } from '@/infrastructure/database/DatabaseService.js';
import { createMailDispatcher } from '@/infrastructure/mail/MailDispatcher.js';
import { createServices } from '@/services.js';
import { describeError, serverLogger } from '@/utils/logger.js';

async function main(): Promise<void> {
  // Build configuration from environment
  const config = buildAppConfig(process.env);

  // Validate configuration
  const errors = validateConfig(config);
  if (errors.length > 0) {
    errors.forEach((err) => serverLogger.error('Configuration error', { error: err }));
    process.exit(1);
  }

  serverLogger.info('Initializing database', { path: config.databasePath });
  let database: DatabaseService;
  try {
    database = await DatabaseService.open({ path: config.databasePath });
  } catch (error) {
    serverLogger.error('Failed to initialize database', { error: describeError(error) });
    process.exit(1);
  }

  const mailer = createMailDispatcher(config.mail, config.auth.verificationCodeTtlHours);
  const services = createServices({ database, auth: config.auth, mailer });

  // One limiter for HTTP and realtime logins
  const rateLimiter = new RateLimiter();
  const app = createApp(services, {
    corsOrigins: config.server.allowedOrigins,
    trustProxy: config.server.nodeEnv === 'production',
    logFormat: config.server.nodeEnv === 'production' ? 'combined' : 'dev',
    rateLimitEnabled: config.rateLimitEnabled,
    rateLimiter,
  });

  const server = createServer(app);
  const io = new Server(server, {
    cors: {
      origin: config.server.allowedOrigins,
      methods: ['GET', 'POST'],
    },
  });
  attachSocketServer(io, services.gateway, {
    rateLimiter: config.rateLimitEnabled ? rateLimiter : undefined,
  });

  server.listen(config.server.port, config.server.host, () => {
    serverLogger.info('Server running', {
      host: config.server.host,
      port: config.server.port,
      nodeEnv: config.server.nodeEnv,
      rateLimitEnabled: config.rateLimitEnabled,
    });
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    serverLogger.info('Starting graceful shutdown', { signal });
    io.close(() => {
      database
        .close()
        .then(() => {
          serverLogger.info('Server closed');
          process.exit(0);
        })
        .catch((error: unknown) => {
          serverLogger.error('Failed to flush database', { error: describeError(error) });
          process.exit(1);
        });
    });

    // Force exit after 10 seconds
    setTimeout(() => {
      serverLogger.error('Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  process.on('unhandledRejection', (reason) => {
    serverLogger.error('Unhandled rejection', { error: describeError(reason) });
  });
}

// Run main
main().catch((error: unknown) => {
  serverLogger.error('Fatal error during startup', { error: describeError(error) });
  process.exit(1);
});
