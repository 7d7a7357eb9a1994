/**
 * server.ts — Application entry point and bootstrap orchestrator.
 *
 * ─── Bootstrap Sequence ──────────────────────────────────────────
 *   1. Load environment config + AWS secrets (config/index.ts)
 *   2. Build the service graph for the configured store driver (container.ts)
 *   3. Create the Express app (app.ts)
 *   4. Create Socket.IO server with optional Redis adapter
 *   5. Register handshake auth and relay handlers
 *   6. Wire up the notification service
 *   7. Start the watchdog sweep for abandoned rooms
 *   8. Begin listening on the configured PORT
 *
 * ─── Graceful Shutdown ───────────────────────────────────────────
 *   On SIGTERM/SIGINT:
 *   1. Stop accepting new HTTP connections
 *   2. Stop the watchdog (pending grace timers are dropped; the sweep on
 *      the remaining pods picks those rooms up)
 *   3. Close all WebSocket connections
 *   4. Disconnect Redis clients
 *   5. Wait for in-flight requests, then exit
 *
 * ─── Error Boundaries ───────────────────────────────────────────
 *   - unhandledRejection: logs but doesn't crash (may be transient)
 *   - uncaughtException: logs and exits (unrecoverable state)
 *   - bootstrap failure: logs and exits with code 1
 */
import http from 'http';
import { Server as SocketIOServer } from 'socket.io';
import { createAdapter } from '@socket.io/redis-adapter';
import { loadConfig } from './config';
import { buildContainer } from './container';
import { createApp } from './app';
import { connectRedisPair, disconnectRedisPair } from './infra/redis';
import type { RedisPair } from './infra/redis';
import { setupSocketHandlers } from './socket';
import { setIOInstance } from './services/notificationService';
import { errorMessage } from './utils/errors';
import { logger } from './utils/logger';
import { LIMITS } from './shared';

async function bootstrap(): Promise<void> {
  // ─── Phase 1: Configuration ──────────────────────────────────
  const settings = await loadConfig();

  // ─── Phase 2: Services ───────────────────────────────────────
  const container = buildContainer(settings);

  // ─── Phase 3: Express ────────────────────────────────────────
  const app = createApp({
    consultations: container.consultations,
    jwtSecret: settings.jwtSecret,
    corsOrigins: settings.corsOrigins,
  });
  const server = http.createServer(app);

  // ─── Phase 4: Socket.IO Setup ───────────────────────────────
  const io = new SocketIOServer(server, {
    cors: { origin: settings.corsOrigins, credentials: true },
    pingInterval: LIMITS.SOCKET_PING_INTERVAL,
    pingTimeout: LIMITS.SOCKET_PING_TIMEOUT,
    maxHttpBufferSize: LIMITS.SOCKET_MAX_BUFFER_BYTES,
  });

  // ─── Phase 5: Redis Adapter (Optional) ──────────────────────
  // Lifecycle pushes to `user:<id>` rooms must reach sockets on every pod.
  let redis: RedisPair | null = null;
  if (settings.redis) {
    try {
      redis = await connectRedisPair(settings.redis);
      io.adapter(createAdapter(redis.pub, redis.sub));
      logger.info('Socket.io Redis adapter enabled');
    } catch (err) {
      logger.warn('Redis not available — running without adapter (single-pod mode)', {
        error: errorMessage(err),
      });
    }
  } else {
    logger.info('Socket.io running in single-pod mode (no Redis adapter)');
  }

  setupSocketHandlers(io, {
    consultations: container.consultations,
    relay: container.relay,
    jwtSecret: settings.jwtSecret,
  });

  // ─── Phase 6: Notifications ─────────────────────────────────
  setIOInstance(io);

  // ─── Phase 7: Background Services ───────────────────────────
  container.lifecycle.watchdog.startSweep(settings.watchdogSweepMs, () => container.lifecycle.sweep());

  // ─── Phase 8: Start Listening ───────────────────────────────
  server.listen(settings.port, () => {
    logger.info(`Server listening on port ${settings.port}`, {
      env: settings.env,
      cors: settings.corsOrigins,
    });
  });

  // ─── Graceful Shutdown Handler ──────────────────────────────
  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`${signal} received — shutting down gracefully`);

    server.close(() => {
      logger.info('HTTP server closed');
    });

    container.lifecycle.dispose();
    setIOInstance(null);
    io.close();

    if (redis) await disconnectRedisPair(redis);

    setTimeout(() => {
      logger.info('Forcing exit after grace period');
      process.exit(0);
    }, LIMITS.SHUTDOWN_GRACE_MS).unref();
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err: unknown) => {
      logger.error('Shutdown failed', { error: errorMessage(err) });
      process.exit(1);
    });
  };
  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));

  // ─── Unhandled Error Boundaries ─────────────────────────────
  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled promise rejection', { reason: errorMessage(reason) });
  });

  process.on('uncaughtException', (err) => {
    logger.error('Uncaught exception — shutting down', { error: err.message, stack: err.stack });
    process.exit(1);
  });
}

// ─── Entry Point ─────────────────────────────────────────────────
bootstrap().catch((err: unknown) => {
  logger.error('Failed to start server', { error: errorMessage(err) });
  process.exit(1);
});
