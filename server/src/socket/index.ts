/**
 * socket/index.ts — Socket.IO handshake auth and handler registry.
 *
 * Every connection must present a JWT in the handshake (`auth.token`, or
 * a Bearer Authorization header for non-browser clients). Connections
 * without a valid token are refused before any handler is attached.
 *
 * Once connected, the socket joins its personal room `user:<userId>`,
 * which is where lifecycle pushes (meeting-started / ended / cancelled)
 * arrive, and gets the relay handlers (socket/relay.ts).
 *
 * The Socket interface is extended with the caller's identity and, once
 * join-room succeeds, the consultation room and the seat it holds there.
 */
import type { Server as SocketIOServer, Socket } from 'socket.io';
import type { ParticipantRole, UserRole } from '../shared';
import type { ConsultationService } from '../services/consultationService';
import type { RelayHub } from '../relay/relayHub';
import { userRoom } from '../services/notificationService';
import { bearerToken, verifyToken } from '../middleware/auth';
import { handleRelay } from './relay';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

// ─── Socket Type Extension ───────────────────────────────────────
// userId / userRole are set by the handshake middleware; roomId and
// participantRole only while this socket holds a relay slot.
declare module 'socket.io' {
  interface Socket {
    userId?: string;                    // From the verified JWT
    userRole?: UserRole;                // Portal role from the JWT
    roomId?: string;                    // Consultation room this socket is bound to
    participantRole?: ParticipantRole;  // Seat held in that room
  }
}

export interface SocketDeps {
  consultations: ConsultationService;
  relay: RelayHub;
  jwtSecret: string;
}

/** Token from the handshake: `auth.token` first, then the Authorization header */
export function handshakeToken(socket: Socket): string | null {
  const fromAuth: unknown = socket.handshake.auth?.token;
  if (typeof fromAuth === 'string' && fromAuth.length > 0) return fromAuth;
  return bearerToken(socket.handshake.headers.authorization);
}

/**
 * Registers handshake auth and all socket event handlers on the Socket.IO
 * server instance. Called once during bootstrap (see server.ts).
 */
export function setupSocketHandlers(io: SocketIOServer, deps: SocketDeps): void {
  io.use((socket, next) => {
    const token = handshakeToken(socket);
    const identity = token ? verifyToken(token, deps.jwtSecret) : null;
    if (!identity) {
      logger.warn('Socket handshake rejected', { socketId: socket.id });
      next(new Error('Unauthorized'));
      return;
    }
    socket.userId = identity.userId;
    socket.userRole = identity.role;
    next();
  });

  io.on('connection', (socket: Socket) => {
    logger.info('User connected', { socketId: socket.id, userId: socket.userId });

    if (socket.userId) {
      socket.join(userRoom(socket.userId));
    }

    // Relay handlers (join-room, signal, heartbeat, leave-room, disconnect)
    handleRelay(socket, deps);

    // Catch-all for unhandled socket-level errors
    socket.on('error', (err: unknown) => {
      logger.error('Socket error', { socketId: socket.id, error: errorMessage(err) });
    });
  });

  logger.info('Socket.io handlers registered');
}
