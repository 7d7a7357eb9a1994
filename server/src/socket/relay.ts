/**
 * socket/relay.ts — Consultation room events on a single socket.
 *
 * ─── JOIN_ROOM Flow ──────────────────────────────────────────────
 *   1. Validate the room id
 *   2. ConsultationService.admitConnection → gate (join) → lifecycle.admit
 *      → relay admission (state re-checked inside the room's mailbox)
 *   3. Remember roomId / participantRole on the socket, then give up the
 *      seat in the room it held before, if any
 *   4. ROOM_JOINED to the caller; the relay sends PEER_JOINED to the peer
 *   Any refusal comes back as JOIN_REJECTED { code, message, state? } and
 *   the client is expected to re-poll status. A refused switch keeps the
 *   old seat.
 *
 *   Joins and leaves from one socket run one at a time, in arrival order.
 *
 * ─── Ghost Connection Cleanup ───────────────────────────────────
 *   A second tab for the same seat takes the slot. The old socket gets
 *   DUPLICATE_SESSION and is force-disconnected; its later disconnect event
 *   no longer holds the slot, so it does not count as leaving the call.
 *
 * ─── Signaling ──────────────────────────────────────────────────
 *   SIGNAL frames `{ type, payload }` go to the other seat of the same
 *   room, unchanged. The server never looks inside the payload.
 *
 * ─── Leave / Disconnect ─────────────────────────────────────────
 *   Releasing the slot raises a vacated event: the doctor leaving ends the
 *   consultation, the patient leaving opens the reconnect grace window.
 */
import type { Socket } from 'socket.io';
import { SOCKET_EVENTS } from '../shared';
import type {
  DuplicateSessionPayload,
  ErrorPayload,
  Identity,
  JoinRejectedPayload,
  PeerPresencePayload,
  RoomJoinedPayload,
  SessionEndedPayload,
} from '../shared';
import type { RelayConnection } from '../relay/connection';
import { otherRole } from '../relay/connection';
import type { SocketDeps } from './index';
import { AppError, errorMessage } from '../utils/errors';
import { isSignalFrame, validateRoomId } from '../utils/validators';
import { logger } from '../utils/logger';

/** Adapt a socket to the relay's connection interface for one room */
export function socketConnection(socket: Socket, roomId: string): RelayConnection {
  let replaced = false;

  return {
    id: socket.id,
    deliver: (frame) => {
      socket.emit(SOCKET_EVENTS.SIGNAL, frame);
    },
    notify: (notice) => {
      switch (notice.kind) {
        case 'peer-joined':
        case 'peer-left': {
          const payload: PeerPresencePayload = { roomId, role: notice.role };
          socket.emit(notice.kind === 'peer-joined' ? SOCKET_EVENTS.PEER_JOINED : SOCKET_EVENTS.PEER_LEFT, payload);
          break;
        }
        case 'replaced': {
          replaced = true;
          const payload: DuplicateSessionPayload = { roomId, message: 'Consultation opened in another tab' };
          socket.emit(SOCKET_EVENTS.DUPLICATE_SESSION, payload);
          break;
        }
        case 'session-ended': {
          const payload: SessionEndedPayload = { roomId, reason: notice.reason };
          socket.emit(SOCKET_EVENTS.SESSION_ENDED, payload);
          break;
        }
      }
    },
    close: () => {
      if (socket.roomId === roomId) {
        socket.roomId = undefined;
        socket.participantRole = undefined;
      }
      // The socket stays up after a teardown so meeting-ended still reaches it
      if (replaced) socket.disconnect(true);
    },
  };
}

export function socketIdentity(socket: Socket): Identity | undefined {
  if (!socket.userId || !socket.userRole) return undefined;
  return { userId: socket.userId, role: socket.userRole };
}

function roomIdOf(payload: unknown): unknown {
  if (typeof payload === 'object' && payload !== null && 'roomId' in payload) {
    return payload.roomId;
  }
  return undefined;
}

function rejection(roomId: string, err: unknown): JoinRejectedPayload {
  if (err instanceof AppError) {
    const state = err.details.state;
    return {
      roomId,
      code: err.code,
      message: err.message,
      ...(typeof state === 'string' ? { state } : {}),
    };
  }
  return { roomId, code: 'INTERNAL_ERROR', message: 'Could not join the consultation' };
}

function errorPayload(err: unknown): ErrorPayload {
  if (err instanceof AppError) return { message: err.message, code: err.code };
  return { message: 'Internal server error', code: 'INTERNAL_ERROR' };
}

export function handleRelay(socket: Socket, { consultations, relay }: SocketDeps): void {
  /** Give up whatever slot this socket holds; a no-op if it was replaced */
  const release = async (): Promise<void> => {
    const { roomId, participantRole } = socket;
    if (!roomId || !participantRole) return;
    socket.roomId = undefined;
    socket.participantRole = undefined;
    await relay.evict(roomId, participantRole, socket.id);
  };

  // Tail of this socket's join / leave chain
  let pending: Promise<void> = Promise.resolve();
  const enqueue = (task: () => Promise<void>): void => {
    pending = pending.then(task);
  };

  // ─── Join Room ─────────────────────────────────────────────────
  const join = async (payload: unknown): Promise<void> => {
    const roomId = roomIdOf(payload);
    if (!validateRoomId(roomId)) {
      socket.emit(SOCKET_EVENTS.JOIN_REJECTED, {
        roomId: typeof roomId === 'string' ? roomId : '',
        code: 'VALIDATION_ERROR',
        message: 'A valid roomId is required',
      } satisfies JoinRejectedPayload);
      return;
    }

    const previous = { roomId: socket.roomId, role: socket.participantRole };

    try {
      const { cap } = await consultations.admitConnection(
        socketIdentity(socket),
        roomId,
        socketConnection(socket, roomId),
      );

      // The socket dropped while admission was in flight
      if (socket.disconnected) {
        await relay.evict(roomId, cap.role, socket.id);
        return;
      }

      socket.roomId = roomId;
      socket.participantRole = cap.role;
      if (previous.roomId && previous.role && previous.roomId !== roomId) {
        await relay.evict(previous.roomId, previous.role, socket.id);
      }

      const joined: RoomJoinedPayload = {
        roomId,
        role: cap.role,
        peerPresent: relay.isBound(roomId, otherRole(cap.role)),
      };
      socket.emit(SOCKET_EVENTS.ROOM_JOINED, joined);
    } catch (err) {
      if (!(err instanceof AppError)) {
        logger.error('Error joining room', { roomId, socketId: socket.id, error: errorMessage(err) });
      } else {
        logger.info('Join rejected', { roomId, userId: socket.userId, code: err.code });
      }
      socket.emit(SOCKET_EVENTS.JOIN_REJECTED, rejection(roomId, err));
    }
  };

  socket.on(SOCKET_EVENTS.JOIN_ROOM, (payload: unknown) => {
    enqueue(() => join(payload));
  });

  // ─── Signaling Relay ───────────────────────────────────────────
  socket.on(SOCKET_EVENTS.SIGNAL, (frame: unknown) => {
    try {
      const { roomId, participantRole } = socket;
      if (!roomId || !participantRole) {
        socket.emit(SOCKET_EVENTS.ERROR, { message: 'Join a consultation before signaling', code: 'NOT_JOINED' });
        return;
      }
      if (!isSignalFrame(frame)) {
        socket.emit(SOCKET_EVENTS.ERROR, { message: 'Malformed signaling frame', code: 'VALIDATION_ERROR' });
        return;
      }

      // Forward exactly what the client sent, not a re-built copy
      const outcome = relay.send(roomId, participantRole, socket.id, frame);
      if (outcome === 'not_bound') {
        socket.emit(SOCKET_EVENTS.ERROR, { message: 'Not connected to this consultation', code: 'NOT_JOINED' });
      } else if (outcome === 'no_peer') {
        logger.debug('Signal dropped, peer not connected', { roomId, type: frame.type });
      }
    } catch (err) {
      logger.error('Error relaying signal', { socketId: socket.id, error: errorMessage(err) });
    }
  });

  // ─── Patient Heartbeat ─────────────────────────────────────────
  socket.on(SOCKET_EVENTS.HEARTBEAT, async () => {
    if (!socket.roomId) return;
    try {
      await consultations.heartbeat(socketIdentity(socket), socket.roomId);
    } catch (err) {
      if (!(err instanceof AppError)) {
        logger.error('Error handling heartbeat', { socketId: socket.id, error: errorMessage(err) });
      }
      socket.emit(SOCKET_EVENTS.ERROR, errorPayload(err));
    }
  });

  // ─── Leave Room ────────────────────────────────────────────────
  socket.on(SOCKET_EVENTS.LEAVE_ROOM, () => {
    enqueue(async () => {
      try {
        await release();
      } catch (err) {
        logger.error('Error leaving room', { socketId: socket.id, error: errorMessage(err) });
      }
    });
  });

  // ─── Disconnect ────────────────────────────────────────────────
  socket.on('disconnect', async (reason) => {
    try {
      logger.info('User disconnected', { socketId: socket.id, roomId: socket.roomId, reason });
      await release();
    } catch (err) {
      logger.error('Error handling disconnect', { socketId: socket.id, error: errorMessage(err) });
    }
  });
}
