/**
 * notificationService.ts — Push consultation state changes to both parties.
 *
 * Every authenticated socket joins a personal room `user:<userId>` on
 * connect (socket/index.ts), so a patient sitting on the waiting screen
 * hears "meeting-started" without polling, and a doctor's dashboard sees
 * the call end when the watchdog closes it.
 *
 * The io instance is injected at startup via setIOInstance() — called from
 * server.ts after the Socket.IO server is created. With the Redis adapter
 * attached the emit reaches sockets on every pod.
 *
 * Events emitted:
 *   - MEETING_STARTED:   doctor started the consultation
 *   - MEETING_ENDED:     ended by the doctor or by a timeout (endReason says which)
 *   - MEETING_CANCELLED: cancelled before it started
 */
import type { Server as SocketIOServer } from 'socket.io';
import { SOCKET_EVENTS } from '../shared';
import type { MeetingNoticePayload, MeetingSession, SocketEvent } from '../shared';
import { logger } from '../utils/logger';

export interface SessionNotifier {
  meetingStarted(session: MeetingSession): void;
  meetingEnded(session: MeetingSession): void;
  meetingCancelled(session: MeetingSession): void;
}

/** Socket.IO server instance — set once during bootstrap, used for all notifications */
let ioInstance: SocketIOServer | null = null;

export function setIOInstance(io: SocketIOServer | null): void {
  ioInstance = io;
}

export function userRoom(userId: string): string {
  return `user:${userId}`;
}

function broadcast(event: SocketEvent, session: MeetingSession, at: string | null): void {
  if (!ioInstance) return;

  const payload: MeetingNoticePayload = {
    roomId: session.roomId,
    appointmentId: session.appointmentId,
    state: session.state,
    at: at ?? new Date().toISOString(),
    ...(session.endReason ? { endReason: session.endReason } : {}),
  };
  ioInstance.to([userRoom(session.doctorId), userRoom(session.patientId)]).emit(event, payload);
  logger.debug('Consultation notice sent', { event, roomId: session.roomId });
}

export const socketNotifier: SessionNotifier = {
  meetingStarted: (session) => broadcast(SOCKET_EVENTS.MEETING_STARTED, session, session.startedAt),
  meetingEnded: (session) => broadcast(SOCKET_EVENTS.MEETING_ENDED, session, session.endedAt),
  meetingCancelled: (session) => broadcast(SOCKET_EVENTS.MEETING_CANCELLED, session, session.cancelledAt),
};
