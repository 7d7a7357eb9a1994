/**
 * socket.ts — Type definitions for Socket.IO event payloads.
 *
 * Event names live in ../constants/events.ts (SOCKET_EVENTS). The relay
 * never inspects signaling payloads; SignalFrame.payload is opaque.
 */
import type { EndReason, ParticipantRole, SessionState, SignalType } from '../constants/enums';

// ═══════════════════════════════════════════════════════════════════
// 1. Client → Server
// ═══════════════════════════════════════════════════════════════════

/** Opaque WebRTC signaling frame, forwarded verbatim to the peer */
export interface SignalFrame {
  type: SignalType;
  payload: unknown;                 // SDP description or ICE candidate
}

// ═══════════════════════════════════════════════════════════════════
// 2. Server → Client
// ═══════════════════════════════════════════════════════════════════

/** Admission accepted */
export interface RoomJoinedPayload {
  roomId: string;
  role: ParticipantRole;
  peerPresent: boolean;             // Whether the other participant is already bound
}

/** Admission refused — the client should re-check status before retrying */
export interface JoinRejectedPayload {
  roomId: string;
  code: string;                     // NOT_YET_STARTED | SESSION_CLOSED | RELAY_REFUSED | FORBIDDEN ...
  message: string;
  state?: string;
}

/** The other participant bound to / dropped from the room */
export interface PeerPresencePayload {
  roomId: string;
  role: ParticipantRole;
}

/** A newer connection for the same role took over this slot */
export interface DuplicateSessionPayload {
  roomId: string;
  message: string;
}

/** The relay for this room was torn down */
export interface SessionEndedPayload {
  roomId: string;
  reason: EndReason | 'cancelled';
}

/** Pushed to both participants' personal channels on lifecycle changes */
export interface MeetingNoticePayload {
  roomId: string;
  appointmentId: string;
  state: SessionState;
  at: string;                       // ISO 8601 time of the transition
  endReason?: EndReason | null;
}

/** Generic error payload */
export interface ErrorPayload {
  message: string;
  code?: string;
}
