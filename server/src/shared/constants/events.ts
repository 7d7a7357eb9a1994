/**
 * events.ts — Socket.IO event name constants.
 *
 * Every real-time event exchanged with consultation clients is named here so
 * the handlers, the relay and the notification service share one spelling.
 *
 * Event categories:
 *   - Room admission:    JOIN_ROOM, ROOM_JOINED, JOIN_REJECTED, LEAVE_ROOM
 *   - Presence:          PEER_JOINED, PEER_LEFT, DUPLICATE_SESSION, HEARTBEAT
 *   - WebRTC signaling:  SIGNAL (offer / answer / ice_candidate frames)
 *   - Lifecycle push:    MEETING_STARTED, MEETING_ENDED, MEETING_CANCELLED, SESSION_ENDED
 *   - Misc:              ERROR
 */
export const SOCKET_EVENTS = {
  // ─── Room Admission ───────────────────────────────────────────
  JOIN_ROOM: 'join-room',                 // Client → Server: bind this socket to a consultation room
  ROOM_JOINED: 'room-joined',             // Server → Client: admission accepted
  JOIN_REJECTED: 'join-rejected',         // Server → Client: admission refused (code + state)
  LEAVE_ROOM: 'leave-room',               // Client → Server: explicit hang-up of this connection

  // ─── Presence ─────────────────────────────────────────────────
  PEER_JOINED: 'peer-joined',             // Server → Peer: the other participant is now bound
  PEER_LEFT: 'peer-left',                 // Server → Peer: the other participant dropped
  DUPLICATE_SESSION: 'duplicate-session', // Server → Old Tab: a newer connection took this slot
  HEARTBEAT: 'heartbeat',                 // Client → Server: patient keep-alive

  // ─── WebRTC Signaling ─────────────────────────────────────────
  SIGNAL: 'signal',                       // Bidirectional: opaque signaling frame relay

  // ─── Lifecycle Push ───────────────────────────────────────────
  MEETING_STARTED: 'meeting-started',     // Server → Participants: doctor started the consultation
  MEETING_ENDED: 'meeting-ended',         // Server → Participants: consultation reached ENDED
  MEETING_CANCELLED: 'meeting-cancelled', // Server → Participants: consultation was cancelled
  SESSION_ENDED: 'session-ended',         // Server → Bound connection: relay torn down

  // ─── Error ────────────────────────────────────────────────────
  ERROR: 'error',
} as const;

export type SocketEvent = (typeof SOCKET_EVENTS)[keyof typeof SOCKET_EVENTS];
