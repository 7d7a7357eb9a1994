/**
 * shared/index.ts — Barrel export for all shared types and constants.
 *
 * Server code imports from here (e.g. `import { LIMITS, MeetingSession } from '../shared'`)
 * rather than reaching into individual files.
 */

export { LIMITS } from './constants/limits';

export { SOCKET_EVENTS } from './constants/events';
export type { SocketEvent } from './constants/events';

export {
  SESSION_STATE, SESSION_STATES, PARTICIPANT_ROLE, USER_ROLE, OPERATION,
  END_REASON, SIGNAL_TYPE, AUDIT_OUTCOME,
} from './constants/enums';
export type {
  SessionState, ParticipantRole, UserRole, Operation, EndReason, SignalType, AuditOutcome,
} from './constants/enums';

export type {
  MeetingSession,
  SessionPatch,
  SessionSeed,
  Appointment,
  Identity,
  RoomParties,
  AuditRecord,
  StatusView,
} from './types/session';

export type {
  SignalFrame,
  RoomJoinedPayload,
  JoinRejectedPayload,
  PeerPresencePayload,
  DuplicateSessionPayload,
  SessionEndedPayload,
  MeetingNoticePayload,
  ErrorPayload,
} from './types/socket';
