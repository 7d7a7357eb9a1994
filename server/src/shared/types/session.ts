/**
 * session.ts — Core domain models for video consultations.
 *
 * DynamoDB tables that use these types:
 *   - Teleconsult_MeetingSessions → MeetingSession (PK: roomId)
 *   - Teleconsult_Appointments    → Appointment    (PK: appointmentId, read only)
 *   - Teleconsult_AuditLog        → AuditRecord    (PK: roomId, SK: auditId)
 *
 * Identity and RoomParties are in-memory shapes passed between layers.
 */
import type {
  AuditOutcome,
  EndReason,
  Operation,
  ParticipantRole,
  SessionState,
  UserRole,
} from '../constants/enums';

// ─── MeetingSession ───────────────────────────────────────────────
// One record per appointment-derived room. Never deleted; ENDED and
// CANCELLED records stay behind as the audit trail of the call.
//
// Invariants:
//   ACTIVE ⇒ startedAt set, endedAt null
//   ENDED  ⇒ startedAt and endedAt set
export interface MeetingSession {
  roomId: string;                   // UUID v5 of the appointment id
  appointmentId: string;            // FK → Appointment.appointmentId
  doctorId: string;                 // Immutable after creation
  patientId: string;                // Immutable after creation
  state: SessionState;
  createdAt: string;                // ISO 8601
  startedAt: string | null;         // Set once, on start
  endedAt: string | null;           // Set once, on end / expiry
  cancelledAt: string | null;       // Set once, on cancel
  lastPatientSeenAt: string | null; // Patient connect / heartbeat / disconnect
  lastDoctorSeenAt: string | null;  // Doctor connect / sweep while bound
  endReason: EndReason | null;
}

/** Fields a compare-and-swap may write alongside the state */
export type SessionPatch = Partial<
  Pick<
    MeetingSession,
    'startedAt' | 'endedAt' | 'cancelledAt' | 'lastPatientSeenAt' | 'lastDoctorSeenAt' | 'endReason'
  >
>;

/** What the store needs to create a SCHEDULED record */
export interface SessionSeed {
  roomId: string;
  appointmentId: string;
  doctorId: string;
  patientId: string;
}

// ─── Appointment ──────────────────────────────────────────────────
// Owned by the booking side of the application; this server only reads it.
export interface Appointment {
  appointmentId: string;
  doctorId: string;
  patientId: string;
  scheduledTime: string | null;     // ISO 8601
}

// ─── Identity ─────────────────────────────────────────────────────
// Decoded from the caller's JWT (HTTP Authorization header or the
// Socket.IO handshake).
export interface Identity {
  userId: string;
  role: UserRole;
}

// ─── RoomParties ──────────────────────────────────────────────────
// The two people allowed into a room. Built from a stored session or,
// before the first write, from the appointment.
export interface RoomParties {
  roomId: string;
  appointmentId: string;
  doctorId: string;
  patientId: string;
}

// ─── AuditRecord ──────────────────────────────────────────────────
export interface AuditRecord {
  roomId: string;
  auditId: string;                  // `${timestamp}#${uuid}` — sortable per room
  timestamp: string;
  userId: string | null;
  role: UserRole | null;
  operation: Operation;
  outcome: AuditOutcome;
}

// ─── StatusView ───────────────────────────────────────────────────
// Read-only projection returned to pollers.
export interface StatusView {
  roomId: string;
  state: SessionState;
  canJoin: boolean;
  message: string;
  role: ParticipantRole;
}
