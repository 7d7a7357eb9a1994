/**
 * sessionStore.ts — Contract for the meeting session table.
 *
 * The store is the single source of truth for "can X join now?" and the
 * only state shared between pods. compareAndSwapState() is the sole
 * mutation path after creation: when two requests race on the same
 * expected state, exactly one gets `ok: true`. The loser receives the
 * record as it is now and must decide again from that; it never retries
 * the same swap.
 *
 * Drivers:
 *   - DynamoSessionStore  (conditional UpdateCommand)
 *   - MemorySessionStore  (single process: development and tests)
 */
import type { MeetingSession, ParticipantRole, SessionPatch, SessionSeed, SessionState } from '../shared';

export type CasResult =
  | { ok: true; session: MeetingSession }
  | { ok: false; current: MeetingSession | null };

export interface SessionStore {
  /** Idempotent: returns the existing record for seed.roomId or creates it SCHEDULED */
  getOrCreate(seed: SessionSeed): Promise<MeetingSession>;

  read(roomId: string): Promise<MeetingSession | null>;

  compareAndSwapState(
    roomId: string,
    expected: SessionState,
    next: SessionState,
    patch?: SessionPatch,
  ): Promise<CasResult>;

  /** Sessions where the user is the doctor (or the patient), newest first */
  listByParticipant(role: ParticipantRole, userId: string): Promise<MeetingSession[]>;

  /** Every ACTIVE session — feeds the watchdog sweep */
  listActive(): Promise<MeetingSession[]>;
}

export function newScheduledSession(seed: SessionSeed, now: Date): MeetingSession {
  return {
    roomId: seed.roomId,
    appointmentId: seed.appointmentId,
    doctorId: seed.doctorId,
    patientId: seed.patientId,
    state: 'SCHEDULED',
    createdAt: now.toISOString(),
    startedAt: null,
    endedAt: null,
    cancelledAt: null,
    lastPatientSeenAt: null,
    lastDoctorSeenAt: null,
    endReason: null,
  };
}

export function byCreatedAtDesc(a: MeetingSession, b: MeetingSession): number {
  return b.createdAt.localeCompare(a.createdAt);
}
