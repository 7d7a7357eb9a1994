/**
 * memorySessionStore.ts — In-process SessionStore driver.
 *
 * Used with SESSION_STORE=memory (local development without LocalStack)
 * and by the test suite. Every method body runs without an await between
 * the check and the write, so a compare-and-swap is atomic on the event
 * loop. Records are copied on the way in and out.
 */
import type { MeetingSession, ParticipantRole, SessionPatch, SessionSeed, SessionState } from '../shared';
import { PARTICIPANT_ROLE, SESSION_STATE } from '../shared';
import type { CasResult, SessionStore } from './sessionStore';
import { byCreatedAtDesc, newScheduledSession } from './sessionStore';

export class MemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, MeetingSession>();

  constructor(private readonly clock: () => Date = () => new Date()) {}

  async getOrCreate(seed: SessionSeed): Promise<MeetingSession> {
    const existing = this.sessions.get(seed.roomId);
    if (existing) return { ...existing };

    const created = newScheduledSession(seed, this.clock());
    this.sessions.set(seed.roomId, created);
    return { ...created };
  }

  async read(roomId: string): Promise<MeetingSession | null> {
    const session = this.sessions.get(roomId);
    return session ? { ...session } : null;
  }

  async compareAndSwapState(
    roomId: string,
    expected: SessionState,
    next: SessionState,
    patch: SessionPatch = {},
  ): Promise<CasResult> {
    const current = this.sessions.get(roomId);
    if (!current || current.state !== expected) {
      return { ok: false, current: current ? { ...current } : null };
    }

    const updated: MeetingSession = { ...current, ...patch, state: next };
    this.sessions.set(roomId, updated);
    return { ok: true, session: { ...updated } };
  }

  async listByParticipant(role: ParticipantRole, userId: string): Promise<MeetingSession[]> {
    const owns = (s: MeetingSession) =>
      role === PARTICIPANT_ROLE.DOCTOR ? s.doctorId === userId : s.patientId === userId;
    return [...this.sessions.values()].filter(owns).map((s) => ({ ...s })).sort(byCreatedAtDesc);
  }

  async listActive(): Promise<MeetingSession[]> {
    return [...this.sessions.values()]
      .filter((s) => s.state === SESSION_STATE.ACTIVE)
      .map((s) => ({ ...s }));
  }
}
