/**
 * lifecycleService.ts — The consultation state machine.
 *
 *   SCHEDULED ──start──▶ ACTIVE ──end / disconnect / timeout──▶ ENDED
 *       │
 *       └──cancel──▶ CANCELLED
 *
 * Every transition is a compare-and-swap on the session store. Two racing
 * requests for the same edge produce exactly one winner; the loser gets a
 * typed error built from the record as it is after the race. ENDED and
 * CANCELLED are terminal: no edge leaves them.
 *
 * Caller-driven operations take a Capability from the AccessGate. System
 * events (relay disconnects, watchdog timers, the periodic sweep) come in
 * through handleVacated / expireGrace / expireDoctorConnect / sweep.
 *
 * Leaving ACTIVE always finishes with finalize(): relay teardown, timers
 * cleared, both parties notified. The store write happens first, so the
 * relay is never torn down for a transition that did not commit.
 */
import { END_REASON, OPERATION, PARTICIPANT_ROLE, SESSION_STATE } from '../shared';
import type {
  EndReason,
  MeetingSession,
  ParticipantRole,
  RoomParties,
  SessionPatch,
  SessionState,
} from '../shared';
import type { CasResult, SessionStore } from '../repositories/sessionStore';
import type { RelayConnection } from '../relay/connection';
import type { PresenceProbe } from '../relay/roomChannel';
import type { RelayHub } from '../relay/relayHub';
import { assertCapability } from './accessGate';
import type { Capability } from './accessGate';
import { GraceWatchdog } from './graceWatchdog';
import type { WatchKind } from './graceWatchdog';
import type { SessionNotifier } from './notificationService';
import {
  ConflictError,
  NotFoundError,
  NotYetStartedError,
  RelayRefusedError,
  SessionClosedError,
  errorMessage,
} from '../utils/errors';
import { logger } from '../utils/logger';

// ─── Transition Table ─────────────────────────────────────────────
// ACTIVE → ACTIVE is the presence bookkeeping edge (lastPatientSeenAt, lastDoctorSeenAt).
export const LEGAL_TRANSITIONS: Record<SessionState, readonly SessionState[]> = {
  [SESSION_STATE.SCHEDULED]: [SESSION_STATE.ACTIVE, SESSION_STATE.CANCELLED],
  [SESSION_STATE.ACTIVE]: [SESSION_STATE.ACTIVE, SESSION_STATE.ENDED],
  [SESSION_STATE.ENDED]: [],
  [SESSION_STATE.CANCELLED]: [],
};

export function isLegalTransition(from: SessionState, to: SessionState): boolean {
  return LEGAL_TRANSITIONS[from].includes(to);
}

export function isTerminal(state: SessionState): boolean {
  return LEGAL_TRANSITIONS[state].length === 0;
}

/** Relay admission probe: both roles may only be bound while the session is ACTIVE */
export function presencePermitted(store: SessionStore): PresenceProbe {
  return async (roomId) => {
    const session = await store.read(roomId);
    return session?.state === SESSION_STATE.ACTIVE;
  };
}

/** Throws the error a joiner should see for a session that cannot be joined */
export function assertJoinable(session: MeetingSession | null): asserts session is MeetingSession {
  if (!session || session.state === SESSION_STATE.SCHEDULED) {
    throw new NotYetStartedError();
  }
  if (session.state === SESSION_STATE.ENDED) {
    throw new SessionClosedError(SESSION_STATE.ENDED, 'Consultation has ended');
  }
  if (session.state === SESSION_STATE.CANCELLED) {
    throw new SessionClosedError(SESSION_STATE.CANCELLED, 'Consultation was cancelled');
  }
}

export interface LifecycleOptions {
  graceWindowMs: number;
  doctorConnectTimeoutMs: number;
}

export interface LifecycleDeps {
  store: SessionStore;
  relay: RelayHub;
  notifier: SessionNotifier;
  options: LifecycleOptions;
  clock?: () => Date;
}

export class SessionLifecycle {
  readonly watchdog: GraceWatchdog;
  private readonly store: SessionStore;
  private readonly relay: RelayHub;
  private readonly notifier: SessionNotifier;
  private readonly options: LifecycleOptions;
  private readonly clock: () => Date;
  private readonly unsubscribe: () => void;

  constructor(deps: LifecycleDeps) {
    this.store = deps.store;
    this.relay = deps.relay;
    this.notifier = deps.notifier;
    this.options = deps.options;
    this.clock = deps.clock ?? (() => new Date());
    this.watchdog = new GraceWatchdog((roomId, kind) => this.onWatchdog(roomId, kind));
    this.unsubscribe = this.relay.onVacated((roomId, role) => {
      this.handleVacated(roomId, role).catch((err: unknown) => {
        logger.error('Failed to handle relay disconnect', { roomId, role, error: errorMessage(err) });
      });
    });
  }

  // ─── Reads ──────────────────────────────────────────────────────

  ensureSession(parties: RoomParties): Promise<MeetingSession> {
    return this.store.getOrCreate(parties);
  }

  getSession(roomId: string): Promise<MeetingSession | null> {
    return this.store.read(roomId);
  }

  // ─── Doctor Operations ──────────────────────────────────────────

  /** SCHEDULED → ACTIVE. Exactly one of N concurrent calls succeeds. */
  async start(cap: Capability): Promise<MeetingSession> {
    assertCapability(cap, OPERATION.START);

    const result = await this.swap(cap.roomId, SESSION_STATE.SCHEDULED, SESSION_STATE.ACTIVE, {
      startedAt: this.nowIso(),
    });
    if (!result.ok) throw startConflict(cap.roomId, result.current);

    this.watchdog.arm(cap.roomId, 'doctor_connect', this.options.doctorConnectTimeoutMs);
    this.notifier.meetingStarted(result.session);
    logger.info('Consultation started', { roomId: cap.roomId, doctorId: cap.userId });
    return result.session;
  }

  /**
   * ACTIVE → ENDED by the doctor. Ending an already ENDED session returns
   * it unchanged; the first endedAt and endReason stand.
   */
  async end(cap: Capability): Promise<MeetingSession> {
    assertCapability(cap, OPERATION.END);

    const result = await this.swap(cap.roomId, SESSION_STATE.ACTIVE, SESSION_STATE.ENDED, {
      endedAt: this.nowIso(),
      endReason: END_REASON.DOCTOR_ENDED,
    });
    if (result.ok) {
      await this.finalize(result.session, END_REASON.DOCTOR_ENDED);
      logger.info('Consultation ended', { roomId: cap.roomId, reason: END_REASON.DOCTOR_ENDED });
      return result.session;
    }

    const current = result.current;
    if (current?.state === SESSION_STATE.ENDED) return current;

    // No record reads as SCHEDULED, the same as status reports it
    const state = current?.state ?? SESSION_STATE.SCHEDULED;
    switch (state) {
      case SESSION_STATE.SCHEDULED:
        throw new ConflictError('Consultation has not started yet, cancel it instead', SESSION_STATE.SCHEDULED);
      case SESSION_STATE.CANCELLED:
        throw new SessionClosedError(SESSION_STATE.CANCELLED, 'Consultation was cancelled');
      default:
        throw new ConflictError('Consultation state changed, try again', state);
    }
  }

  /** SCHEDULED → CANCELLED. Repeating it returns the cancelled session. */
  async cancel(cap: Capability): Promise<MeetingSession> {
    assertCapability(cap, OPERATION.CANCEL);

    const result = await this.swap(cap.roomId, SESSION_STATE.SCHEDULED, SESSION_STATE.CANCELLED, {
      cancelledAt: this.nowIso(),
    });
    if (result.ok) {
      await this.finalize(result.session, 'cancelled');
      logger.info('Consultation cancelled', { roomId: cap.roomId });
      return result.session;
    }

    const current = result.current;
    if (!current) throw new NotFoundError('Consultation not found');
    switch (current.state) {
      case SESSION_STATE.CANCELLED:
        return current;
      case SESSION_STATE.ACTIVE:
        throw new ConflictError('Consultation is in progress, end it instead', SESSION_STATE.ACTIVE);
      case SESSION_STATE.ENDED:
        throw new SessionClosedError(SESSION_STATE.ENDED, 'Consultation has ended');
      default:
        throw new ConflictError('Consultation state changed, try again', current.state);
    }
  }

  // ─── Join ───────────────────────────────────────────────────────

  /** HTTP pre-flight for join: same answer admit() would give, nothing bound */
  async checkJoinable(cap: Capability): Promise<MeetingSession> {
    assertCapability(cap, OPERATION.JOIN);
    const session = await this.store.read(cap.roomId);
    assertJoinable(session);
    if (cap.role === PARTICIPANT_ROLE.PATIENT && this.graceElapsed(session)) {
      await this.expireGrace(cap.roomId);
      throw new SessionClosedError(SESSION_STATE.ENDED, 'Consultation has ended');
    }
    return session;
  }

  /**
   * Bind `conn` into the room's relay. The relay re-checks the stored state
   * inside its own mailbox, so a session that ends between our read and the
   * bind refuses the connection instead of admitting it.
   */
  async admit(cap: Capability, conn: RelayConnection): Promise<MeetingSession> {
    const session = await this.checkJoinable(cap);

    const current = await this.touch(cap.roomId, cap.role);

    const outcome = await this.relay.admit(cap.roomId, cap.role, conn);
    if (outcome === 'refused') throw new RelayRefusedError();

    this.watchdog.cancel(
      cap.roomId,
      cap.role === PARTICIPANT_ROLE.PATIENT ? 'patient_grace' : 'doctor_connect',
    );
    logger.info('Participant joined relay', { roomId: cap.roomId, role: cap.role, connectionId: conn.id });
    return current;
  }

  /** Patient keep-alive: refreshes lastPatientSeenAt while ACTIVE */
  async heartbeat(cap: Capability): Promise<MeetingSession> {
    assertCapability(cap, OPERATION.HEARTBEAT);
    return this.touch(cap.roomId, PARTICIPANT_ROLE.PATIENT);
  }

  // ─── System Events ──────────────────────────────────────────────

  /** A relay slot emptied: doctor_disconnect or patient_disconnect */
  async handleVacated(roomId: string, role: ParticipantRole): Promise<void> {
    if (role === PARTICIPANT_ROLE.DOCTOR) {
      await this.systemEnd(roomId, END_REASON.DOCTOR_DISCONNECTED);
      return;
    }

    const result = await this.swap(roomId, SESSION_STATE.ACTIVE, SESSION_STATE.ACTIVE, {
      lastPatientSeenAt: this.nowIso(),
    });
    if (!result.ok) {
      logger.debug('Patient left a room that is no longer active', { roomId });
      return;
    }
    this.watchdog.arm(roomId, 'patient_grace', this.options.graceWindowMs);
    logger.info('Patient disconnected, grace window open', { roomId, graceWindowMs: this.options.graceWindowMs });
  }

  /** expire_grace: ends the session unless the patient came back in time */
  async expireGrace(roomId: string): Promise<boolean> {
    const session = await this.store.read(roomId);
    if (!session || session.state !== SESSION_STATE.ACTIVE) return false;
    if (this.relay.isBound(roomId, PARTICIPANT_ROLE.PATIENT)) return false;

    const remaining = this.graceRemainingMs(session);
    if (remaining > 0) {
      this.watchdog.arm(roomId, 'patient_grace', remaining);
      return false;
    }
    return this.systemEnd(roomId, END_REASON.PATIENT_TIMEOUT);
  }

  /** The doctor started the call but never connected to the relay */
  async expireDoctorConnect(roomId: string): Promise<boolean> {
    const session = await this.store.read(roomId);
    if (!session || session.state !== SESSION_STATE.ACTIVE) return false;
    if (this.relay.isBound(roomId, PARTICIPANT_ROLE.DOCTOR)) return false;
    return this.systemEnd(roomId, END_REASON.DOCTOR_TIMEOUT);
  }

  /** ACTIVE → ENDED on behalf of the system. False when another path got there first. */
  async systemEnd(roomId: string, reason: EndReason): Promise<boolean> {
    const result = await this.swap(roomId, SESSION_STATE.ACTIVE, SESSION_STATE.ENDED, {
      endedAt: this.nowIso(),
      endReason: reason,
    });
    if (!result.ok) {
      logger.debug('Session already left ACTIVE', { roomId, reason, state: result.current?.state ?? null });
      return false;
    }
    await this.finalize(result.session, reason);
    logger.info('Consultation ended', { roomId, reason });
    return true;
  }

  /**
   * Store-level watchdog over every ACTIVE session. Participants bound here
   * get their seen-at stamp refreshed so other pods read them as alive.
   * A session ends when its patient has been gone past the grace window, or
   * when its doctor has not been seen for doctorConnectTimeoutMs (counted
   * from startedAt if the doctor never connected). Catches rooms whose
   * timers and relay bindings died with another pod. Returns how many
   * sessions it ended.
   */
  async sweep(): Promise<number> {
    const active = await this.store.listActive();
    let ended = 0;
    for (const session of active) {
      const reason = this.staleReason(session);
      if (reason === null) {
        await this.refreshPresence(session.roomId);
        continue;
      }
      if (await this.systemEnd(session.roomId, reason)) ended += 1;
    }
    if (ended > 0) logger.info('Watchdog sweep ended stale sessions', { ended, scanned: active.length });
    return ended;
  }

  /** Stop timers and detach from the relay (shutdown / tests) */
  dispose(): void {
    this.watchdog.stop();
    this.unsubscribe();
  }

  // ─── Internals ──────────────────────────────────────────────────

  private onWatchdog(roomId: string, kind: WatchKind): Promise<void> {
    const run = kind === 'patient_grace' ? this.expireGrace(roomId) : this.expireDoctorConnect(roomId);
    return run.then(() => undefined);
  }

  /** ACTIVE → ACTIVE with a fresh seen-at for `role`, or the joinability error */
  private async touch(roomId: string, role: ParticipantRole): Promise<MeetingSession> {
    const seenAt = this.nowIso();
    const patch: SessionPatch =
      role === PARTICIPANT_ROLE.PATIENT ? { lastPatientSeenAt: seenAt } : { lastDoctorSeenAt: seenAt };
    const result = await this.swap(roomId, SESSION_STATE.ACTIVE, SESSION_STATE.ACTIVE, patch);
    if (result.ok) return result.session;
    assertJoinable(result.current);
    throw new RelayRefusedError();
  }

  /** Stamps every role bound on this pod as seen now */
  private async refreshPresence(roomId: string): Promise<void> {
    const seenAt = this.nowIso();
    const patch: SessionPatch = {};
    if (this.relay.isBound(roomId, PARTICIPANT_ROLE.DOCTOR)) patch.lastDoctorSeenAt = seenAt;
    if (this.relay.isBound(roomId, PARTICIPANT_ROLE.PATIENT)) patch.lastPatientSeenAt = seenAt;
    if (Object.keys(patch).length === 0) return;
    await this.swap(roomId, SESSION_STATE.ACTIVE, SESSION_STATE.ACTIVE, patch);
  }

  /** Why the sweep should end `session`, or null while someone is still around */
  private staleReason(session: MeetingSession): EndReason | null {
    if (this.graceElapsed(session)) return END_REASON.PATIENT_TIMEOUT;
    if (this.relay.isBound(session.roomId, PARTICIPANT_ROLE.DOCTOR)) return null;

    const since = session.lastDoctorSeenAt ?? session.startedAt;
    if (since === null) return null;
    if (Date.parse(since) + this.options.doctorConnectTimeoutMs > this.clock().getTime()) return null;
    return session.lastDoctorSeenAt === null ? END_REASON.DOCTOR_TIMEOUT : END_REASON.DOCTOR_DISCONNECTED;
  }

  private async swap(
    roomId: string,
    expected: SessionState,
    next: SessionState,
    patch: SessionPatch,
  ): Promise<CasResult> {
    if (!isLegalTransition(expected, next)) {
      throw new Error(`Illegal session transition ${expected} → ${next}`);
    }
    return this.store.compareAndSwapState(roomId, expected, next, patch);
  }

  private async finalize(session: MeetingSession, reason: EndReason | 'cancelled'): Promise<void> {
    this.watchdog.clear(session.roomId);
    await this.relay.teardown(session.roomId, reason);
    if (session.state === SESSION_STATE.CANCELLED) {
      this.notifier.meetingCancelled(session);
    } else {
      this.notifier.meetingEnded(session);
    }
  }

  /** True when the patient was seen before and has been gone for the full window */
  private graceElapsed(session: MeetingSession): boolean {
    if (session.lastPatientSeenAt === null) return false;
    if (this.relay.isBound(session.roomId, PARTICIPANT_ROLE.PATIENT)) return false;
    return this.graceRemainingMs(session) <= 0;
  }

  private graceRemainingMs(session: MeetingSession): number {
    if (session.lastPatientSeenAt === null) return this.options.graceWindowMs;
    const seen = Date.parse(session.lastPatientSeenAt);
    return seen + this.options.graceWindowMs - this.clock().getTime();
  }

  private nowIso(): string {
    return this.clock().toISOString();
  }
}

function startConflict(roomId: string, current: MeetingSession | null): Error {
  if (!current) return new NotFoundError(`Consultation ${roomId} not found`);
  switch (current.state) {
    case SESSION_STATE.ACTIVE:
      return new ConflictError('Consultation already in progress', 'ALREADY_ACTIVE', 'ALREADY_ACTIVE');
    case SESSION_STATE.ENDED:
      return new SessionClosedError(SESSION_STATE.ENDED, 'Consultation has ended');
    case SESSION_STATE.CANCELLED:
      return new SessionClosedError(SESSION_STATE.CANCELLED, 'Consultation was cancelled');
    default:
      return new ConflictError('Consultation state changed, try again', current.state);
  }
}
