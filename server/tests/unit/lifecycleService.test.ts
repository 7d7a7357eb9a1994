/**
 * SessionLifecycle tests
 *
 * Transitions and their conflicts, relay admission, disconnect handling,
 * the reconnect grace window and the watchdog paths.
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  SessionLifecycle,
  isLegalTransition,
  isTerminal,
  presencePermitted,
} from '../../src/services/lifecycleService';
import { AccessGate } from '../../src/services/accessGate';
import { MemorySessionStore } from '../../src/repositories/memorySessionStore';
import { MemoryAuditSink } from '../../src/repositories/auditRepo';
import { RelayHub } from '../../src/relay/relayHub';
import {
  ConflictError,
  ForbiddenError,
  NotFoundError,
  NotYetStartedError,
  SessionClosedError,
} from '../../src/utils/errors';
import type { Identity, Operation, RoomParties } from '../../src/shared';
import {
  APPOINTMENT,
  DOCTOR,
  PATIENT,
  RecordingConnection,
  RecordingNotifier,
  SECOND_APPOINTMENT,
  manualClock,
  partiesFor,
} from '../helpers/harness';

const parties = partiesFor(APPOINTMENT);
const roomId = parties.roomId;

describe('transition table', () => {
  it('allows only the documented edges', () => {
    expect(isLegalTransition('SCHEDULED', 'ACTIVE')).toBe(true);
    expect(isLegalTransition('SCHEDULED', 'CANCELLED')).toBe(true);
    expect(isLegalTransition('ACTIVE', 'ENDED')).toBe(true);
    expect(isLegalTransition('ACTIVE', 'ACTIVE')).toBe(true);
    expect(isLegalTransition('SCHEDULED', 'ENDED')).toBe(false);
    expect(isLegalTransition('ACTIVE', 'CANCELLED')).toBe(false);
    expect(isLegalTransition('ENDED', 'ACTIVE')).toBe(false);
    expect(isLegalTransition('CANCELLED', 'SCHEDULED')).toBe(false);
  });

  it('treats ENDED and CANCELLED as terminal', () => {
    expect(isTerminal('ENDED')).toBe(true);
    expect(isTerminal('CANCELLED')).toBe(true);
    expect(isTerminal('ACTIVE')).toBe(false);
    expect(isTerminal('SCHEDULED')).toBe(false);
  });
});

describe('SessionLifecycle', () => {
  let time: ReturnType<typeof manualClock>;
  let store: MemorySessionStore;
  let relay: RelayHub;
  let notifier: RecordingNotifier;
  let gate: AccessGate;
  let lifecycle: SessionLifecycle;

  const cap = (identity: Identity, operation: Operation, room: RoomParties = parties) =>
    gate.authorize(identity, room, operation);

  async function startCall(room: RoomParties = parties) {
    await lifecycle.ensureSession(room);
    return lifecycle.start(cap(DOCTOR, 'start', room));
  }

  async function seatBoth() {
    await startCall();
    const doctor = new RecordingConnection('d1');
    const patient = new RecordingConnection('p1');
    await lifecycle.admit(cap(DOCTOR, 'join'), doctor);
    await lifecycle.admit(cap(PATIENT, 'join'), patient);
    return { doctor, patient };
  }

  /** Patient drops; resolves once the grace window is open */
  async function patientDrops(connectionId = 'p1', room = roomId) {
    await relay.evict(room, 'patient', connectionId);
    await vi.waitFor(() => expect(lifecycle.watchdog.isArmed(room, 'patient_grace')).toBe(true));
  }

  beforeEach(() => {
    time = manualClock('2026-10-01T10:00:00.000Z');
    store = new MemorySessionStore(time.clock);
    relay = new RelayHub(presencePermitted(store));
    notifier = new RecordingNotifier();
    gate = new AccessGate(new MemoryAuditSink(), time.clock);
    lifecycle = new SessionLifecycle({
      store,
      relay,
      notifier,
      options: { graceWindowMs: 60_000, doctorConnectTimeoutMs: 120_000 },
      clock: time.clock,
    });
  });

  afterEach(() => {
    lifecycle.dispose();
  });

  describe('start', () => {
    it('moves SCHEDULED to ACTIVE and notifies both parties', async () => {
      await lifecycle.ensureSession(parties);
      time.advance(1_000);

      const session = await lifecycle.start(cap(DOCTOR, 'start'));

      expect(session.state).toBe('ACTIVE');
      expect(session.startedAt).toBe('2026-10-01T10:00:01.000Z');
      expect(session.endedAt).toBeNull();
      expect(notifier.events).toEqual([{ kind: 'started', roomId, state: 'ACTIVE' }]);
      expect(lifecycle.watchdog.isArmed(roomId, 'doctor_connect')).toBe(true);
    });

    it('lets exactly one of two concurrent starts win', async () => {
      await lifecycle.ensureSession(parties);

      const results = await Promise.allSettled([
        lifecycle.start(cap(DOCTOR, 'start')),
        lifecycle.start(cap(DOCTOR, 'start')),
      ]);

      expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(1);
      const rejected = results.find((r) => r.status === 'rejected');
      expect(rejected?.status === 'rejected' && rejected.reason).toBeInstanceOf(ConflictError);
      expect(rejected?.status === 'rejected' && rejected.reason).toMatchObject({
        code: 'ALREADY_ACTIVE',
        details: { state: 'ALREADY_ACTIVE' },
      });
      expect(notifier.events).toHaveLength(1);
    });

    it('fails with NotFound when no session record exists', async () => {
      await expect(lifecycle.start(cap(DOCTOR, 'start'))).rejects.toBeInstanceOf(NotFoundError);
    });

    it('refuses to restart an ended session', async () => {
      await startCall();
      await lifecycle.end(cap(DOCTOR, 'end'));

      await expect(lifecycle.start(cap(DOCTOR, 'start'))).rejects.toMatchObject({
        code: 'SESSION_CLOSED',
        details: { state: 'ENDED' },
      });
    });

    it('rejects a capability minted for another operation', async () => {
      await lifecycle.ensureSession(parties);
      await expect(lifecycle.start(cap(DOCTOR, 'status'))).rejects.toBeInstanceOf(ForbiddenError);
      expect((await store.read(roomId))?.state).toBe('SCHEDULED');
    });
  });

  describe('admit', () => {
    it('refuses both participants before the doctor starts', async () => {
      await lifecycle.ensureSession(parties);

      await expect(lifecycle.admit(cap(PATIENT, 'join'), new RecordingConnection('p1'))).rejects.toBeInstanceOf(
        NotYetStartedError,
      );
      await expect(lifecycle.admit(cap(DOCTOR, 'join'), new RecordingConnection('d1'))).rejects.toBeInstanceOf(
        NotYetStartedError,
      );
      expect(relay.isBound(roomId, 'patient')).toBe(false);
      expect(relay.isBound(roomId, 'doctor')).toBe(false);
    });

    it('treats a room with no record as not started', async () => {
      await expect(lifecycle.admit(cap(PATIENT, 'join'), new RecordingConnection('p1'))).rejects.toMatchObject({
        statusCode: 425,
        code: 'NOT_YET_STARTED',
      });
    });

    it('binds both seats once ACTIVE and clears the doctor timer', async () => {
      await startCall();
      time.advance(2_000);

      await lifecycle.admit(cap(DOCTOR, 'join'), new RecordingConnection('d1'));
      expect(lifecycle.watchdog.isArmed(roomId, 'doctor_connect')).toBe(false);

      const session = await lifecycle.admit(cap(PATIENT, 'join'), new RecordingConnection('p1'));
      expect(session.lastPatientSeenAt).toBe('2026-10-01T10:00:02.000Z');
      expect(relay.isBound(roomId, 'doctor')).toBe(true);
      expect(relay.isBound(roomId, 'patient')).toBe(true);
    });

    it('refuses joins after the session ended', async () => {
      await startCall();
      await lifecycle.end(cap(DOCTOR, 'end'));

      await expect(lifecycle.admit(cap(PATIENT, 'join'), new RecordingConnection('p1'))).rejects.toMatchObject({
        code: 'SESSION_CLOSED',
        message: 'Consultation has ended',
      });
    });

    it('checkJoinable gives the same answer without binding anything', async () => {
      await startCall();

      const session = await lifecycle.checkJoinable(cap(PATIENT, 'join'));
      expect(session.state).toBe('ACTIVE');
      expect(relay.isBound(roomId, 'patient')).toBe(false);
    });
  });

  describe('end', () => {
    it('ends an active call and tears the relay down', async () => {
      const { doctor, patient } = await seatBoth();
      time.advance(60_000);

      const ended = await lifecycle.end(cap(DOCTOR, 'end'));

      expect(ended.state).toBe('ENDED');
      expect(ended.endReason).toBe('doctor_ended');
      expect(ended.endedAt).toBe('2026-10-01T10:01:00.000Z');
      expect(doctor.notices.at(-1)).toEqual({ kind: 'session-ended', reason: 'doctor_ended' });
      expect(patient.notices.at(-1)).toEqual({ kind: 'session-ended', reason: 'doctor_ended' });
      expect(doctor.closed).toBe(true);
      expect(patient.closed).toBe(true);
      expect(notifier.events.map((e) => e.kind)).toEqual(['started', 'ended']);
    });

    it('returns the first result when ended again', async () => {
      await startCall();
      const first = await lifecycle.end(cap(DOCTOR, 'end'));
      time.advance(5_000);

      const second = await lifecycle.end(cap(DOCTOR, 'end'));

      expect(second.endedAt).toBe(first.endedAt);
      expect(second.endReason).toBe('doctor_ended');
      expect(notifier.events.filter((e) => e.kind === 'ended')).toHaveLength(1);
    });

    it('cannot end a call that never started', async () => {
      await lifecycle.ensureSession(parties);

      await expect(lifecycle.end(cap(DOCTOR, 'end'))).rejects.toMatchObject({
        statusCode: 409,
        code: 'CONFLICT',
        details: { state: 'SCHEDULED' },
      });
    });

    it('answers a room with no record the same as a scheduled one', async () => {
      await expect(lifecycle.end(cap(DOCTOR, 'end'))).rejects.toMatchObject({
        statusCode: 409,
        code: 'CONFLICT',
        details: { state: 'SCHEDULED' },
      });
      expect(await store.read(roomId)).toBeNull();
    });

    it('reports a cancelled session as closed', async () => {
      await lifecycle.ensureSession(parties);
      await lifecycle.cancel(cap(DOCTOR, 'cancel'));

      await expect(lifecycle.end(cap(DOCTOR, 'end'))).rejects.toBeInstanceOf(SessionClosedError);
    });
  });

  describe('cancel', () => {
    it('cancels a scheduled call once', async () => {
      await lifecycle.ensureSession(parties);

      const cancelled = await lifecycle.cancel(cap(DOCTOR, 'cancel'));
      time.advance(1_000);
      const again = await lifecycle.cancel(cap(DOCTOR, 'cancel'));

      expect(cancelled.state).toBe('CANCELLED');
      expect(cancelled.cancelledAt).toBe('2026-10-01T10:00:00.000Z');
      expect(again.cancelledAt).toBe('2026-10-01T10:00:00.000Z');
      expect(notifier.events).toEqual([{ kind: 'cancelled', roomId, state: 'CANCELLED' }]);
    });

    it('closes the room to start and join afterwards', async () => {
      await lifecycle.ensureSession(parties);
      await lifecycle.cancel(cap(DOCTOR, 'cancel'));

      await expect(lifecycle.start(cap(DOCTOR, 'start'))).rejects.toMatchObject({
        code: 'SESSION_CLOSED',
        details: { state: 'CANCELLED' },
      });
      await expect(lifecycle.admit(cap(PATIENT, 'join'), new RecordingConnection('p1'))).rejects.toMatchObject({
        message: 'Consultation was cancelled',
      });
    });

    it('cannot cancel a call in progress', async () => {
      await startCall();

      await expect(lifecycle.cancel(cap(DOCTOR, 'cancel'))).rejects.toMatchObject({
        code: 'CONFLICT',
        details: { state: 'ACTIVE' },
      });
      expect((await store.read(roomId))?.state).toBe('ACTIVE');
    });
  });

  describe('disconnects', () => {
    it('ends the call when the doctor drops', async () => {
      const { patient } = await seatBoth();

      await relay.evict(roomId, 'doctor', 'd1');
      await vi.waitFor(() => expect(patient.closed).toBe(true));

      const session = await store.read(roomId);
      expect(session?.state).toBe('ENDED');
      expect(session?.endReason).toBe('doctor_disconnected');
      expect(patient.notices).toEqual([
        { kind: 'peer-left', role: 'doctor' },
        { kind: 'session-ended', reason: 'doctor_disconnected' },
      ]);
    });

    it('does not end the call when a replaced doctor tab closes', async () => {
      await seatBoth();
      await lifecycle.admit(cap(DOCTOR, 'join'), new RecordingConnection('d2'));

      expect(await relay.evict(roomId, 'doctor', 'd1')).toBe(false);
      expect((await store.read(roomId))?.state).toBe('ACTIVE');
    });

    it('opens the grace window when the patient drops', async () => {
      const { doctor } = await seatBoth();
      time.advance(5_000);

      await patientDrops();

      const session = await store.read(roomId);
      expect(session?.state).toBe('ACTIVE');
      expect(session?.lastPatientSeenAt).toBe('2026-10-01T10:00:05.000Z');
      expect(doctor.notices).toContainEqual({ kind: 'peer-left', role: 'patient' });
    });

    it('keeps the call when the patient returns inside the window', async () => {
      await seatBoth();
      await patientDrops();
      time.advance(30_000);

      await lifecycle.admit(cap(PATIENT, 'join'), new RecordingConnection('p2'));

      expect(lifecycle.watchdog.isArmed(roomId, 'patient_grace')).toBe(false);
      expect(await lifecycle.expireGrace(roomId)).toBe(false);
      expect((await store.read(roomId))?.state).toBe('ACTIVE');
    });

    it('ends the call when the patient returns after the window', async () => {
      const { doctor } = await seatBoth();
      await patientDrops();
      time.advance(60_000);

      await expect(lifecycle.admit(cap(PATIENT, 'join'), new RecordingConnection('p2'))).rejects.toMatchObject({
        code: 'SESSION_CLOSED',
        details: { state: 'ENDED' },
      });

      const session = await store.read(roomId);
      expect(session?.endReason).toBe('patient_timeout');
      expect(doctor.notices.at(-1)).toEqual({ kind: 'session-ended', reason: 'patient_timeout' });
      expect(notifier.events.filter((e) => e.kind === 'ended')).toHaveLength(1);
    });
  });

  describe('expireGrace', () => {
    it('re-arms instead of ending while the window is still open', async () => {
      await seatBoth();
      await patientDrops();
      time.advance(10_000);

      expect(await lifecycle.expireGrace(roomId)).toBe(false);
      expect(lifecycle.watchdog.isArmed(roomId, 'patient_grace')).toBe(true);
      expect((await store.read(roomId))?.state).toBe('ACTIVE');
    });

    it('ends the session exactly once when two expiries race', async () => {
      await seatBoth();
      await patientDrops();
      time.advance(60_000);

      const results = await Promise.all([lifecycle.expireGrace(roomId), lifecycle.expireGrace(roomId)]);

      expect(results.filter(Boolean)).toHaveLength(1);
      expect((await store.read(roomId))?.endReason).toBe('patient_timeout');
      expect(notifier.events.filter((e) => e.kind === 'ended')).toHaveLength(1);
    });

    it('does nothing for a room that already ended', async () => {
      await startCall();
      await lifecycle.end(cap(DOCTOR, 'end'));

      expect(await lifecycle.expireGrace(roomId)).toBe(false);
      expect((await store.read(roomId))?.endReason).toBe('doctor_ended');
    });
  });

  describe('expireDoctorConnect', () => {
    it('ends a call the doctor never connected to', async () => {
      await startCall();

      expect(await lifecycle.expireDoctorConnect(roomId)).toBe(true);
      expect((await store.read(roomId))?.endReason).toBe('doctor_timeout');
      expect(await lifecycle.expireDoctorConnect(roomId)).toBe(false);
    });

    it('leaves the call alone once the doctor is connected', async () => {
      await startCall();
      await lifecycle.admit(cap(DOCTOR, 'join'), new RecordingConnection('d1'));

      expect(await lifecycle.expireDoctorConnect(roomId)).toBe(false);
      expect((await store.read(roomId))?.state).toBe('ACTIVE');
    });
  });

  describe('heartbeat', () => {
    it('refreshes lastPatientSeenAt while active', async () => {
      await seatBoth();
      time.advance(10_000);

      const session = await lifecycle.heartbeat(cap(PATIENT, 'heartbeat'));
      expect(session.lastPatientSeenAt).toBe('2026-10-01T10:00:10.000Z');
    });

    it('reports the session closed after it ended', async () => {
      await seatBoth();
      await lifecycle.end(cap(DOCTOR, 'end'));

      await expect(lifecycle.heartbeat(cap(PATIENT, 'heartbeat'))).rejects.toBeInstanceOf(SessionClosedError);
    });
  });

  describe('sweep', () => {
    it('ends only rooms whose patient has been gone past the window', async () => {
      const second = partiesFor(SECOND_APPOINTMENT);
      const secondPatient: Identity = { userId: 'pat-2', role: 'patient' };

      await seatBoth();
      await startCall(second);
      await lifecycle.admit(cap(secondPatient, 'join', second), new RecordingConnection('q1'));

      await patientDrops();
      time.advance(61_000);

      expect(await lifecycle.sweep()).toBe(1);
      expect((await store.read(roomId))?.endReason).toBe('patient_timeout');
      expect((await store.read(second.roomId))?.state).toBe('ACTIVE');

      expect(await lifecycle.sweep()).toBe(0);
    });

    describe('across pods', () => {
      let pods: SessionLifecycle[];

      /** Another process over the same store, with its own empty relay */
      const otherPod = () => {
        const pod = new SessionLifecycle({
          store,
          relay: new RelayHub(presencePermitted(store)),
          notifier: new RecordingNotifier(),
          options: { graceWindowMs: 60_000, doctorConnectTimeoutMs: 120_000 },
          clock: time.clock,
        });
        pods.push(pod);
        return pod;
      };

      beforeEach(() => {
        pods = [];
      });

      afterEach(() => {
        for (const pod of pods) pod.dispose();
      });

      it('ends a room whose pod died after the doctor joined and before the patient came', async () => {
        await startCall();
        time.advance(5_000);
        await lifecycle.admit(cap(DOCTOR, 'join'), new RecordingConnection('d1'));
        expect((await store.read(roomId))?.lastDoctorSeenAt).toBe('2026-10-01T10:00:05.000Z');
        lifecycle.dispose();

        const survivor = otherPod();
        time.advance(24 * 60 * 60_000);

        expect(await survivor.sweep()).toBe(1);
        expect(await store.read(roomId)).toMatchObject({
          state: 'ENDED',
          endReason: 'doctor_disconnected',
          lastPatientSeenAt: null,
        });
      });

      it('ends a started room nobody ever connected to once the doctor window passes', async () => {
        await startCall();
        lifecycle.dispose();

        const survivor = otherPod();
        time.advance(119_000);
        expect(await survivor.sweep()).toBe(0);
        expect((await store.read(roomId))?.state).toBe('ACTIVE');

        time.advance(1_000);
        expect(await survivor.sweep()).toBe(1);
        expect((await store.read(roomId))?.endReason).toBe('doctor_timeout');
      });

      it('keeps a room alive while its doctor is bound on another pod', async () => {
        await startCall();
        await lifecycle.admit(cap(DOCTOR, 'join'), new RecordingConnection('d1'));
        const peer = otherPod();

        time.advance(60_000);
        expect(await lifecycle.sweep()).toBe(0);
        expect((await store.read(roomId))?.lastDoctorSeenAt).toBe('2026-10-01T10:01:00.000Z');

        time.advance(90_000);
        expect(await peer.sweep()).toBe(0);
        expect((await store.read(roomId))?.state).toBe('ACTIVE');
      });
    });
  });
});

describe('SessionLifecycle timers', () => {
  let store: MemorySessionStore;
  let relay: RelayHub;
  let gate: AccessGate;
  let lifecycle: SessionLifecycle;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-10-01T10:00:00.000Z'));
    store = new MemorySessionStore();
    relay = new RelayHub(presencePermitted(store));
    gate = new AccessGate(new MemoryAuditSink());
    lifecycle = new SessionLifecycle({
      store,
      relay,
      notifier: new RecordingNotifier(),
      options: { graceWindowMs: 60_000, doctorConnectTimeoutMs: 120_000 },
    });
  });

  afterEach(() => {
    lifecycle.dispose();
    vi.useRealTimers();
  });

  it('ends the call when the grace timer fires', async () => {
    await lifecycle.ensureSession(parties);
    await lifecycle.start(gate.authorize(DOCTOR, parties, 'start'));
    const doctor = new RecordingConnection('d1');
    await lifecycle.admit(gate.authorize(DOCTOR, parties, 'join'), doctor);
    await lifecycle.admit(gate.authorize(PATIENT, parties, 'join'), new RecordingConnection('p1'));

    await relay.evict(roomId, 'patient', 'p1');
    await vi.waitFor(() => expect(lifecycle.watchdog.isArmed(roomId, 'patient_grace')).toBe(true));

    await vi.advanceTimersByTimeAsync(60_000);
    await vi.waitFor(() => expect(doctor.closed).toBe(true));

    expect((await store.read(roomId))?.endReason).toBe('patient_timeout');
  });

  it('ends the call when the doctor never connects', async () => {
    await lifecycle.ensureSession(parties);
    await lifecycle.start(gate.authorize(DOCTOR, parties, 'start'));

    await vi.advanceTimersByTimeAsync(120_000);
    await vi.waitFor(async () => {
      expect((await store.read(roomId))?.endReason).toBe('doctor_timeout');
    });
  });
});
