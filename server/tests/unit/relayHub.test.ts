/**
 * RelayHub tests
 *
 * Admission against the presence probe, room isolation, frame ordering,
 * replacement of a stale connection and teardown.
 */
import { describe, it, expect, beforeEach, vi } from 'vitest';
import { RelayHub } from '../../src/relay/relayHub';
import type { PresenceProbe } from '../../src/relay/roomChannel';
import type { SignalFrame } from '../../src/shared';
import { RecordingConnection } from '../helpers/harness';

const offer: SignalFrame = { type: 'offer', payload: { sdp: 'v=0 offer' } };
const answer: SignalFrame = { type: 'answer', payload: { sdp: 'v=0 answer' } };
const candidate: SignalFrame = { type: 'ice_candidate', payload: { candidate: 'candidate:1 1 udp 1 10.0.0.1 5000 typ host' } };

describe('RelayHub', () => {
  let open: Set<string>;
  let hub: RelayHub;

  beforeEach(() => {
    open = new Set(['room-a', 'room-b']);
    const probe: PresenceProbe = async (roomId) => open.has(roomId);
    hub = new RelayHub(probe);
  });

  async function seat(roomId: string) {
    const doctor = new RecordingConnection(`${roomId}-doctor`);
    const patient = new RecordingConnection(`${roomId}-patient`);
    await hub.admit(roomId, 'doctor', doctor);
    await hub.admit(roomId, 'patient', patient);
    return { doctor, patient };
  }

  describe('admit', () => {
    it('binds both seats and tells the first one the peer arrived', async () => {
      const doctor = new RecordingConnection('d1');
      const patient = new RecordingConnection('p1');

      expect(await hub.admit('room-a', 'doctor', doctor)).toBe('admitted');
      expect(await hub.admit('room-a', 'patient', patient)).toBe('admitted');

      expect(doctor.notices).toEqual([{ kind: 'peer-joined', role: 'patient' }]);
      expect(patient.notices).toEqual([]);
      expect(hub.isBound('room-a', 'doctor')).toBe(true);
      expect(hub.isBound('room-a', 'patient')).toBe(true);
    });

    it('refuses when the probe says the room is not live and keeps no channel', async () => {
      const patient = new RecordingConnection('p1');

      expect(await hub.admit('room-closed', 'patient', patient)).toBe('refused');
      expect(hub.isBound('room-closed', 'patient')).toBe(false);
      expect(hub.roomCount()).toBe(0);
    });

    it('replaces an older connection for the same seat', async () => {
      const first = new RecordingConnection('d1');
      const second = new RecordingConnection('d2');
      const vacated = vi.fn();
      hub.onVacated(vacated);

      await hub.admit('room-a', 'doctor', first);
      await hub.admit('room-a', 'doctor', second);

      expect(first.notices).toEqual([{ kind: 'replaced' }]);
      expect(first.closed).toBe(true);
      expect(second.closed).toBe(false);

      // The replaced tab disconnecting afterwards is not a departure
      expect(await hub.evict('room-a', 'doctor', 'd1')).toBe(false);
      expect(hub.isBound('room-a', 'doctor')).toBe(true);
      expect(vacated).not.toHaveBeenCalled();
    });

    it('re-admitting the same connection does not replace it', async () => {
      const doctor = new RecordingConnection('d1');
      await hub.admit('room-a', 'doctor', doctor);
      await hub.admit('room-a', 'doctor', doctor);

      expect(doctor.notices).toEqual([]);
      expect(doctor.closed).toBe(false);
    });
  });

  describe('send', () => {
    it('delivers the frame object unchanged to the peer of the same room only', async () => {
      const a = await seat('room-a');
      const b = await seat('room-b');

      expect(hub.send('room-a', 'doctor', 'room-a-doctor', offer)).toBe('delivered');

      expect(a.patient.frames).toHaveLength(1);
      expect(a.patient.frames[0]).toBe(offer);
      expect(a.doctor.frames).toEqual([]);
      expect(b.patient.frames).toEqual([]);
      expect(b.doctor.frames).toEqual([]);
    });

    it('keeps the order frames were sent in', async () => {
      const { doctor, patient } = await seat('room-a');

      hub.send('room-a', 'doctor', 'room-a-doctor', offer);
      hub.send('room-a', 'patient', 'room-a-patient', answer);
      hub.send('room-a', 'doctor', 'room-a-doctor', candidate);
      hub.send('room-a', 'doctor', 'room-a-doctor', answer);

      expect(patient.frames).toEqual([offer, candidate, answer]);
      expect(doctor.frames).toEqual([answer]);
    });

    it('reports no_peer while the other seat is empty', async () => {
      await hub.admit('room-a', 'doctor', new RecordingConnection('d1'));
      expect(hub.send('room-a', 'doctor', 'd1', offer)).toBe('no_peer');
    });

    it('reports not_bound for a connection that does not hold the seat', async () => {
      await seat('room-a');
      expect(hub.send('room-a', 'doctor', 'someone-else', offer)).toBe('not_bound');
      expect(hub.send('room-unknown', 'doctor', 'd1', offer)).toBe('not_bound');
    });
  });

  describe('evict', () => {
    it('frees the seat, tells the peer and raises a vacated event', async () => {
      const { patient } = await seat('room-a');
      const vacated = vi.fn();
      hub.onVacated(vacated);

      expect(await hub.evict('room-a', 'doctor', 'room-a-doctor')).toBe(true);

      expect(hub.isBound('room-a', 'doctor')).toBe(false);
      expect(patient.notices).toEqual([{ kind: 'peer-left', role: 'doctor' }]);
      expect(vacated).toHaveBeenCalledWith('room-a', 'doctor');
    });

    it('stops notifying a listener after it unsubscribes', async () => {
      await seat('room-a');
      const vacated = vi.fn();
      const unsubscribe = hub.onVacated(vacated);
      unsubscribe();

      await hub.evict('room-a', 'patient', 'room-a-patient');
      expect(vacated).not.toHaveBeenCalled();
    });
  });

  describe('teardown', () => {
    it('ends and closes every bound connection and forgets the room', async () => {
      const { doctor, patient } = await seat('room-a');
      const vacated = vi.fn();
      hub.onVacated(vacated);

      await hub.teardown('room-a', 'doctor_ended');

      expect(doctor.notices).toEqual([{ kind: 'session-ended', reason: 'doctor_ended' }]);
      expect(patient.notices).toEqual([{ kind: 'session-ended', reason: 'doctor_ended' }]);
      expect(doctor.closed).toBe(true);
      expect(patient.closed).toBe(true);
      expect(hub.roomCount()).toBe(0);
      expect(vacated).not.toHaveBeenCalled();
    });

    it('leaves no binding behind when an admit races the teardown', async () => {
      const patient = new RecordingConnection('p1');

      const admitting = hub.admit('room-a', 'patient', patient);
      const tearing = hub.teardown('room-a', 'patient_timeout');

      expect(await admitting).toBe('admitted');
      await tearing;
      open.delete('room-a');

      expect(patient.notices).toEqual([{ kind: 'session-ended', reason: 'patient_timeout' }]);
      expect(patient.closed).toBe(true);
      expect(hub.isBound('room-a', 'patient')).toBe(false);
      expect(await hub.admit('room-a', 'patient', new RecordingConnection('p2'))).toBe('refused');
    });
  });
});
