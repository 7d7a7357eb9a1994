/**
 * statusService.ts — What the waiting screen should show right now.
 *
 * Pure read: one store read plus the local relay bindings. Safe to poll
 * (clients poll every LIMITS.STATUS_POLL_INTERVAL_MS). A room with no
 * stored session yet reads as SCHEDULED.
 *
 * canJoin is true only while the session is ACTIVE and the caller's own
 * slot is free, so a second tab learns it is already connected.
 */
import { OPERATION, PARTICIPANT_ROLE, SESSION_STATE } from '../shared';
import type { ParticipantRole, SessionState, StatusView } from '../shared';
import type { SessionStore } from '../repositories/sessionStore';
import type { RelayHub } from '../relay/relayHub';
import { assertCapability } from './accessGate';
import type { Capability } from './accessGate';

export const STATUS_MESSAGES = {
  DOCTOR_SCHEDULED: 'Click Start Consultation to begin',
  PATIENT_SCHEDULED: 'Waiting for doctor to start consultation...',
  LIVE: 'Consultation is live - Click to join',
  ALREADY_CONNECTED: 'You are already connected to this consultation',
  ENDED: 'Consultation has ended',
  CANCELLED: 'Consultation was cancelled',
} as const;

export function describeStatus(state: SessionState, role: ParticipantRole, slotBound: boolean): string {
  switch (state) {
    case SESSION_STATE.SCHEDULED:
      return role === PARTICIPANT_ROLE.DOCTOR
        ? STATUS_MESSAGES.DOCTOR_SCHEDULED
        : STATUS_MESSAGES.PATIENT_SCHEDULED;
    case SESSION_STATE.ACTIVE:
      return slotBound ? STATUS_MESSAGES.ALREADY_CONNECTED : STATUS_MESSAGES.LIVE;
    case SESSION_STATE.ENDED:
      return STATUS_MESSAGES.ENDED;
    case SESSION_STATE.CANCELLED:
      return STATUS_MESSAGES.CANCELLED;
  }
}

export class StatusService {
  constructor(
    private readonly store: SessionStore,
    private readonly relay: RelayHub,
  ) {}

  async getStatus(cap: Capability): Promise<StatusView> {
    assertCapability(cap, OPERATION.STATUS);

    const session = await this.store.read(cap.roomId);
    const state = session?.state ?? SESSION_STATE.SCHEDULED;
    const slotBound = this.relay.isBound(cap.roomId, cap.role);

    return {
      roomId: cap.roomId,
      state,
      canJoin: state === SESSION_STATE.ACTIVE && !slotBound,
      message: describeStatus(state, cap.role, slotBound),
      role: cap.role,
    };
  }
}
