/**
 * connection.ts — What the relay needs from a transport connection.
 *
 * The relay never touches Socket.IO directly; socket/relay.ts adapts a
 * Socket to this interface, and the tests use plain recording fakes.
 */
import { PARTICIPANT_ROLE } from '../shared';
import type { EndReason, ParticipantRole, SignalFrame } from '../shared';

export type RelayNotice =
  | { kind: 'peer-joined'; role: ParticipantRole }
  | { kind: 'peer-left'; role: ParticipantRole }
  | { kind: 'replaced' }
  | { kind: 'session-ended'; reason: EndReason | 'cancelled' };

export interface RelayConnection {
  readonly id: string;
  /** Hand a signaling frame from the peer to this client, unchanged */
  deliver(frame: SignalFrame): void;
  notify(notice: RelayNotice): void;
  /** Drop the transport; the relay has already unbound this connection */
  close(): void;
}

export function otherRole(role: ParticipantRole): ParticipantRole {
  return role === PARTICIPANT_ROLE.DOCTOR ? PARTICIPANT_ROLE.PATIENT : PARTICIPANT_ROLE.DOCTOR;
}
