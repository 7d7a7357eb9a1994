/**
 * accessGate.ts — Identity and ownership check in front of every transition.
 *
 * authorize() is the only place role branching happens. It answers
 * "is this caller the doctor or the patient of this room, and may that
 * role perform this operation?" and hands back a Capability. The lifecycle
 * controller accepts nothing else: a capability is tied to one room and one
 * operation and only counts if this module issued it.
 *
 *   start / end / cancel → doctor
 *   join / status        → doctor or patient
 *   heartbeat            → patient
 *
 * Every decision, allowed or not, goes to the audit sink.
 */
import { v4 as uuid } from 'uuid';
import { AUDIT_OUTCOME, OPERATION, PARTICIPANT_ROLE } from '../shared';
import type { AuditOutcome, Identity, Operation, ParticipantRole, RoomParties } from '../shared';
import type { AuditSink } from '../repositories/auditRepo';
import { ForbiddenError, UnauthenticatedError } from '../utils/errors';

const OPERATION_ROLES: Record<Operation, readonly ParticipantRole[]> = {
  [OPERATION.START]: [PARTICIPANT_ROLE.DOCTOR],
  [OPERATION.END]: [PARTICIPANT_ROLE.DOCTOR],
  [OPERATION.CANCEL]: [PARTICIPANT_ROLE.DOCTOR],
  [OPERATION.JOIN]: [PARTICIPANT_ROLE.DOCTOR, PARTICIPANT_ROLE.PATIENT],
  [OPERATION.STATUS]: [PARTICIPANT_ROLE.DOCTOR, PARTICIPANT_ROLE.PATIENT],
  [OPERATION.HEARTBEAT]: [PARTICIPANT_ROLE.PATIENT],
};

export interface Capability {
  readonly roomId: string;
  readonly userId: string;
  readonly role: ParticipantRole;
  readonly operation: Operation;
}

// Capabilities minted by authorize(); anything else is a forgery
const issued = new WeakSet<Capability>();

/** Which seat, if any, this identity holds in the room */
export function roleInRoom(identity: Identity, room: RoomParties): ParticipantRole | null {
  if (identity.role === PARTICIPANT_ROLE.DOCTOR && identity.userId === room.doctorId) {
    return PARTICIPANT_ROLE.DOCTOR;
  }
  if (identity.role === PARTICIPANT_ROLE.PATIENT && identity.userId === room.patientId) {
    return PARTICIPANT_ROLE.PATIENT;
  }
  return null;
}

/**
 * Throws ForbiddenError unless `cap` came from authorize() for this
 * operation (and room, when given).
 */
export function assertCapability(cap: Capability, operation: Operation, roomId?: string): void {
  if (!issued.has(cap) || cap.operation !== operation || (roomId !== undefined && cap.roomId !== roomId)) {
    throw new ForbiddenError(`Not authorized to ${operation} this consultation`);
  }
}

export class AccessGate {
  constructor(
    private readonly audit: AuditSink,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  /** Audits and refuses a caller without an identity, before the room's parties are known */
  authenticate(identity: Identity | null | undefined, roomId: string, operation: Operation): Identity {
    if (!identity) {
      this.write(null, roomId, operation, AUDIT_OUTCOME.UNAUTHENTICATED);
      throw new UnauthenticatedError();
    }
    return identity;
  }

  authorize(identity: Identity | null | undefined, room: RoomParties, operation: Operation): Capability {
    const caller = this.authenticate(identity, room.roomId, operation);
    const role = roleInRoom(caller, room);
    if (!role) {
      this.write(caller, room.roomId, operation, AUDIT_OUTCOME.FORBIDDEN);
      throw new ForbiddenError('You are not a participant of this consultation');
    }

    if (!OPERATION_ROLES[operation].includes(role)) {
      this.write(caller, room.roomId, operation, AUDIT_OUTCOME.FORBIDDEN);
      throw new ForbiddenError(`Only the ${OPERATION_ROLES[operation].join(' or ')} can ${operation} this consultation`);
    }

    this.write(caller, room.roomId, operation, AUDIT_OUTCOME.AUTHORIZED);
    const cap: Capability = Object.freeze({
      roomId: room.roomId,
      userId: caller.userId,
      role,
      operation,
    });
    issued.add(cap);
    return cap;
  }

  private write(
    identity: Identity | null,
    roomId: string,
    operation: Operation,
    outcome: AuditOutcome,
  ): void {
    const timestamp = this.clock().toISOString();
    this.audit.record({
      roomId,
      auditId: `${timestamp}#${uuid()}`,
      timestamp,
      userId: identity?.userId ?? null,
      role: identity?.role ?? null,
      operation,
      outcome,
    });
  }
}
