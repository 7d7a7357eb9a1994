/**
 * consultationService.ts — Entry point for routes and socket handlers.
 *
 * Turns "this caller wants to do X to appointment A" into a gated call on
 * the lifecycle controller:
 *
 *   1. validate the appointment id and look the appointment up
 *   2. derive the room id (UUID v5 of the appointment id)
 *   3. AccessGate.authorize(identity, parties, operation) → Capability
 *   4. lifecycle / status call with that capability
 *
 * Nothing is written for a caller who fails step 3. The session record is
 * created lazily, by the first authorized start, join pre-flight or cancel.
 *
 * Socket admission and heartbeats arrive with a room id instead of an
 * appointment id; the parties then come from the stored session.
 */
import { OPERATION, PARTICIPANT_ROLE } from '../shared';
import type { Identity, MeetingSession, Operation, RoomParties, StatusView } from '../shared';
import type { AppointmentDirectory } from '../repositories/appointmentRepo';
import type { SessionStore } from '../repositories/sessionStore';
import type { RelayConnection } from '../relay/connection';
import type { AccessGate, Capability } from './accessGate';
import type { SessionLifecycle } from './lifecycleService';
import type { StatusService } from './statusService';
import {
  ForbiddenError,
  NotFoundError,
  NotYetStartedError,
  UnauthenticatedError,
  ValidationError,
} from '../utils/errors';
import { deriveRoomId } from '../utils/roomId';
import { validateAppointmentId, validateRoomId } from '../utils/validators';

export interface ConsultationServiceDeps {
  appointments: AppointmentDirectory;
  store: SessionStore;
  gate: AccessGate;
  lifecycle: SessionLifecycle;
  status: StatusService;
  roomIdNamespace: string;
}

export interface Admission {
  session: MeetingSession;
  cap: Capability;
}

export class ConsultationService {
  constructor(private readonly deps: ConsultationServiceDeps) {}

  roomIdFor(appointmentId: string): string {
    return deriveRoomId(appointmentId, this.deps.roomIdNamespace);
  }

  /** Appointment → the two people allowed into its room */
  async resolveParties(appointmentId: unknown): Promise<RoomParties> {
    if (!validateAppointmentId(appointmentId)) {
      throw new ValidationError('Invalid appointment id');
    }
    const appointment = await this.deps.appointments.findById(appointmentId);
    if (!appointment) throw new NotFoundError(`Appointment ${appointmentId} not found`);

    return {
      roomId: this.roomIdFor(appointmentId),
      appointmentId,
      doctorId: appointment.doctorId,
      patientId: appointment.patientId,
    };
  }

  async status(identity: Identity | undefined, appointmentId: unknown): Promise<StatusView> {
    const cap = await this.authorizeAppointment(identity, appointmentId, OPERATION.STATUS);
    return this.deps.status.getStatus(cap);
  }

  async start(identity: Identity | undefined, appointmentId: unknown): Promise<MeetingSession> {
    const parties = await this.resolveParties(appointmentId);
    const cap = this.deps.gate.authorize(identity, parties, OPERATION.START);
    await this.deps.lifecycle.ensureSession(parties);
    return this.deps.lifecycle.start(cap);
  }

  /** Answers whether join-room would admit the caller right now; binds nothing */
  async checkJoin(identity: Identity | undefined, appointmentId: unknown): Promise<MeetingSession> {
    const parties = await this.resolveParties(appointmentId);
    const cap = this.deps.gate.authorize(identity, parties, OPERATION.JOIN);
    await this.deps.lifecycle.ensureSession(parties);
    return this.deps.lifecycle.checkJoinable(cap);
  }

  async end(identity: Identity | undefined, appointmentId: unknown): Promise<MeetingSession> {
    const cap = await this.authorizeAppointment(identity, appointmentId, OPERATION.END);
    return this.deps.lifecycle.end(cap);
  }

  async cancel(identity: Identity | undefined, appointmentId: unknown): Promise<MeetingSession> {
    const parties = await this.resolveParties(appointmentId);
    const cap = this.deps.gate.authorize(identity, parties, OPERATION.CANCEL);
    await this.deps.lifecycle.ensureSession(parties);
    return this.deps.lifecycle.cancel(cap);
  }

  /** The caller's own consultations, newest first */
  async listMine(identity: Identity | undefined): Promise<MeetingSession[]> {
    if (!identity) throw new UnauthenticatedError();
    if (identity.role !== PARTICIPANT_ROLE.DOCTOR && identity.role !== PARTICIPANT_ROLE.PATIENT) {
      throw new ForbiddenError('Only doctors and patients have consultations');
    }
    return this.deps.store.listByParticipant(identity.role, identity.userId);
  }

  // ─── Socket Entry Points ────────────────────────────────────────

  async admitConnection(
    identity: Identity | undefined,
    roomId: unknown,
    conn: RelayConnection,
  ): Promise<Admission> {
    const cap = await this.authorizeRoom(identity, roomId, OPERATION.JOIN);
    const session = await this.deps.lifecycle.admit(cap, conn);
    return { session, cap };
  }

  async heartbeat(identity: Identity | undefined, roomId: unknown): Promise<MeetingSession> {
    const cap = await this.authorizeRoom(identity, roomId, OPERATION.HEARTBEAT);
    return this.deps.lifecycle.heartbeat(cap);
  }

  // ─── Internals ──────────────────────────────────────────────────

  private async authorizeAppointment(
    identity: Identity | undefined,
    appointmentId: unknown,
    operation: Operation,
  ): Promise<Capability> {
    const parties = await this.resolveParties(appointmentId);
    return this.deps.gate.authorize(identity, parties, operation);
  }

  /** A room with no stored session has not been started */
  private async authorizeRoom(
    identity: Identity | undefined,
    roomId: unknown,
    operation: Operation,
  ): Promise<Capability> {
    if (!validateRoomId(roomId)) throw new ValidationError('Invalid room id');
    const caller = this.deps.gate.authenticate(identity, roomId, operation);

    const session = await this.deps.lifecycle.getSession(roomId);
    if (!session) throw new NotYetStartedError();
    return this.deps.gate.authorize(caller, session, operation);
  }
}
