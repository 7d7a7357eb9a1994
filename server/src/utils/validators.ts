/**
 * utils/validators.ts — Input validation at the system boundary.
 *
 * Request params, socket payloads, JWT claims and DynamoDB items all arrive
 * as `unknown`. The guards here narrow them to domain types so nothing
 * downstream needs a cast.
 */
import { validate as isUuid } from 'uuid';
import {
  LIMITS, SESSION_STATES, USER_ROLE, END_REASON, SIGNAL_TYPE,
} from '../shared';
import type {
  Appointment, EndReason, Identity, MeetingSession, SessionState, SignalFrame, SignalType, UserRole,
} from '../shared';

const APPOINTMENT_ID_REGEX = /^[A-Za-z0-9_-]+$/;

type UnknownRecord = Record<string, unknown>;

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNullableString(value: unknown): value is string | null {
  return value === null || typeof value === 'string';
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.length > 0;
}

/** Appointment id from the booking system: short, URL-safe */
export function validateAppointmentId(id: unknown): id is string {
  return (
    typeof id === 'string' &&
    id.length > 0 &&
    id.length <= LIMITS.APPOINTMENT_ID_MAX_LENGTH &&
    APPOINTMENT_ID_REGEX.test(id)
  );
}

/** Room ids are always UUIDs derived by utils/roomId.ts */
export function validateRoomId(id: unknown): id is string {
  return typeof id === 'string' && isUuid(id);
}

export function isSessionState(value: unknown): value is SessionState {
  return typeof value === 'string' && SESSION_STATES.some((s) => s === value);
}

export function isUserRole(value: unknown): value is UserRole {
  return typeof value === 'string' && Object.values(USER_ROLE).some((r) => r === value);
}

function isEndReason(value: unknown): value is EndReason {
  return typeof value === 'string' && Object.values(END_REASON).some((r) => r === value);
}

function isSignalType(value: unknown): value is SignalType {
  return typeof value === 'string' && Object.values(SIGNAL_TYPE).some((t) => t === value);
}

/** Signaling frame: known type, payload present and under the size cap */
export function isSignalFrame(value: unknown): value is SignalFrame {
  if (!isRecord(value) || !isSignalType(value.type)) return false;
  if (value.payload === undefined || value.payload === null) return false;
  const size = Buffer.byteLength(JSON.stringify(value.payload), 'utf8');
  return size <= LIMITS.SIGNAL_PAYLOAD_MAX_BYTES;
}

/** Decoded JWT claims → Identity, or null when the token carries something else */
export function parseIdentity(claims: unknown): Identity | null {
  if (!isRecord(claims)) return null;
  const { userId, role } = claims;
  if (typeof userId === 'number' && Number.isFinite(userId) && isUserRole(role)) {
    return { userId: String(userId), role };
  }
  if (!isNonEmptyString(userId) || !isUserRole(role)) return null;
  return { userId, role };
}

/** DynamoDB item → MeetingSession; throws on a malformed record */
export function parseSessionItem(item: unknown): MeetingSession {
  if (
    !isRecord(item) ||
    !isNonEmptyString(item.roomId) ||
    !isNonEmptyString(item.appointmentId) ||
    !isNonEmptyString(item.doctorId) ||
    !isNonEmptyString(item.patientId) ||
    !isSessionState(item.state) ||
    !isNonEmptyString(item.createdAt)
  ) {
    throw new Error('Malformed meeting session record');
  }

  const optional = (key: string): string | null => {
    const value = item[key];
    return isNullableString(value) ? value : null;
  };

  return {
    roomId: item.roomId,
    appointmentId: item.appointmentId,
    doctorId: item.doctorId,
    patientId: item.patientId,
    state: item.state,
    createdAt: item.createdAt,
    startedAt: optional('startedAt'),
    endedAt: optional('endedAt'),
    cancelledAt: optional('cancelledAt'),
    lastPatientSeenAt: optional('lastPatientSeenAt'),
    lastDoctorSeenAt: optional('lastDoctorSeenAt'),
    endReason: isEndReason(item.endReason) ? item.endReason : null,
  };
}

/** Appointment record (DynamoDB item or dev fixture entry); ids may be numeric */
export function parseAppointment(item: unknown): Appointment | null {
  if (!isRecord(item)) return null;
  const asId = (value: unknown): string | null =>
    typeof value === 'number' && Number.isFinite(value)
      ? String(value)
      : isNonEmptyString(value)
        ? value
        : null;

  const appointmentId = asId(item.appointmentId);
  const doctorId = asId(item.doctorId);
  const patientId = asId(item.patientId);
  if (!appointmentId || !doctorId || !patientId) return null;

  return {
    appointmentId,
    doctorId,
    patientId,
    scheduledTime: typeof item.scheduledTime === 'string' ? item.scheduledTime : null,
  };
}
