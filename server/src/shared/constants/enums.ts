/**
 * enums.ts — Runtime constants for string enums used across the server.
 *
 * Each object is `as const` so TypeScript infers literal types; the matching
 * union types are derived from the objects themselves.
 *
 * Usage:
 *   import { SESSION_STATE, PARTICIPANT_ROLE } from '../shared';
 *   if (session.state !== SESSION_STATE.ACTIVE) { ... }
 */

// ─── Consultation Session State ──────────────────────────────────
//   SCHEDULED → ACTIVE → ENDED
//   SCHEDULED → CANCELLED
export const SESSION_STATE = {
  SCHEDULED: 'SCHEDULED',
  ACTIVE: 'ACTIVE',
  ENDED: 'ENDED',
  CANCELLED: 'CANCELLED',
} as const;

export type SessionState = (typeof SESSION_STATE)[keyof typeof SESSION_STATE];

export const SESSION_STATES: readonly SessionState[] = Object.values(SESSION_STATE);

// ─── Room Participants ───────────────────────────────────────────
export const PARTICIPANT_ROLE = {
  DOCTOR: 'doctor',
  PATIENT: 'patient',
} as const;

export type ParticipantRole = (typeof PARTICIPANT_ROLE)[keyof typeof PARTICIPANT_ROLE];

// ─── Portal Roles ────────────────────────────────────────────────
// Every role the identity provider can hand out; only doctor and patient
// can ever own a consultation room.
export const USER_ROLE = {
  ...PARTICIPANT_ROLE,
  LAB: 'lab',
  ADMIN: 'admin',
} as const;

export type UserRole = (typeof USER_ROLE)[keyof typeof USER_ROLE];

// ─── Gated Operations ────────────────────────────────────────────
export const OPERATION = {
  START: 'start',
  JOIN: 'join',
  END: 'end',
  CANCEL: 'cancel',
  STATUS: 'status',
  HEARTBEAT: 'heartbeat',
} as const;

export type Operation = (typeof OPERATION)[keyof typeof OPERATION];

// ─── Why a Session Ended ─────────────────────────────────────────
export const END_REASON = {
  DOCTOR_ENDED: 'doctor_ended',
  DOCTOR_DISCONNECTED: 'doctor_disconnected',
  DOCTOR_TIMEOUT: 'doctor_timeout',
  PATIENT_TIMEOUT: 'patient_timeout',
} as const;

export type EndReason = (typeof END_REASON)[keyof typeof END_REASON];

// ─── Signaling Frame Types ───────────────────────────────────────
export const SIGNAL_TYPE = {
  OFFER: 'offer',
  ANSWER: 'answer',
  ICE_CANDIDATE: 'ice_candidate',
} as const;

export type SignalType = (typeof SIGNAL_TYPE)[keyof typeof SIGNAL_TYPE];

// ─── Audit Outcomes ──────────────────────────────────────────────
export const AUDIT_OUTCOME = {
  AUTHORIZED: 'authorized',
  UNAUTHENTICATED: 'unauthenticated',
  FORBIDDEN: 'forbidden',
} as const;

export type AuditOutcome = (typeof AUDIT_OUTCOME)[keyof typeof AUDIT_OUTCOME];
