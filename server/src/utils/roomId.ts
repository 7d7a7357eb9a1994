/**
 * utils/roomId.ts — Appointment id → room id.
 *
 * Room ids are name-based UUIDs (v5) under a per-deployment namespace:
 * the same appointment always maps to the same room, and knowing one
 * appointment's room says nothing about its neighbours'.
 */
import { v5 as uuidv5 } from 'uuid';

export function deriveRoomId(appointmentId: string, namespace: string): string {
  return uuidv5(`appointment:${appointmentId}`, namespace);
}
