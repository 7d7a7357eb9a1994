/**
 * appointmentRepo.ts — Read-only access to appointments.
 *
 * Appointments are booked and owned elsewhere in the application; the
 * consultation server only needs `(appointmentId, doctorId, patientId,
 * scheduledTime)` to know who may enter a room.
 *
 * Drivers:
 *   - DynamoAppointmentDirectory: Teleconsult_Appointments (PK appointmentId)
 *   - MemoryAppointmentDirectory: seeded in code or from a JSON file
 *     (DEV_APPOINTMENTS_FILE) for local development
 */
import fs from 'fs';
import { GetCommand } from '@aws-sdk/lib-dynamodb';
import type { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import { TABLES } from '../infra/dynamodb';
import type { Appointment } from '../shared';
import { parseAppointment } from '../utils/validators';
import { logger } from '../utils/logger';

export interface AppointmentDirectory {
  findById(appointmentId: string): Promise<Appointment | null>;
}

export class DynamoAppointmentDirectory implements AppointmentDirectory {
  constructor(
    private readonly client: DynamoDBDocumentClient,
    private readonly table: string = TABLES.APPOINTMENTS,
  ) {}

  async findById(appointmentId: string): Promise<Appointment | null> {
    const result = await this.client.send(
      new GetCommand({ TableName: this.table, Key: { appointmentId } }),
    );
    if (!result.Item) return null;

    const appointment = parseAppointment(result.Item);
    if (!appointment) {
      logger.warn('Skipping malformed appointment record', { appointmentId });
    }
    return appointment;
  }
}

export class MemoryAppointmentDirectory implements AppointmentDirectory {
  private readonly appointments = new Map<string, Appointment>();

  constructor(seed: Appointment[] = []) {
    for (const appointment of seed) this.add(appointment);
  }

  add(appointment: Appointment): void {
    this.appointments.set(appointment.appointmentId, { ...appointment });
  }

  async findById(appointmentId: string): Promise<Appointment | null> {
    const appointment = this.appointments.get(appointmentId);
    return appointment ? { ...appointment } : null;
  }
}

/** Reads a JSON array of appointments; malformed entries are logged and skipped */
export function loadAppointmentsFile(filePath: string): Appointment[] {
  const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  if (!Array.isArray(parsed)) {
    throw new Error(`${filePath} must contain a JSON array of appointments`);
  }

  const appointments: Appointment[] = [];
  parsed.forEach((entry: unknown, index) => {
    const appointment = parseAppointment(entry);
    if (appointment) {
      appointments.push(appointment);
    } else {
      logger.warn('Ignoring malformed appointment fixture', { filePath, index });
    }
  });
  return appointments;
}
