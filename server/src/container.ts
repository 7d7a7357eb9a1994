/**
 * container.ts — Builds the service graph for one server process.
 *
 *   SESSION_STORE=dynamodb → DynamoDB session store, appointment table, audit table
 *   SESSION_STORE=memory   → in-process maps; appointments seeded from
 *                            DEV_APPOINTMENTS_FILE when set
 *
 * The relay is created before the lifecycle controller: the controller
 * subscribes to the relay's vacated events, and the relay only knows the
 * store through its presence probe.
 */
import path from 'path';
import type { Settings } from './config';
import { getDocClient } from './infra/dynamodb';
import type { AppointmentDirectory } from './repositories/appointmentRepo';
import {
  DynamoAppointmentDirectory,
  MemoryAppointmentDirectory,
  loadAppointmentsFile,
} from './repositories/appointmentRepo';
import type { AuditSink } from './repositories/auditRepo';
import { DynamoAuditSink, logAuditSink } from './repositories/auditRepo';
import type { SessionStore } from './repositories/sessionStore';
import { DynamoSessionStore } from './repositories/dynamoSessionStore';
import { MemorySessionStore } from './repositories/memorySessionStore';
import { RelayHub } from './relay/relayHub';
import { AccessGate } from './services/accessGate';
import { ConsultationService } from './services/consultationService';
import { SessionLifecycle, presencePermitted } from './services/lifecycleService';
import type { SessionNotifier } from './services/notificationService';
import { socketNotifier } from './services/notificationService';
import { StatusService } from './services/statusService';
import { logger } from './utils/logger';

export interface Container {
  store: SessionStore;
  appointments: AppointmentDirectory;
  audit: AuditSink;
  gate: AccessGate;
  relay: RelayHub;
  lifecycle: SessionLifecycle;
  status: StatusService;
  consultations: ConsultationService;
}

export interface ContainerOverrides {
  store?: SessionStore;
  appointments?: AppointmentDirectory;
  audit?: AuditSink;
  notifier?: SessionNotifier;
  clock?: () => Date;
}

type WiringSettings = Pick<
  Settings,
  'storeDriver' | 'graceWindowMs' | 'doctorConnectTimeoutMs' | 'roomIdNamespace' | 'devAppointmentsFile'
>;

function memoryAppointments(file: string | null): MemoryAppointmentDirectory {
  if (!file) {
    logger.warn('No DEV_APPOINTMENTS_FILE set, appointment directory is empty');
    return new MemoryAppointmentDirectory();
  }
  const resolved = path.resolve(process.cwd(), file);
  const seed = loadAppointmentsFile(resolved);
  logger.info('Loaded development appointments', { file: resolved, count: seed.length });
  return new MemoryAppointmentDirectory(seed);
}

export function buildContainer(settings: WiringSettings, overrides: ContainerOverrides = {}): Container {
  const clock = overrides.clock ?? (() => new Date());
  const useDynamo = settings.storeDriver === 'dynamodb';

  const store =
    overrides.store ?? (useDynamo ? new DynamoSessionStore(getDocClient(), undefined, clock) : new MemorySessionStore(clock));
  const appointments =
    overrides.appointments ??
    (useDynamo ? new DynamoAppointmentDirectory(getDocClient()) : memoryAppointments(settings.devAppointmentsFile));
  const audit = overrides.audit ?? (useDynamo ? new DynamoAuditSink(getDocClient()) : logAuditSink);

  const relay = new RelayHub(presencePermitted(store));
  const lifecycle = new SessionLifecycle({
    store,
    relay,
    notifier: overrides.notifier ?? socketNotifier,
    options: {
      graceWindowMs: settings.graceWindowMs,
      doctorConnectTimeoutMs: settings.doctorConnectTimeoutMs,
    },
    clock,
  });
  const gate = new AccessGate(audit, clock);
  const status = new StatusService(store, relay);
  const consultations = new ConsultationService({
    appointments,
    store,
    gate,
    lifecycle,
    status,
    roomIdNamespace: settings.roomIdNamespace,
  });

  logger.info('Service container ready', { storeDriver: settings.storeDriver });
  return { store, appointments, audit, gate, relay, lifecycle, status, consultations };
}
