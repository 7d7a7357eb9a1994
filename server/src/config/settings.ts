/**
 * config/settings.ts — Typed view over process.env.
 *
 * Read once, after loadConfig() has merged .env and Secrets Manager into
 * process.env. Numeric values are validated here so a typo in a timeout
 * fails the boot instead of silently disabling the watchdog.
 */
import { validate as isUuid } from 'uuid';
import { LIMITS } from '../shared';

export type StoreDriver = 'dynamodb' | 'memory';

export interface Settings {
  env: string;
  port: number;
  corsOrigins: string[];
  jwtSecret: string;
  storeDriver: StoreDriver;
  /** How long an ACTIVE room waits for a disconnected patient */
  graceWindowMs: number;
  /** How long an ACTIVE room waits for the doctor's first relay connection */
  doctorConnectTimeoutMs: number;
  watchdogSweepMs: number;
  /** UUID namespace for deriving room ids from appointment ids */
  roomIdNamespace: string;
  devAppointmentsFile: string | null;
  redis: { host: string; port: number; password: string | undefined } | null;
}

// Fixed fallback so development room ids are stable across restarts
const DEFAULT_ROOM_NAMESPACE = '6f1c2a4e-93b7-4d0a-8a55-0e2d7c9b4f10';

function readInt(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${key} must be a positive integer, got "${raw}"`);
  }
  return value;
}

export function readSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const envName = env.ENV || 'development';
  const isDev = envName === 'development';

  const jwtSecret = env.JWT_SECRET || (isDev ? 'dev-secret-change-in-production' : '');
  if (!jwtSecret) {
    throw new Error('JWT_SECRET is required outside development');
  }

  const driver = env.SESSION_STORE || (isDev ? 'memory' : 'dynamodb');
  if (driver !== 'dynamodb' && driver !== 'memory') {
    throw new Error(`SESSION_STORE must be "dynamodb" or "memory", got "${driver}"`);
  }

  const roomIdNamespace = env.ROOM_ID_NAMESPACE || DEFAULT_ROOM_NAMESPACE;
  if (!isUuid(roomIdNamespace)) {
    throw new Error('ROOM_ID_NAMESPACE must be a UUID');
  }

  const graceWindowMs = readInt(env, 'GRACE_WINDOW_MS', LIMITS.DEFAULT_GRACE_WINDOW_MS);
  const doctorConnectTimeoutMs = readInt(
    env,
    'DOCTOR_CONNECT_TIMEOUT_MS',
    LIMITS.DEFAULT_DOCTOR_CONNECT_TIMEOUT_MS,
  );
  const watchdogSweepMs = readInt(env, 'WATCHDOG_SWEEP_MS', LIMITS.DEFAULT_WATCHDOG_SWEEP_MS);
  // Bound participants are re-stamped once per sweep
  if (watchdogSweepMs >= Math.min(graceWindowMs, doctorConnectTimeoutMs)) {
    throw new Error('WATCHDOG_SWEEP_MS must be shorter than GRACE_WINDOW_MS and DOCTOR_CONNECT_TIMEOUT_MS');
  }

  return {
    env: envName,
    port: readInt(env, 'PORT', 4000),
    corsOrigins: env.CORS_ORIGINS?.split(',').map((o) => o.trim()).filter(Boolean) ?? [
      'http://localhost:5173',
    ],
    jwtSecret,
    storeDriver: driver,
    graceWindowMs,
    doctorConnectTimeoutMs,
    watchdogSweepMs,
    roomIdNamespace,
    devAppointmentsFile: env.DEV_APPOINTMENTS_FILE || null,
    redis: env.REDIS_HOST || !isDev
      ? {
          host: env.REDIS_HOST || 'localhost',
          port: readInt(env, 'REDIS_PORT', 6379),
          password: env.REDIS_PASSWORD || undefined,
        }
      : null,
  };
}
