/**
 * config/index.ts — Application configuration loader.
 *
 * Two phases:
 *   1. Load server/.env (local development and base config)
 *   2. In production/stage, overlay secrets from AWS Secrets Manager onto
 *      process.env (JWT_SECRET, REDIS_PASSWORD, ROOM_ID_NAMESPACE, ...)
 *
 * Then returns the parsed Settings. Called once at startup, before any
 * infra client is created.
 */
import path from 'path';
import dotenv from 'dotenv';
import { logger } from '../utils/logger';
import { loadSecrets } from './secrets';
import { readSettings } from './settings';
import type { Settings } from './settings';

export async function loadConfig(): Promise<Settings> {
  dotenv.config({ path: path.resolve(__dirname, '../../.env') });

  const env = process.env.ENV || 'development';
  logger.info(`Initializing configuration for environment: ${env}`);

  if (env === 'production' || env === 'stage') {
    const appName = process.env.APP_NAME;
    if (!appName) {
      throw new Error('APP_NAME environment variable is required in production/stage');
    }
    const secrets = await loadSecrets(appName);
    Object.assign(process.env, secrets);
    logger.info(`Secrets loaded from AWS Secrets Manager for ${appName}`);
  }

  const settings = readSettings();
  logger.info('Consultation settings', {
    storeDriver: settings.storeDriver,
    graceWindowMs: settings.graceWindowMs,
    doctorConnectTimeoutMs: settings.doctorConnectTimeoutMs,
    watchdogSweepMs: settings.watchdogSweepMs,
  });
  return settings;
}

export type { Settings, StoreDriver } from './settings';
