/**
 * config/secrets.ts — AWS Secrets Manager integration.
 *
 * The secret (id = APP_NAME, e.g. "teleconsult-prod") is a flat JSON object
 * of environment variables:
 *   { "JWT_SECRET": "...", "REDIS_PASSWORD": "...", "ROOM_ID_NAMESPACE": "..." }
 * Non-string values are dropped.
 */
import { SecretsManagerClient, GetSecretValueCommand } from '@aws-sdk/client-secrets-manager';
import { logger } from '../utils/logger';

export async function loadSecrets(secretId: string): Promise<Record<string, string>> {
  const client = new SecretsManagerClient({
    region: process.env.AWS_REGION || 'ap-south-1',
  });

  logger.info(`Fetching secrets for ID: ${secretId}`);
  const response = await client.send(new GetSecretValueCommand({ SecretId: secretId }));

  if (!response.SecretString) {
    logger.warn('SecretString is empty for this secret');
    return {};
  }

  const parsed: unknown = JSON.parse(response.SecretString);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error(`Secret ${secretId} is not a JSON object`);
  }

  const secrets: Record<string, string> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value === 'string') secrets[key] = value;
  }
  return secrets;
}
