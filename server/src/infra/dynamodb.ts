/**
 * dynamodb.ts — DynamoDB Document Client and table names.
 *
 * Endpoint resolution:
 *   - DYNAMODB_ENDPOINT set → use it
 *   - ENV=development outside Kubernetes → LocalStack (localhost:4566)
 *   - otherwise the AWS endpoint for AWS_REGION
 *
 * The client is created on first use so the in-memory store driver never
 * touches AWS configuration.
 *
 * Table schema:
 *   - Teleconsult_MeetingSessions → PK: roomId
 *                                   GSI DoctorIndex(doctorId), GSI PatientIndex(patientId)
 *   - Teleconsult_Appointments    → PK: appointmentId (owned by the booking service)
 *   - Teleconsult_AuditLog        → PK: roomId, SK: auditId
 */
import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import { logger } from '../utils/logger';

let docClient: DynamoDBDocumentClient | null = null;

export function getDocClient(): DynamoDBDocumentClient {
  if (docClient) return docClient;

  const config: ConstructorParameters<typeof DynamoDBClient>[0] = {
    region: process.env.AWS_REGION || 'ap-south-1',
  };

  if (process.env.DYNAMODB_ENDPOINT) {
    config.endpoint = process.env.DYNAMODB_ENDPOINT;
  } else if (process.env.ENV === 'development' && !process.env.KUBERNETES_SERVICE_HOST) {
    config.endpoint = 'http://localhost:4566';
  }

  if (process.env.AWS_ACCESS_KEY_ID && process.env.AWS_SECRET_ACCESS_KEY) {
    config.credentials = {
      accessKeyId: process.env.AWS_ACCESS_KEY_ID,
      secretAccessKey: process.env.AWS_SECRET_ACCESS_KEY,
    };
  }

  docClient = DynamoDBDocumentClient.from(new DynamoDBClient(config), {
    marshallOptions: {
      removeUndefinedValues: true,
      convertEmptyValues: false,
    },
  });

  logger.info('DynamoDB client initialized', { region: config.region, endpoint: config.endpoint });
  return docClient;
}

export const TABLES = {
  MEETING_SESSIONS: process.env.DYNAMO_TABLE_MEETING_SESSIONS || 'Teleconsult_MeetingSessions',
  APPOINTMENTS: process.env.DYNAMO_TABLE_APPOINTMENTS || 'Teleconsult_Appointments',
  AUDIT_LOG: process.env.DYNAMO_TABLE_AUDIT_LOG || 'Teleconsult_AuditLog',
} as const;

export const INDEXES = {
  BY_DOCTOR: 'DoctorIndex',
  BY_PATIENT: 'PatientIndex',
} as const;
