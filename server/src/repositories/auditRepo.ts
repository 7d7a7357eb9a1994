/**
 * auditRepo.ts — Where the access gate writes its audit trail.
 *
 * DynamoDB Table: Teleconsult_AuditLog
 * Primary Key:    roomId (partition) + auditId (sort, `${timestamp}#${uuid}`)
 *
 * Audit writes never fail the request they describe: a failed put is
 * logged at error level and the caller carries on.
 */
import { PutCommand } from '@aws-sdk/lib-dynamodb';
import type { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import { TABLES } from '../infra/dynamodb';
import type { AuditRecord } from '../shared';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export interface AuditSink {
  record(entry: AuditRecord): void;
}

/** Emits audit records as structured log lines */
export const logAuditSink: AuditSink = {
  record(entry) {
    const log = entry.outcome === 'authorized' ? logger.info : logger.warn;
    log('Consultation access', entry);
  },
};

export class DynamoAuditSink implements AuditSink {
  constructor(
    private readonly client: DynamoDBDocumentClient,
    private readonly table: string = TABLES.AUDIT_LOG,
  ) {}

  record(entry: AuditRecord): void {
    logAuditSink.record(entry);
    this.client
      .send(new PutCommand({ TableName: this.table, Item: entry }))
      .catch((err: unknown) => {
        logger.error('Failed to persist audit record', {
          roomId: entry.roomId,
          auditId: entry.auditId,
          error: errorMessage(err),
        });
      });
  }
}

/** Keeps records in memory — tests read them back */
export class MemoryAuditSink implements AuditSink {
  readonly records: AuditRecord[] = [];

  record(entry: AuditRecord): void {
    this.records.push(entry);
  }
}
