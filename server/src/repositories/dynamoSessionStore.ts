/**
 * dynamoSessionStore.ts — SessionStore backed by DynamoDB.
 *
 * DynamoDB Table: Teleconsult_MeetingSessions
 * Primary Key:    roomId (partition key, no sort key)
 * GSIs:           DoctorIndex (doctorId, createdAt), PatientIndex (patientId, createdAt)
 *
 * Race safety:
 *   - getOrCreate puts with attribute_not_exists(roomId); the loser of a
 *     creation race reads the winner's record.
 *   - compareAndSwapState updates with `#state = :expected`; a
 *     ConditionalCheckFailedException means another writer got there
 *     first, and the caller gets the fresh record back.
 */
import { GetCommand, PutCommand, QueryCommand, ScanCommand, UpdateCommand } from '@aws-sdk/lib-dynamodb';
import type { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import { INDEXES, TABLES } from '../infra/dynamodb';
import type { MeetingSession, ParticipantRole, SessionPatch, SessionSeed, SessionState } from '../shared';
import { PARTICIPANT_ROLE, SESSION_STATE } from '../shared';
import { isConditionalCheckFailed } from '../utils/errors';
import { parseSessionItem } from '../utils/validators';
import { logger } from '../utils/logger';
import type { CasResult, SessionStore } from './sessionStore';
import { byCreatedAtDesc, newScheduledSession } from './sessionStore';

type Key = Record<string, unknown>;

export class DynamoSessionStore implements SessionStore {
  constructor(
    private readonly client: DynamoDBDocumentClient,
    private readonly table: string = TABLES.MEETING_SESSIONS,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  async getOrCreate(seed: SessionSeed): Promise<MeetingSession> {
    const existing = await this.read(seed.roomId);
    if (existing) return existing;

    const session = newScheduledSession(seed, this.clock());
    try {
      await this.client.send(
        new PutCommand({
          TableName: this.table,
          Item: session,
          ConditionExpression: 'attribute_not_exists(roomId)',
        }),
      );
      logger.info('Meeting session created', { roomId: session.roomId, appointmentId: seed.appointmentId });
      return session;
    } catch (err) {
      if (!isConditionalCheckFailed(err)) throw err;
      // Another request created it first
      const winner = await this.read(seed.roomId);
      if (!winner) throw new Error(`Meeting session ${seed.roomId} vanished after creation race`);
      return winner;
    }
  }

  async read(roomId: string): Promise<MeetingSession | null> {
    const result = await this.client.send(
      new GetCommand({
        TableName: this.table,
        Key: { roomId },
        ConsistentRead: true,
      }),
    );
    return result.Item ? parseSessionItem(result.Item) : null;
  }

  async compareAndSwapState(
    roomId: string,
    expected: SessionState,
    next: SessionState,
    patch: SessionPatch = {},
  ): Promise<CasResult> {
    const names: Record<string, string> = { '#state': 'state' };
    const values: Record<string, unknown> = { ':expected': expected, ':next': next };
    const sets = ['#state = :next'];

    for (const [field, value] of Object.entries(patch)) {
      if (value === undefined) continue;
      names[`#${field}`] = field;
      values[`:${field}`] = value;
      sets.push(`#${field} = :${field}`);
    }

    try {
      const result = await this.client.send(
        new UpdateCommand({
          TableName: this.table,
          Key: { roomId },
          UpdateExpression: `SET ${sets.join(', ')}`,
          ConditionExpression: 'attribute_exists(roomId) AND #state = :expected',
          ExpressionAttributeNames: names,
          ExpressionAttributeValues: values,
          ReturnValues: 'ALL_NEW',
        }),
      );
      return { ok: true, session: parseSessionItem(result.Attributes) };
    } catch (err) {
      if (!isConditionalCheckFailed(err)) throw err;
      return { ok: false, current: await this.read(roomId) };
    }
  }

  async listByParticipant(role: ParticipantRole, userId: string): Promise<MeetingSession[]> {
    const isDoctor = role === PARTICIPANT_ROLE.DOCTOR;
    const items: MeetingSession[] = [];
    let startKey: Key | undefined;

    do {
      const page = await this.client.send(
        new QueryCommand({
          TableName: this.table,
          IndexName: isDoctor ? INDEXES.BY_DOCTOR : INDEXES.BY_PATIENT,
          KeyConditionExpression: isDoctor ? 'doctorId = :uid' : 'patientId = :uid',
          ExpressionAttributeValues: { ':uid': userId },
          ScanIndexForward: false,
          ExclusiveStartKey: startKey,
        }),
      );
      for (const item of page.Items ?? []) items.push(parseSessionItem(item));
      startKey = page.LastEvaluatedKey;
    } while (startKey);

    return items.sort(byCreatedAtDesc);
  }

  async listActive(): Promise<MeetingSession[]> {
    const items: MeetingSession[] = [];
    let startKey: Key | undefined;

    do {
      const page = await this.client.send(
        new ScanCommand({
          TableName: this.table,
          FilterExpression: '#state = :active',
          ExpressionAttributeNames: { '#state': 'state' },
          ExpressionAttributeValues: { ':active': SESSION_STATE.ACTIVE },
          ExclusiveStartKey: startKey,
        }),
      );
      for (const item of page.Items ?? []) items.push(parseSessionItem(item));
      startKey = page.LastEvaluatedKey;
    } while (startKey);

    return items;
  }
}
