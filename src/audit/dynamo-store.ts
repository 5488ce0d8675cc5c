import {
  DynamoDBClient,
  PutItemCommand,
  QueryCommand,
  CreateTableCommand,
  DescribeTableCommand,
} from '@aws-sdk/client-dynamodb';
import type { AttributeValue, QueryCommandInput } from '@aws-sdk/client-dynamodb';
import { AuditAction } from './types.js';
import type { AuditEntry, AuditQuery } from './types.js';
import type { AuditStore } from './store.js';

const PK = 'pk'; // partition key: "AUDIT"
const SK = 'sk'; // sort key: "<timestamp>#<id>"

export class DynamoAuditStore implements AuditStore {
  constructor(
    private client: DynamoDBClient,
    private tableName = 'taskrelay-audit',
  ) {}

  async ensureTable(): Promise<void> {
    try {
      await this.client.send(new DescribeTableCommand({ TableName: this.tableName }));
    } catch (err: unknown) {
      if (err instanceof Error && err.name === 'ResourceNotFoundException') {
        await this.client.send(
          new CreateTableCommand({
            TableName: this.tableName,
            KeySchema: [
              { AttributeName: PK, KeyType: 'HASH' },
              { AttributeName: SK, KeyType: 'RANGE' },
            ],
            AttributeDefinitions: [
              { AttributeName: PK, AttributeType: 'S' },
              { AttributeName: SK, AttributeType: 'S' },
            ],
            BillingMode: 'PAY_PER_REQUEST',
          }),
        );
      } else {
        throw err;
      }
    }
  }

  async append(entry: AuditEntry): Promise<void> {
    const item: Record<string, AttributeValue> = {
      [PK]: { S: 'AUDIT' },
      [SK]: { S: `${entry.timestamp}#${entry.id}` },
      id: { S: entry.id },
      timestamp: { S: entry.timestamp },
      action: { S: entry.action },
      actor: { S: entry.actor },
      success: { BOOL: entry.success },
    };

    if (entry.taskId) item.taskId = { S: entry.taskId };
    if (entry.owner) item.owner = { S: entry.owner };
    if (entry.error) item.error = { S: entry.error };
    if (entry.detail) item.detail = { S: JSON.stringify(entry.detail) };

    await this.client.send(new PutItemCommand({ TableName: this.tableName, Item: item }));
  }

  async query(query: AuditQuery): Promise<AuditEntry[]> {
    const values: Record<string, AttributeValue> = { ':pk': { S: 'AUDIT' } };
    let keyCondition = `${PK} = :pk`;

    if (query.since) {
      keyCondition += ` AND ${SK} >= :since`;
      values[':since'] = { S: query.since };
    }

    const filters: string[] = [];
    if (query.action) {
      filters.push('#act = :action');
      values[':action'] = { S: query.action };
    }
    if (query.taskId) {
      filters.push('taskId = :taskId');
      values[':taskId'] = { S: query.taskId };
    }

    const params: QueryCommandInput = {
      TableName: this.tableName,
      KeyConditionExpression: keyCondition,
      ExpressionAttributeValues: values,
      ScanIndexForward: false, // newest first
      Limit: query.limit,
      ...(filters.length > 0 ? { FilterExpression: filters.join(' AND ') } : {}),
      ...(query.action ? { ExpressionAttributeNames: { '#act': 'action' } } : {}),
    };

    const result = await this.client.send(new QueryCommand(params));
    return (result.Items ?? []).map(fromItem);
  }
}

function fromItem(item: Record<string, AttributeValue>): AuditEntry {
  const detail: unknown = item.detail?.S ? JSON.parse(item.detail.S) : undefined;
  return {
    id: item.id?.S ?? '',
    timestamp: item.timestamp?.S ?? '',
    action: AuditAction.parse(item.action?.S),
    actor: item.actor?.S ?? 'unknown',
    taskId: item.taskId?.S,
    owner: item.owner?.S,
    detail: isRecord(detail) ? detail : undefined,
    success: item.success?.BOOL ?? true,
    error: item.error?.S,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
