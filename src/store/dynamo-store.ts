import {
  DynamoDBClient,
  CreateTableCommand,
  DeleteItemCommand,
  DescribeTableCommand,
  GetItemCommand,
  PutItemCommand,
  QueryCommand,
  ScanCommand,
  UpdateItemCommand,
  UpdateTimeToLiveCommand,
} from '@aws-sdk/client-dynamodb';
import type { AttributeValue, ScanCommandInput } from '@aws-sdk/client-dynamodb';
import { z } from 'zod';
import { PeerRecordSchema, TaskResultSchema, TaskSchema } from '../types/index.js';
import type { PeerRecord, StoredTask, Task } from '../types/index.js';
import { StoreUnavailableError } from '../errors.js';
import { isTerminal } from '../tasks/state.js';
import type { PutResult, TaskListFilter, TaskStore } from './store.js';

const PK = 'id';
const SEQ_KEY = '#seq';
const PEER_PREFIX = 'peer#';
const OWNER_INDEX = 'owner-seq-index';

type Item = Record<string, AttributeValue>;

const StoredTaskSchema = TaskSchema.extend({ seq: z.number().int().nonnegative() });

export interface DynamoTaskStoreOptions {
  tableName?: string;
  /** Terminal records expire this long after their last update (DynamoDB TTL) */
  retentionHours?: number;
  sequenceOverlap?: number;
}

export function toItem(task: Task, seq: number, retentionHours?: number): Item {
  const item: Item = {
    [PK]: { S: task.id },
    kind: { S: 'task' },
    type: { S: task.type },
    payload: { S: JSON.stringify(task.payload) },
    owner: { S: task.owner },
    createdBy: { S: task.createdBy },
    status: { S: task.status },
    attempt: { N: String(task.attempt) },
    createdAt: { S: task.createdAt },
    updatedAt: { S: task.updatedAt },
    seq: { N: String(seq) },
  };

  if (task.result) item.result = { S: JSON.stringify(task.result) };
  if (task.notBefore) item.notBefore = { S: task.notBefore };
  if (task.cancelRequestedAt) item.cancelRequestedAt = { S: task.cancelRequestedAt };
  if (retentionHours !== undefined && isTerminal(task.status)) {
    const expires = Date.parse(task.updatedAt) / 1000 + retentionHours * 3600;
    item.expiresAt = { N: String(Math.ceil(expires)) };
  }
  return item;
}

export function fromItem(item: Item): StoredTask {
  return StoredTaskSchema.parse({
    id: item[PK]?.S,
    type: item.type?.S,
    payload: item.payload?.S ? JSON.parse(item.payload.S) : {},
    owner: item.owner?.S,
    createdBy: item.createdBy?.S,
    status: item.status?.S,
    attempt: Number(item.attempt?.N ?? '0'),
    result: item.result?.S ? TaskResultSchema.parse(JSON.parse(item.result.S)) : undefined,
    notBefore: item.notBefore?.S,
    cancelRequestedAt: item.cancelRequestedAt?.S,
    createdAt: item.createdAt?.S,
    updatedAt: item.updatedAt?.S,
    seq: Number(item.seq?.N ?? '0'),
  });
}

function peerToItem(peer: PeerRecord): Item {
  const item: Item = {
    [PK]: { S: `${PEER_PREFIX}${peer.id}` },
    kind: { S: 'peer' },
    peerId: { S: peer.id },
    status: { S: peer.status },
    lastSeen: { S: peer.lastSeen },
    load: { N: String(peer.load) },
  };
  if (peer.descriptor) item.descriptor = { S: peer.descriptor };
  return item;
}

function peerFromItem(item: Item): PeerRecord {
  return PeerRecordSchema.parse({
    id: item.peerId?.S,
    status: item.status?.S,
    lastSeen: item.lastSeen?.S,
    load: Number(item.load?.N ?? '0'),
    descriptor: item.descriptor?.S,
  });
}

function isConditionFailure(err: unknown): boolean {
  return err instanceof Error && err.name === 'ConditionalCheckFailedException';
}

/**
 * Task store in a DynamoDB table keyed by task id.
 *
 * A counter item hands out write sequence numbers; the `owner-seq-index`
 * GSI serves `changesSince`. GSIs are eventually consistent, so watchers
 * re-read `sequenceOverlap` sequence numbers behind their cursor.
 */
export class DynamoTaskStore implements TaskStore {
  readonly sequenceOverlap: number;
  private readonly tableName: string;
  private readonly retentionHours: number | undefined;

  constructor(
    private client: DynamoDBClient,
    options: DynamoTaskStoreOptions = {},
  ) {
    this.tableName = options.tableName ?? 'taskrelay-tasks';
    this.retentionHours = options.retentionHours;
    this.sequenceOverlap = options.sequenceOverlap ?? 25;
  }

  async ensureTable(): Promise<void> {
    try {
      await this.client.send(new DescribeTableCommand({ TableName: this.tableName }));
      return;
    } catch (err: unknown) {
      if (!(err instanceof Error && err.name === 'ResourceNotFoundException')) throw err;
    }

    await this.client.send(
      new CreateTableCommand({
        TableName: this.tableName,
        KeySchema: [{ AttributeName: PK, KeyType: 'HASH' }],
        AttributeDefinitions: [
          { AttributeName: PK, AttributeType: 'S' },
          { AttributeName: 'owner', AttributeType: 'S' },
          { AttributeName: 'seq', AttributeType: 'N' },
        ],
        GlobalSecondaryIndexes: [
          {
            IndexName: OWNER_INDEX,
            KeySchema: [
              { AttributeName: 'owner', KeyType: 'HASH' },
              { AttributeName: 'seq', KeyType: 'RANGE' },
            ],
            Projection: { ProjectionType: 'ALL' },
          },
        ],
        BillingMode: 'PAY_PER_REQUEST',
      }),
    );
    await this.client.send(
      new UpdateTimeToLiveCommand({
        TableName: this.tableName,
        TimeToLiveSpecification: { AttributeName: 'expiresAt', Enabled: true },
      }),
    );
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof StoreUnavailableError) throw err;
      throw new StoreUnavailableError(operation, err);
    }
  }

  private async nextSeq(): Promise<number> {
    const res = await this.client.send(
      new UpdateItemCommand({
        TableName: this.tableName,
        Key: { [PK]: { S: SEQ_KEY } },
        UpdateExpression: 'ADD #v :one',
        ExpressionAttributeNames: { '#v': 'value' },
        ExpressionAttributeValues: { ':one': { N: '1' } },
        ReturnValues: 'UPDATED_NEW',
      }),
    );
    const value = res.Attributes?.value?.N;
    if (!value) throw new Error('sequence counter returned no value');
    return Number(value);
  }

  put(task: Task): Promise<PutResult> {
    return this.call('put', async () => {
      const seq = await this.nextSeq();
      try {
        await this.client.send(
          new PutItemCommand({
            TableName: this.tableName,
            Item: toItem(task, seq, this.retentionHours),
            ConditionExpression:
              'attribute_not_exists(#id) OR #u < :u OR (#u = :u AND #owner < :o)',
            ExpressionAttributeNames: { '#id': PK, '#u': 'updatedAt', '#owner': 'owner' },
            ExpressionAttributeValues: { ':u': { S: task.updatedAt }, ':o': { S: task.owner } },
          }),
        );
        return { applied: true, seq };
      } catch (err) {
        if (!isConditionFailure(err)) throw err;
        const stored = await this.get(task.id);
        return { applied: false, seq: stored?.seq ?? 0 };
      }
    });
  }

  get(id: string): Promise<StoredTask | undefined> {
    return this.call('get', async () => {
      const res = await this.client.send(
        new GetItemCommand({
          TableName: this.tableName,
          Key: { [PK]: { S: id } },
          ConsistentRead: true,
        }),
      );
      return res.Item && res.Item.kind?.S === 'task' ? fromItem(res.Item) : undefined;
    });
  }

  changesSince(owner: string, cursor: number, limit: number): Promise<StoredTask[]> {
    return this.call('changesSince', async () => {
      const res = await this.client.send(
        new QueryCommand({
          TableName: this.tableName,
          IndexName: OWNER_INDEX,
          KeyConditionExpression: '#owner = :o AND #seq > :c',
          ExpressionAttributeNames: { '#owner': 'owner', '#seq': 'seq' },
          ExpressionAttributeValues: { ':o': { S: owner }, ':c': { N: String(cursor) } },
          ScanIndexForward: true,
          Limit: limit,
        }),
      );
      return (res.Items ?? []).map(fromItem);
    });
  }

  private async scan(input: Omit<ScanCommandInput, 'TableName' | 'ExclusiveStartKey'>): Promise<Item[]> {
    const items: Item[] = [];
    let startKey: Item | undefined;
    do {
      const res = await this.client.send(
        new ScanCommand({ ...input, TableName: this.tableName, ExclusiveStartKey: startKey }),
      );
      items.push(...(res.Items ?? []));
      startKey = res.LastEvaluatedKey;
    } while (startKey);
    return items;
  }

  list(filter: TaskListFilter = {}): Promise<StoredTask[]> {
    return this.call('list', async () => {
      const filters = ['#kind = :task'];
      const names: Record<string, string> = { '#kind': 'kind' };
      const values: Item = { ':task': { S: 'task' } };
      if (filter.owner) {
        filters.push('#owner = :o');
        names['#owner'] = 'owner';
        values[':o'] = { S: filter.owner };
      }
      if (filter.status) {
        filters.push('#status = :s');
        names['#status'] = 'status';
        values[':s'] = { S: filter.status };
      }
      const items = await this.scan({
        FilterExpression: filters.join(' AND '),
        ExpressionAttributeNames: names,
        ExpressionAttributeValues: values,
      });
      return items.map(fromItem).sort((a, b) => a.createdAt.localeCompare(b.createdAt));
    });
  }

  purge(before: string): Promise<number> {
    return this.call('purge', async () => {
      const tasks = await this.list();
      let count = 0;
      for (const task of tasks) {
        if (!isTerminal(task.status) || Date.parse(task.updatedAt) >= Date.parse(before)) continue;
        try {
          await this.client.send(
            new DeleteItemCommand({
              TableName: this.tableName,
              Key: { [PK]: { S: task.id } },
              // Skip records rewritten since the scan
              ConditionExpression: '#u = :u',
              ExpressionAttributeNames: { '#u': 'updatedAt' },
              ExpressionAttributeValues: { ':u': { S: task.updatedAt } },
            }),
          );
          count++;
        } catch (err) {
          if (!isConditionFailure(err)) throw err;
        }
      }
      return count;
    });
  }

  heartbeat(peer: PeerRecord): Promise<void> {
    return this.call('heartbeat', async () => {
      await this.client.send(new PutItemCommand({ TableName: this.tableName, Item: peerToItem(peer) }));
    });
  }

  listPeers(): Promise<PeerRecord[]> {
    return this.call('listPeers', async () => {
      const items = await this.scan({
        FilterExpression: '#kind = :peer',
        ExpressionAttributeNames: { '#kind': 'kind' },
        ExpressionAttributeValues: { ':peer': { S: 'peer' } },
      });
      return items.map(peerFromItem);
    });
  }
}
