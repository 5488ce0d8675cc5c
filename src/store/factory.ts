import { createDynamoDBClient } from '../aws/clients.js';
import { DynamoAuditStore, JsonAuditStore } from '../audit/index.js';
import type { AuditStore } from '../audit/index.js';
import type { Config } from '../types/index.js';
import { DynamoTaskStore } from './dynamo-store.js';
import { JsonTaskStore } from './json-store.js';
import type { TaskStore } from './store.js';

export function createTaskStore(config: Config): TaskStore {
  if (config.store.backend === 'dynamo') {
    return new DynamoTaskStore(createDynamoDBClient(config), {
      tableName: config.store.tableName,
      retentionHours: config.retentionHours,
    });
  }
  return new JsonTaskStore(config.store.path);
}

export function createAuditStore(config: Config): AuditStore {
  if (config.audit === 'dynamo') {
    return new DynamoAuditStore(createDynamoDBClient(config), `${config.store.tableName}-audit`);
  }
  return new JsonAuditStore();
}

/** Create the DynamoDB tables the config points at, if missing. */
export async function ensureTables(config: Config): Promise<string[]> {
  const ensured: string[] = [];
  if (config.store.backend === 'dynamo') {
    await new DynamoTaskStore(createDynamoDBClient(config), { tableName: config.store.tableName }).ensureTable();
    ensured.push(config.store.tableName);
  }
  if (config.audit === 'dynamo') {
    const table = `${config.store.tableName}-audit`;
    await new DynamoAuditStore(createDynamoDBClient(config), table).ensureTable();
    ensured.push(table);
  }
  return ensured;
}
