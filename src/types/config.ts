import { hostname } from 'node:os';
import { z } from 'zod';

export const StoreBackend = z.enum(['json', 'dynamo']);
export type StoreBackend = z.infer<typeof StoreBackend>;

export const LogLevel = z.enum(['debug', 'info', 'warn', 'error']);
export type LogLevel = z.infer<typeof LogLevel>;

export const ConfigSchema = z.object({
  machineId: z.string().min(1).default(hostname()),
  descriptor: z.string().optional(),
  maxAttempts: z.number().int().positive().default(3),
  retryBackoffBaseMs: z.number().int().nonnegative().default(1000),
  retryBackoffMaxMs: z.number().int().nonnegative().default(60_000),
  handlerConcurrencyLimit: z.number().int().positive().default(4),
  defaultHandlerTimeoutMs: z.number().int().positive().default(30_000),
  /** Restrict delegation to these peers; all healthy peers when absent */
  peers: z.array(z.string().min(1)).optional(),
  peerTtlSeconds: z.number().int().positive().default(120),
  heartbeatIntervalSeconds: z.number().int().positive().default(30),
  pollIntervalMs: z.number().int().positive().default(2000),
  retentionHours: z.number().positive().default(24),
  publishRetryBaseMs: z.number().int().positive().default(500),
  publishRetryMaxMs: z.number().int().positive().default(30_000),
  store: z
    .object({
      backend: StoreBackend.default('json'),
      tableName: z.string().min(1).default('taskrelay-tasks'),
      path: z.string().optional(),
    })
    .default({}),
  audit: StoreBackend.default('json'),
  awsProfile: z.string().default('default'),
  awsRegion: z.string().default('us-east-1'),
  logLevel: LogLevel.default('info'),
});

export type Config = z.infer<typeof ConfigSchema>;

export const DEFAULT_CONFIG: Config = ConfigSchema.parse({});
