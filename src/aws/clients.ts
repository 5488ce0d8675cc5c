import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { fromIni, fromEnv } from '@aws-sdk/credential-providers';
import type { Config } from '../types/index.js';

type ClientOptions = Pick<Config, 'awsProfile' | 'awsRegion'>;

function resolveOptions(options: ClientOptions) {
  const region = options.awsRegion ?? process.env.AWS_REGION ?? 'us-east-1';

  // Prefer env vars if set, fall back to INI profile
  const hasEnvCreds = process.env.AWS_ACCESS_KEY_ID && process.env.AWS_SECRET_ACCESS_KEY;
  const credentials = hasEnvCreds ? fromEnv() : fromIni({ profile: options.awsProfile });

  return { region, credentials };
}

export function createDynamoDBClient(options: ClientOptions): DynamoDBClient {
  return new DynamoDBClient(resolveOptions(options));
}
