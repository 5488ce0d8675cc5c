import { homedir } from 'node:os';
import { join } from 'node:path';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { ConfigSchema, DEFAULT_CONFIG } from '../types/index.js';
import type { Config } from '../types/index.js';
import { ConfigurationError, errorMessage } from '../errors.js';

const TASKRELAY_DIR_NAME = '.taskrelay';
const CONFIG_FILE_NAME = 'config.json';

export function getTaskrelayDir(): string {
  return process.env.TASKRELAY_HOME ?? join(homedir(), TASKRELAY_DIR_NAME);
}

export async function ensureTaskrelayDir(): Promise<string> {
  const dir = getTaskrelayDir();
  await mkdir(dir, { recursive: true });
  return dir;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function applyEnv(config: Config): Config {
  return {
    ...config,
    machineId: process.env.TASKRELAY_MACHINE_ID ?? config.machineId,
    awsRegion: process.env.AWS_REGION ?? config.awsRegion,
    awsProfile: process.env.AWS_PROFILE ?? config.awsProfile,
  };
}

/** Effective config: the stored file with environment overrides applied. */
export async function loadConfig(): Promise<Config> {
  return applyEnv(await loadStoredConfig());
}

/**
 * The config as written in config.json, without environment overrides.
 * Read this before changing and saving the file.
 */
export async function loadStoredConfig(): Promise<Config> {
  const dir = await ensureTaskrelayDir();
  const configPath = join(dir, CONFIG_FILE_NAME);

  let raw: string;
  try {
    raw = await readFile(configPath, 'utf-8');
  } catch (err) {
    if (!isMissingFile(err)) throw err;
    // First run: write defaults so the file can be edited
    await saveConfig(DEFAULT_CONFIG);
    return DEFAULT_CONFIG;
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new ConfigurationError(`${configPath} is not valid JSON: ${errorMessage(err)}`);
  }

  const parsed = ConfigSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigurationError(`Invalid config in ${configPath}: ${issues.join('; ')}`, { issues });
  }
  return parsed.data;
}

export async function saveConfig(config: Config): Promise<void> {
  const dir = await ensureTaskrelayDir();
  const configPath = join(dir, CONFIG_FILE_NAME);
  await writeFile(configPath, JSON.stringify(config, null, 2) + '\n', 'utf-8');
}
