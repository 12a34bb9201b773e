import fs from 'node:fs';
import path from 'node:path';

import {
  DEFAULT_BUSY_TIMEOUT_MS,
  MAX_BUSY_TIMEOUT_MS,
  NOTES_DB_FILENAME,
} from '@notekeep/notes-store';
import { LOG_LEVELS, type LogLevel } from '@notekeep/shared';
import yaml from 'yaml';
import { z } from 'zod';

export interface NotekeepConfig {
  /**
   * Directory holding the notes database and the scratchpad document.
   */
  dataDir: string;
  dbPath: string;
  scratchpadPath: string;
  busyTimeoutMs: number;
  logLevel: LogLevel;
  /**
   * Config file the values were read from, when one was found.
   */
  configPath?: string;
}

export class ConfigError extends Error {}

const DEFAULT_CONFIG_FILENAMES = [
  'notekeep.config.json',
  'notekeep.config.yaml',
  'notekeep.config.yml',
];

const SCRATCHPAD_FILENAME = 'scratchpad.json';

const NonEmptyTrimmedStringSchema = z.string().trim().min(1);
const BusyTimeoutSchema = z
  .number()
  .int()
  .min(0)
  .max(MAX_BUSY_TIMEOUT_MS, `must be at most ${MAX_BUSY_TIMEOUT_MS}`);

const FileConfigSchema = z
  .object({
    dataDir: NonEmptyTrimmedStringSchema.optional(),
    busyTimeoutMs: BusyTimeoutSchema.optional(),
    logLevel: z.enum(LOG_LEVELS).optional(),
  })
  .strict();

const EnvConfigSchema = z.object({
  NOTEKEEP_DATA_DIR: NonEmptyTrimmedStringSchema.optional(),
  NOTEKEEP_BUSY_TIMEOUT_MS: z
    .string()
    .trim()
    .regex(/^\d+$/, 'must be a non-negative integer')
    .transform(Number)
    .pipe(BusyTimeoutSchema)
    .optional(),
  NOTEKEEP_LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(LOG_LEVELS))
    .optional(),
});

type FileConfig = z.infer<typeof FileConfigSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join('.') : 'config';
      return `${where}: ${issue.message}`;
    })
    .join('; ');
}

function readEnv(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name];
  return typeof value === 'string' && value.trim().length > 0 ? value : undefined;
}

function findConfigFile(cwd: string): string | undefined {
  for (const filename of DEFAULT_CONFIG_FILENAMES) {
    const fullPath = path.join(cwd, filename);
    if (fs.existsSync(fullPath)) {
      return fullPath;
    }
  }
  return undefined;
}

function readConfigFile(configPath: string): FileConfig {
  const content = fs.readFileSync(configPath, 'utf8');
  let raw: unknown;
  try {
    raw = configPath.endsWith('.json') ? JSON.parse(content) : yaml.parse(content);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Failed to parse ${configPath}: ${detail}`);
  }
  // An empty YAML file parses to null.
  const result = FileConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(`Invalid config in ${configPath}: ${formatIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Environment variables win over the config file, which wins over defaults.
 * Relative data directories resolve against `cwd`.
 */
export function loadConfig(
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env,
): NotekeepConfig {
  const envResult = EnvConfigSchema.safeParse({
    NOTEKEEP_DATA_DIR: readEnv(env, 'NOTEKEEP_DATA_DIR'),
    NOTEKEEP_BUSY_TIMEOUT_MS: readEnv(env, 'NOTEKEEP_BUSY_TIMEOUT_MS'),
    NOTEKEEP_LOG_LEVEL: readEnv(env, 'NOTEKEEP_LOG_LEVEL'),
  });
  if (!envResult.success) {
    throw new ConfigError(`Invalid environment: ${formatIssues(envResult.error)}`);
  }
  const fromEnv = envResult.data;

  const configPath = findConfigFile(cwd);
  const fromFile: FileConfig = configPath ? readConfigFile(configPath) : {};

  const dataDir = path.resolve(cwd, fromEnv.NOTEKEEP_DATA_DIR ?? fromFile.dataDir ?? 'data');

  return {
    dataDir,
    dbPath: path.join(dataDir, NOTES_DB_FILENAME),
    scratchpadPath: path.join(dataDir, SCRATCHPAD_FILENAME),
    busyTimeoutMs:
      fromEnv.NOTEKEEP_BUSY_TIMEOUT_MS ?? fromFile.busyTimeoutMs ?? DEFAULT_BUSY_TIMEOUT_MS,
    logLevel: fromEnv.NOTEKEEP_LOG_LEVEL ?? fromFile.logLevel ?? 'info',
    ...(configPath ? { configPath } : {}),
  };
}
