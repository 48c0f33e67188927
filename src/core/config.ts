import { existsSync, readFileSync } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';

export const DEFAULT_CONFIG_FILE = '.tasklink/config.json';

const booleanFlag = (fallback: 'true' | 'false') =>
  z
    .enum(['true', 'false'])
    .default(fallback)
    .transform((v) => v === 'true');

const EnvSchema = z.object({
  TASKLINK_API_URL: z.string().url(),
  TASKLINK_API_TOKEN: z.string().min(1),
  TASKLINK_PROJECT_ID: z.string().min(1),
  TASKLINK_AGENT_NAME: z.string().min(1).default('tasklink-agent'),
  TASKLINK_CONFIG_FILE: z.string().default(DEFAULT_CONFIG_FILE),
  TASKLINK_LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  // Backend gateway
  TASKLINK_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  TASKLINK_RETRY_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  TASKLINK_RETRY_BASE_MS: z.coerce.number().int().min(0).default(1_000),
  // Status synchronizer
  TASKLINK_SYNC_INTERVAL_MS: z.coerce.number().int().positive().default(30_000),
  TASKLINK_SYNC_MAX_INTERVAL_MS: z.coerce.number().int().positive().default(300_000),
  TASKLINK_STALE_AFTER_MS: z.coerce.number().int().positive().default(60_000),
  TASKLINK_SHUTDOWN_GRACE_MS: z.coerce.number().int().min(0).default(5_000),
  // Re-read the config file when the setup wizard rewrites the token
  TASKLINK_WATCH_CONFIG: booleanFlag('true'),
  // Optional status HTTP API for dashboards and the CLI
  TASKLINK_STATUS_ENABLED: booleanFlag('false'),
  TASKLINK_STATUS_PORT: z.coerce.number().int().positive().default(4178),
  TASKLINK_STATUS_BIND: z.string().default('127.0.0.1'),
  TASKLINK_STATUS_API_KEYS: z
    .string()
    .default('')
    .transform((v) => v.split(',').map((k) => k.trim()).filter((k) => k.length > 0)),
  TASKLINK_RATE_LIMIT_RPM: z.coerce.number().int().positive().default(300)
}).refine((cfg) => cfg.TASKLINK_SYNC_MAX_INTERVAL_MS >= cfg.TASKLINK_SYNC_INTERVAL_MS, {
  message: 'must be greater than or equal to TASKLINK_SYNC_INTERVAL_MS',
  path: ['TASKLINK_SYNC_MAX_INTERVAL_MS']
});

export type BridgeConfig = z.infer<typeof EnvSchema>;

/**
 * Shape of the JSON file written by the setup wizard. Only the keys the
 * bridge needs are read; anything else in the file is ignored.
 */
const ConfigFileSchema = z
  .object({
    api_url: z.string().optional(),
    api_token: z.string().optional(),
    project_id: z.string().optional(),
    agent_name: z.string().optional()
  })
  .passthrough();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export function resolveConfigPath(file: string, cwd: string = process.cwd()): string {
  return path.resolve(cwd, file);
}

/**
 * Read the wizard's config file. A missing file is an empty config; a file
 * that exists but cannot be parsed is an error.
 */
export function readConfigFile(filePath: string): ConfigFile {
  if (!existsSync(filePath)) return {};

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Invalid JSON in config file ${filePath}: ${reason}`);
  }

  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('\n');
    throw new ConfigurationError(`Invalid config file ${filePath}:\n${msg}`);
  }
  return parsed.data;
}

function fileToEnv(file: ConfigFile): Record<string, string> {
  const out: Record<string, string> = {};
  if (file.api_url) out.TASKLINK_API_URL = file.api_url;
  if (file.api_token) out.TASKLINK_API_TOKEN = file.api_token;
  if (file.project_id) out.TASKLINK_PROJECT_ID = file.project_id;
  if (file.agent_name) out.TASKLINK_AGENT_NAME = file.agent_name;
  return out;
}

/**
 * Build the bridge configuration. Values from the environment win over the
 * config file.
 */
export function loadConfig(env: NodeJS.ProcessEnv, cwd: string = process.cwd()): BridgeConfig {
  // If you use dotenv, load it before calling this function.
  const filePath = resolveConfigPath(env.TASKLINK_CONFIG_FILE ?? DEFAULT_CONFIG_FILE, cwd);
  const fromFile = fileToEnv(readConfigFile(filePath));

  const parsed = EnvSchema.safeParse({ ...fromFile, ...env });
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('\n');
    throw new ConfigurationError(`Invalid configuration:\n${msg}`);
  }
  return parsed.data;
}
