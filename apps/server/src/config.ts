/**
 * @buildmeta/server-app - Configuration
 *
 * `config.json` (snake_case keys, every key optional) with environment
 * overrides on top.
 */

import { readFile } from 'node:fs/promises';
import { METADATA_LOG_LEVELS } from '@buildmeta/core';
import { z } from 'zod';

export const ServerConfigSchema = z.object({
  request_root: z.string().default('/'),
  user_auth: z.string().default(''),
  ci_auth: z.string().default(''),
  database_path: z.string().min(1).default('metadata.db'),
  host: z.string().min(1).default('0.0.0.0'),
  port: z.coerce.number().int().min(0).max(65535).default(3000),
  log_level: z.enum(METADATA_LOG_LEVELS).default('info'),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;

const ENV_OVERRIDES = {
  request_root: 'BUILDMETA_REQUEST_ROOT',
  user_auth: 'BUILDMETA_USER_AUTH',
  ci_auth: 'BUILDMETA_CI_AUTH',
  database_path: 'BUILDMETA_DATABASE',
  host: 'HOST',
  port: 'PORT',
  log_level: 'LOG_LEVEL',
} as const satisfies Record<keyof ServerConfig, string>;

export const DEFAULT_CONFIG_PATH = './config.json';

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

function isMissingFile(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}

async function readConfigFile(path: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    if (isMissingFile(error)) return {};
    throw new ConfigError(`Cannot read config file ${path}`, { cause: error });
  }
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Config file ${path} is not valid JSON`, {
      cause: error,
    });
  }
}

/**
 * Resolve the effective configuration. A missing file yields defaults; an
 * empty environment variable counts as set.
 */
export async function loadServerConfig(
  options: { path?: string; env?: NodeJS.ProcessEnv } = {}
): Promise<ServerConfig> {
  const env = options.env ?? process.env;
  const path = options.path ?? env.BUILDMETA_CONFIG ?? DEFAULT_CONFIG_PATH;
  const fromFile = await readConfigFile(path);
  if (typeof fromFile !== 'object' || fromFile === null || Array.isArray(fromFile)) {
    throw new ConfigError(`Config file ${path} must contain a JSON object`);
  }

  const merged: Record<string, unknown> = { ...fromFile };
  for (const [key, envKey] of Object.entries(ENV_OVERRIDES)) {
    const value = env[envKey];
    if (value !== undefined) merged[key] = value;
  }

  const parsed = ServerConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${detail}`);
  }
  return parsed.data;
}
