import { promises as fs } from 'node:fs';
import dotenv from 'dotenv';
import { z } from 'zod';
import type { Credentials } from './signer';

export const DEFAULT_BASE_URL = 'https://gateway.marvel.com/v1/public';
export const DEFAULT_TIMEOUT_MS = 10_000;
export const DEFAULT_ENV_FILE = '.env';

export interface ApiClientConfig {
  readonly credentials: Credentials;
  readonly baseUrl: string;
  readonly timeoutMs: number;
}

export class ConfigError extends Error {
  constructor(
    public readonly keys: readonly string[],
    message: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

const EnvSchema = z.object({
  COMIC_API_PUBLIC_KEY: z.string().trim().min(1),
  COMIC_API_PRIVATE_KEY: z.string().trim().min(1),
  COMIC_API_BASE_URL: z.string().trim().url().default(DEFAULT_BASE_URL),
  COMIC_API_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
});

type EnvRecord = Readonly<Record<string, string | undefined>>;

function dropBlank(record: EnvRecord): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(record)) {
    if (typeof value === 'string' && value.trim() !== '') {
      cleaned[key] = value;
    }
  }
  return cleaned;
}

/**
 * Validate a key-value source. Throws ConfigError naming every missing or
 * invalid key; never returns a partially filled config.
 */
export function parseApiConfig(record: EnvRecord): ApiClientConfig {
  const result = EnvSchema.safeParse(dropBlank(record));
  if (!result.success) {
    const keys = [...new Set(result.error.issues.map((issue) => String(issue.path[0])))];
    throw new ConfigError(keys, `Missing or invalid configuration: ${keys.join(', ')}`);
  }

  const env = result.data;
  return Object.freeze({
    credentials: Object.freeze({
      publicKey: env.COMIC_API_PUBLIC_KEY,
      privateKey: env.COMIC_API_PRIVATE_KEY,
    }),
    baseUrl: env.COMIC_API_BASE_URL.replace(/\/+$/, ''),
    timeoutMs: env.COMIC_API_TIMEOUT_MS,
  });
}

export async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

export interface LoadApiConfigOptions {
  /** `.env`-format file; optional when the environment already has the keys. */
  envFile?: string;
  env?: EnvRecord;
}

/** Environment values override the file, as dotenv does. */
export async function loadApiConfig(options: LoadApiConfigOptions = {}): Promise<ApiClientConfig> {
  const envFile = options.envFile ?? DEFAULT_ENV_FILE;
  const env = options.env ?? process.env;

  const fileValues = (await pathExists(envFile))
    ? dotenv.parse(await fs.readFile(envFile, 'utf8'))
    : {};

  return parseApiConfig({ ...fileValues, ...dropBlank(env) });
}
