import { existsSync, readFileSync } from 'node:fs';
import { parse } from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../error/configurationError.js';
import { type SafeWrap, safeWrap } from '../utils/wrap.js';

/** Production API root. */
export const DEFAULT_BASE_URL = 'https://bonus.ly/api/v1';
/** Request timeout in milliseconds. */
export const DEFAULT_TIMEOUT = 5_000;
/** Longest delay a timer accepts; longer ones fire at once. */
export const MAX_TIMEOUT = 2_147_483_647;
/** Items requested per page by the resource helpers. */
export const DEFAULT_PAGE_SIZE = 20;
/** Settings file read when no other is named. */
export const DEFAULT_ENV_FILE = '.env';

/** Environment variable read for each setting. */
export const ENV_VARS = {
  token: 'BONUSLY_TOKEN',
  baseUrl: 'BONUSLY_BASE_URL',
  timeout: 'BONUSLY_TIMEOUT_MS',
  compression: 'BONUSLY_COMPRESSION',
} as const satisfies Record<keyof ClientConfig, string>;

/**
 * Connection settings of a client. Frozen once loaded.
 */
export interface ClientConfig {
  /** API root, e.g. `https://bonus.ly/api/v1`. */
  baseUrl: string;
  /** Access token. */
  token: string;
  /** Request timeout in milliseconds. */
  timeout: number;
  /** Whether compressed responses are requested. */
  compression: boolean;
}

/** Where {@link loadConfig} looks for settings. */
export interface LoadConfigOptions {
  /** Variables to read, defaults to `process.env`. */
  env?: Record<string, string | undefined>;
  /**
   * Dotenv settings file consulted for variables missing from `env`, `false` to skip.
   * A missing file is not an error.
   * @default '.env'
   */
  envFile?: string | false;
  /** Values taking precedence over every other source. */
  overrides?: Partial<ClientConfig>;
}

const TOKEN_PATTERN = /^[\x21-\x7e]+$/;

/**
 * Whether the token can be sent in an `Authorization` header as-is.
 */
export function isHeaderSafeToken(token: string): boolean {
  return TOKEN_PATTERN.test(token);
}

/**
 * Whether a timeout can be armed as given, `false` meaning no timeout.
 */
export function isValidTimeout(timeout: number | false): boolean {
  return timeout === false || (Number.isInteger(timeout) && timeout >= 1 && timeout <= MAX_TIMEOUT);
}

const configSchema = z.object({
  token: z
    .string({ required_error: 'is required' })
    .min(1, 'is required')
    .regex(TOKEN_PATTERN, 'must be printable ASCII without whitespace'),
  baseUrl: z.string().url('must be an absolute URL'),
  timeout: z.coerce
    .number()
    .int()
    .positive('must be a positive number of milliseconds')
    .max(MAX_TIMEOUT, `must be at most ${MAX_TIMEOUT} milliseconds`),
  compression: z.union([
    z.boolean(),
    z.enum(['true', 'false', '1', '0']).transform((value) => value === 'true' || value === '1'),
  ]),
});

function readEnvFile(path: string): SafeWrap<ConfigurationError, Record<string, string>> {
  if (!existsSync(path)) {
    return [null, {}];
  }

  const [err, vars] = safeWrap(() => parse(readFileSync(path)));
  if (err) {
    return [new ConfigurationError(`error reading settings file ${path}`, null, { cause: err }), null];
  }

  return [null, vars];
}

/**
 * Loads client settings once, at construction time.
 *
 * Precedence: `overrides`, then the environment, then the settings file, then defaults.
 * Only the token is required. Invalid values yield a {@link ConfigurationError} naming the
 * variable at fault; the token's value never appears in it.
 *
 * @example
 * const [err, config] = loadConfig({ envFile: 'test.env' });
 */
export function loadConfig({
  env = process.env,
  envFile = DEFAULT_ENV_FILE,
  overrides = {},
}: LoadConfigOptions = {}): SafeWrap<ConfigurationError, Readonly<ClientConfig>> {
  let fileVars: Record<string, string> = {};
  if (envFile) {
    const [errFile, vars] = readEnvFile(envFile);
    if (errFile) {
      return [errFile, null];
    }

    fileVars = vars;
  }

  const lookup = (name: string): string | undefined => env[name] ?? fileVars[name];
  const result = configSchema.safeParse({
    token: overrides.token ?? lookup(ENV_VARS.token),
    baseUrl: overrides.baseUrl ?? lookup(ENV_VARS.baseUrl) ?? DEFAULT_BASE_URL,
    timeout: overrides.timeout ?? lookup(ENV_VARS.timeout) ?? DEFAULT_TIMEOUT,
    compression: overrides.compression ?? lookup(ENV_VARS.compression) ?? true,
  });

  if (!result.success) {
    const [issue] = result.error.issues;
    const key = configKey(issue?.path[0]);
    const setting = key ? ENV_VARS[key] : null;
    const reason = issue?.message ?? 'unknown issue';
    return [new ConfigurationError(`error invalid configuration ${setting ?? 'value'}: ${reason}`, setting), null];
  }

  return [null, Object.freeze(result.data)];
}

function configKey(segment: unknown): keyof ClientConfig | null {
  switch (segment) {
    case 'token':
    case 'baseUrl':
    case 'timeout':
    case 'compression':
      return segment;
    default:
      return null;
  }
}
