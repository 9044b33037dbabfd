import { z } from 'zod';
import {
  DEFAULT_APP_NAME,
  DEFAULT_APP_VERSION,
  DEFAULT_HOST,
  DEFAULT_PORT,
  DEFAULT_SHUTDOWN_GRACE_MS,
  DEFAULT_WS_PATH,
  ENVIRONMENTS,
  LOG_FORMATS,
  LOG_LEVELS,
} from './constants';
import { ConfigurationError } from '../utils/errors';

const PORT_RANGE_MESSAGE = 'must be an integer between 1 and 65535';
const GRACE_RANGE_MESSAGE = 'must be an integer between 0 and 60000';

const nonBlank = (value: string) => value.trim() !== '';

// Decimal digits only; Number() would also take hex, binary and exponents
const integerString = (message: string) => z.string().regex(/^\d+$/, message);

const EnvironmentSchema = z.object({
  // Application
  APP_NAME: z.string().refine(nonBlank, 'must not be empty').default(DEFAULT_APP_NAME),
  APP_VERSION: z.string().refine(nonBlank, 'must not be empty').default(DEFAULT_APP_VERSION),

  // Server
  HOST: z.string().refine(nonBlank, 'must not be empty').default(DEFAULT_HOST),
  PORT: integerString(PORT_RANGE_MESSAGE)
    .pipe(z.coerce.number().int(PORT_RANGE_MESSAGE).min(1, PORT_RANGE_MESSAGE).max(65535, PORT_RANGE_MESSAGE))
    .default(String(DEFAULT_PORT)),
  WS_PATH: z.string().startsWith('/', 'must start with "/"').default(DEFAULT_WS_PATH),
  SHUTDOWN_GRACE_MS: integerString(GRACE_RANGE_MESSAGE)
    .pipe(z.coerce.number().int(GRACE_RANGE_MESSAGE).min(0, GRACE_RANGE_MESSAGE).max(60000, GRACE_RANGE_MESSAGE))
    .default(String(DEFAULT_SHUTDOWN_GRACE_MS)),

  // Logging
  LOG_LEVEL: z.enum(LOG_LEVELS).default('INFO'),
  LOG_FORMAT: z.enum(LOG_FORMATS).default('text'),

  // Deployment
  ENVIRONMENT: z.enum(ENVIRONMENTS).default('development'),
});

type EnvironmentVariable = keyof typeof EnvironmentSchema.shape;

const KNOWN_VARIABLES: ReadonlySet<string> = new Set(Object.keys(EnvironmentSchema.shape));

export type LogLevel = (typeof LOG_LEVELS)[number];
export type LogFormat = (typeof LOG_FORMATS)[number];
export type DeploymentEnvironment = (typeof ENVIRONMENTS)[number];

export interface Settings {
  readonly appName: string;
  readonly appVersion: string;
  readonly host: string;
  readonly port: number;
  readonly wsPath: string;
  readonly shutdownGraceMs: number;
  readonly logLevel: LogLevel;
  readonly logFormat: LogFormat;
  readonly environment: DeploymentEnvironment;
}

/**
 * Pick the variables this service reads out of an environment object.
 *
 * Names match case-insensitively and an exact upper-case name wins over other
 * spellings. Empty values count as unset so they fall back to their defaults.
 */
export function collectVariables(
  env: NodeJS.ProcessEnv
): Partial<Record<EnvironmentVariable, string>> {
  const collected: Record<string, string> = {};

  for (const [key, value] of Object.entries(env)) {
    const name = key.toUpperCase();
    if (!KNOWN_VARIABLES.has(name) || value === undefined || value.trim() === '') {
      continue;
    }
    if (key !== name && collected[name] !== undefined) {
      continue;
    }
    collected[name] = value;
  }

  return collected;
}

/**
 * Build the process settings from environment variables.
 * Throws ConfigurationError naming every invalid variable.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const result = EnvironmentSchema.safeParse(collectVariables(env));

  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map(issue => ({
        variable: issue.path.join('.'),
        message: issue.message,
      }))
    );
  }

  const parsed = result.data;
  return Object.freeze({
    appName: parsed.APP_NAME,
    appVersion: parsed.APP_VERSION,
    host: parsed.HOST,
    port: parsed.PORT,
    wsPath: parsed.WS_PATH,
    shutdownGraceMs: parsed.SHUTDOWN_GRACE_MS,
    logLevel: parsed.LOG_LEVEL,
    logFormat: parsed.LOG_FORMAT,
    environment: parsed.ENVIRONMENT,
  });
}
