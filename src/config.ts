import { z } from 'zod';
import { GeodeticCoordinate } from './types/Coordinates';
import type { NtripClientOptions } from './sources/NtripClient';
import { DEFAULT_NTRIP_PORT, parseNtripUri, redactUri } from './sources/NtripConnectionInfo';
import type { NtripConnectionInfo } from './sources/NtripConnectionInfo';
import { ConfigError, toError } from './utils/errors';
import { LOG_LEVELS } from './utils/logger';
import type { LogLevel } from './utils/logger';

/**
 * Environment configuration
 *
 * Values come from process.env (after dotenv has loaded .env) and are
 * validated with zod. Durations are given in seconds.
 */

export interface NtripSettings {
  connection: NtripConnectionInfo;
  idleTimeoutSeconds: number;
  backoffBaseSeconds: number;
  backoffCapSeconds: number;
  /** Unbounded when undefined */
  maxReconnectAttempts?: number;
  position?: GeodeticCoordinate;
  ggaIntervalSeconds: number;
}

export interface ReplaySettings {
  filePath: string;
  loop: boolean;
  speed: number;
}

export interface AppConfig {
  ntrip?: NtripSettings;
  replay?: ReplaySettings;
  apiPort: number;
  logLevel: LogLevel;
}

// Unset and empty variables both fall back to the default
const blankAsUndefined = (value: unknown) => (typeof value === 'string' && value.trim() === '' ? undefined : value);

const optionalText = z.preprocess(blankAsUndefined, z.string().optional());
const seconds = (fallback: number) => z.preprocess(blankAsUndefined, z.coerce.number().positive().default(fallback));
const port = (fallback: number) =>
  z.preprocess(blankAsUndefined, z.coerce.number().int().min(0).max(65535).default(fallback));

const envSchema = z.object({
  NTRIP_URL: optionalText,
  NTRIP_HOST: optionalText,
  NTRIP_PORT: port(DEFAULT_NTRIP_PORT),
  NTRIP_MOUNTPOINT: optionalText,
  NTRIP_USERNAME: optionalText,
  NTRIP_PASSWORD: optionalText,
  NTRIP_PROTOCOL: z.preprocess(blankAsUndefined, z.enum(['http', 'legacy']).default('http')),
  NTRIP_IDLE_TIMEOUT: seconds(30),
  NTRIP_BACKOFF_BASE: seconds(1),
  NTRIP_BACKOFF_CAP: seconds(60),
  NTRIP_MAX_RECONNECTS: z.preprocess(blankAsUndefined, z.coerce.number().int().nonnegative().optional()),
  NTRIP_GGA_INTERVAL: seconds(60),
  ROVER_POSITION: optionalText,
  REPLAY_FILE: optionalText,
  REPLAY_LOOP: z.preprocess(blankAsUndefined, z.enum(['true', 'false']).default('false')),
  REPLAY_SPEED: z.preprocess(blankAsUndefined, z.coerce.number().nonnegative().default(1)),
  PORT: port(3000),
  LOG_LEVEL: z.preprocess(blankAsUndefined, z.enum(LOG_LEVELS).default('info')),
});

type Env = z.output<typeof envSchema>;

/**
 * Reads the configuration from an environment map
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`);
  }
  const values = result.data;

  const ntrip = readNtripSettings(values);
  const replay = values.REPLAY_FILE
    ? { filePath: values.REPLAY_FILE, loop: values.REPLAY_LOOP === 'true', speed: values.REPLAY_SPEED }
    : undefined;

  if (!ntrip && !replay) {
    throw new ConfigError(
      'No correction source configured: set NTRIP_URL, NTRIP_HOST and NTRIP_MOUNTPOINT, or REPLAY_FILE',
    );
  }

  return { ntrip, replay, apiPort: values.PORT, logLevel: values.LOG_LEVEL };
}

function readNtripSettings(values: Env): NtripSettings | undefined {
  const connection = readConnection(values);
  if (!connection) {
    return undefined;
  }

  if (values.NTRIP_BACKOFF_BASE > values.NTRIP_BACKOFF_CAP) {
    throw new ConfigError(
      `NTRIP_BACKOFF_BASE (${values.NTRIP_BACKOFF_BASE}) must not exceed NTRIP_BACKOFF_CAP (${values.NTRIP_BACKOFF_CAP})`,
    );
  }

  return {
    connection,
    idleTimeoutSeconds: values.NTRIP_IDLE_TIMEOUT,
    backoffBaseSeconds: values.NTRIP_BACKOFF_BASE,
    backoffCapSeconds: values.NTRIP_BACKOFF_CAP,
    maxReconnectAttempts: values.NTRIP_MAX_RECONNECTS,
    position: values.ROVER_POSITION === undefined ? undefined : parsePosition(values.ROVER_POSITION),
    ggaIntervalSeconds: values.NTRIP_GGA_INTERVAL,
  };
}

function readConnection(values: Env): NtripConnectionInfo | undefined {
  if (values.NTRIP_URL) {
    let info: NtripConnectionInfo;
    try {
      info = parseNtripUri(values.NTRIP_URL);
    } catch (error) {
      throw new ConfigError(`NTRIP_URL ${redactUri(values.NTRIP_URL)}: ${toError(error).message}`);
    }
    // Credentials in the URL win over the separate variables
    return {
      ...info,
      username: info.username ?? values.NTRIP_USERNAME,
      password: info.password ?? values.NTRIP_PASSWORD,
    };
  }

  if (!values.NTRIP_HOST) {
    if (values.NTRIP_MOUNTPOINT) {
      throw new ConfigError('NTRIP_MOUNTPOINT is set but NTRIP_HOST is missing');
    }
    return undefined;
  }
  if (!values.NTRIP_MOUNTPOINT) {
    throw new ConfigError('NTRIP_HOST is set but NTRIP_MOUNTPOINT is missing');
  }

  return {
    host: values.NTRIP_HOST,
    port: values.NTRIP_PORT,
    mountpoint: values.NTRIP_MOUNTPOINT,
    username: values.NTRIP_USERNAME,
    password: values.NTRIP_PASSWORD,
    protocolVersion: values.NTRIP_PROTOCOL,
  };
}

/**
 * `lat,lon[,alt]` in degrees and metres
 */
export function parsePosition(text: string): GeodeticCoordinate {
  const parts = text.split(',').map(part => part.trim());
  const numbers = parts.map(Number);
  if (parts.length < 2 || parts.length > 3 || parts.some(part => part === '') || numbers.some(Number.isNaN)) {
    throw new ConfigError(`ROVER_POSITION must be "lat,lon[,alt]", got ${JSON.stringify(text)}`);
  }

  const [lat, lon, alt = 0] = numbers;
  try {
    return new GeodeticCoordinate(lat, lon, alt);
  } catch (error) {
    throw new ConfigError(`ROVER_POSITION: ${toError(error).message}`);
  }
}

/**
 * Client options for the configured caster, durations in milliseconds
 */
export function toNtripClientOptions(settings: NtripSettings): NtripClientOptions {
  return {
    connection: settings.connection,
    idleTimeoutMs: settings.idleTimeoutSeconds * 1000,
    backoffBaseMs: settings.backoffBaseSeconds * 1000,
    backoffCapMs: settings.backoffCapSeconds * 1000,
    maxReconnectAttempts: settings.maxReconnectAttempts,
    position: settings.position,
    ggaIntervalMs: settings.ggaIntervalSeconds * 1000,
  };
}
