import { ConfigError } from '../utils/errors';

/**
 * Caster address and credentials, plus the per-connection session value
 */

export const DEFAULT_NTRIP_PORT = 2101;

/** `legacy` sends a single SOURCE line, `http` an NTRIP 2.0 style GET */
export type NtripProtocolVersion = 'legacy' | 'http';

export interface NtripConnectionInfo {
  host: string;
  port: number;
  mountpoint: string;
  username?: string;
  password?: string;
  protocolVersion: NtripProtocolVersion;
}

/**
 * Parses `ntrip://[user[:password]@]host[:port]/mountpoint`.
 * `ntrip://` and `ntrip2://` select the NTRIP 2.0 GET, `ntrip1://` the legacy
 * handshake.
 */
export function parseNtripUri(uri: string): NtripConnectionInfo {
  let url: URL;
  try {
    url = new URL(uri);
  } catch (error) {
    throw new ConfigError(`Invalid NTRIP URI ${JSON.stringify(redactUri(uri))}: ${String(error)}`);
  }

  let protocolVersion: NtripProtocolVersion;
  if (url.protocol === 'ntrip:' || url.protocol === 'ntrip2:') {
    protocolVersion = 'http';
  } else if (url.protocol === 'ntrip1:') {
    protocolVersion = 'legacy';
  } else {
    throw new ConfigError(`Unsupported NTRIP URI scheme ${JSON.stringify(url.protocol)}`);
  }

  if (!url.hostname) {
    throw new ConfigError('NTRIP URI has no host');
  }

  const mountpoint = decodeURIComponent(url.pathname.replace(/^\/+/, ''));
  if (!mountpoint) {
    throw new ConfigError('NTRIP URI has no mountpoint');
  }

  return {
    host: url.hostname,
    port: url.port ? Number(url.port) : DEFAULT_NTRIP_PORT,
    mountpoint,
    username: url.username ? decodeURIComponent(url.username) : undefined,
    password: url.password ? decodeURIComponent(url.password) : undefined,
    protocolVersion,
  };
}

/** URI with the password masked, for logs and error messages */
export function redactUri(uri: string): string {
  return uri.replace(/(\/\/[^:/@]*:)[^@/]*@/, '$1***@');
}

// =============================================================================
// Session
// =============================================================================

export type NtripConnectionState =
  | 'disconnected'
  | 'connecting'
  | 'awaiting-response'
  | 'streaming'
  | 'reconnecting';

/**
 * Snapshot of one connection attempt. Replaced, never mutated; a reconnect
 * starts a new session id.
 */
export interface NtripSession {
  readonly id: number;
  readonly connection: Readonly<NtripConnectionInfo>;
  readonly state: NtripConnectionState;
  /** Epoch milliseconds of the last byte read, 0 before the first one */
  readonly lastByteReceivedAt: number;
  /** Consecutive failed attempts since the last time streaming was reached */
  readonly reconnectAttempts: number;
}

export function updateSession(session: NtripSession, changes: Partial<Omit<NtripSession, 'id' | 'connection'>>): NtripSession {
  return Object.freeze({ ...session, ...changes });
}
