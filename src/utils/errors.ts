/**
 * Error taxonomy shared by all components.
 *
 * Parse and integrity errors are local to one sentence or frame and never end
 * a stream. Connection and timeout errors feed the NTRIP reconnect policy.
 * Authentication and not-found errors are fatal for a session.
 */

export type GnssErrorCode =
  | 'PARSE_ERROR'
  | 'FIELD_BOUNDS'
  | 'CHECKSUM_MISMATCH'
  | 'CRC_MISMATCH'
  | 'NO_CONVERGENCE'
  | 'CONNECTION_FAILED'
  | 'AUTHENTICATION_FAILED'
  | 'NOT_FOUND'
  | 'TIMEOUT'
  | 'CANCELLED'
  | 'INVALID_CONFIG';

export class GnssError extends Error {
  readonly code: GnssErrorCode;

  constructor(code: GnssErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Malformed NMEA sentence or RTCM payload */
export class ParseError extends GnssError {
  constructor(
    message: string,
    options?: { cause?: unknown; code?: Extract<GnssErrorCode, 'PARSE_ERROR' | 'FIELD_BOUNDS'> },
  ) {
    super(options?.code ?? 'PARSE_ERROR', message, options);
  }
}

/** A bit-level read ran past the end of an RTCM payload */
export class FieldBoundsError extends ParseError {
  readonly requestedBits: number;
  readonly availableBits: number;

  constructor(requestedBits: number, availableBits: number) {
    super(`Cannot read ${requestedBits} bits, only ${availableBits} left in payload`, {
      code: 'FIELD_BOUNDS',
    });
    this.requestedBits = requestedBits;
    this.availableBits = availableBits;
  }
}

export class ChecksumError extends GnssError {
  readonly expected: number;
  readonly actual: number;

  constructor(expected: number, actual: number) {
    super(
      'CHECKSUM_MISMATCH',
      `NMEA checksum mismatch: sentence says ${hex(expected, 2)}, computed ${hex(actual, 2)}`,
    );
    this.expected = expected;
    this.actual = actual;
  }
}

export class CrcError extends GnssError {
  readonly payloadLength: number;
  readonly expected: number;
  readonly actual: number;

  constructor(payloadLength: number, expected: number, actual: number) {
    super(
      'CRC_MISMATCH',
      `Dropped RTCM3 frame with ${payloadLength} byte payload: CRC ${hex(expected, 6)} != ${hex(actual, 6)}`,
    );
    this.payloadLength = payloadLength;
    this.expected = expected;
    this.actual = actual;
  }
}

export class ConvergenceError extends GnssError {
  readonly iterations: number;

  constructor(message: string, iterations: number) {
    super('NO_CONVERGENCE', message);
    this.iterations = iterations;
  }
}

export class ConnectionError extends GnssError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONNECTION_FAILED', message, options);
  }
}

export class AuthenticationError extends GnssError {
  readonly status: string;

  constructor(status: string) {
    super('AUTHENTICATION_FAILED', `Caster rejected credentials: ${status}`);
    this.status = status;
  }
}

export class NotFoundError extends GnssError {
  readonly mountpoint: string;

  constructor(mountpoint: string, status: string) {
    super('NOT_FOUND', `Mountpoint ${JSON.stringify(mountpoint)} not available: ${status}`);
    this.mountpoint = mountpoint;
  }
}

export class TimeoutError extends GnssError {
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number) {
    super('TIMEOUT', message);
    this.timeoutMs = timeoutMs;
  }
}

export class CancelledError extends GnssError {
  constructor(message = 'Operation cancelled') {
    super('CANCELLED', message);
  }
}

export class ConfigError extends GnssError {
  constructor(message: string) {
    super('INVALID_CONFIG', message);
  }
}

/**
 * Handshake rejections that no amount of retrying will fix
 */
export function isFatalNtripError(error: unknown): boolean {
  return error instanceof AuthenticationError || error instanceof NotFoundError;
}

/**
 * Normalizes anything thrown into an Error instance for logging and events
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function hex(value: number, digits: number): string {
  return `0x${value.toString(16).toUpperCase().padStart(digits, '0')}`;
}
