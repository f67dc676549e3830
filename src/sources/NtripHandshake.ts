import { AuthenticationError, ConnectionError, NotFoundError } from '../utils/errors';
import type { NtripConnectionInfo } from './NtripConnectionInfo';

/**
 * NTRIP handshake: request formatting and caster response parsing
 */

export const DEFAULT_USER_AGENT = 'NTRIP gnss-toolkit/0.1';

// Status line and headers together must fit in this many bytes
const MAX_HEADER_BYTES = 8192;

export function buildHandshakeRequest(info: NtripConnectionInfo, userAgent: string = DEFAULT_USER_AGENT): string {
  if (info.protocolVersion === 'legacy') {
    return `SOURCE ${info.password ?? ''} ${info.mountpoint}\r\nSource-Agent: ${userAgent}\r\n\r\n`;
  }

  const lines = [
    `GET /${info.mountpoint} HTTP/1.1`,
    `Host: ${info.host}:${info.port}`,
    'Ntrip-Version: Ntrip/2.0',
    `User-Agent: ${userAgent}`,
    'Accept: */*',
  ];
  if (info.username !== undefined) {
    const credentials = Buffer.from(`${info.username}:${info.password ?? ''}`, 'utf8').toString('base64');
    lines.push(`Authorization: Basic ${credentials}`);
  }
  lines.push('Connection: close');

  return `${lines.join('\r\n')}\r\n\r\n`;
}

// =============================================================================
// Response
// =============================================================================

export type NtripResponseKind = 'icy' | 'http' | 'sourcetable' | 'ok' | 'error';

export interface NtripResponse {
  kind: NtripResponseKind;
  statusLine: string;
  /** Status code of ICY and HTTP replies; 200 for SOURCETABLE */
  statusCode?: number;
  /** Lower-cased header names */
  headers: Map<string, string>;
}

export interface ParsedResponse {
  response: NtripResponse;
  /** Bytes received after the header block: the start of the stream */
  body: Buffer;
}

/**
 * Accumulates caster bytes until the status line (and for HTTP, the header
 * block) is complete
 */
export class ResponseHeaderParser {
  private buffer: Buffer = Buffer.alloc(0);

  /**
   * Returns the parsed response once complete, null while more bytes are needed
   * @throws ConnectionError on a malformed or oversized header
   */
  feed(chunk: Uint8Array): ParsedResponse | null {
    this.buffer = Buffer.concat([this.buffer, chunk]);

    const lineEnd = this.buffer.indexOf('\n');
    if (lineEnd < 0) {
      this.checkSize();
      return null;
    }

    const statusLine = this.buffer.subarray(0, lineEnd).toString('latin1').replace(/\r$/, '');
    const kind = classifyStatusLine(statusLine);

    // Only HTTP replies have a header block; the others are decided by the status line
    if (kind !== 'http') {
      const statusCode = kind === 'sourcetable' ? 200 : parseStatusCode(statusLine);
      return {
        response: { kind, statusLine, statusCode, headers: new Map() },
        body: Buffer.from(this.buffer.subarray(lineEnd + 1)),
      };
    }

    const headerEnd = findBlankLine(this.buffer, lineEnd + 1);
    if (!headerEnd) {
      this.checkSize();
      return null;
    }

    const headers = new Map<string, string>();
    const headerText = this.buffer.subarray(lineEnd + 1, headerEnd.start).toString('latin1');
    for (const line of headerText.split(/\r?\n/)) {
      const colon = line.indexOf(':');
      if (colon > 0) {
        headers.set(line.slice(0, colon).trim().toLowerCase(), line.slice(colon + 1).trim());
      }
    }

    return {
      response: { kind, statusLine, statusCode: parseStatusCode(statusLine), headers },
      body: Buffer.from(this.buffer.subarray(headerEnd.end)),
    };
  }

  private checkSize(): void {
    if (this.buffer.length > MAX_HEADER_BYTES) {
      throw new ConnectionError(`Caster response header exceeds ${MAX_HEADER_BYTES} bytes`);
    }
  }
}

const STATUS_CODE = /^(?:ICY|HTTP\/\d\.\d) (\d{3})(?:\s|$)/;

function parseStatusCode(statusLine: string): number | undefined {
  const match = STATUS_CODE.exec(statusLine);
  return match ? Number(match[1]) : undefined;
}

function classifyStatusLine(statusLine: string): NtripResponseKind {
  if (/^ICY \d{3}(?:\s|$)/.test(statusLine)) {
    return 'icy';
  }
  if (/^HTTP\/\d\.\d \d{3}/.test(statusLine)) {
    return 'http';
  }
  if (statusLine.startsWith('SOURCETABLE')) {
    return 'sourcetable';
  }
  if (statusLine === 'OK' || statusLine.startsWith('OK ')) {
    return 'ok';
  }
  if (statusLine.startsWith('ERROR')) {
    return 'error';
  }
  throw new ConnectionError(`Malformed caster response ${JSON.stringify(statusLine.slice(0, 80))}`);
}

function findBlankLine(buffer: Buffer, from: number): { start: number; end: number } | undefined {
  // Header block directly followed by a blank line: no headers at all
  if (buffer.subarray(from, from + 2).toString('latin1') === '\r\n') {
    return { start: from, end: from + 2 };
  }
  if (buffer[from] === 0x0a) {
    return { start: from, end: from + 1 };
  }

  const crlf = buffer.indexOf('\r\n\r\n', from);
  const lf = buffer.indexOf('\n\n', from);
  if (crlf >= 0 && (lf < 0 || crlf <= lf)) {
    return { start: crlf, end: crlf + 4 };
  }
  if (lf >= 0) {
    return { start: lf, end: lf + 2 };
  }
  return undefined;
}

/**
 * Decides what a complete response means for the session
 *
 * @throws AuthenticationError for rejected credentials (fatal)
 * @throws NotFoundError when the mountpoint does not exist (fatal)
 * @throws ConnectionError for any other failure (retried)
 */
export function checkHandshakeResponse(response: NtripResponse, mountpoint: string): void {
  const { kind, statusLine, statusCode, headers } = response;

  switch (kind) {
    case 'ok':
      return;

    case 'sourcetable':
      throw new NotFoundError(mountpoint, statusLine);

    case 'error':
      if (/password|unauthori[sz]ed/i.test(statusLine)) {
        throw new AuthenticationError(statusLine);
      }
      throw new NotFoundError(mountpoint, statusLine);

    case 'icy':
    case 'http':
      if (statusCode === 401 || statusCode === 403) {
        throw new AuthenticationError(statusLine);
      }
      if (statusCode === 404) {
        throw new NotFoundError(mountpoint, statusLine);
      }
      if (statusCode !== 200) {
        throw new ConnectionError(`Caster answered ${JSON.stringify(statusLine)}`);
      }
      // NTRIP 2 casters answer an unknown mountpoint with their sourcetable
      if (headers.get('content-type')?.toLowerCase().startsWith('gnss/sourcetable')) {
        throw new NotFoundError(mountpoint, `${statusLine} (sourcetable)`);
      }
      return;
  }
}

export function isChunked(response: NtripResponse): boolean {
  return response.headers.get('transfer-encoding')?.toLowerCase().includes('chunked') ?? false;
}
