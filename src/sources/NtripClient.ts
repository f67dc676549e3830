import { CorrectionSource } from '../services/CorrectionSource';
import { RtcmDecoder } from '../services/RtcmDecoder';
import type { RtcmDecoderStats } from '../services/RtcmDecoder';
import { formatGgaSentence } from '../services/NmeaEncoder';
import type { GeodeticCoordinate } from '../types/Coordinates';
import { sleep, waitWithTimeout } from '../utils/async';
import { CancelledError, ConnectionError, isFatalNtripError, toError } from '../utils/errors';
import { ChunkedDecoder } from './ChunkedDecoder';
import type { NtripConnectionInfo, NtripConnectionState, NtripSession } from './NtripConnectionInfo';
import { updateSession } from './NtripConnectionInfo';
import {
  buildHandshakeRequest,
  checkHandshakeResponse,
  DEFAULT_USER_AGENT,
  isChunked,
  ResponseHeaderParser,
} from './NtripHandshake';
import type { ParsedResponse } from './NtripHandshake';
import { connectTcp } from './transport';
import type { Transport, TransportFactory } from './transport';

export interface NtripClientOptions {
  connection: NtripConnectionInfo;
  name?: string;
  enabled?: boolean;
  /** No bytes for this long ends the session (default 30 s) */
  idleTimeoutMs?: number;
  connectTimeoutMs?: number;
  /** Time allowed for the caster's status line and headers */
  handshakeTimeoutMs?: number;
  backoffBaseMs?: number;
  backoffCapMs?: number;
  /** Unbounded when undefined */
  maxReconnectAttempts?: number;
  /** Reported to the caster as GGA after connecting and every `ggaIntervalMs` */
  position?: GeodeticCoordinate;
  ggaIntervalMs?: number;
  userAgent?: string;
  maxPayloadLength?: number;
  transportFactory?: TransportFactory;
}

export const NTRIP_DEFAULTS = {
  idleTimeoutMs: 30_000,
  connectTimeoutMs: 10_000,
  handshakeTimeoutMs: 10_000,
  backoffBaseMs: 1_000,
  backoffCapMs: 60_000,
  ggaIntervalMs: 60_000,
} as const;

type NtripTimings = { -readonly [K in keyof typeof NTRIP_DEFAULTS]: number };

/**
 * Delay before reconnect attempt `attempt` (1-based)
 */
export function backoffDelay(attempt: number, baseMs: number, capMs: number): number {
  return Math.min(capMs, baseMs * 2 ** (attempt - 1));
}

/**
 * Streams RTCM3 corrections from an NTRIP caster
 *
 * One run loop owns the transport, the decoder and the session value. The loop
 * only suspends on transport reads, on the backoff timer and while the message
 * callback runs, and every one of those waits observes cancellation.
 *
 * Events (besides those of CorrectionSource):
 * - `state-changed` (state, session)
 */
export class NtripClient extends CorrectionSource {
  private readonly options: NtripClientOptions;
  private readonly timings: NtripTimings;
  private readonly transportFactory: TransportFactory;
  private readonly decoder: RtcmDecoder;
  private session: NtripSession;
  private nextSessionId = 0;
  private active = false;

  constructor(options: NtripClientOptions) {
    super({
      name: options.name ?? `NTRIP ${options.connection.host}/${options.connection.mountpoint}`,
      enabled: options.enabled ?? true,
    });
    this.options = options;
    this.timings = {
      idleTimeoutMs: options.idleTimeoutMs ?? NTRIP_DEFAULTS.idleTimeoutMs,
      connectTimeoutMs: options.connectTimeoutMs ?? NTRIP_DEFAULTS.connectTimeoutMs,
      handshakeTimeoutMs: options.handshakeTimeoutMs ?? NTRIP_DEFAULTS.handshakeTimeoutMs,
      backoffBaseMs: options.backoffBaseMs ?? NTRIP_DEFAULTS.backoffBaseMs,
      backoffCapMs: options.backoffCapMs ?? NTRIP_DEFAULTS.backoffCapMs,
      ggaIntervalMs: options.ggaIntervalMs ?? NTRIP_DEFAULTS.ggaIntervalMs,
    };
    this.transportFactory = options.transportFactory ?? connectTcp;
    this.decoder = new RtcmDecoder({ maxPayloadLength: options.maxPayloadLength });
    this.session = this.newSession(0);
  }

  getSession(): NtripSession {
    return this.session;
  }

  getState(): NtripConnectionState {
    return this.session.state;
  }

  getDecoderStats(): RtcmDecoderStats {
    return this.decoder.getStats();
  }

  async run(signal?: AbortSignal): Promise<void> {
    if (this.active) {
      throw new Error(`${this.getName()} is already running`);
    }
    this.active = true;

    const { backoffBaseMs, backoffCapMs } = this.timings;
    const { maxReconnectAttempts } = this.options;

    try {
      for (;;) {
        let failure: Error;
        try {
          await this.connectAndStream(signal);
          failure = new ConnectionError('Caster closed the stream');
        } catch (error) {
          if (error instanceof CancelledError || signal?.aborted) {
            return;
          }
          if (isFatalNtripError(error)) {
            this.logger.error({ error }, 'Caster rejected the connection');
            throw error;
          }
          failure = toError(error);
        }

        this.recordFailure(failure);
        const attempt = this.session.reconnectAttempts + 1;
        if (maxReconnectAttempts !== undefined && attempt > maxReconnectAttempts) {
          this.logger.error({ error: failure, attempts: attempt - 1 }, 'Giving up after reconnect attempts');
          throw failure;
        }

        const delayMs = backoffDelay(attempt, backoffBaseMs, backoffCapMs);
        this.setState('reconnecting', { reconnectAttempts: attempt });
        this.recordReconnect();
        this.logger.warn({ error: failure.message, attempt, delayMs }, 'NTRIP connection lost, reconnecting');

        try {
          await sleep(delayMs, signal);
        } catch (error) {
          if (error instanceof CancelledError) {
            return;
          }
          throw error;
        }
      }
    } finally {
      this.decoder.reset();
      this.setState('disconnected');
      this.active = false;
    }
  }

  // ===========================================================================
  // Session lifecycle
  // ===========================================================================

  private async connectAndStream(signal?: AbortSignal): Promise<void> {
    const { connection } = this.options;
    const timeouts = this.timings;

    this.session = this.newSession(this.session.reconnectAttempts);
    this.setState('connecting');
    this.logger.info(
      { sessionId: this.session.id, host: connection.host, port: connection.port, mountpoint: connection.mountpoint },
      'Connecting to NTRIP caster',
    );

    const transport = await this.transportFactory({
      host: connection.host,
      port: connection.port,
      timeoutMs: timeouts.connectTimeoutMs,
      signal,
    });

    try {
      await transport.write(buildHandshakeRequest(connection, this.options.userAgent ?? DEFAULT_USER_AGENT));
      this.setState('awaiting-response');

      const { response, body } = await waitWithTimeout(this.readResponse(transport), {
        timeoutMs: timeouts.handshakeTimeoutMs,
        signal,
        label: 'caster response',
      });
      checkHandshakeResponse(response, connection.mountpoint);

      const dechunker = isChunked(response) ? new ChunkedDecoder() : undefined;
      this.setState('streaming', { reconnectAttempts: 0 });
      this.logger.info({ sessionId: this.session.id, status: response.statusLine }, 'Streaming corrections');

      let lastGgaAt = await this.sendPosition(transport, 0);
      if (body.length > 0) {
        await this.consume(body, dechunker, signal);
      }

      for (;;) {
        const chunk = await waitWithTimeout(transport.read(), {
          timeoutMs: timeouts.idleTimeoutMs,
          signal,
          label: 'caster data',
        });
        if (chunk === null) {
          return;
        }
        await this.consume(chunk, dechunker, signal);

        if (Date.now() - lastGgaAt >= timeouts.ggaIntervalMs) {
          lastGgaAt = await this.sendPosition(transport, lastGgaAt);
        }
      }
    } finally {
      await transport.close();
      this.decoder.reset();
    }
  }

  private async readResponse(transport: Transport): Promise<ParsedResponse> {
    const parser = new ResponseHeaderParser();
    for (;;) {
      const chunk = await transport.read();
      if (chunk === null) {
        throw new ConnectionError('Caster closed the connection during the handshake');
      }
      const parsed = parser.feed(chunk);
      if (parsed) {
        return parsed;
      }
    }
  }

  private async consume(chunk: Buffer, dechunker: ChunkedDecoder | undefined, signal?: AbortSignal): Promise<void> {
    this.session = updateSession(this.session, { lastByteReceivedAt: Date.now() });
    this.recordBytes(chunk.length);

    const data = dechunker ? dechunker.feed(chunk) : chunk;
    await this.deliverOutcomes(this.decoder.feed(data), signal);
  }

  /** Returns the time of the GGA sent, or `previous` when there is no position */
  private async sendPosition(transport: Transport, previous: number): Promise<number> {
    const { position } = this.options;
    if (!position) {
      return previous;
    }
    await transport.write(formatGgaSentence(position));
    this.logger.debug({ position: position.format() }, 'Sent GGA to caster');
    return Date.now();
  }

  private newSession(reconnectAttempts: number): NtripSession {
    const session: NtripSession = {
      id: this.nextSessionId++,
      connection: Object.freeze({ ...this.options.connection }),
      state: 'disconnected',
      lastByteReceivedAt: 0,
      reconnectAttempts,
    };
    return Object.freeze(session);
  }

  private setState(state: NtripConnectionState, changes: { reconnectAttempts?: number } = {}): void {
    const previous = this.session.state;
    this.session = updateSession(this.session, { state, ...changes });
    if (previous !== state) {
      this.logger.debug({ sessionId: this.session.id, from: previous, to: state }, 'NTRIP state changed');
      this.emit('state-changed', state, this.session);
    }
  }
}
