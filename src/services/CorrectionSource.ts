import { EventEmitter } from 'node:events';
import type { RtcmDecodeOutcome } from './RtcmDecoder';
import type { RtcmMessage } from '../types/Rtcm';
import type { GnssError } from '../utils/errors';
import { CancelledError, toError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import type { Logger } from '../utils/logger';

/**
 * Called for every decoded message, in stream order. The next message is not
 * delivered until a returned promise settles.
 */
export type CorrectionMessageCallback = (sourceName: string, message: RtcmMessage) => void | Promise<void>;

export interface CorrectionSourceConfig {
  name: string;
  enabled: boolean;
}

export interface CorrectionSourceStats {
  messagesReceived: number;
  bytesReceived: number;
  frameErrors: number;
  reconnects: number;
  isHealthy: boolean;
  lastMessageTime?: Date;
  lastError?: string;
}

/**
 * Base class for anything that produces RTCM3 messages
 *
 * Events:
 * - `message` (message: RtcmMessage)
 * - `frame-error` (error: GnssError)
 * - `terminated` (error?: Error) once a background run has ended
 */
export abstract class CorrectionSource extends EventEmitter {
  protected readonly config: CorrectionSourceConfig;
  protected stats: CorrectionSourceStats;
  protected readonly logger: Logger;
  private onMessage?: CorrectionMessageCallback;
  private controller?: AbortController;
  private running?: Promise<void>;

  constructor(config: CorrectionSourceConfig) {
    super();
    this.config = config;
    this.stats = {
      messagesReceived: 0,
      bytesReceived: 0,
      frameErrors: 0,
      reconnects: 0,
      isHealthy: true,
    };
    this.logger = createLogger({ component: 'CorrectionSource', source: config.name });
  }

  /**
   * Produces messages until the stream ends or `signal` aborts.
   * Resolves on a normal end or cancellation, rejects on a terminal error.
   */
  abstract run(signal?: AbortSignal): Promise<void>;

  getName(): string {
    return this.config.name;
  }

  isEnabled(): boolean {
    return this.config.enabled;
  }

  getStats(): CorrectionSourceStats {
    return { ...this.stats };
  }

  setMessageCallback(callback: CorrectionMessageCallback): void {
    this.onMessage = callback;
  }

  /**
   * Starts `run()` in the background
   */
  async start(): Promise<void> {
    if (this.running) {
      this.logger.warn('Source already running');
      return;
    }

    const controller = new AbortController();
    this.controller = controller;
    this.logger.info('Starting correction source');

    this.running = this.run(controller.signal).then(
      () => {
        this.logger.info('Correction source finished');
        this.emit('terminated');
      },
      (error: unknown) => {
        const failure = toError(error);
        this.stats.isHealthy = false;
        this.stats.lastError = failure.message;
        this.logger.error({ error: failure }, 'Correction source stopped with an error');
        this.emit('terminated', failure);
      },
    ).finally(() => {
      this.running = undefined;
      this.controller = undefined;
    });
  }

  /**
   * Cancels a background run and waits until its transport is closed
   */
  async stop(): Promise<void> {
    const running = this.running;
    if (!running) {
      return;
    }
    this.logger.info('Stopping correction source');
    this.controller?.abort();
    await running;
  }

  isRunning(): boolean {
    return this.running !== undefined;
  }

  protected recordBytes(count: number): void {
    this.stats.bytesReceived += count;
  }

  protected recordFrameError(error: GnssError): void {
    this.stats.frameErrors += 1;
    this.emit('frame-error', error);
  }

  protected recordFailure(error: Error): void {
    this.stats.isHealthy = false;
    this.stats.lastError = error.message;
  }

  protected recordReconnect(): void {
    this.stats.reconnects += 1;
  }

  /**
   * Delivers decoded messages in order and counts the rejected frames
   * @throws CancelledError when `signal` aborts between two messages
   */
  protected async deliverOutcomes(outcomes: RtcmDecodeOutcome[], signal?: AbortSignal): Promise<void> {
    for (const outcome of outcomes) {
      if (outcome.kind === 'error') {
        this.recordFrameError(outcome.error);
        continue;
      }
      await this.deliver(outcome.message);
      if (signal?.aborted) {
        throw new CancelledError();
      }
    }
  }

  /**
   * Hands one message to listeners and the callback, waiting for the callback
   */
  protected async deliver(message: RtcmMessage): Promise<void> {
    this.stats.messagesReceived += 1;
    this.stats.lastMessageTime = new Date();
    this.stats.isHealthy = true;

    this.emit('message', message);

    if (!this.onMessage) {
      return;
    }
    try {
      await this.onMessage(this.getName(), message);
    } catch (error) {
      this.logger.error({ error, messageType: message.messageType }, 'Message callback failed');
    }
  }
}
