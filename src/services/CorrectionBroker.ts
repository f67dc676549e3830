import { EventEmitter } from 'node:events';
import type { CorrectionSource, CorrectionSourceStats } from './CorrectionSource';
import { ecefToGeodetic } from './CoordinateTransforms';
import type { ECEFCoordinate, GeodeticCoordinate } from '../types/Coordinates';
import type { AntennaReferencePoint, RtcmMessage } from '../types/Rtcm';
import { ConvergenceError } from '../utils/errors';
import { createLogger } from '../utils/logger';

export type MessageConsumer = (message: RtcmMessage, sourceName: string) => void | Promise<void>;

export interface ConsumerOptions {
  /** Only these message types are passed on; all types when omitted */
  messageTypes?: Iterable<number>;
}

interface RegisteredConsumer {
  handler: MessageConsumer;
  messageTypes?: ReadonlySet<number>;
}

export interface ReferenceStation {
  stationId: number;
  sourceName: string;
  messageType: number;
  ecef: ECEFCoordinate;
  /** Undefined when the position does not convert (e.g. near the geocentre) */
  geodetic?: GeodeticCoordinate;
  antennaHeight?: number;
  systems: AntennaReferencePoint['systems'];
  updatedAt: Date;
}

export interface MessageTypeStats {
  messageType: number;
  count: number;
  lastReceived: Date;
}

export interface BrokerMessageEvent {
  source: string;
  message: RtcmMessage;
  timestamp: Date;
}

export interface SourceInfo {
  name: string;
  enabled: boolean;
  running: boolean;
  stats: CorrectionSourceStats;
}

/**
 * Fans messages from all registered correction sources out to consumers
 *
 * Keeps per-type counters and the latest antenna reference point of every
 * station seen. Emits `message` (BrokerMessageEvent) and `station-updated`
 * (ReferenceStation).
 */
export class CorrectionBroker extends EventEmitter {
  private readonly sources: Map<string, CorrectionSource> = new Map();
  private readonly consumers: Map<string, RegisteredConsumer> = new Map();
  private readonly typeStats: Map<number, MessageTypeStats> = new Map();
  private readonly stations: Map<number, ReferenceStation> = new Map();
  private totalMessages = 0;
  private readonly logger = createLogger({ component: 'CorrectionBroker' });

  /**
   * Register a correction source; a second source with the same name is ignored
   */
  registerSource(source: CorrectionSource): boolean {
    if (this.sources.has(source.getName())) {
      this.logger.warn({ source: source.getName() }, 'Correction source already registered');
      return false;
    }

    this.sources.set(source.getName(), source);
    source.setMessageCallback((sourceName, message) => this.handleMessage(sourceName, message));

    this.logger.info({ source: source.getName() }, 'Registered correction source');
    return true;
  }

  unregisterSource(name: string): void {
    this.sources.delete(name);
    this.logger.info({ source: name }, 'Unregistered correction source');
  }

  getSources(): CorrectionSource[] {
    return Array.from(this.sources.values());
  }

  /**
   * Adds or replaces the consumer called `name`
   */
  addConsumer(name: string, handler: MessageConsumer, options: ConsumerOptions = {}): void {
    const messageTypes = options.messageTypes ? new Set(options.messageTypes) : undefined;
    this.consumers.set(name, { handler, messageTypes });
    this.logger.debug({ consumer: name, messageTypes: messageTypes && [...messageTypes] }, 'Added consumer');
  }

  removeConsumer(name: string): boolean {
    return this.consumers.delete(name);
  }

  /**
   * Entry point for every decoded message. Consumers run one after another;
   * a failing consumer is logged and does not stop the others.
   */
  async handleMessage(sourceName: string, message: RtcmMessage): Promise<void> {
    const timestamp = new Date();
    this.totalMessages += 1;

    const current = this.typeStats.get(message.messageType);
    this.typeStats.set(message.messageType, {
      messageType: message.messageType,
      count: (current?.count ?? 0) + 1,
      lastReceived: timestamp,
    });

    if (message.body.kind === 'antenna-reference-point') {
      this.updateStation(sourceName, message.messageType, message.body, timestamp);
    }

    this.emit('message', { source: sourceName, message, timestamp } satisfies BrokerMessageEvent);

    for (const [name, consumer] of this.consumers) {
      if (consumer.messageTypes && !consumer.messageTypes.has(message.messageType)) {
        continue;
      }
      try {
        await consumer.handler(message, sourceName);
      } catch (error) {
        this.logger.error({ consumer: name, messageType: message.messageType, error }, 'Consumer failed');
      }
    }
  }

  private updateStation(sourceName: string, messageType: number, body: AntennaReferencePoint, timestamp: Date): void {
    let geodetic: GeodeticCoordinate | undefined;
    try {
      geodetic = ecefToGeodetic(body.position);
    } catch (error) {
      if (!(error instanceof ConvergenceError)) {
        throw error;
      }
      this.logger.warn({ stationId: body.stationId, error: error.message }, 'Station position does not convert');
    }

    const station: ReferenceStation = {
      stationId: body.stationId,
      sourceName,
      messageType,
      ecef: body.position,
      geodetic,
      antennaHeight: body.antennaHeight,
      systems: body.systems,
      updatedAt: timestamp,
    };
    const previous = this.stations.get(body.stationId);
    this.stations.set(body.stationId, station);

    if (!previous || !previous.ecef.equals(station.ecef)) {
      this.logger.info(
        { stationId: station.stationId, source: sourceName, position: geodetic?.format() },
        'Reference station position updated',
      );
    }
    this.emit('station-updated', station);
  }

  getStations(): ReferenceStation[] {
    return Array.from(this.stations.values()).sort((a, b) => a.stationId - b.stationId);
  }

  getStation(stationId: number): ReferenceStation | undefined {
    return this.stations.get(stationId);
  }

  /**
   * Per-type counters, ordered by message type
   */
  getMessageStats(): { total: number; types: MessageTypeStats[] } {
    return {
      total: this.totalMessages,
      types: Array.from(this.typeStats.values()).sort((a, b) => a.messageType - b.messageType),
    };
  }

  getSourceStats(): SourceInfo[] {
    return Array.from(this.sources.values()).map(source => ({
      name: source.getName(),
      enabled: source.isEnabled(),
      running: source.isRunning(),
      stats: source.getStats(),
    }));
  }

  /**
   * Starts every enabled source in the background
   */
  async initialize(): Promise<void> {
    const enabled = this.getSources().filter(source => source.isEnabled());
    if (enabled.length === 0) {
      this.logger.warn('No enabled correction sources');
      return;
    }
    this.logger.info({ sourceCount: enabled.length }, 'Starting correction sources');
    await Promise.all(enabled.map(source => source.start()));
  }

  /**
   * Stops every source and waits for their connections to close
   */
  async cleanup(): Promise<void> {
    this.logger.info('Stopping correction sources');
    await Promise.all(this.getSources().map(source => source.stop()));
  }
}
