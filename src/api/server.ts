import express from 'express';
import type { Request, Response } from 'express';
import cors from 'cors';
import type { BrokerMessageEvent, CorrectionBroker, ReferenceStation } from '../services/CorrectionBroker';
import type { RtcmMessage } from '../types/Rtcm';
import { createLogger } from '../utils/logger';

export interface ServerOptions {
  /** Interval of SSE heartbeat events (default 30 s) */
  heartbeatMs?: number;
}

// SSE client management
interface SSEClient {
  id: string;
  response: Response;
}

export interface MessageSummary {
  type: 'message';
  source: string;
  messageType: number;
  kind: RtcmMessage['body']['kind'];
  stationId?: number;
  bitLength: number;
  /** MSM only */
  satellites?: number;
  timestamp: string;
}

export function summarizeMessage(event: BrokerMessageEvent): MessageSummary {
  const { message } = event;
  const { body } = message;
  return {
    type: 'message',
    source: event.source,
    messageType: message.messageType,
    kind: body.kind,
    stationId: 'stationId' in body ? body.stationId : undefined,
    bitLength: message.bitLength,
    satellites: 'satellites' in body ? body.satellites.length : undefined,
    timestamp: event.timestamp.toISOString(),
  };
}

export function stationToJSON(station: ReferenceStation) {
  return {
    stationId: station.stationId,
    source: station.sourceName,
    messageType: station.messageType,
    // Integer millimetres, the external form of ECEF positions
    ecef: station.ecef.toJSON(),
    geodetic: station.geodetic?.toJSON(),
    antennaHeight: station.antennaHeight,
    systems: station.systems,
    updatedAt: station.updatedAt.toISOString(),
  };
}

/** One SSE event frame */
export function formatSseEvent(data: unknown): string {
  return `data: ${JSON.stringify(data)}\n\n`;
}

export function createServer(broker: CorrectionBroker, options: ServerOptions = {}) {
  const app = express();
  const logger = createLogger({ component: 'StatusApi' });
  const heartbeatMs = options.heartbeatMs ?? 30_000;
  const sseClients: SSEClient[] = [];
  let nextClientId = 1;

  // Middleware
  app.use(cors());
  app.use(express.json());

  const broadcast = (data: unknown): void => {
    const frame = formatSseEvent(data);
    for (const client of sseClients) {
      client.response.write(frame);
    }
  };

  broker.on('message', (event: BrokerMessageEvent) => broadcast(summarizeMessage(event)));
  broker.on('station-updated', (station: ReferenceStation) =>
    broadcast({ type: 'station-updated', station: stationToJSON(station) }),
  );

  app.get('/health', (_req: Request, res: Response) => {
    const sources = broker.getSourceStats();
    const healthy = sources.every(source => !source.running || source.stats.isHealthy);
    res.json({
      status: healthy ? 'ok' : 'degraded',
      sources: sources.length,
      timestamp: new Date().toISOString(),
    });
  });

  app.get('/api/sources', (_req: Request, res: Response) => {
    res.json({
      success: true,
      sources: broker.getSourceStats(),
    });
  });

  app.get('/api/stations', (_req: Request, res: Response) => {
    const stations = broker.getStations().map(stationToJSON);
    res.json({
      success: true,
      count: stations.length,
      stations,
    });
  });

  app.get('/api/stations/:stationId', (req: Request, res: Response) => {
    const stationId = Number(req.params.stationId);
    if (!Number.isInteger(stationId) || stationId < 0) {
      res.status(400).json({ success: false, error: 'Station id must be a non-negative integer' });
      return;
    }

    const station = broker.getStation(stationId);
    if (!station) {
      res.status(404).json({ success: false, error: `Station ${stationId} not seen` });
      return;
    }
    res.json({ success: true, station: stationToJSON(station) });
  });

  app.get('/api/messages/stats', (_req: Request, res: Response) => {
    const { total, types } = broker.getMessageStats();
    res.json({
      success: true,
      total,
      types: types.map(stats => ({ ...stats, lastReceived: stats.lastReceived.toISOString() })),
    });
  });

  // Server-Sent Events of decoded message summaries
  app.get('/api/stream', (_req: Request, res: Response) => {
    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.setHeader('X-Accel-Buffering', 'no');
    res.flushHeaders();

    const clientId = `client-${nextClientId++}`;
    sseClients.push({ id: clientId, response: res });
    logger.info({ clientId, totalClients: sseClients.length }, 'SSE client connected');

    res.write(formatSseEvent({
      type: 'connected',
      clientId,
      timestamp: new Date().toISOString(),
      stations: broker.getStations().length,
    }));

    const heartbeat = setInterval(() => {
      res.write(formatSseEvent({ type: 'heartbeat', timestamp: new Date().toISOString() }));
    }, heartbeatMs);

    res.on('close', () => {
      clearInterval(heartbeat);
      const index = sseClients.findIndex(client => client.id === clientId);
      if (index > -1) {
        sseClients.splice(index, 1);
      }
      logger.info({ clientId, remainingClients: sseClients.length }, 'SSE client disconnected');
    });
  });

  return app;
}
