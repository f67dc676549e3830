import { describe, it, expect, beforeEach, vi } from 'vitest';
import { CorrectionBroker } from '../CorrectionBroker';
import type { BrokerMessageEvent, ReferenceStation } from '../CorrectionBroker';
import { CorrectionSource } from '../CorrectionSource';
import { ECEFCoordinate } from '../../types/Coordinates';
import type { RtcmMessage } from '../../types/Rtcm';

const BRUSSELS = new ECEFCoordinate(4027893.1234, 307045.5678, 4919474.9012);

function arpMessage(stationId: number, position: ECEFCoordinate = BRUSSELS, messageType = 1005): RtcmMessage {
  return {
    messageType,
    bitLength: 152,
    body: {
      kind: 'antenna-reference-point',
      stationId,
      itrfYear: 0,
      systems: { gps: true, glonass: false, galileo: false },
      isReferenceStation: true,
      singleReceiverOscillator: false,
      quarterCycleIndicator: 0,
      position,
    },
  };
}

function opaqueMessage(messageType: number): RtcmMessage {
  return { messageType, bitLength: 32, body: { kind: 'opaque', payload: new Uint8Array(4) } };
}

// Delivers a fixed list of messages, then ends
class ScriptedSource extends CorrectionSource {
  private readonly messages: RtcmMessage[];

  constructor(name: string, messages: RtcmMessage[] = [], enabled = true) {
    super({ name, enabled });
    this.messages = messages;
  }

  async run(signal?: AbortSignal): Promise<void> {
    for (const message of this.messages) {
      if (signal?.aborted) {
        return;
      }
      await this.deliver(message);
    }
  }
}

// Runs until cancelled
class IdleSource extends CorrectionSource {
  constructor(name: string) {
    super({ name, enabled: true });
  }

  run(signal?: AbortSignal): Promise<void> {
    return new Promise(resolve => {
      signal?.addEventListener('abort', () => resolve(), { once: true });
    });
  }
}

describe('CorrectionBroker', () => {
  let broker: CorrectionBroker;

  beforeEach(() => {
    broker = new CorrectionBroker();
  });

  describe('source registration', () => {
    it('should register a correction source', () => {
      expect(broker.registerSource(new ScriptedSource('caster'))).toBe(true);

      const stats = broker.getSourceStats();
      expect(stats).toHaveLength(1);
      expect(stats[0]).toMatchObject({ name: 'caster', enabled: true, running: false });
    });

    it('should not register duplicate sources', () => {
      const first = new ScriptedSource('caster');

      broker.registerSource(first);
      expect(broker.registerSource(new ScriptedSource('caster'))).toBe(false);

      expect(broker.getSources()).toEqual([first]);
    });

    it('should unregister a source', () => {
      broker.registerSource(new ScriptedSource('caster'));
      broker.registerSource(new ScriptedSource('replay'));

      broker.unregisterSource('caster');

      expect(broker.getSources().map(source => source.getName())).toEqual(['replay']);
    });
  });

  describe('message relay', () => {
    it('should count messages per type', async () => {
      await broker.handleMessage('caster', arpMessage(1));
      await broker.handleMessage('caster', opaqueMessage(1077));
      await broker.handleMessage('caster', arpMessage(1));

      const stats = broker.getMessageStats();
      expect(stats.total).toBe(3);
      expect(stats.types.map(({ messageType, count }) => [messageType, count])).toEqual([
        [1005, 2],
        [1077, 1],
      ]);
    });

    it('should pass only the requested types to a filtered consumer', async () => {
      const stationsOnly = vi.fn();
      const everything = vi.fn();
      broker.addConsumer('stations', stationsOnly, { messageTypes: [1005, 1006] });
      broker.addConsumer('all', everything);

      await broker.handleMessage('caster', opaqueMessage(1077));
      await broker.handleMessage('caster', arpMessage(7));

      expect(stationsOnly).toHaveBeenCalledTimes(1);
      expect(stationsOnly).toHaveBeenCalledWith(expect.objectContaining({ messageType: 1005 }), 'caster');
      expect(everything).toHaveBeenCalledTimes(2);
    });

    it('should keep calling consumers after one fails', async () => {
      const after = vi.fn();
      broker.addConsumer('failing', () => {
        throw new Error('consumer failed');
      });
      broker.addConsumer('after', after);

      await broker.handleMessage('caster', opaqueMessage(1077));

      expect(after).toHaveBeenCalledTimes(1);
    });

    it('should stop calling a removed consumer', async () => {
      const consumer = vi.fn();
      broker.addConsumer('once', consumer);
      await broker.handleMessage('caster', opaqueMessage(1077));

      expect(broker.removeConsumer('once')).toBe(true);
      await broker.handleMessage('caster', opaqueMessage(1077));

      expect(consumer).toHaveBeenCalledTimes(1);
    });

    it('should emit a message event with the source name', async () => {
      const events: BrokerMessageEvent[] = [];
      broker.on('message', (event: BrokerMessageEvent) => events.push(event));

      await broker.handleMessage('replay', opaqueMessage(1230));

      expect(events).toHaveLength(1);
      expect(events[0].source).toBe('replay');
      expect(events[0].message.messageType).toBe(1230);
    });
  });

  describe('reference stations', () => {
    it('should keep the latest position of each station with its geodetic form', async () => {
      const updates: ReferenceStation[] = [];
      broker.on('station-updated', (station: ReferenceStation) => updates.push(station));

      await broker.handleMessage('caster', arpMessage(1234));

      const station = broker.getStation(1234);
      expect(station?.sourceName).toBe('caster');
      expect(station?.geodetic?.lat).toBeCloseTo(50.797821, 6);
      expect(station?.geodetic?.lon).toBeCloseTo(4.359216, 6);
      expect(station?.geodetic?.alt).toBeCloseTo(149.102, 3);
      expect(updates).toHaveLength(1);
    });

    it('should replace a moved station and list stations by id', async () => {
      const moved = new ECEFCoordinate(4027894, 307046, 4919475);

      await broker.handleMessage('caster', arpMessage(20));
      await broker.handleMessage('caster', arpMessage(10));
      await broker.handleMessage('caster', arpMessage(20, moved, 1006));

      expect(broker.getStations().map(station => station.stationId)).toEqual([10, 20]);
      expect(broker.getStation(20)?.ecef.equals(moved)).toBe(true);
      expect(broker.getStation(20)?.messageType).toBe(1006);
    });

    it('should not treat other messages as station updates', async () => {
      await broker.handleMessage('caster', opaqueMessage(1077));

      expect(broker.getStations()).toEqual([]);
    });
  });

  describe('lifecycle', () => {
    it('should start enabled sources and relay what they deliver', async () => {
      const source = new ScriptedSource('replay', [arpMessage(1), opaqueMessage(1077)]);
      const disabled = new ScriptedSource('spare', [opaqueMessage(1033)], false);
      broker.registerSource(source);
      broker.registerSource(disabled);
      const finished = new Promise(resolve => source.once('terminated', resolve));

      await broker.initialize();
      await finished;

      expect(broker.getMessageStats().total).toBe(2);
      expect(disabled.isRunning()).toBe(false);
      const [replayStats] = broker.getSourceStats();
      expect(replayStats.stats.messagesReceived).toBe(2);
    });

    it('should stop running sources on cleanup', async () => {
      const source = new IdleSource('caster');
      broker.registerSource(source);

      await broker.initialize();
      expect(source.isRunning()).toBe(true);

      await broker.cleanup();
      expect(source.isRunning()).toBe(false);
    });
  });
});
