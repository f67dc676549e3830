import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { formatReplayLine, parseReplayLine, ReplaySource } from '../ReplaySource';
import type { RtcmMessage } from '../../types/Rtcm';
import { ConfigError, ParseError } from '../../utils/errors';

const ARP_1005 = Buffer.from('d300133ed4d2024960cfb72200b7036f7e0b743c4c54b691c9', 'hex');
const ARP_1006 = Buffer.from('d300153ee4d3024960cfd96000b70380600b743c50303a9895839d', 'hex');
const OPAQUE_1000 = Buffer.from('d300043e800102b6580a', 'hex');

describe('parseReplayLine', () => {
  it('should parse a record', () => {
    expect(parseReplayLine('{"dt":250,"data":"0wAEPoABArZYCg=="}', 1)).toEqual({
      dt: 250,
      data: '0wAEPoABArZYCg==',
    });
  });

  it('should format a line that parses back', () => {
    const line = formatReplayLine(0, OPAQUE_1000);

    expect(line).toBe('{"dt":0,"data":"0wAEPoABArZYCg=="}');
    expect(Buffer.from(parseReplayLine(line, 1).data, 'base64').equals(OPAQUE_1000)).toBe(true);
  });

  it('should reject text that is not JSON', () => {
    expect(() => parseReplayLine('{dt: 1', 3)).toThrow('Replay line 3 is not JSON');
  });

  it('should reject records of the wrong shape', () => {
    expect(() => parseReplayLine('{"dt":-1,"data":""}', 4)).toThrow(ParseError);
    expect(() => parseReplayLine('{"dt":0}', 5)).toThrow(/^Replay line 5: data /);
    expect(() => parseReplayLine('{"dt":0,"data":"not base64!"}', 6)).toThrow('Replay line 6: data is not base64');
  });
});

describe('ReplaySource', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(path.join(tmpdir(), 'replay-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  async function recording(lines: string[]): Promise<string> {
    const filePath = path.join(directory, 'recording.jsonl');
    await writeFile(filePath, `${lines.join('\n')}\n`, 'utf8');
    return filePath;
  }

  function collect(source: ReplaySource, onMessage?: (received: number[]) => void): number[] {
    const received: number[] = [];
    source.setMessageCallback((_name: string, message: RtcmMessage) => {
      received.push(message.messageType);
      onMessage?.(received);
    });
    return received;
  }

  it('should deliver the recorded messages in order', async () => {
    const filePath = await recording([
      formatReplayLine(0, ARP_1005.subarray(0, 12)),
      formatReplayLine(0, ARP_1005.subarray(12)),
      formatReplayLine(0, ARP_1006),
      '',
      formatReplayLine(0, OPAQUE_1000),
    ]);
    const source = new ReplaySource({ filePath, speed: 0 });
    const received = collect(source);

    await source.run();

    expect(received).toEqual([1005, 1006, 1000]);
    expect(source.getStats()).toMatchObject({ messagesReceived: 3, bytesReceived: 62, frameErrors: 0 });
  });

  it('should skip a malformed line and count it', async () => {
    const filePath = await recording([formatReplayLine(0, ARP_1005), 'garbage', formatReplayLine(0, OPAQUE_1000)]);
    const source = new ReplaySource({ filePath, speed: 0 });
    const received = collect(source);
    const errors: string[] = [];
    source.on('frame-error', (error: Error) => errors.push(error.message));

    await source.run();

    expect(received).toEqual([1005, 1000]);
    expect(errors).toEqual(['Replay line 2 is not JSON']);
    expect(source.getStats().frameErrors).toBe(1);
  });

  it('should start over when looping', async () => {
    const filePath = await recording([formatReplayLine(0, ARP_1005), formatReplayLine(0, OPAQUE_1000)]);
    const source = new ReplaySource({ filePath, speed: 0, loop: true });
    const controller = new AbortController();
    const received = collect(source, messages => {
      if (messages.length === 5) {
        controller.abort();
      }
    });

    await source.run(controller.signal);

    expect(received).toEqual([1005, 1000, 1005, 1000, 1005]);
  });

  it('should refuse to loop over a recording without records', async () => {
    const filePath = await recording(['', 'garbage']);
    const source = new ReplaySource({ filePath, speed: 0, loop: true });

    await expect(source.run()).rejects.toThrow(ConfigError);
    await expect(source.run()).rejects.toThrow(`Recording ${filePath} has no records to loop over`);
    expect(source.getStats().frameErrors).toBe(2);
  });

  it('should finish a single pass over an empty recording', async () => {
    const source = new ReplaySource({ filePath: await recording(['']), speed: 0 });

    await expect(source.run()).resolves.toBeUndefined();
    expect(source.getStats().messagesReceived).toBe(0);
  });

  it('should stop while waiting out a recorded delay', async () => {
    const filePath = await recording([formatReplayLine(0, ARP_1005), formatReplayLine(60_000, OPAQUE_1000)]);
    const source = new ReplaySource({ filePath });
    const firstMessage = new Promise(resolve => source.once('message', resolve));

    await source.start();
    await firstMessage;
    await source.stop();

    expect(source.isRunning()).toBe(false);
    expect(source.getStats().messagesReceived).toBe(1);
  });

  it('should fail when the recording does not exist', async () => {
    const source = new ReplaySource({ filePath: path.join(directory, 'missing.jsonl') });

    await expect(source.run()).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('should reject a negative speed', () => {
    expect(() => new ReplaySource({ filePath: 'recording.jsonl', speed: -1 })).toThrow(RangeError);
  });
});
