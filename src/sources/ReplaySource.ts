import { open } from 'node:fs/promises';
import { createInterface } from 'node:readline';
import { z } from 'zod';
import { CorrectionSource } from '../services/CorrectionSource';
import { RtcmDecoder } from '../services/RtcmDecoder';
import { sleep } from '../utils/async';
import { CancelledError, ConfigError, ParseError } from '../utils/errors';

/**
 * One line of a recording: bytes received `dt` milliseconds after the
 * previous line
 */
const replayRecordSchema = z.object({
  dt: z.number().nonnegative(),
  data: z.string().regex(/^[A-Za-z0-9+/]*={0,2}$/, 'is not base64'),
});

export type ReplayRecord = z.infer<typeof replayRecordSchema>;

export interface ReplaySourceOptions {
  filePath: string;
  name?: string;
  enabled?: boolean;
  /** Start over at the end of the file until stopped */
  loop?: boolean;
  /** Playback rate; 2 plays twice as fast, 0 ignores the recorded delays */
  speed?: number;
  maxPayloadLength?: number;
}

export function formatReplayLine(dt: number, data: Uint8Array): string {
  return JSON.stringify({ dt, data: Buffer.from(data).toString('base64') } satisfies ReplayRecord);
}

/**
 * Parses one recording line
 * @throws ParseError for invalid JSON or a record of the wrong shape
 */
export function parseReplayLine(line: string, lineNumber: number): ReplayRecord {
  let json: unknown;
  try {
    json = JSON.parse(line);
  } catch (error) {
    throw new ParseError(`Replay line ${lineNumber} is not JSON`, { cause: error });
  }

  const result = replayRecordSchema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ParseError(`Replay line ${lineNumber}: ${issue.path.join('.') || 'record'} ${issue.message}`);
  }
  return result.data;
}

/**
 * Replays a recorded caster stream from a JSON lines file
 */
export class ReplaySource extends CorrectionSource {
  private readonly filePath: string;
  private readonly loop: boolean;
  private readonly speed: number;
  private readonly decoder: RtcmDecoder;

  constructor(options: ReplaySourceOptions) {
    super({ name: options.name ?? `Replay ${options.filePath}`, enabled: options.enabled ?? true });
    if (options.speed !== undefined && (!Number.isFinite(options.speed) || options.speed < 0)) {
      throw new RangeError(`Replay speed must be a non-negative number, got ${options.speed}`);
    }
    this.filePath = options.filePath;
    this.loop = options.loop ?? false;
    this.speed = options.speed ?? 1;
    this.decoder = new RtcmDecoder({ maxPayloadLength: options.maxPayloadLength });
  }

  async run(signal?: AbortSignal): Promise<void> {
    let pass = 0;
    try {
      do {
        pass += 1;
        this.logger.info({ file: this.filePath, pass }, 'Replaying recording');
        const records = await this.replayFile(signal);
        if (records === 0 && this.loop) {
          throw new ConfigError(`Recording ${this.filePath} has no records to loop over`);
        }
      } while (this.loop && !signal?.aborted);
    } catch (error) {
      if (error instanceof CancelledError) {
        return;
      }
      throw error;
    }
  }

  /** Returns the number of valid records replayed */
  private async replayFile(signal?: AbortSignal): Promise<number> {
    const file = await open(this.filePath, 'r');
    const input = file.createReadStream();
    const lines = createInterface({ input, crlfDelay: Infinity });
    let lineNumber = 0;
    let records = 0;

    try {
      for await (const line of lines) {
        lineNumber += 1;
        if (line.trim() === '') {
          continue;
        }

        let record: ReplayRecord;
        try {
          record = parseReplayLine(line, lineNumber);
        } catch (error) {
          if (!(error instanceof ParseError)) {
            throw error;
          }
          this.logger.warn({ line: lineNumber, error: error.message }, 'Skipping malformed replay line');
          this.recordFrameError(error);
          continue;
        }

        if (record.dt > 0 && this.speed > 0) {
          await sleep(record.dt / this.speed, signal);
        } else if (signal?.aborted) {
          throw new CancelledError();
        }

        records += 1;
        const bytes = Buffer.from(record.data, 'base64');
        this.recordBytes(bytes.length);
        await this.deliverOutcomes(this.decoder.feed(bytes), signal);
      }
      return records;
    } finally {
      lines.close();
      input.destroy();
      this.decoder.reset();
    }
  }
}
