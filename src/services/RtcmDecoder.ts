import { crc24q } from '../utils/crc24q';
import { CrcError, ParseError } from '../utils/errors';
import type { GnssError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import type { RtcmMessage } from '../types/Rtcm';
import { decodeRtcmPayload } from './RtcmMessages';
import {
  RTCM_CRC_LENGTH,
  RTCM_HEADER_LENGTH,
  RTCM_MAX_PAYLOAD_LENGTH,
  RTCM_PREAMBLE,
} from './RtcmEncoder';

/**
 * Incremental RTCM3 frame decoder
 *
 * Bytes can arrive in chunks of any size. A frame that fails its CRC costs
 * exactly one byte: the scan resumes right after the false preamble, so the
 * frames that follow a corrupted one are still found.
 *
 * One instance per byte stream; not safe to feed from two producers.
 */

export type RtcmDecodeOutcome =
  | { kind: 'message'; message: RtcmMessage }
  | { kind: 'error'; error: GnssError };

export interface RtcmDecoderOptions {
  /** Frames announcing a longer payload are treated as false preambles */
  maxPayloadLength?: number;
}

export interface RtcmDecoderStats {
  framesDecoded: number;
  crcFailures: number;
  fieldErrors: number;
  bytesDiscarded: number;
}

const EMPTY = Buffer.alloc(0);

export class RtcmDecoder {
  private readonly maxPayloadLength: number;
  private buffer: Buffer = EMPTY;
  private stats: RtcmDecoderStats = { framesDecoded: 0, crcFailures: 0, fieldErrors: 0, bytesDiscarded: 0 };
  private readonly logger = createLogger({ component: 'RtcmDecoder' });

  constructor(options: RtcmDecoderOptions = {}) {
    this.maxPayloadLength = Math.min(options.maxPayloadLength ?? RTCM_MAX_PAYLOAD_LENGTH, RTCM_MAX_PAYLOAD_LENGTH);
  }

  /** Bytes held back waiting for the rest of a frame */
  get bufferedBytes(): number {
    return this.buffer.length;
  }

  feed(chunk: Uint8Array): RtcmDecodeOutcome[] {
    const data = this.buffer.length > 0 ? Buffer.concat([this.buffer, chunk]) : Buffer.from(chunk);
    const outcomes: RtcmDecodeOutcome[] = [];
    let offset = 0;

    while (offset < data.length) {
      const start = data.indexOf(RTCM_PREAMBLE, offset);
      if (start < 0) {
        this.discard(data.length - offset);
        offset = data.length;
        break;
      }
      this.discard(start - offset);
      offset = start;

      if (data.length - offset < RTCM_HEADER_LENGTH) {
        break;
      }

      const reserved = data[offset + 1] & 0xfc;
      const payloadLength = ((data[offset + 1] & 0x03) << 8) | data[offset + 2];
      if (reserved !== 0 || payloadLength > this.maxPayloadLength) {
        this.discard(1);
        offset += 1;
        continue;
      }

      const frameLength = RTCM_HEADER_LENGTH + payloadLength + RTCM_CRC_LENGTH;
      if (data.length - offset < frameLength) {
        break;
      }

      const payloadEnd = offset + RTCM_HEADER_LENGTH + payloadLength;
      const expected = data.readUIntBE(payloadEnd, RTCM_CRC_LENGTH);
      const actual = crc24q(data, offset, payloadEnd);

      if (expected !== actual) {
        this.stats.crcFailures += 1;
        this.discard(1);
        offset += 1;
        this.logger.debug({ payloadLength, expected, actual }, 'RTCM3 CRC mismatch, resynchronizing');
        outcomes.push({ kind: 'error', error: new CrcError(payloadLength, expected, actual) });
        continue;
      }

      outcomes.push(this.decodeFrame(data.subarray(offset + RTCM_HEADER_LENGTH, payloadEnd)));
      offset += frameLength;
    }

    // Copied so the retained tail does not pin the whole concatenated chunk
    this.buffer = offset < data.length ? Buffer.from(data.subarray(offset)) : EMPTY;
    return outcomes;
  }

  getStats(): RtcmDecoderStats {
    return { ...this.stats };
  }

  /** Drops any partially received frame */
  reset(): void {
    this.buffer = EMPTY;
  }

  private decodeFrame(payload: Buffer): RtcmDecodeOutcome {
    try {
      const message = decodeRtcmPayload(payload);
      this.stats.framesDecoded += 1;
      return { kind: 'message', message };
    } catch (error) {
      if (!(error instanceof ParseError)) {
        throw error;
      }
      this.stats.fieldErrors += 1;
      this.logger.debug({ payloadLength: payload.length, error: error.message }, 'Discarded RTCM3 message');
      return { kind: 'error', error };
    }
  }

  private discard(bytes: number): void {
    this.stats.bytesDiscarded += bytes;
  }
}
