import { ConnectionError } from '../utils/errors';

/**
 * Removes HTTP/1.1 chunked transfer framing from a response body.
 * Chunk boundaries do not have to line up with the pieces fed in.
 */

type ChunkState = 'size' | 'data' | 'data-end' | 'trailer' | 'done';

const MAX_SIZE_LINE = 1024;

export class ChunkedDecoder {
  private state: ChunkState = 'size';
  private line = '';
  private remaining = 0;

  /** True once the terminating zero-length chunk has been seen */
  get finished(): boolean {
    return this.state === 'done';
  }

  feed(data: Uint8Array): Buffer {
    const output: Buffer[] = [];
    let offset = 0;

    while (offset < data.length && this.state !== 'done') {
      if (this.state === 'data') {
        const take = Math.min(this.remaining, data.length - offset);
        output.push(Buffer.from(data.subarray(offset, offset + take)));
        offset += take;
        this.remaining -= take;
        if (this.remaining === 0) {
          this.state = 'data-end';
        }
        continue;
      }

      const byte = data[offset];
      offset += 1;

      if (byte !== 0x0a) {
        this.line += String.fromCharCode(byte);
        if (this.line.length > MAX_SIZE_LINE) {
          throw new ConnectionError('Chunked transfer encoding violation: line too long');
        }
        continue;
      }

      const line = this.line.replace(/\r$/, '');
      this.line = '';
      this.endLine(line);
    }

    return Buffer.concat(output);
  }

  reset(): void {
    this.state = 'size';
    this.line = '';
    this.remaining = 0;
  }

  private endLine(line: string): void {
    switch (this.state) {
      case 'size': {
        // Chunk extensions after ';' are ignored
        const sizeText = line.split(';')[0].trim();
        if (!/^[0-9A-Fa-f]+$/.test(sizeText)) {
          throw new ConnectionError(
            `Chunked transfer encoding violation: expected a chunk size, got ${JSON.stringify(line)}`,
          );
        }
        this.remaining = parseInt(sizeText, 16);
        this.state = this.remaining === 0 ? 'trailer' : 'data';
        break;
      }
      case 'data-end':
        if (line !== '') {
          throw new ConnectionError('Chunked transfer encoding violation: missing CRLF after chunk data');
        }
        this.state = 'size';
        break;
      case 'trailer':
        if (line === '') {
          this.state = 'done';
        }
        break;
      default:
        break;
    }
  }
}
