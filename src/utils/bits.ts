import { FieldBoundsError } from './errors';

/**
 * Big-endian bit cursor over an RTCM3 payload
 *
 * Every read checks the remaining length first and throws FieldBoundsError
 * instead of returning garbage past the end of the payload.
 */

// Largest width that still fits exactly in a double
const MAX_FIELD_BITS = 53;

export type IntegerEncoding = 'unsigned' | 'signed' | 'sign-magnitude';

export class BitReader {
  private readonly data: Uint8Array;
  private readonly totalBits: number;
  private offset = 0;

  constructor(data: Uint8Array, bitLength: number = data.length * 8) {
    this.data = data;
    this.totalBits = Math.min(bitLength, data.length * 8);
  }

  /** Current read position in bits */
  get position(): number {
    return this.offset;
  }

  get remaining(): number {
    return this.totalBits - this.offset;
  }

  readUnsigned(bits: number): number {
    this.ensureAvailable(bits);

    let value = 0;
    for (let i = 0; i < bits; i++) {
      const bitIndex = this.offset + i;
      const bit = (this.data[bitIndex >>> 3] >>> (7 - (bitIndex & 7))) & 1;
      value = value * 2 + bit;
    }
    this.offset += bits;
    return value;
  }

  /** Two's complement */
  readSigned(bits: number): number {
    const raw = this.readUnsigned(bits);
    const half = 2 ** (bits - 1);
    return raw >= half ? raw - 2 * half : raw;
  }

  /** Leading sign bit followed by the magnitude, as used by GLONASS fields */
  readSignMagnitude(bits: number): number {
    const negative = this.readUnsigned(1) === 1;
    const magnitude = this.readUnsigned(bits - 1);
    return negative ? -magnitude : magnitude;
  }

  readInteger(bits: number, encoding: IntegerEncoding): number {
    switch (encoding) {
      case 'unsigned':
        return this.readUnsigned(bits);
      case 'signed':
        return this.readSigned(bits);
      case 'sign-magnitude':
        return this.readSignMagnitude(bits);
    }
  }

  /** Raw integer times `scale`, e.g. 0.0001 m for reference station coordinates */
  readScaled(bits: number, scale: number, encoding: IntegerEncoding = 'signed'): number {
    return this.readInteger(bits, encoding) * scale;
  }

  readBool(): boolean {
    return this.readUnsigned(1) === 1;
  }

  /**
   * Reads a bit mask and returns the 1-based positions of the set bits,
   * most significant first
   */
  readMask(bits: number): number[] {
    this.ensureAvailable(bits);

    const positions: number[] = [];
    for (let i = 1; i <= bits; i++) {
      if (this.readUnsigned(1) === 1) {
        positions.push(i);
      }
    }
    return positions;
  }

  /** `length` 8-bit characters */
  readString(length: number): string {
    this.ensureAvailable(length * 8);

    let text = '';
    for (let i = 0; i < length; i++) {
      text += String.fromCharCode(this.readUnsigned(8));
    }
    return text;
  }

  skip(bits: number): void {
    this.ensureAvailable(bits);
    this.offset += bits;
  }

  private ensureAvailable(bits: number): void {
    if (!Number.isInteger(bits) || bits < 0) {
      throw new RangeError(`Invalid field width ${bits}`);
    }
    if (bits > this.remaining) {
      throw new FieldBoundsError(bits, this.remaining);
    }
  }
}

/**
 * Big-endian bit writer, the inverse of BitReader
 */
export class BitWriter {
  private readonly bits: number[] = [];

  get bitLength(): number {
    return this.bits.length;
  }

  writeUnsigned(bits: number, value: number): this {
    checkWidth(bits);
    if (!Number.isInteger(value) || value < 0 || value >= 2 ** bits) {
      throw new RangeError(`Value ${value} does not fit in ${bits} unsigned bits`);
    }

    let remaining = value;
    const chunk: number[] = new Array<number>(bits);
    for (let i = bits - 1; i >= 0; i--) {
      chunk[i] = remaining % 2;
      remaining = Math.floor(remaining / 2);
    }
    this.bits.push(...chunk);
    return this;
  }

  writeSigned(bits: number, value: number): this {
    checkWidth(bits);
    const half = 2 ** (bits - 1);
    if (!Number.isInteger(value) || value < -half || value >= half) {
      throw new RangeError(`Value ${value} does not fit in ${bits} signed bits`);
    }
    return this.writeUnsigned(bits, value < 0 ? value + 2 * half : value);
  }

  writeSignMagnitude(bits: number, value: number): this {
    this.writeUnsigned(1, value < 0 ? 1 : 0);
    return this.writeUnsigned(bits - 1, Math.abs(value));
  }

  writeBool(value: boolean): this {
    return this.writeUnsigned(1, value ? 1 : 0);
  }

  /** Writes each character as one byte; characters above 0xFF are rejected */
  writeString(text: string): this {
    for (let i = 0; i < text.length; i++) {
      this.writeUnsigned(8, text.charCodeAt(i));
    }
    return this;
  }

  /** Bits packed into bytes, the last byte padded with zeros */
  toBytes(): Uint8Array {
    const bytes = new Uint8Array(Math.ceil(this.bits.length / 8));
    this.bits.forEach((bit, index) => {
      if (bit) {
        bytes[index >>> 3] |= 0x80 >>> (index & 7);
      }
    });
    return bytes;
  }
}

function checkWidth(bits: number): void {
  if (!Number.isInteger(bits) || bits < 1 || bits > MAX_FIELD_BITS) {
    throw new RangeError(`Invalid field width ${bits}`);
  }
}
