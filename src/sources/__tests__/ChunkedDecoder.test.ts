import { describe, it, expect, beforeEach } from 'vitest';
import { ChunkedDecoder } from '../ChunkedDecoder';
import { ConnectionError } from '../../utils/errors';

describe('ChunkedDecoder', () => {
  let decoder: ChunkedDecoder;

  beforeEach(() => {
    decoder = new ChunkedDecoder();
  });

  it('should remove chunk framing', () => {
    const output = decoder.feed(Buffer.from('5\r\nhello\r\n6\r\n world\r\n'));

    expect(output.toString()).toBe('hello world');
    expect(decoder.finished).toBe(false);
  });

  it('should handle chunks split across feeds', () => {
    const pieces = ['a\r', '\n0123', '456789\r', '\n1\r\nX', '\r\n'];
    const output = pieces.map(piece => decoder.feed(Buffer.from(piece)).toString()).join('');

    expect(output).toBe('0123456789X');
  });

  it('should pass binary data through unchanged', () => {
    const data = Buffer.from([0xd3, 0x00, 0x0a, 0x0d, 0xff]);
    const framed = Buffer.concat([Buffer.from('5\r\n'), data, Buffer.from('\r\n')]);

    expect(decoder.feed(framed).equals(data)).toBe(true);
  });

  it('should ignore chunk extensions', () => {
    expect(decoder.feed(Buffer.from('3;name=value\r\nabc\r\n')).toString()).toBe('abc');
  });

  it('should finish on the zero-length chunk and ignore what follows', () => {
    const output = decoder.feed(Buffer.from('2\r\nok\r\n0\r\n\r\n5\r\nextra\r\n'));

    expect(output.toString()).toBe('ok');
    expect(decoder.finished).toBe(true);
  });

  it('should skip trailer headers', () => {
    decoder.feed(Buffer.from('0\r\nX-Trailer: 1\r\n'));
    expect(decoder.finished).toBe(false);

    decoder.feed(Buffer.from('\r\n'));
    expect(decoder.finished).toBe(true);
  });

  it('should reject a chunk size that is not hex', () => {
    expect(() => decoder.feed(Buffer.from('zz\r\n'))).toThrow(ConnectionError);
  });

  it('should reject chunk data without a trailing CRLF', () => {
    expect(() => decoder.feed(Buffer.from('2\r\nokXX\r\n'))).toThrow('missing CRLF after chunk data');
  });

  it('should start over after reset', () => {
    decoder.feed(Buffer.from('5\r\nhel'));
    decoder.reset();

    expect(decoder.feed(Buffer.from('2\r\nhi\r\n')).toString()).toBe('hi');
  });
});
