import net from 'node:net';
import { waitWithTimeout } from '../utils/async';
import { ConnectionError, GnssError, toError } from '../utils/errors';

/**
 * Byte transport used by the NTRIP client
 *
 * The client owns exactly one transport per session and is its only reader.
 */
export interface Transport {
  /** Next chunk of bytes, or null once the peer has closed the stream */
  read(): Promise<Buffer | null>;
  write(data: string | Uint8Array): Promise<void>;
  close(): Promise<void>;
}

export interface TransportConnectOptions {
  host: string;
  port: number;
  timeoutMs: number;
  signal?: AbortSignal;
}

export type TransportFactory = (options: TransportConnectOptions) => Promise<Transport>;

// Reading is paused while this many chunks wait for the consumer
const HIGH_WATER_CHUNKS = 64;

type PendingRead = {
  resolve: (chunk: Buffer | null) => void;
  reject: (error: Error) => void;
};

/**
 * Pull-style wrapper around a TCP socket
 */
export class SocketTransport implements Transport {
  private readonly socket: net.Socket;
  private readonly queue: Buffer[] = [];
  private pending?: PendingRead;
  private ended = false;
  private failure?: Error;

  constructor(socket: net.Socket) {
    this.socket = socket;

    socket.on('data', (chunk: Buffer) => {
      if (this.pending) {
        const { resolve } = this.pending;
        this.pending = undefined;
        resolve(chunk);
        return;
      }
      this.queue.push(chunk);
      if (this.queue.length >= HIGH_WATER_CHUNKS) {
        socket.pause();
      }
    });

    socket.on('end', () => this.finish());
    socket.on('close', () => this.finish());
    socket.on('error', (error: Error) => {
      this.failure = new ConnectionError(`Socket error: ${error.message}`, { cause: error });
      this.finish();
    });
  }

  read(): Promise<Buffer | null> {
    const chunk = this.queue.shift();
    if (chunk) {
      if (this.socket.isPaused() && this.queue.length < HIGH_WATER_CHUNKS / 2) {
        this.socket.resume();
      }
      return Promise.resolve(chunk);
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (this.ended) {
      return Promise.resolve(null);
    }
    if (this.pending) {
      return Promise.reject(new Error('SocketTransport supports a single reader'));
    }

    return new Promise((resolve, reject) => {
      this.pending = { resolve, reject };
    });
  }

  write(data: string | Uint8Array): Promise<void> {
    return new Promise((resolve, reject) => {
      this.socket.write(data, error => {
        if (error) {
          reject(new ConnectionError(`Socket write failed: ${error.message}`, { cause: error }));
        } else {
          resolve();
        }
      });
    });
  }

  close(): Promise<void> {
    if (this.socket.destroyed) {
      return Promise.resolve();
    }
    return new Promise(resolve => {
      this.socket.once('close', () => resolve());
      this.socket.destroy();
    });
  }

  private finish(): void {
    this.ended = true;
    const pending = this.pending;
    this.pending = undefined;
    if (!pending) {
      return;
    }
    if (this.failure) {
      pending.reject(this.failure);
    } else {
      pending.resolve(null);
    }
  }
}

/**
 * Opens a TCP connection to the caster
 */
export const connectTcp: TransportFactory = async ({ host, port, timeoutMs, signal }) => {
  const socket = net.connect({ host, port });
  socket.setNoDelay(true);

  const connected = new Promise<void>((resolve, reject) => {
    socket.once('connect', () => resolve());
    socket.once('error', error => reject(error));
  });

  try {
    await waitWithTimeout(connected, { timeoutMs, signal, label: `connection to ${host}:${port}` });
  } catch (error) {
    socket.destroy();
    // Timeouts and cancellation keep their own type
    if (error instanceof GnssError) {
      throw error;
    }
    const cause = toError(error);
    throw new ConnectionError(`Cannot connect to ${host}:${port}: ${cause.message}`, { cause });
  }

  return new SocketTransport(socket);
};
