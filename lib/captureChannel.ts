import net from 'net';

import { connectSocket, DEFAULT_CONNECT_TIMEOUT_MS } from './controlChannel';
import { ConnectionError } from './errors';
import { BYTES_PER_WORD } from './tableEncoder';

export const DEFAULT_DATA_PORT = 8889;
export const RAW_CAPTURE_CONFIG = 'UNFRAMED RAW NO_HEADER NO_STATUS ONE_SHOT';

export interface CaptureChannelOptions {
  host: string;
  port?: number;
  connectTimeoutMs?: number;
  configLine?: string;
}

export interface ChunkOptions {
  /** Yield exactly this many bytes at a time (e.g. one table block). */
  nbytes?: number;
}

/**
 * Reader for the binary capture stream. The device streams raw 32-bit
 * words after the configuration line and closes the connection when the
 * one-shot acquisition ends.
 */
export class CaptureChannel {
  private readonly host: string;

  private readonly port: number;

  private readonly connectTimeoutMs: number;

  private readonly configLine: string;

  private socket: net.Socket | null = null;

  private streamError: Error | null = null;

  constructor(options: CaptureChannelOptions) {
    this.host = options.host;
    this.port = options.port ?? DEFAULT_DATA_PORT;
    this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
    this.configLine = options.configLine ?? RAW_CAPTURE_CONFIG;
  }

  async open() {
    if (this.socket) return;
    const socket = await connectSocket(this.host, this.port, this.connectTimeoutMs);
    this.socket = socket;
    this.streamError = null;
    // errors before chunks() starts are rethrown from it
    socket.on('error', (error: Error) => {
      if (!this.streamError) this.streamError = error;
    });
    await new Promise<void>((resolve, reject) => {
      socket.write(`${this.configLine}\n`, 'utf8', (error?: Error | null) => {
        if (error) {
          reject(new ConnectionError(`Capture configuration write failed: ${error.message}`, error));
          return;
        }
        resolve();
      });
    });
  }

  close() {
    if (!this.socket) return;
    this.socket.destroy();
    this.socket = null;
  }

  /**
   * Finite sequence of captured buffers, ending when the peer closes the
   * connection. A trailing partial buffer is yielded once before the end.
   */
  async* chunks(options: ChunkOptions = {}): AsyncGenerator<Buffer> {
    const { socket } = this;
    if (!socket) throw new ConnectionError('Capture channel is not open');
    this.throwStreamError();
    const { nbytes } = options;
    if (nbytes !== undefined && (!Number.isInteger(nbytes) || nbytes <= 0)) {
      throw new RangeError(`nbytes must be a positive integer, got ${nbytes}`);
    }

    let acc: Buffer = Buffer.alloc(0);
    try {
      for await (const chunk of socket) {
        if (!Buffer.isBuffer(chunk)) continue;
        acc = acc.length === 0 ? chunk : Buffer.concat([acc, chunk]);

        if (nbytes !== undefined) {
          while (acc.length >= nbytes) {
            yield Buffer.from(acc.subarray(0, nbytes));
            acc = acc.subarray(nbytes);
          }
          continue;
        }

        const aligned = acc.length - (acc.length % BYTES_PER_WORD);
        if (aligned > 0) {
          yield Buffer.from(acc.subarray(0, aligned));
          acc = acc.subarray(aligned);
        }
      }
    } catch (error) {
      if (error instanceof Error) {
        throw new ConnectionError(`Capture stream failed: ${error.message}`, error);
      }
      throw error;
    } finally {
      this.close();
    }

    this.throwStreamError();
    if (acc.length > 0) yield Buffer.from(acc);
  }

  private throwStreamError() {
    const error = this.streamError;
    if (!error) return;
    this.close();
    throw new ConnectionError(`Capture stream failed: ${error.message}`, error);
  }
}
