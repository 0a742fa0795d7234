import net from 'net';

import { ConnectionError } from './errors';

export const DEFAULT_CONTROL_PORT = 8888;
export const DEFAULT_CONNECT_TIMEOUT_MS = 3000;

const NEWLINE = 0x0a;

export interface ControlChannelOptions {
  host: string;
  port?: number;
  connectTimeoutMs?: number;
}

interface PendingRead {
  findEnd: (buffer: Buffer) => number;
  resolve: (data: Buffer) => void;
  reject: (error: Error) => void;
}

/**
 * Open a TCP connection with Nagle disabled. The timeout only covers
 * connection establishment; the returned socket has no read timeout.
 */
export function connectSocket(host: string, port: number, timeoutMs: number): Promise<net.Socket> {
  return new Promise<net.Socket>((resolve, reject) => {
    const socket = net.createConnection({ host, port });

    const timeout = setTimeout(() => {
      cleanup();
      socket.destroy();
      reject(new ConnectionError(`Connect timeout after ${timeoutMs}ms (${host}:${port})`));
    }, timeoutMs);

    const onError = (error: Error) => {
      cleanup();
      socket.destroy();
      reject(new ConnectionError(`Failed to connect to ${host}:${port}: ${error.message}`, error));
    };

    const onConnect = () => {
      cleanup();
      socket.setNoDelay(true);
      resolve(socket);
    };

    const cleanup = () => {
      clearTimeout(timeout);
      socket.removeListener('error', onError);
      socket.removeListener('connect', onConnect);
    };

    socket.once('error', onError);
    socket.once('connect', onConnect);
  });
}

export function findLineEnd(buffer: Buffer): number {
  const index = buffer.indexOf(NEWLINE);
  return index < 0 ? -1 : index + 1;
}

/** End of a `!`-list: the first line consisting only of `.`. */
export function findTerminatorEnd(buffer: Buffer): number {
  if (buffer.length >= 2 && buffer[0] === 0x2e && buffer[1] === NEWLINE) return 2;
  const index = buffer.indexOf('\n.\n');
  return index < 0 ? -1 : index + 3;
}

/**
 * Line-oriented request/response transport over one long-lived TCP
 * connection to the control port.
 */
export class ControlChannel {
  private readonly host: string;

  private readonly port: number;

  private readonly connectTimeoutMs: number;

  private socket: net.Socket | null = null;

  private receiveBuffer = Buffer.alloc(0);

  /** Chunks not yet joined into `receiveBuffer`. */
  private unjoined: Buffer[] = [];

  /** Last bytes received, enough to spot a `\n.\n` split across chunks. */
  private tail = Buffer.alloc(0);

  private pendingRead: PendingRead | null = null;

  private failure: Error | null = null;

  constructor(options: ControlChannelOptions) {
    this.host = options.host;
    this.port = options.port ?? DEFAULT_CONTROL_PORT;
    this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
  }

  get connected(): boolean {
    return this.socket !== null;
  }

  async connect() {
    if (this.socket) return;
    const socket = await connectSocket(this.host, this.port, this.connectTimeoutMs);
    this.socket = socket;
    this.receiveBuffer = Buffer.alloc(0);
    this.unjoined = [];
    this.tail = Buffer.alloc(0);
    this.failure = null;

    socket.on('data', (chunk: Buffer) => this.onData(chunk));
    socket.on('error', (error) => this.onFailure(
      new ConnectionError(`Control connection error: ${error.message}`, error),
    ));
    socket.on('close', () => this.onFailure(new ConnectionError('Control connection closed by peer')));
  }

  async close() {
    const { socket } = this;
    if (!socket) return;
    this.socket = null;
    this.onFailure(new ConnectionError('Control connection closed'));
    await new Promise<void>((resolve) => {
      if (socket.destroyed) {
        resolve();
        return;
      }
      socket.once('close', () => resolve());
      socket.destroy();
    });
  }

  /** Write every line followed by `\n` in a single socket write. */
  async send(lines: string | string[]) {
    const socket = this.requireSocket();
    const list = typeof lines === 'string' ? [lines] : lines;
    const payload = list.map((line) => `${line}\n`).join('');
    await new Promise<void>((resolve, reject) => {
      socket.write(payload, 'utf8', (error?: Error | null) => {
        if (error) {
          reject(new ConnectionError(`Control write failed: ${error.message}`, error));
          return;
        }
        resolve();
      });
    });
  }

  receiveLine(): Promise<Buffer> {
    return this.read(findLineEnd);
  }

  receiveUntilTerminator(): Promise<Buffer> {
    return this.read(findTerminatorEnd);
  }

  /**
   * Send a command and read its complete reply, following `!`-lists up to
   * their `.` terminator.
   */
  async request(lines: string | string[]): Promise<Buffer> {
    await this.send(lines);
    const first = await this.receiveLine();
    if (first[0] !== 0x21) return first;
    const rest = await this.receiveUntilTerminator();
    return Buffer.concat([first, rest]);
  }

  private requireSocket(): net.Socket {
    if (!this.socket) {
      throw this.failure ?? new ConnectionError('Control channel is not connected');
    }
    return this.socket;
  }

  private read(findEnd: (buffer: Buffer) => number): Promise<Buffer> {
    if (this.pendingRead) {
      return Promise.reject(new ConnectionError('Control channel already has a read in flight'));
    }
    return new Promise<Buffer>((resolve, reject) => {
      this.pendingRead = { findEnd, resolve, reject };
      this.drain();
      if (this.pendingRead && (this.failure || !this.socket)) {
        this.pendingRead = null;
        reject(this.failure ?? new ConnectionError('Control channel is not connected'));
      }
    });
  }

  private onData(chunk: Buffer) {
    this.unjoined.push(chunk);
    const recent = Buffer.concat([this.tail, chunk]);
    this.tail = Buffer.from(recent.subarray(Math.max(0, recent.length - 2)));
    // join only once the pending reply may have ended
    if (this.pendingRead && this.pendingRead.findEnd(recent) >= 0) this.drain();
  }

  private drain() {
    const pending = this.pendingRead;
    if (!pending) return;
    if (this.unjoined.length > 0) {
      this.receiveBuffer = Buffer.concat([this.receiveBuffer, ...this.unjoined]);
      this.unjoined = [];
    }
    const end = pending.findEnd(this.receiveBuffer);
    if (end < 0) return;
    const data = Buffer.from(this.receiveBuffer.subarray(0, end));
    this.receiveBuffer = this.receiveBuffer.subarray(end);
    this.pendingRead = null;
    pending.resolve(data);
  }

  private onFailure(error: Error) {
    if (!this.failure) this.failure = error;
    this.socket = null;
    const pending = this.pendingRead;
    if (!pending) return;
    this.pendingRead = null;
    pending.reject(this.failure);
  }
}
