import net from 'net';

import { Logger, silentLogger } from '../../lib/logger';
import { wordsToBuffer } from '../../lib/tableEncoder';
import { FakeDeviceState } from './state';

export interface FakeCaptureServerOptions {
  host: string;
  port: number;
  logger?: Logger;
}

/**
 * Data port. Every connected client receives armed runs as raw
 * little-endian words and is ended when the run finishes. The
 * configuration line a client sends is only logged.
 */
export class FakeCaptureServer {
  private readonly state: FakeDeviceState;

  private readonly options: FakeCaptureServerOptions;

  private readonly logger: Logger;

  private readonly consumers = new Set<net.Socket>();

  private server: net.Server | null = null;

  private unsubscribe: (() => void) | null = null;

  constructor(state: FakeDeviceState, options: FakeCaptureServerOptions) {
    this.state = state;
    this.options = options;
    this.logger = options.logger ?? silentLogger;
  }

  get port(): number {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address.port : this.options.port;
  }

  async start() {
    if (this.server) return;
    const server = net.createServer((socket) => this.accept(socket));
    this.server = server;
    this.unsubscribe = this.state.subscribe({
      onCapture: (words) => this.broadcast(words),
      onRunEnd: () => this.endConsumers(),
    });
    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.options.port, this.options.host, () => {
        server.off('error', reject);
        resolve();
      });
    });
  }

  async stop() {
    const { server } = this;
    if (!server) return;
    this.server = null;
    this.unsubscribe?.();
    this.unsubscribe = null;
    for (const socket of this.consumers) socket.destroy();
    this.consumers.clear();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }

  private accept(socket: net.Socket) {
    this.consumers.add(socket);
    socket.setNoDelay(true);
    let header: string | null = '';

    socket.on('data', (chunk: Buffer) => {
      if (header === null) return;
      header += chunk.toString('utf8');
      const newline = header.indexOf('\n');
      if (newline < 0) return;
      this.logger.log(`capture client configured: ${header.slice(0, newline)}`);
      header = null;
    });
    socket.on('error', (error) => {
      this.logger.error('capture socket error', error.message);
    });
    socket.on('close', () => {
      this.consumers.delete(socket);
    });
  }

  private broadcast(words: Uint32Array) {
    const payload = wordsToBuffer(words);
    for (const socket of this.consumers) socket.write(payload);
  }

  private endConsumers() {
    for (const socket of this.consumers) socket.end();
    this.consumers.clear();
  }
}
