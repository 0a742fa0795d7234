import net from 'net';

import { Logger, silentLogger } from '../../lib/logger';
import { decodeTableLines, parseTableCommand } from '../../lib/tableEncoder';
import { DeviceResult, FakeDeviceState } from './state';

export interface FakeControlServerOptions {
  host: string;
  port: number;
  logger?: Logger;
  logTraffic?: boolean;
}

interface PendingTable {
  path: string;
  suffix: string;
  lines: string[];
}

function ack(result: DeviceResult<null>): string {
  return result.ok ? 'OK' : `ERR ${result.message}`;
}

function listReply(entries: string[]): string {
  return [...entries.map((entry) => `!${entry}`), '.'].join('\n');
}

/**
 * Control-port session: one command per line, except table writes which
 * run from the `<path><suffix>B` line up to the next blank line.
 */
export class ControlSession {
  private readonly state: FakeDeviceState;

  private table: PendingTable | null = null;

  constructor(state: FakeDeviceState) {
    this.state = state;
  }

  /** Reply text for one received line, or `null` while a table is open. */
  handleLine(raw: string): string | null {
    const line = raw.replace(/\r$/, '');
    if (this.table) {
      if (line !== '') {
        this.table.lines.push(line);
        return null;
      }
      const pending = this.table;
      this.table = null;
      return this.finishTable(pending);
    }

    const tableCommand = parseTableCommand(line);
    if (tableCommand) {
      if (!tableCommand.binary) return 'ERR Only base64 table writes are supported';
      this.table = { path: tableCommand.path, suffix: tableCommand.suffix, lines: [] };
      return null;
    }

    if (line === '*CHANGES?') return listReply(this.state.changes());
    if (line === '*PCAP.ARM=') return ack(this.state.arm());
    if (line === '*PCAP.DISARM=') return ack(this.state.disarm());

    if (line.endsWith('?')) {
      const result = this.state.get(line.slice(0, -1));
      if (!result.ok) return `ERR ${result.message}`;
      if (Array.isArray(result.value)) return listReply(result.value.map(String));
      return `OK =${result.value}`;
    }

    const eq = line.indexOf('=');
    if (eq > 0) return ack(this.state.put(line.slice(0, eq), line.slice(eq + 1)));

    return `ERR Unknown command ${JSON.stringify(line)}`;
  }

  private finishTable(pending: PendingTable): string {
    let words: Uint32Array;
    try {
      words = decodeTableLines(pending.lines);
    } catch (error) {
      return `ERR ${error instanceof Error ? error.message : String(error)}`;
    }
    return ack(this.state.writeTable(pending.path, pending.suffix, words));
  }
}

export class FakeControlServer {
  private readonly state: FakeDeviceState;

  private readonly options: FakeControlServerOptions;

  private readonly logger: Logger;

  private readonly sockets = new Set<net.Socket>();

  private server: net.Server | null = null;

  constructor(state: FakeDeviceState, options: FakeControlServerOptions) {
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
    for (const socket of this.sockets) socket.destroy();
    this.sockets.clear();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }

  private accept(socket: net.Socket) {
    this.sockets.add(socket);
    socket.setNoDelay(true);
    const session = new ControlSession(this.state);
    let buffer = '';

    socket.on('data', (chunk: Buffer) => {
      buffer += chunk.toString('utf8');
      let newline = buffer.indexOf('\n');
      while (newline >= 0) {
        const line = buffer.slice(0, newline);
        buffer = buffer.slice(newline + 1);
        const reply = session.handleLine(line);
        if (reply !== null) {
          if (this.options.logTraffic) this.logger.log(`${line.slice(0, 60)} -> ${reply.split('\n')[0]}`);
          socket.write(`${reply}\n`);
        }
        newline = buffer.indexOf('\n');
      }
    });
    socket.on('error', (error) => {
      this.logger.error('control socket error', error.message);
    });
    socket.on('close', () => {
      this.sockets.delete(socket);
    });
  }
}
