import { CaptureChannel, DEFAULT_DATA_PORT } from './captureChannel';
import {
  ControlChannel,
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_CONTROL_PORT,
} from './controlChannel';
import { DeviceError, ProtocolError } from './errors';
import { FieldPath, resolvePath } from './fieldPath';
import {
  FieldValue,
  ScalarValue,
  parseChanges,
  parseReply,
  replyToValue,
} from './responseParser';
import {
  DEFAULT_TABLE_SUFFIXES,
  TableMode,
  TableSuffixes,
  encodeTable,
  parseTableCommand,
} from './tableEncoder';

export interface PandaClientOptions {
  host: string;
  controlPort?: number;
  dataPort?: number;
  connectTimeoutMs?: number;
  suffixes?: TableSuffixes;
}

/** A field path bound to the client that reads and writes it. */
export class FieldHandle {
  readonly path: FieldPath;

  private readonly client: PandaClient;

  constructor(path: FieldPath, client: PandaClient) {
    this.path = path;
    this.client = client;
  }

  child(name: string): FieldHandle {
    return new FieldHandle(this.path.child(name), this.client);
  }

  get(): Promise<FieldValue> {
    return this.client.get(this.path);
  }

  put(value: ScalarValue | Uint32Array): Promise<void> {
    return this.client.put(this.path, value);
  }

  toString(): string {
    return this.path.toString();
  }
}

/**
 * One control-port session. The field snapshot is fetched with
 * `*CHANGES?` on connect and only refreshed by {@link refreshMetadata}.
 */
export class PandaClient {
  readonly host: string;

  private readonly channel: ControlChannel;

  private readonly dataPort: number;

  private readonly connectTimeoutMs: number;

  private readonly suffixes: TableSuffixes;

  private fields: string[] = [];

  private captureFields: string[] = [];

  private instances = new Set<string>();

  constructor(options: PandaClientOptions) {
    this.host = options.host;
    this.dataPort = options.dataPort ?? DEFAULT_DATA_PORT;
    this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
    this.suffixes = options.suffixes ?? DEFAULT_TABLE_SUFFIXES;
    this.channel = new ControlChannel({
      host: options.host,
      port: options.controlPort ?? DEFAULT_CONTROL_PORT,
      connectTimeoutMs: this.connectTimeoutMs,
    });
  }

  async connect() {
    await this.channel.connect();
    await this.refreshMetadata();
  }

  close(): Promise<void> {
    return this.channel.close();
  }

  field(path: string | FieldPath): FieldHandle {
    return new FieldHandle(resolvePath(path), this);
  }

  get fieldNames(): readonly string[] {
    return this.fields;
  }

  async refreshMetadata() {
    const changes = parseChanges(await this.channel.request('*CHANGES?'));

    this.fields = [];
    this.captureFields = [];
    this.instances = new Set();
    for (const name of changes.keys()) {
      if (name.endsWith('.CAPTURE')) this.captureFields.push(name);
      this.fields.push(name);
      this.instances.add(name.split('.')[0]);
    }
  }

  /** First block instance, in sorted order, whose name starts with `prefix`. */
  findFirstInstance(prefix: string): string {
    const sorted = [...this.instances].sort();
    return sorted.find((instance) => instance.startsWith(prefix)) ?? '';
  }

  findMatching(pattern: string | RegExp): string[] {
    // a g or y flag would carry lastIndex from one name to the next
    const regex = typeof pattern === 'string'
      ? new RegExp(pattern)
      : new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''));
    return this.fields.filter((name) => regex.test(name));
  }

  async get(path: string | FieldPath): Promise<FieldValue> {
    const name = resolvePath(path).toString();
    const reply = await this.channel.request(`${name}?`);
    try {
      return replyToValue(parseReply(reply));
    } catch (error) {
      if (error instanceof DeviceError) {
        throw new DeviceError(error.message, { path: name, reply: error.reply });
      }
      throw error;
    }
  }

  async getNumber(path: string | FieldPath): Promise<number> {
    const value = await this.get(path);
    if (typeof value !== 'number') {
      throw new ProtocolError(`Expected a number from ${resolvePath(path)}, got ${JSON.stringify(value)}`);
    }
    return value;
  }

  async put(path: string | FieldPath, value: ScalarValue | Uint32Array) {
    const name = resolvePath(path).toString();
    if (value instanceof Uint32Array) {
      await this.putTable(name, value);
      return;
    }
    const reply = await this.channel.request(`${name}=${value}`);
    expectOk(name, reply);
  }

  async putTable(path: string | FieldPath, content: ArrayLike<number>, mode: TableMode = 'single') {
    const name = resolvePath(path).toString();
    const reply = await this.channel.request(encodeTable(name, content, mode, this.suffixes));
    expectOk(name, reply);
  }

  async disableCaptures() {
    for (const field of this.captureFields) {
      await this.put(field, 'No');
    }
  }

  async arm() {
    expectOk('*PCAP.ARM', await this.channel.request('*PCAP.ARM='));
  }

  async disarm() {
    expectOk('*PCAP.DISARM', await this.channel.request('*PCAP.DISARM='));
  }

  /**
   * Replay a saved state dump: one command per line, except table writes
   * which run from their open line up to the blank line that ends them.
   */
  async loadState(state: string) {
    let table: string[] | null = null;
    for (const line of state.split(/\r?\n/)) {
      if (table) {
        table.push(line);
        if (line === '') {
          expectOk(table[0], await this.channel.request(table));
          table = null;
        }
        continue;
      }
      if (parseTableCommand(line)) {
        table = [line];
        continue;
      }
      if (line.trim() === '') continue;
      expectOk(line, await this.channel.request(line));
    }
    if (table) {
      throw new ProtocolError(`State ends inside table write ${table[0]}`);
    }
  }

  /** New capture-port reader for this host; caller owns its lifecycle. */
  createCaptureChannel(): CaptureChannel {
    return new CaptureChannel({
      host: this.host,
      port: this.dataPort,
      connectTimeoutMs: this.connectTimeoutMs,
    });
  }
}

function expectOk(name: string, reply: Buffer) {
  const text = reply.toString('utf8');
  if (text.startsWith('OK')) return;
  const message = text.startsWith('ERR') ? text.slice(3).trim() : `Unexpected reply ${JSON.stringify(text.trim())}`;
  throw new DeviceError(`Error putting ${name}: ${message}`, { path: name, reply: text });
}
