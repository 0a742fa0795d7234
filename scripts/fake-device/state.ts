import {
  SEQ_WORDS_PER_LINE,
  encodeSequencerBits,
  sequencerLineValue,
} from '../../lib/blocks';
import { FieldPath } from '../../lib/fieldPath';
import {
  DEFAULT_FIELD_VALUES,
  READ_ONLY_FIELDS,
  SEQ_OUTPUTS,
  TABLE_BLOCKS,
  TableBlockSpec,
  isEnabledValue,
} from './manifest';

export interface DeviceFailure {
  ok: false;
  message: string;
}

export interface DeviceSuccess<T> {
  ok: true;
  value: T;
}

export type DeviceResult<T> = DeviceSuccess<T> | DeviceFailure;

export interface FakeDeviceListener {
  onCapture?(words: Uint32Array): void;
  onRunEnd?(): void;
}

export interface FakeDeviceSnapshot {
  armed: boolean;
  running: string[];
  queuedLines: Record<string, number>;
  emittedLines: number;
  tableWrites: number;
}

const OK: DeviceSuccess<null> = { ok: true, value: null };

function failure(message: string): DeviceFailure {
  return { ok: false, message };
}

function normalize(name: string): string {
  return FieldPath.of(name).toString();
}

/**
 * Device-side table queue. Streaming writes append until the `<<|` write
 * marks the table complete; consumed lines are dropped unless the table is
 * retained for repeats.
 */
export class FakeTable {
  readonly block: string;

  readonly wordsPerLine: number;

  private words: number[] = [];

  private cursor = 0;

  private streaming = false;

  private isComplete = true;

  constructor(block: string, wordsPerLine: number) {
    this.block = block;
    this.wordsPerLine = wordsPerLine;
  }

  get complete(): boolean {
    return this.isComplete;
  }

  get lines(): number {
    return this.words.length / this.wordsPerLine;
  }

  get queuedLines(): number {
    return this.lines - this.cursor;
  }

  get content(): number[] {
    return [...this.words];
  }

  write(suffix: string, words: ArrayLike<number>): DeviceResult<null> {
    if (words.length % this.wordsPerLine !== 0) {
      return failure(`Table length ${words.length} is not a multiple of ${this.wordsPerLine}`);
    }
    switch (suffix) {
      case '<':
        this.reset();
        this.append(words);
        return OK;
      case '<<':
        if (!this.streaming) {
          this.reset();
          this.streaming = true;
          this.isComplete = false;
        }
        this.append(words);
        return OK;
      case '<<|':
        if (!this.streaming) this.reset();
        this.append(words);
        this.streaming = false;
        this.isComplete = true;
        return OK;
      default:
        return failure(`Unsupported table write ${suffix}`);
    }
  }

  /** Words of the next `count` queued lines; advances past them. */
  take(count: number, retain: boolean): number[] {
    const n = Math.min(count, this.queuedLines);
    const start = this.cursor * this.wordsPerLine;
    const taken = this.words.slice(start, start + n * this.wordsPerLine);
    this.cursor += n;
    if (!retain) {
      this.words.splice(0, this.cursor * this.wordsPerLine);
      this.cursor = 0;
    }
    return taken;
  }

  rewind() {
    this.cursor = 0;
  }

  private reset() {
    this.words = [];
    this.cursor = 0;
    this.streaming = false;
    this.isComplete = true;
  }

  private append(words: ArrayLike<number>) {
    for (let i = 0; i < words.length; i += 1) this.words.push(words[i] >>> 0);
  }
}

interface Run {
  table: FakeTable;
  spec: TableBlockSpec;
  repeats: number;
  repeatsDone: number;
}

/**
 * Field store and table engine behind the fake control and capture
 * servers. Table blocks run while enabled, emitting one capture word per
 * line on each {@link tick}.
 */
export class FakeDeviceState {
  private readonly values = new Map<string, string>();

  private readonly tables = new Map<string, FakeTable>();

  private readonly runs = new Map<string, Run>();

  private readonly listeners = new Set<FakeDeviceListener>();

  private armed = false;

  private emittedLines = 0;

  private tableWrites = 0;

  constructor() {
    for (const [name, value] of Object.entries(DEFAULT_FIELD_VALUES)) {
      this.values.set(name, value);
    }
    for (const [block, spec] of Object.entries(TABLE_BLOCKS)) {
      this.tables.set(block, new FakeTable(block, spec.wordsPerLine));
    }
  }

  get isArmed(): boolean {
    return this.armed;
  }

  subscribe(listener: FakeDeviceListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  table(block: string): FakeTable | undefined {
    return this.tables.get(normalize(block));
  }

  /** `*CHANGES?` entries: every field as `NAME=value` plus one marker per table. */
  changes(): string[] {
    const entries: string[] = [];
    for (const name of this.values.keys()) {
      entries.push(`${name}=${this.read(name)}`);
    }
    for (const block of this.tables.keys()) entries.push(`${block}.TABLE<`);
    return entries;
  }

  get(name: string): DeviceResult<string | number[]> {
    const key = normalize(name);
    const table = this.tableFor(key);
    if (table) return { ok: true, value: table.content };
    if (!this.values.has(key)) return failure('No such field');
    return { ok: true, value: this.read(key) };
  }

  put(name: string, value: string): DeviceResult<null> {
    const key = normalize(name);
    if (this.tableFor(key)) return failure('Table fields take table writes');
    if (!this.values.has(key)) return failure('No such field');
    if (READ_ONLY_FIELDS.has(key)) return failure('Field is read only');

    const previous = this.values.get(key) ?? '';
    this.values.set(key, value);
    const [block, field] = key.split('.');
    if (field === 'ENABLE' && key === `${block}.ENABLE` && this.tables.has(block)) {
      if (isEnabledValue(value) && !isEnabledValue(previous)) this.startRun(block);
      if (!isEnabledValue(value)) this.endRun(block);
    }
    return OK;
  }

  writeTable(name: string, suffix: string, words: ArrayLike<number>): DeviceResult<null> {
    const table = this.tableFor(normalize(name));
    if (!table) return failure('Not a table field');
    const result = table.write(suffix, words);
    if (result.ok) this.tableWrites += 1;
    return result;
  }

  arm(): DeviceResult<null> {
    if (this.armed) return failure('Data capture already armed');
    this.armed = true;
    this.values.set('PCAP.ACTIVE', '1');
    return OK;
  }

  disarm(): DeviceResult<null> {
    if (this.armed) this.finishCapture();
    return OK;
  }

  /** Run every enabled table block for up to `maxLines` lines. */
  tick(maxLines: number) {
    for (const [block, run] of [...this.runs]) {
      const words = this.emit(block, run, maxLines);
      if (words.length > 0 && this.armed) {
        const capture = Uint32Array.from(words);
        for (const listener of this.listeners) listener.onCapture?.(capture);
      }
      if (run.table.complete && run.table.queuedLines === 0) {
        run.repeatsDone += 1;
        if (run.repeats === 0 || run.repeatsDone < run.repeats) {
          run.table.rewind();
        } else {
          this.endRun(block);
        }
      }
    }
  }

  snapshot(): FakeDeviceSnapshot {
    const queuedLines: Record<string, number> = {};
    for (const [block, table] of this.tables) queuedLines[block] = table.queuedLines;
    return {
      armed: this.armed,
      running: [...this.runs.keys()],
      queuedLines,
      emittedLines: this.emittedLines,
      tableWrites: this.tableWrites,
    };
  }

  private read(key: string): string {
    const [block] = key.split('.');
    const table = this.tables.get(block);
    if (table && key === `${block}.TABLE.QUEUED_LINES`) return String(table.queuedLines);
    return this.values.get(key) ?? '';
  }

  private tableFor(key: string): FakeTable | undefined {
    const [block, field, ...rest] = key.split('.');
    if (field !== 'TABLE' || rest.length > 0) return undefined;
    return this.tables.get(block);
  }

  private startRun(block: string) {
    const table = this.tables.get(block);
    const spec = TABLE_BLOCKS[block];
    if (!table || !spec) return;
    const repeats = Number.parseInt(this.values.get(`${block}.REPEATS`) ?? '1', 10);
    table.rewind();
    this.runs.set(block, {
      table, spec, repeats: Number.isFinite(repeats) ? repeats : 1, repeatsDone: 0,
    });
    this.values.set(`${block}.ACTIVE`, '1');
  }

  private endRun(block: string) {
    if (!this.runs.delete(block)) return;
    this.values.set(`${block}.ACTIVE`, '0');
    // one-shot capture finishes with the acquisition
    if (this.armed && this.runs.size === 0) this.finishCapture();
  }

  private finishCapture() {
    this.armed = false;
    this.values.set('PCAP.ACTIVE', '0');
    for (const listener of this.listeners) listener.onRunEnd?.();
  }

  private emit(block: string, run: Run, maxLines: number): number[] {
    const taken = run.table.take(maxLines, run.repeats !== 1);
    const captured: number[] = [];
    if (run.spec.wordsPerLine === SEQ_WORDS_PER_LINE) {
      const offsets = SEQ_OUTPUTS.map((out) => Number(this.values.get(`${block}.${out}.OFFSET`) ?? 0));
      for (let i = 0; i < taken.length; i += SEQ_WORDS_PER_LINE) {
        const value = sequencerLineValue(taken[i]);
        SEQ_OUTPUTS.forEach((out, bit) => this.values.set(`${block}.${out}`, String((value >>> bit) & 1)));
        captured.push(encodeSequencerBits(value, offsets));
      }
    } else {
      for (const word of taken) {
        this.values.set(run.spec.output, String(word));
        captured.push(word);
      }
    }
    this.emittedLines += captured.length;
    return captured;
  }
}
