import { OneShotSignal } from './channels';
import { FieldPath, resolvePath } from './fieldPath';
import { Logger, silentLogger } from './logger';
import { TableMode, streamingMode } from './tableEncoder';

export const DEFAULT_POLL_INTERVAL_MS = 100;

/** The two client calls the injector needs; {@link PandaClient} satisfies it. */
export interface TableWriter {
  putTable(path: string | FieldPath, content: ArrayLike<number>, mode: TableMode): Promise<void>;
  getNumber(path: string | FieldPath): Promise<number>;
}

export interface InjectorOptions {
  /** Table field, e.g. `SEQ1.TABLE`. */
  table: string | FieldPath;
  linesPerBlock: number;
  /** Resume injecting once queued lines fall to this many blocks' worth. */
  maxBlocksQueued: number;
  pollIntervalMs?: number;
  /** Fired once the first block has been accepted by the device. */
  firstBlockReady?: OneShotSignal;
  logger?: Logger;
  tag?: string;
  sleep?: (ms: number) => Promise<void>;
}

export interface InjectionStats {
  blocks: number;
  polls: number;
  waitingMs: number;
  sendingMs: number;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Pushes blocks into a streaming table upload, holding back the next block
 * while the device reports more than `maxBlocksQueued * linesPerBlock`
 * queued lines. The device offers no credit protocol, so this polls the
 * queue depth field.
 */
export class FlowControlledInjector {
  private readonly client: TableWriter;

  private readonly table: FieldPath;

  private readonly queuePath: FieldPath;

  private readonly threshold: number;

  private readonly pollIntervalMs: number;

  private readonly firstBlockReady?: OneShotSignal;

  private readonly logger: Logger;

  private readonly tag: string;

  private readonly sleep: (ms: number) => Promise<void>;

  constructor(client: TableWriter, options: InjectorOptions) {
    this.client = client;
    this.table = resolvePath(options.table);
    this.queuePath = this.table.child('QUEUED_LINES');
    this.threshold = options.maxBlocksQueued * options.linesPerBlock;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.firstBlockReady = options.firstBlockReady;
    this.logger = options.logger ?? silentLogger;
    this.tag = options.tag ?? 'inject';
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Inject `count` blocks obtained one at a time from `take`. Rejects with
   * the device error on the first write that is not acknowledged.
   */
  async run(count: number, take: (index: number) => Promise<ArrayLike<number>>): Promise<InjectionStats> {
    const stats: InjectionStats = {
      blocks: 0, polls: 0, waitingMs: 0, sendingMs: 0,
    };

    for (let index = 0; index < count; index += 1) {
      const t1 = Date.now();
      const content = await take(index);
      const t2 = Date.now();
      const mode = streamingMode(index, count);
      await this.client.putTable(this.table, content, mode);
      const t3 = Date.now();
      this.firstBlockReady?.set();

      stats.blocks += 1;
      stats.waitingMs += t2 - t1;
      stats.sendingMs += t3 - t2;
      this.logger.log(
        `${this.tag} ${index}: ${mode} time waiting ${((t2 - t1) / 1000).toFixed(3)}`
        + ` time sending ${((t3 - t2) / 1000).toFixed(3)}`,
      );

      if (mode !== 'single' && mode !== 'streaming-last') {
        stats.polls += await this.waitForRoom();
      }
    }
    return stats;
  }

  /** Poll the queue depth until it is at or below the threshold; returns the number of reads. */
  async waitForRoom(): Promise<number> {
    let polls = 1;
    let queued = await this.client.getNumber(this.queuePath);
    while (queued > this.threshold) {
      await this.sleep(this.pollIntervalMs);
      queued = await this.client.getNumber(this.queuePath);
      polls += 1;
    }
    return polls;
  }
}
