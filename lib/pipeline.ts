import {
  Block, SEQ_WORDS_PER_LINE, countingBlock, sequencerBlock,
} from './blocks';
import { BoundedQueue, Mutex, OneShotSignal } from './channels';
import {
  ProgressReporter, capturedWords, checkCountingWords, checkSequencerBlock,
} from './checkers';
import { RunOptions, clockTicks } from './config';
import { VerificationError } from './errors';
import { FlowControlledInjector, InjectionStats } from './injector';
import { configurePgenLayout, configureSeqLayout, readSeqOffsets } from './layouts';
import { Logger, createLogger, silentLogger } from './logger';
import { PandaClient } from './pandaClient';
import { StageGroup } from './stageGroup';
import { BYTES_PER_WORD } from './tableEncoder';

const MIB = 1024 ** 2;

export interface PipelineHooks {
  loggerFactory?: (tag: string) => Logger;
  /** Source of SEQ table values, uniform in [0, 1). */
  random?: () => number;
}

export interface RunResult {
  checked: number;
  expected: number;
  blocks: number;
  polls: number;
  elapsedMs: number;
  /** Captured payload over wall-clock time. */
  bandwidthMiBps: number;
}

const END_OF_STREAM = Symbol('end-of-stream');
type EndOfStream = typeof END_OF_STREAM;

interface CapturedBlock {
  index: number;
  data: Buffer;
}

function sleep(ms: number) {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

function loggerFactoryFor(options: RunOptions, hooks: PipelineHooks): (tag: string) => Logger {
  if (options.quiet) return () => silentLogger;
  return hooks.loggerFactory ?? createLogger;
}

function newClient(options: RunOptions): PandaClient {
  return new PandaClient({
    host: options.host,
    controlPort: options.controlPort,
    dataPort: options.dataPort,
    connectTimeoutMs: options.connectTimeoutMs,
  });
}

/** Connect a per-stage client that the group closes if any stage fails. */
async function openStageClient(options: RunOptions, group: StageGroup): Promise<PandaClient> {
  const client = newClient(options);
  await client.connect();
  group.onAbort(() => client.close());
  return client;
}

async function waitUntilInactive(client: PandaClient, activeField: string, pollMs: number) {
  while (await client.getNumber(activeField)) {
    await sleep(pollMs);
  }
}

function summarize(
  checked: number,
  expected: number,
  injection: InjectionStats | undefined,
  started: number,
): RunResult {
  const elapsedMs = Date.now() - started;
  return {
    checked,
    expected,
    blocks: injection?.blocks ?? 0,
    polls: injection?.polls ?? 0,
    elapsedMs,
    bandwidthMiBps: elapsedMs > 0 ? (checked * BYTES_PER_WORD) / MIB / (elapsedMs / 1000) : 0,
  };
}

function assertComplete(checked: number, expected: number) {
  if (checked !== expected) {
    throw new VerificationError(`Expected ${expected} lines, got ${checked}`, { expected, actual: checked });
  }
}

/**
 * PGEN soak test: counting tables streamed into PGEN, each captured word
 * compared with its position in the counter sequence.
 */
export async function runPgenTest(options: RunOptions, hooks: PipelineHooks = {}): Promise<RunResult> {
  const loggerFor = loggerFactoryFor(options, hooks);
  const log = loggerFor('pgen');
  const ticks = clockTicks(options);
  const expectedLines = options.linesPerBlock * options.nblocks * options.repeats;
  log.log(`Lines per block ${options.linesPerBlock}`);
  log.log(`Number of blocks ${options.nblocks}`);
  log.log(`Clock period ${options.clockPeriodUs} us`);
  log.log(`Bandwidth ${(4 / (options.clockPeriodUs * 1e-6) / MIB).toFixed(3)} MiB/s`);
  log.log(`Total size ${((options.linesPerBlock * options.nblocks * 4) / MIB).toFixed(3)} MiB`);

  const started = Date.now();
  const main = newClient(options);
  await main.connect();
  try {
    const layout = await configurePgenLayout(main);
    const group = new StageGroup(log);
    group.onAbort(() => main.close());
    const bufferQueue = group.track(new BoundedQueue<Block>(options.queueCapacity));
    const captureQueue = group.track(new BoundedQueue<Buffer | EndOfStream>(options.queueCapacity));
    const firstBlockReady = group.track(new OneShotSignal());
    const armed = group.track(new OneShotSignal());
    let injection: InjectionStats | undefined;
    let checked = 0;

    group.spawn('producer', async () => {
      for (let i = 0; i < options.nblocks; i += 1) {
        await bufferQueue.put(countingBlock(i, options.startNumber, options.linesPerBlock));
      }
    });

    group.spawn('injector', async () => {
      const client = await openStageClient(options, group);
      try {
        await client.put(`${layout.pgen}.REPEATS`, options.repeats);
        await client.put(`${layout.clock}.PERIOD.RAW`, ticks);
        const injector = new FlowControlledInjector(client, {
          table: `${layout.pgen}.TABLE`,
          linesPerBlock: options.linesPerBlock,
          maxBlocksQueued: options.maxBlocksQueued,
          pollIntervalMs: options.pollIntervalMs,
          firstBlockReady,
          logger: loggerFor('pgen-push'),
          tag: 'pgen',
        });
        injection = await injector.run(options.nblocks, async () => {
          const block = await bufferQueue.get();
          const first = block.expected[0];
          const last = block.expected[block.expected.length - 1];
          log.log(`Pushing table ${block.index} from ${first} to ${last}`);
          return block.content;
        });
      } finally {
        await client.close();
      }
    });

    group.spawn('pcap', async () => {
      const client = await openStageClient(options, group);
      const capture = client.createCaptureChannel();
      group.onAbort(() => capture.close());
      try {
        await client.disableCaptures();
        await client.put(`${layout.pgen}.OUT.CAPTURE`, 'Value');
        await capture.open();
        await client.arm();
        armed.set();
        for await (const chunk of capture.chunks()) {
          await captureQueue.put(chunk);
        }
        await captureQueue.put(END_OF_STREAM);
      } finally {
        capture.close();
        await client.close();
      }
    });

    group.spawn('checker', async () => {
      const progress = new ProgressReporter(loggerFor('pcap'), options.printPeriodMs);
      for (;;) {
        const item = await captureQueue.get();
        if (item === END_OF_STREAM) break;
        const words = capturedWords(item, `line ${checked}`);
        checked += checkCountingWords(words, checked, {
          startNumber: options.startNumber,
          linesPerBlock: options.linesPerBlock,
          repeats: options.repeats,
          total: expectedLines,
        });
        progress.update(checked, words[words.length - 1]);
      }
    });

    group.spawn('enable', async () => {
      await Promise.all([firstBlockReady.wait(), armed.wait()]);
      await main.put(`${layout.pgen}.ENABLE`, 'ZERO');
      log.log('Enabling PGEN');
      await main.put(`${layout.pgen}.ENABLE`, 'ONE');
    });

    try {
      await group.join();
    } finally {
      log.log(`Checked ${checked} lines of ${expectedLines} expected`);
    }

    await waitUntilInactive(main, `${layout.pgen}.ACTIVE`, options.activePollMs);
    log.log(`PGEN OUT value: ${await main.get(`${layout.pgen}.OUT`)}`);
    assertComplete(checked, expectedLines);
    const result = summarize(checked, expectedLines, injection, started);
    log.log(`Checked ${checked} lines in ${(result.elapsedMs / 1000).toFixed(3)} s, ${result.bandwidthMiBps.toFixed(3)} MiB/s`);
    return result;
  } finally {
    await main.close();
  }
}

/**
 * SEQ soak test: random 6-bit patterns per line, checked against the SEQ
 * output bits captured in one PCAP BITS word. Captured and expected blocks
 * travel in separate index-correlated queues; checkers take one of each
 * under a lock so that several checkers still pair them correctly.
 */
export async function runSeqTest(options: RunOptions, hooks: PipelineHooks = {}): Promise<RunResult> {
  const loggerFor = loggerFactoryFor(options, hooks);
  const log = loggerFor('seq');
  const random = hooks.random ?? Math.random;
  const ticks = clockTicks(options);
  const outTicks = Math.floor(ticks / 2);
  const expectedLines = options.linesPerBlock * options.nblocks * options.repeats;
  const expectedBlocks = options.nblocks * options.repeats;
  log.log(`Lines per block: ${options.linesPerBlock}`);
  log.log(`Number of blocks: ${options.nblocks}`);
  log.log(`Total lines: ${expectedLines}`);
  log.log(`Clock period: ${options.clockPeriodUs} us`);
  log.log(`Bandwidth: ${((16 * 1e6) / (options.clockPeriodUs * MIB)).toFixed(3)} MiB/s`);
  log.log(`Total size: ${((options.linesPerBlock * options.nblocks * 16) / MIB).toFixed(3)} MiB`);

  const started = Date.now();
  const main = newClient(options);
  await main.connect();
  try {
    const layout = await configureSeqLayout(main);
    const { bitsWord, offsets } = await readSeqOffsets(main, layout.seq);
    log.log(`Seq out bits offsets ${offsets.join(',')} from BITS${bitsWord}`);

    const group = new StageGroup(log);
    group.onAbort(() => main.close());
    const bufferQueue = group.track(new BoundedQueue<Block>(options.queueCapacity));
    const expectQueue = group.track(new BoundedQueue<number[]>(options.queueCapacity));
    const captureQueue = group.track(new BoundedQueue<CapturedBlock | EndOfStream>(options.queueCapacity));
    const firstBlockReady = group.track(new OneShotSignal());
    const armed = group.track(new OneShotSignal());
    const lock = new Mutex();
    let injection: InjectionStats | undefined;
    let captured = 0;
    let checked = 0;
    let replayed: number[] | null = null;

    const perProducer = options.nblocks / options.producerThreads;
    for (let p = 0; p < options.producerThreads; p += 1) {
      const producerLog = loggerFor(`producer ${p}`);
      group.spawn(`producer ${p}`, async () => {
        for (let i = 0; i < perProducer; i += 1) {
          const block = sequencerBlock(p * perProducer + i, options.linesPerBlock, outTicks, random);
          await bufferQueue.put(block);
          producerLog.log(`local block ${i} with start value ${block.expected[0]} was added`);
        }
      });
    }

    group.spawn('injector', async () => {
      const client = await openStageClient(options, group);
      try {
        await client.put(`${layout.seq}.REPEATS`, options.repeats);
        await client.put(`${layout.clock}.PERIOD.RAW`, ticks);
        const injector = new FlowControlledInjector(client, {
          table: `${layout.seq}.TABLE`,
          linesPerBlock: options.linesPerBlock,
          maxBlocksQueued: options.maxBlocksQueued,
          pollIntervalMs: options.pollIntervalMs,
          firstBlockReady,
          logger: log,
          tag: 'seq',
        });
        let line = 0;
        injection = await injector.run(options.nblocks, async (i) => {
          const block = await bufferQueue.get();
          await expectQueue.put(block.expected);
          log.log(`seq: pushing table ${i} line ${line} expected start ${block.expected[0]}`);
          line += block.content.length / SEQ_WORDS_PER_LINE;
          return block.content;
        });
      } finally {
        await client.close();
      }
    });

    group.spawn('pcap', async () => {
      const pcapLog = loggerFor('pcap');
      const client = await openStageClient(options, group);
      const capture = client.createCaptureChannel();
      group.onAbort(() => capture.close());
      try {
        await client.disableCaptures();
        await client.put(`PCAP.BITS${bitsWord}.CAPTURE`, 'Value');
        await capture.open();
        await client.arm();
        armed.set();
        let nblock = 0;
        // one BITS word per table line
        for await (const data of capture.chunks({ nbytes: options.linesPerBlock * BYTES_PER_WORD })) {
          pcapLog.log(`pcap ${nblock}: block with ${Math.floor(data.length / BYTES_PER_WORD)} lines`);
          await captureQueue.put({ index: nblock, data });
          captured += Math.floor(data.length / BYTES_PER_WORD);
          nblock += 1;
        }
        pcapLog.log(`Captured ${captured} values`);
        for (let c = 0; c < options.checkerThreads; c += 1) {
          await captureQueue.put(END_OF_STREAM);
        }
      } finally {
        capture.close();
        await client.close();
      }
      if (captured !== expectedLines) {
        throw new VerificationError(`pcap: expected ${expectedLines} values, got ${captured}`, {
          expected: expectedLines, actual: captured,
        });
      }
    });

    const nextPair = () => lock.runExclusive(async () => {
      const item = await captureQueue.get();
      if (item === END_OF_STREAM) return null;
      if (item.index >= expectedBlocks) {
        throw new VerificationError(`checker: received block ${item.index} but only ${expectedBlocks} were injected`, {
          index: item.index,
        });
      }
      if (options.repeats > 1) {
        if (!replayed) replayed = await expectQueue.get();
        return { item, expected: replayed };
      }
      return { item, expected: await expectQueue.get() };
    });

    for (let c = 0; c < options.checkerThreads; c += 1) {
      const checkerLog = loggerFor(`checker ${c}`);
      group.spawn(`checker ${c}`, async () => {
        for (;;) {
          const pair = await nextPair();
          if (!pair) break;
          const { item, expected } = pair;
          checkerLog.log(
            `Checking block line ${item.index * options.linesPerBlock} starting with ${expected[0]}`,
          );
          const words = capturedWords(item.data, `checker ${item.index}`);
          checked += checkSequencerBlock(item.index, words, expected, offsets);
        }
      });
    }

    group.spawn('enable', async () => {
      await Promise.all([firstBlockReady.wait(), armed.wait()]);
      await main.put(`${layout.seq}.ENABLE`, 'ZERO');
      log.log('Enabling SEQ');
      await main.put(`${layout.seq}.ENABLE`, 'ONE');
    });

    try {
      await group.join();
    } finally {
      log.log(`Checked ${checked} lines of ${expectedLines} expected (${captured} captured)`);
    }

    await waitUntilInactive(main, `${layout.seq}.ACTIVE`, options.activePollMs);
    assertComplete(checked, expectedLines);
    const result = summarize(checked, expectedLines, injection, started);
    log.log(`Checked ${checked} lines in ${(result.elapsedMs / 1000).toFixed(3)} s, ${result.bandwidthMiBps.toFixed(3)} MiB/s`);
    return result;
  } finally {
    await main.close();
  }
}
