import { DEFAULT_DATA_PORT } from './captureChannel';
import { DEFAULT_CONNECT_TIMEOUT_MS, DEFAULT_CONTROL_PORT } from './controlChannel';
import { DEFAULT_POLL_INTERVAL_MS } from './injector';

export type TestKind = 'pgen' | 'seq';

export interface RunOptions {
  host: string;
  controlPort: number;
  dataPort: number;
  connectTimeoutMs: number;
  repeats: number;
  linesPerBlock: number;
  clockPeriodUs: number;
  startNumber: number;
  nblocks: number;
  fpgaFreq: number;
  maxBlocksQueued: number;
  checkerThreads: number;
  producerThreads: number;
  pollIntervalMs: number;
  activePollMs: number;
  printPeriodMs: number;
  queueCapacity: number;
  quiet: boolean;
}

const VALUE_FLAGS = new Set<string>([
  '--control-port',
  '--data-port',
  '--connect-timeout-ms',
  '--repeats',
  '--lines-per-block',
  '--clock-period-us',
  '--start-number',
  '--nblocks',
  '--fpga-freq',
  '--max-blocks-queued',
  '--checker-threads',
  '--producer-threads',
  '--poll-interval-ms',
]);

export function defaultRunOptions(kind: TestKind, host = ''): RunOptions {
  return {
    host,
    controlPort: DEFAULT_CONTROL_PORT,
    dataPort: DEFAULT_DATA_PORT,
    connectTimeoutMs: DEFAULT_CONNECT_TIMEOUT_MS,
    repeats: 1,
    linesPerBlock: 16384,
    clockPeriodUs: 0.4,
    startNumber: 0,
    nblocks: 1,
    fpgaFreq: 125_000_000,
    maxBlocksQueued: kind === 'pgen' ? 2 : 7,
    checkerThreads: 1,
    producerThreads: 1,
    pollIntervalMs: DEFAULT_POLL_INTERVAL_MS,
    activePollMs: 500,
    printPeriodMs: 3000,
    queueCapacity: 16,
    quiet: false,
  };
}

export function parseNumber(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function parseInteger(flag: string, value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new Error(`${flag} must be an integer, got "${value}"`);
  }
  return parsed;
}

/** Split `--flag value` pairs, bare `--switch`es and positionals. */
export function splitArgs(argv: string[], valueFlags: Set<string>) {
  const flags = new Map<string, string>();
  const positionals: string[] = [];
  for (let index = 0; index < argv.length; index += 1) {
    const part = argv[index];
    if (!part.startsWith('--')) {
      positionals.push(part);
      continue;
    }
    if (valueFlags.has(part)) {
      const next = argv[index + 1];
      if (next === undefined || next.startsWith('--')) {
        throw new Error(`Missing value for ${part}`);
      }
      flags.set(part, next);
      index += 1;
      continue;
    }
    flags.set(part, 'true');
  }
  return { flags, positionals };
}

export function validateRunOptions(kind: TestKind, options: RunOptions) {
  if (!options.host) throw new Error('host is required (positional argument or PANDA_HOST)');
  if (options.nblocks < 1) throw new Error('nblocks must be greater than 0');
  if (options.linesPerBlock < 1) throw new Error('lines-per-block must be greater than 0');
  if (options.repeats < 1) throw new Error('repeats must be greater than 0');
  if (options.repeats !== 1 && options.nblocks !== 1) {
    throw new Error('repeats and nblocks cannot be used together');
  }
  if (options.maxBlocksQueued < 1) throw new Error('max-blocks-queued must be greater than 0');
  if (kind === 'seq') {
    if (options.producerThreads < 1 || options.checkerThreads < 1) {
      throw new Error('producer-threads and checker-threads must be greater than 0');
    }
    if (options.nblocks % options.producerThreads !== 0) {
      throw new Error('nblocks must be divisible by number of producer threads');
    }
  }
}

export function parseRunArgs(
  kind: TestKind,
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
): RunOptions {
  const { flags, positionals } = splitArgs(argv, VALUE_FLAGS);
  const defaults = defaultRunOptions(kind, positionals[0] ?? env.PANDA_HOST ?? '');
  const options: RunOptions = {
    ...defaults,
    controlPort: parseInteger('--control-port', flags.get('--control-port'), defaults.controlPort),
    dataPort: parseInteger('--data-port', flags.get('--data-port'), defaults.dataPort),
    connectTimeoutMs: parseNumber(flags.get('--connect-timeout-ms'), defaults.connectTimeoutMs),
    repeats: parseInteger('--repeats', flags.get('--repeats'), defaults.repeats),
    linesPerBlock: parseInteger('--lines-per-block', flags.get('--lines-per-block'), defaults.linesPerBlock),
    clockPeriodUs: parseNumber(flags.get('--clock-period-us'), defaults.clockPeriodUs),
    startNumber: parseInteger('--start-number', flags.get('--start-number'), defaults.startNumber),
    nblocks: parseInteger('--nblocks', flags.get('--nblocks'), defaults.nblocks),
    fpgaFreq: parseInteger('--fpga-freq', flags.get('--fpga-freq'), defaults.fpgaFreq),
    maxBlocksQueued: parseInteger('--max-blocks-queued', flags.get('--max-blocks-queued'), defaults.maxBlocksQueued),
    checkerThreads: parseInteger('--checker-threads', flags.get('--checker-threads'), defaults.checkerThreads),
    producerThreads: parseInteger('--producer-threads', flags.get('--producer-threads'), defaults.producerThreads),
    pollIntervalMs: parseNumber(flags.get('--poll-interval-ms'), defaults.pollIntervalMs),
    quiet: flags.get('--quiet') === 'true',
  };
  validateRunOptions(kind, options);
  return options;
}

/** FPGA clock ticks per output clock period. */
export function clockTicks(options: Pick<RunOptions, 'clockPeriodUs' | 'fpgaFreq'>): number {
  return Math.floor(options.clockPeriodUs * 1e-6 * options.fpgaFreq);
}
