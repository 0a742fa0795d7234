#!/usr/bin/env node
import sourceMapSupport from 'source-map-support';

import {
  TestKind,
  parseNumber,
  parseRunArgs,
  splitArgs,
} from './lib/config';
import { DEFAULT_CONTROL_PORT } from './lib/controlChannel';
import { describeError } from './lib/errors';
import { createLogger } from './lib/logger';
import { PandaClient } from './lib/pandaClient';
import { runPgenTest, runSeqTest } from './lib/pipeline';
import { watchFields } from './lib/watch';
import { main as fakeDeviceMain } from './scripts/fake-device';

sourceMapSupport.install();

const WATCH_VALUE_FLAGS = new Set<string>(['--watch-period', '--control-port']);

export function printUsage() {
  console.log('Usage: app.ts <command> [options]');
  console.log('');
  console.log('Commands:');
  console.log('  pgen <host>                Stream counting tables through PGEN and verify the capture');
  console.log('  seq <host>                 Stream random SEQ tables and verify the captured output bits');
  console.log('  watch <host> <names>       Print field values (comma-separated regexes) periodically');
  console.log('  fake-device                Run the protocol simulator (see fake-device --help)');
  console.log('');
  console.log('Test options (pgen, seq):');
  console.log('  --repeats <n>              Table repeats, only with --nblocks 1 (default 1)');
  console.log('  --lines-per-block <n>      Lines per table block (default 16384)');
  console.log('  --nblocks <n>              Blocks to stream (default 1)');
  console.log('  --clock-period-us <us>     Output clock period (default 0.4)');
  console.log('  --start-number <n>         First counter value, pgen only (default 0)');
  console.log('  --fpga-freq <hz>           FPGA clock (default 125000000)');
  console.log('  --max-blocks-queued <n>    Queue depth limit in blocks (default 2 pgen, 7 seq)');
  console.log('  --producer-threads <n>     SEQ producer tasks (default 1)');
  console.log('  --checker-threads <n>      SEQ checker tasks (default 1)');
  console.log('  --poll-interval-ms <ms>    Queue depth poll interval (default 100)');
  console.log('  --control-port <port>      Control port (default 8888)');
  console.log('  --data-port <port>         Capture port (default 8889)');
  console.log('  --quiet                    Only report failures');
  console.log('');
  console.log('The host may also be given as PANDA_HOST.');
}

async function runTest(kind: TestKind, argv: string[]) {
  const options = parseRunArgs(kind, argv);
  const run = kind === 'pgen' ? runPgenTest : runSeqTest;
  const result = await run(options);
  createLogger(kind).log(`Passed: ${result.checked} lines in ${(result.elapsedMs / 1000).toFixed(3)} s`);
}

export async function runWatch(argv: string[], env: NodeJS.ProcessEnv = process.env) {
  const { flags, positionals } = splitArgs(argv, WATCH_VALUE_FLAGS);
  const [first, second] = positionals;
  const host = second === undefined ? env.PANDA_HOST : first;
  const names = second === undefined ? first : second;
  if (!host || !names) throw new Error('Usage: app.ts watch <host> <names>');

  const client = new PandaClient({
    host,
    controlPort: parseNumber(flags.get('--control-port'), DEFAULT_CONTROL_PORT),
  });
  const controller = new AbortController();
  const onSignal = () => controller.abort();
  process.once('SIGINT', onSignal);
  try {
    await client.connect();
    await watchFields(client, names.split(','), createLogger('watch'), {
      periodS: parseNumber(flags.get('--watch-period'), 1),
      signal: controller.signal,
    });
  } finally {
    process.off('SIGINT', onSignal);
    await client.close();
  }
}

export async function main(argv = process.argv.slice(2)) {
  const command: string | undefined = argv[0];
  const rest = argv.slice(1);
  switch (command) {
    case 'pgen':
    case 'seq':
      if (rest.includes('--help') || rest.includes('-h')) {
        printUsage();
        return;
      }
      await runTest(command, rest);
      return;
    case 'watch':
      await runWatch(rest);
      return;
    case 'fake-device':
      await fakeDeviceMain(rest);
      return;
    case undefined:
    case '--help':
    case '-h':
      printUsage();
      return;
    default:
      printUsage();
      throw new Error(`Unknown command ${command}`);
  }
}

const isMainModule = typeof require !== 'undefined'
  && typeof module !== 'undefined'
  && require.main === module;

if (isMainModule) {
  main().catch((error) => {
    console.error(describeError(error));
    process.exitCode = 1;
  });
}
