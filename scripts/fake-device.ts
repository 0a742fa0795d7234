import { DEFAULT_DATA_PORT } from '../lib/captureChannel';
import { parseNumber, splitArgs } from '../lib/config';
import { DEFAULT_CONTROL_PORT } from '../lib/controlChannel';
import { Logger, createLogger, silentLogger } from '../lib/logger';
import { FakeCaptureServer } from './fake-device/captureServer';
import { FakeControlServer } from './fake-device/controlServer';
import { FakeDeviceState } from './fake-device/state';

export interface FakeDeviceOptions {
  host: string;
  controlPort: number;
  dataPort: number;
  /** Lines each running table block emits per tick. */
  linesPerTick: number;
  tickMs: number;
  logTraffic: boolean;
  quiet: boolean;
}

export interface RunningFakeDevice {
  shutdown: () => Promise<void>;
  state: FakeDeviceState;
  controlServer: FakeControlServer;
  captureServer: FakeCaptureServer;
}

const VALUE_FLAGS = new Set<string>([
  '--host',
  '--control-port',
  '--data-port',
  '--lines-per-tick',
  '--tick-ms',
]);

export function parseArgs(argv: string[]): FakeDeviceOptions {
  const { flags } = splitArgs(argv, VALUE_FLAGS);
  return {
    host: flags.get('--host') ?? '127.0.0.1',
    controlPort: parseNumber(flags.get('--control-port'), DEFAULT_CONTROL_PORT),
    dataPort: parseNumber(flags.get('--data-port'), DEFAULT_DATA_PORT),
    linesPerTick: parseNumber(flags.get('--lines-per-tick'), 1024),
    tickMs: parseNumber(flags.get('--tick-ms'), 10),
    logTraffic: flags.get('--log-traffic') === 'true',
    quiet: flags.get('--quiet') === 'true',
  };
}

export function printUsage() {
  console.log('Usage: app.ts fake-device [options]');
  console.log('');
  console.log('Options:');
  console.log('  --host <ip>                Listen address (default 127.0.0.1)');
  console.log(`  --control-port <port>      Control port (default ${DEFAULT_CONTROL_PORT})`);
  console.log(`  --data-port <port>         Capture port (default ${DEFAULT_DATA_PORT})`);
  console.log('  --lines-per-tick <n>       Table lines emitted per tick (default 1024)');
  console.log('  --tick-ms <ms>             Tick interval (default 10)');
  console.log('  --log-traffic              Log every control command');
  console.log('  --quiet                    Disable logging');
}

export async function startFakeDevice(
  options: FakeDeviceOptions,
  registerSignalHandlers = true,
): Promise<RunningFakeDevice> {
  const logger: Logger = options.quiet ? silentLogger : createLogger('FakeDevice');
  const state = new FakeDeviceState();

  const controlServer = new FakeControlServer(state, {
    host: options.host,
    port: options.controlPort,
    logger,
    logTraffic: options.logTraffic,
  });
  const captureServer = new FakeCaptureServer(state, {
    host: options.host,
    port: options.dataPort,
    logger,
  });
  await controlServer.start();
  try {
    await captureServer.start();
  } catch (error) {
    await controlServer.stop();
    throw error;
  }

  const tickTimer = setInterval(() => {
    state.tick(options.linesPerTick);
  }, options.tickMs);

  logger.log(`Control port listening on ${options.host}:${controlServer.port}`);
  logger.log(`Capture port listening on ${options.host}:${captureServer.port}`);
  logger.log(`Emitting ${options.linesPerTick} lines every ${options.tickMs}ms`);

  let stopped = false;
  const shutdown = async () => {
    if (stopped) return;
    stopped = true;
    clearInterval(tickTimer);
    if (registerSignalHandlers) {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
    }
    await Promise.all([controlServer.stop(), captureServer.stop()]);
  };

  const onSignal = () => {
    shutdown().catch((error) => {
      logger.error('Shutdown failed:', error);
    });
  };

  if (registerSignalHandlers) {
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
  }

  return {
    shutdown,
    state,
    controlServer,
    captureServer,
  };
}

export async function main(argv: string[]) {
  if (argv.includes('--help') || argv.includes('-h')) {
    printUsage();
    return null;
  }
  return startFakeDevice(parseArgs(argv), true);
}
