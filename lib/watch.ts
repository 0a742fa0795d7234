import { Logger } from './logger';
import type { PandaClient } from './pandaClient';
import { FieldValue } from './responseParser';

export interface WatchOptions {
  /** Seconds between snapshots. */
  periodS: number;
  /** Stop after this many snapshots; runs until aborted when omitted. */
  iterations?: number;
  signal?: AbortSignal;
  sleep?: (ms: number) => Promise<void>;
}

/** Resolves after `ms`, or as soon as `signal` aborts. */
export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Expand watch patterns against the field snapshot. A pattern that matches
 * nothing is kept as a literal field name so the device reports the error.
 */
export function resolveWatchFields(client: PandaClient, patterns: string[]): string[] {
  const fields: string[] = [];
  for (const pattern of patterns) {
    const matches = client.findMatching(pattern);
    for (const name of matches.length > 0 ? matches : [pattern.toUpperCase()]) {
      if (!fields.includes(name)) fields.push(name);
    }
  }
  return fields;
}

export function formatWatchValue(value: FieldValue): string {
  return Array.isArray(value) ? `[${value.join(', ')}]` : String(value);
}

export async function watchFields(
  client: PandaClient,
  patterns: string[],
  output: Logger,
  options: WatchOptions,
): Promise<number> {
  const fields = resolveWatchFields(client, patterns);
  const sleep = options.sleep ?? ((ms: number) => abortableSleep(ms, options.signal));
  let snapshots = 0;

  while (!options.signal?.aborted) {
    for (const name of fields) {
      output.log(`${name}: ${formatWatchValue(await client.get(name))}`);
    }
    snapshots += 1;
    if (options.iterations !== undefined && snapshots >= options.iterations) break;
    await sleep(options.periodS * 1000);
  }
  return snapshots;
}
