import { countingExpectedValue, decodeSequencerBits } from './blocks';
import { VerificationError } from './errors';
import { Logger } from './logger';
import { BYTES_PER_WORD, bufferToWords } from './tableEncoder';

export function capturedWords(data: Buffer, where: string): Uint32Array {
  if (data.length % BYTES_PER_WORD !== 0) {
    throw new VerificationError(`${where}: capture ended with a partial word (${data.length} bytes)`);
  }
  return bufferToWords(data);
}

/** Periodic `Checked a total of N lines` progress line. */
export class ProgressReporter {
  private readonly logger: Logger;

  private readonly periodMs: number;

  private lastReportAt = 0;

  constructor(logger: Logger, periodMs: number) {
    this.logger = logger;
    this.periodMs = periodMs;
  }

  update(checked: number, lastEntry: number | undefined, now = Date.now()) {
    if (now - this.lastReportAt <= this.periodMs) return;
    this.lastReportAt = now;
    this.logger.log(`Checked a total of ${checked} lines, last entry ${lastEntry}`);
  }
}

export interface CountingCheckOptions {
  startNumber: number;
  linesPerBlock: number;
  repeats: number;
  /** Total values the run should produce; more is a failure. */
  total: number;
}

/**
 * Verify PGEN output words starting at capture line `firstLine`.
 * Returns the number of words checked.
 */
export function checkCountingWords(words: Uint32Array, firstLine: number, options: CountingCheckOptions): number {
  if (firstLine + words.length > options.total) {
    throw new VerificationError(
      `Expected ${options.total} lines, got at least ${firstLine + words.length}`,
      { index: options.total },
    );
  }
  for (let j = 0; j < words.length; j += 1) {
    const line = firstLine + j;
    const expected = countingExpectedValue(line, options);
    if (words[j] !== expected) {
      throw new VerificationError(`Entry ${line} = ${words[j]}, expected ${expected}`, {
        index: line, expected, actual: words[j],
      });
    }
  }
  return words.length;
}

/** Verify one captured SEQ block against the values its table encoded. */
export function checkSequencerBlock(
  nblock: number,
  words: Uint32Array,
  expected: readonly number[],
  offsets: readonly number[],
): number {
  if (words.length !== expected.length) {
    throw new VerificationError(
      `checker ${nblock}: block has ${words.length} lines, expected ${expected.length}`,
      { index: nblock },
    );
  }
  for (let j = 0; j < words.length; j += 1) {
    const value = decodeSequencerBits(words[j], offsets);
    if (value !== expected[j]) {
      throw new VerificationError(`checker ${nblock}: line ${j} expects ${expected[j]}, got ${value}`, {
        index: j, expected: expected[j], actual: value,
      });
    }
  }
  return words.length;
}
