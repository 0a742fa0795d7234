/** One unit of table data and the capture values it should produce. */
export interface Block {
  index: number;
  content: Uint32Array;
  expected: number[];
}

const WORD_MODULUS = 2 ** 32;

export const SEQ_WORDS_PER_LINE = 4;
export const SEQ_OUTPUT_BITS = 6;

/**
 * PGEN block: consecutive counter values starting at
 * `startNumber + index * linesPerBlock`, wrapping at 2^32.
 */
export function countingBlock(index: number, startNumber: number, linesPerBlock: number): Block {
  const content = new Uint32Array(linesPerBlock);
  const first = startNumber + index * linesPerBlock;
  for (let j = 0; j < linesPerBlock; j += 1) {
    content[j] = (first + j) % WORD_MODULUS;
  }
  return { index, content, expected: Array.from(content) };
}

/**
 * Value PGEN should output for capture line `line`. With repeats the
 * single table is replayed, so the counter restarts every block.
 */
export function countingExpectedValue(
  line: number,
  options: { startNumber: number; linesPerBlock: number; repeats: number },
): number {
  const offset = options.repeats > 1 ? line % options.linesPerBlock : line;
  return (options.startNumber + offset) % WORD_MODULUS;
}

/**
 * SEQ line: repeat once, trigger on BITA, drive the six outputs with
 * `value` in phase 1 for `outTicks` and leave phase 2 empty.
 */
export function sequencerLine(value: number, outTicks: number): [number, number, number, number] {
  const word1 = (0x20001 | ((value & 0x3f) << 20)) >>> 0;
  return [word1, 0, outTicks >>> 0, 0];
}

/** Output bits a sequencer line drives in phase 1. */
export function sequencerLineValue(word1: number): number {
  return (word1 >>> 20) & 0x3f;
}

export function sequencerBlock(
  index: number,
  linesPerBlock: number,
  outTicks: number,
  random: () => number = Math.random,
): Block {
  const content = new Uint32Array(linesPerBlock * SEQ_WORDS_PER_LINE);
  const expected: number[] = [];
  for (let j = 0; j < linesPerBlock; j += 1) {
    const value = Math.floor(random() * 64) & 0x3f;
    content.set(sequencerLine(value, outTicks), j * SEQ_WORDS_PER_LINE);
    expected.push(value);
  }
  return { index, content, expected };
}

/** Collect the six SEQ output bits from a captured BITS word. */
export function decodeSequencerBits(word: number, offsets: readonly number[]): number {
  let value = 0;
  for (let bit = 0; bit < SEQ_OUTPUT_BITS; bit += 1) {
    if ((word >>> offsets[bit]) & 1) value |= 1 << bit;
  }
  return value;
}

/** Inverse of {@link decodeSequencerBits}; used by the fake device. */
export function encodeSequencerBits(value: number, offsets: readonly number[]): number {
  let word = 0;
  for (let bit = 0; bit < SEQ_OUTPUT_BITS; bit += 1) {
    if ((value >>> bit) & 1) word |= 1 << offsets[bit];
  }
  return word >>> 0;
}
