import { ProtocolError } from './errors';

export type TableMode = 'single' | 'streaming-first' | 'streaming-continue' | 'streaming-last';

export type TableSuffixes = Record<TableMode, string>;

/**
 * `<` replaces the table, `<<` appends while streaming and `<<|` appends
 * the final block. Firmware revisions differ here, so callers may pass
 * their own map.
 */
export const DEFAULT_TABLE_SUFFIXES: TableSuffixes = {
  single: '<',
  'streaming-first': '<<',
  'streaming-continue': '<<',
  'streaming-last': '<<|',
};

/** 191 words = 764 bytes = 1020 base64 characters, under the 1024 line limit. */
export const WORDS_PER_LINE = 191;

export const BYTES_PER_WORD = 4;

export function streamingMode(index: number, count: number): TableMode {
  if (count <= 1) return 'single';
  if (index === count - 1) return 'streaming-last';
  if (index === 0) return 'streaming-first';
  return 'streaming-continue';
}

export function wordsToBuffer(words: ArrayLike<number>): Buffer {
  const buffer = Buffer.alloc(words.length * BYTES_PER_WORD);
  for (let i = 0; i < words.length; i += 1) {
    buffer.writeUInt32LE(words[i] >>> 0, i * BYTES_PER_WORD);
  }
  return buffer;
}

export function bufferToWords(buffer: Buffer): Uint32Array {
  if (buffer.length % BYTES_PER_WORD !== 0) {
    throw new ProtocolError(`Buffer of ${buffer.length} bytes is not word aligned`);
  }
  const words = new Uint32Array(buffer.length / BYTES_PER_WORD);
  for (let i = 0; i < words.length; i += 1) {
    words[i] = buffer.readUInt32LE(i * BYTES_PER_WORD);
  }
  return words;
}

export function encodeTableLines(content: ArrayLike<number>, wordsPerLine = WORDS_PER_LINE): string[] {
  const bytes = wordsToBuffer(content);
  const chunkBytes = wordsPerLine * BYTES_PER_WORD;
  const lines: string[] = [];
  for (let offset = 0; offset < bytes.length; offset += chunkBytes) {
    lines.push(bytes.subarray(offset, offset + chunkBytes).toString('base64'));
  }
  return lines;
}

/** Full table-write command: open line, base64 lines, blank terminator. */
export function encodeTable(
  path: string,
  content: ArrayLike<number>,
  mode: TableMode = 'single',
  suffixes: TableSuffixes = DEFAULT_TABLE_SUFFIXES,
): string[] {
  return [`${path}${suffixes[mode]}B`, ...encodeTableLines(content), ''];
}

export function decodeTableLines(lines: string[]): Uint32Array {
  const chunks = lines.map((line) => {
    const decoded = Buffer.from(line, 'base64');
    if (decoded.length % BYTES_PER_WORD !== 0) {
      throw new ProtocolError(`Table line decodes to ${decoded.length} bytes, not a whole number of words`);
    }
    return decoded;
  });
  return bufferToWords(Buffer.concat(chunks));
}

export interface ParsedTableCommand {
  path: string;
  suffix: string;
  binary: boolean;
}

/** Parse a table open line such as `SEQ1.TABLE<<|B`; `null` if it is not one. */
export function parseTableCommand(line: string): ParsedTableCommand | null {
  const match = /^([^<=?]+)(<<\||<<|<)(B?)$/.exec(line.trim());
  if (!match) return null;
  return { path: match[1], suffix: match[2], binary: match[3] === 'B' };
}
