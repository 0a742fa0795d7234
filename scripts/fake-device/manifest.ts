import manifest from './fields.json';

export interface TableBlockSpec {
  /** 32-bit words per table line. */
  wordsPerLine: number;
  /** Field whose value is captured for each emitted line. */
  output: string;
}

export const DEFAULT_FIELD_VALUES: Readonly<Record<string, string>> = manifest.fields;

export const READ_ONLY_FIELDS: ReadonlySet<string> = new Set(manifest.readOnly);

export const TABLE_BLOCKS: Readonly<Record<string, TableBlockSpec>> = manifest.tables;

export const SEQ_OUTPUTS = ['OUTA', 'OUTB', 'OUTC', 'OUTD', 'OUTE', 'OUTF'];

export function isEnabledValue(value: string): boolean {
  return value === 'ONE' || value === '1';
}
