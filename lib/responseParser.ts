import { DeviceError, ProtocolError } from './errors';

export type ScalarValue = number | string;

export type FieldValue = ScalarValue | number[];

export type PandaReply =
  | { kind: 'ok' }
  | { kind: 'list'; entries: string[] }
  | { kind: 'value'; name: string; value: ScalarValue };

const INTEGER_PATTERN = /^[-+]?\d+$/;
const FLOAT_PATTERN = /^[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?$/;

function toText(reply: Buffer | string): string {
  return typeof reply === 'string' ? reply : reply.toString('utf8');
}

/** Integer first, then float, otherwise the raw string. */
export function parseScalar(text: string): ScalarValue {
  const trimmed = text.trim();
  if (INTEGER_PATTERN.test(trimmed)) return Number.parseInt(trimmed, 10);
  if (FLOAT_PATTERN.test(trimmed)) return Number.parseFloat(trimmed);
  return trimmed;
}

/**
 * Classify one complete control-port reply.
 *
 * `ERR` replies are thrown as {@link DeviceError}. The real device answers
 * reads with `OK =<value>`, so anything carrying `=` is a value reply even
 * when it starts with `OK`.
 */
export function parseReply(reply: Buffer | string): PandaReply {
  const text = toText(reply);
  if (text.startsWith('ERR')) {
    throw new DeviceError(text.slice(3).trim(), { reply: text });
  }

  if (text.startsWith('!')) {
    return { kind: 'list', entries: parseListEntries(text) };
  }

  const firstLine = text.split('\n', 1)[0].replace(/\r$/, '');
  const eq = firstLine.indexOf('=');
  if (eq >= 0) {
    const name = firstLine.slice(0, eq).replace(/^OK\s*/, '').trim();
    return { kind: 'value', name, value: parseScalar(firstLine.slice(eq + 1)) };
  }

  if (firstLine.startsWith('OK')) return { kind: 'ok' };

  throw new ProtocolError(`Unexpected reply: ${JSON.stringify(text)}`, text);
}

function parseListEntries(text: string): string[] {
  const lines = text.split('\n').map((line) => line.replace(/\r$/, ''));
  if (lines[lines.length - 1] === '') lines.pop();
  const entries: string[] = [];
  let terminated = false;
  for (const line of lines) {
    if (line === '.') {
      terminated = true;
      break;
    }
    if (!line.startsWith('!')) {
      throw new ProtocolError(`Malformed list entry ${JSON.stringify(line)}`, text);
    }
    entries.push(line.slice(1));
  }
  if (!terminated) {
    throw new ProtocolError('List reply is missing its "." terminator', text);
  }
  return entries;
}

export function parseIntegerList(entries: string[]): number[] {
  return entries.map((entry) => {
    const value = parseScalar(entry);
    if (typeof value !== 'number' || !Number.isInteger(value)) {
      throw new ProtocolError(`Expected integer list entry, got ${JSON.stringify(entry)}`, entry);
    }
    return value;
  });
}

/** Value of a reply as returned by a field read. */
export function replyToValue(reply: PandaReply): FieldValue {
  switch (reply.kind) {
    case 'list':
      return parseIntegerList(reply.entries);
    case 'value':
      return reply.value;
    case 'ok':
    default:
      throw new ProtocolError('Read returned a bare acknowledgement without a value');
  }
}

/**
 * Parse a `*CHANGES?` reply into field name → raw value.
 * Entries without `=` (table and attribute change markers) are skipped.
 */
export function parseChanges(reply: Buffer | string): Map<string, string> {
  const text = toText(reply);
  if (text.startsWith('ERR')) {
    throw new DeviceError(text.slice(3).trim(), { path: '*CHANGES', reply: text });
  }
  const fields = new Map<string, string>();
  for (const entry of parseListEntries(text)) {
    const eq = entry.indexOf('=');
    if (eq < 0) continue;
    fields.set(entry.slice(0, eq), entry.slice(eq + 1));
  }
  return fields;
}
