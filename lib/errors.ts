export class PandaError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Reply could not be parsed as any known response shape. */
export class ProtocolError extends PandaError {
  readonly reply: string;

  constructor(message: string, reply = '') {
    super(message);
    this.reply = reply;
  }
}

/** Device answered `ERR ...` or did not acknowledge a write with `OK`. */
export class DeviceError extends PandaError {
  readonly path?: string;

  readonly reply?: string;

  constructor(message: string, details: { path?: string; reply?: string } = {}) {
    super(message);
    this.path = details.path;
    this.reply = details.reply;
  }
}

export class VerificationError extends PandaError {
  readonly index?: number;

  readonly expected?: number;

  readonly actual?: number;

  constructor(message: string, details: { index?: number; expected?: number; actual?: number } = {}) {
    super(message);
    this.index = details.index;
    this.expected = details.expected;
    this.actual = details.actual;
  }
}

export class ConnectionError extends PandaError {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return `${error.name}: ${error.message}`;
  return String(error);
}
