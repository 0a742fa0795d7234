import { describeError } from './errors';
import { Logger } from './logger';

export interface Failable {
  fail(error: Error): void;
}

function asError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Runs pipeline stages concurrently. The first stage to fail fails every
 * tracked queue and signal and closes every registered connection, so the
 * remaining stages unblock instead of waiting on a peer that is gone.
 */
export class StageGroup {
  private readonly logger: Logger;

  private readonly failables: Failable[] = [];

  private readonly closers: Array<() => unknown> = [];

  private readonly running: Promise<void>[] = [];

  private readonly closing: Promise<void>[] = [];

  private firstError: Error | null = null;

  private failedStage = '';

  constructor(logger: Logger) {
    this.logger = logger;
  }

  get failure(): Error | null {
    return this.firstError;
  }

  track<T extends Failable>(failable: T): T {
    this.failables.push(failable);
    return failable;
  }

  /** Register a resource to close on failure; runs at once if the group already failed. */
  onAbort(close: () => unknown) {
    this.closers.push(close);
    if (this.firstError) this.runCloser(close);
  }

  spawn(name: string, stage: () => Promise<void>) {
    this.running.push(stage().catch((error: unknown) => this.abort(name, error)));
  }

  abort(name: string, error: unknown) {
    if (this.firstError) return;
    const failure = asError(error);
    this.firstError = failure;
    this.failedStage = name;
    this.logger.error(`${name} failed: ${describeError(failure)}`);

    for (const failable of this.failables) failable.fail(failure);
    for (const close of this.closers) this.runCloser(close);
  }

  private runCloser(close: () => unknown) {
    this.closing.push(Promise.resolve()
      .then(close)
      .then(() => undefined, (closeError: unknown) => {
        this.logger.error(`Failed to close after ${this.failedStage} failure: ${describeError(closeError)}`);
      }));
  }

  /** Wait for every stage; rethrows the first failure. */
  async join() {
    await Promise.all(this.running);
    await Promise.all(this.closing);
    if (this.firstError) {
      this.logger.error(`Run aborted by ${this.failedStage}`);
      throw this.firstError;
    }
  }
}
