/**
 * Message-passing primitives shared by the pipeline stages: a bounded FIFO,
 * a one-shot signal and a mutex. Every primitive can be failed, which
 * rejects all current and future waiters with the same error so that a
 * stage blocked on a dead sibling does not hang.
 */

interface Waiter<T> {
  resolve: (value: T) => void;
  reject: (error: Error) => void;
}

interface PendingPut<T> extends Waiter<void> {
  item: T;
}

export class BoundedQueue<T> {
  readonly capacity: number;

  private readonly items: T[] = [];

  private readonly getters: Waiter<T>[] = [];

  private readonly putters: PendingPut<T>[] = [];

  private failure: Error | null = null;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  get size(): number {
    return this.items.length;
  }

  /** Resolves once the item is stored; waits while the queue is full. */
  put(item: T): Promise<void> {
    if (this.failure) return Promise.reject(this.failure);

    const getter = this.getters.shift();
    if (getter) {
      getter.resolve(item);
      return Promise.resolve();
    }

    if (this.items.length < this.capacity) {
      this.items.push(item);
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      this.putters.push({ item, resolve, reject });
    });
  }

  get(): Promise<T> {
    if (this.failure) return Promise.reject(this.failure);

    if (this.items.length > 0) {
      const [item] = this.items.splice(0, 1);
      const putter = this.putters.shift();
      if (putter) {
        this.items.push(putter.item);
        putter.resolve();
      }
      return Promise.resolve(item);
    }

    return new Promise<T>((resolve, reject) => {
      this.getters.push({ resolve, reject });
    });
  }

  fail(error: Error) {
    if (this.failure) return;
    this.failure = error;
    this.items.length = 0;
    for (const waiter of this.getters.splice(0)) waiter.reject(error);
    for (const waiter of this.putters.splice(0)) waiter.reject(error);
  }
}

export class OneShotSignal {
  private isSet = false;

  private failure: Error | null = null;

  private readonly waiters: Waiter<void>[] = [];

  get fired(): boolean {
    return this.isSet;
  }

  set() {
    if (this.isSet || this.failure) return;
    this.isSet = true;
    for (const waiter of this.waiters.splice(0)) waiter.resolve();
  }

  wait(): Promise<void> {
    if (this.isSet) return Promise.resolve();
    if (this.failure) return Promise.reject(this.failure);
    return new Promise<void>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  fail(error: Error) {
    if (this.isSet || this.failure) return;
    this.failure = error;
    for (const waiter of this.waiters.splice(0)) waiter.reject(error);
  }
}

/** Serialises critical sections through a promise chain. */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const run = this.tail.then(fn);
    this.tail = run.then(() => undefined, () => undefined);
    return run;
  }
}
