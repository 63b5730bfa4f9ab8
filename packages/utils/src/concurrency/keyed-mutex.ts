/**
 * Keyed mutex
 *
 * Serializes async operations that share a key while letting operations on
 * different keys run concurrently. Waiting is bounded: a caller that cannot
 * acquire the key within its timeout fails with LockTimeoutError and never
 * runs its operation.
 */

/**
 * Thrown when a key stays locked longer than the caller is willing to wait.
 */
export class LockTimeoutError extends Error {
  readonly key: string;
  readonly timeoutMs: number;

  constructor(key: string, timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms waiting for lock "${key}"`);
    this.name = "LockTimeoutError";
    this.key = key;
    this.timeoutMs = timeoutMs;
  }
}

export interface KeyedMutexOptions {
  /** Default wait limit in milliseconds (default: 5000) */
  timeoutMs?: number;
}

interface Latch {
  promise: Promise<void>;
  release: () => void;
}

function createLatch(): Latch {
  let release: () => void = () => {};
  const promise = new Promise<void>((resolve) => {
    release = resolve;
  });
  return { promise, release };
}

async function waitFor(promise: Promise<void>, key: string, timeoutMs: number): Promise<void> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new LockTimeoutError(key, timeoutMs)), timeoutMs);
  });
  try {
    await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

interface KeyState {
  /** Resolves once every caller queued so far has finished or given up */
  tail: Promise<void>;
  /** Callers holding or waiting for the key */
  pending: number;
}

export class KeyedMutex {
  private readonly keys = new Map<string, KeyState>();
  private readonly timeoutMs: number;

  constructor(options: KeyedMutexOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 5000;
  }

  /**
   * Run `operation` while holding `key`.
   *
   * @param timeoutMs Overrides the default wait limit for this call
   */
  async run<T>(key: string, operation: () => Promise<T>, timeoutMs = this.timeoutMs): Promise<T> {
    const state = this.keys.get(key) ?? { tail: Promise.resolve(), pending: 0 };
    const previous = state.pending > 0 ? state.tail : undefined;
    const latch = createLatch();
    // The tail of a caller that times out still settles only after `previous`,
    // so later callers keep waiting for the holders queued before it.
    state.tail = previous ? previous.then(() => latch.promise) : latch.promise;
    state.pending++;
    this.keys.set(key, state);

    try {
      if (previous) {
        await waitFor(previous, key, timeoutMs);
      }
      return await operation();
    } finally {
      latch.release();
      state.pending--;
      if (state.pending === 0) {
        this.keys.delete(key);
      }
    }
  }

  /**
   * Check whether any operation currently holds or waits for `key`.
   */
  isLocked(key: string): boolean {
    return this.keys.has(key);
  }
}
