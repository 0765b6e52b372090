import { TransientStorageBusyError, isBusyError, errorMessage } from './errors.js';
import { WRITER } from '../world/config.js';

export interface WriterOptions {
  maxAttempts?: number;
  retryBaseMs?: number;
  queueTimeoutMs?: number;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Single logical writer for the world store.
 *
 * Every mutating operation is queued here and runs one at a time, in arrival
 * order. Reads go straight to the database (WAL lets them proceed while a
 * write is in flight). A write that hits SQLITE_BUSY / SQLITE_LOCKED is
 * retried with exponential backoff and surfaces as TransientStorageBusyError
 * once the attempts are used up.
 */
export class SerialWriter {
  private tail: Promise<unknown> = Promise.resolve();
  private pending = 0;
  private readonly maxAttempts: number;
  private readonly retryBaseMs: number;
  private readonly queueTimeoutMs: number;

  constructor(options: WriterOptions = {}) {
    this.maxAttempts = Math.max(1, options.maxAttempts ?? WRITER.MAX_ATTEMPTS);
    this.retryBaseMs = options.retryBaseMs ?? WRITER.RETRY_BASE_MS;
    this.queueTimeoutMs = options.queueTimeoutMs ?? WRITER.QUEUE_TIMEOUT_MS;
  }

  /** Number of writes queued or running. */
  get depth(): number {
    return this.pending;
  }

  run<T>(label: string, op: () => T): Promise<T> {
    const enqueuedAt = Date.now();
    this.pending++;

    const result = this.tail.then(() => {
      const waited = Date.now() - enqueuedAt;
      if (waited > this.queueTimeoutMs) {
        throw new TransientStorageBusyError(
          `Write "${label}" timed out after waiting ${waited}ms for the store`,
          0,
        );
      }
      return this.attempt(label, op);
    });

    // The queue keeps moving whether this write succeeded or not; the caller
    // sees the failure through `result`.
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );

    return result.finally(() => {
      this.pending--;
    });
  }

  private async attempt<T>(label: string, op: () => T): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        return op();
      } catch (err) {
        if (!isBusyError(err)) throw err;

        if (attempt >= this.maxAttempts) {
          console.error(`[Writer] ${label}: store busy after ${attempt} attempts`);
          throw new TransientStorageBusyError(
            `Store busy: ${label} failed after ${attempt} attempts (${errorMessage(err)})`,
            attempt,
          );
        }

        const delayMs = this.retryBaseMs * Math.pow(2, attempt - 1);
        console.warn(`[Writer] ${label}: store busy, retry ${attempt}/${this.maxAttempts - 1} in ${delayMs}ms`);
        await sleep(delayMs);
      }
    }
  }
}
