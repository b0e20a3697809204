import { SinkWriteError, errorMessage } from "@/lib/errors";
import { createLogger } from "@/lib/logger";

const logger = createLogger("sink-retry");

export interface RetryOptions {
  maxAttempts: number;
  /** First backoff; each further attempt doubles it. */
  baseDelayMs: number;
}

const sleep = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Run a write, retrying with exponential backoff.
 * @throws SinkWriteError once every attempt has failed.
 */
export async function withRetry<T>(
  operation: string,
  fn: () => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const attempts = Math.max(1, options.maxAttempts);
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err;
      if (attempt === attempts) break;
      const delay = options.baseDelayMs * 2 ** (attempt - 1);
      logger.warn(
        `${operation} failed (attempt ${attempt}/${attempts}), retrying in ${delay}ms: ${errorMessage(err)}`
      );
      await sleep(delay);
    }
  }

  logger.error(`${operation} gave up after ${attempts} attempt(s)`);
  throw new SinkWriteError(operation, attempts, lastError);
}

/**
 * Serialises writes: each task starts only after the previous one settled,
 * whoever submitted it.
 */
export class SerialWriter {
  private tail: Promise<unknown> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const next = this.tail.then(task, task);
    // the submitter sees the failure through `next`; the chain keeps going
    this.tail = next.catch(() => undefined);
    return next;
  }

  /** Resolves once every task submitted so far has settled. */
  async drain(): Promise<void> {
    await this.tail;
  }
}
