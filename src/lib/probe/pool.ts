import type { ProbeOutcome } from "@/types";
import type { Prober } from "./prober";
import { describeOutcome } from "./prober";
import { createLogger } from "@/lib/logger";
import { errorMessage } from "@/lib/errors";

const logger = createLogger("probe-pool");

/**
 * Run tasks with bounded concurrency.
 * Returns results in the same order as the input items.
 */
export async function parallelMap<T, R>(
  items: T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results: R[] = new Array(items.length);
  let nextIndex = 0;

  async function worker() {
    while (nextIndex < items.length) {
      const i = nextIndex++;
      results[i] = await fn(items[i], i);
    }
  }

  const workers = Array.from(
    { length: Math.min(Math.max(1, concurrency), items.length) },
    () => worker()
  );
  await Promise.all(workers);
  return results;
}

/**
 * Caps in-flight work per origin host. A limit of 0 means uncapped.
 */
export class HostLimiter {
  private active = new Map<string, number>();
  private waiting = new Map<string, Array<() => void>>();

  constructor(private readonly limit: number) {}

  async run<T>(endpoint: string, task: () => Promise<T>): Promise<T> {
    if (this.limit <= 0) return task();

    const host = hostOf(endpoint);
    await this.acquire(host);
    try {
      return await task();
    } finally {
      this.release(host);
    }
  }

  private acquire(host: string): Promise<void> {
    const count = this.active.get(host) ?? 0;
    if (count < this.limit) {
      this.active.set(host, count + 1);
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      const queue = this.waiting.get(host) ?? [];
      queue.push(resolve);
      this.waiting.set(host, queue);
    });
  }

  private release(host: string): void {
    const queue = this.waiting.get(host);
    const next = queue?.shift();
    if (next) {
      // slot handed straight to the next waiter; the count stays the same
      if (queue && queue.length === 0) this.waiting.delete(host);
      next();
      return;
    }
    const count = (this.active.get(host) ?? 1) - 1;
    if (count <= 0) {
      this.active.delete(host);
    } else {
      this.active.set(host, count);
    }
  }
}

function hostOf(endpoint: string): string {
  try {
    return new URL(endpoint).host;
  } catch {
    return endpoint;
  }
}

export interface ProbePoolOptions {
  timeoutMs: number;
  concurrency: number;
  perHostLimit: number;
  /** Epoch ms after which nothing new is probed. */
  deadline?: number;
}

const TIMED_OUT: ProbeOutcome = { kind: "unreachable", reason: "timeout" };

/**
 * Probes endpoints through a bounded worker pool.
 *
 * Once the deadline passes, endpoints that have not started are reported as
 * timed out without a request, and requests still in flight resolve as timed
 * out when the deadline fires.
 */
export class ProbePool {
  private readonly hostLimiter: HostLimiter;
  private probeCount = 0;
  private deadlineCount = 0;
  private deadlineAnswered = new Set<string>();

  constructor(
    private readonly prober: Prober,
    private readonly options: ProbePoolOptions
  ) {
    this.hostLimiter = new HostLimiter(options.perHostLimit);
  }

  get probesIssued(): number {
    return this.probeCount;
  }

  /** Probes answered by the run deadline instead of the endpoint. */
  get deadlineHits(): number {
    return this.deadlineCount;
  }

  /** True when the deadline, not the endpoint, produced the outcome for `endpoint`. */
  cutShort(endpoint: string): boolean {
    return this.deadlineAnswered.has(endpoint);
  }

  deadlinePassed(now: number = Date.now()): boolean {
    return this.options.deadline !== undefined && now >= this.options.deadline;
  }

  async probeAll(
    endpoints: string[],
    onResult?: (endpoint: string, outcome: ProbeOutcome) => void
  ): Promise<ProbeOutcome[]> {
    return parallelMap(endpoints, this.options.concurrency, async (endpoint) => {
      const outcome = await this.hostLimiter.run(endpoint, () =>
        this.probeOne(endpoint)
      );
      onResult?.(endpoint, outcome);
      return outcome;
    });
  }

  async probeOne(endpoint: string): Promise<ProbeOutcome> {
    if (this.deadlinePassed()) {
      this.deadlineCount++;
      this.deadlineAnswered.add(endpoint);
      return TIMED_OUT;
    }

    this.probeCount++;
    const outcome = await this.raceDeadline(
      endpoint,
      this.prober
        .probe(endpoint, this.effectiveTimeout())
        .catch((err: unknown): ProbeOutcome => ({
          kind: "transient",
          detail: errorMessage(err),
        }))
    );

    if (outcome.kind === "transient") {
      logger.warn(`Indeterminate probe for ${endpoint}: ${outcome.detail}`);
    } else {
      logger.debug(`${endpoint}: ${describeOutcome(outcome)}`);
    }
    return outcome;
  }

  private effectiveTimeout(): number {
    if (this.options.deadline === undefined) return this.options.timeoutMs;
    const remaining = this.options.deadline - Date.now();
    return Math.max(1, Math.min(this.options.timeoutMs, remaining));
  }

  private async raceDeadline(
    endpoint: string,
    probe: Promise<ProbeOutcome>
  ): Promise<ProbeOutcome> {
    if (this.options.deadline === undefined) return probe;

    const remaining = Math.max(0, this.options.deadline - Date.now());
    let timer: ReturnType<typeof setTimeout> | undefined;
    const expired = new Promise<ProbeOutcome>((resolve) => {
      timer = setTimeout(() => {
        this.deadlineCount++;
        this.deadlineAnswered.add(endpoint);
        resolve(TIMED_OUT);
      }, remaining);
    });
    try {
      return await Promise.race([probe, expired]);
    } finally {
      clearTimeout(timer);
    }
  }
}
