import { log } from "apify";
import { AbortedError } from "./errors";

export interface AdmissionQueueConfig {
  concurrency: number;
  name?: string;
}

export interface AdmissionQueueStats {
  name: string;
  concurrency: number;
  waiting: number;
  inflight: number;
  peakInflight: number;
  completed: number;
  failed: number;
}

interface WaitingTask {
  start: () => void;
}

export const withTimeout = async <T>(
  task: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
): Promise<T> => {
  let timer: NodeJS.Timeout | null = null;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(onTimeout());
    }, timeoutMs);
  });

  try {
    return await Promise.race([task, timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
};

/**
 * Counting admission gate. At most `concurrency` tasks run at once; the rest
 * wait in FIFO order. A waiting task whose signal aborts leaves the line
 * without ever being started.
 */
export class AdmissionQueue {
  private readonly config: AdmissionQueueConfig;
  private readonly waiting: WaitingTask[] = [];
  private inflight = 0;
  private peakInflight = 0;
  private completed = 0;
  private failed = 0;
  private drainResolvers: Array<() => void> = [];

  public constructor(config: AdmissionQueueConfig) {
    if (!Number.isInteger(config.concurrency) || config.concurrency < 1) {
      throw new RangeError(`Admission concurrency must be a positive integer. Received: ${config.concurrency}.`);
    }
    this.config = config;
  }

  public getStats(): AdmissionQueueStats {
    return {
      name: this.config.name ?? "admission",
      concurrency: this.config.concurrency,
      waiting: this.waiting.length,
      inflight: this.inflight,
      peakInflight: this.peakInflight,
      completed: this.completed,
      failed: this.failed,
    };
  }

  public async run<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    if (signal?.aborted) throw new AbortedError({ queue: this.config.name ?? "admission" });

    return new Promise<T>((resolve, reject) => {
      const onAbort = (): void => {
        const index = this.waiting.indexOf(entry);
        if (index >= 0) {
          this.waiting.splice(index, 1);
          reject(new AbortedError({ queue: this.config.name ?? "admission" }));
        }
      };

      const entry: WaitingTask = {
        start: () => {
          signal?.removeEventListener("abort", onAbort);
          void this.execute(task).then(resolve, reject);
        },
      };

      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiting.push(entry);
      this.pump();
    });
  }

  public async drain(timeoutMs: number): Promise<void> {
    if (this.waiting.length === 0 && this.inflight === 0) return;

    await withTimeout(
      new Promise<void>((resolve) => {
        this.drainResolvers.push(resolve);
      }),
      timeoutMs,
      () => new Error(`Admission queue did not drain within ${timeoutMs}ms.`),
    );
  }

  private pump(): void {
    while (this.inflight < this.config.concurrency && this.waiting.length > 0) {
      const next = this.waiting.shift();
      if (!next) return;

      this.inflight += 1;
      this.peakInflight = Math.max(this.peakInflight, this.inflight);
      next.start();
    }
  }

  private async execute<T>(task: () => Promise<T>): Promise<T> {
    try {
      const result = await task();
      this.completed += 1;
      return result;
    } catch (error) {
      this.failed += 1;
      throw error;
    } finally {
      this.inflight -= 1;
      this.pump();
      this.resolveDrainIfIdle();
    }
  }

  private resolveDrainIfIdle(): void {
    if (this.waiting.length > 0 || this.inflight > 0) return;
    if (this.drainResolvers.length === 0) return;

    const resolvers = [...this.drainResolvers];
    this.drainResolvers = [];
    for (const resolve of resolvers) resolve();
    log.debug("Admission queue drained.", { queue: this.config.name ?? "admission" });
  }
}
