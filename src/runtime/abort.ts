import { AbortedError } from "./errors";

export const throwIfAborted = (signal: AbortSignal | undefined): void => {
  if (signal?.aborted) throw new AbortedError();
};

export const sleep = async (ms: number, signal?: AbortSignal): Promise<void> => {
  throwIfAborted(signal);
  if (ms <= 0) return;

  await new Promise<void>((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new AbortedError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
};

/** Settles with `task`, or rejects as soon as `signal` aborts. The task itself keeps running. */
export const raceWithSignal = async <T>(task: Promise<T>, signal: AbortSignal | undefined): Promise<T> => {
  if (!signal) return task;
  throwIfAborted(signal);

  let rejectAborted: (error: unknown) => void = () => undefined;
  const aborted = new Promise<never>((_, reject) => {
    rejectAborted = reject;
  });
  const onAbort = (): void => rejectAborted(new AbortedError());
  signal.addEventListener("abort", onAbort, { once: true });

  try {
    return await Promise.race([task, aborted]);
  } finally {
    signal.removeEventListener("abort", onAbort);
  }
};

/** Signal that aborts when `parent` aborts or after `timeoutMs`, whichever comes first. */
export const childSignal = (
  parent: AbortSignal | undefined,
  timeoutMs: number,
): { signal: AbortSignal; dispose: () => void } => {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  const onParentAbort = (): void => controller.abort();
  parent?.addEventListener("abort", onParentAbort, { once: true });
  if (parent?.aborted) controller.abort();

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    },
  };
};
