import type { Page, Response } from "playwright-core";
import { raceWithSignal, sleep, throwIfAborted } from "./abort";
import { NavigationError } from "./errors";

export interface NavigateOptions {
  timeoutMs: number;
  signal: AbortSignal;
  attempts?: number;
  waitUntil?: "load" | "domcontentloaded" | "networkidle" | "commit";
  backoffMs?: number;
}

// Another goto cannot help once the page or its browser is gone.
const PAGE_GONE = /(has been closed|page crashed)/i;

/**
 * Opens `url`, retrying transient failures with a linear backoff. Resolves to
 * the main-document response, or null when the navigation produced none.
 */
export const navigateWithRetry = async (
  page: Page,
  url: string,
  options: NavigateOptions,
): Promise<Response | null> => {
  const attempts = Math.max(1, options.attempts ?? 2);
  const waitUntil = options.waitUntil ?? "domcontentloaded";
  const backoffMs = options.backoffMs ?? 500;
  const failures: string[] = [];

  for (let attempt = 1; attempt <= attempts; attempt += 1) {
    throwIfAborted(options.signal);
    try {
      return await raceWithSignal(page.goto(url, { timeout: options.timeoutMs, waitUntil }), options.signal);
    } catch (error) {
      if (options.signal.aborted) throw error;
      const message = error instanceof Error ? error.message : String(error);
      failures.push(message);
      if (PAGE_GONE.test(message)) break;
      if (attempt < attempts) await sleep(backoffMs * attempt, options.signal);
    }
  }

  // The last failure goes into the message so a goto timeout is retried as a timeout.
  throw new NavigationError(`Navigation to ${url} failed: ${failures[failures.length - 1] ?? "unknown error"}`, {
    url,
    attempts: failures.length,
    timeoutMs: options.timeoutMs,
    errors: failures,
  });
};

/** False when none of `selectors` is attached within the timeout, which is how an empty result page looks. */
export const waitForAnySelector = async (
  page: Page,
  selectors: string[],
  timeoutMs: number,
  signal: AbortSignal,
): Promise<boolean> => {
  try {
    await raceWithSignal(page.waitForSelector(selectors.join(", "), { state: "attached", timeout: timeoutMs }), signal);
    return true;
  } catch (error) {
    if (signal.aborted) throw error;
    if (error instanceof Error && error.name === "TimeoutError") return false;
    throw error;
  }
};
