import { randomUUID } from "node:crypto";
import { log } from "apify";
import type { Browser, BrowserContext, Page } from "playwright-core";
import type { NetworkIdentity } from "../reliability/identity-pool";
import type { BrowserFingerprint } from "../reliability/fingerprint-rotation";
import { SessionError } from "./errors";

export interface BrowserSessionConfig {
  headless: boolean;
  launchTimeoutMs: number;
}

export interface BrowserSession {
  id: string;
  browser: Browser;
  openedAt: number;
}

export interface PageOptions {
  identity: NetworkIdentity | null;
  fingerprint: BrowserFingerprint;
  timeoutMs: number;
}

/** Chromium takes HTTP(S) and SOCKS5 proxies per context; SOCKS4 and TLS tunnels are not usable here. */
export const supportsBrowserProxy = (identity: NetworkIdentity): boolean =>
  identity.protocol === "http" || identity.protocol === "https" || identity.protocol === "socks5";

const proxySettingsFor = (
  identity: NetworkIdentity | null,
): { server: string; username?: string; password?: string } | undefined => {
  if (!identity || identity.kind === "direct" || !supportsBrowserProxy(identity)) return undefined;
  return {
    server: `${identity.protocol}://${identity.host}:${identity.port}`,
    ...(identity.username !== null ? { username: identity.username, password: identity.password ?? "" } : {}),
  };
};

export const launchBrowserSession = async (config: BrowserSessionConfig): Promise<BrowserSession> => {
  const { chromium } = await import("playwright-core");
  let browser: Browser;
  try {
    browser = await chromium.launch({
      headless: config.headless,
      timeout: config.launchTimeoutMs,
      args: ["--no-sandbox", "--disable-dev-shm-usage", "--disable-blink-features=AutomationControlled"],
    });
  } catch (error) {
    throw new SessionError("Browser launch failed.", {
      error: error instanceof Error ? error.message : String(error),
    });
  }

  const session: BrowserSession = { id: randomUUID(), browser, openedAt: Date.now() };
  log.info("Browser session launched.", { sessionId: session.id, headless: config.headless });
  return session;
};

export const closeBrowserSession = async (session: BrowserSession): Promise<void> => {
  try {
    await session.browser.close();
  } catch (error) {
    throw new SessionError("Browser close failed.", {
      sessionId: session.id,
      error: error instanceof Error ? error.message : String(error),
    });
  }
  log.debug("Browser session closed.", { sessionId: session.id, ageMs: Date.now() - session.openedAt });
};

/** Runs `fn` in a fresh context carrying the identity's proxy and the fingerprint; the context is always closed. */
export const withBrowserPage = async <T>(
  session: BrowserSession,
  options: PageOptions,
  fn: (page: Page) => Promise<T>,
): Promise<T> => {
  const proxy = proxySettingsFor(options.identity);
  let context: BrowserContext;
  try {
    context = await session.browser.newContext({
      userAgent: options.fingerprint.userAgent,
      locale: options.fingerprint.locale,
      timezoneId: options.fingerprint.timezone,
      viewport: options.fingerprint.viewport,
      extraHTTPHeaders: { "accept-language": options.fingerprint.acceptLanguage },
      ...(proxy ? { proxy } : {}),
    });
  } catch (error) {
    throw new SessionError("Browser context could not be created.", {
      sessionId: session.id,
      error: error instanceof Error ? error.message : String(error),
    });
  }

  try {
    const page = await context.newPage();
    page.setDefaultTimeout(options.timeoutMs);
    return await fn(page);
  } finally {
    try {
      await context.close();
    } catch (error) {
      log.warning("Failed to close browser context.", {
        sessionId: session.id,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
};
