import type { Page, Response } from "playwright-core";
import type { MatchCandidate } from "../../matching/types";
import type { NetworkIdentity } from "../../reliability/identity-pool";
import {
  closeBrowserSession,
  launchBrowserSession,
  supportsBrowserProxy,
  withBrowserPage,
  type BrowserSession,
  type BrowserSessionConfig,
} from "../../runtime/browser-session";
import { SessionError } from "../../runtime/errors";
import { navigateWithRetry, waitForAnySelector } from "../../runtime/navigation";
import { extractDocumentPage } from "../document-page";
import type { AcquisitionStrategy, RawRecord, StrategyContext } from "../types";
import { parseSearchResults } from "./search-engine";

export interface BrowserSearchConfig extends BrowserSessionConfig {
  searchUrl: string;
  siteFilter: string;
  maxResults: number;
}

const RESULT_SELECTORS = ["#b_results", "li.b_algo", "div.b_algo"];

const requireSession = (ctx: StrategyContext<BrowserSession>): BrowserSession => {
  if (!ctx.session) {
    throw new SessionError("Browser search needs an open session.", { target: ctx.targetName });
  }
  return ctx.session;
};

/**
 * Drives a real browser against the web search engine. Slow to start but much
 * harder for sources to tell apart from a person, so it is where the
 * orchestrator escalates to after a ban signal.
 */
export class BrowserSearchStrategy implements AcquisitionStrategy<BrowserSession> {
  public readonly name = "browser_search";
  public readonly transport = "browser" as const;
  private readonly config: BrowserSearchConfig;

  public constructor(config: BrowserSearchConfig) {
    this.config = config;
  }

  public supportsBatchSession(): boolean {
    return true;
  }

  public acceptsIdentity(identity: NetworkIdentity): boolean {
    return supportsBrowserProxy(identity);
  }

  public async openSession(): Promise<BrowserSession> {
    return launchBrowserSession(this.config);
  }

  public async closeSession(session: BrowserSession): Promise<void> {
    await closeBrowserSession(session);
  }

  public async search(name: string, ctx: StrategyContext<BrowserSession>): Promise<MatchCandidate[]> {
    const session = requireSession(ctx);
    const url = new URL(this.config.searchUrl);
    url.searchParams.set("q", `"${name}" site:${this.config.siteFilter}`);

    const html = await withBrowserPage(
      session,
      { identity: ctx.identity, fingerprint: ctx.fingerprint, timeoutMs: ctx.timeoutMs },
      async (page) => {
        const body = await this.visit(page, url.toString(), ctx);
        if (body === null) return "";
        const listed = await waitForAnySelector(page, RESULT_SELECTORS, ctx.timeoutMs, ctx.signal);
        return listed ? page.content() : "";
      },
    );

    return parseSearchResults(html, this.config.siteFilter)
      .slice(0, this.config.maxResults)
      .map((hit, index) => ({ title: hit.title, sourceId: hit.url, url: hit.url, rank: index }));
  }

  public async fetchDetail(candidate: MatchCandidate, ctx: StrategyContext<BrowserSession>): Promise<RawRecord> {
    const session = requireSession(ctx);
    const url = candidate.url ?? candidate.sourceId;

    const html = await withBrowserPage(
      session,
      { identity: ctx.identity, fingerprint: ctx.fingerprint, timeoutMs: ctx.timeoutMs },
      async (page) => (await this.visit(page, url, ctx)) ?? "",
    );

    return extractDocumentPage({ html, url, source: this.name, fallbackTitle: candidate.title });
  }

  /** Navigates and screens the landing response. Returns the rendered HTML, or null when nothing loaded. */
  private async visit(page: Page, url: string, ctx: StrategyContext<BrowserSession>): Promise<string | null> {
    const started = Date.now();
    const response: Response | null = await navigateWithRetry(page, url, {
      timeoutMs: ctx.timeoutMs,
      signal: ctx.signal,
    });
    if (!response) return null;

    const body = await page.content();
    ctx.screen({
      statusCode: response.status(),
      headers: await response.allHeaders(),
      body,
      responseTimeMs: Date.now() - started,
      url,
    });
    return body;
  }
}
