import { log } from "apify";
import type { ResponseAnalyzer } from "../detection/response-analyzer";
import type { Classification, HeaderBag, OperationKind, ResponseSample } from "../detection/types";
import { DIRECT_IDENTITY, type NetworkIdentity } from "../reliability/identity-pool";
import { AbortedError, FetchError, NotFoundError, SourceBlockedError } from "../runtime/errors";
import {
  closeDispatcher,
  createDispatcher,
  defaultFetch,
  headersToBag,
  type FetchLike,
} from "../runtime/http-fetch";
import { isRecord } from "./strategies/payload";

export interface HttpClientOptions {
  analyzer: ResponseAnalyzer;
  identity: NetworkIdentity | null;
  headers: Record<string, string>;
  timeoutMs: number;
  signal: AbortSignal;
  fetcher?: FetchLike;
}

export interface HttpPage {
  url: string;
  statusCode: number;
  body: string;
  elapsedMs: number;
  classification: Classification;
}

/** Classifies a response and throws `SourceBlockedError` unless the verdict is normal. */
export const screenResponse = (analyzer: ResponseAnalyzer, sample: ResponseSample): Classification => {
  const classification = analyzer.classify(sample);
  if (classification.verdict === "normal") return classification;

  log.debug("Hostile response classified.", {
    url: sample.url ?? null,
    statusCode: sample.statusCode,
    verdict: classification.verdict,
    level: classification.level,
    evidence: classification.evidence,
  });
  throw new SourceBlockedError(classification.verdict, {
    url: sample.url ?? null,
    statusCode: sample.statusCode,
    evidence: classification.evidence,
    level: classification.level,
  });
};

/**
 * HTTP access for one strategy attempt: one identity, one fingerprint, one
 * abort signal. Every response is classified before the caller sees it.
 */
export class HttpClient {
  private readonly options: HttpClientOptions;
  private readonly fetcher: FetchLike;

  public constructor(options: HttpClientOptions) {
    this.options = options;
    this.fetcher = options.fetcher ?? defaultFetch;
  }

  public get identity(): NetworkIdentity | null {
    return this.options.identity;
  }

  public async get(url: string, kind: OperationKind, headers: Record<string, string> = {}): Promise<HttpPage> {
    return this.request(url, kind, headers, false);
  }

  public async getJson(url: string, kind: OperationKind): Promise<Record<string, unknown>> {
    const page = await this.request(url, kind, { accept: "application/json, text/plain, */*" }, true);
    let parsed: unknown;
    try {
      parsed = JSON.parse(page.body);
    } catch (error) {
      throw new FetchError("Source returned malformed JSON.", {
        url,
        error: error instanceof Error ? error.message : String(error),
      });
    }
    if (!isRecord(parsed)) {
      throw new FetchError("Source returned a JSON payload that is not an object.", { url });
    }
    return parsed;
  }

  private async request(
    url: string,
    kind: OperationKind,
    headers: Record<string, string>,
    structured: boolean,
  ): Promise<HttpPage> {
    const started = Date.now();
    const { statusCode, responseHeaders, body } = await this.transfer(url, kind, headers);

    const elapsedMs = Date.now() - started;
    const classification = screenResponse(this.options.analyzer, {
      statusCode,
      headers: responseHeaders,
      body,
      responseTimeMs: elapsedMs,
      url,
      structured,
    });

    if (statusCode === 404) {
      throw new NotFoundError(`Source returned 404 for ${url}.`, { url });
    }
    if (statusCode < 200 || statusCode >= 300) {
      throw new FetchError(`Source returned HTTP ${statusCode}.`, { url, statusCode });
    }

    return { url, statusCode, body, elapsedMs, classification };
  }

  private async transfer(
    url: string,
    kind: OperationKind,
    headers: Record<string, string>,
  ): Promise<{ statusCode: number; responseHeaders: HeaderBag; body: string }> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.timeoutMs);
    const onAbort = (): void => controller.abort();
    this.options.signal.addEventListener("abort", onAbort, { once: true });
    const dispatcher = createDispatcher(this.options.identity);

    try {
      const response = await this.fetcher(url, {
        method: "GET",
        headers: { ...this.options.headers, ...headers },
        signal: controller.signal,
        ...(dispatcher ? { dispatcher } : {}),
      });
      const responseHeaders = headersToBag(response.headers);
      const body = await response.text();
      return { statusCode: response.status, responseHeaders, body };
    } catch (error) {
      if (this.options.signal.aborted) throw new AbortedError({ url });
      throw new FetchError(
        controller.signal.aborted
          ? `Request timed out after ${this.options.timeoutMs}ms.`
          : `Request failed: ${error instanceof Error ? error.message : String(error)}`,
        { url, kind, identity: (this.options.identity ?? DIRECT_IDENTITY).id },
      );
    } finally {
      clearTimeout(timer);
      this.options.signal.removeEventListener("abort", onAbort);
      await closeDispatcher(dispatcher);
    }
  }
}
