import { Socket } from "node:net";
import { isRecord } from "../acquisition/strategies/payload";
import { closeDispatcher, createDispatcher, defaultFetch, type FetchLike } from "../runtime/http-fetch";
import type { IdentityProbe, NetworkIdentity, ProbeResult } from "./identity-pool";

export const DEFAULT_CHECK_URLS = [
  "https://httpbin.org/ip",
  "https://ipinfo.io/json",
  "https://api.ipify.org?format=json",
];

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/** The body must name the egress address, otherwise the answer could be a cached or local page. */
export const hasEgressEvidence = (body: string): boolean => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return false;
  }
  if (!isRecord(parsed)) return false;
  return (
    (typeof parsed.ip === "string" && parsed.ip.length > 0) ||
    (typeof parsed.origin === "string" && parsed.origin.length > 0)
  );
};

const probeOverHttp = async (
  identity: NetworkIdentity,
  checkUrl: string,
  timeoutMs: number,
  fetcher: FetchLike,
): Promise<ProbeResult> => {
  const started = Date.now();
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  const dispatcher = createDispatcher(identity);

  try {
    const response = await fetcher(checkUrl, {
      signal: controller.signal,
      headers: { accept: "application/json" },
      ...(dispatcher ? { dispatcher } : {}),
    });
    const body = await response.text();
    const latencyMs = Date.now() - started;
    if (response.status < 200 || response.status >= 300) {
      return { ok: false, latencyMs, error: `Health check returned HTTP ${response.status}.` };
    }
    if (!hasEgressEvidence(body)) {
      return { ok: false, latencyMs, error: "Health check response carried no egress address." };
    }
    return { ok: true, latencyMs };
  } catch (error) {
    return { ok: false, latencyMs: Date.now() - started, error: errorMessage(error) };
  } finally {
    clearTimeout(timer);
    await closeDispatcher(dispatcher);
  }
};

export const probeTcpConnect = async (host: string, port: number, timeoutMs: number): Promise<ProbeResult> => {
  const started = Date.now();
  return new Promise<ProbeResult>((resolve) => {
    const socket = new Socket();
    const finish = (result: ProbeResult): void => {
      socket.destroy();
      resolve(result);
    };

    socket.setTimeout(timeoutMs);
    socket.once("connect", () => finish({ ok: true, latencyMs: Date.now() - started }));
    socket.once("timeout", () =>
      finish({ ok: false, latencyMs: timeoutMs, error: `TCP connect timed out after ${timeoutMs}ms.` }),
    );
    socket.once("error", (error) => finish({ ok: false, latencyMs: Date.now() - started, error: error.message }));
    socket.connect(port, host);
  });
};

/**
 * HTTP(S) identities must fetch a check URL and prove egress. SOCKS and
 * TLS-tunnel identities are only checked for TCP reachability.
 */
export const createIdentityProbe = (
  checkUrls: string[] = DEFAULT_CHECK_URLS,
  fetcher: FetchLike = defaultFetch,
  tcpProbe: typeof probeTcpConnect = probeTcpConnect,
): IdentityProbe => {
  let cursor = 0;

  return async (identity, timeoutMs) => {
    if (identity.protocol !== "http" && identity.protocol !== "https") {
      return tcpProbe(identity.host, identity.port, timeoutMs);
    }
    if (checkUrls.length === 0) {
      return { ok: false, latencyMs: 0, error: "No health check URLs configured." };
    }

    const checkUrl = checkUrls[cursor % checkUrls.length];
    cursor += 1;
    return probeOverHttp(identity, checkUrl, timeoutMs, fetcher);
  };
};
