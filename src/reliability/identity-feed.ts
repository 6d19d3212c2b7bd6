import { log } from "apify";
import { defaultFetch, type FetchLike } from "../runtime/http-fetch";
import { IDENTITY_PROTOCOLS, identityKey, type IdentityProtocol } from "./identity-pool";

export interface FeedEntry {
  host: string;
  port: number;
  protocol: IdentityProtocol;
}

const HOST_PORT = /^([a-z0-9.-]+|\[[0-9a-f:]+\]):(\d{1,5})$/i;

const isProtocol = (value: string): value is IdentityProtocol =>
  IDENTITY_PROTOCOLS.some((protocol) => protocol === value);

const parseLine = (line: string, defaultProtocol: IdentityProtocol): FeedEntry | null => {
  let protocol = defaultProtocol;
  let rest = line;

  const schemeIndex = line.indexOf("://");
  if (schemeIndex >= 0) {
    const scheme = line.slice(0, schemeIndex).toLowerCase();
    const normalized = scheme === "socks" ? "socks5" : scheme === "trojan" ? "tls_tunnel" : scheme;
    if (!isProtocol(normalized)) return null;
    protocol = normalized;
    rest = line.slice(schemeIndex + 3).replace(/\/.*$/, "");
  }

  // Feeds sometimes append country codes or latency after whitespace.
  const [endpoint] = rest.split(/\s+/);
  const match = HOST_PORT.exec(endpoint ?? "");
  if (!match) return null;

  const port = Number(match[2]);
  if (!Number.isInteger(port) || port < 1 || port > 65535) return null;
  return { host: match[1], port, protocol };
};

/** Parses `host:port` lines and `scheme://host:port` URLs; comments and junk are skipped. */
export const parseIdentityFeed = (text: string, defaultProtocol: IdentityProtocol = "http"): FeedEntry[] => {
  const entries: FeedEntry[] = [];
  const seen = new Set<string>();

  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line || line.startsWith("#")) continue;

    const entry = parseLine(line, defaultProtocol);
    if (!entry) continue;

    const key = identityKey(entry.host, entry.port);
    if (seen.has(key)) continue;
    seen.add(key);
    entries.push(entry);
  }

  return entries;
};

export const loadIdentityFeeds = async (
  urls: string[],
  timeoutMs: number,
  fetcher: FetchLike = defaultFetch,
): Promise<FeedEntry[]> => {
  const merged = new Map<string, FeedEntry>();

  for (const url of urls) {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    try {
      const response = await fetcher(url, { signal: controller.signal });
      if (response.status < 200 || response.status >= 300) {
        log.warning("Identity feed returned a non-success status.", { url, status: response.status });
        continue;
      }
      const entries = parseIdentityFeed(await response.text());
      for (const entry of entries) merged.set(identityKey(entry.host, entry.port), entry);
      log.info("Identity feed loaded.", { url, entries: entries.length });
    } catch (error) {
      log.warning("Identity feed could not be loaded.", {
        url,
        error: error instanceof Error ? error.message : String(error),
      });
    } finally {
      clearTimeout(timer);
    }
  }

  return [...merged.values()];
};
