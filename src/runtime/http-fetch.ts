import { log } from "apify";
import { ProxyAgent, fetch as undiciFetch, type Dispatcher } from "undici";
import type { HeaderBag } from "../detection/types";
import { identityUrl, type NetworkIdentity } from "../reliability/identity-pool";

export interface FetchResponseLike {
  status: number;
  headers: {
    forEach(callback: (value: string, key: string) => void): void;
  };
  text(): Promise<string>;
}

export interface FetchInit {
  method?: string;
  headers?: Record<string, string>;
  signal: AbortSignal;
  dispatcher?: Dispatcher;
}

export type FetchLike = (url: string, init: FetchInit) => Promise<FetchResponseLike>;

export const defaultFetch: FetchLike = (url, init) => undiciFetch(url, init);

/** undici proxies HTTP(S) only; other protocols go through the browser or a TCP probe. */
export const supportsHttpDispatch = (identity: NetworkIdentity): boolean =>
  identity.protocol === "http" || identity.protocol === "https";

export const createDispatcher = (identity: NetworkIdentity | null): ProxyAgent | null => {
  if (!identity || identity.kind === "direct") return null;
  if (!supportsHttpDispatch(identity)) return null;
  return new ProxyAgent(identityUrl(identity));
};

export const closeDispatcher = async (dispatcher: ProxyAgent | null): Promise<void> => {
  if (!dispatcher) return;
  try {
    await dispatcher.close();
  } catch (error) {
    log.debug("Proxy dispatcher close failed.", {
      error: error instanceof Error ? error.message : String(error),
    });
  }
};

export const headersToBag = (headers: FetchResponseLike["headers"]): HeaderBag => {
  const bag: HeaderBag = {};
  headers.forEach((value, key) => {
    bag[key.toLowerCase()] = value;
  });
  return bag;
};
