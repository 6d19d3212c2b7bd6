import { log } from "apify";
import { describe, expect, it, vi } from "vitest";
import { loadIdentityFeeds, parseIdentityFeed } from "../reliability/identity-feed";
import { fakeResponse, routedFetch } from "./helpers";

describe("parseIdentityFeed", () => {
  it("reads bare endpoints and scheme URLs and skips junk", () => {
    const text = [
      "# refreshed hourly",
      "1.2.3.4:8080",
      "socks5://5.6.7.8:1080/",
      "socks://9.9.9.9:1081 CN 120ms",
      "trojan://gw.test:443",
      "ftp://files.test:21",
      "not-a-proxy",
      "",
      "1.2.3.4:8080",
      "10.0.0.1:99999",
    ].join("\r\n");

    expect(parseIdentityFeed(text)).toEqual([
      { host: "1.2.3.4", port: 8080, protocol: "http" },
      { host: "5.6.7.8", port: 1080, protocol: "socks5" },
      { host: "9.9.9.9", port: 1081, protocol: "socks5" },
      { host: "gw.test", port: 443, protocol: "tls_tunnel" },
    ]);
  });

  it("applies the default protocol to bare endpoints", () => {
    expect(parseIdentityFeed("1.2.3.4:3128", "https")).toEqual([{ host: "1.2.3.4", port: 3128, protocol: "https" }]);
  });
});

describe("loadIdentityFeeds", () => {
  it("merges every reachable feed and logs the rest", async () => {
    const warning = vi.spyOn(log, "warning").mockImplementation(() => undefined);
    vi.spyOn(log, "info").mockImplementation(() => undefined);
    const { fetcher, calls } = routedFetch((url) => {
      if (url.endsWith("/a.txt")) return fakeResponse(200, "1.1.1.1:80\n2.2.2.2:81");
      if (url.endsWith("/b.txt")) return fakeResponse(200, "2.2.2.2:81\n3.3.3.3:82");
      if (url.endsWith("/c.txt")) return fakeResponse(500, "oops");
      return new Error("getaddrinfo ENOTFOUND");
    });

    const entries = await loadIdentityFeeds(
      ["https://feeds.test/a.txt", "https://feeds.test/b.txt", "https://feeds.test/c.txt", "https://gone.test/d.txt"],
      1000,
      fetcher,
    );

    expect(entries.map((entry) => `${entry.host}:${entry.port}`)).toEqual(["1.1.1.1:80", "2.2.2.2:81", "3.3.3.3:82"]);
    expect(calls).toHaveLength(4);
    expect(warning).toHaveBeenCalledWith("Identity feed returned a non-success status.", {
      url: "https://feeds.test/c.txt",
      status: 500,
    });
    expect(warning).toHaveBeenCalledWith("Identity feed could not be loaded.", {
      url: "https://gone.test/d.txt",
      error: "getaddrinfo ENOTFOUND",
    });
  });
});
