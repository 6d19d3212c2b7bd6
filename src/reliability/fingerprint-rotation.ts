export interface BrowserFingerprint {
  id: string;
  userAgent: string;
  acceptLanguage: string;
  locale: string;
  timezone: string;
  viewport: { width: number; height: number };
}

export interface FingerprintSnapshot {
  enabled: boolean;
  profiles: Array<{
    id: string;
    uses: number;
    blocked: number;
    last_used_at: string | null;
  }>;
}

interface ProfileState {
  profile: BrowserFingerprint;
  uses: number;
  blocked: number;
  lastUsedAt: number | null;
}

const DEFAULT_FINGERPRINTS: BrowserFingerprint[] = [
  {
    id: "chrome_win_zh",
    userAgent:
      "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36",
    acceptLanguage: "zh-CN,zh;q=0.9,en;q=0.8",
    locale: "zh-CN",
    timezone: "Asia/Shanghai",
    viewport: { width: 1920, height: 1080 },
  },
  {
    id: "edge_win_zh",
    userAgent:
      "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/123.0.0.0 Safari/537.36 Edg/123.0.0.0",
    acceptLanguage: "zh-CN,zh;q=0.9",
    locale: "zh-CN",
    timezone: "Asia/Shanghai",
    viewport: { width: 1536, height: 864 },
  },
  {
    id: "chrome_mac_zh",
    userAgent:
      "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36",
    acceptLanguage: "zh-CN,zh;q=0.8,en-US;q=0.6,en;q=0.4",
    locale: "zh-CN",
    timezone: "Asia/Shanghai",
    viewport: { width: 1440, height: 900 },
  },
  {
    id: "firefox_win_zh",
    userAgent: "Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:125.0) Gecko/20100101 Firefox/125.0",
    acceptLanguage: "zh-CN,zh;q=0.8,zh-TW;q=0.7,en;q=0.5",
    locale: "zh-CN",
    timezone: "Asia/Shanghai",
    viewport: { width: 1366, height: 768 },
  },
];

// A profile blocked on more than half of its uses sits out while others remain.
const BLOCK_RATIO_LIMIT = 0.5;

export class FingerprintRotator {
  private readonly enabled: boolean;
  private readonly profiles: ProfileState[];
  private cursor = 0;

  public constructor(config: { enabled: boolean; profiles?: BrowserFingerprint[] }) {
    this.enabled = config.enabled;
    const profiles = config.profiles && config.profiles.length > 0 ? config.profiles : DEFAULT_FINGERPRINTS;
    this.profiles = profiles.map((profile) => ({ profile, uses: 0, blocked: 0, lastUsedAt: null }));
  }

  public next(): BrowserFingerprint {
    const first = this.profiles[0];
    if (!this.enabled) return first.profile;

    let chosen: ProfileState | null = null;
    for (let offset = 0; offset < this.profiles.length; offset += 1) {
      const state = this.profiles[(this.cursor + offset) % this.profiles.length];
      const ratio = state.uses === 0 ? 0 : state.blocked / state.uses;
      if (ratio <= BLOCK_RATIO_LIMIT) {
        chosen = state;
        this.cursor = (this.cursor + offset + 1) % this.profiles.length;
        break;
      }
    }
    if (!chosen) {
      chosen = this.profiles[this.cursor % this.profiles.length];
      this.cursor = (this.cursor + 1) % this.profiles.length;
    }

    chosen.uses += 1;
    chosen.lastUsedAt = Date.now();
    return chosen.profile;
  }

  public reportBlocked(profileId: string): void {
    const state = this.profiles.find((entry) => entry.profile.id === profileId);
    if (!state) return;
    state.blocked += 1;
  }

  public headersFor(profile: BrowserFingerprint): Record<string, string> {
    return {
      "user-agent": profile.userAgent,
      "accept-language": profile.acceptLanguage,
      accept: "text/html,application/xhtml+xml,application/xml;q=0.9,application/json;q=0.8,*/*;q=0.7",
    };
  }

  public snapshot(): FingerprintSnapshot {
    return {
      enabled: this.enabled,
      profiles: this.profiles.map((entry) => ({
        id: entry.profile.id,
        uses: entry.uses,
        blocked: entry.blocked,
        last_used_at: entry.lastUsedAt ? new Date(entry.lastUsedAt).toISOString() : null,
      })),
    };
  }
}
