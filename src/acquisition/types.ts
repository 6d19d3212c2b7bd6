import type { Classification, ResponseSample } from "../detection/types";
import type { MatchCandidate } from "../matching/types";
import type { BrowserFingerprint } from "../reliability/fingerprint-rotation";
import type { NetworkIdentity } from "../reliability/identity-pool";
import type { AppErrorCode } from "../runtime/errors";
import type { HttpClient } from "./http-client";

export const KNOWN_STRATEGIES = ["structured_api", "direct_url", "search_engine", "browser_search"] as const;

export type KnownStrategyName = (typeof KNOWN_STRATEGIES)[number];

export type StrategyTransport = "http" | "browser";

export interface RawRecord {
  title: string;
  url: string | null;
  source: string;
  documentNumber: string | null;
  issuingOffice: string | null;
  publishedAt: string | null;
  effectiveAt: string | null;
  status: string | null;
  content: string | null;
  keywords: string[];
  extra?: Record<string, unknown>;
}

export interface StrategyContext<TSession = undefined> {
  targetName: string;
  identity: NetworkIdentity | null;
  http: HttpClient;
  fingerprint: BrowserFingerprint;
  session: TSession | null;
  signal: AbortSignal;
  timeoutMs: number;
  /** Runs a response that did not come through `http` past the analyzer. */
  screen(sample: ResponseSample): Classification;
}

/**
 * One self-contained way of locating and retrieving a document. Strategies
 * never see the pool or the analyzer directly; they do network I/O through
 * `ctx.http` or their session.
 */
export interface AcquisitionStrategy<TSession = undefined> {
  readonly name: string;
  readonly transport: StrategyTransport;
  search(name: string, ctx: StrategyContext<TSession>): Promise<MatchCandidate[]>;
  fetchDetail(candidate: MatchCandidate, ctx: StrategyContext<TSession>): Promise<RawRecord>;
  supportsBatchSession(): boolean;
  /** Narrows which identities the strategy can route through; defaults to what its transport supports. */
  acceptsIdentity?(identity: NetworkIdentity): boolean;
  openSession?(): Promise<TSession>;
  closeSession?(session: TSession): Promise<void>;
}

export type AttemptOutcome = "success" | "no_match" | "failed" | "banned" | "timeout" | "skipped";

export interface AttemptTrace {
  strategy: string;
  outcome: AttemptOutcome;
  elapsedMs: number;
  matchScore: number | null;
  error: { code: AppErrorCode; message: string } | null;
}

export interface AcquisitionResult {
  readonly targetName: string;
  readonly found: boolean;
  readonly record: RawRecord | null;
  readonly strategyUsed: string | null;
  readonly matchScore: number | null;
  readonly elapsedMs: number;
  readonly error: { code: AppErrorCode; message: string } | null;
  readonly escalated: boolean;
  readonly attempts: readonly AttemptTrace[];
}
