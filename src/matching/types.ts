export type DocumentClass = "statute" | "interpretation" | "opinion" | "notice" | "reply" | "other";

export type Validity = "in_force" | "superseded" | "unknown";

export interface MatchCandidate {
  title: string;
  sourceId: string;
  url?: string | null;
  status?: string | null;
  publishedAt?: string | null;
  documentNumber?: string | null;
  rank?: number;
  documentClass?: DocumentClass;
}

export interface ScoredCandidate {
  candidate: MatchCandidate;
  score: number;
  validity: Validity;
  normalizedTitle: string;
}

export interface ResolveOptions {
  threshold?: number;
  documentNumber?: string | null;
}
