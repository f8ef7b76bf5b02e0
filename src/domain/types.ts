
export interface ReviewRecord {
  entityId: string;
  recordId: string | null;
  timestampRaw: string; // full precision, as delivered by the source
  rating: number | null; // 1..5
  title: string;
  body: string;
  verified: boolean;
  helpfulVotes: number;
}

export interface NearDupTag {
  nearDupMinBucket: string | null; // ISO-8601 UTC, floored to the minute
  contentHash200: string;
}

export type StoredReview = ReviewRecord & NearDupTag;

// Entities may arrive bare or carry a category for per-category counts
export type EntityInput = string | { entityId: string; category?: string };

export interface EntityCheckpoint {
  lastIds: string[]; // most recent first, capped
  lastDate: string | null;
  lastPage?: number;
  complete?: boolean;
  // Totals of the run that wrote this entry, so a resumed run keeps its limits
  runRecords?: number;
  runPages?: number;
  // Ids of the last completed run, held until an interrupted catch-up finishes
  knownIds?: string[];
}

export type CheckpointState = Record<string, EntityCheckpoint>;

export interface ReviewPageRequest {
  entityId: string;
  page: number; // 1-based
  signal: AbortSignal;
}

/**
 * Pull interface onto whatever collects raw reviews. The payload is parsed by
 * the page adapter; an empty page means there are no further pages.
 */
export interface ReviewSource {
  fetchPage(request: ReviewPageRequest): Promise<unknown>;
}

export interface WeeklyFact {
  entityId: string;
  week: string; // Monday, YYYY-MM-DD
  avgRating: number | null;
  reviewCount: number;
  ratingVariance: number | null;
  p5Share: number | null;
  p1Share: number | null;
  cumulativeReviewCount: number;
  cumulativeAvgRating: number | null;
  bayesRating: number | null;
}

export interface DistortionComponents {
  burstiness: number | null;
  recentShift: number | null;
  extremeness: number | null;
  driftVsCumulative: number | null;
}

export interface DistortionScore {
  entityId: string;
  weeks: number;
  raw: DistortionComponents;
  normalized: DistortionComponents;
  distortionProb: number | null;
}

export interface OutcomeRow {
  entityId: string;
  date: string;
  sales: number | null;
  price: number | null;
}

export interface WeeklyOutcome {
  entityId: string;
  week: string;
  weeklySales: number | null;
  avgPriceWeek: number | null;
  priceChangeWeekly: number | null;
}

export type ImpactType = "contemporaneous" | "lag1";

export interface ImpactRow {
  entityId: string;
  metric: string;
  type: ImpactType;
  corr: number;
  n: number;
}

export interface PooledImpactRow {
  metric: string;
  corr: number;
  n: number;
}

export type IngestError =
  | { kind: "fetch_failed"; message: string; attempts: number }
  | { kind: "timeout"; timeoutMs: number; attempts: number }
  | { kind: "parse_failed"; message: string }
  | { kind: "aborted" };
