import { promises as fs } from "fs";
import os from "os";
import path from "path";
import type { Logger } from "../src/config/logger";
import type { ReviewPageRequest, ReviewRecord, ReviewSource, WeeklyFact } from "../src/domain/types";
import { addDays } from "../src/lib/time";

export interface LogEntry {
  level: "debug" | "info" | "warn" | "error";
  msg: string;
  ctx?: Record<string, unknown>;
}

export function captureLogger(): Logger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return {
    entries,
    debug: (msg, ctx) => entries.push({ level: "debug", msg, ctx }),
    info: (msg, ctx) => entries.push({ level: "info", msg, ctx }),
    warn: (msg, ctx) => entries.push({ level: "warn", msg, ctx }),
    error: (msg, ctx) => entries.push({ level: "error", msg, ctx }),
  };
}

export async function makeTempDir(prefix = "review-etl-"): Promise<string> {
  return await fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export function record(overrides: Partial<ReviewRecord> = {}): ReviewRecord {
  return {
    entityId: "E1",
    recordId: null,
    timestampRaw: "2024-01-01T10:00:00",
    rating: 5,
    title: "Great",
    body: "Works well",
    verified: false,
    helpfulVotes: 0,
    ...overrides,
  };
}

export interface RawItem {
  record_id?: string;
  timestamp_raw?: string;
  rating?: number | null;
  title?: string;
  body?: string;
  entity_id?: string;
}

export function rawItem(id: string, day = 1, rating = 4): RawItem {
  return {
    record_id: id,
    timestamp_raw: `2024-01-${String(day).padStart(2, "0")}T10:00:00`,
    rating,
    title: `title ${id}`,
    body: `body ${id}`,
  };
}

/** Pages of `perPage` items with ids `<entity>-p<page>-<n>`. */
export function makePages(entityId: string, pageCount: number, perPage: number): RawItem[][] {
  const pages: RawItem[][] = [];
  for (let p = 1; p <= pageCount; p++) {
    const items: RawItem[] = [];
    for (let n = 1; n <= perPage; n++) items.push(rawItem(`${entityId}-p${p}-${n}`, p));
    pages.push(items);
  }
  return pages;
}

export type PageHandler = (request: ReviewPageRequest) => Promise<unknown>;

/**
 * In-process review source. Pages beyond those given are empty; `calls` records
 * every request as `<entity>:<page>`.
 */
export function memorySource(
  pages: Record<string, unknown[]>,
  overrides: Record<string, PageHandler> = {}
): ReviewSource & { calls: string[] } {
  const calls: string[] = [];
  return {
    calls,
    async fetchPage(request) {
      calls.push(`${request.entityId}:${request.page}`);
      const override = overrides[request.entityId];
      if (override) return await override(request);
      return pages[request.entityId]?.[request.page - 1] ?? [];
    },
  };
}

export function assertClose(actual: number | null | undefined, expected: number, epsilon = 1e-9): void {
  if (typeof actual !== "number" || Math.abs(actual - expected) > epsilon) {
    throw new Error(`expected ${String(actual)} to be within ${epsilon} of ${expected}`);
  }
}

export function weeklyFact(entityId: string, week: string, overrides: Partial<WeeklyFact> = {}): WeeklyFact {
  return {
    entityId,
    week,
    avgRating: 4,
    reviewCount: 1,
    ratingVariance: 0,
    p5Share: 0,
    p1Share: 0,
    cumulativeReviewCount: 1,
    cumulativeAvgRating: 4,
    bayesRating: null,
    ...overrides,
  };
}

/** Monday keys starting 2024-01-01. */
export function mondays(count: number): string[] {
  return Array.from({ length: count }, (_, i) => addDays("2024-01-01", 7 * i));
}
