import { defaultAnalyticsSettings } from "../config/config";
import { logger as defaultLogger, Logger } from "../config/logger";
import { WeeklyFact } from "../domain/types";
import { mean, sampleVariance } from "../lib/stats";
import { parseTimestamp, weekStartKey } from "../lib/time";

export interface RatedObservation {
  entityId: string;
  rating: number | null;
  timestampRaw: string;
}

export interface BayesPrior {
  priorMean: number;
  priorStrength: number;
}

export interface WeeklyOptions extends Partial<BayesPrior> {
  logger?: Logger;
}

/**
 * Shrinks a week's average toward the prior, weighted by its review count.
 * Null for a week without reviews.
 */
export function bayesAdjustedRating(avgRating: number | null, reviewCount: number, prior: BayesPrior): number | null {
  if (avgRating === null || reviewCount <= 0) return null;
  return (prior.priorMean * prior.priorStrength + avgRating * reviewCount) / (prior.priorStrength + reviewCount);
}

export function compareEntityWeek(a: { entityId: string; week: string }, b: { entityId: string; week: string }): number {
  if (a.entityId !== b.entityId) return a.entityId < b.entityId ? -1 : 1;
  if (a.week !== b.week) return a.week < b.week ? -1 : 1;
  return 0;
}

/**
 * Rolls individual reviews into one row per entity and Monday-aligned week,
 * with running totals per entity. Reviews without a rating or with an
 * unparseable timestamp are left out.
 */
export function buildWeeklyFacts(rows: RatedObservation[], options: WeeklyOptions = {}): WeeklyFact[] {
  const {
    priorMean = defaultAnalyticsSettings.priorMean,
    priorStrength = defaultAnalyticsSettings.priorStrength,
    logger = defaultLogger,
  } = options;

  const groups = new Map<string, { entityId: string; week: string; ratings: number[] }>();
  let excluded = 0;
  for (const row of rows) {
    const ts = parseTimestamp(row.timestampRaw);
    if (!ts || row.rating === null || !Number.isFinite(row.rating)) {
      excluded++;
      continue;
    }
    const week = weekStartKey(ts);
    const key = `${row.entityId}\u0000${week}`;
    const group = groups.get(key) ?? { entityId: row.entityId, week, ratings: [] };
    group.ratings.push(row.rating);
    groups.set(key, group);
  }
  if (excluded > 0) logger.debug("analytics:weekly:excluded", { excluded });

  const sorted = Array.from(groups.values()).sort(compareEntityWeek);
  const facts: WeeklyFact[] = [];
  let currentEntity: string | null = null;
  let cumCount = 0;
  let cumSum = 0;

  for (const g of sorted) {
    if (g.entityId !== currentEntity) {
      currentEntity = g.entityId;
      cumCount = 0;
      cumSum = 0;
    }
    const reviewCount = g.ratings.length;
    const avgRating = mean(g.ratings);
    cumCount += reviewCount;
    cumSum += g.ratings.reduce((a, b) => a + b, 0);

    facts.push({
      entityId: g.entityId,
      week: g.week,
      avgRating,
      reviewCount,
      ratingVariance: sampleVariance(g.ratings),
      p5Share: reviewCount > 0 ? g.ratings.filter((r) => r === 5).length / reviewCount : null,
      p1Share: reviewCount > 0 ? g.ratings.filter((r) => r === 1).length / reviewCount : null,
      cumulativeReviewCount: cumCount,
      cumulativeAvgRating: cumCount > 0 ? cumSum / cumCount : null,
      bayesRating: bayesAdjustedRating(avgRating, reviewCount, { priorMean, priorStrength }),
    });
  }

  logger.debug("analytics:weekly:done", { rows: rows.length, weeks: facts.length });
  return facts;
}

/** Groups facts per entity, each list in week order. */
export function groupByEntity<T extends { entityId: string; week: string }>(rows: T[]): Map<string, T[]> {
  const out = new Map<string, T[]>();
  for (const row of [...rows].sort(compareEntityWeek)) {
    const list = out.get(row.entityId) ?? [];
    list.push(row);
    out.set(row.entityId, list);
  }
  return out;
}

export default buildWeeklyFacts;
