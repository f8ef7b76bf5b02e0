import path from "path";
import { DistortionScore, ImpactRow, PooledImpactRow, WeeklyFact } from "../domain/types";
import { formatNumber, TableRow, writeTable } from "../integrations/storage/table.codec";

export const OUTPUT_FILES = {
  weekly: "weekly_facts.csv",
  distortion: "distortion_by_entity.csv",
  impactPerEntity: "impact_per_entity.csv",
  impactPooled: "impact_pooled.csv",
} as const;

export const WEEKLY_COLUMNS = [
  "entity_id",
  "week",
  "avg_rating_week",
  "reviews_count_week",
  "rating_var_week",
  "p5_share_week",
  "p1_share_week",
  "cum_reviews",
  "cum_avg_rating",
  "bayes_rating_week",
] as const;

export const DISTORTION_COLUMNS = [
  "entity_id",
  "weeks",
  "burstiness",
  "recent_shift",
  "extremeness",
  "drift_vs_cum",
  "norm_burstiness",
  "norm_recent_shift",
  "norm_extremeness",
  "norm_drift_vs_cum",
  "distortion_prob",
] as const;

export const IMPACT_COLUMNS = ["entity_id", "metric", "type", "corr", "n"] as const;
export const POOLED_COLUMNS = ["metric", "corr_outcome_dm", "n"] as const;

// Map domain rows → delimited table shape (column names per output schema)
export function weeklyFactRow(f: WeeklyFact): TableRow {
  return {
    entity_id: f.entityId,
    week: f.week,
    avg_rating_week: formatNumber(f.avgRating),
    reviews_count_week: String(f.reviewCount),
    rating_var_week: formatNumber(f.ratingVariance),
    p5_share_week: formatNumber(f.p5Share),
    p1_share_week: formatNumber(f.p1Share),
    cum_reviews: String(f.cumulativeReviewCount),
    cum_avg_rating: formatNumber(f.cumulativeAvgRating),
    bayes_rating_week: formatNumber(f.bayesRating),
  };
}

export function distortionRow(s: DistortionScore): TableRow {
  return {
    entity_id: s.entityId,
    weeks: String(s.weeks),
    burstiness: formatNumber(s.raw.burstiness),
    recent_shift: formatNumber(s.raw.recentShift),
    extremeness: formatNumber(s.raw.extremeness),
    drift_vs_cum: formatNumber(s.raw.driftVsCumulative),
    norm_burstiness: formatNumber(s.normalized.burstiness),
    norm_recent_shift: formatNumber(s.normalized.recentShift),
    norm_extremeness: formatNumber(s.normalized.extremeness),
    norm_drift_vs_cum: formatNumber(s.normalized.driftVsCumulative),
    distortion_prob: formatNumber(s.distortionProb),
  };
}

export function impactRow(r: ImpactRow): TableRow {
  return { entity_id: r.entityId, metric: r.metric, type: r.type, corr: formatNumber(r.corr), n: String(r.n) };
}

export function pooledRow(r: PooledImpactRow): TableRow {
  return { metric: r.metric, corr_outcome_dm: formatNumber(r.corr), n: String(r.n) };
}

export interface AnalyticsTables {
  weekly: WeeklyFact[];
  distortion: DistortionScore[];
  impact?: { perEntity: ImpactRow[]; pooled: PooledImpactRow[] };
}

export async function exportAnalytics(outDir: string, tables: AnalyticsTables): Promise<string[]> {
  const written: string[] = [];
  const write = async (file: string, columns: readonly string[], rows: TableRow[]) => {
    const target = path.join(outDir, file);
    await writeTable(target, columns, rows);
    written.push(target);
  };

  await write(OUTPUT_FILES.weekly, WEEKLY_COLUMNS, tables.weekly.map(weeklyFactRow));
  await write(OUTPUT_FILES.distortion, DISTORTION_COLUMNS, tables.distortion.map(distortionRow));
  if (tables.impact) {
    await write(OUTPUT_FILES.impactPerEntity, IMPACT_COLUMNS, tables.impact.perEntity.map(impactRow));
    await write(OUTPUT_FILES.impactPooled, POOLED_COLUMNS, tables.impact.pooled.map(pooledRow));
  }
  return written;
}

export default exportAnalytics;
