import { defaultAnalyticsSettings } from "../config/config";
import { ImpactRow, PooledImpactRow, WeeklyFact, WeeklyOutcome } from "../domain/types";
import { mean, Num, pearson } from "../lib/stats";
import { addDays } from "../lib/time";
import { groupByEntity } from "./weekly";

interface WeekView {
  fact?: WeeklyFact;
  outcome?: WeeklyOutcome;
}

type MetricReader = (view: WeekView) => Num;

export const IMPACT_METRICS: ReadonlyArray<[string, MetricReader]> = [
  ["avg_rating_week", (v) => v.fact?.avgRating ?? null],
  ["reviews_count_week", (v) => v.fact?.reviewCount ?? null],
  ["p5_share_week", (v) => v.fact?.p5Share ?? null],
  ["bayes_rating_week", (v) => v.fact?.bayesRating ?? null],
  ["avg_price_week", (v) => v.outcome?.avgPriceWeek ?? null],
  ["price_change_weekly", (v) => v.outcome?.priceChangeWeekly ?? null],
];

export interface ImpactOptions {
  minPairs?: number;
}

export interface ImpactResult {
  perEntity: ImpactRow[];
  pooled: PooledImpactRow[];
}

function byWeek(facts: WeeklyFact[], outcomes: WeeklyOutcome[]): Map<string, WeekView> {
  const views = new Map<string, WeekView>();
  for (const fact of facts) views.set(fact.week, { ...views.get(fact.week), fact });
  for (const outcome of outcomes) views.set(outcome.week, { ...views.get(outcome.week), outcome });
  return views;
}

function pairsFor(weeks: string[], views: Map<string, WeekView>, read: MetricReader, lagDays: number): Array<[number, number]> {
  const pairs: Array<[number, number]> = [];
  for (const week of weeks) {
    const y = views.get(week)?.outcome?.weeklySales ?? null;
    const view = views.get(lagDays === 0 ? week : addDays(week, -lagDays));
    const x = view ? read(view) : null;
    if (x !== null && y !== null && Number.isFinite(x) && Number.isFinite(y)) pairs.push([y, x]);
  }
  return pairs;
}

/**
 * Correlates weekly review metrics with the outcome series (e.g. sales).
 *
 * Per entity, each metric is paired with the outcome in the same week
 * (`contemporaneous`) and in the following week (`lag1`, metric at t-1 vs
 * outcome at t). The pooled figures demean both sides within each entity first
 * and correlate all entities' residuals together. Fewer than `minPairs` pairs,
 * or a metric with no variance, produces no row.
 */
export function computeImpact(
  facts: WeeklyFact[],
  outcomes: WeeklyOutcome[],
  options: ImpactOptions = {}
): ImpactResult {
  const minPairs = options.minPairs ?? defaultAnalyticsSettings.minCorrelationPairs;
  const factsByEntity = groupByEntity(facts);
  const outcomesByEntity = groupByEntity(outcomes);

  const perEntity: ImpactRow[] = [];
  const pooledPairs = new Map<string, Array<[number, number]>>(IMPACT_METRICS.map(([name]) => [name, []]));

  for (const [entityId, entityOutcomes] of outcomesByEntity) {
    const views = byWeek(factsByEntity.get(entityId) ?? [], entityOutcomes);
    const outcomeWeeks = entityOutcomes.filter((o) => o.weeklySales !== null).map((o) => o.week);

    if (outcomeWeeks.length >= minPairs) {
      for (const [metric, read] of IMPACT_METRICS) {
        const same = pairsFor(outcomeWeeks, views, read, 0);
        const sameR = same.length >= minPairs ? pearson(same) : null;
        if (sameR !== null) perEntity.push({ entityId, metric, type: "contemporaneous", corr: sameR, n: same.length });

        const lagged = pairsFor(outcomeWeeks, views, read, 7);
        const lagR = lagged.length >= minPairs ? pearson(lagged) : null;
        if (lagR !== null) perEntity.push({ entityId, metric: `${metric}_lag1`, type: "lag1", corr: lagR, n: lagged.length });
      }
    }

    // Within-entity demeaning removes each entity's own level
    const salesMean = mean(outcomeWeeks.map((w) => views.get(w)?.outcome?.weeklySales ?? null));
    if (salesMean === null) continue;
    for (const [metric, read] of IMPACT_METRICS) {
      const values = outcomeWeeks.map((w) => {
        const view = views.get(w);
        return view ? read(view) : null;
      });
      const metricMean = mean(values);
      if (metricMean === null) continue;
      const bucket = pooledPairs.get(metric) ?? [];
      outcomeWeeks.forEach((w, i) => {
        const y = views.get(w)?.outcome?.weeklySales ?? null;
        const x = values[i];
        if (x !== null && y !== null && Number.isFinite(x)) bucket.push([y - salesMean, x - metricMean]);
      });
      pooledPairs.set(metric, bucket);
    }
  }

  const pooled: PooledImpactRow[] = [];
  for (const [metric, pairs] of pooledPairs) {
    if (pairs.length < minPairs) continue;
    const r = pearson(pairs);
    if (r !== null) pooled.push({ metric, corr: r, n: pairs.length });
  }

  return { perEntity, pooled };
}

export default computeImpact;
