import { AnalyticsSettings, defaultAnalyticsSettings } from "../config/config";
import { DistortionComponents, DistortionScore, WeeklyFact } from "../domain/types";
import { mean, median, minMaxNormalize, Num } from "../lib/stats";
import { groupByEntity } from "./weekly";

export type DistortionSettings = Pick<
  AnalyticsSettings,
  "extremeP5Pivot" | "extremeVarCap" | "minScoringWeeks" | "recentWindowWeeks"
>;

const COMPONENTS = ["burstiness", "recentShift", "extremeness", "driftVsCumulative"] as const;

const NULL_COMPONENTS: DistortionComponents = {
  burstiness: null,
  recentShift: null,
  extremeness: null,
  driftVsCumulative: null,
};

/** Raw component values for one entity's week-ordered facts. */
export function scoreComponents(weeks: WeeklyFact[], settings: DistortionSettings): DistortionComponents {
  if (weeks.length < settings.minScoringWeeks) return { ...NULL_COMPONENTS };

  const counts = weeks.map((w) => w.reviewCount);
  const positive = counts.filter((c) => c > 0);
  const med = median(positive);
  const burstiness = med !== null && med > 0 ? Math.max(...counts) / med : null;

  const window = settings.recentWindowWeeks;
  let recentShift: Num = null;
  if (weeks.length > window) {
    const recent = mean(weeks.slice(-window).map((w) => w.avgRating));
    const prior = mean(weeks.slice(0, -window).map((w) => w.avgRating));
    recentShift = recent !== null && prior !== null ? Math.abs(recent - prior) : null;
  }

  const p5 = mean(weeks.map((w) => w.p5Share));
  const variance = mean(weeks.map((w) => w.ratingVariance)) ?? 0;
  const extremeness =
    p5 !== null
      ? (p5 - settings.extremeP5Pivot) * (settings.extremeVarCap - Math.min(variance, settings.extremeVarCap))
      : null;

  const last = weeks[weeks.length - 1];
  const driftVsCumulative =
    last.avgRating !== null && last.cumulativeAvgRating !== null
      ? Math.abs(last.avgRating - last.cumulativeAvgRating)
      : null;

  return { burstiness, recentShift, extremeness, driftVsCumulative };
}

/**
 * Heuristic manipulation score per entity. Each component is min-max scaled
 * across the entities in this call (missing values take the column median
 * first), so scores are relative to the batch being scored. Entities with too
 * few weeks get null components and a null score.
 */
export function scoreDistortion(
  facts: WeeklyFact[],
  settings: DistortionSettings = defaultAnalyticsSettings
): DistortionScore[] {
  const entities = Array.from(groupByEntity(facts).entries()).map(([entityId, weeks]) => ({
    entityId,
    weeks: weeks.length,
    eligible: weeks.length >= settings.minScoringWeeks,
    raw: scoreComponents(weeks, settings),
  }));

  const eligible = entities.filter((e) => e.eligible);
  const normalizedByEntity = new Map<string, DistortionComponents>(
    eligible.map((e) => [e.entityId, { ...NULL_COMPONENTS }])
  );

  for (const component of COMPONENTS) {
    const values = eligible.map((e) => e.raw[component]);
    const fill = median(values);
    const imputed = values.map((v) => (v === null ? fill : v));
    minMaxNormalize(imputed).forEach((norm, i) => {
      const target = normalizedByEntity.get(eligible[i].entityId);
      if (target) target[component] = norm;
    });
  }

  return entities.map((e) => {
    const normalized = normalizedByEntity.get(e.entityId) ?? { ...NULL_COMPONENTS };
    return {
      entityId: e.entityId,
      weeks: e.weeks,
      raw: e.raw,
      normalized,
      distortionProb: mean(COMPONENTS.map((c) => normalized[c])),
    };
  });
}

export default scoreDistortion;
