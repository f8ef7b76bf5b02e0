import { readOutcomeTable } from "../../adapters/outcome-table.adapter";
import { computeImpact, ImpactResult } from "../../analytics/impact";
import { scoreDistortion } from "../../analytics/distortion";
import { buildWeeklyOutcomes } from "../../analytics/outcomes";
import { buildWeeklyFacts } from "../../analytics/weekly";
import { AnalyticsSettings, defaultAnalyticsSettings } from "../../config/config";
import { logger as defaultLogger, Logger } from "../../config/logger";
import { DistortionScore, WeeklyFact } from "../../domain/types";
import { readReviewTable } from "../../integrations/storage/review-table.repo";
import { exportAnalytics } from "../../services/export-analytics.service";

export interface AnalyticsContext {
  tablePath: string;
  outDir: string;
  // Dated outcome rows (e.g. sales); impact is skipped without it
  outcomesPath?: string;
  settings?: AnalyticsSettings;
  logger?: Logger;
}

export interface AnalyticsRunResult {
  reviews: number;
  weekly: WeeklyFact[];
  distortion: DistortionScore[];
  impact?: ImpactResult;
  written: string[];
}

/**
 * Reads the accumulated review table and derives weekly facts, distortion
 * scores and, when an outcome series is supplied, the impact correlations.
 */
export async function runAnalytics(ctx: AnalyticsContext): Promise<AnalyticsRunResult> {
  const { tablePath, outDir, outcomesPath, settings = defaultAnalyticsSettings, logger = defaultLogger } = ctx;
  logger.info("analytics:start", { tablePath, outDir, outcomes: outcomesPath ?? null });

  const reviews = await readReviewTable(tablePath, { logger });
  const weekly = buildWeeklyFacts(reviews, {
    priorMean: settings.priorMean,
    priorStrength: settings.priorStrength,
    logger,
  });
  logger.info("analytics:weekly:done", { reviews: reviews.length, rows: weekly.length });

  const distortion = scoreDistortion(weekly, settings);
  logger.info("analytics:distortion:done", {
    entities: distortion.length,
    scored: distortion.filter((d) => d.distortionProb !== null).length,
  });

  let impact: ImpactResult | undefined;
  if (outcomesPath) {
    const outcomes = buildWeeklyOutcomes(await readOutcomeTable(outcomesPath, logger));
    impact = computeImpact(weekly, outcomes, { minPairs: settings.minCorrelationPairs });
    logger.info("analytics:impact:done", {
      outcomeWeeks: outcomes.length,
      perEntity: impact.perEntity.length,
      pooled: impact.pooled.length,
    });
  }

  const written = await exportAnalytics(outDir, { weekly, distortion, impact });
  logger.info("analytics:done", { written });
  return { reviews: reviews.length, weekly, distortion, impact, written };
}

export default runAnalytics;
