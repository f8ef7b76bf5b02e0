
export * from "./domain/types";
export { rawReviewSchema } from "./domain/schema";
export { loadConfig, defaultIngestSettings, defaultAnalyticsSettings } from "./config/config";
export type { AppConfig, IngestSettings, AnalyticsSettings } from "./config/config";
export { createLogger, logger, noopLogger } from "./config/logger";
export type { Logger, LogLevel } from "./config/logger";
export { ok, err, formatError } from "./lib/result";
export type { Result } from "./lib/result";
export { computeDedupKey, tagNearDuplicate, tagRecords, withinBatchDedup } from "./ingest/idempotency";
export { appendReviews, readReviewTable, REVIEW_COLUMNS } from "./integrations/storage/review-table.repo";
export { loadCheckpoint, saveCheckpoint, advanceCheckpoint, completeCheckpoint } from "./integrations/storage/checkpoint.repo";
export { parseReviewPage } from "./adapters/review-page.adapter";
export { createDirectoryReviewSource } from "./adapters/directory-source.adapter";
export { readOutcomeTable } from "./adapters/outcome-table.adapter";
export { fetchPageWithRetry } from "./services/fetch-page.service";
export { exportAnalytics } from "./services/export-analytics.service";
export { runIngest } from "./workflows/ingest/orchestrator";
export type { IngestContext, IngestRunResult, EntityOutcome, EntityState } from "./workflows/ingest/orchestrator";
export { buildWeeklyFacts, bayesAdjustedRating } from "./analytics/weekly";
export { buildWeeklyOutcomes } from "./analytics/outcomes";
export { scoreDistortion } from "./analytics/distortion";
export { computeImpact } from "./analytics/impact";
export { runAnalytics } from "./workflows/analytics/orchestrator";
export type { AnalyticsContext, AnalyticsRunResult } from "./workflows/analytics/orchestrator";
