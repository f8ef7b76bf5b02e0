import { config as loadDotenv } from "dotenv";

// .env is optional; values can still be provided by the environment
loadDotenv();

export type LogLevelSetting = "debug" | "info" | "warn" | "error";

export interface IngestSettings {
  maxRecordsPerEntity: number;
  maxPages: number;
  maxRetries: number;
  retryBackoffMs: number;
  fetchTimeoutMs: number;
  checkpointMaxIds: number;
}

export interface AnalyticsSettings {
  priorMean: number;
  priorStrength: number;
  extremeP5Pivot: number;
  extremeVarCap: number;
  minScoringWeeks: number;
  recentWindowWeeks: number;
  minCorrelationPairs: number;
}

export interface AppConfig {
  storage: {
    reviewsTablePath: string;
    checkpointDir: string;
    outputDir: string;
  };
  ingest: IngestSettings;
  analytics: AnalyticsSettings;
  logLevel: LogLevelSetting;
  logDir?: string;
  nodeEnv: "development" | "production" | "test" | string;
}

export const defaultIngestSettings: IngestSettings = {
  maxRecordsPerEntity: 500,
  maxPages: 50,
  maxRetries: 3,
  retryBackoffMs: 1000,
  fetchTimeoutMs: 30000,
  checkpointMaxIds: 50,
};

export const defaultAnalyticsSettings: AnalyticsSettings = {
  priorMean: 4.1,
  priorStrength: 20,
  extremeP5Pivot: 0.6,
  extremeVarCap: 0.5,
  minScoringWeeks: 3,
  recentWindowWeeks: 4,
  minCorrelationPairs: 8,
};

function intFromEnv(name: string, fallback: number, min: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const parsed = parseInt(raw, 10);
  if (Number.isNaN(parsed)) return fallback;
  return Math.max(min, parsed);
}

function floatFromEnv(name: string, fallback: number, min: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) return fallback;
  return Math.max(min, parsed);
}

function logLevelFromEnv(): LogLevelSetting {
  const raw = (process.env.LOG_LEVEL || "").toLowerCase();
  if (raw === "debug" || raw === "info" || raw === "warn" || raw === "error") return raw;
  return "info";
}

export function loadConfig(): AppConfig {
  return {
    storage: {
      reviewsTablePath: process.env.REVIEWS_TABLE_PATH || "data/reviews.csv",
      checkpointDir: process.env.CHECKPOINT_DIR || "data",
      outputDir: process.env.OUTPUT_DIR || "out",
    },
    ingest: {
      maxRecordsPerEntity: intFromEnv("INGEST_MAX_RECORDS_PER_ENTITY", defaultIngestSettings.maxRecordsPerEntity, 1),
      maxPages: intFromEnv("INGEST_MAX_PAGES", defaultIngestSettings.maxPages, 1),
      maxRetries: intFromEnv("INGEST_MAX_RETRIES", defaultIngestSettings.maxRetries, 0),
      retryBackoffMs: intFromEnv("INGEST_RETRY_BACKOFF_MS", defaultIngestSettings.retryBackoffMs, 0),
      fetchTimeoutMs: intFromEnv("INGEST_FETCH_TIMEOUT_MS", defaultIngestSettings.fetchTimeoutMs, 1),
      checkpointMaxIds: intFromEnv("CHECKPOINT_MAX_IDS", defaultIngestSettings.checkpointMaxIds, 1),
    },
    analytics: {
      priorMean: floatFromEnv("ANALYTICS_PRIOR_MEAN", defaultAnalyticsSettings.priorMean, 0),
      priorStrength: floatFromEnv("ANALYTICS_PRIOR_STRENGTH", defaultAnalyticsSettings.priorStrength, 0),
      extremeP5Pivot: floatFromEnv("ANALYTICS_EXTREME_P5_PIVOT", defaultAnalyticsSettings.extremeP5Pivot, 0),
      extremeVarCap: floatFromEnv("ANALYTICS_EXTREME_VAR_CAP", defaultAnalyticsSettings.extremeVarCap, 0),
      minScoringWeeks: intFromEnv("ANALYTICS_MIN_SCORING_WEEKS", defaultAnalyticsSettings.minScoringWeeks, 1),
      recentWindowWeeks: intFromEnv("ANALYTICS_RECENT_WINDOW_WEEKS", defaultAnalyticsSettings.recentWindowWeeks, 1),
      minCorrelationPairs: intFromEnv("ANALYTICS_MIN_CORRELATION_PAIRS", defaultAnalyticsSettings.minCorrelationPairs, 3),
    },
    logLevel: logLevelFromEnv(),
    logDir: process.env.LOG_DIR || undefined,
    nodeEnv: process.env.NODE_ENV || "development",
  };
}
