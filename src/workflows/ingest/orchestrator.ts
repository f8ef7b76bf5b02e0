import { parseReviewPage } from "../../adapters/review-page.adapter";
import { IngestSettings } from "../../config/config";
import { logger as defaultLogger, Logger } from "../../config/logger";
import { CheckpointState, EntityCheckpoint, EntityInput, IngestError, ReviewSource, StoredReview } from "../../domain/types";
import { tagRecords } from "../../ingest/idempotency";
import { advanceCheckpoint, completeCheckpoint, loadCheckpoint, saveCheckpoint } from "../../integrations/storage/checkpoint.repo";
import { appendReviews } from "../../integrations/storage/review-table.repo";
import { fetchPageWithRetry } from "../../services/fetch-page.service";

export type EntityState =
  | "PENDING"
  | "FETCHING_PAGE"
  | "PARSING"
  | "SINKING"
  | "DONE"
  | "STOPPED_BY_LIMIT"
  | "STOPPED_BY_ERROR"
  | "SKIPPED";

export type TerminalState = Extract<EntityState, "DONE" | "STOPPED_BY_LIMIT" | "STOPPED_BY_ERROR" | "SKIPPED">;

export type StopReason =
  | "no_more_pages"
  | "empty_page"
  | "caught_up"
  | "parse_error"
  | "record_limit"
  | "page_limit"
  | "fetch_error"
  | "aborted"
  | "already_complete";

export interface EntityOutcome {
  entityId: string;
  category: string | null;
  state: TerminalState;
  reason: StopReason;
  startPage: number;
  pages: number; // pages sunk this run
  fetched: number; // records accepted this run
  added: number; // rows the durable table grew by
  rejected: number;
  error?: IngestError;
}

export interface CategoryCount {
  category: string;
  entities: number;
  records: number;
}

export interface IngestRunResult {
  records: StoredReview[];
  outcomes: EntityOutcome[];
  perCategory: CategoryCount[];
  totals: { entities: number; fetched: number; added: number; rejected: number; failed: number };
  aborted: boolean;
}

export interface IngestContext {
  source: ReviewSource;
  tablePath: string;
  checkpointDir: string;
  settings: IngestSettings;
  logger?: Logger;
  signal?: AbortSignal;
  // Skip entities whose last run finished instead of catching them up
  skipCompleted?: boolean;
}

interface NormalizedEntity {
  entityId: string;
  category: string | null;
}

export const UNCATEGORIZED = "uncategorized";

export function normalizeEntities(inputs: EntityInput[], logger: Logger = defaultLogger): NormalizedEntity[] {
  const seen = new Set<string>();
  const out: NormalizedEntity[] = [];
  for (const input of inputs) {
    const entityId = (typeof input === "string" ? input : input.entityId).trim();
    if (!entityId) {
      logger.warn("ingest:entity:blank");
      continue;
    }
    if (seen.has(entityId)) continue;
    seen.add(entityId);
    const category = typeof input === "string" ? null : input.category?.trim() || null;
    out.push({ entityId, category });
  }
  return out;
}

async function ingestEntity(
  entity: NormalizedEntity,
  ctx: IngestContext,
  checkpoint: CheckpointState,
  runRecords: StoredReview[]
): Promise<EntityOutcome> {
  const { source, tablePath, checkpointDir, settings, signal, logger = defaultLogger } = ctx;
  const { entityId, category } = entity;
  const previous: EntityCheckpoint | undefined = checkpoint[entityId];

  const transition = (state: EntityState, page: number) => logger.debug("ingest:state", { entityId, page, state });
  transition("PENDING", 0);

  const resumeFrom = previous?.complete === false ? previous.lastPage : undefined;
  const resuming = resumeFrom !== undefined;
  const startPage = resumeFrom !== undefined ? resumeFrom + 1 : 1;
  const outcome: EntityOutcome = {
    entityId,
    category,
    state: "DONE",
    reason: "no_more_pages",
    startPage,
    pages: 0,
    fetched: 0,
    added: 0,
    rejected: 0,
  };
  const finish = (state: TerminalState, reason: StopReason, error?: IngestError): EntityOutcome => {
    outcome.state = state;
    outcome.reason = reason;
    if (error) outcome.error = error;
    transition(state, startPage + outcome.pages);
    return outcome;
  };

  if (previous?.complete && ctx.skipCompleted) {
    logger.info("ingest:entity:skip", { entityId, lastDate: previous.lastDate });
    return finish("SKIPPED", "already_complete");
  }
  if (resuming) logger.info("ingest:entity:resume", { entityId, startPage });

  // Ids from the previous completed run mark where already-stored reviews begin;
  // a resumed run takes them from the entry it left open
  const knownIds = new Set(resuming ? previous?.knownIds ?? [] : previous?.lastIds ?? []);
  // Records and pages the interrupted run already committed count toward the limits
  const priorRecords = resuming ? previous?.runRecords ?? 0 : 0;
  const priorPages = resuming ? previous?.runPages ?? 0 : 0;
  let firstPageOfRun = !resuming;

  for (let page = startPage; ; page++) {
    if (signal?.aborted) return finish("STOPPED_BY_ERROR", "aborted", { kind: "aborted" });

    transition("FETCHING_PAGE", page);
    const fetched = await fetchPageWithRetry(source, entityId, page, {
      maxRetries: settings.maxRetries,
      retryBackoffMs: settings.retryBackoffMs,
      fetchTimeoutMs: settings.fetchTimeoutMs,
      signal,
      logger,
    });
    if (!fetched.ok) {
      if (fetched.error.kind === "aborted") return finish("STOPPED_BY_ERROR", "aborted", fetched.error);
      logger.error("ingest:entity:abandoned", { entityId, page, error: fetched.error });
      return finish("STOPPED_BY_ERROR", "fetch_error", fetched.error);
    }

    transition("PARSING", page);
    const parsed = parseReviewPage(entityId, fetched.value, logger);
    const pageRecords = parsed.ok ? parsed.value.records : [];
    if (parsed.ok) outcome.rejected += parsed.value.rejected;

    if (pageRecords.length === 0) {
      if (!parsed.ok) logger.warn("ingest:parse:failed", { entityId, page, error: parsed.error });
      const entry: EntityCheckpoint | undefined = checkpoint[entityId];
      if (entry) {
        checkpoint[entityId] = completeCheckpoint(entry);
        await saveCheckpoint(checkpointDir, checkpoint);
      }
      return parsed.ok ? finish("DONE", "empty_page") : finish("DONE", "parse_error", parsed.error);
    }

    transition("SINKING", page);
    const budget = Math.max(0, settings.maxRecordsPerEntity - priorRecords - outcome.fetched);
    const sunk = tagRecords(pageRecords.slice(0, budget));
    const added = await appendReviews(tablePath, sunk, { logger });
    runRecords.push(...sunk);
    outcome.pages += 1;
    outcome.fetched += sunk.length;
    outcome.added += added;

    let terminal: [TerminalState, StopReason] | null = null;
    if (priorRecords + outcome.fetched >= settings.maxRecordsPerEntity) terminal = ["STOPPED_BY_LIMIT", "record_limit"];
    else if (sunk.some((r) => r.recordId !== null && knownIds.has(r.recordId))) terminal = ["DONE", "caught_up"];
    else if (parsed.ok && parsed.value.hasNextPage === false) terminal = ["DONE", "no_more_pages"];
    else if (priorPages + outcome.pages >= settings.maxPages) terminal = ["STOPPED_BY_LIMIT", "page_limit"];

    checkpoint[entityId] = advanceCheckpoint(checkpoint[entityId], {
      page,
      records: sunk,
      firstPageOfRun,
      maxIds: settings.checkpointMaxIds,
      complete: terminal !== null,
      knownIds: Array.from(knownIds),
    });
    await saveCheckpoint(checkpointDir, checkpoint);
    logger.info("ingest:page:sunk", { entityId, page, records: sunk.length, added });

    if (terminal) return finish(terminal[0], terminal[1]);
    firstPageOfRun = false;
  }
}

function countByCategory(outcomes: EntityOutcome[]): CategoryCount[] {
  const counts = new Map<string, CategoryCount>();
  for (const o of outcomes) {
    const category = o.category ?? UNCATEGORIZED;
    const entry = counts.get(category) ?? { category, entities: 0, records: 0 };
    entry.entities += 1;
    entry.records += o.fetched;
    counts.set(category, entry);
  }
  return Array.from(counts.values());
}

/**
 * Collects reviews for each entity in order, one page at a time. Every page is
 * appended to the durable table and checkpointed before the next is fetched,
 * and a failing entity is recorded in its outcome without stopping the run.
 */
export async function runIngest(entities: EntityInput[], ctx: IngestContext): Promise<IngestRunResult> {
  const logger = ctx.logger ?? defaultLogger;
  const queue = normalizeEntities(entities, logger);
  logger.info("ingest:start", { entities: queue.length, tablePath: ctx.tablePath });

  const checkpoint = await loadCheckpoint(ctx.checkpointDir, { logger });
  const records: StoredReview[] = [];
  const outcomes: EntityOutcome[] = [];

  for (const entity of queue) {
    if (ctx.signal?.aborted) break;
    const outcome = await ingestEntity(entity, ctx, checkpoint, records);
    outcomes.push(outcome);
    logger.info("ingest:entity:done", {
      entityId: outcome.entityId,
      state: outcome.state,
      reason: outcome.reason,
      pages: outcome.pages,
      fetched: outcome.fetched,
      added: outcome.added,
    });
  }

  const totals = {
    entities: outcomes.length,
    fetched: outcomes.reduce((a, o) => a + o.fetched, 0),
    added: outcomes.reduce((a, o) => a + o.added, 0),
    rejected: outcomes.reduce((a, o) => a + o.rejected, 0),
    failed: outcomes.filter((o) => o.state === "STOPPED_BY_ERROR").length,
  };
  const result: IngestRunResult = {
    records,
    outcomes,
    perCategory: countByCategory(outcomes),
    totals,
    aborted: ctx.signal?.aborted ?? false,
  };
  logger.info("ingest:done", { ...totals, aborted: result.aborted });
  return result;
}

export default runIngest;
