import path from "path";
import { checkpointFileSchema, CheckpointFile } from "../../domain/schema";
import { CheckpointState, EntityCheckpoint, ReviewRecord } from "../../domain/types";
import { logger as defaultLogger, Logger } from "../../config/logger";
import { formatError } from "../../lib/result";
import { readFileIfExists, writeFileAtomic } from "./atomic-file";

export const CHECKPOINT_FILE = "checkpoint.json";

export interface CheckpointOptions {
  logger?: Logger;
}

export function checkpointPath(dir: string): string {
  return path.join(dir, CHECKPOINT_FILE);
}

/**
 * Loads per-entity ingestion cursors. An absent, unreadable or malformed file
 * yields an empty state.
 */
export async function loadCheckpoint(dir: string, options: CheckpointOptions = {}): Promise<CheckpointState> {
  const { logger = defaultLogger } = options;
  const file = checkpointPath(dir);

  let text: string | null;
  let json: unknown;
  try {
    text = await readFileIfExists(file);
    if (text === null || text.trim() === "") return {};
    json = JSON.parse(text);
  } catch (e) {
    logger.warn("checkpoint:load:corrupt", { path: file, message: formatError(e) });
    return {};
  }

  const parsed = checkpointFileSchema.safeParse(json);
  if (!parsed.success) {
    logger.warn("checkpoint:load:corrupt", { path: file, message: parsed.error.issues[0]?.message ?? "invalid" });
    return {};
  }

  const state: CheckpointState = {};
  for (const [entityId, entry] of Object.entries(parsed.data)) {
    state[entityId] = {
      lastIds: entry.last_ids,
      lastDate: entry.last_date,
      ...(entry.last_page !== undefined ? { lastPage: entry.last_page } : {}),
      ...(entry.complete !== undefined ? { complete: entry.complete } : {}),
      ...(entry.run_records !== undefined ? { runRecords: entry.run_records } : {}),
      ...(entry.run_pages !== undefined ? { runPages: entry.run_pages } : {}),
      ...(entry.known_ids !== undefined ? { knownIds: entry.known_ids } : {}),
    };
  }
  return state;
}

export async function saveCheckpoint(dir: string, state: CheckpointState): Promise<void> {
  const out: CheckpointFile = {};
  for (const [entityId, entry] of Object.entries(state)) {
    out[entityId] = {
      last_ids: entry.lastIds,
      last_date: entry.lastDate,
      ...(entry.lastPage !== undefined ? { last_page: entry.lastPage } : {}),
      ...(entry.complete !== undefined ? { complete: entry.complete } : {}),
      ...(entry.runRecords !== undefined ? { run_records: entry.runRecords } : {}),
      ...(entry.runPages !== undefined ? { run_pages: entry.runPages } : {}),
      ...(entry.knownIds !== undefined ? { known_ids: entry.knownIds } : {}),
    };
  }
  await writeFileAtomic(checkpointPath(dir), JSON.stringify(out, null, 2) + "\n");
}

export interface PageProgress {
  page: number;
  records: ReviewRecord[];
  firstPageOfRun: boolean;
  maxIds: number;
  complete: boolean;
  // Stored ids the run is catching up to; kept only while the run is open
  knownIds?: string[];
}

/**
 * Cursor after a committed page. The first page of a run restarts the id list
 * (it holds the newest reviews) and the run totals; later pages extend both.
 */
export function advanceCheckpoint(previous: EntityCheckpoint | undefined, progress: PageProgress): EntityCheckpoint {
  const pageIds = progress.records.map((r) => r.recordId).filter((id): id is string => !!id);
  const carried = progress.firstPageOfRun ? [] : previous?.lastIds ?? [];
  const lastIds = Array.from(new Set([...carried, ...pageIds])).slice(0, progress.maxIds);

  const firstTimestamp = progress.records[0]?.timestampRaw;
  const lastDate = progress.firstPageOfRun && firstTimestamp ? firstTimestamp : previous?.lastDate ?? null;

  const runRecords = (progress.firstPageOfRun ? 0 : previous?.runRecords ?? 0) + progress.records.length;
  const runPages = (progress.firstPageOfRun ? 0 : previous?.runPages ?? 0) + 1;
  const knownIds = !progress.complete && progress.knownIds && progress.knownIds.length > 0 ? progress.knownIds : undefined;

  return {
    lastIds,
    lastDate,
    lastPage: progress.page,
    complete: progress.complete,
    runRecords,
    runPages,
    ...(knownIds ? { knownIds } : {}),
  };
}

/** Marks an entry finished; a finished run no longer needs the ids it was catching up to. */
export function completeCheckpoint(entry: EntityCheckpoint): EntityCheckpoint {
  return {
    lastIds: entry.lastIds,
    lastDate: entry.lastDate,
    complete: true,
    ...(entry.lastPage !== undefined ? { lastPage: entry.lastPage } : {}),
    ...(entry.runRecords !== undefined ? { runRecords: entry.runRecords } : {}),
    ...(entry.runPages !== undefined ? { runPages: entry.runPages } : {}),
  };
}
