import { StoredReview } from "../../domain/types";
import { tagNearDuplicate, withinBatchDedup } from "../../ingest/idempotency";
import { logger as defaultLogger, Logger } from "../../config/logger";
import { formatNumber, parseNumber, readTable, TableRow, writeTable } from "./table.codec";

export const REVIEW_COLUMNS = [
  "entity_id",
  "record_id",
  "timestamp_raw",
  "rating",
  "title",
  "body",
  "verified",
  "helpful_votes",
  "near_dup_min_bucket",
  "content_hash_200",
] as const;

export interface ReviewTableOptions {
  logger?: Logger;
}

function toRow(r: StoredReview): TableRow {
  return {
    entity_id: r.entityId,
    record_id: r.recordId ?? "",
    timestamp_raw: r.timestampRaw,
    rating: formatNumber(r.rating),
    title: r.title,
    body: r.body,
    verified: r.verified ? "true" : "false",
    helpful_votes: String(r.helpfulVotes),
    near_dup_min_bucket: r.nearDupMinBucket ?? "",
    content_hash_200: r.contentHash200,
  };
}

function fromRow(row: TableRow): StoredReview | null {
  const entityId = (row.entity_id ?? "").trim();
  if (!entityId) return null;
  const base = {
    entityId,
    recordId: row.record_id ? row.record_id : null,
    timestampRaw: row.timestamp_raw ?? "",
    rating: parseNumber(row.rating),
    title: row.title ?? "",
    body: row.body ?? "",
    verified: (row.verified ?? "").toLowerCase() === "true",
    helpfulVotes: Math.max(0, Math.trunc(parseNumber(row.helpful_votes) ?? 0)),
  };
  // Tables written before tagging existed get their tags recomputed
  if (!row.content_hash_200) return { ...base, ...tagNearDuplicate(base) };
  return {
    ...base,
    nearDupMinBucket: row.near_dup_min_bucket ? row.near_dup_min_bucket : null,
    contentHash200: row.content_hash_200,
  };
}

/**
 * Loads the persisted review table. Missing, empty and corrupt files all read
 * as an empty table; corruption is logged.
 */
export async function readReviewTable(tablePath: string, options: ReviewTableOptions = {}): Promise<StoredReview[]> {
  const { logger = defaultLogger } = options;
  const read = await readTable(tablePath);
  if (!read.ok) {
    logger.warn("store:read:corrupt", { path: tablePath, kind: read.error.kind, message: read.error.message });
    return [];
  }
  const rows: StoredReview[] = [];
  let dropped = 0;
  for (const raw of read.value) {
    const row = fromRow(raw);
    if (row) rows.push(row);
    else dropped++;
  }
  if (dropped > 0) logger.warn("store:read:dropped_rows", { path: tablePath, dropped });
  return rows;
}

export async function writeReviewTable(tablePath: string, rows: StoredReview[]): Promise<void> {
  await writeTable(tablePath, REVIEW_COLUMNS, rows.map(toRow));
}

/**
 * Merges `batch` into the table at `tablePath`, keeping the first copy of every
 * identity key (existing rows before new ones), and replaces the file
 * atomically. Returns how many rows the table grew by.
 */
export async function appendReviews(
  tablePath: string,
  batch: StoredReview[],
  options: ReviewTableOptions = {}
): Promise<number> {
  const { logger = defaultLogger } = options;
  if (batch.length === 0) return 0;

  const existing = await readReviewTable(tablePath, { logger });
  const merged = withinBatchDedup([...existing, ...batch]);
  const added = merged.length - existing.length;

  if (added === 0) {
    logger.debug("store:append:noop", { path: tablePath, batch: batch.length });
    return 0;
  }

  await writeReviewTable(tablePath, merged);
  logger.debug("store:append", { path: tablePath, batch: batch.length, added, total: merged.length });
  return added;
}
