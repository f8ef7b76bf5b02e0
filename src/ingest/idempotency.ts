import { createHash } from "crypto";
import { NearDupTag, ReviewRecord, StoredReview } from "../domain/types";
import { floorToMinute, parseTimestamp } from "../lib/time";

// Ids minted by collectors that could not read a real review id
export const SYNTHETIC_ID_PREFIX = "FALLBACK-";

function sha1Hex(payload: string): string {
  return createHash("sha1").update(payload, "utf8").digest("hex");
}

function hasRealRecordId(recordId: string | null): recordId is string {
  return !!recordId && recordId.trim() !== "" && !recordId.startsWith(SYNTHETIC_ID_PREFIX);
}

/**
 * Identity of an observation. Uses the source's record id when there is one;
 * otherwise hashes the full-precision timestamp and content, so records a few
 * seconds apart keep distinct keys.
 */
export function computeDedupKey(record: ReviewRecord): string {
  if (hasRealRecordId(record.recordId)) return `${record.entityId}|${record.recordId}`;
  const rating = record.rating === null ? "" : String(record.rating);
  const payload = [record.entityId, record.timestampRaw, rating, record.title.trim(), record.body.trim()].join("|");
  return `${record.entityId}|SHA1-${sha1Hex(payload)}`;
}

function canonicalText(s: string): string {
  return s.toLowerCase().split(/\s+/).filter(Boolean).join(" ");
}

export function tagNearDuplicate(record: ReviewRecord): NearDupTag {
  const ts = parseTimestamp(record.timestampRaw);
  const content = canonicalText(`${record.title} | ${record.body}`).slice(0, 200);
  return {
    nearDupMinBucket: ts ? floorToMinute(ts).toISOString() : null,
    contentHash200: sha1Hex(content),
  };
}

export function tagRecords(records: ReviewRecord[]): StoredReview[] {
  return records.map((r) => ({ ...r, ...tagNearDuplicate(r) }));
}

/** Keeps the first occurrence of every identity key, preserving order. */
export function withinBatchDedup<T extends ReviewRecord>(rows: T[]): T[] {
  const seen = new Set<string>();
  const deduped: T[] = [];
  for (const row of rows) {
    const key = computeDedupKey(row);
    if (seen.has(key)) continue;
    seen.add(key);
    deduped.push(row);
  }
  return deduped;
}
