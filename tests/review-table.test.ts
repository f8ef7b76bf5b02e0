import { test } from "node:test";
import assert from "node:assert/strict";
import { promises as fs } from "fs";
import path from "path";
import { noopLogger } from "../src/config/logger";
import { tagNearDuplicate, tagRecords } from "../src/ingest/idempotency";
import { appendReviews, readReviewTable, REVIEW_COLUMNS } from "../src/integrations/storage/review-table.repo";
import { encodeTable } from "../src/integrations/storage/table.codec";
import { captureLogger, makeTempDir, record } from "./helpers";

async function tablePath(): Promise<string> {
  return path.join(await makeTempDir(), "reviews.csv");
}

async function exists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch {
    return false;
  }
}

async function testAppendIsIdempotent() {
  const file = await tablePath();
  const batch = tagRecords([
    record({ recordId: "R1" }),
    record({ recordId: "R2", rating: 3 }),
    record({ recordId: "R3", rating: 1 }),
  ]);

  assert.equal(await appendReviews(file, batch, { logger: noopLogger }), 3);
  const before = await fs.readFile(file, "utf8");
  assert.equal(await appendReviews(file, batch, { logger: noopLogger }), 0);
  assert.equal(await fs.readFile(file, "utf8"), before, "second append must leave the file untouched");
}

async function testPartialOverlapAddsOnlyNewRows() {
  const file = await tablePath();
  const [a, b, c, d] = tagRecords(["A", "B", "C", "D"].map((id) => record({ recordId: id })));

  assert.equal(await appendReviews(file, [a, b], { logger: noopLogger }), 2);
  assert.equal(await appendReviews(file, [b, c, d], { logger: noopLogger }), 2);

  const rows = await readReviewTable(file, { logger: noopLogger });
  assert.deepEqual(
    rows.map((r) => r.recordId),
    ["A", "B", "C", "D"]
  );
}

async function testNearDuplicatesAreBothStored() {
  const file = await tablePath();
  const batch = tagRecords([
    record({ timestampRaw: "2024-01-01T10:00:10" }),
    record({ timestampRaw: "2024-01-01T10:00:40" }),
  ]);

  assert.equal(await appendReviews(file, batch, { logger: noopLogger }), 2);
  const rows = await readReviewTable(file, { logger: noopLogger });
  assert.equal(rows.length, 2);
  assert.equal(rows[0].nearDupMinBucket, rows[1].nearDupMinBucket);
  assert.equal(rows[0].contentHash200, rows[1].contentHash200);
}

async function testEmptyBatchDoesNotWrite() {
  const file = await tablePath();
  assert.equal(await appendReviews(file, [], { logger: noopLogger }), 0);
  assert.equal(await exists(file), false);
}

async function testCorruptTableReadsAsEmpty() {
  const file = await tablePath();
  await fs.writeFile(file, 'entity_id,record_id\n"E1,R1\n', "utf8");
  const log = captureLogger();

  const added = await appendReviews(file, tagRecords([record({ recordId: "R9" })]), { logger: log });

  assert.equal(added, 1);
  assert.equal(log.entries.filter((e) => e.msg === "store:read:corrupt").length, 1);
  const rows = await readReviewTable(file, { logger: noopLogger });
  assert.deepEqual(
    rows.map((r) => r.recordId),
    ["R9"]
  );
}

async function testZeroByteTableIsEmpty() {
  const file = await tablePath();
  await fs.writeFile(file, "", "utf8");
  const log = captureLogger();

  assert.deepEqual(await readReviewTable(file, { logger: log }), []);
  assert.equal(log.entries.length, 0, "an empty file is not corruption");
  assert.equal(await appendReviews(file, tagRecords([record()]), { logger: noopLogger }), 1);
}

async function testValuesSurviveTheFile() {
  const file = await tablePath();
  const stored = tagRecords([
    record({
      recordId: null,
      rating: null,
      title: ' "Quoted", with comma ',
      body: "Line one\nLine two",
      verified: true,
      helpfulVotes: 3,
    }),
    record({ recordId: "R2", timestampRaw: "not a date" }),
  ]);

  await appendReviews(file, stored, { logger: noopLogger });
  const rows = await readReviewTable(file, { logger: noopLogger });

  assert.deepEqual(rows, stored);
  assert.equal(await appendReviews(file, stored, { logger: noopLogger }), 0, "keys are stable through the file");
}

async function testRowsWithoutEntityAreDropped() {
  const file = await tablePath();
  const good = tagRecords([record({ recordId: "R1" })])[0];
  const cells = (entityId: string, recordId: string) => ({
    entity_id: entityId,
    record_id: recordId,
    timestamp_raw: good.timestampRaw,
    rating: "5",
    title: good.title,
    body: good.body,
    verified: "false",
    helpful_votes: "0",
    near_dup_min_bucket: good.nearDupMinBucket ?? "",
    content_hash_200: good.contentHash200,
  });
  await fs.writeFile(file, encodeTable(REVIEW_COLUMNS, [cells("  ", "R0"), cells("E1", "R1")]), "utf8");
  const log = captureLogger();

  const rows = await readReviewTable(file, { logger: log });

  assert.deepEqual(rows, [good]);
  assert.deepEqual(
    log.entries.map((e) => e.msg),
    ["store:read:dropped_rows"]
  );
}

async function testUntaggedTableGetsTags() {
  const file = await tablePath();
  await fs.writeFile(
    file,
    "entity_id,record_id,timestamp_raw,rating,title,body\nE1,R1,2024-01-01T10:00:30,4,Great,Works well\n",
    "utf8"
  );

  const [row] = await readReviewTable(file, { logger: noopLogger });
  const expected = record({ recordId: "R1", timestampRaw: "2024-01-01T10:00:30", rating: 4 });

  assert.deepEqual(row, { ...expected, ...tagNearDuplicate(expected) });
}

test("appending the same batch twice adds nothing", testAppendIsIdempotent);
test("a partially overlapping batch adds only new rows", testPartialOverlapAddsOnlyNewRows);
test("near duplicates seconds apart are both stored", testNearDuplicatesAreBothStored);
test("an empty batch performs no write", testEmptyBatchDoesNotWrite);
test("a corrupt table reads as empty and is replaced", testCorruptTableReadsAsEmpty);
test("a zero-byte table reads as empty", testZeroByteTableIsEmpty);
test("stored values read back unchanged", testValuesSurviveTheFile);
test("rows without an entity id are dropped on read", testRowsWithoutEntityAreDropped);
test("tables without tag columns get tags on read", testUntaggedTableGetsTags);
