import { test } from "node:test";
import assert from "node:assert/strict";
import { createHash } from "crypto";
import { computeDedupKey, tagNearDuplicate, withinBatchDedup } from "../src/ingest/idempotency";
import { record } from "./helpers";

function sha1(s: string): string {
  return createHash("sha1").update(s, "utf8").digest("hex");
}

function testRealRecordIdWins() {
  assert.equal(computeDedupKey(record({ recordId: "R1" })), "E1|R1");
  assert.equal(
    computeDedupKey(record({ recordId: "R1", body: "edited later" })),
    "E1|R1",
    "content changes must not move a keyed record"
  );
}

function testFallbackHashesTimestampAndContent() {
  const expected = `E1|SHA1-${sha1("E1|2024-01-01T10:00:00|5|Great|Works well")}`;
  assert.equal(computeDedupKey(record({ title: "  Great ", body: "Works well\n" })), expected);
  assert.equal(computeDedupKey(record({ recordId: "FALLBACK-7" })), expected, "synthetic ids fall back to the hash");
  assert.equal(computeDedupKey(record({ recordId: "   " })), expected);

  const unrated = `E1|SHA1-${sha1("E1|2024-01-01T10:00:00||Great|Works well")}`;
  assert.equal(computeDedupKey(record({ rating: null })), unrated);
}

function testOneCharacterChangesTheKey() {
  assert.notEqual(computeDedupKey(record()), computeDedupKey(record({ body: "Works well!" })));
  assert.notEqual(
    computeDedupKey(record()),
    computeDedupKey(record({ timestampRaw: "2024-01-01T10:00:01" })),
    "full timestamp precision is part of the identity"
  );
}

function testNearDuplicatesShareTagsButNotKeys() {
  const a = record({ timestampRaw: "2024-01-01T10:00:10" });
  const b = record({ timestampRaw: "2024-01-01T10:00:40", title: "GREAT", body: "works   well" });
  const tagA = tagNearDuplicate(a);
  const tagB = tagNearDuplicate(b);

  assert.notEqual(computeDedupKey(a), computeDedupKey(b));
  assert.equal(tagA.nearDupMinBucket, "2024-01-01T10:00:00.000Z");
  assert.equal(tagB.nearDupMinBucket, "2024-01-01T10:00:00.000Z");
  assert.equal(tagA.contentHash200, sha1("great | works well"));
  assert.equal(tagB.contentHash200, tagA.contentHash200);
}

function testUnparseableTimestampHasNoBucket() {
  const tag = tagNearDuplicate(record({ timestampRaw: "sometime last spring" }));
  assert.equal(tag.nearDupMinBucket, null);
  assert.equal(tag.contentHash200, sha1("great | works well"));
}

function testContentHashUsesFirst200Characters() {
  const long = "x".repeat(300);
  const tag = tagNearDuplicate(record({ title: "", body: long }));
  assert.equal(tag.contentHash200, sha1(` | ${long}`.trim().slice(0, 200)));
  assert.equal(tagNearDuplicate(record({ title: "", body: long + "tail" })).contentHash200, tag.contentHash200);
}

function testBatchDedupKeepsFirstOccurrence() {
  const first = record({ recordId: "R1", title: "first" });
  const second = record({ recordId: "R2" });
  const repeat = record({ recordId: "R1", title: "repeat" });
  assert.deepEqual(withinBatchDedup([first, second, repeat]), [first, second]);
}

test("record id is the identity when present", testRealRecordIdWins);
test("missing or synthetic ids hash timestamp and content", testFallbackHashesTimestampAndContent);
test("a single changed character yields a new key", testOneCharacterChangesTheKey);
test("near duplicates keep distinct keys and share tags", testNearDuplicatesShareTagsButNotKeys);
test("unparseable timestamp leaves the minute bucket empty", testUnparseableTimestampHasNoBucket);
test("content hash covers the first 200 canonical characters", testContentHashUsesFirst200Characters);
test("batch dedup keeps the first occurrence", testBatchDedupKeepsFirstOccurrence);
