import { test } from "node:test";
import assert from "node:assert/strict";
import { defaultAnalyticsSettings } from "../src/config/config";
import { scoreComponents, scoreDistortion } from "../src/analytics/distortion";
import type { WeeklyFact } from "../src/domain/types";
import { assertClose, mondays, weeklyFact } from "./helpers";

const settings = defaultAnalyticsSettings;

function series(entityId: string, rows: Array<Partial<WeeklyFact>>): WeeklyFact[] {
  const weeks = mondays(rows.length);
  return rows.map((r, i) => weeklyFact(entityId, weeks[i], r));
}

function byEntity<T extends { entityId: string }>(rows: T[], entityId: string): T {
  const hit = rows.find((r) => r.entityId === entityId);
  assert.ok(hit, `no row for ${entityId}`);
  return hit;
}

function testRawComponents() {
  const counts = [1, 2, 2, 3, 8, 2];
  const ratings = [4, 4, 4, 4, 5, 5];
  const weeks = series(
    "E1",
    counts.map((reviewCount, i) => ({
      reviewCount,
      avgRating: ratings[i],
      p5Share: 0.5,
      ratingVariance: 0.2,
      cumulativeAvgRating: i === counts.length - 1 ? 4.4 : 4,
    }))
  );

  const raw = scoreComponents(weeks, settings);

  assert.equal(raw.burstiness, 4, "max 8 over median 2");
  assert.equal(raw.recentShift, 0.5, "last four weeks average 4.5 against 4 before");
  assertClose(raw.extremeness, (0.5 - 0.6) * (0.5 - 0.2));
  assertClose(raw.driftVsCumulative, 0.6);
}

function testFewWeeksGiveNoScore() {
  const scores = scoreDistortion(
    [
      ...series("SHORT", [{}, {}]),
      ...series("X", [{}, {}, {}]),
      ...series("Y", [{}, {}, { reviewCount: 4, avgRating: 2, cumulativeAvgRating: 3 }]),
    ],
    settings
  );

  assert.deepEqual(byEntity(scores, "SHORT"), {
    entityId: "SHORT",
    weeks: 2,
    raw: { burstiness: null, recentShift: null, extremeness: null, driftVsCumulative: null },
    normalized: { burstiness: null, recentShift: null, extremeness: null, driftVsCumulative: null },
    distortionProb: null,
  });
  assert.notEqual(byEntity(scores, "X").distortionProb, null);
}

function testComponentsAreScaledAcrossEntities() {
  const scores = scoreDistortion(
    [
      ...series("X", [{}, {}, {}]),
      ...series("Y", [{}, {}, { reviewCount: 4, avgRating: 2, cumulativeAvgRating: 3 }]),
      ...series("Z", [
        { reviewCount: 2, avgRating: 5, cumulativeAvgRating: 5, p5Share: 1 },
        { reviewCount: 2, avgRating: 5, cumulativeAvgRating: 5, p5Share: 1 },
        { reviewCount: 2, avgRating: 5, cumulativeAvgRating: 5, p5Share: 1 },
      ]),
    ],
    settings
  );

  assert.deepEqual(byEntity(scores, "X").normalized, {
    burstiness: 0,
    recentShift: null,
    extremeness: 0,
    driftVsCumulative: 0,
  });
  assert.deepEqual(byEntity(scores, "Y").normalized, {
    burstiness: 1,
    recentShift: null,
    extremeness: 0,
    driftVsCumulative: 1,
  });
  assert.deepEqual(byEntity(scores, "Z").normalized, {
    burstiness: 0,
    recentShift: null,
    extremeness: 1,
    driftVsCumulative: 0,
  });
  assert.equal(byEntity(scores, "X").distortionProb, 0);
  assertClose(byEntity(scores, "Y").distortionProb, 2 / 3);
  assertClose(byEntity(scores, "Z").distortionProb, 1 / 3);

  for (const s of scores) {
    for (const v of Object.values(s.normalized)) {
      if (v !== null) assert.ok(v >= 0 && v <= 1, `${s.entityId} normalized value ${v} out of range`);
    }
  }
}

function testMissingComponentTakesTheMedian() {
  const scores = scoreDistortion(
    [
      ...series("A", [{ avgRating: 3 }, {}, {}, {}, {}]),
      ...series("B", [{}, {}, {}, {}, {}]),
      ...series("C", [{}, {}, {}, {}]),
    ],
    settings
  );

  assert.equal(byEntity(scores, "A").raw.recentShift, 1);
  assert.equal(byEntity(scores, "B").raw.recentShift, 0);
  assert.equal(byEntity(scores, "C").raw.recentShift, null);
  assert.equal(byEntity(scores, "A").normalized.recentShift, 1);
  assert.equal(byEntity(scores, "B").normalized.recentShift, 0);
  assert.equal(byEntity(scores, "C").normalized.recentShift, 0.5);
}

test("raw components follow the weekly series", testRawComponents);
test("entities with too few weeks get no score", testFewWeeksGiveNoScore);
test("components are min-max scaled across entities", testComponentsAreScaledAcrossEntities);
test("a missing component is filled with the column median", testMissingComponentTakesTheMedian);
