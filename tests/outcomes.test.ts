import { test } from "node:test";
import assert from "node:assert/strict";
import { promises as fs } from "fs";
import path from "path";
import { buildWeeklyOutcomes } from "../src/analytics/outcomes";
import { readOutcomeTable, toOutcomeRows } from "../src/adapters/outcome-table.adapter";
import { captureLogger, makeTempDir } from "./helpers";

function testDailyRowsRollIntoWeeks() {
  const weekly = buildWeeklyOutcomes([
    { entityId: "E1", date: "2024-01-09", sales: 4, price: 13 },
    { entityId: "E1", date: "2024-01-01", sales: 2, price: 10 },
    { entityId: "E1", date: "2024-01-03", sales: 3, price: 12 },
    { entityId: "E1", date: "n/a", sales: 99, price: 99 },
    { entityId: "E2", date: "2024-01-02", sales: null, price: null },
  ]);

  assert.deepEqual(weekly, [
    { entityId: "E1", week: "2024-01-01", weeklySales: 5, avgPriceWeek: 11, priceChangeWeekly: null },
    { entityId: "E1", week: "2024-01-08", weeklySales: 4, avgPriceWeek: 13, priceChangeWeekly: 2 },
    { entityId: "E2", week: "2024-01-01", weeklySales: null, avgPriceWeek: null, priceChangeWeekly: null },
  ]);
}

function testColumnAliases() {
  assert.deepEqual(
    toOutcomeRows([
      { ASIN: "E1", week: "2024-01-01", weekly_sales: "12", avg_price: "" },
      { ASIN: " ", week: "2024-01-01", weekly_sales: "1", avg_price: "1" },
    ]),
    [{ entityId: "E1", date: "2024-01-01", sales: 12, price: null }]
  );
  assert.deepEqual(toOutcomeRows([{ sku: "E1", day: "2024-01-01" }]), []);
}

async function testReadsOutcomeFile() {
  const file = path.join(await makeTempDir(), "sales.csv");
  await fs.writeFile(file, "entity_id,date,units_sold,price\nE1,2024-01-01,3,9.5\n", "utf8");
  assert.deepEqual(await readOutcomeTable(file, captureLogger()), [
    { entityId: "E1", date: "2024-01-01", sales: 3, price: 9.5 },
  ]);

  const log = captureLogger();
  await fs.writeFile(file, "sku,day\nE1,2024-01-01\n", "utf8");
  assert.deepEqual(await readOutcomeTable(file, log), []);
  assert.deepEqual(
    log.entries.map((e) => e.msg),
    ["outcomes:read:no_usable_columns"]
  );
}

test("dated outcome rows roll into weekly sales and price", testDailyRowsRollIntoWeeks);
test("outcome columns are matched by alias", testColumnAliases);
test("outcome files are read through the column aliases", testReadsOutcomeFile);
