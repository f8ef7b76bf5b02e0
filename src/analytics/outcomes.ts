import { OutcomeRow, WeeklyOutcome } from "../domain/types";
import { mean } from "../lib/stats";
import { parseTimestamp, weekStartKey } from "../lib/time";
import { groupByEntity } from "./weekly";

/**
 * Weekly outcome series per entity: summed sales, mean price, and the price
 * change against the entity's previous outcome week.
 */
export function buildWeeklyOutcomes(rows: OutcomeRow[]): WeeklyOutcome[] {
  const buckets = new Map<string, { entityId: string; week: string; sales: number[]; prices: number[] }>();
  for (const row of rows) {
    const ts = parseTimestamp(row.date);
    if (!ts) continue;
    const week = weekStartKey(ts);
    const key = `${row.entityId}\u0000${week}`;
    const bucket = buckets.get(key) ?? { entityId: row.entityId, week, sales: [], prices: [] };
    if (row.sales !== null) bucket.sales.push(row.sales);
    if (row.price !== null) bucket.prices.push(row.price);
    buckets.set(key, bucket);
  }

  const out: WeeklyOutcome[] = [];
  for (const weeks of groupByEntity(Array.from(buckets.values())).values()) {
    let previousPrice: number | null = null;
    weeks.forEach((b, i) => {
      const avgPriceWeek = mean(b.prices);
      out.push({
        entityId: b.entityId,
        week: b.week,
        weeklySales: b.sales.length > 0 ? b.sales.reduce((a, x) => a + x, 0) : null,
        avgPriceWeek,
        priceChangeWeekly: i > 0 && avgPriceWeek !== null && previousPrice !== null ? avgPriceWeek - previousPrice : null,
      });
      previousPrice = avgPriceWeek;
    });
  }
  return out;
}

export default buildWeeklyOutcomes;
