import { OutcomeRow } from "../domain/types";
import { logger as defaultLogger, Logger } from "../config/logger";
import { parseNumber, readTable, TableRow } from "../integrations/storage/table.codec";

const ENTITY_COLUMNS = ["entity_id", "asin"];
const DATE_COLUMNS = ["date", "week", "week_start", "timestamp"];
const SALES_COLUMNS = ["sales", "weekly_sales", "units_sold", "units", "quantity"];
const PRICE_COLUMNS = ["price", "avg_price", "avg_price_week", "buy_box_price"];

function pickColumn(header: string[], candidates: string[]): string | undefined {
  const byLower = new Map(header.map((h) => [h.toLowerCase(), h] as const));
  for (const c of candidates) {
    const hit = byLower.get(c);
    if (hit) return hit;
  }
  return undefined;
}

export function toOutcomeRows(rows: TableRow[]): OutcomeRow[] {
  if (rows.length === 0) return [];
  const header = Object.keys(rows[0]);
  const entityCol = pickColumn(header, ENTITY_COLUMNS);
  const dateCol = pickColumn(header, DATE_COLUMNS);
  if (!entityCol || !dateCol) return [];
  const salesCol = pickColumn(header, SALES_COLUMNS);
  const priceCol = pickColumn(header, PRICE_COLUMNS);

  const out: OutcomeRow[] = [];
  for (const row of rows) {
    const entityId = (row[entityCol] ?? "").trim();
    if (!entityId) continue;
    out.push({
      entityId,
      date: row[dateCol] ?? "",
      sales: salesCol ? parseNumber(row[salesCol]) : null,
      price: priceCol ? parseNumber(row[priceCol]) : null,
    });
  }
  return out;
}

/**
 * Reads the external outcome series (one dated row per entity observation).
 * Column names are matched case-insensitively against common aliases.
 */
export async function readOutcomeTable(filePath: string, logger: Logger = defaultLogger): Promise<OutcomeRow[]> {
  const read = await readTable(filePath);
  if (!read.ok) {
    logger.warn("outcomes:read:corrupt", { path: filePath, message: read.error.message });
    return [];
  }
  const rows = toOutcomeRows(read.value);
  if (read.value.length > 0 && rows.length === 0) {
    logger.warn("outcomes:read:no_usable_columns", { path: filePath, columns: Object.keys(read.value[0]) });
  }
  return rows;
}

export default readOutcomeTable;
