import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { csvRowsSchema } from "../../domain/schema";
import { err, formatError, ok, Result } from "../../lib/result";
import { readFileIfExists, writeFileAtomic } from "./atomic-file";

export type TableRow = Record<string, string>;

export interface TableReadError {
  kind: "corrupt" | "unreadable";
  path: string;
  message: string;
}

/**
 * Reads a delimited file with a header row. A missing or zero-byte file is an
 * empty table; a file that cannot be parsed is reported as `corrupt`.
 */
export async function readTable(filePath: string): Promise<Result<TableRow[], TableReadError>> {
  let text: string | null;
  try {
    text = await readFileIfExists(filePath);
  } catch (e) {
    return err({ kind: "unreadable", path: filePath, message: formatError(e) });
  }
  if (text === null || text.trim() === "") return ok([]);

  let parsed: unknown;
  try {
    parsed = parse(text, { columns: true, skip_empty_lines: true, bom: true });
  } catch (e) {
    return err({ kind: "corrupt", path: filePath, message: formatError(e) });
  }
  const rows = csvRowsSchema.safeParse(parsed);
  if (!rows.success) {
    return err({ kind: "corrupt", path: filePath, message: rows.error.issues[0]?.message ?? "invalid rows" });
  }
  return ok(rows.data);
}

export function encodeTable(columns: readonly string[], rows: TableRow[]): string {
  const records = rows.map((row) => columns.map((c) => row[c] ?? ""));
  return stringify([[...columns], ...records]);
}

export async function writeTable(filePath: string, columns: readonly string[], rows: TableRow[]): Promise<void> {
  await writeFileAtomic(filePath, encodeTable(columns, rows));
}

// Null cells become empty fields; floats keep at most 6 decimals
export function formatNumber(value: number | null): string {
  if (value === null || !Number.isFinite(value)) return "";
  if (Number.isInteger(value)) return String(value);
  return String(Number(value.toFixed(6)));
}

export function parseNumber(raw: string | undefined): number | null {
  if (raw === undefined || raw.trim() === "") return null;
  const n = Number(raw);
  return Number.isFinite(n) ? n : null;
}
