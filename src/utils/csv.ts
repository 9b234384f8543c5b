import fs from "node:fs/promises";
import { parse } from "csv-parse/sync";
import { EmptyInputError, InputReadError } from "../errors.js";
import type { Row, Table } from "../types.js";

function toRows(records: unknown): Row[] | null {
  if (!Array.isArray(records)) return null;
  const rows: Row[] = [];
  for (const rec of records) {
    if (!Array.isArray(rec)) return null;
    const row: Row = [];
    for (const cell of rec) {
      if (typeof cell !== "string") return null;
      row.push(cell);
    }
    rows.push(row);
  }
  return rows;
}

/**
 * Parses CSV text into rows. Accepts a leading BOM, quoted fields with
 * embedded commas/newlines, stray quotes, and records of differing lengths.
 * A blank line is kept as a record of empty cells.
 */
export function parseCsvRows(text: string): Row[] {
  const records: unknown = parse(text, {
    bom: true,
    relax_column_count: true,
    relax_quotes: true,
  });
  const rows = toRows(records);
  if (!rows) throw new Error("csv-parse returned unexpected records");
  return rows;
}

export async function readCsvRows(file: string): Promise<Row[]> {
  let rows: Row[];
  try {
    const text = await fs.readFile(file, "utf8");
    rows = parseCsvRows(text);
  } catch (err) {
    throw new InputReadError(file, err);
  }
  if (rows.length === 0) throw new EmptyInputError(file);
  return rows;
}

export function toTable(rows: Row[]): Table {
  const [header = [], ...data] = rows;
  return { header, rows: data };
}
