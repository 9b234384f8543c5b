import { NoUsableColumnsError } from "../errors.js";
import type { Row, Table } from "../types.js";

/** Indices of header cells that are non-blank once trimmed, left to right. */
export function selectColumns(header: Row): number[] {
  const keep: number[] = [];
  header.forEach((h, i) => {
    if (h.trim() !== "") keep.push(i);
  });
  if (!keep.length) throw new NoUsableColumnsError();
  return keep;
}

export function projectRow(row: Row, indices: number[]): Row {
  return indices.map((i) => (i < row.length ? row[i] : ""));
}

/**
 * Aligns every row on the header. With filtering on, blank-header columns are
 * dropped; otherwise all header columns are kept. Either way short rows are
 * right-padded and cells past the header are ignored.
 */
export function shapeTable(table: Table, opts: { filterBlankColumns: boolean }): Table {
  const indices = opts.filterBlankColumns
    ? selectColumns(table.header)
    : table.header.map((_h, i) => i);

  return {
    header: projectRow(table.header, indices),
    rows: table.rows.map((r) => projectRow(r, indices)),
  };
}
