/** One CSV record, cells in file order. */
export type Row = string[];

export type Table = {
  header: Row;
  // raw rows may be shorter or longer than the header
  rows: Row[];
};

export type StyleMode = "inline" | "link";

export type GenerateSummary = {
  outFile: string;
  rows: number;
  columns: number;
  // path of the published stylesheet, when one was copied
  stylesheet: string | null;
};
