import fs from "fs/promises";
import { parse } from "csv-parse/sync";
import { debug } from "./logger";
import appRoot from "app-root-path";
import path from "path";

export type CsvTable = {
  columns: string[];
  rows: Record<string, string>[];
  totalRows: number;
  truncated: boolean;
};

export type CsvExample = {
  id: string;
  text: string;
  cause?: string;
  effect?: string;
};

export function loadCsvFromText(
  text: string,
  maxRows = Infinity,
  delimiter = ";"
): CsvTable {
  const records: Record<string, string>[] = parse(text, {
    columns: true,
    delimiter,
    skip_empty_lines: true,
    bom: true,
  }) as Record<string, string>[];

  const totalRows = records.length;
  const truncated = totalRows > maxRows;
  const rows = records.slice(0, maxRows);
  const columns = rows.length > 0 ? Object.keys(rows[0]) : [];

  return { columns, rows, totalRows, truncated };
}

const root = appRoot.path;

export function resolveFromRoot(filePath: string): string {
  return path.resolve(root, filePath);
}

export async function loadCsvFromFile(
  filePath: string,
  maxRows = Infinity,
  delimiter = ";"
): Promise<CsvTable> {
  const absPath = resolveFromRoot(filePath);
  const text = await fs.readFile(absPath, "utf-8");
  debug("CSV loaded", absPath, text.length);
  return loadCsvFromText(text, maxRows, delimiter);
}

// Rows shaped `Index;Text;Cause;Effect`, cause and effect only in reference files
export function examplesFromTable(table: CsvTable): CsvExample[] {
  for (const col of ["Index", "Text"]) {
    if (!table.columns.includes(col)) throw new Error(`CSV is missing column ${col}`);
  }
  return table.rows.map((row) => ({
    id: row.Index.trim(),
    text: row.Text,
    cause: row.Cause,
    effect: row.Effect,
  }));
}

export async function loadExamplesCsv(filePath: string): Promise<CsvExample[]> {
  return examplesFromTable(await loadCsvFromFile(filePath));
}
