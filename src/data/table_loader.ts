/**
 * Tabular data source — CSV (csv-parse) or XLSX (exceljs).
 *
 * Every cell is returned as a trimmed string; blanks are "". Rows whose
 * cells are all blank are dropped.
 */

import { existsSync, readFileSync } from "fs";
import path from "path";
import { parse } from "csv-parse/sync";
import { DataSourceError, errorMessage } from "../shared/errors.js";
import type { RowValues } from "../tokens/resolver.js";
import { readXlsxSheet } from "./xlsx_reader.js";

export interface DataTable {
  source: string;
  columns: string[];
  rows: RowValues[];
  warnings: string[];
}

export interface LoadTableOptions {
  /** XLSX sheet name or zero-based index. Ignored for CSV. */
  sheet?: string;
}

function isStringGrid(value: unknown): value is string[][] {
  return Array.isArray(value) && value.every((r) => Array.isArray(r) && r.every((c) => typeof c === "string"));
}

function readCsvGrid(filePath: string): string[][] {
  const records: unknown = parse(readFileSync(filePath, "utf-8"), {
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
    trim: true,
  });
  if (!isStringGrid(records)) throw new DataSourceError(`Unexpected CSV shape in ${filePath}`);
  return records;
}

/** Turn a header row plus data rows into a DataTable. */
export function buildTable(grid: string[][], source: string): DataTable {
  const nonBlank = grid.filter((r) => r.some((c) => c.trim() !== ""));
  const warnings: string[] = [];
  if (nonBlank.length === 0) return { source, columns: [], rows: [], warnings };

  const [header, ...body] = nonBlank;
  const columns: string[] = [];
  const positions: number[] = [];
  header.forEach((h, i) => {
    const name = h.trim();
    if (!name) return;
    if (columns.includes(name)) {
      warnings.push(`Duplicate column "${name}" ignored (column ${i + 1})`);
      return;
    }
    columns.push(name);
    positions.push(i);
  });

  const rows = body.map((cells) => {
    const row: Record<string, string> = {};
    columns.forEach((name, k) => {
      row[name] = (cells[positions[k]] ?? "").trim();
    });
    return Object.freeze(row);
  });

  return { source, columns, rows, warnings };
}

export async function loadDataTable(filePath: string, opts: LoadTableOptions = {}): Promise<DataTable> {
  if (!existsSync(filePath)) throw new DataSourceError(`Data file not found: ${filePath}`, { filePath });

  const ext = path.extname(filePath).toLowerCase();
  let grid: string[][];
  try {
    if (ext === ".csv") {
      grid = readCsvGrid(filePath);
    } else if (ext === ".xlsx" || ext === ".xlsm") {
      grid = await readXlsxSheet(filePath, opts.sheet);
    } else {
      throw new DataSourceError(`Unsupported data file type "${ext}" (expected .csv or .xlsx)`, { filePath });
    }
  } catch (err) {
    if (err instanceof DataSourceError) throw err;
    throw new DataSourceError(`Cannot read ${filePath}: ${errorMessage(err)}`, { filePath });
  }

  return buildTable(grid, filePath);
}
