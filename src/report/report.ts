/**
 * Report sink — `_report.json` (run metadata + records) and `_report.csv`
 * (one line per record) in the output directory.
 */

import { mkdirSync, writeFileSync } from "fs";
import path from "path";
import type { BatchReport, RowRecord } from "../batch/orchestrator.js";

export const REPORT_JSON = "_report.json";
export const REPORT_CSV = "_report.csv";

const CSV_COLUMNS = ["rowIndex", "status", "templateName", "outputPath", "bytes", "error", "warnings"] as const;

type CsvColumn = (typeof CSV_COLUMNS)[number];

function csvCell(record: RowRecord, column: CsvColumn): string {
  switch (column) {
    case "warnings":
      return record.warnings.join(" | ");
    case "bytes":
      return record.bytes === undefined ? "" : String(record.bytes);
    case "error":
      return record.error ?? "";
    case "rowIndex":
      return String(record.rowIndex);
    default:
      return record[column];
  }
}

function quoteCsv(val: string): string {
  // Quote values containing commas, quotes, or newlines
  if (val.includes(",") || val.includes('"') || val.includes("\n") || val.includes("\r")) {
    return `"${val.replace(/"/g, '""')}"`;
  }
  return val;
}

export function toCsv(records: readonly RowRecord[]): string {
  const lines = [
    CSV_COLUMNS.join(","),
    ...records.map((r) => CSV_COLUMNS.map((c) => quoteCsv(csvCell(r, c))).join(",")),
  ];
  return lines.join("\n") + "\n";
}

export function writeReports(report: BatchReport, outDir: string): { jsonPath: string; csvPath: string } {
  mkdirSync(outDir, { recursive: true });
  const jsonPath = path.join(outDir, REPORT_JSON);
  const csvPath = path.join(outDir, REPORT_CSV);
  writeFileSync(jsonPath, JSON.stringify(report, null, 2));
  writeFileSync(csvPath, toCsv(report.records));
  return { jsonPath, csvPath };
}

export function formatSummary(report: BatchReport): string {
  const c = report.counts;
  return `OK ${c.OK} · ERROR ${c.ERROR} · SKIPPED ${c.SKIPPED} · DRY-RUN ${c["DRY-RUN"]}`;
}
