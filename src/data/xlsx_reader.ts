/**
 * XLSX sheet reader on exceljs.
 *
 * Cells come back as display text. Date cells become `YYYY-MM-DD` (with
 * ` HH:MM:SS` when the time is not midnight), booleans `TRUE`/`FALSE`, and
 * formulas their cached result; nothing is recalculated.
 */

import ExcelJS from "exceljs";
import type { Cell, Workbook, Worksheet } from "exceljs";
import { DataSourceError, errorMessage } from "../shared/errors.js";

function formatDateValue(d: Date): string {
  const iso = d.toISOString();
  const time = iso.slice(11, 19);
  return time === "00:00:00" ? iso.slice(0, 10) : `${iso.slice(0, 10)} ${time}`;
}

export function cellText(cell: Cell): string {
  let value: unknown = cell.value;
  // Formulas carry their cached result
  if (value !== null && typeof value === "object" && !(value instanceof Date) && "result" in value) {
    value = value.result;
  }
  if (value instanceof Date) return formatDateValue(value);
  if (typeof value === "boolean") return value ? "TRUE" : "FALSE";
  return cell.text;
}

function pickSheet(workbook: Workbook, sheet: string | number | undefined): Worksheet {
  const sheets = workbook.worksheets;
  if (sheets.length === 0) throw new DataSourceError("Workbook has no sheets");

  let target: Worksheet | undefined;
  if (sheet === undefined || sheet === "") {
    target = sheets[0];
  } else if (typeof sheet === "number") {
    target = sheets[sheet];
  } else {
    target = sheets.find((s) => s.name === sheet);
    if (!target && /^\d+$/.test(sheet)) target = sheets[parseInt(sheet, 10)];
  }
  if (!target) {
    throw new DataSourceError(`Sheet "${sheet}" not found; available: ${sheets.map((s) => s.name).join(", ")}`, {
      sheet,
    });
  }
  return target;
}

/**
 * Read one sheet as a grid of strings. `sheet` is a sheet name, or a
 * zero-based index; the first sheet is read when it is omitted.
 */
export async function readXlsxSheet(filePath: string, sheet?: string | number): Promise<string[][]> {
  const workbook = new ExcelJS.Workbook();
  try {
    await workbook.xlsx.readFile(filePath);
  } catch (err) {
    throw new DataSourceError(`Cannot open workbook: ${errorMessage(err)}`, { filePath });
  }

  const worksheet = pickSheet(workbook, sheet);
  const grid: string[][] = [];
  for (let r = 1; r <= worksheet.rowCount; r++) {
    const row = worksheet.getRow(r);
    const cells: string[] = [];
    for (let c = 1; c <= row.cellCount; c++) {
      cells.push(cellText(row.getCell(c)));
    }
    grid.push(cells);
  }
  return grid;
}
