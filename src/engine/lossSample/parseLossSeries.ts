/**
 * Parse an externally supplied annual loss series: first worksheet, first column,
 * no header row. Accepts CSV text or spreadsheet bytes (.csv / .xlsx).
 *
 * Parsing is best-effort: a non-blank row whose first cell is missing or not a number
 * is dropped and reported in `droppedEntries` rather than failing the whole load.
 */

import * as XLSX from "xlsx";
import { InsufficientDataError, MalformedInputError } from "@/domain/treaty/treaty.errors";
import { dlog, dwarn } from "@/lib/debug";

export type LossSeriesInput = string | Uint8Array;

export type ParseLossSeriesResult = {
  losses: number[];
  /** 1-based positions (among non-blank rows) of entries that were dropped. */
  droppedEntries: number[];
  /** Non-blank rows seen in the first column, kept or dropped. */
  totalEntries: number;
};

const DROPPED_PREVIEW_COUNT = 5;

function isRowEmpty(cells: unknown[]): boolean {
  return cells.every((c) => c === undefined || c === null || String(c).trim() === "");
}

/** Finite number from a cell, or null when the cell is missing, a date, or not numeric. */
export function toLossValue(cell: unknown): number | null {
  if (typeof cell === "number") return Number.isFinite(cell) ? cell : null;
  if (typeof cell !== "string") return null;
  const trimmed = cell.trim();
  if (trimmed === "") return null;
  const n = Number(trimmed);
  return Number.isFinite(n) ? n : null;
}

function isBlankInput(input: LossSeriesInput): boolean {
  return typeof input === "string" ? input.trim() === "" : input.length === 0;
}

/**
 * raw: text cells stay strings, so "2020-01-01", "50%" or "$1000" never become numbers.
 * cellDates: date-formatted spreadsheet cells come back as Date and are dropped.
 */
const READ_OPTIONS = { raw: true, cellDates: true } as const;

function readWorkbook(input: LossSeriesInput): XLSX.WorkBook {
  try {
    return typeof input === "string"
      ? XLSX.read(input, { ...READ_OPTIONS, type: "string" })
      : XLSX.read(input, { ...READ_OPTIONS, type: "array" });
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new MalformedInputError(`LossSeries: file could not be read (${reason}).`, { cause: err });
  }
}

/**
 * @throws InsufficientDataError when the source holds no rows at all.
 * @throws MalformedInputError when the source cannot be read, or no row holds a number.
 */
export function parseLossSeries(input: LossSeriesInput): ParseLossSeriesResult {
  if (isBlankInput(input)) {
    throw new InsufficientDataError("LossSeries: the uploaded series is empty.");
  }

  const workbook = readWorkbook(input);
  const firstSheetName = workbook.SheetNames[0];
  if (!firstSheetName) {
    throw new MalformedInputError("LossSeries: workbook has no worksheets.");
  }
  const sheet = workbook.Sheets[firstSheetName];
  if (!sheet) {
    throw new MalformedInputError("LossSeries: first worksheet could not be read.");
  }

  const raw = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    raw: true,
    blankrows: false,
    defval: null,
  });

  const losses: number[] = [];
  const droppedEntries: number[] = [];
  let totalEntries = 0;
  for (const cells of raw) {
    if (!Array.isArray(cells) || isRowEmpty(cells)) continue;
    totalEntries++;
    const value = toLossValue(cells[0]);
    if (value === null) {
      droppedEntries.push(totalEntries);
    } else {
      losses.push(value);
    }
  }

  if (totalEntries === 0) {
    throw new InsufficientDataError("LossSeries: the uploaded series has no rows.");
  }
  if (losses.length === 0) {
    throw new MalformedInputError(
      `LossSeries: no numeric values found in the first column (${totalEntries} rows checked).`
    );
  }

  if (droppedEntries.length > 0) {
    dwarn("[loss-series] dropped non-numeric rows", {
      dropped: droppedEntries.length,
      kept: losses.length,
      first: droppedEntries.slice(0, DROPPED_PREVIEW_COUNT),
    });
  }
  dlog("[loss-series] parsed", { kept: losses.length, totalEntries });

  return { losses, droppedEntries, totalEntries };
}
