/**
 * Event Loss Table export: (year, layer loss) rows, year starting at 1, as CSV with a header row.
 */

import * as XLSX from "xlsx";
import type { LayerLoss } from "@/domain/treaty/treaty.types";

export const EVENT_LOSS_TABLE_HEADERS = ["Year", "Layer Loss (USD)"] as const;

export type EventLossRow = {
  year: number;
  layerLoss: number;
};

export function buildEventLossTable(layerLoss: LayerLoss): EventLossRow[] {
  return layerLoss.map((loss, i) => ({ year: i + 1, layerLoss: loss }));
}

export function eventLossTableToCsv(rows: readonly EventLossRow[]): string {
  const aoa: Array<Array<string | number>> = [
    [...EVENT_LOSS_TABLE_HEADERS],
    ...rows.map((r) => [r.year, r.layerLoss]),
  ];
  const sheet = XLSX.utils.aoa_to_sheet(aoa);
  // rawNumbers: large losses would otherwise be rounded by the General number format
  return XLSX.utils.sheet_to_csv(sheet, { rawNumbers: true });
}
