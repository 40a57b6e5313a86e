import { Decimal } from "decimal.js";
import * as XLSX from "xlsx";
import type { AnalysisResult } from "@/lib/domain/types";
import { monthSalesTable, productSalesTable, rowsOf, stateTable, type Cell, type Table } from "./tables";

export const SHEET_NAMES = {
  peakMonth: "Peak Month",
  lowestMonth: "Lowest Month",
  topProduct: "Top Product",
  customerByState: "Customer by State",
} as const;

// Spreadsheet cells are numeric; exact digits live in the CSV outputs
function toSheetCell(value: Cell): string | number {
  return value instanceof Decimal ? value.toNumber() : value;
}

function tableToSheet(table: Table): XLSX.WorkSheet {
  return XLSX.utils.aoa_to_sheet([table.columns, ...table.rows.map((row) => row.map(toSheetCell))]);
}

export function buildWorkbook(result: AnalysisResult): XLSX.WorkBook {
  const wb = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(wb, tableToSheet(monthSalesTable(rowsOf(result.peakMonth))), SHEET_NAMES.peakMonth);
  XLSX.utils.book_append_sheet(wb, tableToSheet(monthSalesTable(rowsOf(result.lowestMonth))), SHEET_NAMES.lowestMonth);
  XLSX.utils.book_append_sheet(wb, tableToSheet(productSalesTable(rowsOf(result.topProduct))), SHEET_NAMES.topProduct);
  XLSX.utils.book_append_sheet(wb, tableToSheet(stateTable(result.stateRanking)), SHEET_NAMES.customerByState);
  return wb;
}

export function workbookToBuffer(wb: XLSX.WorkBook): Buffer {
  const out: unknown = XLSX.write(wb, { type: "buffer", bookType: "xlsx" });
  if (!Buffer.isBuffer(out)) throw new Error("xlsx writer did not return a buffer");
  return out;
}
