import Papa from "papaparse";
import type { AnalysisResult } from "@/lib/domain/types";
import type { OutputFile } from "@/lib/config";
import {
  formatCell,
  missingTable,
  monthlyTable,
  monthSalesTable,
  productSalesTable,
  rowsOf,
  stateTable,
  type Table,
} from "./tables";

export type CsvOutput = Extract<
  OutputFile,
  | "missingSummary"
  | "monthlySales"
  | "peakMonth"
  | "lowestMonth"
  | "topProduct"
  | "customerCountByState"
  | "stateMostCustomers"
  | "stateFewestCustomers"
>;

/**
 * Serializes a table to CSV. An empty table still gets its header row so
 * downstream readers see the schema.
 */
export function tableToCsv(table: Table): string {
  const data = table.rows.map((row) => row.map((cell) => formatCell(cell)));
  return Papa.unparse({ fields: table.columns, data }, { newline: "\n" }) + "\n";
}

export function buildCsvOutputs(result: AnalysisResult): Record<CsvOutput, string> {
  return {
    missingSummary: tableToCsv(missingTable(result.missing)),
    monthlySales: tableToCsv(monthlyTable(result.monthly)),
    peakMonth: tableToCsv(monthSalesTable(rowsOf(result.peakMonth))),
    lowestMonth: tableToCsv(monthSalesTable(rowsOf(result.lowestMonth))),
    topProduct: tableToCsv(productSalesTable(rowsOf(result.topProduct))),
    customerCountByState: tableToCsv(stateTable(result.stateRanking)),
    stateMostCustomers: tableToCsv(stateTable(rowsOf(result.stateMostCustomers))),
    stateFewestCustomers: tableToCsv(stateTable(rowsOf(result.stateFewestCustomers))),
  };
}
