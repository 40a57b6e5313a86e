import type { AnalysisResult, RankResult } from "@/lib/domain/types";
import {
  formatCell,
  missingTable,
  monthSalesTable,
  productSalesTable,
  stateTable,
  type Table,
} from "./tables";

export const NO_DATA_TEXT = "No data";

// Left-aligned columns separated by two spaces
export function renderTable(table: Table): string[] {
  const cells = [table.columns, ...table.rows.map((row) => row.map((c) => formatCell(c, 2)))];
  const widths = table.columns.map((_, i) => Math.max(...cells.map((row) => (row[i] ?? "").length)));
  return cells.map((row) =>
    row
      .map((c, i) => c.padEnd(widths[i]))
      .join("  ")
      .trimEnd()
  );
}

function section<T>(title: string, result: RankResult<T>, toTable: (rows: readonly T[]) => Table): string[] {
  const body = result.kind === "ranked" ? renderTable(toTable(result.rows)) : [NO_DATA_TEXT];
  return [`${title}:`, ...body];
}

export function renderTextReport(result: AnalysisResult): string {
  const heading = "Sales Analysis Summary";
  const blocks: string[][] = [
    [heading, "=".repeat(heading.length)],
    [
      `Records read: ${result.rawCount}`,
      `Valid records: ${result.validRecords.length}`,
      `Dropped records: ${result.droppedRows}`,
    ],
    section("Peak Selling Month", result.peakMonth, monthSalesTable),
    section("Lowest Selling Month", result.lowestMonth, monthSalesTable),
    section("Highest Selling Product", result.topProduct, productSalesTable),
    section("State with Most Customers", result.stateMostCustomers, stateTable),
    section("State with Fewest Customers", result.stateFewestCustomers, stateTable),
    ["Missing Values:", ...renderTable(missingTable(result.missing))],
  ];
  return blocks.map((b) => b.join("\n")).join("\n\n") + "\n";
}
