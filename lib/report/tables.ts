import { Decimal } from "decimal.js";
import type {
  MissingSummary,
  MonthlyAggregate,
  MonthSales,
  ProductSales,
  RankResult,
  StateCustomers,
} from "@/lib/domain/types";

export type Cell = string | number | Decimal;

export type Table = {
  columns: string[];
  rows: Cell[][];
};

export function rowsOf<T>(result: RankResult<T>): readonly T[] {
  return result.kind === "ranked" ? result.rows : [];
}

export function missingTable(m: MissingSummary): Table {
  return {
    columns: ["missing_dates", "missing_products", "missing_sales", "missing_states"],
    rows: [[m.missingDates, m.missingProducts, m.missingSales, m.missingStates]],
  };
}

export function monthSalesTable(rows: readonly MonthSales[]): Table {
  return {
    columns: ["monthLabel", "summedSales"],
    rows: rows.map((r) => [r.monthLabel, r.summedSales]),
  };
}

export function monthlyTable(monthly: MonthlyAggregate): Table {
  return monthSalesTable(Array.from(monthly, ([monthLabel, summedSales]) => ({ monthLabel, summedSales })));
}

export function productSalesTable(rows: readonly ProductSales[]): Table {
  return {
    columns: ["product", "summedSales"],
    rows: rows.map((r) => [r.product, r.summedSales]),
  };
}

export function stateTable(rows: readonly StateCustomers[]): Table {
  return {
    columns: ["stateCode", "customerCount"],
    rows: rows.map((r) => [r.stateCode, r.customerCount]),
  };
}

/**
 * Formats a cell for text outputs. Decimals keep their exact digits unless a
 * fixed number of places is requested.
 */
export function formatCell(value: Cell, decimalPlaces?: number): string {
  if (value instanceof Decimal) {
    return decimalPlaces === undefined ? value.toString() : value.toFixed(decimalPlaces);
  }
  return String(value);
}
