import type {
  MonthlyAggregate,
  MonthSales,
  ProductAggregate,
  ProductSales,
  RankResult,
  StateCustomerCount,
  StateCustomers,
} from "@/lib/domain/types";
import { TOP_PRODUCT_COUNT } from "@/lib/config";

const NO_DATA = { kind: "no_data" } as const;

function ranked<T>(rows: readonly T[]): RankResult<T> {
  return rows.length === 0 ? NO_DATA : { kind: "ranked", rows };
}

// Code-unit order so results do not depend on the host locale
function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function monthRows(monthly: MonthlyAggregate): MonthSales[] {
  return Array.from(monthly, ([monthLabel, summedSales]) => ({ monthLabel, summedSales }));
}

// Every month sharing the extreme value, in chronological order
function extremeMonths(monthly: MonthlyAggregate, pick: "max" | "min"): RankResult<MonthSales> {
  const rows = monthRows(monthly);
  if (rows.length === 0) return NO_DATA;
  let best = rows[0].summedSales;
  for (const r of rows) {
    if (pick === "max" ? r.summedSales.gt(best) : r.summedSales.lt(best)) best = r.summedSales;
  }
  return ranked(rows.filter((r) => r.summedSales.eq(best)));
}

export function peakMonth(monthly: MonthlyAggregate): RankResult<MonthSales> {
  return extremeMonths(monthly, "max");
}

export function lowestMonth(monthly: MonthlyAggregate): RankResult<MonthSales> {
  return extremeMonths(monthly, "min");
}

export function rankProducts(products: ProductAggregate): ProductSales[] {
  return Array.from(products, ([product, summedSales]) => ({ product, summedSales })).sort(
    (a, b) => b.summedSales.cmp(a.summedSales) || compareText(a.product, b.product)
  );
}

export function topProducts(products: ProductAggregate, n = TOP_PRODUCT_COUNT): RankResult<ProductSales> {
  return ranked(rankProducts(products).slice(0, Math.max(0, n)));
}

export function topProduct(products: ProductAggregate): RankResult<ProductSales> {
  return topProducts(products, 1);
}

export function rankStates(counts: StateCustomerCount): StateCustomers[] {
  return Array.from(counts, ([stateCode, customerCount]) => ({ stateCode, customerCount })).sort(
    (a, b) => b.customerCount - a.customerCount || compareText(a.stateCode, b.stateCode)
  );
}

export function stateMostCustomers(counts: StateCustomerCount): RankResult<StateCustomers> {
  return ranked(rankStates(counts).slice(0, 1));
}

export function stateFewestCustomers(counts: StateCustomerCount): RankResult<StateCustomers> {
  return ranked(rankStates(counts).slice(-1));
}
