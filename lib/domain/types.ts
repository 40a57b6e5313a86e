// Domain models for the sales analysis pipeline

import type { Decimal } from "decimal.js";

export type CalendarDate = {
  year: number;
  month: number; // 1-12
  day: number;
};

// One CSV row after header aliasing; absent cells are null
export type RawRecord = {
  orderDate: string | null;
  product: string | null;
  totalSales: string | null;
  stateCode: string | null;
};

export type NormalizedRecord = {
  orderDate: CalendarDate | null;
  totalSales: Decimal | null;
  product: string | null;
  stateCode: string | null;
  month: CalendarDate | null; // first of month, null iff orderDate is null
  monthLabel: string | null; // "Mar 2021"
};

export type ValidRecord = {
  readonly orderDate: CalendarDate;
  readonly totalSales: Decimal;
  readonly product: string;
  readonly stateCode: string;
  readonly month: CalendarDate;
  readonly monthLabel: string;
};

// Raw presence counters, independent of parse success
export type MissingSummary = {
  missingDates: number;
  missingProducts: number;
  missingSales: number;
  missingStates: number;
};

// Present in the raw input but rejected by the parser
export type ParseIssues = {
  unparsableDates: number;
  unparsableSales: number;
};

export type MonthlyAggregate = ReadonlyMap<string, Decimal>;
export type ProductAggregate = ReadonlyMap<string, Decimal>;
export type StateCustomerCount = ReadonlyMap<string, number>;

export type MonthSales = {
  monthLabel: string;
  summedSales: Decimal;
};

export type ProductSales = {
  product: string;
  summedSales: Decimal;
};

export type StateCustomers = {
  stateCode: string;
  customerCount: number;
};

export type RankResult<T> =
  | { kind: "ranked"; rows: readonly T[] }
  | { kind: "no_data" };

export type AnalysisResult = {
  rawCount: number;
  validRecords: readonly ValidRecord[];
  droppedRows: number;
  missing: MissingSummary;
  parseIssues: ParseIssues;
  monthly: MonthlyAggregate;
  products: ProductAggregate;
  stateCounts: StateCustomerCount;
  stateRanking: readonly StateCustomers[];
  peakMonth: RankResult<MonthSales>;
  lowestMonth: RankResult<MonthSales>;
  topProduct: RankResult<ProductSales>;
  top5Products: RankResult<ProductSales>;
  stateMostCustomers: RankResult<StateCustomers>;
  stateFewestCustomers: RankResult<StateCustomers>;
};
