import { Decimal } from "decimal.js";
import type {
  MonthlyAggregate,
  ProductAggregate,
  StateCustomerCount,
  ValidRecord,
} from "@/lib/domain/types";

// Generic fold into an insertion-ordered map
export function groupReduce<T, V>(
  items: readonly T[],
  keyOf: (item: T) => string,
  init: () => V,
  step: (acc: V, item: T) => V
): Map<string, V> {
  const out = new Map<string, V>();
  for (const item of items) {
    const k = keyOf(item);
    out.set(k, step(out.get(k) ?? init(), item));
  }
  return out;
}

const ZERO = new Decimal(0);

// Input must already be in month order; the map keeps first-seen order
export function sumByMonth(records: readonly ValidRecord[]): MonthlyAggregate {
  return groupReduce(records, (r) => r.monthLabel, () => ZERO, (acc, r) => acc.plus(r.totalSales));
}

export function sumByProduct(records: readonly ValidRecord[]): ProductAggregate {
  return groupReduce(records, (r) => r.product, () => ZERO, (acc, r) => acc.plus(r.totalSales));
}

export function countByState(records: readonly ValidRecord[]): StateCustomerCount {
  return groupReduce(records, (r) => r.stateCode, () => 0, (acc) => acc + 1);
}

export function totalSales(records: readonly ValidRecord[]): Decimal {
  return records.reduce((acc, r) => acc.plus(r.totalSales), ZERO);
}

export function sumValues(values: Iterable<Decimal>): Decimal {
  let acc = ZERO;
  for (const v of values) acc = acc.plus(v);
  return acc;
}
