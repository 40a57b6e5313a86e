import type { NormalizedRecord, ValidRecord } from "@/lib/domain/types";
import { compareDates } from "./formats";

export type FilterReport = {
  valid: ValidRecord[];
  droppedRows: number;
};

export function toValidRecord(r: NormalizedRecord): ValidRecord | null {
  const { orderDate, totalSales, product, stateCode, month, monthLabel } = r;
  if (orderDate === null || totalSales === null || product === null || stateCode === null) return null;
  if (month === null || monthLabel === null) return null;
  return { orderDate, totalSales, product, stateCode, month, monthLabel };
}

// Keep complete records only, ordered by month (Array#sort is stable)
export function filterValid(records: readonly NormalizedRecord[]): FilterReport {
  const valid: ValidRecord[] = [];
  for (const r of records) {
    const v = toValidRecord(r);
    if (v) valid.push(v);
  }
  valid.sort((a, b) => compareDates(a.month, b.month));
  return { valid, droppedRows: records.length - valid.length };
}
