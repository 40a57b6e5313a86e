import type {
  MissingSummary,
  NormalizedRecord,
  ParseIssues,
  RawRecord,
} from "@/lib/domain/types";
import { formatMonthLabel, parseCurrency, parseDayMonthYear, startOfMonth } from "./formats";

export type NormalizeReport = {
  records: NormalizedRecord[];
  missing: MissingSummary;
  parseIssues: ParseIssues;
};

export function normalizeRecord(r: RawRecord): NormalizedRecord {
  const orderDate = parseDayMonthYear(r.orderDate);
  const month = orderDate ? startOfMonth(orderDate) : null;
  return {
    orderDate,
    totalSales: parseCurrency(r.totalSales),
    product: r.product,
    stateCode: r.stateCode,
    month,
    monthLabel: month ? formatMonthLabel(month) : null,
  };
}

export function summarizeMissing(rows: readonly RawRecord[]): MissingSummary {
  const missing: MissingSummary = { missingDates: 0, missingProducts: 0, missingSales: 0, missingStates: 0 };
  for (const r of rows) {
    if (r.orderDate === null) missing.missingDates += 1;
    if (r.product === null) missing.missingProducts += 1;
    if (r.totalSales === null) missing.missingSales += 1;
    if (r.stateCode === null) missing.missingStates += 1;
  }
  return missing;
}

export function normalizeRecords(rows: readonly RawRecord[]): NormalizeReport {
  const records = rows.map(normalizeRecord);
  const parseIssues: ParseIssues = { unparsableDates: 0, unparsableSales: 0 };
  records.forEach((rec, i) => {
    const raw = rows[i];
    if (raw.orderDate !== null && rec.orderDate === null) parseIssues.unparsableDates += 1;
    if (raw.totalSales !== null && rec.totalSales === null) parseIssues.unparsableSales += 1;
  });
  return { records, missing: summarizeMissing(rows), parseIssues };
}
