import type { AnalysisResult, RawRecord } from "@/lib/domain/types";
import { filterValid } from "@/lib/ingest/filter";
import { normalizeRecords } from "@/lib/ingest/normalize";
import { countByState, sumByMonth, sumByProduct } from "./aggregate";
import {
  lowestMonth,
  peakMonth,
  rankStates,
  stateFewestCustomers,
  stateMostCustomers,
  topProduct,
  topProducts,
} from "./rank";

// Pure: raw rows in, every aggregate and selection out. Writers run afterwards.
export function analyzeSales(rows: readonly RawRecord[]): AnalysisResult {
  const { records, missing, parseIssues } = normalizeRecords(rows);
  const { valid, droppedRows } = filterValid(records);

  const monthly = sumByMonth(valid);
  const products = sumByProduct(valid);
  const stateCounts = countByState(valid);

  return {
    rawCount: rows.length,
    validRecords: valid,
    droppedRows,
    missing,
    parseIssues,
    monthly,
    products,
    stateCounts,
    stateRanking: rankStates(stateCounts),
    peakMonth: peakMonth(monthly),
    lowestMonth: lowestMonth(monthly),
    topProduct: topProduct(products),
    top5Products: topProducts(products),
    stateMostCustomers: stateMostCustomers(stateCounts),
    stateFewestCustomers: stateFewestCustomers(stateCounts),
  };
}
