import path from "path";
import type { RawRecord } from "@/lib/domain/types";

export const SAMPLE_CSV_PATH = path.resolve(__dirname, "../../fixtures/sales/eCommerce-sample.csv");

export function rawRecord(
  orderDate: string | null,
  product: string | null,
  totalSales: string | null,
  stateCode: string | null
): RawRecord {
  return { orderDate, product, totalSales, stateCode };
}

// Two March orders for one product and state, one April order elsewhere
export function scenarioRecords(): RawRecord[] {
  return [
    rawRecord("01-03-2021", "Widget", "$10", "AA"),
    rawRecord("15-03-2021", "Widget", "$20", "AA"),
    rawRecord("01-04-2021", "Gadget", "$5", "BB"),
  ];
}
