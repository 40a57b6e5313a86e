import { z } from "zod";

// Source column names as they appear in the export
export const REQUIRED_COLUMNS = {
  orderDate: "Order_Date",
  product: "Product",
  totalSales: "Total_Sales",
  stateCode: "State_Code",
} as const;

export type SalesField = keyof typeof REQUIRED_COLUMNS;

// Lower-cased header -> canonical key; an exact REQUIRED_COLUMNS header always wins over an alias
export const SALES_ALIASES: Record<string, SalesField> = {
  order_date: "orderDate",
  "order date": "orderDate",
  orderdate: "orderDate",
  product: "product",
  product_name: "product",
  "product name": "product",
  total_sales: "totalSales",
  "total sales": "totalSales",
  totalsales: "totalSales",
  state_code: "stateCode",
  "state code": "stateCode",
  statecode: "stateCode",
};

// Empty cells and the exact literal NA are absent, everything else is trimmed text
const toOptStr = z
  .union([z.string(), z.number(), z.null(), z.undefined()])
  .transform((v) => {
    if (v === null || v === undefined) return null;
    const s = String(v).trim();
    if (s === "" || s === "NA") return null;
    return s;
  });

export const RawSalesRowSchema = z.object({
  orderDate: toOptStr,
  product: toOptStr,
  totalSales: toOptStr,
  stateCode: toOptStr,
});
