import path from "path";
import { z } from "zod";

export const DEFAULT_INPUT_FILE = "eCommerce.csv";
export const DEFAULT_OUTPUT_DIR = "analysis_output";
export const TOP_PRODUCT_COUNT = 5;
export const PREVIEW_ROWS = 5;

export const OUTPUT_FILES = {
  missingSummary: "missing_summary.csv",
  monthlySales: "monthly_sales.csv",
  peakMonth: "peak_month.csv",
  lowestMonth: "lowest_month.csv",
  topProduct: "top_product.csv",
  customerCountByState: "customer_count_by_state.csv",
  stateMostCustomers: "state_most_customers.csv",
  stateFewestCustomers: "state_fewest_customers.csv",
  textReport: "ecommerce_summary.txt",
  workbook: "ecommerce_report.xlsx",
  monthlyTrendChart: "monthly_sales_trend",
  topProductsChart: "top5_products",
} as const;

export type OutputFile = keyof typeof OUTPUT_FILES;

const ChartSizeSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
});

export const ReportConfigSchema = z.object({
  outputDir: z.string().min(1),
  chartFormat: z.enum(["png", "svg"]),
  trendChart: ChartSizeSchema,
  productsChart: ChartSizeSchema,
});

export type ReportConfig = z.infer<typeof ReportConfigSchema>;
export type ChartFormat = ReportConfig["chartFormat"];
export type ChartSize = z.infer<typeof ChartSizeSchema>;

export const DEFAULT_REPORT_CONFIG: ReportConfig = {
  outputDir: DEFAULT_OUTPUT_DIR,
  chartFormat: "png",
  trendChart: { width: 1000, height: 600 },
  productsChart: { width: 800, height: 500 },
};

export function resolveReportConfig(overrides: Partial<ReportConfig> = {}): ReportConfig {
  return ReportConfigSchema.parse({ ...DEFAULT_REPORT_CONFIG, ...overrides });
}

export function outputPath(config: ReportConfig, file: OutputFile): string {
  const name: string = OUTPUT_FILES[file];
  if (file === "monthlyTrendChart" || file === "topProductsChart") {
    return path.join(config.outputDir, `${name}.${config.chartFormat}`);
  }
  return path.join(config.outputDir, name);
}
