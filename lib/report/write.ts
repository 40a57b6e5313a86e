import { promises as fs } from "fs";
import type { AnalysisResult } from "@/lib/domain/types";
import { outputPath, type OutputFile, type ReportConfig } from "@/lib/config";
import { ReportError } from "@/lib/errors";
import { silentLogger, type Logger } from "@/lib/log";
import { encodeChart, renderMonthlyTrendSvg, renderTopProductsSvg } from "./charts";
import { buildCsvOutputs } from "./csv";
import { rowsOf } from "./tables";
import { renderTextReport } from "./text";
import { buildWorkbook, workbookToBuffer } from "./workbook";

export type ReportArtifact = {
  file: OutputFile;
  contents: string | Buffer;
};

export async function buildReportArtifacts(result: AnalysisResult, config: ReportConfig): Promise<ReportArtifact[]> {
  const csv = buildCsvOutputs(result);
  const monthRows = Array.from(result.monthly, ([monthLabel, summedSales]) => ({ monthLabel, summedSales }));
  const artifacts: ReportArtifact[] = [
    { file: "missingSummary", contents: csv.missingSummary },
    { file: "monthlySales", contents: csv.monthlySales },
    { file: "peakMonth", contents: csv.peakMonth },
    { file: "lowestMonth", contents: csv.lowestMonth },
    { file: "topProduct", contents: csv.topProduct },
    { file: "customerCountByState", contents: csv.customerCountByState },
    { file: "stateMostCustomers", contents: csv.stateMostCustomers },
    { file: "stateFewestCustomers", contents: csv.stateFewestCustomers },
    { file: "textReport", contents: renderTextReport(result) },
    { file: "workbook", contents: workbookToBuffer(buildWorkbook(result)) },
    {
      file: "monthlyTrendChart",
      contents: await encodeChart(renderMonthlyTrendSvg(monthRows, config.trendChart), config.chartFormat),
    },
    {
      file: "topProductsChart",
      contents: await encodeChart(renderTopProductsSvg(rowsOf(result.top5Products), config.productsChart), config.chartFormat),
    },
  ];
  return artifacts;
}

// Everything is rendered before the first write so a rendering failure leaves no partial output
export async function writeReports(
  result: AnalysisResult,
  config: ReportConfig,
  logger: Logger = silentLogger
): Promise<string[]> {
  const artifacts = await buildReportArtifacts(result, config);
  try {
    await fs.mkdir(config.outputDir, { recursive: true });
  } catch (e) {
    throw new ReportError(config.outputDir, e);
  }

  const written: string[] = [];
  for (const { file, contents } of artifacts) {
    const target = outputPath(config, file);
    try {
      await fs.writeFile(target, contents);
    } catch (e) {
      throw new ReportError(target, e);
    }
    logger.info(`wrote ${target}`);
    written.push(target);
  }
  return written;
}
