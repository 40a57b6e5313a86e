// Sales analysis batch run: eCommerce.csv -> analysis_output/

import path from "path";
import { analyzeSales } from "@/lib/analysis/pipeline";
import { DEFAULT_INPUT_FILE, PREVIEW_ROWS, resolveReportConfig } from "@/lib/config";
import { describeError } from "@/lib/errors";
import { readSalesCsv } from "@/lib/ingest/read";
import { consoleLogger, type Logger } from "@/lib/log";
import { writeReports } from "@/lib/report/write";

async function main(logger: Logger = consoleLogger): Promise<number> {
  const inputPath = path.resolve(DEFAULT_INPUT_FILE);
  const config = resolveReportConfig();

  try {
    const report = await readSalesCsv(inputPath);

    logger.info("Data Preview:");
    logger.table(report.rows.slice(0, PREVIEW_ROWS));
    logger.info(`Column Names: ${report.columns.join(", ")}`);
    if (report.unknownColumns.length > 0) {
      logger.info(`Ignored columns: ${report.unknownColumns.join(", ")}`);
    }
    for (const e of report.errors) logger.warn(`row ${e.row}: ${e.message}`);

    const result = analyzeSales(report.rows);
    logger.info(
      `Records: ${result.rawCount} read, ${result.validRecords.length} valid, ${result.droppedRows} dropped`
    );
    const { unparsableDates, unparsableSales } = result.parseIssues;
    if (unparsableDates > 0 || unparsableSales > 0) {
      logger.warn(`Unparsable values: ${unparsableDates} dates, ${unparsableSales} sales amounts`);
    }
    if (result.validRecords.length === 0) {
      logger.warn("No valid records; reports will show no data");
    }

    await writeReports(result, config, logger);
    logger.info(`Analysis complete! Files saved to '${config.outputDir}/' folder.`);
    return 0;
  } catch (e) {
    logger.error(describeError(e));
    return 1;
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (e: unknown) => {
    console.error(e);
    process.exitCode = 1;
  }
);
