import { promises as fs } from "fs";
import type { RawRecord } from "@/lib/domain/types";
import { InputFileError } from "@/lib/errors";
import { parseCsv, type ParseReport } from "./parse";
import { RawSalesRowSchema, REQUIRED_COLUMNS, SALES_ALIASES } from "./schemas";

export function parseSalesCsv(text: string): ParseReport<RawRecord> {
  // Strip a UTF-8 BOM so the first header still matches its alias
  const body = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
  return parseCsv(body, RawSalesRowSchema, SALES_ALIASES, REQUIRED_COLUMNS);
}

export async function readSalesCsv(filePath: string): Promise<ParseReport<RawRecord>> {
  let text: string;
  try {
    text = await fs.readFile(filePath, "utf8");
  } catch (e) {
    throw new InputFileError(filePath, e);
  }
  return parseSalesCsv(text);
}
