import Papa from "papaparse";
import { z } from "zod";
import { SchemaError } from "@/lib/errors";

export type ParseReport<T> = {
  rows: T[];
  errors: { row: number; message: string }[];
  columns: string[];
  rowCount: number;
  droppedRows: number;
  unknownColumns: string[];
};

/**
 * Picks one source column per canonical key. A header equal to the required
 * column name wins; otherwise the first header whose alias matches. Every
 * other header, including a shadowed alias, is left unused.
 */
export function resolveColumns<K extends string>(
  columns: string[],
  aliases: Record<string, K>,
  required: Record<K, string>
): Map<string, string> {
  const columnFor = new Map<string, string>();
  for (const [key, name] of Object.entries<string>(required)) {
    if (columns.includes(name)) columnFor.set(key, name);
  }
  for (const col of columns) {
    const target: string | undefined = aliases[col.toLowerCase()];
    if (target === undefined || columnFor.has(target)) continue;
    columnFor.set(target, col);
  }
  return columnFor;
}

// CSV parser with header aliasing, required-column check + row validation
export function parseCsv<K extends string, S extends z.ZodTypeAny>(
  text: string,
  schema: S,
  aliases: Record<string, K>,
  required: Record<K, string>
): ParseReport<z.infer<S>> {
  const result = Papa.parse<Record<string, string | undefined>>(text, {
    header: true,
    dynamicTyping: false,
    skipEmptyLines: "greedy",
    transformHeader: (h) => h.trim(),
  });

  const columns = result.meta.fields ?? [];
  const columnFor = resolveColumns(columns, aliases, required);
  const used = new Set(columnFor.values());
  const unknownColumns = columns.filter((col) => !used.has(col));

  const missing = Object.entries<string>(required)
    .filter(([key]) => !columnFor.has(key))
    .map(([, column]) => column);
  if (missing.length > 0) throw new SchemaError(missing, columns);

  const errors: { row: number; message: string }[] = result.errors.map((e) => ({
    row: (e.row ?? -1) + 1,
    message: `${e.code}: ${e.message}`,
  }));

  const rows: z.infer<S>[] = [];
  let droppedRows = 0;
  result.data.forEach((raw, idx) => {
    const mapped: Record<string, unknown> = {};
    for (const [key, col] of columnFor) mapped[key] = raw[col];

    const parsed = schema.safeParse(mapped);
    if (parsed.success) {
      rows.push(parsed.data);
    } else {
      droppedRows += 1;
      const msg = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
      errors.push({ row: idx + 1, message: msg });
    }
  });

  return {
    rows,
    errors,
    columns,
    rowCount: result.data.length,
    droppedRows,
    unknownColumns,
  };
}
