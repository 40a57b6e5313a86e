import { describe, it, expect } from "vitest";
import os from "os";
import path from "path";
import { SchemaError, InputFileError } from "@/lib/errors";
import { parseSalesCsv, readSalesCsv } from "@/lib/ingest/read";
import { normalizeRecords } from "@/lib/ingest/normalize";
import { filterValid } from "@/lib/ingest/filter";
import { analyzeSales } from "@/lib/analysis/pipeline";
import { rawRecord, SAMPLE_CSV_PATH } from "@/lib/domain/fixtures";

const salesCsv = `Order_Date,Product,Total_Sales,State_Code,Customer_Name\n01-03-2021,Widget,$10,AA,Ann\n15-03-2021,,$20,AA,Bob\n02-04-2021,Gadget,"$1,005.50",NA,Cy`;

describe("sales csv reader", () => {
  it("maps columns and turns empty cells into null", () => {
    const rep = parseSalesCsv(salesCsv);
    expect(rep.rowCount).toBe(3);
    expect(rep.droppedRows).toBe(0);
    expect(rep.columns).toEqual(["Order_Date", "Product", "Total_Sales", "State_Code", "Customer_Name"]);
    expect(rep.unknownColumns).toEqual(["Customer_Name"]);
    expect(rep.rows[0]).toEqual({ orderDate: "01-03-2021", product: "Widget", totalSales: "$10", stateCode: "AA" });
    expect(rep.rows[1].product).toBe(null);
    expect(rep.rows[2].totalSales).toBe("$1,005.50");
    expect(rep.rows[2].stateCode).toBe(null);
  });

  it("accepts header aliases and a byte order mark", () => {
    const rep = parseSalesCsv(`\uFEFForder date, product ,Total Sales,state code\n01-03-2021,Widget,$10,AA`);
    expect(rep.unknownColumns).toEqual([]);
    expect(rep.rows).toEqual([{ orderDate: "01-03-2021", product: "Widget", totalSales: "$10", stateCode: "AA" }]);
  });

  it("fails when a required column is absent", () => {
    let caught: unknown;
    try {
      parseSalesCsv(`Order_Date,Product,Total_Sales\n01-03-2021,Widget,$10`);
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(SchemaError);
    expect(caught instanceof SchemaError && caught.missing).toEqual(["State_Code"]);
  });

  it("prefers the exact State_Code column over an alias placed before it", () => {
    const rep = parseSalesCsv(`Order_Date,Product,Total_Sales,State Code,State_Code\n01-03-2021,Widget,$10,New York,NY`);
    expect(rep.rows).toEqual([{ orderDate: "01-03-2021", product: "Widget", totalSales: "$10", stateCode: "NY" }]);
    expect(rep.unknownColumns).toEqual(["State Code"]);
  });

  it("leaves a bare State column unmapped", () => {
    const rep = parseSalesCsv(`Order_Date,Product,Total_Sales,State,State_Code\n01-03-2021,Widget,$10,New York,NY`);
    expect(rep.rows[0].stateCode).toBe("NY");
    expect(rep.unknownColumns).toEqual(["State"]);
  });

  it("sums Total_Sales even when a Sales column comes first", () => {
    const rep = parseSalesCsv(`Order_Date,Product,Sales,Total_Sales,State_Code\n01-03-2021,Widget,3,$10,AA`);
    expect(rep.rows[0].totalSales).toBe("$10");
    expect(rep.unknownColumns).toEqual(["Sales"]);
    expect(analyzeSales(rep.rows).monthly.get("Mar 2021")?.toString()).toBe("10");
  });

  it("does not accept one-word headers in place of required columns", () => {
    let caught: unknown;
    try {
      parseSalesCsv(`Date,Product,Sales,State\n01-03-2021,Widget,$10,AA`);
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(SchemaError);
    expect(caught instanceof SchemaError && caught.missing).toEqual(["Order_Date", "Total_Sales", "State_Code"]);
  });

  it("treats only the exact literal NA as missing", () => {
    const rep = parseSalesCsv(`Order_Date,Product,Total_Sales,State_Code\n01-03-2021,na,$10,Na\n01-03-2021,NA,$10, NA `);
    expect(rep.rows[0].product).toBe("na");
    expect(rep.rows[0].stateCode).toBe("Na");
    expect(rep.rows[1].product).toBe(null);
    expect(rep.rows[1].stateCode).toBe(null);
  });

  it("locates the sample export independently of the working directory", () => {
    const root = path.resolve(__dirname, "../../..");
    expect(path.relative(root, SAMPLE_CSV_PATH)).toBe(path.join("fixtures", "sales", "eCommerce-sample.csv"));
  });

  it("reads the sample export from disk", async () => {
    const rep = await readSalesCsv(SAMPLE_CSV_PATH);
    expect(rep.rowCount).toBe(12);
    expect(rep.errors).toEqual([]);
    expect(rep.rows[9].orderDate).toBe(null);
  });

  it("reports an unreadable input file", async () => {
    const missing = path.join(os.tmpdir(), "sales-analysis-does-not-exist", "eCommerce.csv");
    await expect(readSalesCsv(missing)).rejects.toBeInstanceOf(InputFileError);
  });
});

describe("normalizer", () => {
  it("keeps length and order and derives month fields", () => {
    const rows = [
      rawRecord("15-03-2021", "Widget", "$20", "AA"),
      rawRecord("garbage", "Widget", "$20", "AA"),
    ];
    const { records } = normalizeRecords(rows);
    expect(records.length).toBe(2);
    expect(records[0].month).toEqual({ year: 2021, month: 3, day: 1 });
    expect(records[0].monthLabel).toBe("Mar 2021");
    expect(records[0].totalSales?.toString()).toBe("20");
    expect(records[1].orderDate).toBe(null);
    expect(records[1].month).toBe(null);
    expect(records[1].monthLabel).toBe(null);
  });

  it("counts missing values from raw presence, separately from parse failures", () => {
    const rows = [
      rawRecord("31-02-2021", "Widget", "$10", "AA"),
      rawRecord(null, null, "ten dollars", null),
      rawRecord("01-03-2021", "Gadget", null, "BB"),
    ];
    const { records, missing, parseIssues } = normalizeRecords(rows);
    expect(missing).toEqual({ missingDates: 1, missingProducts: 1, missingSales: 1, missingStates: 1 });
    expect(parseIssues).toEqual({ unparsableDates: 1, unparsableSales: 1 });
    expect(records[0].orderDate).toBe(null);
  });
});

describe("validity filter", () => {
  it("drops incomplete records and orders by month, stable within a month", () => {
    const { records } = normalizeRecords([
      rawRecord("02-04-2021", "A", "$1", "AA"),
      rawRecord("20-03-2021", "B", "$1", "AA"),
      rawRecord("01-04-2021", "C", "$1", "AA"),
      rawRecord("01-03-2021", "D", "$1", null),
      rawRecord("05-03-2021", "E", "$1", "AA"),
    ]);
    const { valid, droppedRows } = filterValid(records);
    expect(valid.map((r) => r.product)).toEqual(["B", "E", "A", "C"]);
    expect(droppedRows).toBe(1);
  });

  it("returns nothing for an all-invalid input", () => {
    const { records } = normalizeRecords([rawRecord(null, "A", "$1", "AA"), rawRecord("01-03-2021", "B", "x", "AA")]);
    expect(filterValid(records)).toEqual({ valid: [], droppedRows: 2 });
  });
});
