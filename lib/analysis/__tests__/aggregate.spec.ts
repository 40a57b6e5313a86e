import { describe, it, expect } from "vitest";
import { countByState, groupReduce, sumByMonth, sumByProduct, sumValues, totalSales } from "../aggregate";
import { filterValid } from "@/lib/ingest/filter";
import { normalizeRecords } from "@/lib/ingest/normalize";
import { rawRecord, scenarioRecords } from "@/lib/domain/fixtures";
import type { RawRecord } from "@/lib/domain/types";

function validOf(rows: RawRecord[]) {
  return filterValid(normalizeRecords(rows).records).valid;
}

function plain(map: ReadonlyMap<string, { toString(): string } | number>): [string, string][] {
  return Array.from(map, ([k, v]) => [k, String(v)]);
}

describe("aggregator", () => {
  it("sums sales per month in chronological order", () => {
    const valid = validOf([
      rawRecord("03-05-2021", "A", "$1", "AA"),
      ...scenarioRecords(),
      rawRecord("28-02-2021", "A", "$2", "AA"),
    ]);
    expect(plain(sumByMonth(valid))).toEqual([
      ["Feb 2021", "2"],
      ["Mar 2021", "30"],
      ["Apr 2021", "5"],
      ["May 2021", "1"],
    ]);
  });

  it("sums per product and counts per state", () => {
    const valid = validOf(scenarioRecords());
    expect(plain(sumByProduct(valid))).toEqual([
      ["Widget", "30"],
      ["Gadget", "5"],
    ]);
    expect(plain(countByState(valid))).toEqual([
      ["AA", "2"],
      ["BB", "1"],
    ]);
  });

  it("adds currency without floating point drift", () => {
    const valid = validOf([
      rawRecord("01-03-2021", "A", "$0.10", "AA"),
      rawRecord("02-03-2021", "A", "$0.20", "AA"),
    ]);
    expect(sumByMonth(valid).get("Mar 2021")?.toString()).toBe("0.3");
    expect(totalSales(valid).toString()).toBe("0.3");
  });

  it("keeps the three groupings in agreement", () => {
    const rows: RawRecord[] = [];
    const products = ["Lamp", "Desk", "Chair", "Shelf"];
    const states = ["NY", "CA", "TX"];
    for (let i = 0; i < 40; i++) {
      const day = String((i % 28) + 1).padStart(2, "0");
      const month = String((i % 12) + 1).padStart(2, "0");
      rows.push(rawRecord(`${day}-${month}-2022`, products[i % 4], `$${i}.${i % 10}5`, states[i % 3]));
    }
    const valid = validOf(rows);
    const total = totalSales(valid);
    expect(sumValues(sumByMonth(valid).values()).eq(total)).toBe(true);
    expect(sumValues(sumByProduct(valid).values()).eq(total)).toBe(true);
    const customers = Array.from(countByState(valid).values()).reduce((a, b) => a + b, 0);
    expect(customers).toBe(valid.length);
  });

  it("folds into an insertion-ordered map", () => {
    const out = groupReduce(["b", "a", "b"], (s) => s, () => 0, (acc) => acc + 1);
    expect(Array.from(out)).toEqual([
      ["b", 2],
      ["a", 1],
    ]);
  });

  it("returns empty aggregates for no records", () => {
    expect(sumByMonth([]).size).toBe(0);
    expect(sumByProduct([]).size).toBe(0);
    expect(countByState([]).size).toBe(0);
    expect(totalSales([]).toString()).toBe("0");
  });
});
