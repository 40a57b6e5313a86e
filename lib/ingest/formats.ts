// Text -> value helpers for the sales export quirks

import { Decimal } from "decimal.js";
import type { CalendarDate } from "@/lib/domain/types";

export const MONTH_ABBREVIATIONS = [
  "Jan", "Feb", "Mar", "Apr", "May", "Jun",
  "Jul", "Aug", "Sep", "Oct", "Nov", "Dec",
] as const;

const MONTH_NAMES: Record<string, number> = {
  jan: 1, january: 1,
  feb: 2, february: 2,
  mar: 3, march: 3,
  apr: 4, april: 4,
  may: 5,
  jun: 6, june: 6,
  jul: 7, july: 7,
  aug: 8, august: 8,
  sep: 9, sept: 9, september: 9,
  oct: 10, october: 10,
  nov: 11, november: 11,
  dec: 12, december: 12,
};

// Day, month (number or English name), 4-digit year; one separator kind per value
const DMY_PATTERN = /^(\d{1,2})([-/. ])(\d{1,2}|[A-Za-z]{3,9})\2(\d{4})$/;

export function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
    return leap ? 29 : 28;
  }
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

export function parseDayMonthYear(text: string | null | undefined): CalendarDate | null {
  if (!text) return null;
  const m = DMY_PATTERN.exec(text.trim());
  if (!m) return null;
  const [, d, , mo, y] = m;
  const day = Number(d);
  const month: number | undefined = /^\d+$/.test(mo) ? Number(mo) : MONTH_NAMES[mo.toLowerCase()];
  const year = Number(y);
  if (month === undefined || month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  return { year, month, day };
}

const CURRENCY_MARKERS = /[$€£¥\s]/g;
const GROUPED_THOUSANDS = /^[-+]?\d{1,3}(,\d{3})+(\.\d*)?$/;
const PLAIN_DECIMAL = /^[-+]?(\d+\.?\d*|\.\d+)$/;

export function parseCurrency(text: string | null | undefined): Decimal | null {
  if (!text) return null;
  let s = text.replace(CURRENCY_MARKERS, "");
  if (GROUPED_THOUSANDS.test(s)) s = s.replace(/,/g, "");
  if (!PLAIN_DECIMAL.test(s)) return null;
  return new Decimal(s);
}

export function startOfMonth(date: CalendarDate): CalendarDate {
  return { year: date.year, month: date.month, day: 1 };
}

export function formatMonthLabel(date: CalendarDate): string {
  return `${MONTH_ABBREVIATIONS[date.month - 1]} ${String(date.year).padStart(4, "0")}`;
}

export function compareDates(a: CalendarDate, b: CalendarDate): number {
  return a.year - b.year || a.month - b.month || a.day - b.day;
}
