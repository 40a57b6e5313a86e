import { renderToStaticMarkup } from "react-dom/server";
import { Bar, BarChart, CartesianGrid, Line, LineChart, XAxis, YAxis } from "recharts";
import sharp from "sharp";
import type { MonthSales, ProductSales } from "@/lib/domain/types";
import type { ChartFormat, ChartSize } from "@/lib/config";

export const TREND_CHART_TITLE = "Monthly Sales Trend";
export const TREND_CHART_SUBTITLE = "Total sales grouped by order month";
export const PRODUCTS_CHART_TITLE = "Top 5 Selling Products";

const SVG_NS = "http://www.w3.org/2000/svg";
const HEADER_HEIGHT = 64;

function escapeXml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

/**
 * recharts renders the chart inside a wrapper div; keep only the <svg>, make it
 * standalone, and draw the title block above the plot area.
 */
function toStandaloneSvg(markup: string, size: ChartSize, title: string, subtitle?: string, empty = false): string {
  const start = markup.indexOf("<svg");
  const end = markup.lastIndexOf("</svg>");
  // Nothing to plot: draw the title block on a blank canvas
  let svg =
    start < 0 || end < 0
      ? `<svg width="${size.width}" height="${size.height}" viewBox="0 0 ${size.width} ${size.height}">`
      : markup.slice(start, end);
  if (!/^<svg[^>]*\sxmlns=/.test(svg)) svg = svg.replace("<svg", `<svg xmlns="${SVG_NS}"`);

  const cx = Math.round(size.width / 2);
  const header = [
    `<rect x="0" y="0" width="${size.width}" height="${size.height}" fill="#ffffff"/>`,
    `<text x="${cx}" y="28" text-anchor="middle" font-family="sans-serif" font-size="20" font-weight="bold">${escapeXml(title)}</text>`,
  ];
  if (subtitle) {
    header.push(
      `<text x="${cx}" y="50" text-anchor="middle" font-family="sans-serif" font-size="13" fill="#555555">${escapeXml(subtitle)}</text>`
    );
  }
  if (empty) {
    header.push(
      `<text x="${cx}" y="${Math.round(size.height / 2)}" text-anchor="middle" font-family="sans-serif" font-size="16" fill="#888888">No data</text>`
    );
  }

  // Insert the header right after the opening tag so it paints underneath the plot
  const openEnd = svg.indexOf(">") + 1;
  return svg.slice(0, openEnd) + header.join("") + svg.slice(openEnd) + "</svg>";
}

export function renderMonthlyTrendSvg(rows: readonly MonthSales[], size: ChartSize): string {
  const data = rows.map((r) => ({ month: r.monthLabel, sales: r.summedSales.toNumber() }));
  const markup = renderToStaticMarkup(
    <LineChart
      width={size.width}
      height={size.height}
      data={data}
      margin={{ top: HEADER_HEIGHT, right: 32, bottom: 48, left: 32 }}
    >
      <CartesianGrid stroke="#e5e5e5" />
      <XAxis dataKey="month" interval={0} tick={{ fontSize: 11 }} height={40} />
      <YAxis />
      <Line
        type="linear"
        dataKey="sales"
        stroke="steelblue"
        strokeWidth={2.4}
        dot={{ r: 3, fill: "darkred", stroke: "darkred" }}
        isAnimationActive={false}
      />
    </LineChart>
  );
  return toStandaloneSvg(markup, size, TREND_CHART_TITLE, TREND_CHART_SUBTITLE, data.length === 0);
}

// Rows arrive best-first; a vertical-layout bar chart draws the first row on top
export function renderTopProductsSvg(rows: readonly ProductSales[], size: ChartSize): string {
  const data = rows.map((r) => ({ product: r.product, sales: r.summedSales.toNumber() }));
  const markup = renderToStaticMarkup(
    <BarChart
      width={size.width}
      height={size.height}
      data={data}
      layout="vertical"
      margin={{ top: HEADER_HEIGHT, right: 32, bottom: 24, left: 32 }}
    >
      <CartesianGrid stroke="#e5e5e5" horizontal={false} />
      <XAxis type="number" />
      <YAxis type="category" dataKey="product" width={160} />
      <Bar dataKey="sales" fill="darkgreen" isAnimationActive={false} />
    </BarChart>
  );
  return toStandaloneSvg(markup, size, PRODUCTS_CHART_TITLE, undefined, data.length === 0);
}

export async function encodeChart(svg: string, format: ChartFormat): Promise<Buffer> {
  if (format === "svg") return Buffer.from(svg, "utf8");
  return sharp(Buffer.from(svg, "utf8")).png().toBuffer();
}
