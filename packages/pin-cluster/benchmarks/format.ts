/**
 * Console report for the clustering benchmark: a titled section per
 * measurement, each a fixed-width table.
 */

const ESC = "\x1b[";
const STYLES = {
  title: `${ESC}1;36m`,
  muted: `${ESC}2m`,
  good: `${ESC}32m`,
  bad: `${ESC}31m`,
} as const;

type Style = keyof typeof STYLES;

function paint(text: string, style: Style): string {
  return `${STYLES[style]}${text}${ESC}0m`;
}

function visibleLength(text: string): number {
  return text.replace(/\x1b\[[0-9;]*m/g, "").length;
}

export interface Column {
  label: string;
  width: number;
  /** Default: "right" */
  align?: "left" | "right";
}

/** Fixed-width table printed row by row as results arrive. */
export class ReportTable {
  constructor(private readonly columns: readonly Column[]) {}

  printHeader(): void {
    console.log(
      paint(this.line(this.columns.map((c) => c.label)), "muted"),
    );
    const rule = this.columns.map((c) => "-".repeat(c.width)).join("  ");
    console.log(paint(`  ${rule}`, "muted"));
  }

  printRow(cells: readonly string[]): void {
    console.log(this.line(cells));
  }

  private line(cells: readonly string[]): string {
    const padded = this.columns.map((column, i) => {
      const text = cells[i] ?? "";
      const fill = " ".repeat(Math.max(0, column.width - visibleLength(text)));
      return column.align === "left" ? text + fill : fill + text;
    });
    return `  ${padded.join("  ")}`;
  }
}

export function section(title: string, note?: string): void {
  console.log("");
  console.log(paint(`▸ ${title}`, "title"));
  if (note) console.log(paint(`  ${note}`, "muted"));
  console.log("");
}

export function count(n: number): string {
  return n.toLocaleString("en-US");
}

/** Grouping radius; 0 and `null` (past the cutoff) read as no grouping. */
export function radius(meters: number | null): string {
  if (meters === null || meters === 0) return "-";
  return meters >= 1000 ? `${meters / 1000}km` : `${meters}m`;
}

export function duration(ms: number): string {
  if (ms < 1) return `${(ms * 1000).toFixed(0)}µs`;
  if (ms < 1000) return `${ms.toFixed(2)}ms`;
  return `${(ms / 1000).toFixed(2)}s`;
}

/** Ratio of baseline to candidate time, colored by which one won. */
export function speedup(baselineMs: number, candidateMs: number): string {
  const ratio = baselineMs / candidateMs;
  return ratio >= 1
    ? paint(`${ratio.toFixed(1)}× faster`, "good")
    : paint(`${(1 / ratio).toFixed(1)}× slower`, "bad");
}
