import type { Estimate } from "./Benchmark.ts";
import type {
  ComparisonReport,
  ComparisonRow,
  ScalingFit,
} from "./ComparisonReport.ts";
import type { DifferenceCI } from "./StatisticalUtils.ts";
import {
  exponent,
  formatCV,
  formatDiffWithCI,
  integer,
  interval,
  speedup,
  timeMs,
  truncate,
} from "./table-util/Formatters.ts";
import {
  buildTable,
  type ColumnGroup,
  type ResultGroup,
} from "./table-util/TableReport.ts";

/** Flattened row values for the comparison table */
export interface ComparisonTableRow {
  rank: number;
  name: string;
  size: number;
  mean: number;
  interval: [number, number];
  cv: number;
  speedup: number;
  count: number;
  rejected: number;
  diff?: DifferenceCI;
}

/** Flattened row values for the scaling table */
interface ScalingTableRow {
  name: string;
  exponent: number;
  points: number;
}

/** @return comparison table with one row group per input size */
export function comparisonTable(report: ComparisonReport): string {
  const columns = comparisonColumns(report.baseline !== undefined);
  const groups: ResultGroup<ComparisonTableRow>[] = report.groups.map(g => ({
    results: g.rows.map(tableRow),
  }));
  return buildTable(columns, groups);
}

/** @return table of fitted scaling exponents, or undefined if none were fit */
export function scalingTable(scaling: ScalingFit[]): string | undefined {
  if (scaling.length === 0) return undefined;
  const columns: ColumnGroup<ScalingTableRow>[] = [
    {
      groupTitle: "scaling",
      columns: [
        { key: "name", title: "name" },
        { key: "exponent", title: "growth", formatter: exponent },
        { key: "points", title: "sizes", alignment: "right" },
      ],
    },
  ];
  const results = scaling.map(s => ({ ...s, name: truncate(s.name) }));
  return buildTable(columns, [{ results }]);
}

/** @return all console sections for a report: summary, tables, failures */
export function formatComparisonReport(report: ComparisonReport): string {
  const sections = [report.name];
  if (report.groups.length > 0) sections.push(comparisonTable(report));
  const winners = report.groups.map(g => `  n=${integer(g.size)}: ${g.winner}`);
  if (winners.length > 0) sections.push(["fastest:", ...winners].join("\n"));
  const scaling = scalingTable(report.scaling);
  if (scaling) sections.push(scaling);
  if (report.failures.length > 0) {
    const lines = report.failures.map(
      f => `  ${f.caseName} [${f.size}]: ${f.error.message}`,
    );
    sections.push(["failed:", ...lines].join("\n"));
  }
  return sections.join("\n\n");
}

function tableRow(row: ComparisonRow): ComparisonTableRow {
  const { estimate } = row;
  return {
    rank: row.rank,
    name: truncate(row.name),
    size: row.size,
    ...estimateColumns(estimate),
    interval: row.interval,
    speedup: row.speedup,
    diff: row.baselineDiff,
  };
}

function estimateColumns(
  estimate: Estimate,
): Pick<ComparisonTableRow, "mean" | "cv" | "count" | "rejected"> {
  const { central, cv, count, rejected } = estimate;
  return { mean: central, cv, count, rejected };
}

function comparisonColumns(
  withBaseline: boolean,
): ColumnGroup<ComparisonTableRow>[] {
  const groups: ColumnGroup<ComparisonTableRow>[] = [
    {
      columns: [
        { key: "size", title: "size", formatter: integer, alignment: "right" },
        { key: "rank", title: "#", alignment: "right" },
        { key: "name", title: "name" },
      ],
    },
    {
      groupTitle: "time",
      columns: [
        { key: "mean", title: "mean", formatter: timeMs, alignment: "right" },
        { key: "interval", title: "CI", formatter: interval },
        { key: "cv", title: "cv", formatter: formatCV, alignment: "right" },
        { key: "speedup", title: "vs fastest", formatter: speedup },
      ],
    },
    {
      groupTitle: "samples",
      columns: [
        { key: "count", title: "kept", alignment: "right" },
        { key: "rejected", title: "outliers", alignment: "right" },
      ],
    },
  ];
  if (withBaseline) {
    groups.push({
      columns: [
        { key: "diff", title: "Δ% vs baseline", formatter: formatDiffWithCI },
      ],
    });
  }
  return groups;
}
