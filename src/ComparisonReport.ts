import type { Estimate } from "./Benchmark.ts";
import type {
  CellFailure,
  CellResult,
  ComparisonResults,
} from "./IsolationDriver.ts";
import {
  type BootstrapOptions,
  bootstrapDifferenceCI,
  type DifferenceCI,
} from "./StatisticalUtils.ts";

/** One ranked entry of the comparison at a single input size */
export interface ComparisonRow {
  name: string;
  size: number;
  estimate: Estimate;
  interval: [number, number];
  /** central / fastest central at this size, 1 for the fastest */
  speedup: number;
  /** 1-based position within the size group */
  rank: number;
  /** change against the baseline case, absent for the baseline itself */
  baselineDiff?: DifferenceCI;
}

/** Rows for one input size, fastest first */
export interface SizeGroup {
  size: number;
  winner: string;
  rows: ComparisonRow[];
}

/** Empirical growth of a case's cost with input size */
export interface ScalingFit {
  name: string;
  /** least-squares slope of log(time) against log(size) */
  exponent: number;
  /** sizes the fit used */
  points: number;
}

/** Grouped, ranked comparison of one run, at full precision */
export interface ComparisonReport {
  name: string;
  baseline?: string;
  groups: SizeGroup[];
  /** every row, grouped by ascending size then fastest first */
  rows: ComparisonRow[];
  failures: CellFailure[];
  scaling: ScalingFit[];
}

/** Options for building a comparison report */
export interface ReportOptions {
  /** bootstrap options for baseline difference intervals */
  bootstrap?: BootstrapOptions;
}

/** Group cells by size, rank each group by central estimate, derive speedups */
export function buildComparisonReport(
  results: ComparisonResults,
  options: ReportOptions = {},
): ComparisonReport {
  const { name, baseline, failures } = results;
  const order = new Map(results.caseOrder.map((n, i) => [n, i]));
  const bySize = groupBySize(results.cells);

  const groups = [...bySize.keys()]
    .sort((a, b) => a - b)
    .map(size => {
      const cells = bySize.get(size) ?? [];
      return rankGroup(size, cells, order, baseline, options.bootstrap);
    });
  const rows = groups.flatMap(g => g.rows);
  const scaling = scalingFits(results.cells, results.caseOrder);
  return { name, baseline, groups, rows, failures, scaling };
}

/** @return speedup of central relative to the fastest central */
export function speedupRatio(central: number, fastest: number): number {
  if (fastest === 0) return central === 0 ? 1 : Number.POSITIVE_INFINITY;
  return central / fastest;
}

/** @return least-squares slope of log(y) on log(x), or undefined below two points */
export function logLogSlope(
  points: readonly { x: number; y: number }[],
): number | undefined {
  const logs = points
    .filter(p => p.x > 0 && p.y > 0)
    .map(p => ({ x: Math.log(p.x), y: Math.log(p.y) }));
  if (logs.length < 2) return undefined;

  const n = logs.length;
  const meanX = logs.reduce((s, p) => s + p.x, 0) / n;
  const meanY = logs.reduce((s, p) => s + p.y, 0) / n;
  let num = 0;
  let den = 0;
  for (const p of logs) {
    num += (p.x - meanX) * (p.y - meanY);
    den += (p.x - meanX) ** 2;
  }
  return den === 0 ? undefined : num / den;
}

function groupBySize(cells: CellResult[]): Map<number, CellResult[]> {
  const bySize = new Map<number, CellResult[]>();
  for (const cell of cells) {
    const group = bySize.get(cell.size) ?? [];
    group.push(cell);
    bySize.set(cell.size, group);
  }
  return bySize;
}

/** Sort one size group and compute speedups against its fastest row */
function rankGroup(
  size: number,
  cells: CellResult[],
  order: Map<string, number>,
  baseline: string | undefined,
  bootstrap: BootstrapOptions | undefined,
): SizeGroup {
  const position = (c: CellResult) => order.get(c.caseName) ?? order.size;
  const sorted = [...cells].sort(
    (a, b) =>
      a.estimate.central - b.estimate.central || position(a) - position(b),
  );
  const fastest = sorted[0].estimate.central;
  const baseCell = cells.find(c => c.caseName === baseline);

  const rows = sorted.map((cell, i): ComparisonRow => {
    const { estimate } = cell;
    const row: ComparisonRow = {
      name: cell.caseName,
      size,
      estimate,
      interval: [estimate.lower, estimate.upper],
      speedup: speedupRatio(estimate.central, fastest),
      rank: i + 1,
    };
    if (baseCell && cell !== baseCell) {
      row.baselineDiff = bootstrapDifferenceCI(
        baseCell.samples,
        cell.samples,
        bootstrap,
      );
    }
    return row;
  });
  return { size, winner: sorted[0].caseName, rows };
}

/** @return scaling exponent per case, for cases measured at 2+ positive sizes */
function scalingFits(cells: CellResult[], caseOrder: string[]): ScalingFit[] {
  return caseOrder.flatMap(name => {
    const points = cells
      .filter(c => c.caseName === name)
      .map(c => ({ x: c.size, y: c.estimate.central }));
    const exponent = logLogSlope(points);
    if (exponent === undefined) return [];
    const used = points.filter(p => p.x > 0 && p.y > 0).length;
    return [{ name, exponent, points: used }];
  });
}
