import { writeFile } from "node:fs/promises";
import type {
  ComparisonReport,
  ComparisonRow,
  SizeGroup,
} from "../ComparisonReport.ts";
import type { DifferenceCI } from "../StatisticalUtils.ts";
import type {
  ComparisonJson,
  ComparisonJsonData,
  DiffJson,
  RowJson,
  SizeGroupJson,
} from "./JsonFormat.ts";

/** Export a comparison report to a JSON file */
export async function exportComparisonJson(
  report: ComparisonReport,
  outputPath: string,
  args: object = {},
): Promise<void> {
  const jsonData: ComparisonJsonData = {
    meta: {
      timestamp: new Date().toISOString(),
      version: process.env.npm_package_version || "unknown",
      args: cleanCliArgs(args),
      environment: {
        node: process.version,
        platform: process.platform,
        arch: process.arch,
      },
    },
    report: reportToJson(report),
  };
  const jsonString = JSON.stringify(jsonData, null, 2);

  await writeFile(outputPath, jsonString, "utf-8");
  console.log(`Comparison data exported to: ${outputPath}`);
}

/** @return report as plain JSON data, with non-finite numbers as null */
export function reportToJson(report: ComparisonReport): ComparisonJson {
  return {
    name: report.name,
    baseline: report.baseline ?? null,
    groups: report.groups.map(convertGroup),
    failures: report.failures.map(({ caseName, size, error }) => ({
      caseName,
      size,
      kind: error.code,
      message: error.message,
    })),
    scaling: report.scaling.map(({ name, exponent, points }) => ({
      name,
      exponent,
      points,
    })),
  };
}

function convertGroup(group: SizeGroup): SizeGroupJson {
  const { size, winner } = group;
  return { size, winner, rows: group.rows.map(convertRow) };
}

function convertRow(row: ComparisonRow): RowJson {
  const { central, lower, upper, median, min, max, cv } = row.estimate;
  const diff = row.baselineDiff;
  return {
    rank: row.rank,
    name: row.name,
    size: row.size,
    central,
    lower,
    upper,
    median,
    min,
    max,
    cv,
    samples: row.estimate.count,
    rejected: row.estimate.rejected,
    speedup: finiteOrNull(row.speedup),
    baselineDiff: diff ? convertDiff(diff) : null,
  };
}

function convertDiff(diff: DifferenceCI): DiffJson {
  const [low, high] = diff.ci;
  return {
    percent: finiteOrNull(diff.percent),
    ci: [finiteOrNull(low), finiteOrNull(high)],
    direction: diff.direction,
  };
}

function finiteOrNull(v: number): number | null {
  return Number.isFinite(v) ? v : null;
}

/** Clean CLI args for JSON export (remove yargs internals and undefined values) */
function cleanCliArgs(args: object): Record<string, unknown> {
  const toCamel = (k: string) =>
    k.replace(/-([a-z])/g, (_, l: string) => l.toUpperCase());
  const entries = Object.entries(args)
    .filter(([k, v]) => v !== undefined && v !== null && k !== "_" && k !== "$0")
    .map(([k, v]) => [toCamel(k), v]);
  return Object.fromEntries(entries);
}
