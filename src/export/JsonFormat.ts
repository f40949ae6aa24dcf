import type { CIDirection } from "../StatisticalUtils.ts";

/** Top level of an exported comparison JSON file */
export interface ComparisonJsonData {
  meta: JsonMeta;
  report: ComparisonJson;
}

export interface JsonMeta {
  timestamp: string;
  version: string;
  args: Record<string, unknown>;
  environment: {
    node: string;
    platform: string;
    arch: string;
  };
}

/** Comparison report with non-finite numbers mapped to null */
export interface ComparisonJson {
  name: string;
  baseline: string | null;
  groups: SizeGroupJson[];
  failures: FailureJson[];
  scaling: ScalingJson[];
}

export interface SizeGroupJson {
  size: number;
  winner: string;
  rows: RowJson[];
}

export interface RowJson {
  rank: number;
  name: string;
  size: number;
  central: number;
  lower: number;
  upper: number;
  median: number;
  min: number;
  max: number;
  cv: number;
  samples: number;
  rejected: number;
  /** null when the fastest case measured zero time */
  speedup: number | null;
  baselineDiff: DiffJson | null;
}

/** Percentages are null where the baseline median is zero */
export interface DiffJson {
  percent: number | null;
  ci: [number | null, number | null];
  direction: CIDirection;
}

export interface FailureJson {
  caseName: string;
  size: number;
  kind: string;
  message: string;
}

export interface ScalingJson {
  name: string;
  exponent: number;
  points: number;
}
