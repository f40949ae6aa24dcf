import pico from "picocolors";
import type { DifferenceCI } from "../StatisticalUtils.ts";

const isTest = process.env.NODE_ENV === "test" || process.env.VITEST === "true";
const { red, green } = isTest
  ? { red: (str: string) => str, green: (str: string) => str }
  : pico;

/** @return time in milliseconds formatted with a readable unit */
export function timeMs(v: unknown): string | null {
  if (typeof v !== "number" || !Number.isFinite(v)) return null;
  if (v < 0.001) return `${(v * 1e6).toFixed(0)}ns`;
  if (v < 1) return `${(v * 1e3).toFixed(2)}μs`;
  if (v < 1000) return `${v.toFixed(2)}ms`;
  return `${(v / 1000).toFixed(2)}s`;
}

/** @return confidence interval bounds in milliseconds, as "[low, high]" */
export function interval(v: unknown): string | null {
  if (!Array.isArray(v) || v.length !== 2) return null;
  const [low, high] = v.map(timeMs);
  if (low === null || high === null) return null;
  return `[${low}, ${high}]`;
}

/** @return integer with thousands separators */
export function integer(v: unknown): string | null {
  if (typeof v !== "number") return null;
  return Math.round(v).toLocaleString("en-US");
}

/** @return speedup ratio as "2.50x" */
export function speedup(v: unknown): string | null {
  if (typeof v !== "number") return null;
  if (v === Number.POSITIVE_INFINITY) return "∞";
  return `${v.toFixed(2)}x`;
}

/** @return coefficient of variation as ±percentage */
export function formatCV(v: unknown): string | null {
  if (typeof v !== "number") return null;
  return `±${(v * 100).toFixed(1)}%`;
}

/** @return scaling exponent as "n^1.98" */
export function exponent(v: unknown): string | null {
  if (typeof v !== "number") return null;
  return `n^${v.toFixed(2)}`;
}

/** @return signed percentage, as "+5.0%" */
export function signedPercent(v: number): string {
  const sign = v > 0 ? "+" : "";
  return `${sign}${v.toFixed(1)}%`;
}

/** @return percentage difference with its CI, colored when significant */
export function formatDiffWithCI(v: unknown): string | null {
  if (!isDifferenceCI(v)) return null;
  const { percent, ci, direction } = v;
  const text = `${signedPercent(percent)} [${signedPercent(ci[0])}, ${signedPercent(ci[1])}]`;
  if (direction === "faster") return green(text);
  if (direction === "slower") return red(text);
  return text;
}

/** @return string shortened to maxLength, with an ellipsis */
export function truncate(str: string, maxLength = 30): string {
  return str.length > maxLength ? str.slice(0, maxLength - 3) + "..." : str;
}

function isDifferenceCI(v: unknown): v is DifferenceCI {
  return (
    typeof v === "object" &&
    v !== null &&
    "percent" in v &&
    "ci" in v &&
    "direction" in v
  );
}
