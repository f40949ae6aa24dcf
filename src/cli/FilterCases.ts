import type { ComparisonSuite } from "../Benchmark.ts";
import { ConfigurationError } from "../Errors.ts";

/** @return suite keeping only cases whose name matches the filter */
export function filterCases<I>(
  suite: ComparisonSuite<I>,
  filter?: string,
): ComparisonSuite<I> {
  if (!filter) return suite;
  const regex = createFilterRegex(filter);
  const cases = suite.cases.filter(c => regex.test(c.name));
  if (cases.length === 0) {
    throw new ConfigurationError(`No cases match filter: "${filter}"`);
  }
  const keepBaseline = cases.some(c => c.name === suite.baseline);
  const baseline = keepBaseline ? suite.baseline : undefined;
  return { ...suite, cases, baseline };
}

/** Create regex from filter (literal prefix unless regex-like) */
export function createFilterRegex(filter: string): RegExp {
  const looksLikeRegex =
    (filter.startsWith("/") && filter.endsWith("/")) ||
    filter.includes("*") ||
    filter.includes("?") ||
    filter.includes("[") ||
    filter.includes("|") ||
    filter.startsWith("^") ||
    filter.endsWith("$");

  if (looksLikeRegex) {
    const pattern =
      filter.startsWith("/") && filter.endsWith("/") && filter.length > 1
        ? filter.slice(1, -1)
        : filter;
    try {
      return new RegExp(pattern, "i");
    } catch {
      return new RegExp(escapeRegex(filter), "i");
    }
  }

  return new RegExp("^" + escapeRegex(filter), "i");
}

/** Escape regex special characters */
function escapeRegex(str: string): string {
  return str.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
