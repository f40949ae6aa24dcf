import { afterEach, beforeEach, expect, test, vi } from "vitest";
import { buildComparisonReport } from "../ComparisonReport.ts";
import {
  comparisonTable,
  formatComparisonReport,
  scalingTable,
} from "../ComparisonTable.ts";
import { seededRandom } from "../data/HashStream.ts";
import { runComparison } from "../IsolationDriver.ts";
import { rowWith, tableRows } from "./TableRows.ts";
import { FakeClock, fixedCostCase, numberSuite } from "./TestUtils.ts";

beforeEach(() => {
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

function threeWayReport(baseline?: string) {
  const clock = new FakeClock();
  const suite = numberSuite(
    [
      fixedCostCase("slow", clock, 30),
      fixedCostCase("fast", clock, 10),
      fixedCostCase("mid", clock, 20),
    ],
    { baseline },
  );
  const results = runComparison(suite, { clock: clock.now });
  const bootstrap = { resamples: 20, random: seededRandom(1) };
  return buildComparisonReport(results, { bootstrap });
}

test("table shows one row per case with formatted values", () => {
  const table = comparisonTable(threeWayReport());

  expect(rowWith(table, "fast")).toEqual([
    "10",
    "1",
    "fast",
    "10.00ms",
    "[10.00ms, 10.00ms]",
    "±0.0%",
    "1.00x",
    "20",
    "0",
  ]);
  expect(rowWith(table, "slow")?.slice(0, 7)).toEqual([
    "10",
    "3",
    "slow",
    "30.00ms",
    "[30.00ms, 30.00ms]",
    "±0.0%",
    "3.00x",
  ]);
});

test("data rows appear fastest first", () => {
  const rows = tableRows(comparisonTable(threeWayReport()));
  const names = rows.map(cells => cells[2]);
  expect(names.slice(-3)).toEqual(["fast", "mid", "slow"]);
});

test("baseline column shows difference against the baseline", () => {
  const table = comparisonTable(threeWayReport("slow"));
  const fast = rowWith(table, "fast");
  expect(fast?.at(-1)).toBe("-66.7% [-66.7%, -66.7%]");
  expect(rowWith(table, "slow")).toHaveLength(9);
});

test("scaling table lists fitted exponents", () => {
  const table = scalingTable([{ name: "linear", exponent: 1.0, points: 3 }]);
  expect(table && rowWith(table, "linear")).toEqual(["linear", "n^1.00", "3"]);
  expect(scalingTable([])).toBeUndefined();
});

test("console report names the fastest case per size and failures", () => {
  const clock = new FakeClock();
  const suite = numberSuite(
    [
      fixedCostCase("steady", clock, 4),
      {
        name: "broken",
        variant: () => {
          throw new Error("boom");
        },
      },
    ],
    { name: "formatting" },
  );
  const report = buildComparisonReport(
    runComparison(suite, { clock: clock.now }),
  );
  const text = formatComparisonReport(report);
  const lines = text.split("\n");

  expect(lines[0]).toBe("formatting");
  expect(lines).toContain("fastest:");
  expect(lines).toContain("  n=10: steady");
  expect(lines).toContain("failed:");
  expect(lines).toContain('  broken [10]: Case "broken" failed: boom');
});
