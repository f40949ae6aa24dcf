import { afterEach, beforeEach, expect, test, vi } from "vitest";
import {
  CallableFailure,
  ConfigurationError,
  InsufficientSamplesError,
} from "../Errors.ts";
import type { ComparisonResults } from "../IsolationDriver.ts";
import { runComparison } from "../IsolationDriver.ts";
import { Blackhole } from "../runners/Blackhole.ts";
import { FakeClock, fixedCostCase, numberSuite } from "./TestUtils.ts";

beforeEach(() => {
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

function centrals(results: ComparisonResults): [string, number, number][] {
  return results.cells.map(c => [c.caseName, c.size, c.estimate.central]);
}

test("three-way comparison measures each case's own cost", () => {
  const clock = new FakeClock();
  const suite = numberSuite([
    fixedCostCase("slow", clock, 30),
    fixedCostCase("fast", clock, 10),
    fixedCostCase("mid", clock, 20),
  ]);
  const results = runComparison(suite, { clock: clock.now });

  expect(centrals(results)).toEqual([
    ["slow", 10, 30],
    ["fast", 10, 10],
    ["mid", 10, 20],
  ]);
  expect(results.caseOrder).toEqual(["slow", "fast", "mid"]);
  expect(results.failures).toEqual([]);
});

test("two-way comparison across sizes", () => {
  const clock = new FakeClock();
  const scaled = {
    name: "scaled",
    variant: (n: number) => clock.advance(n),
  };
  const suite = numberSuite([scaled, fixedCostCase("flat", clock, 1)], {
    sizes: [10, 100],
  });
  const results = runComparison(suite, { clock: clock.now });

  expect(centrals(results)).toEqual([
    ["scaled", 10, 10],
    ["flat", 10, 1],
    ["scaled", 100, 100],
    ["flat", 100, 1],
  ]);
});

test("prepare and setup time stay out of the samples", () => {
  const clock = new FakeClock();
  const suite = numberSuite(
    [
      {
        name: "stateful",
        variant: {
          setup: (n: number) => {
            clock.advance(500);
            return n;
          },
          run: () => clock.advance(5),
        },
      },
      fixedCostCase("plain", clock, 5),
    ],
    {
      prepare: size => {
        clock.advance(1000);
        return size;
      },
    },
  );
  const results = runComparison(suite, { clock: clock.now });

  expect(centrals(results)).toEqual([
    ["stateful", 10, 5],
    ["plain", 10, 5],
  ]);
  for (const cell of results.cells) {
    expect(cell.samples.every(s => s === 5)).toBe(true);
  }
});

test("an expensive prepare does not inflate a cheap case", () => {
  const suite = numberSuite([{ name: "noop", variant: (n: number) => n }], {
    prepare: size => {
      const values = Array.from({ length: 200_000 }, (_, i) => i * size);
      return values.reduce((a, b) => a + b, 0);
    },
  });
  const [cell] = runComparison(suite).cells;
  expect(cell.estimate.central).toBeLessThan(1);
});

test("parse cost in setup is excluded: costly and cheap parses measure alike", () => {
  const text = Array.from({ length: 100_000 }, (_, i) => i).join(",");
  const firstValue = (values: readonly number[]) => values[0];
  const suite = numberSuite(
    [
      {
        name: "costly-parse",
        variant: { setup: () => text.split(",").map(Number), run: firstValue },
      },
      {
        name: "cheap-parse",
        variant: { setup: () => [0], run: firstValue },
      },
    ],
    { sizes: [1] },
  );
  const [costly, cheap] = runComparison(suite, { samples: 50 }).cells;

  expect(costly.caseName).toBe("costly-parse");
  expect(cheap.caseName).toBe("cheap-parse");
  const gap = Math.abs(costly.estimate.central - cheap.estimate.central);
  expect(gap).toBeLessThan(0.05);
});

test("prepare runs once per size and setup once per cell", () => {
  let prepares = 0;
  let setups = 0;
  const stateful = (name: string) => ({
    name,
    variant: {
      setup: (n: number) => {
        setups++;
        return n;
      },
      run: (n: number) => n + 1,
    },
  });
  const suite = numberSuite([stateful("a"), stateful("b")], {
    sizes: [1, 2, 3],
    prepare: size => {
      prepares++;
      return size;
    },
  });
  runComparison(suite);

  expect(prepares).toBe(3);
  expect(setups).toBe(6);
});

test("a failing case is skipped for later sizes, others continue", () => {
  const clock = new FakeClock();
  const flaky = {
    name: "flaky",
    variant: (n: number) => {
      if (n === 2) throw new Error("cannot handle 2");
      clock.advance(1);
    },
  };
  const suite = numberSuite([flaky, fixedCostCase("steady", clock, 2)], {
    sizes: [1, 2, 3],
  });
  const results = runComparison(suite, { clock: clock.now });

  expect(centrals(results)).toEqual([
    ["flaky", 1, 1],
    ["steady", 1, 2],
    ["steady", 2, 2],
    ["steady", 3, 2],
  ]);
  expect(results.failures).toHaveLength(1);
  const [failure] = results.failures;
  expect(failure.caseName).toBe("flaky");
  expect(failure.size).toBe(2);
  expect(failure.error).toBeInstanceOf(CallableFailure);
  expect(failure.error.message).toBe('Case "flaky" failed: cannot handle 2');
});

test("a failing setup is a failure of its case", () => {
  const broken = {
    name: "broken",
    variant: {
      setup: (): number => {
        throw new Error("bad parse");
      },
      run: (n: number) => n,
    },
  };
  const suite = numberSuite([broken, { name: "ok", variant: () => 1 }], {
    sizes: [1, 2],
  });
  const results = runComparison(suite);

  expect(results.cells.map(c => c.caseName)).toEqual(["ok", "ok"]);
  expect(results.failures.map(f => [f.caseName, f.size])).toEqual([
    ["broken", 1],
  ]);
});

test("a failing prepare fails that size only", () => {
  const suite = numberSuite(
    [
      { name: "a", variant: (n: number) => n },
      { name: "b", variant: (n: number) => n },
    ],
    {
      sizes: [1, 2, 3],
      prepare: size => {
        if (size === 2) throw new Error("no input");
        return size;
      },
    },
  );
  const results = runComparison(suite);

  expect(results.cells.map(c => [c.caseName, c.size])).toEqual([
    ["a", 1],
    ["b", 1],
    ["a", 3],
    ["b", 3],
  ]);
  expect(results.failures.map(f => [f.caseName, f.size])).toEqual([
    ["a", 2],
    ["b", 2],
  ]);
  expect(results.failures[0].error.message).toBe(
    'Case "prepare(2)" failed: no input',
  );
});

test("too few samples loses the cell but not the case", () => {
  const suite = numberSuite([{ name: "few", variant: (n: number) => n }], {
    sizes: [1, 2],
  });
  const results = runComparison(suite, { samples: 2, warmup: 0 });

  expect(results.cells).toEqual([]);
  expect(results.failures.map(f => f.size)).toEqual([1, 2]);
  for (const { error } of results.failures) {
    expect(error).toBeInstanceOf(InsufficientSamplesError);
  }
});

test.each([
  ["no cases", numberSuite([])],
  [
    "duplicate names",
    numberSuite([
      { name: "x", variant: () => 0 },
      { name: "x", variant: () => 1 },
    ]),
  ],
  ["no sizes", numberSuite([{ name: "x", variant: () => 0 }], { sizes: [] })],
  [
    "duplicate sizes",
    numberSuite([{ name: "x", variant: () => 0 }], { sizes: [10, 20, 10] }),
  ],
  [
    "negative size",
    numberSuite([{ name: "x", variant: () => 0 }], { sizes: [10, -1] }),
  ],
  [
    "unknown baseline",
    numberSuite([{ name: "x", variant: () => 0 }], { baseline: "y" }),
  ],
])("configuration error before measuring: %s", (_label, suite) => {
  expect(() => runComparison(suite)).toThrow(ConfigurationError);
});

test("zero samples is a configuration error and nothing runs", () => {
  let calls = 0;
  const suite = numberSuite([{ name: "x", variant: () => calls++ }], {
    prepare: size => {
      calls++;
      return size;
    },
  });
  expect(() => runComparison(suite, { samples: 0 })).toThrow(
    ConfigurationError,
  );
  expect(calls).toBe(0);
});

test("options override suite defaults", () => {
  const sink = new Blackhole();
  const suite = numberSuite([{ name: "x", variant: (n: number) => n }]);
  runComparison(suite, { sink });
  expect(sink.observed).toBe(23);

  const sink2 = new Blackhole();
  runComparison(suite, { sink: sink2, samples: 7, warmup: 1 });
  expect(sink2.observed).toBe(8);
});

test("filter, size override and case sizes select cells", () => {
  const suite = numberSuite(
    [
      { name: "fast-a", variant: (n: number) => n },
      { name: "fast-b", variant: (n: number) => n, sizes: [5] },
      { name: "slow", variant: (n: number) => n },
    ],
    { baseline: "slow" },
  );
  const results = runComparison(suite, { filter: "fast", sizes: [5, 50] });

  expect(results.cells.map(c => [c.caseName, c.size])).toEqual([
    ["fast-a", 5],
    ["fast-b", 5],
    ["fast-a", 50],
  ]);
  expect(results.baseline).toBeUndefined();
  expect(() => runComparison(suite, { filter: "none" })).toThrow(
    'No cases match filter: "none"',
  );
});
