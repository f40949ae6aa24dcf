import { expect, test } from "vitest";
import { CallableFailure, ConfigurationError } from "../Errors.ts";
import { Blackhole } from "../runners/Blackhole.ts";
import {
  collectSamples,
  defaultWarmup,
} from "../runners/SampleCollector.ts";
import { FakeClock } from "./TestUtils.ts";

test("every result passes through the sink, warmup included", () => {
  const sink = new Blackhole();
  let calls = 0;
  const result = collectSamples(
    () => ++calls,
    { samples: 10, warmup: 4 },
    sink,
  );

  expect(sink.observed).toBe(14);
  expect(sink.lastValue).toBe(14);
  expect(result.samples).toHaveLength(10);
  expect(result.warmupSamples).toHaveLength(4);
});

test("samples hold the elapsed clock time of each call", () => {
  const clock = new FakeClock();
  const result = collectSamples(() => clock.advance(2), {
    name: "two",
    samples: 5,
    warmup: 1,
    clock: clock.now,
  });

  expect(result.name).toBe("two");
  expect(result.samples).toEqual([2, 2, 2, 2, 2]);
  expect(result.warmupSamples).toEqual([2]);
});

test("default warmup is a tenth of the samples, at least three", () => {
  expect(defaultWarmup(100)).toBe(10);
  expect(defaultWarmup(101)).toBe(11);
  expect(defaultWarmup(10)).toBe(3);

  const sink = new Blackhole();
  collectSamples(() => 0, { samples: 50 }, sink);
  expect(sink.observed).toBe(55);
});

test("invalid sample counts fail before any call", () => {
  let calls = 0;
  const fn = () => calls++;
  expect(() => collectSamples(fn, { samples: 0 })).toThrow(ConfigurationError);
  expect(() => collectSamples(fn, { samples: 1.5 })).toThrow(
    ConfigurationError,
  );
  expect(() => collectSamples(fn, { samples: 5, warmup: -1 })).toThrow(
    ConfigurationError,
  );
  expect(calls).toBe(0);
});

test("a throwing callable becomes a CallableFailure", () => {
  const boom = new Error("boom");
  let caught: unknown;
  try {
    collectSamples(
      () => {
        throw boom;
      },
      { name: "broken", samples: 3 },
    );
  } catch (error) {
    caught = error;
  }

  expect(caught).toBeInstanceOf(CallableFailure);
  if (!(caught instanceof CallableFailure)) return;
  expect(caught.message).toBe('Case "broken" failed: boom');
  expect(caught.caseName).toBe("broken");
  expect(caught.cause).toBe(boom);
  expect(caught.code).toBe("CallableFailure");
});
