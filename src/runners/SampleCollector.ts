import type { SampleSet } from "../Benchmark.ts";
import { CallableFailure, ConfigurationError } from "../Errors.ts";
import { Blackhole } from "./Blackhole.ts";

export const defaultSampleCount = 100;
const minWarmup = 3;

/** Options for sample collection */
export interface CollectOptions {
  /** label for the SampleSet and for failures */
  name?: string;
  /** measured iterations (default: 100) */
  samples?: number;
  /** discarded iterations before measurement (default: 10% of samples, at least 3) */
  warmup?: number;
  /** time source in milliseconds (default: performance.now) */
  clock?: () => number;
}

/** @return warmup count used when none is configured */
export function defaultWarmup(samples: number): number {
  return Math.max(minWarmup, Math.ceil(samples * 0.1));
}

/**
 * Run fn repeatedly and record the elapsed time of each call.
 *
 * Every result, warmup included, goes through the sink inside the timed region.
 * @throws ConfigurationError for a non-positive sample count
 * @throws CallableFailure if fn throws
 */
export function collectSamples(
  fn: () => unknown,
  options: CollectOptions = {},
  sink: Blackhole = new Blackhole(),
): SampleSet {
  const { name = "anonymous", clock = defaultClock } = options;
  const samples = options.samples ?? defaultSampleCount;
  const warmup = options.warmup ?? defaultWarmup(samples);
  validateSampleCounts(samples, warmup);

  try {
    const warmupSamples = runTimed(fn, warmup, clock, sink);
    gcFunction()();
    const measured = runTimed(fn, samples, clock, sink);
    return { name, samples: measured, warmupSamples };
  } catch (error) {
    throw new CallableFailure(name, error);
  }
}

/** @throws ConfigurationError unless samples > 0 and warmup >= 0 */
export function validateSampleCounts(samples: number, warmup: number): void {
  if (!Number.isInteger(samples) || samples <= 0) {
    throw new ConfigurationError(
      `Sample count must be a positive integer, got ${samples}`,
    );
  }
  if (!Number.isInteger(warmup) || warmup < 0) {
    throw new ConfigurationError(
      `Warmup count must be a non-negative integer, got ${warmup}`,
    );
  }
}

/** Time n calls into a pre-allocated array */
function runTimed(
  fn: () => unknown,
  n: number,
  clock: () => number,
  sink: Blackhole,
): number[] {
  const times = new Array<number>(n).fill(0);
  for (let i = 0; i < n; i++) {
    const start = clock();
    sink.consume(fn());
    times[i] = clock() - start;
  }
  return times;
}

function defaultClock(): number {
  return performance.now();
}

/** @return runtime gc() function, or no-op if unavailable */
function gcFunction(): () => void {
  return globalThis.gc ?? (() => {});
}
