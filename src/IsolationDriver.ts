import pico from "picocolors";
import type {
  BenchmarkCase,
  ComparisonSuite,
  Estimate,
  SampleSet,
} from "./Benchmark.ts";
import { isStatefulVariant } from "./Benchmark.ts";
import { filterCases } from "./cli/FilterCases.ts";
import {
  CallableFailure,
  ConfigurationError,
  type HarnessError,
  InsufficientSamplesError,
} from "./Errors.ts";
import { Blackhole } from "./runners/Blackhole.ts";
import {
  collectSamples,
  defaultSampleCount,
  defaultWarmup,
  validateSampleCounts,
} from "./runners/SampleCollector.ts";
import { getElapsed, getPerfNow, timingLogger } from "./runners/TimingUtils.ts";
import type { RandomSource } from "./StatisticalUtils.ts";
import { summarize, validateSummarizeOptions } from "./Summarizer.ts";

const logTiming = timingLogger("IsolationDriver");

/** Options for runComparison, overriding suite defaults */
export interface RunComparisonOptions {
  samples?: number;
  warmup?: number;
  resamples?: number;
  confidence?: number;
  /** sizes to run instead of the suite's sizes */
  sizes?: readonly number[];
  /** run only cases matching this name filter */
  filter?: string;
  /** time source in milliseconds (default: performance.now) */
  clock?: () => number;
  /** random source for bootstrap resampling */
  random?: RandomSource;
  /** sink observing every measured result */
  sink?: Blackhole;
}

/** Resolved sample and summary settings for one run */
export interface RunSettings {
  samples: number;
  warmup: number;
  resamples: number;
  confidence: number;
}

/** Measured estimate for one (case, size) pair */
export interface CellResult {
  caseName: string;
  size: number;
  estimate: Estimate;
  samples: readonly number[];
}

/** A (case, size) pair that produced no estimate */
export interface CellFailure {
  caseName: string;
  size: number;
  error: HarnessError;
}

/** Results from running a comparison suite */
export interface ComparisonResults {
  name: string;
  /** case names in suite order, used to break ranking ties */
  caseOrder: string[];
  baseline?: string;
  cells: CellResult[];
  failures: CellFailure[];
}

/**
 * Measure every case at every size, timing only the algorithmic body.
 *
 * Inputs are prepared once per size and stateful setup runs once per cell,
 * both outside the timed region.
 * @throws ConfigurationError before any measurement for an invalid run
 */
export function runComparison<I>(
  suite: ComparisonSuite<I>,
  options: RunComparisonOptions = {},
): ComparisonResults {
  const { filtered, sizes, settings } = planComparison(suite, options);
  const sink = options.sink ?? new Blackhole();
  const matrix = new MatrixRecorder(filtered);

  for (const size of sizes) {
    const cases = matrix.pendingCases(size);
    if (cases.length === 0) continue;

    const start = getPerfNow();
    let input: I;
    try {
      input = filtered.prepare(size);
    } catch (error) {
      const failure = new CallableFailure(`prepare(${size})`, error);
      for (const c of cases) matrix.recordFailure(c.name, size, failure, false);
      continue;
    }
    logTiming(`prepared size ${size} in ${getElapsed(start).toFixed(1)}ms`);

    for (const benchCase of cases) {
      try {
        const fn = bindVariant(benchCase, input);
        const { samples, warmup } = settings;
        const { name } = benchCase;
        const collectOpts = { name, samples, warmup, clock: options.clock };
        const sampleSet = collectSamples(fn, collectOpts, sink);
        matrix.recordSamples(size, sampleSet, settings, options.random);
      } catch (error) {
        matrix.recordError(benchCase.name, size, error);
      }
    }
  }
  return matrix.results();
}

/** Validated inputs for a comparison run */
export interface ComparisonPlan<I> {
  filtered: ComparisonSuite<I>;
  sizes: readonly number[];
  settings: RunSettings;
}

/**
 * Apply the filter, resolve settings and validate the run.
 * @throws ConfigurationError for an invalid run
 */
export function planComparison<I>(
  suite: ComparisonSuite<I>,
  options: RunComparisonOptions = {},
): ComparisonPlan<I> {
  validateCases(suite);
  const filtered = filterCases(suite, options.filter);
  const sizes = options.sizes ?? suite.sizes;
  validateSizes(sizes);
  const settings = resolveSettings(suite, options);
  return { filtered, sizes, settings };
}

/** @return run settings from options, then suite defaults, then built-in defaults */
export function resolveSettings<I>(
  suite: ComparisonSuite<I>,
  options: RunComparisonOptions,
): RunSettings {
  const defaults = suite.defaults ?? {};
  const samples = options.samples ?? defaults.samples ?? defaultSampleCount;
  const warmup = options.warmup ?? defaults.warmup ?? defaultWarmup(samples);
  const resamples = options.resamples ?? defaults.resamples ?? 1000;
  const confidence = options.confidence ?? 0.95;
  validateSampleCounts(samples, warmup);
  validateSummarizeOptions(resamples, confidence);
  return { samples, warmup, resamples, confidence };
}

/** @return zero-argument closure running only the case's algorithmic body */
export function bindVariant<I>(
  benchCase: BenchmarkCase<I>,
  input: I,
): () => unknown {
  const { variant, name } = benchCase;
  if (!isStatefulVariant(variant)) return () => variant(input);

  let state: unknown;
  try {
    state = variant.setup(input);
  } catch (error) {
    throw new CallableFailure(name, error);
  }
  return () => variant.run(state);
}

/** @return true if the case runs at this size */
export function appliesToSize<I>(
  benchCase: BenchmarkCase<I>,
  size: number,
): boolean {
  return !benchCase.sizes || benchCase.sizes.includes(size);
}

/**
 * Accumulates cells and failures for one run.
 *
 * A CallableFailure from the case stops it for the remaining sizes; an
 * InsufficientSamplesError or a failed prepare only loses that cell.
 */
export class MatrixRecorder<I> {
  private readonly cells: CellResult[] = [];
  private readonly failures: CellFailure[] = [];
  private readonly stopped = new Set<string>();

  constructor(private readonly suite: ComparisonSuite<I>) {}

  /** @return cases still running that apply to size */
  pendingCases(size: number): BenchmarkCase<I>[] {
    return this.suite.cases.filter(
      c => !this.stopped.has(c.name) && appliesToSize(c, size),
    );
  }

  /** Summarize a SampleSet and record the cell, or its failure */
  recordSamples(
    size: number,
    sampleSet: SampleSet,
    settings: RunSettings,
    random?: RandomSource,
  ): void {
    const { name, samples } = sampleSet;
    try {
      const { resamples, confidence } = settings;
      const estimate = summarize(sampleSet, { resamples, confidence, random });
      this.cells.push({ caseName: name, size, estimate, samples });
    } catch (error) {
      this.recordError(name, size, error);
    }
  }

  /** Record a failed cell, rethrowing configuration errors */
  recordError(caseName: string, size: number, error: unknown): void {
    if (
      error instanceof CallableFailure ||
      error instanceof InsufficientSamplesError
    ) {
      this.recordFailure(caseName, size, error);
      return;
    }
    if (error instanceof ConfigurationError) throw error;
    this.recordFailure(caseName, size, new CallableFailure(caseName, error));
  }

  /** Record a failed cell, by default stopping the case on a CallableFailure */
  recordFailure(
    caseName: string,
    size: number,
    error: HarnessError,
    stopCase = error instanceof CallableFailure,
  ): void {
    if (stopCase) this.stopped.add(caseName);
    this.failures.push({ caseName, size, error });
    console.warn(pico.yellow(`${caseName} [${size}]: ${error.message}`));
  }

  results(): ComparisonResults {
    const { name, cases, baseline } = this.suite;
    return {
      name,
      caseOrder: cases.map(c => c.name),
      baseline,
      cells: this.cells,
      failures: this.failures,
    };
  }
}

/** @throws ConfigurationError for an empty case list or duplicate names */
function validateCases<I>(suite: ComparisonSuite<I>): void {
  if (suite.cases.length === 0) {
    throw new ConfigurationError(`Suite "${suite.name}" has no cases`);
  }
  const names = new Set<string>();
  for (const { name } of suite.cases) {
    if (names.has(name)) {
      throw new ConfigurationError(`Duplicate case name "${name}"`);
    }
    names.add(name);
  }
  if (suite.baseline !== undefined && !names.has(suite.baseline)) {
    const msg = `Baseline "${suite.baseline}" is not a case of "${suite.name}"`;
    throw new ConfigurationError(msg);
  }
}

/** @throws ConfigurationError for an empty size list, invalid or repeated sizes */
function validateSizes(sizes: readonly number[]): void {
  if (sizes.length === 0) {
    throw new ConfigurationError("At least one input size is required");
  }
  const bad = sizes.find(s => !Number.isSafeInteger(s) || s < 0);
  if (bad !== undefined) {
    const msg = `Input sizes must be non-negative integers, got ${bad}`;
    throw new ConfigurationError(msg);
  }
  const repeated = sizes.find((s, i) => sizes.indexOf(s) !== i);
  if (repeated !== undefined) {
    throw new ConfigurationError(`Duplicate input size: ${repeated}`);
  }
}
