import type { Estimate, SampleSet } from "./Benchmark.ts";
import { ConfigurationError, InsufficientSamplesError } from "./Errors.ts";
import {
  average,
  bootstrapMean,
  coefficientOfVariation,
  outlierFence,
  percentile,
  type RandomSource,
} from "./StatisticalUtils.ts";

const minRetained = 3;

/** Options for summarizing a SampleSet */
export interface SummarizeOptions {
  /** bootstrap resample count (default: 1000) */
  resamples?: number;
  /** interval confidence level, 0-1 (default: 0.95) */
  confidence?: number;
  /** IQR multiplier for the outlier fence (default: 1.5) */
  outlierMultiplier?: number;
  /** random source for resampling (default: Math.random) */
  random?: RandomSource;
}

/** Retained and rejected samples after applying the outlier fence */
export interface FencedSamples {
  retained: number[];
  rejected: number[];
}

/**
 * Summarize raw samples as a mean with a bootstrap confidence interval,
 * after discarding samples outside the Tukey fence.
 * @throws InsufficientSamplesError if fewer than 3 samples are retained
 */
export function summarize(
  input: SampleSet | readonly number[],
  options: SummarizeOptions = {},
): Estimate {
  const { resamples = 1000, confidence = 0.95, random } = options;
  validateSummarizeOptions(resamples, confidence);
  const label = isSampleSet(input) ? input.name : undefined;
  const samples = isSampleSet(input) ? input.samples : input;

  const { retained, rejected } = rejectOutliers(
    samples,
    options.outlierMultiplier,
  );
  if (retained.length < minRetained) {
    throw new InsufficientSamplesError(retained.length, samples.length, label);
  }

  const min = retained[0];
  const max = retained[retained.length - 1];
  const base = {
    count: retained.length,
    rejected: rejected.length,
    median: percentile(retained, 0.5),
    min,
    max,
  };
  if (min === max) {
    return { ...base, central: min, lower: min, upper: min, cv: 0 };
  }

  const central = average(retained);
  const boot = bootstrapMean(retained, { resamples, confidence, random });
  const lower = Math.min(boot.ci[0], central);
  const upper = Math.max(boot.ci[1], central);
  const cv = coefficientOfVariation(retained);
  return { ...base, central, lower, upper, cv };
}

/** @return sorted samples split by the interquartile outlier fence */
export function rejectOutliers(
  samples: readonly number[],
  multiplier?: number,
): FencedSamples {
  const sorted = [...samples].sort((a, b) => a - b);
  if (sorted.length === 0) return { retained: [], rejected: [] };
  const { lower, upper } = outlierFence(sorted, multiplier);
  const retained: number[] = [];
  const rejected: number[] = [];
  for (const s of sorted) {
    if (s < lower || s > upper) rejected.push(s);
    else retained.push(s);
  }
  return { retained, rejected };
}

/** @throws ConfigurationError for a bad resample count or confidence level */
export function validateSummarizeOptions(
  resamples: number,
  confidence: number,
): void {
  if (!Number.isInteger(resamples) || resamples <= 0) {
    const msg = `Resample count must be a positive integer, got ${resamples}`;
    throw new ConfigurationError(msg);
  }
  if (!(confidence > 0 && confidence < 1)) {
    const msg = `Confidence must be between 0 and 1, got ${confidence}`;
    throw new ConfigurationError(msg);
  }
}

function isSampleSet(input: SampleSet | readonly number[]): input is SampleSet {
  return !Array.isArray(input);
}
