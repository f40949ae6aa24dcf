const outlierMultiplier = 1.5; // Tukey's fence multiplier
const bootstrapSamples = 1000;
const confidence = 0.95;

/** Source of uniform random numbers in [0, 1) */
export type RandomSource = () => number;

/** Options for bootstrap resampling methods */
export type BootstrapOptions = {
  resamples?: number;
  confidence?: number;
  random?: RandomSource;
};

/** Bootstrap estimate with confidence interval and raw resample data */
export interface BootstrapResult {
  estimate: number;
  ci: [number, number];
  samples: number[];
}

/** Tukey fence bounds */
export interface OutlierFence {
  lower: number;
  upper: number;
}

/** @return relative standard deviation (coefficient of variation) */
export function coefficientOfVariation(samples: readonly number[]): number {
  const mean = average(samples);
  if (mean === 0) return 0;
  const stdDev = standardDeviation(samples);
  return stdDev / mean;
}

/** @return interquartile fence, samples outside it are outliers */
export function outlierFence(
  samples: readonly number[],
  multiplier = outlierMultiplier,
): OutlierFence {
  const q1 = percentile(samples, 0.25);
  const q3 = percentile(samples, 0.75);
  const iqr = q3 - q1;
  return { lower: q1 - multiplier * iqr, upper: q3 + multiplier * iqr };
}

/** @return outliers detected via Tukey's interquartile range method */
export function findOutliers(
  samples: readonly number[],
  multiplier = outlierMultiplier,
): {
  rate: number;
  indices: number[];
} {
  const { lower, upper } = outlierFence(samples, multiplier);
  const indices = samples
    .map((v, i) => (v < lower || v > upper ? i : -1))
    .filter(i => i >= 0);
  return { rate: indices.length / samples.length, indices };
}

/** @return bootstrap confidence interval for the mean */
export function bootstrapMean(
  samples: readonly number[],
  options: BootstrapOptions = {},
): BootstrapResult {
  return bootstrapStatistic(samples, average, options);
}

/** @return bootstrap confidence interval for median */
export function bootstrapMedian(
  samples: readonly number[],
  options: BootstrapOptions = {},
): BootstrapResult {
  const median = (values: readonly number[]) => percentile(values, 0.5);
  return bootstrapStatistic(samples, median, options);
}

/** @return statistic of samples with a percentile bootstrap interval */
function bootstrapStatistic(
  samples: readonly number[],
  statistic: (values: readonly number[]) => number,
  options: BootstrapOptions,
): BootstrapResult {
  const {
    resamples = bootstrapSamples,
    confidence: conf = confidence,
    random = Math.random,
  } = options;
  const estimates = Array.from({ length: resamples }, () =>
    statistic(createResample(samples, random)),
  );
  return {
    estimate: statistic(samples),
    ci: computeInterval(estimates, conf),
    samples: estimates,
  };
}

/** @return mean of values (running form, exact when all values are equal) */
export function average(values: readonly number[]): number {
  let mean = 0;
  for (let i = 0; i < values.length; i++) {
    mean += (values[i] - mean) / (i + 1);
  }
  return mean;
}

/** @return standard deviation with Bessel's correction */
export function standardDeviation(samples: readonly number[]): number {
  if (samples.length <= 1) return 0;
  const mean = average(samples);
  const variance =
    samples.reduce((sum, x) => sum + (x - mean) ** 2, 0) / (samples.length - 1);
  return Math.sqrt(variance);
}

/** @return value at percentile p (0-1), nearest rank */
export function percentile(values: readonly number[], p: number): number {
  const sorted = [...values].sort((a, b) => a - b);
  const index = Math.ceil(sorted.length * p) - 1;
  return sorted[Math.max(0, index)];
}

/** @return bootstrap resample with replacement */
export function createResample(
  samples: readonly number[],
  random: RandomSource = Math.random,
): number[] {
  const n = samples.length;
  const pick = () => samples[Math.floor(random() * n)];
  return Array.from({ length: n }, pick);
}

/** @return confidence interval [lower, upper] */
function computeInterval(
  estimates: number[],
  confidence: number,
): [number, number] {
  const alpha = (1 - confidence) / 2;
  const lower = percentile(estimates, alpha);
  const upper = percentile(estimates, 1 - alpha);
  return [lower, upper];
}

export type CIDirection = "faster" | "slower" | "uncertain";

/** Bootstrap confidence interval for percentage difference between two samples */
export interface DifferenceCI {
  percent: number;
  ci: [number, number];
  direction: CIDirection;
}

/** @return bootstrap CI for percentage difference between baseline and current medians */
export function bootstrapDifferenceCI(
  baseline: readonly number[],
  current: readonly number[],
  options: BootstrapOptions = {},
): DifferenceCI {
  const {
    resamples = bootstrapSamples,
    confidence: conf = confidence,
    random = Math.random,
  } = options;

  const baselineMedian = percentile(baseline, 0.5);
  const currentMedian = percentile(current, 0.5);
  const observedPercent = percentChange(baselineMedian, currentMedian);

  const diffs: number[] = [];
  for (let i = 0; i < resamples; i++) {
    const medB = percentile(createResample(baseline, random), 0.5);
    const medC = percentile(createResample(current, random), 0.5);
    diffs.push(percentChange(medB, medC));
  }

  const ci = computeInterval(diffs, conf);
  const excludesZero = ci[0] > 0 || ci[1] < 0;
  let direction: CIDirection = "uncertain";
  if (excludesZero) direction = observedPercent < 0 ? "faster" : "slower";
  return { percent: observedPercent, ci, direction };
}

/** @return percent change from base to value, 0 when both are 0 */
function percentChange(base: number, value: number): number {
  if (base === value) return 0;
  return ((value - base) / base) * 100;
}
