/** Stateless variant - called each iteration with the prepared input */
export type VariantFn<I = unknown> = (input: I) => unknown;

/** Stateful variant - setup once outside timing, run many */
export interface StatefulVariant<I = unknown, S = unknown> {
  setup: (input: I) => S;
  run: (state: S) => unknown;
}

/** A variant is either a plain function or a stateful setup+run pair */
export type Variant<I = unknown, S = unknown> =
  | VariantFn<I>
  | StatefulVariant<I, S>;

/** Variant with any state type - lets a suite mix differently-stateful cases */
export type AnyVariant<I = unknown> = VariantFn<I> | StatefulVariant<I, any>;

/** One named implementation under test */
export interface BenchmarkCase<I = unknown> {
  readonly name: string;
  readonly variant: AnyVariant<I>;
  /** sizes this case applies to (default: every suite size) */
  readonly sizes?: readonly number[];
}

/** Defaults a suite carries for its own runs; run options override them */
export interface SuiteDefaults {
  samples?: number;
  warmup?: number;
  resamples?: number;
}

/** Cases sharing semantics, measured across a list of input sizes */
export interface ComparisonSuite<I = unknown> {
  name: string;
  sizes: readonly number[];
  /** build the shared input for one size, called once per size */
  prepare: (size: number) => I;
  cases: readonly BenchmarkCase<I>[];
  /** case name that other cases are compared against */
  baseline?: string;
  defaults?: SuiteDefaults;
}

/** Raw timing observations for one case at one size, in milliseconds */
export interface SampleSet {
  readonly name: string;
  readonly samples: readonly number[];
  readonly warmupSamples: readonly number[];
}

/** Robust summary of a SampleSet, in milliseconds */
export interface Estimate {
  /** mean of the samples retained after outlier rejection */
  central: number;
  lower: number;
  upper: number;
  /** samples retained after outlier rejection */
  count: number;
  rejected: number;
  median: number;
  min: number;
  max: number;
  /** coefficient of variation of the retained samples */
  cv: number;
}

/** @return true if variant is a StatefulVariant (has setup + run) */
export function isStatefulVariant<I, S>(
  v: Variant<I, S>,
): v is StatefulVariant<I, S> {
  return typeof v === "object" && "setup" in v && "run" in v;
}

/** @return true if value has the shape of a ComparisonSuite */
export function isComparisonSuite(value: unknown): value is ComparisonSuite {
  if (typeof value !== "object" || value === null) return false;
  return (
    "name" in value &&
    typeof value.name === "string" &&
    "sizes" in value &&
    Array.isArray(value.sizes) &&
    "cases" in value &&
    Array.isArray(value.cases) &&
    "prepare" in value &&
    typeof value.prepare === "function"
  );
}
