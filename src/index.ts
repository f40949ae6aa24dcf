export type {
  AnyVariant,
  BenchmarkCase,
  ComparisonSuite,
  Estimate,
  SampleSet,
  StatefulVariant,
  SuiteDefaults,
  Variant,
  VariantFn,
} from "./Benchmark.ts";
export { isComparisonSuite, isStatefulVariant } from "./Benchmark.ts";
export type { DefaultCliArgs } from "./cli/CliArgs.ts";
export { defaultCliArgs, parseCliArgs } from "./cli/CliArgs.ts";
export { createFilterRegex, filterCases } from "./cli/FilterCases.ts";
export {
  cliToRunOptions,
  isMainModule,
  parseBenchArgs,
  parseSizes,
  runComparisonCli,
} from "./cli/RunComparisonCLI.ts";
export type {
  ComparisonReport,
  ComparisonRow,
  ReportOptions,
  ScalingFit,
  SizeGroup,
} from "./ComparisonReport.ts";
export {
  buildComparisonReport,
  logLogSlope,
  speedupRatio,
} from "./ComparisonReport.ts";
export {
  comparisonTable,
  formatComparisonReport,
  scalingTable,
} from "./ComparisonTable.ts";
export type {
  DataProfile,
  ProfileDrift,
  SyntheticDataset,
} from "./data/DataProfile.ts";
export {
  compareProfiles,
  defaultProfileTolerance,
  measureDataset,
  profileDataset,
  validateProfile,
} from "./data/DataProfile.ts";
export { HashStream, hashShuffle, seededRandom } from "./data/HashStream.ts";
export { generateDataset } from "./data/SyntheticData.ts";
export type { HarnessErrorCode } from "./Errors.ts";
export {
  CallableFailure,
  ConfigurationError,
  HarnessError,
  InsufficientSamplesError,
  isHarnessError,
} from "./Errors.ts";
export { exportComparisonJson, reportToJson } from "./export/JsonExport.ts";
export * from "./export/JsonFormat.ts";
export type {
  CellFailure,
  CellResult,
  ComparisonResults,
  RunComparisonOptions,
  RunSettings,
} from "./IsolationDriver.ts";
export { planComparison, runComparison } from "./IsolationDriver.ts";
export { Blackhole } from "./runners/Blackhole.ts";
export type { CellRunner, IsolatedOptions } from "./runners/ProcessIsolation.ts";
export { runComparisonIsolated } from "./runners/ProcessIsolation.ts";
export type { CollectOptions } from "./runners/SampleCollector.ts";
export {
  collectSamples,
  defaultSampleCount,
  defaultWarmup,
} from "./runners/SampleCollector.ts";
export { loadSuiteModule } from "./runners/SuiteLoader.ts";
export type {
  BootstrapOptions,
  BootstrapResult,
  CIDirection,
  DifferenceCI,
  RandomSource,
} from "./StatisticalUtils.ts";
export {
  average,
  bootstrapDifferenceCI,
  bootstrapMean,
  bootstrapMedian,
  coefficientOfVariation,
  createResample,
  findOutliers,
  outlierFence,
  percentile,
  standardDeviation,
} from "./StatisticalUtils.ts";
export type { SummarizeOptions } from "./Summarizer.ts";
export { rejectOutliers, summarize } from "./Summarizer.ts";
export { integer, speedup, timeMs, truncate } from "./table-util/Formatters.ts";
