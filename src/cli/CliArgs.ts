import type { Argv, InferredOptionTypes } from "yargs";
import yargs from "yargs";

/** CLI args type inferred from cliOptions */
export type DefaultCliArgs = InferredOptionTypes<typeof cliOptions>;

// biome-ignore format: compact option definitions
const cliOptions = {
  samples:    { type: "number",  requiresArg: true, describe: "timed samples per case and size (default: 100)" },
  warmup:     { type: "number",  requiresArg: true, describe: "untimed warmup runs per case and size (default: 10% of samples, min 3)" },
  resamples:  { type: "number",  requiresArg: true, describe: "bootstrap resamples for confidence intervals (default: 1000)" },
  confidence: { type: "number",  requiresArg: true, describe: "confidence level for intervals, 0-1 (default: 0.95)" },
  sizes:      { type: "string",  requiresArg: true, describe: "comma separated input sizes, replacing the suite's sizes" },
  filter:     { type: "string",  requiresArg: true, describe: "filter cases by regex or name prefix" },
  worker:     { type: "boolean", default: false, describe: "measure each case and size in a fresh child process" },
  json:       { type: "string",  requiresArg: true, describe: "export comparison data to JSON file" },
  seed:       { type: "number",  requiresArg: true, describe: "seed for bootstrap resampling, for repeatable intervals" },
} as const;

/** @return yargs with standard comparison options */
export function defaultCliArgs(yargsInstance: Argv): Argv<DefaultCliArgs> {
  return yargsInstance.options(cliOptions).help().strict();
}

/** @return parsed command line arguments */
export function parseCliArgs(args: string[]): DefaultCliArgs {
  return defaultCliArgs(yargs(args)).parseSync();
}
