import { pathToFileURL } from "node:url";
import pico from "picocolors";
import { hideBin } from "yargs/helpers";
import type { ComparisonSuite } from "../Benchmark.ts";
import {
  buildComparisonReport,
  type ComparisonReport,
} from "../ComparisonReport.ts";
import { formatComparisonReport } from "../ComparisonTable.ts";
import { seededRandom } from "../data/HashStream.ts";
import { ConfigurationError, isHarnessError } from "../Errors.ts";
import { exportComparisonJson } from "../export/JsonExport.ts";
import {
  type ComparisonResults,
  type RunComparisonOptions,
  runComparison,
} from "../IsolationDriver.ts";
import { runComparisonIsolated } from "../runners/ProcessIsolation.ts";
import { type DefaultCliArgs, parseCliArgs } from "./CliArgs.ts";

const isTest = process.env.NODE_ENV === "test" || process.env.VITEST === "true";
const { red } = isTest ? { red: (str: string) => str } : pico;

/** Parse comparison options from the command line */
export function parseBenchArgs(argv = hideBin(process.argv)): DefaultCliArgs {
  return parseCliArgs(argv);
}

/** Convert CLI args to run options */
export function cliToRunOptions(args: DefaultCliArgs): RunComparisonOptions {
  const { samples, warmup, resamples, confidence, filter, seed } = args;
  const random = seed === undefined ? undefined : seededRandom(seed);
  const sizes = parseSizes(args.sizes);
  return { samples, warmup, resamples, confidence, sizes, filter, random };
}

/** @return sizes from a comma separated list, or undefined if absent */
export function parseSizes(text: string | undefined): number[] | undefined {
  if (text === undefined) return undefined;
  return text.split(",").map(part => {
    const trimmed = part.trim();
    const size = Number(trimmed);
    if (trimmed === "" || !Number.isSafeInteger(size) || size < 0) {
      throw new ConfigurationError(`Invalid size in --sizes: "${part}"`);
    }
    return size;
  });
}

/**
 * Run a suite with CLI arguments, print the comparison and export it if asked.
 *
 * A harness error is printed and sets a failing exit code; nothing is reported.
 * @param moduleUrl url of the module exporting the suite, needed for --worker
 */
export async function runComparisonCli<I>(
  suite: ComparisonSuite<I>,
  moduleUrl?: string,
  argv?: string[],
): Promise<ComparisonReport | undefined> {
  try {
    const args = parseBenchArgs(argv);
    const options = cliToRunOptions(args);
    const results = await runWithArgs(suite, args, options, moduleUrl);
    const { resamples, confidence, random } = options;
    const bootstrap = { resamples, confidence, random };
    const report = buildComparisonReport(results, { bootstrap });

    console.log(formatComparisonReport(report));
    if (args.json) await exportComparisonJson(report, args.json, args);
    return report;
  } catch (error) {
    if (!isHarnessError(error)) throw error;
    console.error(red(error.message));
    process.exitCode = 1;
    return undefined;
  }
}

/** @return true when moduleUrl is the script node was started with */
export function isMainModule(moduleUrl: string): boolean {
  const script = process.argv[1];
  return script !== undefined && pathToFileURL(script).href === moduleUrl;
}

async function runWithArgs<I>(
  suite: ComparisonSuite<I>,
  args: DefaultCliArgs,
  options: RunComparisonOptions,
  moduleUrl: string | undefined,
): Promise<ComparisonResults> {
  if (!args.worker) return runComparison(suite, options);
  if (!moduleUrl) {
    throw new ConfigurationError("--worker requires the suite's module url");
  }
  return runComparisonIsolated(moduleUrl, options);
}
