import {
  CallableFailure,
  ConfigurationError,
  type HarnessErrorCode,
  isHarnessError,
} from "../Errors.ts";
import { bindVariant } from "../IsolationDriver.ts";
import { collectSamples } from "./SampleCollector.ts";
import { loadSuiteModule } from "./SuiteLoader.ts";
import { getElapsed, getPerfNow, timingLogger } from "./TimingUtils.ts";

const logTiming = timingLogger("Worker");

/** Message sent to a worker process to measure one (case, size) cell */
export interface CellMessage {
  type: "cell";
  moduleUrl: string;
  exportName?: string;
  caseName: string;
  size: number;
  samples: number;
  warmup: number;
}

/** Message returned from a worker with the cell's raw samples */
export interface SamplesMessage {
  type: "samples";
  caseName: string;
  samples: number[];
  warmupSamples: number[];
}

/** Where in the cell a worker failure happened */
export type FailurePhase = "load" | "prepare" | "case";

/** Message returned from a worker when the cell fails */
export interface ErrorMessage {
  type: "error";
  /** harness error code, absent for errors outside the taxonomy */
  code?: HarnessErrorCode;
  phase: FailurePhase;
  error: string;
  stack?: string;
}

export type WorkerReply = SamplesMessage | ErrorMessage;

/** Load the suite, prepare the input and collect samples for one cell */
export async function handleCellMessage(
  message: CellMessage,
): Promise<WorkerReply> {
  const { moduleUrl, exportName, caseName, size, samples, warmup } = message;
  let phase: FailurePhase = "load";
  try {
    const start = getPerfNow();
    const suite = await loadSuiteModule(moduleUrl, exportName);
    const benchCase = suite.cases.find(c => c.name === caseName);
    if (!benchCase) {
      const msg = `Case "${caseName}" not found in suite "${suite.name}"`;
      throw new ConfigurationError(msg);
    }
    logTiming(`loaded ${suite.name} in ${getElapsed(start).toFixed(1)}ms`);

    phase = "prepare";
    const input = suite.prepare(size);
    phase = "case";
    const fn = bindVariant(benchCase, input);
    const sampleSet = collectSamples(fn, { name: caseName, samples, warmup });
    return {
      type: "samples",
      caseName,
      samples: [...sampleSet.samples],
      warmupSamples: [...sampleSet.warmupSamples],
    };
  } catch (error) {
    return createErrorMessage(error, phase);
  }
}

/** Error reply carrying the root cause's message, so the parent can rewrap it */
export function createErrorMessage(
  error: unknown,
  phase: FailurePhase,
): ErrorMessage {
  const root =
    error instanceof CallableFailure && error.cause !== undefined
      ? error.cause
      : error;
  return {
    type: "error",
    code: isHarnessError(error) ? error.code : undefined,
    phase,
    error: root instanceof Error ? root.message : String(root),
    stack: root instanceof Error ? root.stack : undefined,
  };
}
