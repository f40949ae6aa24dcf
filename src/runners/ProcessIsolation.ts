import { type ChildProcess, fork } from "node:child_process";
import { fileURLToPath } from "node:url";
import {
  CallableFailure,
  ConfigurationError,
  type HarnessError,
} from "../Errors.ts";
import {
  type ComparisonResults,
  MatrixRecorder,
  planComparison,
  type RunComparisonOptions,
} from "../IsolationDriver.ts";
import type { CellMessage, ErrorMessage, WorkerReply } from "./CellWorker.ts";
import { loadSuiteModule } from "./SuiteLoader.ts";
import { getElapsed, getPerfNow, timingLogger } from "./TimingUtils.ts";

const logTiming = timingLogger("ProcessIsolation");
const workerTimeout = 60_000;

/** Measure one cell, resolving with the worker's reply */
export type CellRunner = (message: CellMessage) => Promise<WorkerReply>;

/** Options for runComparisonIsolated */
export interface IsolatedOptions
  extends Omit<RunComparisonOptions, "clock" | "sink"> {
  /** export holding the suite in the module (default: "suite") */
  exportName?: string;
  /** measures one cell (default: a fresh worker process per cell) */
  cellRunner?: CellRunner;
}

/**
 * Measure every case at every size, each cell in its own process.
 *
 * Cells run one after another. Samples are summarized in this process.
 * @throws ConfigurationError for an invalid run, before any worker starts
 */
export async function runComparisonIsolated(
  moduleUrl: string,
  options: IsolatedOptions = {},
): Promise<ComparisonResults> {
  const { exportName, cellRunner = runInWorker } = options;
  const suite = await loadSuiteModule(moduleUrl, exportName);
  const { filtered, sizes, settings } = planComparison(suite, options);
  const matrix = new MatrixRecorder(filtered);

  for (const size of sizes) {
    for (const benchCase of matrix.pendingCases(size)) {
      const caseName = benchCase.name;
      const message: CellMessage = {
        type: "cell",
        moduleUrl,
        exportName,
        caseName,
        size,
        samples: settings.samples,
        warmup: settings.warmup,
      };
      let reply: WorkerReply;
      try {
        reply = await cellRunner(message);
      } catch (error) {
        matrix.recordError(caseName, size, error);
        continue;
      }

      if (reply.type === "samples") {
        const { samples, warmupSamples } = reply;
        const sampleSet = { name: caseName, samples, warmupSamples };
        matrix.recordSamples(size, sampleSet, settings, options.random);
        continue;
      }
      const error = replyError(reply, caseName, size);
      if (error instanceof ConfigurationError) throw error;
      const stopCase = reply.phase !== "prepare";
      matrix.recordFailure(caseName, size, error, stopCase);
    }
  }
  return matrix.results();
}

/** @return harness error matching a worker's error reply */
export function replyError(
  reply: ErrorMessage,
  caseName: string,
  size: number,
): HarnessError {
  if (reply.code === "Configuration" || reply.phase === "load") {
    return new ConfigurationError(reply.error);
  }
  const cause = new Error(reply.error);
  if (reply.stack) cause.stack = reply.stack;
  const name = reply.phase === "prepare" ? `prepare(${size})` : caseName;
  return new CallableFailure(name, cause);
}

/**
 * Run one cell in a fresh worker process.
 *
 * Rejects when the worker exits before replying, whatever its exit code.
 */
export function runInWorker(
  message: CellMessage,
  createWorker: () => ChildProcess = createWorkerProcess,
): Promise<WorkerReply> {
  const label = `${message.caseName} [${message.size}]`;
  const startTime = getPerfNow();
  logTiming(`Starting worker for ${label}`);

  return new Promise((resolve, reject) => {
    const worker = createWorker();
    const cleanup = createCleanup(worker, label, reject);
    let replied = false;
    worker.on("message", (reply: WorkerReply) => {
      replied = true;
      cleanup();
      logTiming(`Worker for ${label}: ${getElapsed(startTime).toFixed(1)}ms`);
      resolve(reply);
    });
    worker.on("error", (error: Error) => {
      cleanup();
      reject(new Error(`Worker process failed for ${label}: ${error.message}`));
    });
    worker.on("exit", (code: number | null, signal: NodeJS.Signals | null) => {
      if (replied) return;
      cleanup();
      const how = signal ? `signal ${signal}` : `code ${code}`;
      const msg = `Worker exited with ${how} before replying for ${label}`;
      reject(new Error(msg));
    });
    worker.send(message);
  });
}

/** Create cleanup for timeout and termination */
function createCleanup(
  worker: ChildProcess,
  label: string,
  reject: (error: Error) => void,
): () => void {
  const timeoutId = setTimeout(() => {
    cleanup();
    const seconds = workerTimeout / 1000;
    reject(new Error(`Cell ${label} timed out after ${seconds} seconds`));
  }, workerTimeout);
  const cleanup = () => {
    clearTimeout(timeoutId);
    if (!worker.killed) worker.kill("SIGTERM");
  };
  return cleanup;
}

/** Fork a worker that loads TypeScript sources through tsx */
function createWorkerProcess(): ChildProcess {
  const workerUrl = new URL("./WorkerScript.ts", import.meta.url);
  const workerPath = fileURLToPath(workerUrl);
  const execArgv = ["--import", "tsx", "--expose-gc"];
  return fork(workerPath, [], {
    execArgv,
    env: {
      ...process.env,
      NODE_OPTIONS: "",
    },
  });
}
