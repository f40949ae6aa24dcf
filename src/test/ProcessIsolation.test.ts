import { ChildProcess } from "node:child_process";
import { afterEach, beforeEach, expect, test, vi } from "vitest";
import { CallableFailure, ConfigurationError } from "../Errors.ts";
import {
  type CellMessage,
  handleCellMessage,
  type SamplesMessage,
} from "../runners/CellWorker.ts";
import {
  replyError,
  runComparisonIsolated,
  runInWorker,
} from "../runners/ProcessIsolation.ts";
import { loadSuiteModule } from "../runners/SuiteLoader.ts";

const moduleUrl = new URL("./fixtures/cellSuite.ts", import.meta.url).href;

beforeEach(() => {
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

function cell(overrides: Partial<CellMessage> = {}): CellMessage {
  return {
    type: "cell",
    moduleUrl,
    caseName: "ok",
    size: 1,
    samples: 5,
    warmup: 1,
    ...overrides,
  };
}

test("loads a suite exported by a module", async () => {
  const suite = await loadSuiteModule(moduleUrl);
  expect(suite.name).toBe("cells");
  await expect(loadSuiteModule(moduleUrl, "notASuite")).rejects.toThrow(
    ConfigurationError,
  );
});

test("worker handler returns the cell's raw samples", async () => {
  const reply = await handleCellMessage(cell());
  expect(reply.type).toBe("samples");
  if (reply.type !== "samples") return;
  expect(reply.caseName).toBe("ok");
  expect(reply.samples).toHaveLength(5);
  expect(reply.warmupSamples).toHaveLength(1);
});

test("worker handler reports a failing case with its root cause", async () => {
  const reply = await handleCellMessage(cell({ caseName: "throws" }));
  expect(reply).toMatchObject({
    type: "error",
    code: "CallableFailure",
    phase: "case",
    error: "bad case",
  });
});

test("worker handler reports a failing prepare", async () => {
  const reply = await handleCellMessage(cell({ size: 13 }));
  expect(reply).toMatchObject({
    type: "error",
    phase: "prepare",
    error: "no input for 13",
  });
  if (reply.type === "error") expect(reply.code).toBeUndefined();
});

test("worker handler reports an unknown case as configuration", async () => {
  const reply = await handleCellMessage(cell({ caseName: "nope" }));
  expect(reply).toMatchObject({
    type: "error",
    code: "Configuration",
    phase: "load",
    error: 'Case "nope" not found in suite "cells"',
  });
});

test("error replies map back to harness errors", () => {
  const prepare = replyError(
    { type: "error", phase: "prepare", error: "no input" },
    "ok",
    13,
  );
  expect(prepare).toBeInstanceOf(CallableFailure);
  expect(prepare.message).toBe('Case "prepare(13)" failed: no input');

  const failed = replyError(
    { type: "error", code: "CallableFailure", phase: "case", error: "boom" },
    "ok",
    1,
  );
  expect(failed.message).toBe('Case "ok" failed: boom');

  const config = replyError(
    { type: "error", code: "Configuration", phase: "load", error: "bad" },
    "ok",
    1,
  );
  expect(config).toBeInstanceOf(ConfigurationError);
  expect(config.message).toBe("bad");
});

test("isolated run records cells and failures like the in-process run", async () => {
  const results = await runComparisonIsolated(moduleUrl, {
    sizes: [1, 13, 2],
    cellRunner: handleCellMessage,
  });

  expect(results.cells.map(c => [c.caseName, c.size])).toEqual([
    ["ok", 1],
    ["ok", 2],
  ]);
  expect(results.failures.map(f => [f.caseName, f.size])).toEqual([
    ["throws", 1],
    ["ok", 13],
  ]);
  expect(results.failures[0].error.message).toBe(
    'Case "throws" failed: bad case',
  );
});

test("a crashed worker fails its case", async () => {
  const messages: string[] = [];
  const results = await runComparisonIsolated(moduleUrl, {
    filter: "ok",
    cellRunner: async message => {
      messages.push(`${message.caseName}@${message.size}`);
      throw new Error("Worker exited with code 134");
    },
  });

  expect(messages).toEqual(["ok@1"]);
  expect(results.cells).toEqual([]);
  expect(results.failures[0].error).toBeInstanceOf(CallableFailure);
  expect(results.failures[0].error.message).toBe(
    'Case "ok" failed: Worker exited with code 134',
  );
});

test("configuration errors from a worker end the run", async () => {
  const run = runComparisonIsolated(moduleUrl, {
    cellRunner: async () => ({
      type: "error",
      code: "Configuration",
      phase: "load",
      error: "module moved",
    }),
  });
  await expect(run).rejects.toThrow("module moved");
});

test("an invalid run fails before any cell is measured", async () => {
  let cells = 0;
  const run = runComparisonIsolated(moduleUrl, {
    samples: 0,
    cellRunner: async message => {
      cells++;
      return handleCellMessage(message);
    },
  });
  await expect(run).rejects.toThrow(ConfigurationError);
  expect(cells).toBe(0);
});

/** @return a child process that is never spawned, with send and kill stubbed */
function idleWorker(): ChildProcess {
  const worker = new ChildProcess();
  worker.send = () => true;
  worker.kill = () => true;
  return worker;
}

test("a worker exiting without a reply fails right away", async () => {
  const worker = idleWorker();
  const reply = runInWorker(cell(), () => worker);
  worker.emit("exit", 0, null);
  await expect(reply).rejects.toThrow(
    "Worker exited with code 0 before replying for ok [1]",
  );
});

test("a worker killed by a signal names the signal", async () => {
  const worker = idleWorker();
  const reply = runInWorker(cell({ size: 2 }), () => worker);
  worker.emit("exit", null, "SIGKILL");
  await expect(reply).rejects.toThrow(
    "Worker exited with signal SIGKILL before replying for ok [2]",
  );
});

test("a worker exiting after its reply resolves with the reply", async () => {
  const worker = idleWorker();
  const reply = runInWorker(cell(), () => worker);
  const samples: SamplesMessage = {
    type: "samples",
    caseName: "ok",
    samples: [1, 2, 3],
    warmupSamples: [1],
  };
  worker.emit("message", samples, undefined);
  worker.emit("exit", 0, null);
  await expect(reply).resolves.toEqual(samples);
});
