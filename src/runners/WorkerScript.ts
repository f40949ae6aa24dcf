#!/usr/bin/env node
import {
  type CellMessage,
  handleCellMessage,
  type WorkerReply,
} from "./CellWorker.ts";
import { getElapsed, getPerfNow, timingLogger } from "./TimingUtils.ts";

const workerStartTime = getPerfNow();
const maxLifetime = 5 * 60 * 1000; // 5 minutes
const logTiming = timingLogger("Worker");

/** Worker process measuring a single (case, size) cell, then exiting */
process.on("message", (message: CellMessage) => {
  if (message.type !== "cell") return;
  logTiming(`Processing ${message.caseName} at size ${message.size}`);

  handleCellMessage(message).then(
    reply => sendAndExit(reply),
    (error: unknown) => {
      console.error("[Worker] Unexpected failure:", error);
      process.exit(1);
    },
  );
});

// Exit after 5 minutes to prevent zombie processes
setTimeout(() => {
  console.error("WorkerScript: Maximum lifetime exceeded, exiting");
  process.exit(1);
}, maxLifetime);

/** Send reply and exit with duration log, failures travel in the reply */
function sendAndExit(msg: WorkerReply): void {
  if (!process.send) {
    console.error("[Worker] No IPC channel to parent");
    process.exit(1);
  }
  process.send(msg, undefined, undefined, (err: Error | null): void => {
    if (err) {
      const kind = msg.type === "samples" ? "samples" : "error message";
      console.error(`[Worker] Error sending ${kind}:`, err);
    }
    const suffix = msg.type === "samples" ? "" : " (error)";
    const elapsed = getElapsed(workerStartTime).toFixed(1);
    logTiming(`Total worker duration${suffix}: ${elapsed}ms`);
    process.exit(0);
  });
}
