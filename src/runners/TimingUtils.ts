/** Print driver and worker timing diagnostics (set ISOBENCH_DEBUG_TIMING=1) */
export const debugTiming = !!process.env.ISOBENCH_DEBUG_TIMING;

/** @return current high resolution time in milliseconds */
export function getPerfNow(): number {
  return performance.now();
}

/** @return milliseconds elapsed since start (until end, or now) */
export function getElapsed(start: number, end = getPerfNow()): number {
  return end - start;
}

/** @return logger prefixed with source, or a no-op when timing debug is off */
export function timingLogger(source: string): (message: string) => void {
  if (!debugTiming) return () => {};
  return (message: string) => console.log(`[${source}] ${message}`);
}
