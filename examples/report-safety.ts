#!/usr/bin/env -S npx tsx
import {
  type ComparisonSuite,
  HashStream,
  isMainModule,
  runComparisonCli,
  type StatefulVariant,
} from "../src/index.ts";

/**
 * A report is safe when its levels move strictly in one direction
 * by steps of 1 to 3.
 */
export function isSafeSinglePass(levels: readonly number[]): boolean {
  let direction = 0;
  for (let i = 1; i < levels.length; i++) {
    const diff = levels[i] - levels[i - 1];
    const step = Math.abs(diff);
    if (step < 1 || step > 3) return false;
    const sign = Math.sign(diff);
    if (direction === 0) direction = sign;
    else if (sign !== direction) return false;
  }
  return true;
}

export function isSafeFunctional(levels: readonly number[]): boolean {
  const diffs = levels.slice(1).map((v, i) => v - levels[i]);
  const inRange = diffs.every(d => Math.abs(d) >= 1 && Math.abs(d) <= 3);
  const monotonic = diffs.every(d => d > 0) || diffs.every(d => d < 0);
  return inRange && monotonic;
}

/** @return parsed reports, one per non-empty line */
export function parseReports(text: string): number[][] {
  return text
    .split("\n")
    .filter(line => line.trim() !== "")
    .map(line => line.trim().split(/\s+/).map(Number));
}

/** @return report text with n lines, roughly half of them safe */
export function generateReports(n: number, seed = 3): string {
  const stream = new HashStream(seed, 0);
  const lines: string[] = [];
  for (let r = 0; r < n; r++) {
    const length = 5 + stream.nextBelow(4);
    const direction = stream.next() < 0.5 ? -1 : 1;
    const breakAt = stream.next() < 0.5 ? stream.nextBelow(length) : -1;
    let level = 20 + stream.nextBelow(60);
    const levels = [level];
    for (let i = 1; i < length; i++) {
      const step =
        i === breakAt ? stream.nextBelow(6) - 1 : 1 + stream.nextBelow(3);
      level += direction * step;
      levels.push(level);
    }
    lines.push(levels.join(" "));
  }
  return lines.join("\n");
}

/** parsing happens in setup, outside the timed region */
function countSafe(
  isSafe: (levels: readonly number[]) => boolean,
): StatefulVariant<string, number[][]> {
  return {
    setup: parseReports,
    run: reports => reports.filter(report => isSafe(report)).length,
  };
}

export const suite: ComparisonSuite<string> = {
  name: "report safety check",
  sizes: [100, 1_000, 10_000],
  prepare: size => generateReports(size),
  baseline: "single-pass",
  cases: [
    { name: "single-pass", variant: countSafe(isSafeSinglePass) },
    { name: "functional", variant: countSafe(isSafeFunctional) },
  ],
};

if (isMainModule(import.meta.url)) {
  await runComparisonCli(suite, import.meta.url);
}
