#!/usr/bin/env -S npx tsx
import {
  type ComparisonSuite,
  compareProfiles,
  generateDataset,
  isMainModule,
  measureDataset,
  profileDataset,
  runComparisonCli,
  type SyntheticDataset,
} from "../src/index.ts";

// small hand-made reference pair: a few repeats, about half the right side shared
const referenceLeft = [
  48213, 10977, 73302, 48213, 55120, 10977, 90411, 31862, 66530, 48213, 24075,
  87719,
];
const referenceRight = [
  10977, 48213, 59004, 31862, 12650, 48213, 99108, 66530, 40441, 73302, 81276,
  35517,
];
const reference = profileDataset(referenceLeft, referenceRight);

/** sum of each left value times its count in the right list, via a count map */
export function similarityHashMap({ primary, secondary }: SyntheticDataset) {
  const counts = new Map<number, number>();
  for (const v of secondary) counts.set(v, (counts.get(v) ?? 0) + 1);
  let score = 0;
  for (const v of primary) score += v * (counts.get(v) ?? 0);
  return score;
}

/** same score, from sorted copies walked in step */
export function similaritySortMerge({ primary, secondary }: SyntheticDataset) {
  const left = Int32Array.from(primary).sort();
  const right = Int32Array.from(secondary).sort();
  let score = 0;
  let j = 0;
  for (let i = 0; i < left.length; i++) {
    const v = left[i];
    while (j < right.length && right[j] < v) j++;
    let k = j;
    while (k < right.length && right[k] === v) k++;
    score += v * (k - j);
  }
  return score;
}

/** same score, comparing every pair */
export function similarityNaive({ primary, secondary }: SyntheticDataset) {
  let score = 0;
  for (const l of primary) {
    for (const r of secondary) if (l === r) score += l;
  }
  return score;
}

export const suite: ComparisonSuite<SyntheticDataset> = {
  name: "list similarity score",
  sizes: [100, 1_000, 10_000],
  prepare: size => generateDataset(reference, size, 7),
  baseline: "hashmap",
  defaults: { samples: 50 },
  cases: [
    { name: "hashmap", variant: similarityHashMap },
    { name: "sort-merge", variant: similaritySortMerge },
    { name: "naive", variant: similarityNaive, sizes: [100, 1_000] },
  ],
};

if (isMainModule(import.meta.url)) {
  const drift = compareProfiles(
    reference,
    measureDataset(suite.prepare(1_000)),
  );
  const status = drift.representative ? "representative" : "NOT representative";
  console.log(`synthetic data at n=1,000 is ${status} of the reference lists`);
  await runComparisonCli(suite, import.meta.url);
}
