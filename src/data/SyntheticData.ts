import { ConfigurationError } from "../Errors.ts";
import {
  type DataProfile,
  type SyntheticDataset,
  validateProfile,
} from "./DataProfile.ts";
import { HashStream, hashShuffle } from "./HashStream.ts";

/** Independent hash streams, one per generation concern */
const Stream = {
  Pool: 0,
  Repeats: 1,
  PrimaryOrder: 2,
  Shared: 3,
  Fresh: 4,
  SecondaryOrder: 5,
} as const;

// below this share of free values, enumerate them instead of rejection sampling
const sparseFreeShare = 1 / 16;

/**
 * Generate a dataset of the given size shaped like the profile.
 *
 * Distinct values come from hashing an element counter into the profile
 * range. Duplicate and overlap counts are fixed fractions of size, so the
 * relative shape is the same at every size. Same (profile, size, seed) always
 * yields the same arrays.
 */
export function generateDataset(
  profile: DataProfile,
  size: number,
  seed = 0,
): SyntheticDataset {
  validateProfile(profile);
  if (!Number.isSafeInteger(size) || size < 0) {
    throw new ConfigurationError(
      `Dataset size must be a non-negative integer, got ${size}`,
    );
  }
  if (size === 0) return { primary: [], secondary: [] };

  const width = profile.max - profile.min + 1;
  const distinctCount = Math.max(
    1,
    Math.round(size * (1 - profile.duplicateRatio)),
  );
  if (distinctCount > width) {
    const msg = `Range [${profile.min}, ${profile.max}] holds ${width} values, ${distinctCount} distinct values needed for size ${size}`;
    throw new ConfigurationError(msg);
  }

  const pool = drawDistinct(profile.min, width, distinctCount, seed);
  const primary = buildPrimary(pool, size, seed);
  const secondary = buildSecondary(profile, pool, size, seed);
  return { primary, secondary };
}

/** @return count distinct hashed values from [min, min + width) */
function drawDistinct(
  min: number,
  width: number,
  count: number,
  seed: number,
): number[] {
  const stream = new HashStream(seed, Stream.Pool);
  if ((width - count) / width < sparseFreeShare) {
    const all = Array.from({ length: width }, (_, i) => min + i);
    return hashShuffle(all, stream).slice(0, count);
  }
  const seen = new Set<number>();
  const pool: number[] = [];
  while (pool.length < count) {
    const v = min + stream.nextBelow(width);
    if (seen.has(v)) continue;
    seen.add(v);
    pool.push(v);
  }
  return pool;
}

/** @return every pool value once, the remainder hashed repeats, shuffled */
function buildPrimary(pool: number[], size: number, seed: number): number[] {
  const repeats = new HashStream(seed, Stream.Repeats);
  const primary = new Array<number>(size);
  for (let i = 0; i < size; i++) {
    const pick = i < pool.length ? i : repeats.nextBelow(pool.length);
    primary[i] = pool[pick];
  }
  return hashShuffle(primary, new HashStream(seed, Stream.PrimaryOrder));
}

/** @return shared values from the pool, the remainder fresh, shuffled */
function buildSecondary(
  profile: DataProfile,
  pool: number[],
  size: number,
  seed: number,
): number[] {
  const sharedCount = Math.round(size * profile.overlapRatio);
  const freshCount = size - sharedCount;
  const shared = new HashStream(seed, Stream.Shared);
  const secondary = new Array<number>(size);
  for (let i = 0; i < sharedCount; i++) {
    secondary[i] = pool[shared.nextBelow(pool.length)];
  }
  if (freshCount > 0) {
    const fresh = freshValueSource(profile, new Set(pool), seed);
    for (let i = sharedCount; i < size; i++) secondary[i] = fresh();
  }
  return hashShuffle(secondary, new HashStream(seed, Stream.SecondaryOrder));
}

/** @return generator of hashed range values that do not occur in the pool */
function freshValueSource(
  profile: DataProfile,
  poolSet: Set<number>,
  seed: number,
): () => number {
  const { min, max } = profile;
  const width = max - min + 1;
  const freeCount = width - poolSet.size;
  if (freeCount <= 0) {
    const msg = `Range [${min}, ${max}] has no values left outside the shared pool, cannot reach overlap ratio ${profile.overlapRatio}`;
    throw new ConfigurationError(msg);
  }

  const stream = new HashStream(seed, Stream.Fresh);
  if (freeCount / width < sparseFreeShare) {
    const free: number[] = [];
    for (let v = min; v <= max; v++) if (!poolSet.has(v)) free.push(v);
    return () => free[stream.nextBelow(free.length)];
  }
  return () => {
    for (;;) {
      const v = min + stream.nextBelow(width);
      if (!poolSet.has(v)) return v;
    }
  };
}
