import { ConfigurationError } from "../Errors.ts";

/** Default drift tolerance for declaring synthetic data representative */
export const defaultProfileTolerance = 0.02;

/**
 * Shape of a two-column integer dataset.
 *
 * duplicateRatio is measured on the primary column, overlapRatio is the
 * fraction of secondary elements whose value also occurs in primary.
 */
export interface DataProfile {
  size: number;
  min: number;
  max: number;
  duplicateRatio: number;
  overlapRatio: number;
}

/** Paired integer columns of equal size */
export interface SyntheticDataset {
  primary: number[];
  secondary: number[];
}

/** Difference between a reference profile and a candidate profile */
export interface ProfileDrift {
  duplicateDrift: number;
  overlapDrift: number;
  /** candidate values lie inside the reference range */
  withinRange: boolean;
  /** all drifts within tolerance and withinRange */
  representative: boolean;
}

/** @return profile measured from a reference dataset */
export function profileDataset(
  primary: readonly number[],
  secondary: readonly number[] = primary,
): DataProfile {
  if (primary.length === 0) {
    throw new ConfigurationError("Cannot profile an empty dataset");
  }
  checkIntegers(primary, "primary");
  checkIntegers(secondary, "secondary");

  const distinct = new Set(primary);
  const shared = secondary.filter(v => distinct.has(v)).length;
  const all = [...primary, ...secondary];
  return {
    size: primary.length,
    min: all.reduce((a, b) => Math.min(a, b)),
    max: all.reduce((a, b) => Math.max(a, b)),
    duplicateRatio: 1 - distinct.size / primary.length,
    overlapRatio: secondary.length ? shared / secondary.length : 0,
  };
}

/** @return profile measured from a generated dataset */
export function measureDataset(dataset: SyntheticDataset): DataProfile {
  return profileDataset(dataset.primary, dataset.secondary);
}

/** @throws ConfigurationError for ratios outside [0, 1] or a bad value range */
export function validateProfile(profile: DataProfile): void {
  const { min, max, duplicateRatio, overlapRatio } = profile;
  if (!Number.isSafeInteger(min) || !Number.isSafeInteger(max) || min > max) {
    const msg = `Profile range must be integers with min <= max, got [${min}, ${max}]`;
    throw new ConfigurationError(msg);
  }
  for (const [name, ratio] of [
    ["duplicateRatio", duplicateRatio],
    ["overlapRatio", overlapRatio],
  ] as const) {
    if (!(ratio >= 0 && ratio <= 1)) {
      throw new ConfigurationError(
        `Profile ${name} must be between 0 and 1, got ${ratio}`,
      );
    }
  }
}

/** Compare a candidate profile (usually of generated data) to a reference */
export function compareProfiles(
  reference: DataProfile,
  candidate: DataProfile,
  tolerance = defaultProfileTolerance,
): ProfileDrift {
  const duplicateDrift = Math.abs(
    candidate.duplicateRatio - reference.duplicateRatio,
  );
  const overlapDrift = Math.abs(
    candidate.overlapRatio - reference.overlapRatio,
  );
  const withinRange =
    candidate.min >= reference.min && candidate.max <= reference.max;
  const representative =
    withinRange && duplicateDrift <= tolerance && overlapDrift <= tolerance;
  return { duplicateDrift, overlapDrift, withinRange, representative };
}

function checkIntegers(values: readonly number[], column: string): void {
  const bad = values.find(v => !Number.isSafeInteger(v));
  if (bad !== undefined) {
    const msg = `Dataset ${column} column holds a non-integer value: ${bad}`;
    throw new ConfigurationError(msg);
  }
}
