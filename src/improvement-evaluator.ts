// Seismic Relocator - Improvement Evaluator
// Decides whether a freshly relocated origin is worth publishing over the
// relocation that was last sent for the same event.

import type { Origin } from "./types.js";

/** Arrivals below this weight are not counted as used picks. */
export const MIN_ARRIVAL_WEIGHT = 0.5;

/** Fallback RMS values when an origin carries no usable standard error. */
const PREVIOUS_RMS_FALLBACK = 10.0;
const CANDIDATE_RMS_FALLBACK = 1.0;

/** RMS values are floored to this before they enter the score. */
const RMS_FLOOR = 1.0;

export interface PickOverlap {
  common: Set<string>;
  onlyPrevious: Set<string>;
  onlyCandidate: Set<string>;
}

/** Pick IDs referenced by arrivals with weight ≥ minWeight. */
export function usedPickIDs(origin: Origin, minWeight: number = MIN_ARRIVAL_WEIGHT): Set<string> {
  const ids = new Set<string>();
  for (const arrival of origin.arrivals) {
    if (!arrival.pickID) continue;
    if (!(arrival.weight >= minWeight)) continue;
    ids.add(arrival.pickID);
  }
  return ids;
}

export function comparePicks(previous: Origin, candidate: Origin): PickOverlap {
  const picks1 = usedPickIDs(previous);
  const picks2 = usedPickIDs(candidate);

  const common = new Set<string>();
  const onlyPrevious = new Set<string>();
  const onlyCandidate = new Set<string>();

  for (const id of picks1) {
    if (picks2.has(id)) common.add(id);
    else onlyPrevious.add(id);
  }
  for (const id of picks2) {
    if (!picks1.has(id)) onlyCandidate.add(id);
  }

  return { common, onlyPrevious, onlyCandidate };
}

function rmsOf(origin: Origin, fallback: number): number {
  const value = origin.quality.standardError;
  if (typeof value !== "number" || !Number.isFinite(value)) return fallback;
  return Math.max(value, RMS_FLOOR);
}

export interface ImprovementScore {
  count1: number;
  count2: number;
  rms1: number;
  rms2: number;
  /** null when the previous origin has no used picks */
  score: number | null;
}

export function improvementScore(previous: Origin, candidate: Origin): ImprovementScore {
  const { common, onlyPrevious, onlyCandidate } = comparePicks(previous, candidate);
  const count1 = onlyPrevious.size + common.size;
  const count2 = onlyCandidate.size + common.size;
  const rms1 = rmsOf(previous, PREVIOUS_RMS_FALLBACK);
  const rms2 = rmsOf(candidate, CANDIDATE_RMS_FALLBACK);

  if (count1 === 0) {
    return { count1, count2, rms1, rms2, score: null };
  }
  const score = (count2 / count1) ** 2 * (rms1 / rms2);
  return { count1, count2, rms1, rms2, score };
}

/**
 * True if `candidate` improves on `previous`:
 *   score = (count2 / count1)² · (rms1 / rms2) > 1
 * With no previous relocation there is nothing to beat.
 */
export function improves(previous: Origin | undefined, candidate: Origin): boolean {
  if (!previous) return true;
  const { score } = improvementScore(previous, candidate);
  return score === null || score > 1;
}
