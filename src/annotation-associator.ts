// Seismic Relocator - Annotation Associator
// Maps model annotation curves back onto the picks that triggered them and
// turns curve maxima into derived picks.

import type { Logger } from "./logger.js";
import { formatPickTime, parsePickTime } from "./pick-payload.js";
import type { Annotation, AnnotationCandidate, PickRecord } from "./types.js";

/** Curve maxima below this value are not candidates at all. */
export const PEAK_FLOOR = 0.1;
/** Derived picks further than this from the triggering pick are discarded (seconds). */
export const MAX_PICK_OFFSET_SECONDS = 10;
export const REPICK_SUFFIX = "/repick";

export interface AssociatedAnnotation {
  pick: PickRecord;
  annotation: Annotation;
}

export function isPPhaseAnnotation(annotation: Annotation): boolean {
  return annotation.channel.endsWith("_P");
}

/**
 * Indices of local maxima with value ≥ height. A flat top counts once, at
 * its middle sample; the first and last samples are never maxima.
 */
export function findPeaks(values: readonly number[], height: number): number[] {
  const peaks: number[] = [];
  const last = values.length - 1;
  let i = 1;
  while (i < last) {
    if (values[i - 1] < values[i]) {
      let ahead = i + 1;
      while (ahead < last && values[ahead] === values[i]) ahead++;
      if (values[ahead] < values[i]) {
        const mid = Math.floor((i + ahead - 1) / 2);
        if (values[mid] >= height) peaks.push(mid);
        i = ahead;
      }
    }
    i++;
  }
  return peaks;
}

/**
 * Pairs each P annotation with the first still-unconsumed pick of the same
 * network, station and location. Every pick is used at most once.
 */
export function associateAnnotations(
  annotations: readonly Annotation[],
  picks: readonly PickRecord[],
  logger: Logger,
): AssociatedAnnotation[] {
  const pool = [...picks];
  const pairs: AssociatedAnnotation[] = [];
  let unassociated = 0;

  for (const annotation of annotations.filter(isPPhaseAnnotation)) {
    const index = pool.findIndex(
      (p) =>
        p.networkCode === annotation.network &&
        p.stationCode === annotation.station &&
        p.locationCode === annotation.location,
    );
    if (index < 0) {
      logger.warn(`failed to associate annotation for ${annotation.network}.${annotation.station}`);
      unassociated++;
      continue;
    }
    const [pick] = pool.splice(index, 1);
    pairs.push({ pick, annotation });
  }

  if (unassociated > 0) {
    logger.warn(`There were ${unassociated} annotations that could not be associated.`);
  }
  if (pool.length > 0) {
    logger.warn(`There were ${pool.length} picks for which no annotation was done.`);
  }
  return pairs;
}

/** One candidate per curve maximum above the floor. */
export function extractCandidates(pair: AssociatedAnnotation, floor: number = PEAK_FLOOR): AnnotationCandidate[] {
  const { annotation, pick } = pair;
  return findPeaks(annotation.data, floor).map((index) => ({
    streamID: pick.streamID,
    time: annotation.startTime + (index * 1000) / annotation.samplingRate,
    confidence: annotation.data[index],
  }));
}

export interface GateOptions {
  minConfidence: number;
  maxOffsetSeconds?: number;
}

/** Keeps candidates close enough to the pick and confident enough; both bounds inclusive. */
export function gateCandidates(
  pick: PickRecord,
  candidates: readonly AnnotationCandidate[],
  options: GateOptions,
  logger?: Logger,
): AnnotationCandidate[] {
  const maxOffset = options.maxOffsetSeconds ?? MAX_PICK_OFFSET_SECONDS;
  const pickTime = parsePickTime(pick.time);
  return candidates.filter((candidate) => {
    const dt = Math.abs(candidate.time - pickTime) / 1000;
    if (dt > maxOffset) {
      logger?.info(`SKIPPED dt = ${dt.toFixed(2)}`);
      return false;
    }
    if (candidate.confidence < options.minConfidence) {
      logger?.info(`SKIPPED conf = ${candidate.confidence.toFixed(3)}`);
      return false;
    }
    return true;
  });
}

export function deriveRepick(pick: PickRecord, candidate: AnnotationCandidate, modelName: string): PickRecord {
  return {
    ...pick,
    publicID: pick.publicID + REPICK_SUFFIX,
    model: modelName,
    confidence: Number(candidate.confidence.toFixed(3)),
    time: formatPickTime(candidate.time),
  };
}
