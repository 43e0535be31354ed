// Seismic Relocator - Origin helpers
// Small predicates and accessors over catalog origins.

import type { CreationInfo, Origin, SeismicEvent } from "./types.js";

/** Event types that are never relocated. */
const IGNORED_EVENT_TYPES = new Set(["not existing", "outside of network interest"]);

export function isValidEvent(event: SeismicEvent): boolean {
  if (!event.publicID || !event.preferredOriginID) return false;
  return event.type === undefined || !IGNORED_EVENT_TYPES.has(event.type);
}

export function arrivalCount(origin: Origin): number {
  return origin.arrivals.length;
}

export function hasFixedDepth(origin: Origin): boolean {
  return origin.depthType === "fixed";
}

export function agencyID(origin: Origin): string | undefined {
  return origin.creationInfo?.agencyID;
}

/** "M" for manual origins, "A" otherwise. */
export function statusFlag(origin: Origin): "M" | "A" {
  return origin.evaluationMode === "manual" ? "M" : "A";
}

/**
 * Basic plausibility check applied before an origin is worth relocating.
 * The standard error only counts when the origin carries one.
 */
export function isQualified(origin: Origin, maxRMS: number): boolean {
  if (![origin.latitude, origin.longitude, origin.depth].every(Number.isFinite)) return false;
  if (Number.isNaN(origin.time.getTime())) return false;
  if (origin.evaluationStatus === "rejected") return false;
  const rms = origin.quality.standardError;
  if (typeof rms === "number" && Number.isFinite(rms) && rms > maxRMS) return false;
  return true;
}

export function creationInfo(author: string, agency: string, now: Date): CreationInfo {
  return { author, agencyID: agency, creationTime: now };
}

/** One-line description for logs. */
export function summarize(origin: Origin): string {
  const rms = origin.quality.standardError;
  return (
    `${origin.publicID} ${origin.time.toISOString()} ` +
    `lat=${origin.latitude.toFixed(3)} lon=${origin.longitude.toFixed(3)} ` +
    `depth=${origin.depth.toFixed(1)}km${hasFixedDepth(origin) ? " (fixed)" : ""} ` +
    `arr=${arrivalCount(origin)} rms=${typeof rms === "number" ? rms.toFixed(2) : "n/a"}`
  );
}
