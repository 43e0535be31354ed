// Seismic Relocator - Relocator state
// The mutable caches of the relocation pipeline, held in one context value.

import type { Origin, SeismicEvent } from "./types.js";

export class RelocatorState {
  /** Events waiting for their readiness delay, keyed by event ID. */
  readonly pendingEvents: Map<string, SeismicEvent> = new Map();
  /** Origins by public ID. An ID is cached once. */
  readonly origins: Map<string, Origin> = new Map();
  /** Most recently sent relocation per event; the improvement baseline. */
  readonly lastSent: Map<string, Origin> = new Map();

  /** Caches `origin` unless its ID is already known. Returns the cached instance. */
  cacheOrigin(origin: Origin): Origin {
    const existing = this.origins.get(origin.publicID);
    if (existing) return existing;
    this.origins.set(origin.publicID, origin);
    return origin;
  }

  /** Pending event IDs in ascending order. */
  pendingIDs(): string[] {
    return [...this.pendingEvents.keys()].sort();
  }
}
