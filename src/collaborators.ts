// Seismic Relocator - External collaborator interfaces
// Minimal surfaces of the catalog, the relocation solver and the depth-phase
// analyzer. Injected everywhere so tests can supply in-process fakes.

import type {
  CatalogNotification,
  ChangeSet,
  Origin,
  Pick,
  RelocationRequest,
  SeismicEvent,
  StationInventory,
} from "./types.js";

export interface PickQuery {
  /** epoch ms, inclusive */
  start: number;
  /** epoch ms, inclusive */
  end: number;
  authors: string[];
}

export interface Catalog {
  /** Registers the handler for event/origin change notifications. */
  subscribe(handler: (notification: CatalogNotification) => void): void;
  fetchEvent(eventID: string): Promise<SeismicEvent | null>;
  /** Loads an origin without its arrivals. */
  fetchOrigin(originID: string): Promise<Origin | null>;
  fetchPicks(query: PickQuery): Promise<Pick[]>;
  fetchInventory(): Promise<StationInventory>;
  /** Resolves true when the change-set was accepted for delivery. */
  send(changeSet: ChangeSet): Promise<boolean>;
}

export interface Relocator {
  /** Resolves null when the solver could not produce a solution. */
  relocate(request: RelocationRequest): Promise<Origin | null>;
}

export interface DepthPhaseAnalyzer {
  /** Depth in km from depth phases, or null if none could be determined. */
  computeDepth(eventID: string): Promise<number | null>;
}
