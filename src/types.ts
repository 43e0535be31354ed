// Seismic Relocator - Shared TypeScript interfaces and types
// Domain objects exchanged between the relocation pipeline, the repicking
// pipeline and their external collaborators (catalog, solver, model).

// ─── Catalog objects ────────────────────────────────────────────────────────────

export type EvaluationMode = "automatic" | "manual";

export type DepthType = "free" | "fixed";

export interface CreationInfo {
  author?: string;
  agencyID?: string;
  creationTime?: Date;
}

export interface Arrival {
  /** Public ID of the referenced pick. Arrivals without one never count toward overlap. */
  pickID?: string;
  phase: string;
  weight: number;
  /** Epicentral distance in degrees */
  distance?: number;
  azimuth?: number;
}

export interface OriginQuality {
  /** RMS of the arrival residuals in seconds */
  standardError?: number;
  usedPhaseCount?: number;
}

export interface Origin {
  publicID: string;
  time: Date;
  latitude: number;
  longitude: number;
  /** Depth in km */
  depth: number;
  depthType: DepthType;
  arrivals: Arrival[];
  quality: OriginQuality;
  creationInfo?: CreationInfo;
  evaluationMode?: EvaluationMode;
  evaluationStatus?: string;
}

export interface SeismicEvent {
  publicID: string;
  preferredOriginID: string;
  type?: string;
}

export interface Pick {
  publicID: string;
  networkCode: string;
  stationCode: string;
  locationCode: string;
  channelCode: string;
  time: Date;
  phaseHint: string;
  author?: string;
}

/** One atomic publication: the new origin plus its association to the event. */
export interface ChangeSet {
  eventID: string;
  origin: Origin;
  originReference: { eventID: string; originID: string };
}

// ─── Station inventory ──────────────────────────────────────────────────────────

/** Epoch bounds in ms. Unknown start means "not operational"; absent end is open. */
export interface Epoch {
  start?: number;
  end?: number;
}

export interface InventoryStream extends Epoch {
  code: string;
}

export interface InventoryLocation extends Epoch {
  code: string;
  streams: InventoryStream[];
}

export interface InventoryStation extends Epoch {
  code: string;
  latitude: number;
  longitude: number;
  locations: InventoryLocation[];
}

export interface InventoryNetwork extends Epoch {
  code: string;
  stations: InventoryStation[];
}

export interface StationInventory {
  networks: InventoryNetwork[];
}

// ─── Catalog notifications ──────────────────────────────────────────────────────

export type CatalogNotification =
  | { kind: "event"; event: SeismicEvent }
  | { kind: "origin"; origin: Origin };

// ─── Relocation ─────────────────────────────────────────────────────────────────

export type AttemptPhase = "direct" | "depth-phase";

export type FixedDepthDirective =
  | { kind: "free" }
  | { kind: "region"; depth: number }
  | { kind: "trusted-manual"; depth: number }
  | { kind: "default-passthrough"; depth: number }
  | { kind: "depth-phase"; depth: number };

export interface RelocationRequest {
  eventID: string;
  origin: Origin;
  /** null means depth is solved for */
  fixedDepth: number | null;
  minDepth: number;
  maxResidual: number;
}

export type ReadinessVerdict = "not-ready" | "ready" | "rejected";

export type AttemptOutcome =
  | { status: "published"; phase: AttemptPhase; origin: Origin }
  | { status: "suppressed"; phase: "direct"; origin: Origin }
  | { status: "failed"; phase: AttemptPhase | "load"; reason: string };

export interface AttemptReport {
  eventID: string;
  /** Outcome per phase that was entered, in order */
  attempts: AttemptOutcome[];
  depthPhaseSkipped: string | null;
}

// ─── Repicking ──────────────────────────────────────────────────────────────────

/**
 * A pick record as carried in mailbox payload files.
 * Fields not listed here survive a read/write cycle untouched.
 */
export interface PickRecord {
  publicID: string;
  streamID: string;
  networkCode: string;
  stationCode: string;
  locationCode: string;
  channelCode: string;
  /** ISO-8601 timestamp */
  time: string;
  phaseHint: string;
  /** Set on derived picks only */
  model?: string;
  /** Set on derived picks only */
  confidence?: number;
  [field: string]: unknown;
}

export interface MailboxEntry {
  /** Link file name, e.g. "20240101T000000-0001.json" */
  name: string;
  linkPath: string;
  targetPath: string;
  eventID: string;
}

export type MailboxOrder = "prioritize-recent" | "strict";

export type ComponentName = "Z" | "N" | "E";

export interface WaveformSpan {
  /** epoch ms */
  startTime: number;
  /** epoch ms */
  endTime: number;
}

export interface ComponentGroup {
  pick: PickRecord;
  files: Record<ComponentName, string>;
  spans: Record<ComponentName, WaveformSpan>;
}

/** A confidence curve produced by the onset model for one stream. */
export interface Annotation {
  network: string;
  station: string;
  location: string;
  /** Model label plus phase, e.g. "PhaseNet_P" */
  channel: string;
  /** epoch ms of the first sample */
  startTime: number;
  samplingRate: number;
  data: number[];
}

export interface AnnotationCandidate {
  streamID: string;
  /** epoch ms */
  time: number;
  confidence: number;
}

export type Device = "cpu" | "gpu";

// ─── Utilities ──────────────────────────────────────────────────────────────────

export interface Deferred<T> {
  promise: Promise<T>;
  /** true once resolve() has been called; later calls are ignored */
  settled: boolean;
  resolve: (value: T) => void;
}
