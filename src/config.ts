// Seismic Relocator - Configuration
// Resolves relocator and repicker settings from environment variables.
// Absent variables fall back to defaults; malformed ones raise ConfigurationError.

import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { ConfigurationError } from "./errors.js";
import { isLogLevel, type LogLevel } from "./logger.js";
import type { Device, MailboxOrder } from "./types.js";

export type Env = Record<string, string | undefined>;

// ─── Region-specific fixed depths ───────────────────────────────────────────────

export interface FixedDepthRegion {
  name: string;
  latMin: number;
  latMax: number;
  lonMin: number;
  lonMax: number;
  /** km */
  depth: number;
}

/** Regions dominated by shallow induced seismicity. */
export const DEFAULT_FIXED_DEPTH_REGIONS: readonly FixedDepthRegion[] = [
  { name: "SW Poland copper mining", latMin: 50, latMax: 52, lonMin: 15, lonMax: 20, depth: 1 },
];

// ─── Relocator ──────────────────────────────────────────────────────────────────

export interface RelocatorConfig {
  workingDir: string;
  catalogUrl: string;
  author: string;
  agencyID: string;
  pickAuthors: string[];
  /** seconds after origin time before a relocation is attempted */
  minDelay: number;
  /** seconds */
  maxResidual: number;
  /** seconds */
  maxRMS: number;
  /** degrees */
  maxDelta: number;
  /** km */
  minDepth: number;
  /** km, used when no region matches */
  defaultDepth: number;
  /** seconds after origin time within which picks are collected */
  pickWindow: number;
  fixedDepthRegions: FixedDepthRegion[];
  dryRun: boolean;
  /** 0 disables the status server */
  statusPort: number;
  logLevel: LogLevel;
}

// ─── Repicker ───────────────────────────────────────────────────────────────────

export interface RepickerConfig {
  workingDir: string;
  eventRootDir: string;
  spoolDir: string;
  outgoingDir: string;
  annotDir: string;
  inferenceUrl: string;
  model: string;
  dataset: string;
  device: Device;
  batchSize: number;
  minConfidence: number;
  order: MailboxOrder;
  dryRun: boolean;
  exitWhenDone: boolean;
  logLevel: LogLevel;
}

// ─── Primitive readers ──────────────────────────────────────────────────────────

function raw(env: Env, name: string): string | undefined {
  const value = env[name];
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

export function readString(env: Env, name: string, fallback: string): string {
  return raw(env, name) ?? fallback;
}

export function readNumber(env: Env, name: string, fallback: number): number {
  const value = raw(env, name);
  if (value === undefined) return fallback;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigurationError(`${name} must be a number, got "${value}"`);
  }
  return parsed;
}

export function readBoolean(env: Env, name: string, fallback: boolean): boolean {
  const value = raw(env, name);
  if (value === undefined) return fallback;
  switch (value.toLowerCase()) {
    case "1":
    case "true":
    case "yes":
      return true;
    case "0":
    case "false":
    case "no":
      return false;
    default:
      throw new ConfigurationError(`${name} must be a boolean, got "${value}"`);
  }
}

/** Whitespace- or comma-separated list. */
export function readList(env: Env, name: string, fallback: string[]): string[] {
  const value = raw(env, name);
  if (value === undefined) return [...fallback];
  return value.split(/[\s,]+/).filter((item) => item.length > 0);
}

function readChoice<T extends string>(env: Env, name: string, choices: readonly T[], fallback: T): T {
  const value = raw(env, name);
  if (value === undefined) return fallback;
  const lowered = value.toLowerCase();
  const match = choices.find((choice) => choice === lowered);
  if (!match) {
    throw new ConfigurationError(`${name} must be one of ${choices.join(", ")}, got "${value}"`);
  }
  return match;
}

function readLogLevel(env: Env, name: string): LogLevel {
  const value = raw(env, name);
  if (value === undefined) return "info";
  const lowered = value.toLowerCase();
  if (!isLogLevel(lowered)) {
    throw new ConfigurationError(`${name} must be one of debug, info, warn, error, got "${value}"`);
  }
  return lowered;
}

/** Expands a leading "~" to the home directory and makes the path absolute. */
export function expandPath(path: string): string {
  if (path === "~") return homedir();
  if (path.startsWith("~/")) return join(homedir(), path.slice(2));
  return resolve(path);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parses a JSON array of region boxes, e.g.
 * `[{"name":"x","latMin":50,"latMax":52,"lonMin":15,"lonMax":20,"depth":1}]`.
 */
export function parseFixedDepthRegions(name: string, value: string): FixedDepthRegion[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch {
    throw new ConfigurationError(`${name} is not valid JSON`);
  }
  if (!Array.isArray(parsed)) {
    throw new ConfigurationError(`${name} must be a JSON array`);
  }
  return parsed.map((item, index) => {
    if (!isRecord(item)) {
      throw new ConfigurationError(`${name}[${index}] must be an object`);
    }
    const numberField = (field: string): number => {
      const v = item[field];
      if (typeof v !== "number" || !Number.isFinite(v)) {
        throw new ConfigurationError(`${name}[${index}].${field} must be a number`);
      }
      return v;
    };
    const region: FixedDepthRegion = {
      name: typeof item.name === "string" ? item.name : `region-${index}`,
      latMin: numberField("latMin"),
      latMax: numberField("latMax"),
      lonMin: numberField("lonMin"),
      lonMax: numberField("lonMax"),
      depth: numberField("depth"),
    };
    if (region.latMin > region.latMax || region.lonMin > region.lonMax) {
      throw new ConfigurationError(`${name}[${index}] has inverted bounds`);
    }
    return region;
  });
}

// ─── Loaders ────────────────────────────────────────────────────────────────────

export function loadRelocatorConfig(env: Env = process.env): RelocatorConfig {
  const regions = raw(env, "RELOC_FIXED_DEPTH_REGIONS");
  const config: RelocatorConfig = {
    workingDir: expandPath(readString(env, "RELOC_WORKING_DIR", "~/scdlpicker")),
    catalogUrl: readString(env, "RELOC_CATALOG_URL", "ws://localhost:18180"),
    author: readString(env, "RELOC_AUTHOR", "dl-reloc"),
    agencyID: readString(env, "RELOC_AGENCY", "GFZ"),
    pickAuthors: readList(env, "RELOC_PICK_AUTHORS", ["dlpicker"]),
    minDelay: readNumber(env, "RELOC_MIN_DELAY", 20 * 60),
    maxResidual: readNumber(env, "RELOC_MAX_RESIDUAL", 2.5),
    maxRMS: readNumber(env, "RELOC_MAX_RMS", 1.7),
    maxDelta: readNumber(env, "RELOC_MAX_DELTA", 105),
    minDepth: readNumber(env, "RELOC_MIN_DEPTH", 10),
    defaultDepth: readNumber(env, "RELOC_DEFAULT_DEPTH", 10),
    pickWindow: readNumber(env, "RELOC_PICK_WINDOW", 1800),
    fixedDepthRegions: regions
      ? parseFixedDepthRegions("RELOC_FIXED_DEPTH_REGIONS", regions)
      : DEFAULT_FIXED_DEPTH_REGIONS.map((region) => ({ ...region })),
    dryRun: readBoolean(env, "RELOC_DRY_RUN", false),
    statusPort: readNumber(env, "RELOC_STATUS_PORT", 0),
    logLevel: readLogLevel(env, "LOG_LEVEL"),
  };

  if (config.pickAuthors.length === 0) {
    throw new ConfigurationError("RELOC_PICK_AUTHORS must name at least one author");
  }
  if (config.minDelay < 0) {
    throw new ConfigurationError("RELOC_MIN_DELAY must not be negative");
  }
  return config;
}

export function loadRepickerConfig(env: Env = process.env): RepickerConfig {
  const workingDir = expandPath(readString(env, "REPICK_WORKING_DIR", "."));
  const config: RepickerConfig = {
    workingDir,
    eventRootDir: expandPath(readString(env, "REPICK_EVENT_DIR", join(workingDir, "events"))),
    spoolDir: expandPath(readString(env, "REPICK_SPOOL_DIR", join(workingDir, "spool"))),
    outgoingDir: expandPath(readString(env, "REPICK_OUTGOING_DIR", join(workingDir, "outgoing"))),
    annotDir: readString(env, "REPICK_ANNOT_DIR", "annot"),
    inferenceUrl: readString(env, "REPICK_INFERENCE_URL", "ws://localhost:18181"),
    model: readString(env, "REPICK_MODEL", "phasenet").toLowerCase(),
    dataset: readString(env, "REPICK_DATASET", "geofon"),
    device: readChoice<Device>(env, "REPICK_DEVICE", ["cpu", "gpu"], "cpu"),
    batchSize: readNumber(env, "REPICK_BATCH_SIZE", 50),
    minConfidence: readNumber(env, "REPICK_MIN_CONFIDENCE", 0.3),
    order: readChoice<MailboxOrder>(env, "REPICK_ORDER", ["prioritize-recent", "strict"], "prioritize-recent"),
    dryRun: readBoolean(env, "REPICK_DRY_RUN", false),
    exitWhenDone: readBoolean(env, "REPICK_EXIT", false),
    logLevel: readLogLevel(env, "LOG_LEVEL"),
  };

  if (!Number.isInteger(config.batchSize) || config.batchSize < 1) {
    throw new ConfigurationError("REPICK_BATCH_SIZE must be a positive integer");
  }
  return config;
}
