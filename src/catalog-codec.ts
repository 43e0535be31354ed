// Seismic Relocator - Catalog codec
// Converts the JSON documents exchanged with remote collaborators into domain
// objects and back. Timestamps travel as ISO-8601 strings.

import { CollaboratorError } from "./errors.js";
import type {
  Annotation,
  Arrival,
  CatalogNotification,
  ChangeSet,
  CreationInfo,
  EvaluationMode,
  InventoryLocation,
  InventoryNetwork,
  InventoryStation,
  InventoryStream,
  Origin,
  Pick,
  SeismicEvent,
  StationInventory,
} from "./types.js";

type Json = Record<string, unknown>;

function isRecord(value: unknown): value is Json {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function fail(what: string, message: string): never {
  throw new CollaboratorError(what, message);
}

function record(value: unknown, what: string): Json {
  if (!isRecord(value)) fail(what, "expected an object");
  return value;
}

function array(value: unknown, what: string): unknown[] {
  if (!Array.isArray(value)) fail(what, "expected an array");
  return value;
}

function str(obj: Json, key: string, what: string): string {
  const v = obj[key];
  if (typeof v !== "string") fail(what, `${key} must be a string`);
  return v;
}

function optStr(obj: Json, key: string, what: string): string | undefined {
  const v = obj[key];
  if (v === undefined || v === null) return undefined;
  if (typeof v !== "string") fail(what, `${key} must be a string`);
  return v;
}

function num(obj: Json, key: string, what: string): number {
  const v = obj[key];
  if (typeof v !== "number" || !Number.isFinite(v)) fail(what, `${key} must be a finite number`);
  return v;
}

function optNum(obj: Json, key: string, what: string): number | undefined {
  const v = obj[key];
  if (v === undefined || v === null) return undefined;
  if (typeof v !== "number") fail(what, `${key} must be a number`);
  return v;
}

function epochMs(value: string, key: string, what: string): number {
  const ms = Date.parse(/[zZ]|[+-]\d\d:?\d\d$/.test(value) ? value : `${value}Z`);
  if (Number.isNaN(ms)) fail(what, `${key} is not a valid timestamp`);
  return ms;
}

function date(obj: Json, key: string, what: string): Date {
  return new Date(epochMs(str(obj, key, what), key, what));
}

function optEpoch(obj: Json, key: string, what: string): number | undefined {
  const v = optStr(obj, key, what);
  return v === undefined ? undefined : epochMs(v, key, what);
}

// ─── Decoders ───────────────────────────────────────────────────────────────────

export function decodeEvent(value: unknown): SeismicEvent {
  const what = "event";
  const obj = record(value, what);
  return {
    publicID: str(obj, "publicID", what),
    preferredOriginID: str(obj, "preferredOriginID", what),
    type: optStr(obj, "type", what),
  };
}

function decodeArrival(value: unknown): Arrival {
  const what = "arrival";
  const obj = record(value, what);
  return {
    pickID: optStr(obj, "pickID", what),
    phase: optStr(obj, "phase", what) ?? "P",
    weight: optNum(obj, "weight", what) ?? 1,
    distance: optNum(obj, "distance", what),
    azimuth: optNum(obj, "azimuth", what),
  };
}

function decodeCreationInfo(value: unknown): CreationInfo | undefined {
  if (value === undefined || value === null) return undefined;
  const what = "creationInfo";
  const obj = record(value, what);
  const creationTime = optEpoch(obj, "creationTime", what);
  return {
    author: optStr(obj, "author", what),
    agencyID: optStr(obj, "agencyID", what),
    creationTime: creationTime === undefined ? undefined : new Date(creationTime),
  };
}

function decodeEvaluationMode(value: string | undefined): EvaluationMode | undefined {
  switch (value) {
    case undefined:
      return undefined;
    case "automatic":
      return "automatic";
    case "manual":
      return "manual";
    default:
      return fail("origin", `unknown evaluationMode "${value}"`);
  }
}

export function decodeOrigin(value: unknown): Origin {
  const what = "origin";
  const obj = record(value, what);
  const quality = obj.quality === undefined || obj.quality === null ? {} : record(obj.quality, "origin.quality");
  const mode = decodeEvaluationMode(optStr(obj, "evaluationMode", what));
  const depthType = optStr(obj, "depthType", what);
  return {
    publicID: str(obj, "publicID", what),
    time: date(obj, "time", what),
    latitude: num(obj, "latitude", what),
    longitude: num(obj, "longitude", what),
    depth: num(obj, "depth", what),
    depthType: depthType === "fixed" ? "fixed" : "free",
    arrivals: obj.arrivals === undefined ? [] : array(obj.arrivals, "origin.arrivals").map(decodeArrival),
    quality: {
      standardError: optNum(quality, "standardError", "origin.quality"),
      usedPhaseCount: optNum(quality, "usedPhaseCount", "origin.quality"),
    },
    creationInfo: decodeCreationInfo(obj.creationInfo),
    evaluationMode: mode,
    evaluationStatus: optStr(obj, "evaluationStatus", what),
  };
}

export function decodePick(value: unknown): Pick {
  const what = "pick";
  const obj = record(value, what);
  return {
    publicID: str(obj, "publicID", what),
    networkCode: str(obj, "networkCode", what),
    stationCode: str(obj, "stationCode", what),
    locationCode: optStr(obj, "locationCode", what) ?? "",
    channelCode: str(obj, "channelCode", what),
    time: date(obj, "time", what),
    phaseHint: optStr(obj, "phaseHint", what) ?? "P",
    author: optStr(obj, "author", what),
  };
}

function decodeStream(value: unknown): InventoryStream {
  const obj = record(value, "stream");
  return { code: str(obj, "code", "stream"), start: optEpoch(obj, "start", "stream"), end: optEpoch(obj, "end", "stream") };
}

function decodeLocation(value: unknown): InventoryLocation {
  const what = "location";
  const obj = record(value, what);
  return {
    code: optStr(obj, "code", what) ?? "",
    start: optEpoch(obj, "start", what),
    end: optEpoch(obj, "end", what),
    streams: array(obj.streams ?? [], "location.streams").map(decodeStream),
  };
}

function decodeStation(value: unknown): InventoryStation {
  const what = "station";
  const obj = record(value, what);
  return {
    code: str(obj, "code", what),
    latitude: num(obj, "latitude", what),
    longitude: num(obj, "longitude", what),
    start: optEpoch(obj, "start", what),
    end: optEpoch(obj, "end", what),
    locations: array(obj.locations ?? [], "station.locations").map(decodeLocation),
  };
}

function decodeNetwork(value: unknown): InventoryNetwork {
  const what = "network";
  const obj = record(value, what);
  return {
    code: str(obj, "code", what),
    start: optEpoch(obj, "start", what),
    end: optEpoch(obj, "end", what),
    stations: array(obj.stations ?? [], "network.stations").map(decodeStation),
  };
}

export function decodeInventory(value: unknown): StationInventory {
  const obj = record(value, "inventory");
  return { networks: array(obj.networks, "inventory.networks").map(decodeNetwork) };
}

export function decodeNotification(value: unknown): CatalogNotification {
  const obj = record(value, "notification");
  const kind = str(obj, "kind", "notification");
  switch (kind) {
    case "event":
      return { kind: "event", event: decodeEvent(obj.object) };
    case "origin":
      return { kind: "origin", origin: decodeOrigin(obj.object) };
    default:
      return fail("notification", `unknown kind "${kind}"`);
  }
}

export function decodeAnnotation(value: unknown): Annotation {
  const what = "annotation";
  const obj = record(value, what);
  const data = array(obj.data, "annotation.data");
  if (!data.every((v): v is number => typeof v === "number")) {
    fail(what, "data must contain numbers only");
  }
  const samplingRate = num(obj, "samplingRate", what);
  if (samplingRate <= 0) fail(what, "samplingRate must be positive");
  return {
    network: str(obj, "network", what),
    station: str(obj, "station", what),
    location: optStr(obj, "location", what) ?? "",
    channel: str(obj, "channel", what),
    startTime: epochMs(str(obj, "startTime", what), "startTime", what),
    samplingRate,
    data,
  };
}

// ─── Encoders ───────────────────────────────────────────────────────────────────

export function encodeOrigin(origin: Origin): Json {
  const { creationInfo } = origin;
  return {
    ...origin,
    time: origin.time.toISOString(),
    creationInfo: creationInfo && {
      ...creationInfo,
      creationTime: creationInfo.creationTime?.toISOString(),
    },
  };
}

export function encodeChangeSet(changeSet: ChangeSet): Json {
  return { ...changeSet, origin: encodeOrigin(changeSet.origin) };
}
