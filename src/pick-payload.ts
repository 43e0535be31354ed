// Seismic Relocator - Pick payload files
// Reading and writing the ordered pick lists referenced by mailbox links.

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { PayloadError } from "./errors.js";
import type { PickRecord } from "./types.js";

export const DEFAULT_PHASE_HINT = "P";

/** Formats epoch ms as ISO-8601 with milliseconds and a "Z" suffix. */
export function formatPickTime(ms: number): string {
  return new Date(Math.floor(ms)).toISOString();
}

/** Parses an ISO-8601 timestamp; one without a zone designator is taken as UTC. */
export function parsePickTime(value: string): number {
  const hasZone = /[zZ]$|[+-]\d\d:?\d\d$/.test(value);
  return Date.parse(hasZone ? value : `${value}Z`);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validates one raw entry. Stream codes absent from the record are taken
 * from its "NET.STA.LOC.CHA" stream ID.
 */
export function toPickRecord(raw: unknown, path: string, index: number): PickRecord {
  if (!isRecord(raw)) {
    throw new PayloadError(path, `entry ${index} is not an object`);
  }
  const { streamID, publicID, time, phaseHint } = raw;
  if (typeof streamID !== "string" || typeof publicID !== "string" || typeof time !== "string") {
    throw new PayloadError(path, `entry ${index} lacks streamID, publicID or time`);
  }
  if (Number.isNaN(parsePickTime(time))) {
    throw new PayloadError(path, `entry ${index} has an invalid time "${time}"`);
  }
  const parts = streamID.split(".");
  if (parts.length !== 4) {
    throw new PayloadError(path, `entry ${index} has malformed streamID "${streamID}"`);
  }
  const code = (key: string, fallback: string): string => {
    const value = raw[key];
    return typeof value === "string" ? value : fallback;
  };
  const record: PickRecord = {
    publicID,
    streamID,
    networkCode: code("networkCode", parts[0]),
    stationCode: code("stationCode", parts[1]),
    locationCode: code("locationCode", parts[2]),
    channelCode: code("channelCode", parts[3]),
    time,
    phaseHint: typeof phaseHint === "string" && phaseHint.length > 0 ? phaseHint : DEFAULT_PHASE_HINT,
  };
  if (typeof raw.model === "string") record.model = raw.model;
  if (typeof raw.confidence === "number") record.confidence = raw.confidence;
  for (const [key, value] of Object.entries(raw)) {
    if (!(key in record) && key !== "model" && key !== "confidence") record[key] = value;
  }
  return record;
}

/** Drops records repeating an earlier stream ID; the first occurrence wins. */
export function dedupeByStream(picks: PickRecord[]): PickRecord[] {
  const seen = new Set<string>();
  return picks.filter((pick) => {
    if (seen.has(pick.streamID)) return false;
    seen.add(pick.streamID);
    return true;
  });
}

export function parsePickPayload(text: string, path: string): PickRecord[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new PayloadError(path, "not valid JSON");
  }
  if (!Array.isArray(parsed)) {
    throw new PayloadError(path, "expected a JSON array of picks");
  }
  return dedupeByStream(parsed.map((raw, index) => toPickRecord(raw, path, index)));
}

export async function readPickPayload(path: string): Promise<PickRecord[]> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (err) {
    throw new PayloadError(path, err instanceof Error ? err.message : String(err));
  }
  return parsePickPayload(text, path);
}

export async function writePickPayload(path: string, picks: PickRecord[]): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, JSON.stringify(picks, null, 2) + "\n", "utf-8");
}
