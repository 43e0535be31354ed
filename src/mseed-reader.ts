/**
 * miniSEED (v2) header scanner.
 *
 * Only the fixed section of the data header and blockette 1000 are decoded;
 * sample payloads are left to the model backend. This is enough to find the
 * time span covered by a waveform file.
 *
 * Fixed header layout (48 bytes):
 *   [0..5]  sequence number     [6] quality indicator (D/R/Q/M)
 *   [20..29] BTIME start time   [30] number of samples (uint16)
 *   [32] sample rate factor     [34] sample rate multiplier (int16)
 *   [36] activity flags         [40] time correction (int32, 0.0001 s)
 *   [46] offset of first blockette
 */

import { readFile } from "node:fs/promises";
import type { WaveformSpan } from "./types.js";

const FIXED_HEADER_SIZE = 48;
const DEFAULT_RECORD_LENGTH = 512;
const BLOCKETTE_1000 = 1000;
const QUALITY_INDICATORS = new Set(["D", "R", "Q", "M"]);
/** Activity flag bit: time correction already applied to the start time. */
const TIME_CORRECTION_APPLIED = 0x02;

export interface WaveformReader {
  readSpan(path: string): Promise<WaveformSpan>;
}

export interface RecordHeader {
  /** epoch ms of the first sample */
  startTime: number;
  sampleCount: number;
  /** Hz, 0 for records without samples */
  sampleRate: number;
  recordLength: number;
  littleEndian: boolean;
}

export function sampleRateFrom(factor: number, multiplier: number): number {
  if (factor === 0 || multiplier === 0) return 0;
  if (factor > 0 && multiplier > 0) return factor * multiplier;
  if (factor > 0 && multiplier < 0) return -factor / multiplier;
  if (factor < 0 && multiplier > 0) return -multiplier / factor;
  return 1 / (factor * multiplier);
}

function isPlausibleYear(year: number): boolean {
  return year >= 1900 && year <= 2100;
}

/** Decodes the record header starting at `offset`. */
export function decodeRecordHeader(buf: Buffer, offset: number): RecordHeader {
  if (offset + FIXED_HEADER_SIZE > buf.length) {
    throw new Error(`truncated record header at offset ${offset}`);
  }
  const indicator = String.fromCharCode(buf[offset + 6]);
  if (!QUALITY_INDICATORS.has(indicator)) {
    throw new Error(`not a miniSEED data record at offset ${offset}`);
  }

  const yearBE = buf.readUInt16BE(offset + 20);
  const littleEndian = !isPlausibleYear(yearBE);
  const u16 = (at: number) => (littleEndian ? buf.readUInt16LE(offset + at) : buf.readUInt16BE(offset + at));
  const i16 = (at: number) => (littleEndian ? buf.readInt16LE(offset + at) : buf.readInt16BE(offset + at));
  const i32 = (at: number) => (littleEndian ? buf.readInt32LE(offset + at) : buf.readInt32BE(offset + at));

  const year = u16(20);
  if (!isPlausibleYear(year)) {
    throw new Error(`implausible start year at offset ${offset}`);
  }
  const day = u16(22);
  const hour = buf[offset + 24];
  const minute = buf[offset + 25];
  const second = buf[offset + 26];
  const fract = u16(28);

  let startTime =
    Date.UTC(year, 0, 1) + (day - 1) * 86_400_000 + hour * 3_600_000 + minute * 60_000 + second * 1000 + fract / 10;

  const activityFlags = buf[offset + 36];
  const correction = i32(40);
  if (correction !== 0 && (activityFlags & TIME_CORRECTION_APPLIED) === 0) {
    startTime += correction / 10;
  }

  let recordLength = DEFAULT_RECORD_LENGTH;
  let blockette = u16(46);
  const seen = new Set<number>();
  while (blockette !== 0 && offset + blockette + 4 <= buf.length && !seen.has(blockette)) {
    seen.add(blockette);
    const type = u16(blockette);
    if (type === BLOCKETTE_1000 && offset + blockette + 7 <= buf.length) {
      recordLength = 2 ** buf[offset + blockette + 6];
      break;
    }
    blockette = u16(blockette + 2);
  }

  return {
    startTime,
    sampleCount: u16(30),
    sampleRate: sampleRateFrom(i16(32), i16(34)),
    recordLength,
    littleEndian,
  };
}

/**
 * Time span of all records in `buf`, from the first sample of the earliest
 * record to the last sample of the latest one.
 */
export function scanSpan(buf: Buffer): WaveformSpan {
  let startTime = Infinity;
  let endTime = -Infinity;
  let offset = 0;

  while (offset + FIXED_HEADER_SIZE <= buf.length) {
    const header = decodeRecordHeader(buf, offset);
    if (header.sampleCount > 0 && header.sampleRate > 0) {
      const last = header.startTime + ((header.sampleCount - 1) * 1000) / header.sampleRate;
      startTime = Math.min(startTime, header.startTime);
      endTime = Math.max(endTime, last);
    }
    offset += header.recordLength;
  }

  if (!Number.isFinite(startTime)) {
    throw new Error("no data records with samples");
  }
  return { startTime, endTime };
}

export class MseedHeaderReader implements WaveformReader {
  async readSpan(path: string): Promise<WaveformSpan> {
    return scanSpan(await readFile(path));
  }
}
