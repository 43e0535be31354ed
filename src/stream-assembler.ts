// Seismic Relocator - Batch & Stream Assembler
// Splits a pick list into bounded batches and finds the three waveform
// components each pick needs. Picks without complete, long-enough data are
// dropped for good.

import { access } from "node:fs/promises";
import { join } from "node:path";
import { ConfigurationError, errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import type { WaveformReader } from "./mseed-reader.js";
import type { ComponentGroup, ComponentName, PickRecord, WaveformSpan } from "./types.js";

export const WAVEFORM_DIR = "waveforms";
export const WAVEFORM_EXTENSION = ".mseed";

/** Accepted suffix letters per component, in order of preference. */
export const COMPONENT_SUFFIXES: Readonly<Record<ComponentName, readonly string[]>> = {
  Z: ["Z"],
  N: ["N", "1"],
  E: ["E", "2"],
};

const COMPONENTS: readonly ComponentName[] = ["Z", "N", "E"];

export function sliceBatches<T>(items: readonly T[], batchSize: number): T[][] {
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new ConfigurationError(`batch size must be a positive integer, got ${batchSize}`);
  }
  const batches: T[][] = [];
  for (let start = 0; start < items.length; start += batchSize) {
    batches.push(items.slice(start, start + batchSize));
  }
  return batches;
}

/** "NET.STA.LOC.CH": the stream ID without the component letter of its channel. */
export function streamPrefix(pick: PickRecord): string {
  return `${pick.networkCode}.${pick.stationCode}.${pick.locationCode}.${pick.channelCode.slice(0, 2)}`;
}

export function componentFileNames(pick: PickRecord, component: ComponentName): string[] {
  const prefix = streamPrefix(pick);
  return COMPONENT_SUFFIXES[component].map((suffix) => `${prefix}${suffix}${WAVEFORM_EXTENSION}`);
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export interface StreamAssemblerOptions {
  eventRootDir: string;
  /** seconds of data the model needs per input window */
  inputLengthSeconds: number;
}

export class StreamAssembler {
  private readonly options: StreamAssemblerOptions;
  private readonly reader: WaveformReader;
  private readonly logger: Logger;

  constructor(options: StreamAssemblerOptions, reader: WaveformReader, logger: Logger) {
    this.options = options;
    this.reader = reader;
    this.logger = logger;
  }

  waveformDir(eventID: string): string {
    return join(this.options.eventRootDir, eventID, WAVEFORM_DIR);
  }

  /** Groups for the picks whose three components are present and long enough. */
  async assemble(picks: readonly PickRecord[], eventID: string): Promise<ComponentGroup[]> {
    const groups: ComponentGroup[] = [];
    for (const pick of picks) {
      const group = await this.assembleOne(pick, eventID);
      if (group) groups.push(group);
    }
    if (groups.length === 0) {
      this.logger.debug(`Empty stream for event ${eventID}`);
    }
    return groups;
  }

  private async locate(pick: PickRecord, eventID: string): Promise<Partial<Record<ComponentName, string>>> {
    const dir = this.waveformDir(eventID);
    const found: Partial<Record<ComponentName, string>> = {};
    for (const component of COMPONENTS) {
      for (const name of componentFileNames(pick, component)) {
        const path = join(dir, name);
        if (await exists(path)) {
          found[component] = path;
          break;
        }
      }
    }
    return found;
  }

  private async assembleOne(pick: PickRecord, eventID: string): Promise<ComponentGroup | null> {
    const { Z, N, E } = await this.locate(pick, eventID);
    if (!Z && !N && !E) {
      this.logger.debug(`${pick.publicID}: no waveform data, skipped`);
      return null;
    }
    if (!Z || !N || !E) {
      this.logger.debug(`${pick.publicID}: missing components, skipped`);
      return null;
    }

    const files: Record<ComponentName, string> = { Z, N, E };
    const spans: Partial<Record<ComponentName, WaveformSpan>> = {};
    for (const component of COMPONENTS) {
      try {
        spans[component] = await this.reader.readSpan(files[component]);
      } catch (err) {
        this.logger.warn(`${pick.publicID}: cannot read ${files[component]}: ${errorMessage(err)}`);
        return null;
      }
    }

    const required = this.options.inputLengthSeconds;
    for (const component of COMPONENTS) {
      const span = spans[component];
      if (!span) return null;
      const length = (span.endTime - span.startTime) / 1000;
      if (length < required) {
        this.logger.warn(
          `Trace ${streamPrefix(pick)}${component}: length ${length.toFixed(2)}s is too short. ` +
            `Picker needs ${required.toFixed(2)}s.`,
        );
        return null;
      }
    }

    const { Z: spanZ, N: spanN, E: spanE } = spans;
    if (!spanZ || !spanN || !spanE) return null;
    return { pick, files, spans: { Z: spanZ, N: spanN, E: spanE } };
  }
}
