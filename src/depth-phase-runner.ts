// Seismic Relocator - Depth-phase runner
// Asks the depth-phase analyzer for an independent depth and keeps an
// operational log with one line per invocation.

import { appendFile, mkdir } from "node:fs/promises";
import { join } from "node:path";
import type { DepthPhaseAnalyzer } from "./collaborators.js";
import { errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";

export const DEPTH_LOG_NAME = "depth.log";

/** "YYYY-MM-DD HH:MM:SS" in UTC */
export function formatLogTime(date: Date): string {
  return date.toISOString().slice(0, 19).replace("T", " ");
}

export function formatDepthLine(time: Date, eventID: string, depth: number | null): string {
  const result = depth === null ? "depth computation failed" : `${depth.toFixed(1).padStart(5)} km`;
  return `${formatLogTime(time)} ${eventID}   ${result}\n`;
}

export class DepthPhaseRunner {
  private readonly analyzer: DepthPhaseAnalyzer;
  private readonly workingDir: string;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(analyzer: DepthPhaseAnalyzer, workingDir: string, logger: Logger, now: () => number = Date.now) {
    this.analyzer = analyzer;
    this.workingDir = workingDir;
    this.logger = logger;
    this.now = now;
  }

  get logPath(): string {
    return join(this.workingDir, DEPTH_LOG_NAME);
  }

  async computeDepth(eventID: string): Promise<number | null> {
    this.logger.debug(`Computing depth for event ${eventID}`);
    let depth: number | null;
    try {
      depth = await this.analyzer.computeDepth(eventID);
      if (depth !== null && !Number.isFinite(depth)) depth = null;
    } catch (err) {
      this.logger.warn(`Depth-phase analysis for ${eventID} threw: ${errorMessage(err)}`);
      depth = null;
    }

    if (depth !== null) {
      this.logger.info(`DEPTH=${depth.toFixed(1)}`);
    } else {
      this.logger.error(`DEPTH COMPUTATION FAILED for ${eventID}`);
    }

    try {
      await mkdir(this.workingDir, { recursive: true });
      await appendFile(this.logPath, formatDepthLine(new Date(this.now()), eventID, depth), "utf-8");
    } catch (err) {
      this.logger.warn(`Could not append to ${this.logPath}: ${errorMessage(err)}`);
    }
    return depth;
  }
}
