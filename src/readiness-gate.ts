// Seismic Relocator - Event Readiness Gate
// Decides per pending event whether enough time has passed since origin time
// for picks to arrive from far stations, and whether the event qualifies at all.

import type { Catalog } from "./collaborators.js";
import { errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import { isQualified } from "./origin-utils.js";
import type { RelocatorState } from "./relocator-state.js";
import type { Origin, ReadinessVerdict } from "./types.js";

export interface ReadinessGateOptions {
  /** Own author; origins made by us are never relocated again. */
  author: string;
  /** seconds */
  minDelay: number;
  /** seconds */
  maxRMS: number;
}

export interface ReadinessGateDeps {
  catalog: Catalog;
  state: RelocatorState;
  logger: Logger;
  now?: () => number;
}

export class ReadinessGate {
  private readonly options: ReadinessGateOptions;
  private readonly deps: ReadinessGateDeps;
  private readonly now: () => number;

  constructor(options: ReadinessGateOptions, deps: ReadinessGateDeps) {
    this.options = options;
    this.deps = deps;
    this.now = deps.now ?? Date.now;
  }

  /**
   * Evaluates a pending event. Rejected events are dropped from the pending
   * set here; ready ones are left for the caller to dequeue and dispatch.
   */
  async evaluate(eventID: string): Promise<ReadinessVerdict> {
    const { state, logger } = this.deps;
    const event = state.pendingEvents.get(eventID);
    if (!event) {
      logger.error(`Missing event ${eventID}`);
      return "not-ready";
    }

    const origin = await this.preferredOrigin(event.preferredOriginID);
    if (!origin) return "not-ready";

    const dt = (this.now() - origin.time.getTime()) / 1000;
    if (dt < this.options.minDelay) return "not-ready";

    let author = origin.creationInfo?.author;
    if (author === undefined) {
      logger.warn(`Author missing in origin ${origin.publicID}`);
      author = "MISSING";
    }

    if (author === this.options.author) {
      logger.debug(`I made origin ${origin.publicID} (nothing to do)`);
      state.pendingEvents.delete(eventID);
      return "rejected";
    }

    if (!isQualified(origin, this.options.maxRMS)) {
      logger.debug(`Unqualified origin ${origin.publicID} rejected`);
      state.pendingEvents.delete(eventID);
      return "rejected";
    }

    return "ready";
  }

  private async preferredOrigin(originID: string): Promise<Origin | null> {
    const { state, catalog, logger } = this.deps;
    const cached = state.origins.get(originID);
    if (cached) return cached;

    logger.debug(`Loading origin ${originID}`);
    try {
      const origin = await catalog.fetchOrigin(originID);
      if (!origin) {
        logger.warn(`Origin ${originID} not found, retrying next cycle`);
        return null;
      }
      return state.cacheOrigin(origin);
    } catch (err) {
      logger.warn(`Failed to load origin ${originID}: ${errorMessage(err)}`);
      return null;
    }
  }
}
