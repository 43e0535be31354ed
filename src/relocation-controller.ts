// Seismic Relocator - Relocation Attempt Controller
// Runs the two-phase relocation of one ready event:
//   direct       → whitelisted picks, fixed-depth directive, scored before publication
//   depth-phase  → direct result re-run at the depth-phase depth, published unscored

import type { ArrivalCollector } from "./arrival-collector.js";
import type { Catalog, Relocator } from "./collaborators.js";
import type { DepthPhaseRunner } from "./depth-phase-runner.js";
import { errorMessage } from "./errors.js";
import { directiveDepth, fixedDepthDirective, type FixedDepthOptions } from "./fixed-depth.js";
import { improvementScore, improves } from "./improvement-evaluator.js";
import type { Logger } from "./logger.js";
import type { OriginPublisher } from "./origin-publisher.js";
import { arrivalCount, creationInfo, summarize } from "./origin-utils.js";
import type { RelocatorState } from "./relocator-state.js";
import type {
  AttemptOutcome,
  AttemptPhase,
  AttemptReport,
  FixedDepthDirective,
  Origin,
  SeismicEvent,
} from "./types.js";

/** A relocation with fewer arrivals is discarded. */
export const MIN_ARRIVALS = 5;
/** The depth-phase attempt is reserved for well-recorded events... */
export const DEPTH_PHASE_MIN_ARRIVALS = 50;
/** ...that are not deep (km). */
export const DEPTH_PHASE_MAX_DEPTH = 120;

export interface RelocationControllerOptions extends FixedDepthOptions {
  author: string;
  /** km */
  minDepth: number;
  /** seconds */
  maxResidual: number;
}

export interface RelocationControllerDeps {
  catalog: Catalog;
  relocator: Relocator;
  collector: ArrivalCollector;
  depthRunner: DepthPhaseRunner;
  publisher: OriginPublisher;
  state: RelocatorState;
  logger: Logger;
  now?: () => number;
}

type PhaseResult = { ok: true; origin: Origin } | { ok: false; outcome: AttemptOutcome };

/**
 * Returns the reason the depth-phase attempt is skipped, or null when all
 * preconditions hold.
 */
export function depthPhaseSkipReason(direct: Origin, depth: number | null): string | null {
  if (depth === null) return "no depth from depth phases";
  if (arrivalCount(direct) < DEPTH_PHASE_MIN_ARRIVALS) return "too few picks";
  if (direct.depth > DEPTH_PHASE_MAX_DEPTH) return `depth > ${DEPTH_PHASE_MAX_DEPTH}`;
  return null;
}

export class RelocationController {
  private readonly options: RelocationControllerOptions;
  private readonly deps: RelocationControllerDeps;
  private readonly now: () => number;

  constructor(options: RelocationControllerOptions, deps: RelocationControllerDeps) {
    this.options = options;
    this.deps = deps;
    this.now = deps.now ?? Date.now;
  }

  async process(eventID: string): Promise<AttemptReport> {
    const { logger } = this.deps;
    const report: AttemptReport = { eventID, attempts: [], depthPhaseSkipped: null };

    const loaded = await this.load(eventID);
    if ("reason" in loaded) {
      logger.warn(`${eventID}: ${loaded.reason}`);
      report.attempts.push({ status: "failed", phase: "load", reason: loaded.reason });
      return report;
    }
    const { event, origin } = loaded;

    // ── direct ──
    const directive = fixedDepthDirective(origin, this.options);
    logger.debug(describeDirective(directive));

    let input: Origin;
    try {
      input = await this.deps.collector.collect(origin);
    } catch (err) {
      const reason = `arrival collection failed: ${errorMessage(err)}`;
      logger.warn(`${eventID}: ${reason}`);
      report.attempts.push({ status: "failed", phase: "direct", reason });
      return report;
    }
    logger.debug(`arrivalCount=${arrivalCount(input)}`);

    const direct = await this.attempt(eventID, "direct", input, directiveDepth(directive));
    if (!direct.ok) {
      report.attempts.push(direct.outcome);
      return report;
    }

    const previous = this.deps.state.lastSent.get(eventID);
    if (previous) {
      const { count1, count2, rms1, rms2, score } = improvementScore(previous, direct.origin);
      logger.debug(`count ${count1} -> ${count2}, rms ${rms1.toFixed(1)} -> ${rms2.toFixed(1)}`);
      if (score !== null) logger.debug(`improvement ${score.toFixed(3)}`);
    }
    if (!improves(previous, direct.origin)) {
      logger.info(`${eventID}: no improvement - origin not sent`);
      report.attempts.push({ status: "suppressed", phase: "direct", origin: direct.origin });
      return report;
    }

    const directPublished = await this.publish(event, "direct", direct.origin);
    report.attempts.push(directPublished);
    if (directPublished.status !== "published") return report;

    // ── depth-phase ──
    const depth = await this.deps.depthRunner.computeDepth(eventID);
    const skip = depthPhaseSkipReason(direct.origin, depth);
    if (skip !== null || depth === null) {
      logger.debug(`no depth phase based attempt (${skip})`);
      report.depthPhaseSkipped = skip;
      return report;
    }

    const refined = await this.attempt(eventID, "depth-phase", direct.origin, depth);
    if (!refined.ok) {
      report.attempts.push(refined.outcome);
      return report;
    }
    report.attempts.push(await this.publish(event, "depth-phase", refined.origin));
    return report;
  }

  private async load(eventID: string): Promise<{ event: SeismicEvent; origin: Origin } | { reason: string }> {
    const { catalog, state, logger } = this.deps;
    try {
      const event = await catalog.fetchEvent(eventID);
      if (!event) return { reason: `failed to load event ${eventID}` };
      logger.debug(`Loaded event ${eventID}`);

      const cached = state.origins.get(event.preferredOriginID);
      const origin = cached ?? (await catalog.fetchOrigin(event.preferredOriginID));
      if (!origin) return { reason: `failed to load origin ${event.preferredOriginID}` };
      logger.debug(`Loaded origin ${origin.publicID}`);
      return { event, origin: state.cacheOrigin(origin) };
    } catch (err) {
      return { reason: `loading failed: ${errorMessage(err)}` };
    }
  }

  private async attempt(
    eventID: string,
    phase: AttemptPhase,
    input: Origin,
    fixedDepth: number | null,
  ): Promise<PhaseResult> {
    const { relocator, state, logger } = this.deps;
    const fail = (reason: string): PhaseResult => ({ ok: false, outcome: { status: "failed", phase, reason } });

    let relocated: Origin | null;
    try {
      relocated = await relocator.relocate({
        eventID,
        origin: input,
        fixedDepth,
        minDepth: this.options.minDepth,
        maxResidual: this.options.maxResidual,
      });
    } catch (err) {
      logger.warn(`${eventID}: ${phase} relocation threw: ${errorMessage(err)}`);
      return fail(`relocation error: ${errorMessage(err)}`);
    }

    if (!relocated) {
      logger.warn(`${eventID}: relocation failed`);
      return fail("relocation failed");
    }
    if (arrivalCount(relocated) < MIN_ARRIVALS) {
      logger.info(`${eventID}: too few arrivals`);
      return fail("too few arrivals");
    }

    const stamped: Origin = {
      ...relocated,
      creationInfo: creationInfo(this.options.author, this.options.agencyID, new Date(this.now())),
      evaluationMode: "automatic",
    };
    state.cacheOrigin(stamped);
    logger.info(`${eventID} [${phase}] ${summarize(stamped)}`);
    return { ok: true, origin: stamped };
  }

  private async publish(event: SeismicEvent, phase: AttemptPhase, origin: Origin): Promise<AttemptOutcome> {
    try {
      await this.deps.publisher.publish(event, origin);
      return { status: "published", phase, origin };
    } catch (err) {
      this.deps.logger.warn(`${event.publicID}: publishing ${origin.publicID} failed: ${errorMessage(err)}`);
      return { status: "failed", phase, reason: `publication error: ${errorMessage(err)}` };
    }
  }
}

function describeDirective(directive: FixedDepthDirective): string {
  return directive.kind === "free"
    ? "not fixing depth"
    : `setting fixed depth to ${directive.depth} km (${directive.kind})`;
}
