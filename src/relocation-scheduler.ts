// Seismic Relocator - Relocation Scheduler
// Collects catalog notifications into the pending set and, once per tick,
// walks the pending events in ascending ID order: events that turn ready are
// dequeued and relocated one after another, never concurrently.

import type { Catalog } from "./collaborators.js";
import { errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import { isValidEvent } from "./origin-utils.js";
import { PollLoop } from "./poll-loop.js";
import type { ReadinessGate } from "./readiness-gate.js";
import type { RelocationController } from "./relocation-controller.js";
import type { RelocatorState } from "./relocator-state.js";
import type { AttemptReport, CatalogNotification } from "./types.js";

export const TICK_INTERVAL_MS = 1000;

export interface SchedulerSnapshot {
  pending: string[];
  lastSent: Record<string, string>;
}

export interface RelocationSchedulerDeps {
  gate: ReadinessGate;
  controller: RelocationController;
  state: RelocatorState;
  logger: Logger;
  intervalMs?: number;
  /** Called after each processed event, e.g. for status reporting. */
  onReport?: (report: AttemptReport) => void;
}

export class RelocationScheduler {
  private readonly deps: RelocationSchedulerDeps;
  private readonly loop: PollLoop;

  constructor(deps: RelocationSchedulerDeps) {
    this.deps = deps;
    this.loop = new PollLoop(
      async () => {
        await this.tick();
      },
      deps.intervalMs ?? TICK_INTERVAL_MS,
      deps.logger,
    );
  }

  /** Subscribes to the catalog's event and origin notifications. */
  attach(catalog: Catalog): void {
    catalog.subscribe((notification) => this.handleNotification(notification));
  }

  handleNotification(notification: CatalogNotification): void {
    const { state, logger } = this.deps;
    if (notification.kind === "event") {
      const { event } = notification;
      logger.debug(`Saving ${event.publicID}`);
      if (isValidEvent(event)) {
        state.pendingEvents.set(event.publicID, event);
      }
      return;
    }
    logger.debug(`Saving ${notification.origin.publicID}`);
    state.cacheOrigin(notification.origin);
  }

  /**
   * One sweep over the pending set. Reports of the events processed in this
   * sweep are returned in processing order.
   */
  async tick(): Promise<AttemptReport[]> {
    const { state, gate, logger } = this.deps;
    const reports: AttemptReport[] = [];

    for (const eventID of state.pendingIDs()) {
      const verdict = await gate.evaluate(eventID);
      if (verdict !== "ready") continue;
      state.pendingEvents.delete(eventID);
      reports.push(await this.runController(eventID));
    }
    if (reports.length > 0) logger.debug(`tick processed ${reports.length} event(s)`);
    return reports;
  }

  /** Processes the given events immediately, bypassing the readiness delay. */
  async processEvents(eventIDs: string[]): Promise<AttemptReport[]> {
    const reports: AttemptReport[] = [];
    for (const eventID of eventIDs) {
      reports.push(await this.runController(eventID));
    }
    return reports;
  }

  start(): void {
    this.deps.logger.info("Relocation scheduler started");
    this.loop.start();
  }

  async stop(): Promise<void> {
    await this.loop.stop();
    this.deps.logger.info("Relocation scheduler stopped");
  }

  snapshot(): SchedulerSnapshot {
    const { state } = this.deps;
    const lastSent: Record<string, string> = {};
    for (const [eventID, origin] of state.lastSent) {
      lastSent[eventID] = origin.publicID;
    }
    return { pending: state.pendingIDs(), lastSent };
  }

  private async runController(eventID: string): Promise<AttemptReport> {
    const { controller, logger, onReport } = this.deps;
    let report: AttemptReport;
    try {
      report = await controller.process(eventID);
    } catch (err) {
      logger.error(`${eventID}: unexpected failure: ${errorMessage(err)}`);
      report = { eventID, attempts: [{ status: "failed", phase: "load", reason: errorMessage(err) }], depthPhaseSkipped: null };
    }
    onReport?.(report);
    return report;
  }
}
