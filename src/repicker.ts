// Seismic Relocator - Repicker
// Drains the mailbox: every payload is split into batches, the picks with
// usable waveforms are annotated by the onset model, and the resulting
// derived picks are written out for the next consumer.

import { deriveRepick, associateAnnotations, extractCandidates, gateCandidates } from "./annotation-associator.js";
import type { PhaseAnnotator } from "./annotator.js";
import { errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import type { MailboxQueue } from "./mailbox.js";
import { readPickPayload } from "./pick-payload.js";
import { PollLoop } from "./poll-loop.js";
import type { ResultPublisher } from "./result-publisher.js";
import { sliceBatches, type StreamAssembler } from "./stream-assembler.js";
import type { MailboxEntry, PickRecord } from "./types.js";

export const POLL_INTERVAL_MS = 1000;

export interface RepickerOptions {
  batchSize: number;
  minConfidence: number;
  dryRun: boolean;
  exitWhenDone: boolean;
  pollIntervalMs?: number;
}

export interface RepickerDeps {
  queue: MailboxQueue;
  assembler: StreamAssembler;
  annotator: PhaseAnnotator;
  publisher: ResultPublisher;
  logger: Logger;
}

export type EntryOutcome = "published" | "dry-run" | "empty" | "unreadable" | "failed";

/**
 * Derived picks already computed for one event, keyed by source pick ID.
 * An empty list means the pick was tried and yielded nothing.
 */
type EventWorkspace = Map<string, PickRecord[]>;

export class Repicker {
  private readonly options: RepickerOptions;
  private readonly deps: RepickerDeps;
  private readonly workspaces = new Map<string, EventWorkspace>();
  private loop: PollLoop | null = null;

  constructor(options: RepickerOptions, deps: RepickerDeps) {
    this.options = options;
    this.deps = deps;
  }

  /** One pass over the mailbox. Returns the outcome per visited entry, in order. */
  async poll(): Promise<Map<string, EntryOutcome>> {
    const { queue } = this.deps;
    await queue.ensure();
    const outcomes = new Map<string, EntryOutcome>();

    for (const entry of await queue.list()) {
      const outcome = await this.handleEntry(entry);
      outcomes.set(entry.name, outcome);
      if (queue.stopsAfterOneItem && outcome === "published") break;
    }
    return outcomes;
  }

  /**
   * Derived picks for those of `picks` not processed before for this event,
   * in payload order. Picks seen in an earlier payload yield nothing.
   */
  async repick(eventID: string, picks: readonly PickRecord[]): Promise<PickRecord[]> {
    const workspace = this.workspaceFor(eventID);
    const fresh = picks.filter((pick) => !workspace.has(pick.publicID));
    if (fresh.length < picks.length) {
      this.log("debug", `${eventID}: ${picks.length - fresh.length} picks already processed`);
    }

    for (const batch of sliceBatches(fresh, this.options.batchSize)) {
      const results = await this.processBatch(eventID, batch);
      for (const pick of batch) {
        workspace.set(pick.publicID, results.get(pick.publicID) ?? []);
      }
    }

    return fresh.flatMap((pick) => workspace.get(pick.publicID) ?? []);
  }

  /** Resolves when the loop ends: right after one pass in exit mode, otherwise on stop(). */
  async run(): Promise<void> {
    if (this.options.exitWhenDone) {
      await this.poll();
      return;
    }
    const loop = new PollLoop(
      async () => {
        await this.poll();
      },
      this.options.pollIntervalMs ?? POLL_INTERVAL_MS,
      this.deps.logger,
    );
    this.loop = loop;
    loop.start();
    await loop.whenStopped();
  }

  async stop(): Promise<void> {
    await this.loop?.stop();
  }

  // ─── Internals ──────────────────────────────────────────────────────────────

  private workspaceFor(eventID: string): EventWorkspace {
    let workspace = this.workspaces.get(eventID);
    if (!workspace) {
      workspace = new Map();
      this.workspaces.set(eventID, workspace);
    }
    return workspace;
  }

  private async handleEntry(entry: MailboxEntry): Promise<EntryOutcome> {
    let picks: PickRecord[];
    try {
      picks = await readPickPayload(entry.targetPath);
    } catch (err) {
      this.log("warn", `cannot read ${entry.name}: ${errorMessage(err)}`);
      return "unreadable";
    }

    let derived: PickRecord[];
    try {
      derived = await this.repick(entry.eventID, picks);
    } catch (err) {
      this.log("warn", `processing ${entry.name} failed, will retry: ${errorMessage(err)}`);
      return "failed";
    }

    if (derived.length === 0) {
      this.log("warn", `no repicks for ${entry.name}`);
      await this.deps.queue.acknowledge(entry);
      return "empty";
    }

    if (this.options.dryRun) {
      this.log("info", `dry run - ${derived.length} repicks for ${entry.name} not written`);
      return "dry-run";
    }

    await this.deps.publisher.publish(entry, derived);
    this.log("info", `${entry.name}: ${derived.length} repicks from ${picks.length} picks`);
    return "published";
  }

  /** One derived pick per surviving candidate, keyed by source pick ID. */
  private async processBatch(eventID: string, batch: PickRecord[]): Promise<Map<string, PickRecord[]>> {
    const { assembler, annotator, publisher, logger } = this.deps;
    const results = new Map<string, PickRecord[]>();

    const groups = await assembler.assemble(batch, eventID);
    if (groups.length === 0) return results;

    const annotations = await annotator.annotate(groups);
    const pairs = associateAnnotations(
      annotations,
      groups.map((g) => g.pick),
      logger,
    );
    if (!this.options.dryRun) {
      await publisher.writeAnnotations(eventID, pairs);
    }

    for (const pair of pairs) {
      const kept = gateCandidates(pair.pick, extractCandidates(pair), { minConfidence: this.options.minConfidence }, logger);
      if (kept.length === 0) continue;
      results.set(
        pair.pick.publicID,
        kept.map((candidate) => deriveRepick(pair.pick, candidate, annotator.spec.label)),
      );
    }
    return results;
  }

  private log(level: "debug" | "info" | "warn", message: string): void {
    this.deps.logger[level](message);
  }
}
