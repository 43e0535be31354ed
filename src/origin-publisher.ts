// Seismic Relocator - Origin Publisher
// Sends an accepted relocation to the catalog as one change-set and records
// it as the new improvement baseline for its event.

import type { Catalog } from "./collaborators.js";
import type { Logger } from "./logger.js";
import type { RelocatorState } from "./relocator-state.js";
import type { ChangeSet, Origin, SeismicEvent } from "./types.js";

export interface PublishResult {
  changeSet: ChangeSet;
  /** false in dry-run mode or when the catalog refused the change-set */
  sent: boolean;
}

export function buildChangeSet(event: SeismicEvent, origin: Origin): ChangeSet {
  return {
    eventID: event.publicID,
    origin,
    originReference: { eventID: event.publicID, originID: origin.publicID },
  };
}

export class OriginPublisher {
  private readonly catalog: Catalog;
  private readonly state: RelocatorState;
  private readonly logger: Logger;
  private readonly dryRun: boolean;

  constructor(catalog: Catalog, state: RelocatorState, logger: Logger, dryRun: boolean) {
    this.catalog = catalog;
    this.state = state;
    this.logger = logger;
    this.dryRun = dryRun;
  }

  /** Baseline is updated after every publication, sent or not. */
  async publish(event: SeismicEvent, origin: Origin): Promise<PublishResult> {
    const changeSet = buildChangeSet(event, origin);
    let sent = false;

    if (this.dryRun) {
      this.logger.info(`dry run - not sending ${origin.publicID}`);
    } else {
      sent = await this.catalog.send(changeSet);
      if (sent) this.logger.info(`sent ${origin.publicID}`);
      else this.logger.warn(`failed to send ${origin.publicID}`);
    }

    this.state.lastSent.set(event.publicID, origin);
    return { changeSet, sent };
  }
}
