// Seismic Relocator - Arrival collection
// Gathers whitelisted picks around an origin, independent of any previous
// association, and turns them into arrivals for the solver.

import type { Catalog } from "./collaborators.js";
import { greatCircle } from "./geo.js";
import { stationIndex } from "./inventory.js";
import type { Logger } from "./logger.js";
import type { Arrival, Origin, StationInventory } from "./types.js";

/** Picks this long before origin time are still considered (clock errors). */
const PRE_ORIGIN_MARGIN_MS = 60 * 1000;

export interface ArrivalCollectorOptions {
  pickAuthors: string[];
  /** degrees */
  maxDelta: number;
  /** seconds after origin time */
  pickWindow: number;
}

export class ArrivalCollector {
  private readonly options: ArrivalCollectorOptions;
  private readonly catalog: Catalog;
  private readonly inventory: StationInventory;
  private readonly logger: Logger;

  constructor(options: ArrivalCollectorOptions, catalog: Catalog, inventory: StationInventory, logger: Logger) {
    this.options = options;
    this.catalog = catalog;
    this.inventory = inventory;
    this.logger = logger;
  }

  /** Returns a copy of `origin` whose arrivals reference every matching pick. */
  async collect(origin: Origin): Promise<Origin> {
    const t0 = origin.time.getTime();
    const picks = await this.catalog.fetchPicks({
      start: t0 - PRE_ORIGIN_MARGIN_MS,
      end: t0 + this.options.pickWindow * 1000,
      authors: this.options.pickAuthors,
    });

    const stations = stationIndex(this.inventory, t0);
    const authors = new Set(this.options.pickAuthors);
    const arrivals: Arrival[] = [];
    const seen = new Set<string>();

    for (const pick of picks) {
      if (seen.has(pick.publicID)) continue;
      if (pick.author !== undefined && !authors.has(pick.author)) continue;

      const station = stations.get(`${pick.networkCode}.${pick.stationCode}`);
      if (!station) continue;

      const { distance, azimuth } = greatCircle(origin.latitude, origin.longitude, station.latitude, station.longitude);
      if (distance > this.options.maxDelta) continue;

      seen.add(pick.publicID);
      arrivals.push({ pickID: pick.publicID, phase: pick.phaseHint, weight: 1, distance, azimuth });
    }

    this.logger.debug(`${origin.publicID}: ${arrivals.length} of ${picks.length} picks usable`);
    return { ...origin, arrivals };
  }
}
