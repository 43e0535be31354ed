// Seismic Relocator - Station inventory traversal

import type {
  Epoch,
  InventoryLocation,
  InventoryNetwork,
  InventoryStation,
  InventoryStream,
  StationInventory,
} from "./types.js";

/**
 * An inventory item is operational at `time` (epoch ms) if its start is known
 * and not after `time`, and its end, when present, is not before `time`.
 */
export function operational(item: Epoch, time: number): boolean {
  if (item.start === undefined || time < item.start) return false;
  if (item.end !== undefined && time > item.end) return false;
  return true;
}

export interface StreamTuple {
  network: InventoryNetwork;
  station: InventoryStation;
  location: InventoryLocation;
  stream: InventoryStream;
}

/** Walks every stream; with `time` given, non-operational branches are pruned. */
export function* iterateStreams(inventory: StationInventory, time?: number): Generator<StreamTuple> {
  const keep = (item: Epoch) => time === undefined || operational(item, time);
  for (const network of inventory.networks) {
    if (!keep(network)) continue;
    for (const station of network.stations) {
      if (!keep(station)) continue;
      for (const location of station.locations) {
        if (!keep(location)) continue;
        for (const stream of location.streams) {
          if (!keep(stream)) continue;
          yield { network, station, location, stream };
        }
      }
    }
  }
}

/** Index of operational stations at `time`, keyed by "NET.STA". */
export function stationIndex(inventory: StationInventory, time: number): Map<string, InventoryStation> {
  const index = new Map<string, InventoryStation>();
  for (const { network, station } of iterateStreams(inventory, time)) {
    const key = `${network.code}.${station.code}`;
    if (!index.has(key)) index.set(key, station);
  }
  return index;
}
