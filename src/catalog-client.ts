// Seismic Relocator - Remote collaborators
// Catalog, relocation solver and depth-phase analyzer reached through one
// RPC connection. Responses are validated before they enter the pipeline.

import {
  decodeEvent,
  decodeInventory,
  decodeNotification,
  decodeOrigin,
  decodePick,
  encodeChangeSet,
  encodeOrigin,
} from "./catalog-codec.js";
import type { Catalog, DepthPhaseAnalyzer, PickQuery, Relocator } from "./collaborators.js";
import { CollaboratorError, errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import type { RpcConnection } from "./rpc-connection.js";
import type {
  CatalogNotification,
  ChangeSet,
  Origin,
  Pick,
  RelocationRequest,
  SeismicEvent,
  StationInventory,
} from "./types.js";

export class CatalogClient implements Catalog {
  private readonly rpc: RpcConnection;
  private readonly logger: Logger;

  constructor(rpc: RpcConnection, logger: Logger) {
    this.rpc = rpc;
    this.logger = logger;
  }

  subscribe(handler: (notification: CatalogNotification) => void): void {
    this.rpc.onNotification((message) => {
      let notification: CatalogNotification;
      try {
        notification = decodeNotification(message);
      } catch (err) {
        this.logger.warn(`Dropping notification: ${errorMessage(err)}`);
        return;
      }
      handler(notification);
    });
  }

  async fetchEvent(eventID: string): Promise<SeismicEvent | null> {
    const result = await this.rpc.request("catalog.getEvent", { eventID });
    return result === null ? null : decodeEvent(result);
  }

  async fetchOrigin(originID: string): Promise<Origin | null> {
    const result = await this.rpc.request("catalog.getOrigin", { originID, withArrivals: false });
    return result === null ? null : decodeOrigin(result);
  }

  async fetchPicks(query: PickQuery): Promise<Pick[]> {
    const result = await this.rpc.request("catalog.getPicks", {
      start: new Date(query.start).toISOString(),
      end: new Date(query.end).toISOString(),
      authors: query.authors,
    });
    if (!Array.isArray(result)) throw new CollaboratorError("catalog.getPicks", "expected an array");
    return result.map(decodePick);
  }

  async fetchInventory(): Promise<StationInventory> {
    return decodeInventory(await this.rpc.request("catalog.getInventory", {}));
  }

  async send(changeSet: ChangeSet): Promise<boolean> {
    const result = await this.rpc.request("catalog.send", encodeChangeSet(changeSet));
    return result === true;
  }
}

export class RemoteRelocator implements Relocator {
  private readonly rpc: RpcConnection;

  constructor(rpc: RpcConnection) {
    this.rpc = rpc;
  }

  async relocate(request: RelocationRequest): Promise<Origin | null> {
    const result = await this.rpc.request("relocation.relocate", {
      ...request,
      origin: encodeOrigin(request.origin),
    });
    return result === null ? null : decodeOrigin(result);
  }
}

export class RemoteDepthAnalyzer implements DepthPhaseAnalyzer {
  private readonly rpc: RpcConnection;

  constructor(rpc: RpcConnection) {
    this.rpc = rpc;
  }

  async computeDepth(eventID: string): Promise<number | null> {
    const result = await this.rpc.request("depth.compute", { eventID });
    if (result === null) return null;
    if (typeof result !== "number") throw new CollaboratorError("depth.compute", "expected a number or null");
    return result;
  }
}
