import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { WebSocketServer, type WebSocket } from "ws";
import { CatalogClient, RemoteDepthAnalyzer, RemoteRelocator } from "./catalog-client.js";
import { CollaboratorError } from "./errors.js";
import type { Logger } from "./logger.js";
import { RpcConnection } from "./rpc-connection.js";
import type { CatalogNotification, Origin } from "./types.js";

// ─── Test Helpers ─────────────────────────────────────────────────────────────

function createSilentLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

interface Request {
  id: string;
  method: string;
  params: Record<string, unknown>;
}

type Handler = (request: Request) => { result?: unknown; error?: string } | null;

/** In-process stand-in for the remote side. A null handler result sends nothing. */
class FakeRemote {
  readonly server: WebSocketServer;
  readonly requests: Request[] = [];
  readonly sockets: WebSocket[] = [];
  handler: Handler = () => ({ result: null });

  constructor() {
    this.server = new WebSocketServer({ port: 0, host: "127.0.0.1" });
    this.server.on("connection", (socket) => {
      this.sockets.push(socket);
      socket.on("message", (data) => {
        const request: Request = JSON.parse(data.toString());
        this.requests.push(request);
        const reply = this.handler(request);
        if (reply) socket.send(JSON.stringify({ id: request.id, ...reply }));
      });
    });
  }

  async listening(): Promise<string> {
    await new Promise<void>((resolve) => {
      if (this.server.address()) resolve();
      else this.server.once("listening", () => resolve());
    });
    const address = this.server.address();
    if (typeof address !== "object" || address === null) throw new Error("server has no port");
    return `ws://127.0.0.1:${address.port}`;
  }

  broadcast(message: unknown): void {
    for (const socket of this.sockets) socket.send(JSON.stringify(message));
  }

  close(): Promise<void> {
    for (const socket of this.sockets) socket.terminate();
    return new Promise((resolve) => this.server.close(() => resolve()));
  }
}

const ORIGIN_DOC = {
  publicID: "Origin/1",
  time: "2024-03-01T12:00:00Z",
  latitude: 1,
  longitude: 2,
  depth: 10,
};

// ─── Tests ────────────────────────────────────────────────────────────────────

describe("RpcConnection and remote collaborators", () => {
  let remote: FakeRemote;
  let rpc: RpcConnection;
  let logger: Logger;

  beforeEach(async () => {
    remote = new FakeRemote();
    logger = createSilentLogger();
    rpc = new RpcConnection(await remote.listening(), logger);
    await rpc.connect();
  });

  afterEach(async () => {
    await rpc.close();
    await remote.close();
  });

  it("sends requests with unique ids and resolves results", async () => {
    remote.handler = (req) => ({ result: { echo: req.method } });
    const [a, b] = await Promise.all([rpc.request("one", {}), rpc.request("two", {})]);
    expect(a).toEqual({ echo: "one" });
    expect(b).toEqual({ echo: "two" });
    expect(remote.requests[0].id).not.toBe(remote.requests[1].id);
    expect(remote.requests[0].id).toMatch(/^[0-9a-f-]{36}$/);
  });

  it("rejects with a collaborator error when the remote reports one", async () => {
    remote.handler = () => ({ error: "no such event" });
    await expect(rpc.request("catalog.getEvent", {})).rejects.toThrow("catalog.getEvent: no such event");
  });

  it("rejects pending requests when the connection closes", async () => {
    remote.handler = () => null;
    const pending = rpc.request("relocation.relocate", {});
    await new Promise((resolve) => setTimeout(resolve, 20));
    for (const socket of remote.sockets) socket.terminate();
    await expect(pending).rejects.toBeInstanceOf(CollaboratorError);
  });

  it("reports a connection dropped by the remote side", async () => {
    const lost = rpc.whenLost();
    for (const socket of remote.sockets) socket.terminate();
    const err = await lost;
    expect(err).toBeInstanceOf(CollaboratorError);
    expect(err.message).toContain("closed");
    expect(rpc.connected).toBe(false);
  });

  it("does not report a connection it closed itself", async () => {
    const lost = vi.fn();
    void rpc.whenLost().then(lost);
    await rpc.close();
    await new Promise((resolve) => setTimeout(resolve, 20));
    expect(lost).not.toHaveBeenCalled();
  });

  it("fetches and decodes catalog objects", async () => {
    remote.handler = (req) => {
      switch (req.method) {
        case "catalog.getEvent":
          return { result: { publicID: req.params.eventID, preferredOriginID: "Origin/1" } };
        case "catalog.getOrigin":
          return { result: ORIGIN_DOC };
        case "catalog.getPicks":
          return { result: [] };
        case "catalog.send":
          return { result: true };
        default:
          return { error: "unknown method" };
      }
    };
    const catalog = new CatalogClient(rpc, logger);

    expect(await catalog.fetchEvent("ev1")).toEqual({ publicID: "ev1", preferredOriginID: "Origin/1", type: undefined });
    const origin = await catalog.fetchOrigin("Origin/1");
    expect(origin?.time.toISOString()).toBe("2024-03-01T12:00:00.000Z");
    expect(remote.requests[1].params).toEqual({ originID: "Origin/1", withArrivals: false });

    await catalog.fetchPicks({ start: Date.parse("2024-03-01T11:59:00Z"), end: Date.parse("2024-03-01T12:30:00Z"), authors: ["dlpicker"] });
    expect(remote.requests[2].params).toEqual({
      start: "2024-03-01T11:59:00.000Z",
      end: "2024-03-01T12:30:00.000Z",
      authors: ["dlpicker"],
    });

    if (!origin) throw new Error("origin missing");
    expect(await catalog.send({ eventID: "ev1", origin, originReference: { eventID: "ev1", originID: "Origin/1" } })).toBe(true);
    const sent = remote.requests[3].params;
    expect(sent.origin).toMatchObject({ publicID: "Origin/1", time: "2024-03-01T12:00:00.000Z" });
  });

  it("returns null for objects the catalog does not know", async () => {
    remote.handler = () => ({ result: null });
    const catalog = new CatalogClient(rpc, logger);
    expect(await catalog.fetchEvent("missing")).toBeNull();
    expect(await catalog.fetchOrigin("missing")).toBeNull();
  });

  it("delivers decoded notifications and drops malformed ones", async () => {
    const catalog = new CatalogClient(rpc, logger);
    const received: CatalogNotification[] = [];
    catalog.subscribe((n) => received.push(n));

    remote.broadcast({ type: "notification", kind: "origin", object: { publicID: "broken" } });
    remote.broadcast({ type: "notification", kind: "event", object: { publicID: "ev1", preferredOriginID: "o1" } });
    await vi.waitFor(() => expect(received).toHaveLength(1));

    expect(received[0]).toEqual({ kind: "event", event: { publicID: "ev1", preferredOriginID: "o1", type: undefined } });
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it("relocates through the solver and validates its answer", async () => {
    const origin: Origin = {
      publicID: "Origin/1",
      time: new Date("2024-03-01T12:00:00Z"),
      latitude: 1,
      longitude: 2,
      depth: 10,
      depthType: "free",
      arrivals: [],
      quality: {},
    };
    remote.handler = () => ({ result: { ...ORIGIN_DOC, publicID: "Origin/reloc" } });
    const relocated = await new RemoteRelocator(rpc).relocate({ eventID: "ev1", origin, fixedDepth: null, minDepth: 10, maxResidual: 2.5 });
    expect(relocated?.publicID).toBe("Origin/reloc");
    expect(remote.requests[0].params).toMatchObject({ eventID: "ev1", fixedDepth: null, minDepth: 10, maxResidual: 2.5 });
  });

  it("reads depths from the depth-phase analyzer", async () => {
    const analyzer = new RemoteDepthAnalyzer(rpc);
    remote.handler = () => ({ result: 17.5 });
    expect(await analyzer.computeDepth("ev1")).toBe(17.5);
    remote.handler = () => ({ result: null });
    expect(await analyzer.computeDepth("ev1")).toBeNull();
    remote.handler = () => ({ result: "deep" });
    await expect(analyzer.computeDepth("ev1")).rejects.toThrow("depth.compute: expected a number or null");
  });
});
