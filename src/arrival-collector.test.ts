import { describe, it, expect, vi } from "vitest";
import { ArrivalCollector } from "./arrival-collector.js";
import type { Catalog } from "./collaborators.js";
import type { Logger } from "./logger.js";
import type { Origin, Pick, StationInventory } from "./types.js";

const ORIGIN_TIME = Date.parse("2024-03-01T12:00:00.000Z");
const INSTALLED = Date.parse("2010-01-01T00:00:00.000Z");

function createSilentLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function station(code: string, latitude: number, longitude: number, end?: number) {
  return {
    code,
    start: INSTALLED,
    end,
    latitude,
    longitude,
    locations: [{ code: "", start: INSTALLED, streams: [{ code: "BHZ", start: INSTALLED }] }],
  };
}

const INVENTORY: StationInventory = {
  networks: [
    {
      code: "GE",
      start: INSTALLED,
      stations: [
        station("NEAR", 0, 10),
        station("FAR", 0, 110),
        station("GONE", 0, 20, Date.parse("2020-01-01T00:00:00.000Z")),
      ],
    },
  ],
};

function makePick(id: string, stationCode: string, overrides: Partial<Pick> = {}): Pick {
  return {
    publicID: id,
    networkCode: "GE",
    stationCode,
    locationCode: "",
    channelCode: "BHZ",
    time: new Date(ORIGIN_TIME + 120_000),
    phaseHint: "P",
    author: "dlpicker",
    ...overrides,
  };
}

const ORIGIN: Origin = {
  publicID: "Origin/1",
  time: new Date(ORIGIN_TIME),
  latitude: 0,
  longitude: 0,
  depth: 10,
  depthType: "free",
  arrivals: [{ pickID: "old", phase: "P", weight: 1 }],
  quality: {},
};

function makeCatalog(picks: Pick[]): Catalog {
  return {
    subscribe: vi.fn(),
    fetchEvent: vi.fn().mockResolvedValue(null),
    fetchOrigin: vi.fn().mockResolvedValue(null),
    fetchPicks: vi.fn().mockResolvedValue(picks),
    fetchInventory: vi.fn().mockResolvedValue(INVENTORY),
    send: vi.fn().mockResolvedValue(true),
  };
}

describe("ArrivalCollector", () => {
  it("queries whitelisted picks in the window around origin time", async () => {
    const catalog = makeCatalog([]);
    const collector = new ArrivalCollector({ pickAuthors: ["dlpicker"], maxDelta: 105, pickWindow: 1800 }, catalog, INVENTORY, createSilentLogger());
    await collector.collect(ORIGIN);
    expect(catalog.fetchPicks).toHaveBeenCalledWith({
      start: ORIGIN_TIME - 60_000,
      end: ORIGIN_TIME + 1_800_000,
      authors: ["dlpicker"],
    });
  });

  it("replaces the arrivals with usable picks", async () => {
    const catalog = makeCatalog([
      makePick("p-near", "NEAR"),
      makePick("p-far", "FAR"),
      makePick("p-gone", "GONE"),
      makePick("p-unknown", "NOPE"),
      makePick("p-manual", "NEAR", { author: "analyst" }),
      makePick("p-near", "NEAR"),
      makePick("p-s", "NEAR", { publicID: "p-s", phaseHint: "S" }),
    ]);
    const collector = new ArrivalCollector({ pickAuthors: ["dlpicker"], maxDelta: 105, pickWindow: 1800 }, catalog, INVENTORY, createSilentLogger());

    const result = await collector.collect(ORIGIN);
    expect(result.arrivals.map((a) => [a.pickID, a.phase, a.weight])).toEqual([
      ["p-near", "P", 1],
      ["p-s", "S", 1],
    ]);
    expect(result.arrivals[0].distance).toBeCloseTo(10, 6);
    expect(result.arrivals[0].azimuth).toBeCloseTo(90, 6);
    expect(ORIGIN.arrivals).toHaveLength(1);
  });

  it("includes distant stations when the maximum distance allows", async () => {
    const catalog = makeCatalog([makePick("p-far", "FAR")]);
    const collector = new ArrivalCollector({ pickAuthors: ["dlpicker"], maxDelta: 111, pickWindow: 1800 }, catalog, INVENTORY, createSilentLogger());
    const result = await collector.collect(ORIGIN);
    expect(result.arrivals.map((a) => a.pickID)).toEqual(["p-far"]);
  });
});
