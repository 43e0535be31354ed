import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { existsSync } from "node:fs";
import { mkdir, mkdtemp, readdir, readFile, rm, symlink, writeFile } from "node:fs/promises";
import { join, relative } from "node:path";
import { tmpdir } from "node:os";
import { MODEL_REGISTRY, type PhaseAnnotator } from "./annotator.js";
import type { Logger } from "./logger.js";
import { MailboxQueue } from "./mailbox.js";
import type { WaveformReader } from "./mseed-reader.js";
import { parsePickTime } from "./pick-payload.js";
import { Repicker, type RepickerOptions } from "./repicker.js";
import { ResultPublisher } from "./result-publisher.js";
import { StreamAssembler } from "./stream-assembler.js";
import type { Annotation, ComponentGroup, MailboxOrder, PickRecord } from "./types.js";

// ─── Test Helpers ─────────────────────────────────────────────────────────────

const WAVEFORM_START = Date.parse("2024-03-01T12:00:00.000Z");

interface RawPick {
  publicID: string;
  streamID: string;
  time: string;
}

const P1: RawPick = { publicID: "p1", streamID: "GE.AAA..BHZ", time: "2024-03-01T12:01:00.000Z" };
const P2: RawPick = { publicID: "p2", streamID: "GE.BBB..BHZ", time: "2024-03-01T12:01:05.000Z" };
const P3: RawPick = { publicID: "p3", streamID: "GE.CCC..BHZ", time: "2024-03-01T12:01:10.000Z" };

function createSilentLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

/** P and S curves per group; the P curve peaks 1 s after the pick (0.9) and 1 s before it (0.5). */
function curvesFor(group: ComponentGroup): Annotation[] {
  const [network, station, location] = group.pick.streamID.split(".");
  const data = new Array<number>(2001).fill(0);
  data[900] = 0.5;
  data[1100] = 0.9;
  const startTime = parsePickTime(group.pick.time) - 10_000;
  return [
    { network, station, location, channel: "PhaseNet_P", startTime, samplingRate: 100, data },
    { network, station, location, channel: "PhaseNet_S", startTime, samplingRate: 100, data },
  ];
}

function makeAnnotator(): PhaseAnnotator {
  return {
    name: "phasenet",
    spec: MODEL_REGISTRY.phasenet,
    inputLengthSeconds: 30.01,
    initialize: vi.fn().mockResolvedValue(undefined),
    annotate: vi.fn(async (groups: ComponentGroup[]) => groups.flatMap(curvesFor)),
  };
}

function publicIDs(picks: PickRecord[]): string[] {
  return picks.map((p) => p.publicID);
}

// ─── Tests ────────────────────────────────────────────────────────────────────

describe("Repicker", () => {
  let root: string;
  let events: string;
  let spool: string;
  let outgoing: string;
  let logger: Logger;
  let annotator: PhaseAnnotator;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "repicker-"));
    events = join(root, "events");
    spool = join(root, "spool");
    outgoing = join(root, "outgoing");
    await mkdir(spool);
    logger = createSilentLogger();
    annotator = makeAnnotator();
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  async function enqueue(eventID: string, name: string, payload: RawPick[] | string): Promise<void> {
    const dir = join(events, eventID, "in");
    await mkdir(dir, { recursive: true });
    const target = join(dir, name);
    await writeFile(target, typeof payload === "string" ? payload : JSON.stringify(payload));
    await symlink(relative(spool, target), join(spool, name));
  }

  async function addWaveforms(eventID: string, pick: RawPick): Promise<void> {
    const dir = join(events, eventID, "waveforms");
    await mkdir(dir, { recursive: true });
    const prefix = pick.streamID.slice(0, -1);
    for (const component of ["Z", "N", "E"]) {
      await writeFile(join(dir, `${prefix}${component}.mseed`), "");
    }
  }

  function createRepicker(overrides: Partial<RepickerOptions> = {}, order: MailboxOrder = "strict"): Repicker {
    const reader: WaveformReader = {
      readSpan: vi.fn().mockResolvedValue({ startTime: WAVEFORM_START, endTime: WAVEFORM_START + 120_000 }),
    };
    const queue = new MailboxQueue(spool, { order }, logger);
    return new Repicker(
      { batchSize: 50, minConfidence: 0.3, dryRun: false, exitWhenDone: true, ...overrides },
      {
        queue,
        assembler: new StreamAssembler({ eventRootDir: events, inputLengthSeconds: 30.01 }, reader, logger),
        annotator,
        publisher: new ResultPublisher(
          { eventRootDir: events, outgoingDir: outgoing, annotDir: "annotations" },
          queue,
          logger,
        ),
        logger,
      },
    );
  }

  async function readOut(eventID: string, name: string): Promise<PickRecord[]> {
    return JSON.parse(await readFile(join(events, eventID, "out", name), "utf-8"));
  }

  it("publishes one repick per gated maximum of each usable pick", async () => {
    await addWaveforms("ev1", P1);
    await enqueue("ev1", "a.json", [P1, P2]);

    const outcomes = await createRepicker().poll();

    expect([...outcomes]).toEqual([["a.json", "published"]]);
    const repicks = await readOut("ev1", "a.json");
    expect(repicks.map((r) => [r.publicID, r.time, r.confidence])).toEqual([
      ["p1/repick", "2024-03-01T12:00:59.000Z", 0.5],
      ["p1/repick", "2024-03-01T12:01:01.000Z", 0.9],
    ]);
    expect(repicks[1]).toEqual({
      publicID: "p1/repick",
      streamID: "GE.AAA..BHZ",
      networkCode: "GE",
      stationCode: "AAA",
      locationCode: "",
      channelCode: "BHZ",
      time: "2024-03-01T12:01:01.000Z",
      phaseHint: "P",
      model: "PhaseNet",
      confidence: 0.9,
    });
    expect(await readdir(outgoing)).toEqual(["a.json"]);
    expect(await readdir(spool)).toEqual([]);
    expect(await readdir(join(events, "ev1", "annotations"))).toEqual(["GE.AAA..BHZ.json"]);
    expect(logger.info).toHaveBeenCalledWith("a.json: 2 repicks from 2 picks");
  });

  it("splits picks into batches", async () => {
    await addWaveforms("ev1", P1);
    await addWaveforms("ev1", P3);
    await enqueue("ev1", "a.json", [P1, P3]);

    await createRepicker({ batchSize: 1 }).poll();

    expect(annotator.annotate).toHaveBeenCalledTimes(2);
    expect(publicIDs(await readOut("ev1", "a.json"))).toEqual(["p1/repick", "p1/repick", "p3/repick", "p3/repick"]);
  });

  it("skips picks processed for an earlier payload of the event", async () => {
    await addWaveforms("ev1", P1);
    await addWaveforms("ev1", P3);
    await enqueue("ev1", "a.json", [P1]);
    await enqueue("ev1", "b.json", [P3, P1]);

    await createRepicker().poll();

    const calls = vi.mocked(annotator.annotate).mock.calls;
    expect(calls.map(([groups]) => groups.map((g) => g.pick.publicID))).toEqual([["p1"], ["p3"]]);
    expect(publicIDs(await readOut("ev1", "b.json"))).toEqual(["p3/repick", "p3/repick"]);
  });

  it("acknowledges a payload whose picks were all processed before", async () => {
    await addWaveforms("ev1", P1);
    await enqueue("ev1", "a.json", [P1]);
    await enqueue("ev1", "b.json", [P1]);

    const outcomes = await createRepicker().poll();

    expect([...outcomes]).toEqual([
      ["a.json", "published"],
      ["b.json", "empty"],
    ]);
    expect(annotator.annotate).toHaveBeenCalledTimes(1);
    expect(await readdir(spool)).toEqual([]);
    expect(await readdir(outgoing)).toEqual(["a.json"]);
  });

  it("acknowledges a payload without repicks", async () => {
    await enqueue("ev1", "a.json", [P2]);

    const outcomes = await createRepicker().poll();

    expect(outcomes.get("a.json")).toBe("empty");
    expect(logger.warn).toHaveBeenCalledWith("no repicks for a.json");
    expect(await readdir(spool)).toEqual([]);
    expect(existsSync(outgoing)).toBe(false);
    expect(annotator.annotate).not.toHaveBeenCalled();
  });

  it("keeps only maxima at or above the confidence minimum", async () => {
    await addWaveforms("ev1", P1);
    await enqueue("ev1", "a.json", [P1]);

    await createRepicker({ minConfidence: 0.6 }).poll();

    const repicks = await readOut("ev1", "a.json");
    expect(repicks.map((r) => [r.time, r.confidence])).toEqual([["2024-03-01T12:01:01.000Z", 0.9]]);
  });

  it("drops candidates below the confidence minimum", async () => {
    await addWaveforms("ev1", P1);
    await enqueue("ev1", "a.json", [P1]);

    const outcomes = await createRepicker({ minConfidence: 0.95 }).poll();

    expect(outcomes.get("a.json")).toBe("empty");
  });

  it("writes nothing in dry-run mode and keeps the link", async () => {
    await addWaveforms("ev1", P1);
    await enqueue("ev1", "a.json", [P1]);

    const outcomes = await createRepicker({ dryRun: true }).poll();

    expect(outcomes.get("a.json")).toBe("dry-run");
    expect(logger.info).toHaveBeenCalledWith("dry run - 1 repicks for a.json not written");
    expect(await readdir(spool)).toEqual(["a.json"]);
    expect(existsSync(join(events, "ev1", "out"))).toBe(false);
    expect(existsSync(join(events, "ev1", "annotations"))).toBe(false);
  });

  it("leaves unreadable payloads in the mailbox", async () => {
    await enqueue("ev1", "a.json", "not json");

    const outcomes = await createRepicker().poll();

    expect(outcomes.get("a.json")).toBe("unreadable");
    expect(await readdir(spool)).toEqual(["a.json"]);
  });

  it("retries a payload whose processing failed", async () => {
    await addWaveforms("ev1", P1);
    await enqueue("ev1", "a.json", [P1]);
    vi.mocked(annotator.annotate).mockRejectedValueOnce(new Error("model crashed"));
    const repicker = createRepicker();

    expect((await repicker.poll()).get("a.json")).toBe("failed");
    expect(logger.warn).toHaveBeenCalledWith("processing a.json failed, will retry: model crashed");
    expect(await readdir(spool)).toEqual(["a.json"]);

    expect((await repicker.poll()).get("a.json")).toBe("published");
    expect(await readdir(spool)).toEqual([]);
  });

  it("handles only the newest item per pass when prioritizing recent items", async () => {
    await addWaveforms("ev1", P1);
    await enqueue("ev1", "a.json", [P1]);
    await enqueue("ev1", "b.json", [P1]);

    const outcomes = await createRepicker({}, "prioritize-recent").poll();

    expect([...outcomes]).toEqual([["b.json", "published"]]);
    expect(await readdir(spool)).toEqual(["a.json"]);
  });

  it("visits every item in dry-run mode when prioritizing recent items", async () => {
    await addWaveforms("ev1", P1);
    await addWaveforms("ev1", P3);
    await enqueue("ev1", "a.json", [P1]);
    await enqueue("ev1", "b.json", [P3]);

    const outcomes = await createRepicker({ dryRun: true }, "prioritize-recent").poll();

    expect([...outcomes]).toEqual([
      ["b.json", "dry-run"],
      ["a.json", "dry-run"],
    ]);
    expect(await readdir(spool)).toEqual(["a.json", "b.json"]);
  });

  it("stops after one pass when told to exit when done", async () => {
    await addWaveforms("ev1", P1);
    await enqueue("ev1", "a.json", [P1]);

    await createRepicker().run();

    expect(await readdir(spool)).toEqual([]);
  });

  it("keeps polling until stopped", async () => {
    await addWaveforms("ev1", P1);
    const repicker = createRepicker({ exitWhenDone: false, pollIntervalMs: 10 });
    const running = repicker.run();

    await enqueue("ev1", "a.json", [P1]);
    await vi.waitFor(async () => {
      expect(await readdir(spool)).toEqual([]);
    });
    await repicker.stop();
    await running;

    expect(await readdir(outgoing)).toEqual(["a.json"]);
  });
});
