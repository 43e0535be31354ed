#!/usr/bin/env node
// Seismic Relocator - Entry point
// Wires up the relocation pipeline or the repicker and starts its loop.
//
//   index.js relocator [eventID ...]
//   index.js repicker

import "dotenv/config";
import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";
import { createAnnotator, RemoteInferenceBackend } from "./annotator.js";
import { ArrivalCollector } from "./arrival-collector.js";
import { CatalogClient, RemoteDepthAnalyzer, RemoteRelocator } from "./catalog-client.js";
import { type Env, loadRelocatorConfig, loadRepickerConfig } from "./config.js";
import { DepthPhaseRunner } from "./depth-phase-runner.js";
import { ConfigurationError, errorMessage } from "./errors.js";
import { createConsoleLogger } from "./logger.js";
import { MailboxQueue } from "./mailbox.js";
import { MseedHeaderReader } from "./mseed-reader.js";
import { OriginPublisher } from "./origin-publisher.js";
import { ReadinessGate } from "./readiness-gate.js";
import { RelocationController } from "./relocation-controller.js";
import { RelocationScheduler } from "./relocation-scheduler.js";
import { RelocatorState } from "./relocator-state.js";
import { Repicker } from "./repicker.js";
import { ResultPublisher } from "./result-publisher.js";
import { RpcConnection } from "./rpc-connection.js";
import { createStatusServer } from "./status-server.js";
import { StreamAssembler } from "./stream-assembler.js";
import type { StationInventory } from "./types.js";
import { createDeferred } from "./utils/deferred.js";

export const APP_NAME = "Seismic Relocator";
export const APP_VERSION = "0.1.0";

export type Mode = "relocator" | "repicker";

const ts = () => new Date().toISOString();
const logInit = (msg: string) => console.log(`[INIT] [${ts()}] ${msg}`);
const logFatal = (msg: string) => console.error(`[FATAL] [${ts()}] ${msg}`);

export const USAGE = "usage: seismic-relocator <relocator|repicker> [eventID ...]";

function isMode(value: string | undefined): value is Mode {
  return value === "relocator" || value === "repicker";
}

/** Resolves on the first SIGINT/SIGTERM. */
function shutdownSignal(): Promise<void> {
  const signal = createDeferred<void>();
  const handler = () => signal.resolve();
  process.once("SIGINT", handler);
  process.once("SIGTERM", handler);
  return signal.promise;
}

// ─── Relocator ──────────────────────────────────────────────────────────────────

export async function runRelocator(env: Env, eventIDs: string[]): Promise<number> {
  const config = loadRelocatorConfig(env);
  const logger = createConsoleLogger("Relocator", config.logLevel);
  logInit(`Configuration loaded (working dir ${config.workingDir}, dry run ${config.dryRun})`);

  logInit(`Connecting to catalog at ${config.catalogUrl}...`);
  const rpc = new RpcConnection(config.catalogUrl, createConsoleLogger("Rpc", config.logLevel));
  await rpc.connect();
  const catalog = new CatalogClient(rpc, createConsoleLogger("Catalog", config.logLevel));

  let inventory: StationInventory;
  try {
    inventory = await catalog.fetchInventory();
  } catch (err) {
    await rpc.close();
    throw new ConfigurationError(`failed to load station inventory: ${errorMessage(err)}`);
  }
  logInit(`Inventory loaded (${inventory.networks.length} networks)`);

  const state = new RelocatorState();
  const gate = new ReadinessGate(
    { author: config.author, minDelay: config.minDelay, maxRMS: config.maxRMS },
    { catalog, state, logger: createConsoleLogger("ReadinessGate", config.logLevel) },
  );
  const controller = new RelocationController(
    {
      author: config.author,
      agencyID: config.agencyID,
      minDepth: config.minDepth,
      maxResidual: config.maxResidual,
      defaultDepth: config.defaultDepth,
      regions: config.fixedDepthRegions,
    },
    {
      catalog,
      relocator: new RemoteRelocator(rpc),
      collector: new ArrivalCollector(
        { pickAuthors: config.pickAuthors, maxDelta: config.maxDelta, pickWindow: config.pickWindow },
        catalog,
        inventory,
        createConsoleLogger("ArrivalCollector", config.logLevel),
      ),
      depthRunner: new DepthPhaseRunner(
        new RemoteDepthAnalyzer(rpc),
        config.workingDir,
        createConsoleLogger("DepthPhase", config.logLevel),
      ),
      publisher: new OriginPublisher(catalog, state, createConsoleLogger("Publisher", config.logLevel), config.dryRun),
      state,
      logger,
    },
  );
  const scheduler = new RelocationScheduler({ gate, controller, state, logger });

  if (eventIDs.length > 0) {
    logInit(`Processing ${eventIDs.length} event(s) and exiting`);
    await scheduler.processEvents(eventIDs);
    await rpc.close();
    return 0;
  }

  scheduler.attach(catalog);
  scheduler.start();

  const status = config.statusPort > 0 ? createStatusServer(scheduler, createConsoleLogger("Status", config.logLevel)) : null;
  if (status) {
    const port = await status.listen(config.statusPort);
    logInit(`Status available at http://localhost:${port}/status`);
  }
  logInit(`${APP_NAME} v${APP_VERSION} relocator running`);

  const lost = await Promise.race([shutdownSignal().then(() => null), rpc.whenLost()]);
  await scheduler.stop();
  await status?.close();
  await rpc.close();
  if (lost) throw lost;
  return 0;
}

// ─── Repicker ───────────────────────────────────────────────────────────────────

export async function runRepicker(env: Env): Promise<number> {
  const config = loadRepickerConfig(env);
  const logger = createConsoleLogger("Repicker", config.logLevel);

  const rpc = new RpcConnection(config.inferenceUrl, createConsoleLogger("Rpc", config.logLevel));
  // Model and device are validated before anything is connected.
  const annotator = createAnnotator(config.model, new RemoteInferenceBackend(rpc), {
    device: config.device,
    dataset: config.dataset,
  });
  logInit(`Model ${annotator.spec.label} (${config.dataset}) on ${config.device}`);

  logInit(`Connecting to inference backend at ${config.inferenceUrl}...`);
  await rpc.connect();
  await annotator.initialize();

  const queue = new MailboxQueue(
    config.spoolDir,
    { order: config.order },
    createConsoleLogger("Mailbox", config.logLevel),
  );
  const assembler = new StreamAssembler(
    { eventRootDir: config.eventRootDir, inputLengthSeconds: annotator.inputLengthSeconds },
    new MseedHeaderReader(),
    createConsoleLogger("StreamAssembler", config.logLevel),
  );
  const publisher = new ResultPublisher(
    { eventRootDir: config.eventRootDir, outgoingDir: config.outgoingDir, annotDir: config.annotDir },
    queue,
    createConsoleLogger("ResultPublisher", config.logLevel),
  );
  const repicker = new Repicker(
    {
      batchSize: config.batchSize,
      minConfidence: config.minConfidence,
      dryRun: config.dryRun,
      exitWhenDone: config.exitWhenDone,
    },
    { queue, assembler, annotator, publisher, logger },
  );

  logInit(`${APP_NAME} v${APP_VERSION} repicker watching ${config.spoolDir}`);
  if (!config.exitWhenDone) {
    void shutdownSignal().then(() => repicker.stop());
  }
  const lost = await Promise.race([repicker.run().then(() => null), rpc.whenLost()]);
  if (lost) {
    await repicker.stop();
    await rpc.close();
    throw lost;
  }
  await rpc.close();
  return 0;
}

// ─── Main ───────────────────────────────────────────────────────────────────────

/** Runs the selected mode. Resolves with the process exit code. */
export async function main(argv: string[], env: Env = process.env): Promise<number> {
  const [mode, ...rest] = argv;
  if (!isMode(mode)) {
    logFatal(USAGE);
    return 1;
  }
  try {
    return mode === "relocator" ? await runRelocator(env, rest) : await runRepicker(env);
  } catch (err) {
    logFatal(errorMessage(err));
    return 1;
  }
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (!script) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(script)).href;
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  void main(process.argv.slice(2)).then((code) => process.exit(code));
}
