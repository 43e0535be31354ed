// Seismic Relocator - Onset model registry
// Maps a model name to its input geometry and runs it through an inference
// backend. The model and device are chosen once at startup.

import { decodeAnnotation } from "./catalog-codec.js";
import { CollaboratorError, ConfigurationError } from "./errors.js";
import type { RpcConnection } from "./rpc-connection.js";
import type { Annotation, ComponentGroup, Device } from "./types.js";

export type ModelName = "phasenet" | "eqtransformer";

export interface ModelSpec {
  /** Channel prefix of the annotations, e.g. "PhaseNet" in "PhaseNet_P" */
  label: string;
  inputSamples: number;
  /** Hz */
  samplingRate: number;
}

export const MODEL_REGISTRY: Readonly<Record<ModelName, ModelSpec>> = {
  phasenet: { label: "PhaseNet", inputSamples: 3001, samplingRate: 100 },
  eqtransformer: { label: "EQTransformer", inputSamples: 6000, samplingRate: 100 },
};

export function isModelName(name: string): name is ModelName {
  return Object.hasOwn(MODEL_REGISTRY, name);
}

export function isDevice(value: string): value is Device {
  return value === "cpu" || value === "gpu";
}

export interface AnnotateRequest {
  model: ModelName;
  groups: Array<{ streamID: string; files: ComponentGroup["files"] }>;
}

/** The process that actually holds the model weights. */
export interface InferenceBackend {
  loadModel(params: { model: ModelName; dataset: string; device: Device }): Promise<void>;
  annotate(request: AnnotateRequest): Promise<unknown>;
}

export interface PhaseAnnotator {
  readonly name: ModelName;
  readonly spec: ModelSpec;
  /** Minimum waveform length the model accepts, in seconds */
  readonly inputLengthSeconds: number;
  initialize(): Promise<void>;
  annotate(groups: ComponentGroup[]): Promise<Annotation[]>;
}

class BackendAnnotator implements PhaseAnnotator {
  readonly name: ModelName;
  readonly spec: ModelSpec;
  readonly inputLengthSeconds: number;
  private readonly backend: InferenceBackend;
  private readonly device: Device;
  private readonly dataset: string;

  constructor(name: ModelName, backend: InferenceBackend, device: Device, dataset: string) {
    this.name = name;
    this.spec = MODEL_REGISTRY[name];
    this.inputLengthSeconds = this.spec.inputSamples / this.spec.samplingRate;
    this.backend = backend;
    this.device = device;
    this.dataset = dataset;
  }

  initialize(): Promise<void> {
    return this.backend.loadModel({ model: this.name, dataset: this.dataset, device: this.device });
  }

  async annotate(groups: ComponentGroup[]): Promise<Annotation[]> {
    if (groups.length === 0) return [];
    const result = await this.backend.annotate({
      model: this.name,
      groups: groups.map((g) => ({ streamID: g.pick.streamID, files: g.files })),
    });
    if (!Array.isArray(result)) {
      throw new CollaboratorError("model.annotate", "expected an array of annotations");
    }
    return result.map(decodeAnnotation);
  }
}

/**
 * Resolves a model name and device into an annotator.
 * Unknown names and devices are startup misconfiguration.
 */
export function createAnnotator(
  name: string,
  backend: InferenceBackend,
  options: { device: string; dataset: string },
): PhaseAnnotator {
  const normalized = name.toLowerCase();
  if (!isModelName(normalized)) {
    throw new ConfigurationError(`No such model: ${name} (available: ${Object.keys(MODEL_REGISTRY).join(", ")})`);
  }
  const device = options.device.toLowerCase();
  if (!isDevice(device)) {
    throw new ConfigurationError(`Unknown device "${options.device}", expected cpu or gpu`);
  }
  return new BackendAnnotator(normalized, backend, device, options.dataset);
}

export class RemoteInferenceBackend implements InferenceBackend {
  private readonly rpc: RpcConnection;

  constructor(rpc: RpcConnection) {
    this.rpc = rpc;
  }

  async loadModel(params: { model: ModelName; dataset: string; device: Device }): Promise<void> {
    await this.rpc.request("model.load", params);
  }

  annotate(request: AnnotateRequest): Promise<unknown> {
    return this.rpc.request("model.annotate", request);
  }
}
