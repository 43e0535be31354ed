// Seismic Relocator - Error kinds
// Faults that must be told apart from "value absent, use the default".

/** Unrecoverable startup misconfiguration. Aborts before any loop starts. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/** A remote collaborator (catalog, solver, model backend) failed or answered garbage. */
export class CollaboratorError extends Error {
  readonly method: string;

  constructor(method: string, message: string) {
    super(`${method}: ${message}`);
    this.name = "CollaboratorError";
    this.method = method;
  }
}

/** A mailbox payload file could not be parsed. */
export class PayloadError extends Error {
  readonly path: string;

  constructor(path: string, message: string) {
    super(`${path}: ${message}`);
    this.name = "PayloadError";
    this.path = path;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
