// Seismic Relocator - RPC connection
// JSON request/response over one WebSocket, plus server-pushed notifications.
//
//   → { id, method, params }
//   ← { id, result } | { id, error }
//   ← { type: "notification", kind, object }

import { v4 as uuidv4 } from "uuid";
import WebSocket from "ws";
import { CollaboratorError, errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import type { Deferred } from "./types.js";
import { createDeferred } from "./utils/deferred.js";

interface PendingRequest {
  method: string;
  resolve: (value: unknown) => void;
  reject: (err: Error) => void;
}

export type NotificationHandler = (message: Record<string, unknown>) => void;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export class RpcConnection {
  private readonly url: string;
  private readonly logger: Logger;
  private ws: WebSocket | null = null;
  private readonly pending: Map<string, PendingRequest> = new Map();
  private readonly notificationHandlers: NotificationHandler[] = [];
  private readonly lost: Deferred<Error> = createDeferred<Error>();
  private closing = false;

  constructor(url: string, logger: Logger) {
    this.url = url;
    this.logger = logger;
  }

  get connected(): boolean {
    return this.ws !== null && this.ws.readyState === WebSocket.OPEN;
  }

  connect(): Promise<void> {
    if (this.ws) {
      return Promise.reject(new Error(`Already connected to ${this.url}`));
    }
    const ws = new WebSocket(this.url);
    this.ws = ws;

    ws.on("message", (data: WebSocket.RawData) => this.handleMessage(data));
    let opened = false;
    ws.on("close", () => {
      this.ws = null;
      const err = new CollaboratorError("connection", `connection to ${this.url} closed`);
      if (opened && !this.closing) {
        this.logger.warn(`Connection to ${this.url} lost`);
        this.lost.resolve(err);
      } else {
        this.logger.info(`Connection to ${this.url} closed`);
      }
      this.rejectAll(err);
    });

    return new Promise((resolve, reject) => {
      ws.once("open", () => {
        opened = true;
        this.logger.info(`Connected to ${this.url}`);
        ws.on("error", (err) => this.logger.error(`Connection error: ${err.message}`));
        resolve();
      });
      ws.once("error", (err) => {
        this.ws = null;
        reject(new CollaboratorError("connect", `cannot reach ${this.url}: ${err.message}`));
      });
    });
  }

  /** Resolves when the remote side drops an open connection; never on close(). */
  whenLost(): Promise<Error> {
    return this.lost.promise;
  }

  onNotification(handler: NotificationHandler): void {
    this.notificationHandlers.push(handler);
  }

  request(method: string, params: unknown): Promise<unknown> {
    const ws = this.ws;
    if (!ws || ws.readyState !== WebSocket.OPEN) {
      return Promise.reject(new CollaboratorError(method, "not connected"));
    }
    const id = uuidv4();
    return new Promise((resolve, reject) => {
      this.pending.set(id, { method, resolve, reject });
      ws.send(JSON.stringify({ id, method, params }), (err) => {
        if (err) {
          this.pending.delete(id);
          reject(new CollaboratorError(method, `send failed: ${err.message}`));
        }
      });
    });
  }

  close(): Promise<void> {
    const ws = this.ws;
    if (!ws) return Promise.resolve();
    this.closing = true;
    return new Promise((resolve) => {
      ws.once("close", () => resolve());
      ws.close();
    });
  }

  private handleMessage(data: WebSocket.RawData): void {
    let message: unknown;
    try {
      message = JSON.parse(data.toString());
    } catch (err) {
      this.logger.warn(`Ignoring malformed message: ${errorMessage(err)}`);
      return;
    }
    if (!isRecord(message)) {
      this.logger.warn("Ignoring non-object message");
      return;
    }

    if (message.type === "notification") {
      for (const handler of this.notificationHandlers) {
        try {
          handler(message);
        } catch (err) {
          this.logger.error(`Notification handler failed: ${errorMessage(err)}`);
        }
      }
      return;
    }

    const id = message.id;
    const entry = typeof id === "string" ? this.pending.get(id) : undefined;
    if (typeof id !== "string" || !entry) {
      this.logger.warn(`Ignoring response with unknown id ${String(id)}`);
      return;
    }
    this.pending.delete(id);

    if (message.error !== undefined) {
      entry.reject(new CollaboratorError(entry.method, String(message.error)));
    } else {
      entry.resolve(message.result);
    }
  }

  private rejectAll(err: Error): void {
    for (const entry of this.pending.values()) {
      entry.reject(err);
    }
    this.pending.clear();
  }
}
