// Seismic Relocator - Status server
// Read-only HTTP surface of the relocation pipeline: liveness and the
// current pending set / last published relocation per event.

import express, { type Express } from "express";
import { createServer, type Server as HttpServer } from "node:http";
import type { Logger } from "./logger.js";
import type { SchedulerSnapshot } from "./relocation-scheduler.js";

export interface StatusSource {
  snapshot(): SchedulerSnapshot;
}

export interface StatusServer {
  app: Express;
  httpServer: HttpServer;
  /** Start listening on the given port. Resolves with the bound port. */
  listen(port: number): Promise<number>;
  close(): Promise<void>;
}

/**
 * Creates the Express app and HTTP server without listening.
 * Call `listen(port)` explicitly.
 */
export function createStatusServer(source: StatusSource, logger: Logger): StatusServer {
  const app = express();
  const httpServer = createServer(app);

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.get("/status", (_req, res) => {
    res.json(source.snapshot());
  });

  return {
    app,
    httpServer,
    listen(port: number): Promise<number> {
      return new Promise((resolve, reject) => {
        httpServer.once("error", reject);
        httpServer.listen(port, () => {
          const addr = httpServer.address();
          const bound = typeof addr === "object" && addr !== null ? addr.port : port;
          logger.info(`Status server listening on port ${bound}`);
          resolve(bound);
        });
      });
    },
    close(): Promise<void> {
      return new Promise((resolve, reject) => {
        httpServer.close((err) => {
          if (err) reject(err);
          else resolve();
        });
      });
    },
  };
}
