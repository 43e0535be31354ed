// Seismic Relocator - Poll loop
// Fixed-interval cooperative loop: run the task, wait, run again.
// A task never overlaps with itself.

import { createDeferred } from "./utils/deferred.js";
import { errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import type { Deferred } from "./types.js";

export class PollLoop {
  private readonly task: () => Promise<void>;
  private readonly intervalMs: number;
  private readonly logger: Logger;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private running: Promise<void> | null = null;
  private active = false;
  private stopped: Deferred<void> | null = null;

  constructor(task: () => Promise<void>, intervalMs: number, logger: Logger) {
    this.task = task;
    this.intervalMs = intervalMs;
    this.logger = logger;
  }

  get isActive(): boolean {
    return this.active;
  }

  /** Starts looping; the first run happens immediately. */
  start(): void {
    if (this.active) return;
    this.active = true;
    this.stopped = createDeferred<void>();
    this.schedule(0);
  }

  /** Resolves once the loop is idle. An in-flight run is allowed to finish. */
  async stop(): Promise<void> {
    if (!this.active) return;
    this.active = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.running) await this.running;
    this.stopped?.resolve();
  }

  /** Resolves when stop() has completed. */
  whenStopped(): Promise<void> {
    return this.stopped?.promise ?? Promise.resolve();
  }

  /** Runs the task once, logging instead of throwing. Concurrent calls share one run. */
  runOnce(): Promise<void> {
    if (this.running) return this.running;
    this.running = this.task()
      .catch((err: unknown) => {
        this.logger.error(`poll task failed: ${errorMessage(err)}`);
      })
      .finally(() => {
        this.running = null;
      });
    return this.running;
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.runOnce().then(() => {
        if (this.active) this.schedule(this.intervalMs);
      });
    }, delayMs);
  }
}
