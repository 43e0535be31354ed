// Seismic Relocator - One-shot signal
// A promise with its resolver exposed. Only the first resolve() takes effect,
// so several sources (SIGINT and SIGTERM, a dropped connection) may race to
// settle the same signal.

import type { Deferred } from "../types.js";

export function createDeferred<T>(): Deferred<T> {
  let settle: ((value: T) => void) | null = null;
  const promise = new Promise<T>((r) => {
    settle = r;
  });
  const deferred: Deferred<T> = {
    promise,
    settled: false,
    resolve(value: T) {
      if (deferred.settled) return;
      deferred.settled = true;
      settle?.(value);
    },
  };
  return deferred;
}
