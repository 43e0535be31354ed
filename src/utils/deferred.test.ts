import { describe, it, expect } from "vitest";
import { createDeferred } from "./deferred.js";

describe("createDeferred", () => {
  it("resolves with the first value only", async () => {
    const signal = createDeferred<string>();
    expect(signal.settled).toBe(false);
    signal.resolve("SIGTERM");
    signal.resolve("SIGINT");
    expect(signal.settled).toBe(true);
    expect(await signal.promise).toBe("SIGTERM");
  });
});
