import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { improvementScore, improves } from "./improvement-evaluator.js";
import type { Origin } from "./types.js";

function originWith(pickCount: number, standardError: number): Origin {
  return {
    publicID: "Origin/prop",
    time: new Date("2024-03-01T12:00:00.000Z"),
    latitude: 0,
    longitude: 0,
    depth: 10,
    depthType: "free",
    arrivals: Array.from({ length: pickCount }, (_, i) => ({ pickID: `p${i}`, phase: "P", weight: 1 })),
    quality: { standardError },
  };
}

const rms = fc.double({ min: 0, max: 20, noNaN: true });

describe("improvement evaluator properties", () => {
  it("any candidate improves on no previous relocation", () => {
    fc.assert(
      fc.property(fc.nat(200), rms, (count, error) => {
        expect(improves(undefined, originWith(count, error))).toBe(true);
      }),
    );
  });

  it("score is never below zero and matches the decision", () => {
    fc.assert(
      fc.property(fc.integer({ min: 1, max: 200 }), fc.nat(200), rms, rms, (n1, n2, e1, e2) => {
        const previous = originWith(n1, e1);
        const candidate = originWith(n2, e2);
        const { score } = improvementScore(previous, candidate);
        expect(score).not.toBeNull();
        expect(score ?? -1).toBeGreaterThanOrEqual(0);
        expect(improves(previous, candidate)).toBe((score ?? 0) > 1);
      }),
    );
  });

  it("with equal RMS, keeping fewer or the same picks never improves", () => {
    fc.assert(
      fc.property(fc.integer({ min: 1, max: 200 }), fc.nat(200), rms, (n1, cut, error) => {
        const n2 = Math.max(0, n1 - cut);
        expect(improves(originWith(n1, error), originWith(n2, error))).toBe(false);
      }),
    );
  });
});
