import { Effect } from "effect";
import { describe, expect, it } from "vitest";
import { allocateCoefficients } from "./Flux.js";
import { axisExtrema, axisRate, firstNonFinite, relativeDrift, stabilityBound } from "./Stability.js";

describe("axisRate", () => {
    it("is 2 D / h^2 for pure diffusion", () => {
        expect(axisRate({ width: 0.02, maxDrift: 0, maxDiffusion: 0.01 })).toBeCloseTo(50, 9);
    });

    it("adds the Courant rate of the drift", () => {
        expect(axisRate({ width: 0.1, maxDrift: 25, maxDiffusion: 0.5 })).toBeCloseTo(350, 9);
    });
});

describe("stabilityBound", () => {
    it("is the diffusive limit for one diffusing axis", () => {
        expect(stabilityBound([{ width: 0.02, maxDrift: 0, maxDiffusion: 0.01 }])).toBeCloseTo(0.02, 12);
    });

    it("shrinks when drift and diffusion act together", () => {
        // Each alone allows dt = 0.02; together only half of that.
        expect(stabilityBound([{ width: 0.02, maxDrift: 1, maxDiffusion: 0.01 }])).toBeCloseTo(0.01, 12);
    });

    it("sums the rates of all axes", () => {
        const bound = stabilityBound([
            { width: 0.1, maxDrift: 1, maxDiffusion: 0 },
            { width: 0.1, maxDrift: 4, maxDiffusion: 0 },
        ]);
        expect(bound).toBeCloseTo(0.02, 12);
    });

    it("is unbounded without transport", () => {
        expect(stabilityBound([{ width: 0.1, maxDrift: 0, maxDiffusion: 0 }])).toBe(Number.POSITIVE_INFINITY);
    });
});

describe("axisExtrema", () => {
    it("collects the largest drift magnitude and diffusion", () => {
        const coeffs = allocateCoefficients(3);
        coeffs.drift.set([1, -3, 2]);
        coeffs.diffLower.set([0.1, 0.2, 0.3]);
        coeffs.diffUpper.set([0.4, 0.2, 0.1]);
        expect(Effect.runSync(axisExtrema(coeffs, 0.5, "x"))).toEqual({ width: 0.5, maxDrift: 3, maxDiffusion: 0.4 });
    });

    it("rejects negative diffusion", () => {
        const coeffs = allocateCoefficients(2);
        coeffs.diffUpper.set([0, -1]);
        const error = Effect.runSync(Effect.flip(axisExtrema(coeffs, 1, "y")));
        expect(error.field).toBe("diffusion.y");
    });

    it("rejects non-finite drift", () => {
        const coeffs = allocateCoefficients(2);
        coeffs.drift.set([0, Number.NaN]);
        const error = Effect.runSync(Effect.flip(axisExtrema(coeffs, 1, "x")));
        expect(error.field).toBe("drift.x");
        expect(error.message).toBe("drift along x is not finite at face 1: NaN");
    });
});

describe("firstNonFinite", () => {
    it("finds the first NaN or infinity", () => {
        expect(firstNonFinite([1, 2, 3])).toBe(-1);
        expect(firstNonFinite([1, Number.POSITIVE_INFINITY, Number.NaN])).toBe(1);
    });
});

describe("relativeDrift", () => {
    it("measures change relative to the reference", () => {
        expect(relativeDrift(2, 2.5)).toBe(0.25);
        expect(relativeDrift(0, 0)).toBe(0);
    });
});
