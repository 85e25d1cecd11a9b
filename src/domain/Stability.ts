import { Effect } from "effect";
import { ConfigurationError } from "./Errors.js";
import type { FaceCoefficients } from "./Flux.js";

// Relative round-off allowance when an explicit dt is compared with the bound.
export const STABILITY_TOLERANCE = 1e-9;
// Fraction of the bound used when dt is chosen automatically.
export const AUTO_SAFETY = 0.5;
// Relative mass drift tolerated under conserving boundaries before a warning is logged.
export const MASS_TOLERANCE = 1e-8;

export interface AxisExtrema {
    readonly width: number;
    readonly maxDrift: number;
    readonly maxDiffusion: number;
}

/** Inverse time scale of one axis: max|A| / h + 2 max D / h^2. */
export const axisRate = ({ width, maxDrift, maxDiffusion }: AxisExtrema): number =>
    maxDrift / width + (2 * maxDiffusion) / (width * width);

/**
 * Largest forward-Euler step that keeps the upwind update a convex combination:
 * dt * sum over axes of (max|A| / h + 2 max D / h^2) <= 1. Infinite without transport.
 */
export const stabilityBound = (axes: ReadonlyArray<AxisExtrema>): number => {
    const rate = axes.reduce((sum, axis) => sum + axisRate(axis), 0);
    return rate > 0 ? 1 / rate : Number.POSITIVE_INFINITY;
};

/** Validates cached face coefficients and reduces them to the extrema the bound needs. */
export const axisExtrema = (
    coeffs: FaceCoefficients,
    width: number,
    axis: string
): Effect.Effect<AxisExtrema, ConfigurationError> =>
    Effect.suspend(() => {
        let maxDrift = 0;
        let maxDiffusion = 0;
        for (let f = 0; f < coeffs.drift.length; f++) {
            const a = coeffs.drift[f];
            if (!Number.isFinite(a)) {
                return Effect.fail(new ConfigurationError({
                    field: `drift.${axis}`,
                    message: `drift along ${axis} is not finite at face ${f}: ${a}`,
                }));
            }
            maxDrift = Math.max(maxDrift, Math.abs(a));
            for (const d of [coeffs.diffLower[f], coeffs.diffUpper[f]]) {
                if (!Number.isFinite(d) || d < 0) {
                    return Effect.fail(new ConfigurationError({
                        field: `diffusion.${axis}`,
                        message: `diffusion along ${axis} must be finite and non-negative, got ${d} near face ${f}`,
                    }));
                }
                maxDiffusion = Math.max(maxDiffusion, d);
            }
        }
        return Effect.succeed({ width, maxDrift, maxDiffusion });
    });

/** Index of the first NaN or infinite entry, or -1. */
export const firstNonFinite = (field: ArrayLike<number>): number => {
    for (let i = 0; i < field.length; i++) {
        if (!Number.isFinite(field[i])) return i;
    }
    return -1;
};

export const relativeDrift = (reference: number, value: number): number =>
    Math.abs(value - reference) / Math.max(Math.abs(reference), Number.MIN_VALUE);
