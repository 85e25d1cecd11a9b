import { Effect } from "effect";
import { ConfigurationError } from "./Errors.js";
import { totalMass } from "./Snapshot.js";

export const standardNormal1D = (x: number): number => Math.exp(-(x * x) / 2) / Math.sqrt(2 * Math.PI);

export const standardNormal2D = (x: number, y: number): number =>
    Math.exp(-(x * x + y * y) / 2) / (2 * Math.PI);

/** Unnormalized Gaussian bump of width `sigma` around `center`. */
export const gaussianPulse = (center: number, sigma: number) => (x: number): number =>
    Math.exp(-((x - center) ** 2) / (2 * sigma * sigma));

export const gaussianPulse2D = (cx: number, cy: number, sigma: number) => (x: number, y: number): number =>
    Math.exp(-((x - cx) ** 2 + (y - cy) ** 2) / (2 * sigma * sigma));

/**
 * Checks a sampled initial field and optionally rescales it to unit mass.
 * The returned buffer is a fresh copy.
 */
export const prepareDensity = (
    values: ArrayLike<number>,
    expectedLength: number,
    cellVolume: number,
    normalize: boolean
): Effect.Effect<Float64Array, ConfigurationError> =>
    Effect.suspend(() => {
        if (values.length !== expectedLength) {
            return Effect.fail(new ConfigurationError({
                field: "initialCondition",
                message: `initial condition has ${values.length} cells, grid has ${expectedLength}`,
            }));
        }
        const density = Float64Array.from(values);
        for (let i = 0; i < density.length; i++) {
            if (!Number.isFinite(density[i]) || density[i] < 0) {
                return Effect.fail(new ConfigurationError({
                    field: "initialCondition",
                    message: `initial density must be finite and non-negative, cell ${i} is ${density[i]}`,
                }));
            }
        }
        if (normalize) {
            const mass = totalMass(density, cellVolume);
            if (mass <= 0) {
                return Effect.fail(new ConfigurationError({
                    field: "initialCondition",
                    message: "cannot normalize an initial condition with zero mass",
                }));
            }
            for (let i = 0; i < density.length; i++) {
                density[i] /= mass;
            }
        }
        return Effect.succeed(density);
    });
