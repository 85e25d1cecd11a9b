import { Effect } from "effect";
import { ConfigurationError, NumericalInstabilityError } from "./Errors.js";
import { SnapshotRecorder, type Snapshot } from "./Snapshot.js";
import {
    MASS_TOLERANCE,
    AUTO_SAFETY,
    STABILITY_TOLERANCE,
    firstNonFinite,
    relativeDrift,
} from "./Stability.js";

export interface RunOptions {
    // Simulated time horizon
    readonly totalTime: number;
    // Fixed step, or "auto" to derive one from the stability bound (default)
    readonly dt?: number | "auto";
    // Record every n-th accepted step; the last step is always recorded
    readonly sampleStride?: number;
    // Reject an explicit dt above the stability bound (default true)
    readonly stabilityCheck?: boolean;
}

export interface StepPlan {
    readonly totalTime: number;
    readonly dt: number;
    readonly steps: number;
    readonly sampleStride: number;
}

/** A forward-Euler scheme owning its density buffer. */
export interface ExplicitScheme {
    readonly density: Float64Array;
    readonly cellVolume: number;
    // True when the boundary policy conserves mass
    readonly conservative: boolean;
    advance(dt: number): void;
}

export interface IntegrationResult {
    readonly dt: number;
    readonly steps: number;
    readonly snapshots: ReadonlyArray<Snapshot>;
}

const invalid = (field: string, message: string) => Effect.fail(new ConfigurationError({ field, message }));

export const planSteps = (
    options: RunOptions,
    bound: number
): Effect.Effect<StepPlan, ConfigurationError | NumericalInstabilityError> =>
    Effect.suspend((): Effect.Effect<StepPlan, ConfigurationError | NumericalInstabilityError> => {
        const { totalTime, dt = "auto", sampleStride = 1, stabilityCheck = true } = options;
        if (!Number.isFinite(totalTime) || totalTime <= 0) {
            return invalid("totalTime", `total time must be positive and finite, got ${totalTime}`);
        }
        if (!Number.isInteger(sampleStride) || sampleStride < 1) {
            return invalid("sampleStride", `sample stride must be a positive integer, got ${sampleStride}`);
        }

        if (dt === "auto") {
            const base = AUTO_SAFETY * bound;
            const steps = Number.isFinite(base) ? Math.max(1, Math.ceil(totalTime / base - 1e-9)) : 1;
            return Effect.succeed({ totalTime, dt: totalTime / steps, steps, sampleStride });
        }

        if (!Number.isFinite(dt) || dt <= 0) {
            return invalid("dt", `time step must be positive and finite, got ${dt}`);
        }
        if (stabilityCheck && dt > bound * (1 + STABILITY_TOLERANCE)) {
            return Effect.fail(new NumericalInstabilityError({
                reason: "step-size",
                step: 0,
                time: 0,
                message: `dt = ${dt} exceeds the stability bound ${bound.toExponential(3)} by a factor of ${(dt / bound).toFixed(2)}`,
                partial: [],
            }));
        }
        const steps = Math.max(1, Math.ceil(totalTime / dt - 1e-9));
        return Effect.succeed({ totalTime, dt, steps, sampleStride });
    });

/**
 * Steps `scheme` to the horizon of `plan`, recording t = 0, every sampled step and
 * the final step. Fails at the first step that leaves a non-finite density.
 */
export const integrate = (
    scheme: ExplicitScheme,
    plan: StepPlan
): Effect.Effect<IntegrationResult, NumericalInstabilityError> =>
    Effect.gen(function* (_) {
        const recorder = new SnapshotRecorder(scheme.cellVolume);
        const initial = recorder.record(0, 0, scheme.density);
        let time = 0;
        let warned = false;

        for (let step = 1; step <= plan.steps; step++) {
            // Times are k * dt rather than a running sum; the last step lands on the horizon.
            const next = step === plan.steps ? plan.totalTime : Math.min(step * plan.dt, plan.totalTime);
            scheme.advance(next - time);
            time = next;

            const bad = firstNonFinite(scheme.density);
            if (bad >= 0) {
                return yield* _(Effect.fail(new NumericalInstabilityError({
                    reason: "non-finite",
                    step,
                    time,
                    message: `density became ${scheme.density[bad]} in cell ${bad} at step ${step}`,
                    partial: recorder.finalize(),
                })));
            }

            if (step % plan.sampleStride === 0 || step === plan.steps) {
                const snapshot = recorder.record(step, time, scheme.density);
                const drift = relativeDrift(initial.mass, snapshot.mass);
                if (scheme.conservative && !warned && drift > MASS_TOLERANCE) {
                    warned = true;
                    yield* _(Effect.logWarning(`mass drifted by ${drift.toExponential(2)} relative at t = ${time}`));
                }
            }
        }

        yield* _(Effect.logDebug(`integrated ${plan.steps} steps, ${recorder.size} snapshots`));
        return { dt: plan.dt, steps: plan.steps, snapshots: recorder.finalize() };
    });
