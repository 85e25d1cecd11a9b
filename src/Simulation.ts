import { Effect, Option } from "effect";
import type { Dimension } from "./config/SimulationConfig.js";
import { ConfigurationError, type SolverError } from "./domain/Errors.js";
import { FokkerPlanck1D } from "./domain/FokkerPlanck1D.js";
import { FokkerPlanck2D } from "./domain/FokkerPlanck2D.js";
import type { RunOptions } from "./domain/Integrator.js";
import { presets1D, presets2D, type Preset } from "./domain/Presets.js";
import type { Animation } from "./rendering/AsciiRenderer.js";

export interface SimulationRequest {
    readonly dimension: Dimension;
    readonly preset: string;
    readonly bcType: Option.Option<string>;
    readonly totalTime: Option.Option<number>;
    readonly dt: Option.Option<number>;
    readonly sampleStride: Option.Option<number>;
}

const findPreset = <C>(
    presets: ReadonlyArray<Preset<C>>,
    name: string,
    dimension: Dimension
): Effect.Effect<Preset<C>, ConfigurationError> => {
    const found = name === "" ? presets[0] : presets.find((preset) => preset.name === name);
    return found
        ? Effect.succeed(found)
        : Effect.fail(new ConfigurationError({
            field: "preset",
            message: `no ${dimension}D preset named "${name}"; available: ${presets.map((p) => p.name).join(", ")}`,
        }));
};

/** Preset run settings with the request's overrides on top. */
export const runOptions = (preset: Preset<unknown>, request: SimulationRequest): RunOptions => ({
    totalTime: Option.getOrElse(request.totalTime, () => preset.run.totalTime),
    dt: Option.getOrElse(request.dt, (): number | "auto" => preset.run.dt ?? "auto"),
    sampleStride: Option.getOrElse(request.sampleStride, () => preset.run.sampleStride ?? 1),
    stabilityCheck: preset.run.stabilityCheck ?? true,
});

/** Builds the engine for the selected preset, overrides included, and runs it. */
export const simulate = (request: SimulationRequest): Effect.Effect<Animation, SolverError> =>
    Effect.gen(function* (_) {
        if (request.dimension === 1) {
            const preset = yield* _(findPreset(presets1D, request.preset, 1));
            const config = Option.match(request.bcType, {
                onNone: () => preset.config,
                onSome: (bcType) => ({ ...preset.config, bcType }),
            });
            yield* _(Effect.logInfo(`1D preset "${preset.name}": ${preset.description}`));
            const engine = yield* _(FokkerPlanck1D.make(config));
            const sequence = yield* _(engine.run(runOptions(preset, request)));
            return { _tag: "OneD", sequence } as const;
        }

        const preset = yield* _(findPreset(presets2D, request.preset, 2));
        const config = Option.match(request.bcType, {
            onNone: () => preset.config,
            onSome: (bcType) => ({ ...preset.config, bcType }),
        });
        yield* _(Effect.logInfo(`2D preset "${preset.name}": ${preset.description}`));
        const engine = yield* _(FokkerPlanck2D.make(config));
        const sequence = yield* _(engine.run(runOptions(preset, request)));
        return { _tag: "TwoD", sequence } as const;
    });

export const summarize = (animation: Animation): string => {
    const { snapshots, steps, dt } = animation.sequence;
    const first = snapshots[0];
    const last = snapshots[snapshots.length - 1];
    return `${steps} steps (dt = ${dt.toExponential(3)}), ${snapshots.length} snapshots, ` +
        `mass ${first.mass.toFixed(6)} -> ${last.mass.toFixed(6)} at t = ${last.time}`;
};
