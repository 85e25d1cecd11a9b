import { Effect, Option } from "effect";
import { describe, expect, it } from "vitest";
import { Grid1D } from "./domain/Grid.js";
import { SpreadingPulse } from "./domain/Presets.js";
import { runOptions, simulate, summarize, type SimulationRequest } from "./Simulation.js";

const request = (overrides: Partial<SimulationRequest>): SimulationRequest => ({
    dimension: 1,
    preset: "",
    bcType: Option.none(),
    totalTime: Option.none(),
    dt: Option.none(),
    sampleStride: Option.none(),
    ...overrides,
});

describe("simulate", () => {
    it("runs a 1D preset with overrides", () => {
        const animation = Effect.runSync(simulate(request({
            preset: "pulse",
            bcType: Option.some("absorbing"),
            totalTime: Option.some(0.2),
        })));
        const { snapshots, steps } = animation.sequence;

        expect(animation._tag).toBe("OneD");
        expect(steps).toBe(20);
        expect(snapshots).toHaveLength(11);
        expect(snapshots[snapshots.length - 1].time).toBe(0.2);
        expect(snapshots[snapshots.length - 1].mass).toBeLessThan(snapshots[0].mass);
    });

    it("defaults to the first preset of the dimension", () => {
        const animation = Effect.runSync(simulate(request({ dimension: 2, totalTime: Option.some(0.01) })));
        expect(animation._tag).toBe("TwoD");
        if (animation._tag === "TwoD") {
            expect(animation.sequence.grid.nx).toBe(50);
        }
    });

    it("rejects an unknown preset", () => {
        const error = Effect.runSync(Effect.flip(simulate(request({ preset: "missing" }))));
        expect(error._tag).toBe("ConfigurationError");
        if (error._tag === "ConfigurationError") {
            expect(error.field).toBe("preset");
            expect(error.message).toBe('no 1D preset named "missing"; available: cubic, ou, pulse');
        }
    });

    it("surfaces a bad boundary override", () => {
        const error = Effect.runSync(Effect.flip(simulate(request({ bcType: Option.some("open") }))));
        expect(error._tag).toBe("ConfigurationError");
    });
});

describe("runOptions", () => {
    it("takes the preset's run settings", () => {
        const preset = { ...SpreadingPulse, run: { totalTime: 2, dt: 0.01, sampleStride: 5, stabilityCheck: false } };
        expect(runOptions(preset, request({}))).toEqual({ totalTime: 2, dt: 0.01, sampleStride: 5, stabilityCheck: false });
    });

    it("lets the request override time, step and stride", () => {
        const options = runOptions(SpreadingPulse, request({
            totalTime: Option.some(0.5),
            dt: Option.some(0.005),
            sampleStride: Option.some(3),
        }));
        expect(options).toEqual({ totalTime: 0.5, dt: 0.005, sampleStride: 3, stabilityCheck: true });
    });

    it("defaults to an automatic, checked step", () => {
        expect(runOptions(SpreadingPulse, request({}))).toEqual({ totalTime: 1, dt: "auto", sampleStride: 2, stabilityCheck: true });
    });
});

describe("summarize", () => {
    it("reports steps, snapshots and mass", () => {
        const grid = Effect.runSync(Grid1D.make(0, 1, 2));
        const text = summarize({
            _tag: "OneD",
            sequence: {
                grid,
                dt: 0.25,
                steps: 4,
                snapshots: [
                    { step: 0, time: 0, mass: 1, density: [1, 1] },
                    { step: 4, time: 1, mass: 0.5, density: [0.5, 0.5] },
                ],
            },
        });
        expect(text).toBe("4 steps (dt = 2.500e-1), 2 snapshots, mass 1.000000 -> 0.500000 at t = 1");
    });
});
