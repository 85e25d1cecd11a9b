import { describe, expect, it } from "vitest";
import { SnapshotRecorder, peakDensity, totalMass } from "./Snapshot.js";

describe("totalMass", () => {
    it("is the cell sum times the cell volume", () => {
        expect(totalMass([1, 2, 3], 0.5)).toBe(3);
        expect(totalMass(new Float64Array(0), 0.5)).toBe(0);
    });
});

describe("peakDensity", () => {
    it("returns the largest value", () => {
        expect(peakDensity([0.5, 2, 1])).toBe(2);
        expect(peakDensity([-1, -3])).toBe(-1);
    });
});

describe("SnapshotRecorder", () => {
    it("copies the field at record time", () => {
        const field = Float64Array.from([1, 1]);
        const recorder = new SnapshotRecorder(0.5);
        const snapshot = recorder.record(0, 0, field);
        field[0] = 5;

        expect(snapshot.density).toEqual([1, 1]);
        expect(snapshot.mass).toBe(1);
        expect(Object.isFrozen(snapshot)).toBe(true);
        expect(Object.isFrozen(snapshot.density)).toBe(true);
    });

    it("finalizes to an ordered frozen list", () => {
        const recorder = new SnapshotRecorder(1);
        recorder.record(0, 0, Float64Array.from([1]));
        recorder.record(3, 0.3, Float64Array.from([2]));
        const snapshots = recorder.finalize();
        recorder.record(4, 0.4, Float64Array.from([3]));

        expect(snapshots.map((s) => s.step)).toEqual([0, 3]);
        expect(recorder.size).toBe(3);
        expect(Object.isFrozen(snapshots)).toBe(true);
    });
});
