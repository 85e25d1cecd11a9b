export interface Snapshot {
    readonly step: number;
    readonly time: number;
    // Discrete integral of the density over the grid at `time`
    readonly mass: number;
    readonly density: ReadonlyArray<number>;
}

export interface SnapshotSequence<G> {
    readonly grid: G;
    // Step size actually used; the final step may be shorter
    readonly dt: number;
    readonly steps: number;
    readonly snapshots: ReadonlyArray<Snapshot>;
}

export const totalMass = (field: ArrayLike<number>, cellVolume: number): number => {
    let sum = 0;
    for (let i = 0; i < field.length; i++) {
        sum += field[i];
    }
    return sum * cellVolume;
};

export const peakDensity = (field: ArrayLike<number>): number => {
    let max = Number.NEGATIVE_INFINITY;
    for (let i = 0; i < field.length; i++) {
        if (field[i] > max) max = field[i];
    }
    return max;
};

/** Append-only collector; `finalize` hands out a frozen copy. */
export class SnapshotRecorder {
    private readonly snapshots: Snapshot[] = [];

    constructor(private readonly cellVolume: number) { }

    record(step: number, time: number, field: Float64Array): Snapshot {
        const snapshot: Snapshot = Object.freeze({
            step,
            time,
            mass: totalMass(field, this.cellVolume),
            density: Object.freeze(Array.from(field)),
        });
        this.snapshots.push(snapshot);
        return snapshot;
    }

    get size(): number {
        return this.snapshots.length;
    }

    finalize(): ReadonlyArray<Snapshot> {
        return Object.freeze([...this.snapshots]);
    }
}
