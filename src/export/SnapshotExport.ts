import { FileSystem } from "@effect/platform";
import type { PlatformError } from "@effect/platform/Error";
import { Effect, Schema, type ParseResult } from "effect";
import type { Grid1D } from "../domain/Grid.js";
import type { Animation } from "../rendering/AsciiRenderer.js";

const AxisSchema = Schema.Struct({
    min: Schema.Number,
    max: Schema.Number,
    n: Schema.Int,
});

const SnapshotSchema = Schema.Struct({
    step: Schema.Int,
    time: Schema.Number,
    mass: Schema.Number,
    density: Schema.Array(Schema.Number),
});

/** On-disk form of a finished run; 2D densities are row-major in x. */
export const SnapshotDocument = Schema.Struct({
    dimension: Schema.Literal(1, 2),
    axes: Schema.Array(AxisSchema),
    dt: Schema.Number,
    steps: Schema.Int,
    snapshots: Schema.Array(SnapshotSchema),
});
export type SnapshotDocument = typeof SnapshotDocument.Type;

const SnapshotJson = Schema.parseJson(SnapshotDocument, { space: 2 });

const axisOf = (axis: Grid1D) => ({ min: axis.min, max: axis.max, n: axis.n });

export const toDocument = (animation: Animation): SnapshotDocument => {
    const { sequence } = animation;
    return {
        dimension: animation._tag === "OneD" ? 1 : 2,
        axes: animation._tag === "OneD"
            ? [axisOf(animation.sequence.grid)]
            : [axisOf(animation.sequence.grid.x), axisOf(animation.sequence.grid.y)],
        dt: sequence.dt,
        steps: sequence.steps,
        snapshots: sequence.snapshots,
    };
};

export const exportSnapshots = (
    path: string,
    animation: Animation
): Effect.Effect<void, PlatformError | ParseResult.ParseError, FileSystem.FileSystem> =>
    Effect.gen(function* (_) {
        const fs = yield* _(FileSystem.FileSystem);
        const json = yield* _(Schema.encode(SnapshotJson)(toDocument(animation)));
        yield* _(fs.writeFileString(path, json));
        yield* _(Effect.logInfo(`wrote ${animation.sequence.snapshots.length} snapshots to ${path}`));
    });

export const readSnapshots = (
    path: string
): Effect.Effect<SnapshotDocument, PlatformError | ParseResult.ParseError, FileSystem.FileSystem> =>
    Effect.gen(function* (_) {
        const fs = yield* _(FileSystem.FileSystem);
        const text = yield* _(fs.readFileString(path));
        return yield* _(Schema.decodeUnknown(SnapshotJson)(text));
    });
