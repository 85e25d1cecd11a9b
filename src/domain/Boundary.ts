import { Effect, Schema } from "effect";
import { ConfigurationError } from "./Errors.js";
import { faceFlux } from "./Flux.js";

export const BoundaryKind = Schema.Literal("reflecting", "absorbing", "periodic");
export type BoundaryKind = typeof BoundaryKind.Type;

// Flux through an edge face given the face coefficients and the two edge cells of the line.
type EdgeFlux = (
    drift: number,
    diffLower: number,
    diffUpper: number,
    first: number,
    last: number,
    h: number
) => number;

export interface BoundaryStrategy {
    readonly _tag: BoundaryKind;
    readonly lower: EdgeFlux;
    readonly upper: EdgeFlux;
}

const Reflecting: BoundaryStrategy = {
    _tag: "reflecting",
    lower: () => 0,
    upper: () => 0,
};

// Zero density outside: upwinding lets drift only carry mass out.
const Absorbing: BoundaryStrategy = {
    _tag: "absorbing",
    lower: (drift, diffLower, diffUpper, first, _last, h) => faceFlux(drift, diffLower, diffUpper, 0, first, h),
    upper: (drift, diffLower, diffUpper, _first, last, h) => faceFlux(drift, diffLower, diffUpper, last, 0, h),
};

// Faces 0 and n are the same face; engines copy coefficients so both edges agree.
const wrappedFlux: EdgeFlux = (drift, diffLower, diffUpper, first, last, h) =>
    faceFlux(drift, diffLower, diffUpper, last, first, h);

const Periodic: BoundaryStrategy = {
    _tag: "periodic",
    lower: wrappedFlux,
    upper: wrappedFlux,
};

export function resolveBoundary(kind: BoundaryKind): BoundaryStrategy {
    switch (kind) {
        case "reflecting":
            return Reflecting;
        case "absorbing":
            return Absorbing;
        case "periodic":
            return Periodic;
    }
}

export const decodeBoundary = (value: unknown, field = "bcType"): Effect.Effect<BoundaryKind, ConfigurationError> =>
    Schema.decodeUnknown(BoundaryKind)(value).pipe(
        Effect.mapError(() => new ConfigurationError({
            field,
            message: `unrecognized boundary condition ${JSON.stringify(value)}, expected one of reflecting, absorbing, periodic`,
        }))
    );
