import { Effect } from "effect";
import { ConfigurationError } from "./Errors.js";

/** Uniform cell-centered discretization of [min, max] into `n` cells. */
export class Grid1D {
    readonly width: number;
    readonly centers: Float64Array;
    // n + 1 face positions, faces[0] = min and faces[n] = max
    readonly faces: Float64Array;

    private constructor(readonly min: number, readonly max: number, readonly n: number) {
        this.width = (max - min) / n;
        this.centers = new Float64Array(n);
        this.faces = new Float64Array(n + 1);
        for (let i = 0; i <= n; i++) {
            this.faces[i] = min + i * this.width;
            if (i < n) {
                this.centers[i] = min + (i + 0.5) * this.width;
            }
        }
    }

    static make(min: number, max: number, n: number, axis = "x"): Effect.Effect<Grid1D, ConfigurationError> {
        return Effect.suspend(() => {
            if (!Number.isInteger(n) || n < 2) {
                return Effect.fail(new ConfigurationError({
                    field: `n${axis}`,
                    message: `grid needs an integer cell count of at least 2 along ${axis}, got ${n}`,
                }));
            }
            if (!Number.isFinite(min) || !Number.isFinite(max) || min >= max) {
                return Effect.fail(new ConfigurationError({
                    field: `${axis}Min`,
                    message: `degenerate domain along ${axis}: [${min}, ${max}]`,
                }));
            }
            return Effect.succeed(new Grid1D(min, max, n));
        });
    }
}

/** Tensor product of two axes, stored row-major in x: IX(i, j) = i + j * nx. */
export class Grid2D {
    readonly nx: number;
    readonly ny: number;
    readonly size: number;

    private constructor(readonly x: Grid1D, readonly y: Grid1D) {
        this.nx = x.n;
        this.ny = y.n;
        this.size = x.n * y.n;
    }

    get cellArea(): number {
        return this.x.width * this.y.width;
    }

    IX(i: number, j: number): number {
        return i + j * this.nx;
    }

    static make(x: Grid1D, y: Grid1D): Grid2D {
        return new Grid2D(x, y);
    }
}
