import { Effect } from "effect";
import { decodeBoundary, resolveBoundary, type BoundaryStrategy } from "./Boundary.js";
import type { SolverError, ConfigurationError } from "./Errors.js";
import {
    accumulateLine,
    allocateCoefficients,
    fillLineCoefficients,
    type DiffusionForm,
    type FaceCoefficients,
} from "./Flux.js";
import { Grid1D, Grid2D } from "./Grid.js";
import { prepareDensity, standardNormal2D } from "./InitialCondition.js";
import { integrate, planSteps, type ExplicitScheme, type RunOptions } from "./Integrator.js";
import { totalMass, type SnapshotSequence } from "./Snapshot.js";
import { axisExtrema, stabilityBound, type AxisExtrema } from "./Stability.js";

export type Field2D = (x: number, y: number) => number;

export type InitialCondition2D = ReadonlyArray<number> | Float64Array | Field2D;

export interface FokkerPlanck2DConfig {
    readonly driftX: Field2D;
    readonly driftY: Field2D;
    readonly diffusionX: Field2D;
    readonly diffusionY: Field2D;
    readonly xMin?: number;
    readonly xMax?: number;
    readonly yMin?: number;
    readonly yMax?: number;
    readonly nx?: number;
    readonly ny?: number;
    // One selector for all four edges, or one per axis
    readonly bcType?: string | { readonly x: string; readonly y: string };
    // Flat row-major field (IX(i, j) = i + j * nx) or a density sampled at cell centers
    readonly initialCondition?: InitialCondition2D;
    readonly normalize?: boolean;
    readonly diffusionForm?: DiffusionForm;
}

export type SnapshotSequence2D = SnapshotSequence<Grid2D>;

export class FokkerPlanck2D implements ExplicitScheme {
    readonly density: Float64Array;
    private readonly rate: Float64Array;
    private readonly fluxX: Float64Array;
    private readonly fluxY: Float64Array;

    private constructor(
        readonly grid: Grid2D,
        readonly boundaryX: BoundaryStrategy,
        readonly boundaryY: BoundaryStrategy,
        // x-faces: one line per row j; y-faces: one line per column i
        private readonly coeffsX: FaceCoefficients,
        private readonly coeffsY: FaceCoefficients,
        private readonly extrema: readonly [AxisExtrema, AxisExtrema],
        private readonly initial: Float64Array
    ) {
        this.density = Float64Array.from(initial);
        this.rate = new Float64Array(grid.size);
        this.fluxX = new Float64Array(grid.nx + 1);
        this.fluxY = new Float64Array(grid.ny + 1);
    }

    static make(config: FokkerPlanck2DConfig): Effect.Effect<FokkerPlanck2D, ConfigurationError> {
        return Effect.gen(function* (_) {
            const x = yield* _(Grid1D.make(config.xMin ?? -5, config.xMax ?? 5, config.nx ?? 50, "x"));
            const y = yield* _(Grid1D.make(config.yMin ?? -5, config.yMax ?? 5, config.ny ?? 50, "y"));
            const grid = Grid2D.make(x, y);

            const bc = config.bcType ?? "reflecting";
            const kindX = yield* _(decodeBoundary(typeof bc === "string" ? bc : bc.x, "bcType.x"));
            const kindY = yield* _(decodeBoundary(typeof bc === "string" ? bc : bc.y, "bcType.y"));
            const form = config.diffusionForm ?? "fick";

            const coeffsX = allocateCoefficients((x.n + 1) * y.n);
            for (let j = 0; j < y.n; j++) {
                const yj = y.centers[j];
                fillLineCoefficients(
                    coeffsX,
                    j,
                    x,
                    (s) => config.driftX(s, yj),
                    (s) => config.diffusionX(s, yj),
                    form,
                    kindX === "periodic"
                );
            }
            const coeffsY = allocateCoefficients((y.n + 1) * x.n);
            for (let i = 0; i < x.n; i++) {
                const xi = x.centers[i];
                fillLineCoefficients(
                    coeffsY,
                    i,
                    y,
                    (s) => config.driftY(xi, s),
                    (s) => config.diffusionY(xi, s),
                    form,
                    kindY === "periodic"
                );
            }
            const extremaX = yield* _(axisExtrema(coeffsX, x.width, "x"));
            const extremaY = yield* _(axisExtrema(coeffsY, y.width, "y"));

            const ic = config.initialCondition ?? standardNormal2D;
            let sampled: ArrayLike<number>;
            if (typeof ic === "function") {
                const values = new Float64Array(grid.size);
                for (let j = 0; j < y.n; j++) {
                    for (let i = 0; i < x.n; i++) {
                        values[grid.IX(i, j)] = ic(x.centers[i], y.centers[j]);
                    }
                }
                sampled = values;
            } else {
                sampled = ic;
            }
            const initial = yield* _(prepareDensity(sampled, grid.size, grid.cellArea, config.normalize ?? true));

            return new FokkerPlanck2D(
                grid,
                resolveBoundary(kindX),
                resolveBoundary(kindY),
                coeffsX,
                coeffsY,
                [extremaX, extremaY],
                initial
            );
        });
    }

    get cellVolume(): number {
        return this.grid.cellArea;
    }

    get conservative(): boolean {
        return this.boundaryX._tag !== "absorbing" && this.boundaryY._tag !== "absorbing";
    }

    totalMass(): number {
        return totalMass(this.density, this.grid.cellArea);
    }

    /** Both axes share one positivity budget, so their rates add. */
    stabilityBound(): number {
        return stabilityBound(this.extrema);
    }

    derivative(out: Float64Array): void {
        const { nx, ny, x, y } = this.grid;
        out.fill(0);
        for (let j = 0; j < ny; j++) {
            accumulateLine(this.density, out, this.coeffsX, j, j * nx, 1, nx, x.width, this.boundaryX, this.fluxX);
        }
        for (let i = 0; i < nx; i++) {
            accumulateLine(this.density, out, this.coeffsY, i, i, nx, ny, y.width, this.boundaryY, this.fluxY);
        }
    }

    advance(dt: number): void {
        this.derivative(this.rate);
        for (let k = 0; k < this.density.length; k++) {
            this.density[k] += dt * this.rate[k];
        }
    }

    run(options: RunOptions): Effect.Effect<SnapshotSequence2D, SolverError> {
        return Effect.gen(this, function* (_) {
            const plan = yield* _(planSteps(options, this.stabilityBound()));
            this.density.set(this.initial);
            yield* _(Effect.logDebug(
                `2D run: ${plan.steps} steps of ${plan.dt}, ${this.boundaryX._tag}/${this.boundaryY._tag} boundaries`
            ));
            const result = yield* _(integrate(this, plan));
            return { grid: this.grid, ...result };
        }).pipe(Effect.annotateLogs({ engine: "fokker-planck-2d" }));
    }
}
