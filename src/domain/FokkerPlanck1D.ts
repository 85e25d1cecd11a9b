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
import { Grid1D } from "./Grid.js";
import { prepareDensity, standardNormal1D } from "./InitialCondition.js";
import { integrate, planSteps, type ExplicitScheme, type RunOptions } from "./Integrator.js";
import { totalMass, type SnapshotSequence } from "./Snapshot.js";
import { axisExtrema, stabilityBound, type AxisExtrema } from "./Stability.js";

export type Field1D = (x: number) => number;

export type InitialCondition1D = ReadonlyArray<number> | Float64Array | Field1D;

export interface FokkerPlanck1DConfig {
    readonly drift: Field1D;
    // Must be non-negative on the domain
    readonly diffusion: Field1D;
    readonly xMin?: number;
    readonly xMax?: number;
    readonly n?: number;
    // "reflecting" | "absorbing" | "periodic"
    readonly bcType?: string;
    // Cell values, or a density sampled at cell centers; standard normal when omitted
    readonly initialCondition?: InitialCondition1D;
    // Rescale the initial field to unit mass (default true)
    readonly normalize?: boolean;
    readonly diffusionForm?: DiffusionForm;
}

export type SnapshotSequence1D = SnapshotSequence<Grid1D>;

/**
 * Explicit finite-volume solver for dp/dt = -d/dx (A p - D dp/dx) on a uniform grid.
 * Drift and diffusion are sampled once at construction.
 */
export class FokkerPlanck1D implements ExplicitScheme {
    readonly density: Float64Array;
    private readonly rate: Float64Array;
    private readonly flux: Float64Array;

    private constructor(
        readonly grid: Grid1D,
        readonly boundary: BoundaryStrategy,
        private readonly coeffs: FaceCoefficients,
        private readonly extrema: AxisExtrema,
        private readonly initial: Float64Array
    ) {
        this.density = Float64Array.from(initial);
        this.rate = new Float64Array(grid.n);
        this.flux = new Float64Array(grid.n + 1);
    }

    static make(config: FokkerPlanck1DConfig): Effect.Effect<FokkerPlanck1D, ConfigurationError> {
        return Effect.gen(function* (_) {
            const grid = yield* _(Grid1D.make(config.xMin ?? -5, config.xMax ?? 5, config.n ?? 100));
            const kind = yield* _(decodeBoundary(config.bcType ?? "reflecting"));
            const boundary = resolveBoundary(kind);

            const coeffs = allocateCoefficients(grid.n + 1);
            fillLineCoefficients(
                coeffs,
                0,
                grid,
                config.drift,
                config.diffusion,
                config.diffusionForm ?? "fick",
                kind === "periodic"
            );
            const extrema = yield* _(axisExtrema(coeffs, grid.width, "x"));

            const ic = config.initialCondition ?? standardNormal1D;
            const sampled = typeof ic === "function" ? Array.from(grid.centers, (x) => ic(x)) : ic;
            const initial = yield* _(prepareDensity(sampled, grid.n, grid.width, config.normalize ?? true));

            return new FokkerPlanck1D(grid, boundary, coeffs, extrema, initial);
        });
    }

    get cellVolume(): number {
        return this.grid.width;
    }

    get conservative(): boolean {
        return this.boundary._tag !== "absorbing";
    }

    totalMass(): number {
        return totalMass(this.density, this.grid.width);
    }

    /** Largest dt the scheme accepts: 1 / (max|A| / dx + 2 max D / dx^2). */
    stabilityBound(): number {
        return stabilityBound([this.extrema]);
    }

    /** dp/dt for the current density, written into `out`. */
    derivative(out: Float64Array): void {
        out.fill(0);
        accumulateLine(this.density, out, this.coeffs, 0, 0, 1, this.grid.n, this.grid.width, this.boundary, this.flux);
    }

    advance(dt: number): void {
        this.derivative(this.rate);
        for (let i = 0; i < this.density.length; i++) {
            this.density[i] += dt * this.rate[i];
        }
    }

    /**
     * Integrates from the initial condition to `totalTime`. Every call starts over
     * from t = 0; on instability the error carries the snapshots recorded so far.
     */
    run(options: RunOptions): Effect.Effect<SnapshotSequence1D, SolverError> {
        return Effect.gen(this, function* (_) {
            const plan = yield* _(planSteps(options, this.stabilityBound()));
            this.density.set(this.initial);
            yield* _(Effect.logDebug(`1D run: ${plan.steps} steps of ${plan.dt}, ${this.boundary._tag} boundaries`));
            const result = yield* _(integrate(this, plan));
            return { grid: this.grid, ...result };
        }).pipe(Effect.annotateLogs({ engine: "fokker-planck-1d" }));
    }
}
