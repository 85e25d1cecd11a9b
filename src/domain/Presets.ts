import type { FokkerPlanck1DConfig } from "./FokkerPlanck1D.js";
import type { FokkerPlanck2DConfig } from "./FokkerPlanck2D.js";
import { gaussianPulse, gaussianPulse2D } from "./InitialCondition.js";
import type { RunOptions } from "./Integrator.js";

export interface Preset<C> {
    readonly name: string;
    readonly description: string;
    readonly config: C;
    readonly run: RunOptions;
}

export type Preset1D = Preset<FokkerPlanck1DConfig>;
export type Preset2D = Preset<FokkerPlanck2DConfig>;

export const CubicDrift: Preset1D = {
    name: "cubic",
    description: "Cubic restoring drift A = -0.2 x^3 with constant diffusion 0.5",
    config: {
        drift: (x) => -0.2 * x ** 3,
        diffusion: () => 0.5,
        xMin: -5,
        xMax: 5,
        n: 100,
        bcType: "reflecting",
    },
    run: { totalTime: 1, sampleStride: 10 },
};

export const OrnsteinUhlenbeck: Preset1D = {
    name: "ou",
    description: "Ornstein-Uhlenbeck process A = -x, D = 0.5; the standard normal is stationary",
    config: {
        drift: (x) => -x,
        diffusion: () => 0.5,
        xMin: -5,
        xMax: 5,
        n: 100,
        bcType: "reflecting",
    },
    run: { totalTime: 1, sampleStride: 10 },
};

export const SpreadingPulse: Preset1D = {
    name: "pulse",
    description: "Pure diffusion (D = 0.01) of a narrow pulse on [0, 1]",
    config: {
        drift: () => 0,
        diffusion: () => 0.01,
        xMin: 0,
        xMax: 1,
        n: 50,
        bcType: "reflecting",
        initialCondition: gaussianPulse(0.5, 0.05),
    },
    run: { totalTime: 1, sampleStride: 2 },
};

export const CubicLinearDrift2D: Preset2D = {
    name: "cubic",
    description: "A_x = -0.2 x^3, A_y = -y with isotropic diffusion 0.5",
    config: {
        driftX: (x) => -0.2 * x ** 3,
        driftY: (_x, y) => -y,
        diffusionX: () => 0.5,
        diffusionY: () => 0.5,
        nx: 50,
        ny: 50,
        bcType: "reflecting",
    },
    run: { totalTime: 0.5, sampleStride: 5 },
};

export const PeriodicPointMass2D: Preset2D = {
    name: "pulse",
    description: "Isotropic diffusion (D = 0.01) of a smoothed point mass on the periodic unit square",
    config: {
        driftX: () => 0,
        driftY: () => 0,
        diffusionX: () => 0.01,
        diffusionY: () => 0.01,
        xMin: 0,
        xMax: 1,
        yMin: 0,
        yMax: 1,
        nx: 30,
        ny: 30,
        bcType: "periodic",
        initialCondition: gaussianPulse2D(0.5, 0.5, 0.05),
    },
    run: { totalTime: 1, sampleStride: 2 },
};

export const presets1D: ReadonlyArray<Preset1D> = [CubicDrift, OrnsteinUhlenbeck, SpreadingPulse];
export const presets2D: ReadonlyArray<Preset2D> = [CubicLinearDrift2D, PeriodicPointMass2D];
