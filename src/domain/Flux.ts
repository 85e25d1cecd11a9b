import type { BoundaryStrategy } from "./Boundary.js";
import type { Grid1D } from "./Grid.js";

/**
 * Coefficients of the faces of one or more grid lines, `n + 1` faces per line.
 * Line `l` occupies indices [l * (n + 1), (l + 1) * (n + 1)).
 *
 * The diffusive flux across a face is `-(diffUpper * pUpper - diffLower * pLower) / h`.
 * In Fick form both weights are D at the face; in Ito form they are D at the two
 * adjacent cell centers, which makes the flux the difference of D·p.
 */
export interface FaceCoefficients {
    readonly drift: Float64Array;
    readonly diffLower: Float64Array;
    readonly diffUpper: Float64Array;
}

export type DiffusionForm = "fick" | "ito";

export const allocateCoefficients = (faces: number): FaceCoefficients => ({
    drift: new Float64Array(faces),
    diffLower: new Float64Array(faces),
    diffUpper: new Float64Array(faces),
});

/**
 * Samples drift and diffusion for one grid line along `axis`.
 * Under periodic boundaries face n is the image of face 0 and receives a copy of it.
 */
export function fillLineCoefficients(
    coeffs: FaceCoefficients,
    line: number,
    axis: Grid1D,
    drift: (s: number) => number,
    diffusion: (s: number) => number,
    form: DiffusionForm,
    periodic: boolean
): void {
    const n = axis.n;
    const base = line * (n + 1);
    const { faces, centers } = axis;

    for (let f = 0; f <= n; f++) {
        coeffs.drift[base + f] = drift(faces[f]);
        if (form === "fick") {
            const d = diffusion(faces[f]);
            coeffs.diffLower[base + f] = d;
            coeffs.diffUpper[base + f] = d;
        } else {
            coeffs.diffLower[base + f] = diffusion(f > 0 ? centers[f - 1] : periodic ? centers[n - 1] : faces[0]);
            coeffs.diffUpper[base + f] = diffusion(f < n ? centers[f] : faces[n]);
        }
    }

    if (periodic) {
        coeffs.drift[base + n] = coeffs.drift[base];
        coeffs.diffLower[base + n] = coeffs.diffLower[base];
        coeffs.diffUpper[base + n] = coeffs.diffUpper[base];
    }
}

/** Upwind advection plus centered diffusion across a single face. */
export const faceFlux = (
    drift: number,
    diffLower: number,
    diffUpper: number,
    pLower: number,
    pUpper: number,
    h: number
): number => {
    const advective = drift >= 0 ? drift * pLower : drift * pUpper;
    const diffusive = -(diffUpper * pUpper - diffLower * pLower) / h;
    return advective + diffusive;
};

/**
 * Adds -div(F) along one grid line of `n` cells into `rate`.
 * Cell k of the line lives at `offset + k * stride` in both `field` and `rate`.
 * `flux` is scratch space of length n + 1.
 */
export function accumulateLine(
    field: Float64Array,
    rate: Float64Array,
    coeffs: FaceCoefficients,
    line: number,
    offset: number,
    stride: number,
    n: number,
    h: number,
    boundary: BoundaryStrategy,
    flux: Float64Array
): void {
    const base = line * (n + 1);
    const { drift, diffLower, diffUpper } = coeffs;
    const first = field[offset];
    const last = field[offset + (n - 1) * stride];

    flux[0] = boundary.lower(drift[base], diffLower[base], diffUpper[base], first, last, h);
    flux[n] = boundary.upper(drift[base + n], diffLower[base + n], diffUpper[base + n], first, last, h);

    for (let f = 1; f < n; f++) {
        const pLower = field[offset + (f - 1) * stride];
        const pUpper = field[offset + f * stride];
        flux[f] = faceFlux(drift[base + f], diffLower[base + f], diffUpper[base + f], pLower, pUpper, h);
    }

    for (let k = 0; k < n; k++) {
        rate[offset + k * stride] -= (flux[k + 1] - flux[k]) / h;
    }
}
