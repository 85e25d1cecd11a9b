import type { Grid2D } from "../domain/Grid.js";

/** p(x) = sum over j of p(x_i, y_j) dy, one value per column. */
export const marginalX = (density: ArrayLike<number>, grid: Grid2D): Float64Array => {
    const out = new Float64Array(grid.nx);
    for (let j = 0; j < grid.ny; j++) {
        for (let i = 0; i < grid.nx; i++) {
            out[i] += density[grid.IX(i, j)];
        }
    }
    for (let i = 0; i < grid.nx; i++) out[i] *= grid.y.width;
    return out;
};

/** p(y) = sum over i of p(x_i, y_j) dx, one value per row. */
export const marginalY = (density: ArrayLike<number>, grid: Grid2D): Float64Array => {
    const out = new Float64Array(grid.ny);
    for (let j = 0; j < grid.ny; j++) {
        for (let i = 0; i < grid.nx; i++) {
            out[j] += density[grid.IX(i, j)];
        }
    }
    for (let j = 0; j < grid.ny; j++) out[j] *= grid.x.width;
    return out;
};
