import { Effect } from "effect";
import { describe, expect, it } from "vitest";
import { Grid1D, Grid2D } from "./Grid.js";

describe("Grid1D", () => {
    it("places cell centers halfway between evenly spaced faces", () => {
        const grid = Effect.runSync(Grid1D.make(0, 1, 4));
        expect(grid.width).toBe(0.25);
        expect(Array.from(grid.faces)).toEqual([0, 0.25, 0.5, 0.75, 1]);
        expect(Array.from(grid.centers)).toEqual([0.125, 0.375, 0.625, 0.875]);
    });

    it("rejects fewer than two cells", () => {
        const error = Effect.runSync(Effect.flip(Grid1D.make(0, 1, 1)));
        expect(error._tag).toBe("ConfigurationError");
        expect(error.field).toBe("nx");
    });

    it("rejects a fractional cell count", () => {
        const error = Effect.runSync(Effect.flip(Grid1D.make(0, 1, 2.5, "y")));
        expect(error.field).toBe("ny");
    });

    it("rejects a degenerate domain", () => {
        const error = Effect.runSync(Effect.flip(Grid1D.make(1, 1, 10)));
        expect(error.field).toBe("xMin");
        expect(error.message).toBe("degenerate domain along x: [1, 1]");
    });
});

describe("Grid2D", () => {
    it("indexes row-major in x", () => {
        const x = Effect.runSync(Grid1D.make(0, 3, 3));
        const y = Effect.runSync(Grid1D.make(0, 1, 2, "y"));
        const grid = Grid2D.make(x, y);
        expect(grid.size).toBe(6);
        expect(grid.IX(0, 0)).toBe(0);
        expect(grid.IX(2, 1)).toBe(5);
        expect(grid.cellArea).toBe(0.5);
    });
});
