import type { SnapshotSequence1D } from "../domain/FokkerPlanck1D.js";
import type { SnapshotSequence2D } from "../domain/FokkerPlanck2D.js";
import type { Grid1D } from "../domain/Grid.js";
import { peakDensity, type Snapshot } from "../domain/Snapshot.js";
import { marginalX, marginalY } from "./Marginals.js";

const CHARS = " .:-=+*#%@";
const BAR = "#";
const MARGINAL_ROWS = 4;

export type Animation =
    | { readonly _tag: "OneD"; readonly sequence: SnapshotSequence1D }
    | { readonly _tag: "TwoD"; readonly sequence: SnapshotSequence2D };

export interface FrameSize {
    readonly width: number;
    readonly height: number;
}

// Fixed vertical scales for a whole animation so frames are comparable
interface FrameScale {
    readonly density: number;
    readonly marginalX: number;
    readonly marginalY: number;
}

const positive = (value: number): number => (value > 0 && Number.isFinite(value) ? value : 1);

// Column c of `width` shows sample floor(c * n / width)
const resample = (values: ArrayLike<number>, width: number): number[] =>
    Array.from({ length: width }, (_, c) => values[Math.floor((c * values.length) / width)]);

const padLine = (line: string, width: number): string =>
    line.length >= width ? line.slice(0, width) : line + " ".repeat(width - line.length);

export class AsciiRenderer {
    static getChar(value: number, max: number): string {
        const normalized = Math.max(0, Math.min(value, max)) / max;
        const index = Math.floor(normalized * (CHARS.length - 1));
        return CHARS[index];
    }

    /** Bar chart, one column per resampled value, `height` rows, top row first. */
    static renderProfile(values: ArrayLike<number>, width: number, height: number, max: number): string {
        const bars = resample(values, width).map((v) =>
            Math.round((Math.max(0, Math.min(v, max)) / max) * height)
        );
        const rows: string[] = [];
        for (let r = 0; r < height; r++) {
            const level = height - r;
            rows.push(bars.map((b) => (b >= level ? BAR : " ")).join(""));
        }
        return rows.join("\n");
    }

    /** Density heat map; highest y on the top row. */
    static renderHeatmap(sequence: SnapshotSequence2D, density: ReadonlyArray<number>, size: FrameSize, max: number): string {
        const { grid } = sequence;
        const cols = Math.min(grid.nx, size.width);
        const rows = Math.min(grid.ny, size.height);
        const lines: string[] = [];
        for (let r = 0; r < rows; r++) {
            const j = grid.ny - 1 - Math.floor((r * grid.ny) / rows);
            let line = "";
            for (let c = 0; c < cols; c++) {
                const i = Math.floor((c * grid.nx) / cols);
                line += this.getChar(density[grid.IX(i, j)], max);
            }
            lines.push(line);
        }
        return lines.join("\n");
    }

    static header(snapshot: Snapshot, index: number, count: number): string {
        return `t = ${snapshot.time.toFixed(3)}  mass = ${snapshot.mass.toFixed(6)}  frame ${index + 1}/${count}`;
    }

    static axisLine(axis: Grid1D, width: number): string {
        const left = axis.min.toFixed(2);
        const right = axis.max.toFixed(2);
        const gap = Math.max(1, width - left.length - right.length);
        return left + " ".repeat(gap) + right;
    }

    static scaleOf(animation: Animation): FrameScale {
        let density = 0;
        let mx = 0;
        let my = 0;
        for (const snapshot of animation.sequence.snapshots) {
            density = Math.max(density, peakDensity(snapshot.density));
            if (animation._tag === "TwoD") {
                mx = Math.max(mx, peakDensity(marginalX(snapshot.density, animation.sequence.grid)));
                my = Math.max(my, peakDensity(marginalY(snapshot.density, animation.sequence.grid)));
            }
        }
        return { density: positive(density), marginalX: positive(mx), marginalY: positive(my) };
    }

    static renderFrame(animation: Animation, index: number, size: FrameSize, scale: FrameScale): string {
        const { snapshots } = animation.sequence;
        const snapshot = snapshots[index];
        const lines = [this.header(snapshot, index, snapshots.length)];

        if (animation._tag === "OneD") {
            lines.push(this.renderProfile(snapshot.density, size.width, Math.max(1, size.height - 2), scale.density));
            lines.push(this.axisLine(animation.sequence.grid, size.width));
        } else {
            const { grid } = animation.sequence;
            const mapRows = Math.max(1, size.height - 2 * (MARGINAL_ROWS + 1) - 1);
            lines.push(this.renderHeatmap(animation.sequence, snapshot.density, { width: size.width, height: mapRows }, scale.density));
            lines.push("p(x, t)");
            lines.push(this.renderProfile(marginalX(snapshot.density, grid), size.width, MARGINAL_ROWS, scale.marginalX));
            lines.push("p(y, t)");
            lines.push(this.renderProfile(marginalY(snapshot.density, grid), size.width, MARGINAL_ROWS, scale.marginalY));
        }

        return lines
            .join("\n")
            .split("\n")
            .map((line) => padLine(line, size.width))
            .join("\n");
    }

    static renderAll(animation: Animation, size: FrameSize): ReadonlyArray<string> {
        const scale = this.scaleOf(animation);
        return animation.sequence.snapshots.map((_, index) => this.renderFrame(animation, index, size, scale));
    }
}
