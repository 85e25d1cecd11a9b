import { describe, expect, it } from "vitest";
import { advance, applyEvent, initialPlayback } from "./Playback.js";

describe("advance", () => {
    it("moves forward while playing", () => {
        expect(advance(initialPlayback, 3)).toEqual({ index: 1, playing: true, quit: false });
    });

    it("stops on the last frame", () => {
        expect(advance({ index: 1, playing: true, quit: false }, 3)).toEqual({ index: 2, playing: false, quit: false });
    });

    it("holds while paused", () => {
        const paused = { index: 1, playing: false, quit: false };
        expect(advance(paused, 3)).toBe(paused);
    });
});

describe("applyEvent", () => {
    it("quits", () => {
        expect(applyEvent(initialPlayback, { _tag: "Quit" }, 3).quit).toBe(true);
    });

    it("toggles pause", () => {
        const paused = applyEvent(initialPlayback, { _tag: "TogglePause" }, 3);
        expect(paused.playing).toBe(false);
        expect(applyEvent(paused, { _tag: "TogglePause" }, 3).playing).toBe(true);
    });

    it("starts over when resumed on the last frame", () => {
        const ended = { index: 2, playing: false, quit: false };
        expect(applyEvent(ended, { _tag: "TogglePause" }, 3)).toEqual({ index: 0, playing: true, quit: false });
    });

    it("restarts", () => {
        const ended = { index: 2, playing: false, quit: false };
        expect(applyEvent(ended, { _tag: "Restart" }, 3)).toEqual({ index: 0, playing: true, quit: false });
    });

    it("seeks within bounds and pauses", () => {
        expect(applyEvent(initialPlayback, { _tag: "Seek", delta: 1 }, 3)).toEqual({ index: 1, playing: false, quit: false });
        expect(applyEvent(initialPlayback, { _tag: "Seek", delta: -1 }, 3).index).toBe(0);
        expect(applyEvent(initialPlayback, { _tag: "Seek", delta: Number.POSITIVE_INFINITY }, 3).index).toBe(2);
    });
});
