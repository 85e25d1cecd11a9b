import type { UserEvent } from "../input/InputHandler.js";

export interface PlaybackState {
    readonly index: number;
    readonly playing: boolean;
    readonly quit: boolean;
}

export const initialPlayback: PlaybackState = { index: 0, playing: true, quit: false };

const clampIndex = (index: number, frameCount: number): number =>
    Math.max(0, Math.min(index, frameCount - 1));

export const applyEvent = (state: PlaybackState, event: UserEvent, frameCount: number): PlaybackState => {
    switch (event._tag) {
        case "Quit":
            return { ...state, quit: true };
        case "TogglePause":
            // Resuming on the last frame starts over
            if (!state.playing && state.index === frameCount - 1) {
                return { ...state, index: 0, playing: true };
            }
            return { ...state, playing: !state.playing };
        case "Restart":
            return { ...state, index: 0, playing: true };
        case "Seek":
            return { ...state, index: clampIndex(state.index + event.delta, frameCount), playing: false };
    }
};

/** Moves one frame forward while playing; playback stops on the last frame. */
export const advance = (state: PlaybackState, frameCount: number): PlaybackState => {
    if (!state.playing) return state;
    const index = clampIndex(state.index + 1, frameCount);
    return { ...state, index, playing: index < frameCount - 1 };
};
