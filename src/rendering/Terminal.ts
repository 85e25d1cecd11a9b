import { Effect, Context, Layer } from "effect";
import tk from "terminal-kit";

export type TermKitTerminal = typeof tk.terminal;

export interface Terminal {
    readonly term: TermKitTerminal;
    readonly clear: Effect.Effect<void>;
    readonly width: Effect.Effect<number>;
    readonly height: Effect.Effect<number>;
    // Writes a full frame from the top-left corner
    readonly draw: (frame: string) => Effect.Effect<void>;
}

export class TerminalService extends Context.Tag("TerminalService")<
    TerminalService,
    Terminal
>() { }

// Fullscreen with keyboard input for the lifetime of the scope
export const makeTerminalLayer = Layer.scoped(
    TerminalService,
    Effect.acquireRelease(
        Effect.sync((): Terminal => {
            const term = tk.terminal;
            term.fullscreen(true);
            term.grabInput(true);
            term.hideCursor(true);
            return {
                term,
                clear: Effect.sync(() => term.clear()),
                width: Effect.sync(() => term.width),
                height: Effect.sync(() => term.height),
                draw: (frame) =>
                    Effect.sync(() => {
                        term.moveTo(1, 1);
                        term(frame);
                    }),
            };
        }),
        (terminal) =>
            Effect.sync(() => {
                terminal.term.hideCursor(false);
                terminal.term.grabInput(false);
                terminal.term.fullscreen(false);
            })
    )
);
