import { Context, Duration, Effect, Layer, Queue, Schedule, Stream } from "effect";
import { InputHandlerService, type UserEvent } from "../input/InputHandler.js";
import { AsciiRenderer, type Animation } from "./AsciiRenderer.js";
import { advance, applyEvent, initialPlayback, type PlaybackState } from "./Playback.js";
import { TerminalService } from "./Terminal.js";

const HELP = "space play/pause  left/right step  home/end  r restart  q quit";

export interface Animator {
    // Plays a finished run until the user quits
    readonly play: (animation: Animation, fps: number) => Effect.Effect<void>;
}

export class AnimatorService extends Context.Tag("AnimatorService")<
    AnimatorService,
    Animator
>() { }

export const makeAnimatorLayer = Layer.effect(
    AnimatorService,
    Effect.gen(function* (_) {
        const terminal = yield* _(TerminalService);
        const inputHandler = yield* _(InputHandlerService);

        const play = (animation: Animation, fps: number) =>
            Effect.scoped(
                Effect.gen(function* (_) {
                    const width = yield* _(terminal.width);
                    const height = yield* _(terminal.height);
                    // Last row is reserved for the key help
                    const frames = AsciiRenderer.renderAll(animation, { width, height: Math.max(3, height - 1) });
                    const count = frames.length;

                    const inputQueue = yield* _(Queue.unbounded<UserEvent>());
                    yield* _(
                        Stream.runForEach(inputHandler.events, (evt) => Queue.offer(inputQueue, evt)),
                        Effect.forkScoped
                    );

                    let state: PlaybackState = initialPlayback;
                    let shown = -1;

                    const tick = Effect.gen(function* (_) {
                        const events = yield* _(Queue.takeAll(inputQueue));
                        for (const evt of events) {
                            state = applyEvent(state, evt, count);
                        }
                        if (state.index !== shown) {
                            yield* _(terminal.draw(`${frames[state.index]}\n${HELP}`));
                            shown = state.index;
                        }
                        state = advance(state, count);
                        return state.quit;
                    });

                    yield* _(terminal.clear);
                    yield* _(
                        tick,
                        Effect.repeat({
                            schedule: Schedule.spaced(Duration.millis(Math.round(1000 / fps))),
                            until: (quit) => quit,
                        })
                    );
                })
            );

        return { play };
    })
);
