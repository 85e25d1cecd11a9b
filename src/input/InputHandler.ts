import { Effect, Context, Layer, Stream } from "effect";
import { TerminalService } from "../rendering/Terminal.js";

export type UserEvent =
    | { _tag: "Quit" }
    | { _tag: "TogglePause" }
    | { _tag: "Restart" }
    | { _tag: "Seek"; delta: number };

export interface InputHandler {
    readonly events: Stream.Stream<UserEvent>;
}

export class InputHandlerService extends Context.Tag("InputHandlerService")<
    InputHandlerService,
    InputHandler
>() { }

export const keyToEvent = (name: string): UserEvent | undefined => {
    switch (name) {
        case "CTRL_C":
        case "q":
            return { _tag: "Quit" };
        case " ":
        case "p":
            return { _tag: "TogglePause" };
        case "r":
            return { _tag: "Restart" };
        case "LEFT":
            return { _tag: "Seek", delta: -1 };
        case "RIGHT":
            return { _tag: "Seek", delta: 1 };
        case "HOME":
            return { _tag: "Seek", delta: Number.NEGATIVE_INFINITY };
        case "END":
            return { _tag: "Seek", delta: Number.POSITIVE_INFINITY };
        default:
            return undefined;
    }
};

export const makeInputHandlerLayer = Layer.effect(
    InputHandlerService,
    Effect.gen(function* (_) {
        const { term } = yield* _(TerminalService);

        const events = Stream.async<UserEvent>((emit) => {
            const onKey = (name: string) => {
                const event = keyToEvent(name);
                if (event) {
                    void emit.single(event);
                }
            };

            term.on("key", onKey);

            return Effect.sync(() => {
                term.off("key", onKey);
            });
        });

        return { events };
    })
);
