#!/usr/bin/env node
import { Effect, Layer, Logger, Option } from "effect";
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import { SimulationConfig, makeConfigProvider } from "./config/SimulationConfig.js";
import { exportSnapshots } from "./export/SnapshotExport.js";
import { makeInputHandlerLayer } from "./input/InputHandler.js";
import { AnimatorService, makeAnimatorLayer } from "./rendering/Animator.js";
import { makeTerminalLayer } from "./rendering/Terminal.js";
import { simulate, summarize } from "./Simulation.js";

// Terminal, input and animator only exist while the animation plays
const AnimationLive = makeAnimatorLayer.pipe(
    Layer.provide(makeInputHandlerLayer),
    Layer.provide(makeTerminalLayer)
);

const program = Effect.gen(function* (_) {
    const config = yield* _(SimulationConfig);

    const session = Effect.gen(function* (_) {
        const animation = yield* _(simulate(config));
        yield* _(Effect.logInfo(summarize(animation)));

        if (Option.isSome(config.exportPath)) {
            yield* _(exportSnapshots(config.exportPath.value, animation));
        }

        if (config.animate) {
            yield* _(
                Effect.gen(function* (_) {
                    const animator = yield* _(AnimatorService);
                    yield* _(animator.play(animation, config.fps));
                }),
                Effect.provide(AnimationLive)
            );
        }
    });

    yield* _(session, Logger.withMinimumLogLevel(config.logLevel));
});

NodeRuntime.runMain(
    program.pipe(
        Effect.withConfigProvider(makeConfigProvider(process.argv.slice(2))),
        Effect.provide(NodeContext.layer)
    )
);
