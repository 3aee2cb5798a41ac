import { Command } from "@effect/cli";
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import process from "node:process";
import {
  Config,
  Effect,
  Layer,
  Logger,
  LogLevel,
  Option,
} from "effect";
import { AnsiPaletteLive, PlainPaletteLive } from "./src/palette.ts";
import { program } from "./src/program.ts";
import { StdinLineReaderLive } from "./src/providers/stdin.ts";

// --- CLI ---

const command = Command.make("temperature-convert", {}).pipe(
  Command.withDescription(
    "Convert a temperature between Celsius and Fahrenheit",
  ),
  Command.withHandler(() => program),
);

// --- Layers ---
// Set NO_COLOR to any non-empty value to disable ANSI styling.

const PaletteLive = Layer.unwrapEffect(
  Effect.gen(function* () {
    const noColor = yield* Config.option(Config.string("NO_COLOR"));
    return Option.exists(noColor, (value) => value.length > 0)
      ? PlainPaletteLive
      : AnsiPaletteLive;
  }),
);

// Set LOG_LEVEL (e.g. "Debug") to trace the prompt state machine.

const LoggerLive = Layer.unwrapEffect(
  Effect.gen(function* () {
    const level = yield* Config.logLevel("LOG_LEVEL").pipe(
      Config.withDefault(LogLevel.Info),
    );
    return Logger.minimumLogLevel(level);
  }),
);

// --- Run ---

const cli = Command.run(command, {
  name: "temperature-convert",
  version: "0.1.0",
});

// An IoError has been reported by `program`; runMain only sets the
// exit code.
NodeRuntime.runMain(
  cli(process.argv).pipe(
    Effect.provide(PaletteLive),
    Effect.provide(StdinLineReaderLive),
    Effect.provide(LoggerLive),
    Effect.provide(NodeContext.layer),
  ),
  { disableErrorReporting: true },
);
