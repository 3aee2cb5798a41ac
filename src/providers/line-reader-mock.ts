// LineReaderTest — scripted implementation of LineReader for testing
// and development.

import { Effect, Layer, Ref } from "effect";
import { IoError, LineReader } from "../line-reader.ts";

/** Serve `lines` in order, then fail as an exhausted stdin would. */
const makeScriptedLineReader = (lines: readonly string[]) =>
  Effect.gen(function* () {
    const remaining = yield* Ref.make(lines);

    const readLine = Ref.modify(
      remaining,
      (rest) => [rest.at(0), rest.slice(1)] as const,
    ).pipe(
      Effect.flatMap((line) =>
        line === undefined
          ? Effect.fail(new IoError({ message: "end of input" }))
          : Effect.succeed(line)
      ),
    );

    return LineReader.of({ readLine });
  });

export const LineReaderTest = (lines: readonly string[]) =>
  Layer.effect(LineReader, makeScriptedLineReader(lines));
