// Stdin — implementation of LineReader over a Node readable stream.

import process from "node:process";
import * as readline from "node:readline";
import { Effect, Layer } from "effect";
import { IoError, LineReader } from "../line-reader.ts";

/** Build a LineReader over `input`. The readline interface is closed
 *  when the surrounding scope ends. Lines that arrive before they are
 *  asked for are buffered by the interface's async iterator. */
export const makeStreamLineReader = (input: NodeJS.ReadableStream) =>
  Effect.gen(function* () {
    const rl = yield* Effect.acquireRelease(
      Effect.sync(() =>
        readline.createInterface({ input, crlfDelay: Infinity, terminal: false })
      ),
      (rl) => Effect.sync(() => rl.close()),
    );
    const lines = rl[Symbol.asyncIterator]();

    const readLine = Effect.tryPromise({
      try: () => lines.next(),
      catch: (e) =>
        new IoError({ message: e instanceof Error ? e.message : String(e) }),
    }).pipe(
      Effect.flatMap((result) =>
        result.done === true
          ? Effect.fail(new IoError({ message: "end of input" }))
          : Effect.succeed(result.value)
      ),
    );

    return LineReader.of({ readLine });
  });

export const StdinLineReaderLive = Layer.scoped(
  LineReader,
  makeStreamLineReader(process.stdin),
);
