// Program — one conversion cycle plus how the run ends.

import { Console, Effect } from "effect";
import { runCycle } from "./cycle.ts";
import { formatFinished, formatIoError } from "./format.ts";
import type { IoError, LineReader } from "./line-reader.ts";
import { Palette } from "./palette.ts";

/** Run the cycle and print the closing line. A quit prints nothing more
 *  (the prompt already confirmed it). An IoError is reported on stderr
 *  and left in the error channel so the runtime exits non-zero. */
export const program: Effect.Effect<void, IoError, LineReader | Palette> =
  Effect.gen(function* () {
    const styles = yield* Palette;
    const outcome = yield* runCycle.pipe(
      Effect.tapErrorTag("IoError", (e) =>
        Console.error(formatIoError(styles, e))
      ),
    );
    if (outcome._tag === "Converted") {
      yield* Console.log(formatFinished());
    }
  });
