// Prompt loop — ask until the answer parses or the user quits.

import { Console, Data, Effect, Either } from "effect";
import { formatInvalid, formatPrompt, formatQuit } from "./format.ts";
import { type IoError, LineReader } from "./line-reader.ts";
import { Palette } from "./palette.ts";

// --- Result ---

export type PromptResult<A> = Data.TaggedEnum<{
  Valid: { readonly value: A };
  Quit: {};
}>;

interface PromptResultDefinition extends Data.TaggedEnum.WithGenerics<1> {
  readonly taggedEnum: PromptResult<this["A"]>;
}

export const PromptResult = Data.taggedEnum<PromptResultDefinition>();

// --- Input ---

const QUIT_KEYWORD = "quit";

/** Trim and lower-case a raw line before it is interpreted. */
export function sanitize(line: string): string {
  return line.trim().toLowerCase();
}

export interface PromptConfig<A, E> {
  readonly message: string;
  readonly invalidMessage: string;
  readonly parse: (input: string) => Either.Either<A, E>;
}

/** Prompt until `parse` succeeds or the quit keyword is typed. Parse
 *  failures re-prompt; only a failed read leaves through the error
 *  channel. */
export function promptUntilValid<A, E>(
  config: PromptConfig<A, E>,
): Effect.Effect<PromptResult<A>, IoError, LineReader | Palette> {
  return Effect.gen(function* () {
    const reader = yield* LineReader;
    const styles = yield* Palette;

    const loop = (attempt: number): Effect.Effect<PromptResult<A>, IoError> =>
      Effect.gen(function* () {
        yield* Console.log(formatPrompt(styles, config.message));
        const input = sanitize(yield* reader.readLine);

        if (input === QUIT_KEYWORD) {
          yield* Console.log(formatQuit(styles));
          return PromptResult.Quit();
        }

        const parsed = config.parse(input);
        if (Either.isRight(parsed)) {
          return PromptResult.Valid({ value: parsed.right });
        }

        yield* Effect.logDebug(`[prompt] rejected "${input}" (attempt ${attempt})`);
        yield* Console.log(formatInvalid(styles, config.invalidMessage));
        return yield* loop(attempt + 1);
      });

    return yield* loop(1);
  });
}
