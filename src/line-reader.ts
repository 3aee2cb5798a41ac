// Line input — service definition and its only fatal error.

import { Context, Data, type Effect } from "effect";

// --- Errors ---

export class IoError extends Data.TaggedError("IoError")<{
  readonly message: string;
}> {}

// --- Service ---

export class LineReader extends Context.Tag("LineReader")<
  LineReader,
  {
    /** Next raw line without its terminator. Fails once the input is
     *  exhausted or the underlying stream errors. */
    readonly readLine: Effect.Effect<string, IoError>;
  }
>() {}
