// Conversion cycle — unit prompt, value prompt, convert, print.
//
// States:
//   AwaitingUnit  → AwaitingValue on a valid unit, Quit on "quit"
//   AwaitingValue → Converting on a valid number, Quit on "quit"
//   Converting    → Done after the equation is printed
// A failed read from either prompt aborts with IoError.

import { Console, Data, Effect } from "effect";
import { Temperature } from "./domain.ts";
import {
  formatEquation,
  formatHeader,
  formatResult,
  UNIT_INVALID,
  UNIT_PROMPT,
  VALUE_INVALID,
  valuePrompt,
} from "./format.ts";
import type { IoError, LineReader } from "./line-reader.ts";
import { Palette } from "./palette.ts";
import { promptUntilValid } from "./prompt.ts";
import {
  convertTo,
  oppositeUnit,
  parseUnit,
  parseValue,
} from "./temperature.ts";

// --- Outcome ---

export type CycleOutcome = Data.TaggedEnum<{
  Converted: { readonly original: Temperature; readonly converted: Temperature };
  Quit: {};
}>;

export const CycleOutcome = Data.taggedEnum<CycleOutcome>();

// --- Cycle ---

export const runCycle: Effect.Effect<
  CycleOutcome,
  IoError,
  LineReader | Palette
> = Effect.gen(function* () {
  const styles = yield* Palette;
  yield* Console.log(formatHeader(styles));

  yield* Effect.logDebug("[cycle] awaiting unit");
  const unit = yield* promptUntilValid({
    message: UNIT_PROMPT,
    invalidMessage: UNIT_INVALID,
    parse: parseUnit,
  });
  if (unit._tag === "Quit") return CycleOutcome.Quit();

  yield* Effect.logDebug(`[cycle] awaiting value (${unit.value})`);
  const value = yield* promptUntilValid({
    message: valuePrompt(unit.value),
    invalidMessage: VALUE_INVALID,
    parse: parseValue,
  });
  if (value._tag === "Quit") return CycleOutcome.Quit();

  yield* Effect.logDebug(`[cycle] converting ${value.value} ${unit.value}`);
  const original = Temperature(value.value, unit.value);
  const converted = convertTo(original, oppositeUnit(unit.value));
  yield* Console.log(
    formatResult(styles, formatEquation(original.value, original.unit, converted)),
  );

  return CycleOutcome.Converted({ original, converted });
});
