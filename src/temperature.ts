// Unit parsing and conversion — pure functions, data in, data out.

import { Data, Either } from "effect";
import { Temperature, type TemperatureUnit } from "./domain.ts";

// --- Errors ---

export class UnitParseError extends Data.TaggedError("UnitParseError")<{
  readonly input: string;
}> {}

export class ValueParseError extends Data.TaggedError("ValueParseError")<{
  readonly input: string;
}> {}

// --- Parsing ---

export function parseUnit(
  text: string,
): Either.Either<TemperatureUnit, UnitParseError> {
  switch (text.toLowerCase()) {
    case "f":
    case "fahrenheit":
      return Either.right("Fahrenheit");
    case "c":
    case "celcius":
      return Either.right("Celsius");
    default:
      return Either.left(new UnitParseError({ input: text }));
  }
}

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;
const SPECIAL = /^([+-]?)(inf|infinity|nan)$/i;

/** Parse a floating-point literal. `Number()` alone would take "" as 0
 *  and accept hex, so the shape is checked first. */
export function parseValue(
  text: string,
): Either.Either<number, ValueParseError> {
  if (DECIMAL.test(text)) return Either.right(Number(text));

  const special = SPECIAL.exec(text);
  if (special !== null) {
    const [, sign, word] = special;
    if (word.toLowerCase() === "nan") return Either.right(Number.NaN);
    return Either.right(sign === "-" ? -Infinity : Infinity);
  }

  return Either.left(new ValueParseError({ input: text }));
}

// --- Conversion ---

export function convert(
  value: number,
  from: TemperatureUnit,
  to: TemperatureUnit,
): number {
  if (from === "Fahrenheit" && to === "Celsius") return (value - 32) * (5 / 9);
  if (from === "Celsius" && to === "Fahrenheit") return value * (9 / 5) + 32;
  return value;
}

export function convertTo(
  temperature: Temperature,
  unit: TemperatureUnit,
): Temperature {
  return Temperature(convert(temperature.value, temperature.unit, unit), unit);
}

export function oppositeUnit(unit: TemperatureUnit): TemperatureUnit {
  return unit === "Fahrenheit" ? "Celsius" : "Fahrenheit";
}
