// Pure formatting functions — no I/O.

import { type Temperature, type TemperatureUnit, unitSymbol } from "./domain.ts";
import type { IoError } from "./line-reader.ts";
import type { Styles } from "./palette.ts";

// --- Numbers ---

/** Fixed-point rendering with exact ties rounded to even. Negative
 *  zero keeps its sign; non-finite values use the short forms `NaN`,
 *  `inf` and `-inf`. */
export function formatNumber(value: number, decimals: number): string {
  if (Number.isNaN(value)) return "NaN";
  if (value === Infinity) return "inf";
  if (value === -Infinity) return "-inf";
  if (Object.is(value, -0)) return `-${(0).toFixed(decimals)}`;

  // toFixed turns to exponent notation from 1e21 up; every double that
  // large is whole.
  if (Math.abs(value) >= 1e21) {
    const digits = BigInt(value).toString();
    return decimals > 0 ? `${digits}.${"0".repeat(decimals)}` : digits;
  }

  return isTie(value, decimals) ? roundTieToEven(value, decimals) : value.toFixed(decimals);
}

/** A double sits exactly halfway between two `decimals`-place numbers
 *  only when it is an odd multiple of 2^-(decimals + 1). */
function isTie(value: number, decimals: number): boolean {
  const scaled = value * 2 ** (decimals + 1);
  return Number.isInteger(scaled) && Math.abs(scaled % 2) === 1;
}

function roundTieToEven(value: number, decimals: number): string {
  // A tie has exactly one more digit, a trailing 5.
  const exact = value.toFixed(decimals + 1);
  const truncated = exact.slice(0, decimals > 0 ? -1 : -2);
  return Number(truncated.at(-1)) % 2 === 0
    ? truncated
    : value.toFixed(decimals);
}

// --- Equation ---

/** Render the conversion as an equation. Whether the converted value is
 *  whole decides the precision of BOTH numbers, so 98.6°F shows as 99°F
 *  when the result is exactly 37°C. */
export function formatEquation(
  originalValue: number,
  originalUnit: TemperatureUnit,
  converted: Temperature,
): string {
  const decimals = converted.value % 1 !== 0 ? 1 : 0;
  const from = `${formatNumber(originalValue, decimals)}°${unitSymbol(originalUnit)}`;
  const to = `${formatNumber(converted.value, decimals)}°${unitSymbol(converted.unit)}`;

  switch (originalUnit) {
    case "Fahrenheit":
      return `\n(${from} - 32) * (5/9) = ${to}`;
    case "Celsius":
      return `\n(${from} * 9/5) + 32 = ${to}`;
  }
}

// --- Prompt texts ---

export const UNIT_PROMPT =
  "Enter C to convert to Fahrenheit or F to convert to Celsius";
export const UNIT_INVALID = "Invalid input. Please enter 'C' or 'F'.";
export const VALUE_INVALID = "Invalid temperature. Please enter a number.";

export function valuePrompt(unit: TemperatureUnit): string {
  switch (unit) {
    case "Celsius":
      return "Enter a number to convert Celsius to Fahrenheit.";
    case "Fahrenheit":
      return "Enter a number to convert Fahrenheit to Celsius.";
  }
}

// --- Messages ---

export function formatHeader(styles: Styles): string {
  return `\n${styles.header("--- Temperature Conversion ---")}`;
}

export function formatPrompt(styles: Styles, message: string): string {
  return `\nType "${styles.warning("QUIT")}" to end the program or\n${message}`;
}

export function formatInvalid(styles: Styles, message: string): string {
  return styles.error(message);
}

export function formatQuit(styles: Styles): string {
  return styles.warning("Exiting program.");
}

export function formatResult(styles: Styles, equation: string): string {
  return styles.success(equation);
}

export function formatFinished(): string {
  return "\nProgram finished normally.";
}

export function formatIoError(styles: Styles, error: IoError): string {
  return styles.error(`Program terminated due to I/O error: ${error.message}`);
}
