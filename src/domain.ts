// Pure domain types — no framework dependency, no I/O.

export type TemperatureUnit = "Fahrenheit" | "Celsius";

export interface Temperature {
  readonly value: number;
  readonly unit: TemperatureUnit;
}

export const Temperature = (
  value: number,
  unit: TemperatureUnit,
): Temperature => ({ value, unit });

/** Single-letter symbol shown after the degree sign. */
export function unitSymbol(unit: TemperatureUnit): string {
  switch (unit) {
    case "Fahrenheit":
      return "F";
    case "Celsius":
      return "C";
  }
}
