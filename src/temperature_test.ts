import { assert, test } from "vitest";
import { Either } from "effect";
import { Temperature } from "./domain.ts";
import {
  convert,
  convertTo,
  oppositeUnit,
  parseUnit,
  parseValue,
} from "./temperature.ts";

// --- Helpers ---

function unitOf(text: string) {
  return Either.getOrUndefined(parseUnit(text));
}

function valueOf(text: string) {
  return Either.getOrUndefined(parseValue(text));
}

// --- parseUnit ---

test("parseUnit: accepts f and fahrenheit in any case", () => {
  for (const token of ["f", "F", "fahrenheit", "Fahrenheit", "FAHRENHEIT"]) {
    assert.strictEqual(unitOf(token), "Fahrenheit");
  }
});

test("parseUnit: accepts c and celcius in any case", () => {
  for (const token of ["c", "C", "celcius", "Celcius", "CELCIUS"]) {
    assert.strictEqual(unitOf(token), "Celsius");
  }
});

test("parseUnit: rejects every other token", () => {
  for (const token of ["", "x", "celsius", "k", "fc", " f", "quit"]) {
    assert.isTrue(Either.isLeft(parseUnit(token)), token);
  }
});

test("parseUnit: error carries the rejected input", () => {
  const result = parseUnit("kelvin");
  assert.isTrue(Either.isLeft(result));
  if (Either.isLeft(result)) {
    assert.strictEqual(result.left._tag, "UnitParseError");
    assert.strictEqual(result.left.input, "kelvin");
  }
});

// --- parseValue ---

test("parseValue: accepts decimal literals", () => {
  assert.strictEqual(valueOf("12"), 12);
  assert.strictEqual(valueOf("-4.5"), -4.5);
  assert.strictEqual(valueOf("+3"), 3);
  assert.strictEqual(valueOf(".5"), 0.5);
  assert.strictEqual(valueOf("5."), 5);
  assert.strictEqual(valueOf("1e3"), 1000);
  assert.strictEqual(valueOf("2.5e-1"), 0.25);
});

test("parseValue: accepts infinities and nan", () => {
  assert.strictEqual(valueOf("inf"), Infinity);
  assert.strictEqual(valueOf("+infinity"), Infinity);
  assert.strictEqual(valueOf("-inf"), -Infinity);
  assert.isTrue(Number.isNaN(valueOf("nan")));
});

test("parseValue: rejects non-numbers", () => {
  for (const text of ["", "abc", "1 2", "0x10", "1e", ".", "--1", "12f"]) {
    const result = parseValue(text);
    assert.isTrue(Either.isLeft(result), text);
    if (Either.isLeft(result)) assert.strictEqual(result.left.input, text);
  }
});

// --- convert ---

test("convert: fahrenheit to celsius", () => {
  assert.strictEqual(convert(32, "Fahrenheit", "Celsius"), 0);
  assert.strictEqual(convert(-40, "Fahrenheit", "Celsius"), -40);
  assert.closeTo(convert(212, "Fahrenheit", "Celsius"), 100, 1e-9);
  assert.closeTo(convert(98.6, "Fahrenheit", "Celsius"), 37, 1e-9);
});

test("convert: celsius to fahrenheit", () => {
  assert.strictEqual(convert(0, "Celsius", "Fahrenheit"), 32);
  assert.strictEqual(convert(100, "Celsius", "Fahrenheit"), 212);
  assert.closeTo(convert(1, "Celsius", "Fahrenheit"), 33.8, 1e-9);
  assert.closeTo(convert(-40, "Celsius", "Fahrenheit"), -40, 1e-9);
});

test("convert: same unit is the identity", () => {
  assert.strictEqual(convert(12.5, "Celsius", "Celsius"), 12.5);
  assert.strictEqual(convert(-3, "Fahrenheit", "Fahrenheit"), -3);
});

test("convert: fahrenheit round trip returns the original value", () => {
  for (const v of [-459.67, -40, 0, 32, 37.5, 98.6, 451, 1e6]) {
    const back = convert(convert(v, "Fahrenheit", "Celsius"), "Celsius", "Fahrenheit");
    assert.closeTo(back, v, Math.abs(v) * 1e-12 + 1e-9);
  }
});

// --- convertTo / oppositeUnit ---

test("convertTo: returns a new temperature in the target unit", () => {
  const original = Temperature(100, "Celsius");
  const converted = convertTo(original, "Fahrenheit");

  assert.deepEqual(converted, Temperature(212, "Fahrenheit"));
  assert.deepEqual(original, Temperature(100, "Celsius"));
});

test("oppositeUnit: swaps the two units", () => {
  assert.strictEqual(oppositeUnit("Celsius"), "Fahrenheit");
  assert.strictEqual(oppositeUnit("Fahrenheit"), "Celsius");
});
