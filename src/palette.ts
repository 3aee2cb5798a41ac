// Palette — how the program styles its output lines.

import { Context, Layer } from "effect";

// --- ANSI escape codes ---

const RED = "\x1b[31m";
const GREEN = "\x1b[32m";
const YELLOW = "\x1b[33m";
const CYAN = "\x1b[36m";
const BOLD = "\x1b[1m";
const RESET = "\x1b[0m";

export interface Styles {
  readonly header: (text: string) => string;
  readonly error: (text: string) => string;
  readonly warning: (text: string) => string;
  readonly success: (text: string) => string;
}

const paint =
  (color: string) =>
  (text: string): string =>
    `${color}${BOLD}${text}${RESET}`;

const identity = (text: string): string => text;

export const ansiStyles: Styles = {
  header: paint(CYAN),
  error: paint(RED),
  warning: paint(YELLOW),
  success: paint(GREEN),
};

export const plainStyles: Styles = {
  header: identity,
  error: identity,
  warning: identity,
  success: identity,
};

// --- Service ---

export class Palette extends Context.Tag("Palette")<Palette, Styles>() {}

export const AnsiPaletteLive = Layer.succeed(Palette, ansiStyles);

export const PlainPaletteLive = Layer.succeed(Palette, plainStyles);
