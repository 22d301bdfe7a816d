/**
 * ANSI escape tokens accepted wherever a print takes a style.
 *
 * Color and text-style tokens compose by concatenation, so `BOLD + RED` and
 * `composeStyle(BOLD, RED)` are the same token.
 */

export const BLACK = "\x1b[30m";
export const RED = "\x1b[31m";
export const GREEN = "\x1b[32m";
export const YELLOW = "\x1b[33m";
export const BLUE = "\x1b[34m";
export const MAGENTA = "\x1b[35m";
export const CYAN = "\x1b[36m";
export const WHITE = "\x1b[37m";
export const RESET = "\x1b[0m";

export const BOLD = "\x1b[1m";
export const FAINT = "\x1b[2m";
export const ITALIC = "\x1b[3m";
export const UNDERLINE = "\x1b[4m";

export const COLORS = {
  black: BLACK,
  red: RED,
  green: GREEN,
  yellow: YELLOW,
  blue: BLUE,
  magenta: MAGENTA,
  cyan: CYAN,
  white: WHITE,
} as const;

export const MODIFIERS = {
  bold: BOLD,
  faint: FAINT,
  italic: ITALIC,
  underline: UNDERLINE,
} as const;

export type ColorName = keyof typeof COLORS;
export type ModifierName = keyof typeof MODIFIERS;

export const WARNING_STYLE = BOLD + YELLOW;
export const ERROR_STYLE = BOLD + RED;

export function composeStyle(...tokens: string[]): string {
  return tokens.join("");
}

const ANSI_SGR_PATTERN = "\\x1b\\[[0-9;]*m";
const ANSI_REGEX = new RegExp(ANSI_SGR_PATTERN, "g");
const STYLE_TOKEN_REGEX = new RegExp(`^(?:${ANSI_SGR_PATTERN})*$`);

export function stripAnsi(input: string): string {
  return input.replace(ANSI_REGEX, "");
}

// Empty string is a valid (no-op) style.
export function isStyleToken(value: unknown): value is string {
  return typeof value === "string" && STYLE_TOKEN_REGEX.test(value);
}

function isColorName(name: string): name is ColorName {
  return Object.hasOwn(COLORS, name);
}

function isModifierName(name: string): name is ModifierName {
  return Object.hasOwn(MODIFIERS, name);
}

export function resolveStyleNames(names: string[]): string | null {
  const tokens: string[] = [];
  for (const raw of names) {
    const name = raw.trim().toLowerCase();
    if (!name) continue;
    if (isColorName(name)) {
      tokens.push(COLORS[name]);
    } else if (isModifierName(name)) {
      tokens.push(MODIFIERS[name]);
    } else if (name === "reset") {
      tokens.push(RESET);
    } else {
      return null;
    }
  }
  return composeStyle(...tokens);
}
