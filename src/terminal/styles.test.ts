import { describe, expect, it } from "vitest";

import {
  BOLD,
  composeStyle,
  ERROR_STYLE,
  FAINT,
  GREEN,
  isStyleToken,
  RED,
  RESET,
  resolveStyleNames,
  stripAnsi,
  WARNING_STYLE,
  YELLOW,
} from "./styles.js";

describe("composeStyle", () => {
  it("concatenates tokens", () => {
    expect(composeStyle(BOLD, FAINT, GREEN)).toBe("\x1b[1m\x1b[2m\x1b[32m");
  });

  it("builds the fixed warning and error styles", () => {
    expect(WARNING_STYLE).toBe(composeStyle(BOLD, YELLOW));
    expect(ERROR_STYLE).toBe("\x1b[1m\x1b[31m");
  });
});

describe("isStyleToken", () => {
  it("accepts single, composed and empty tokens", () => {
    expect(isStyleToken(RED)).toBe(true);
    expect(isStyleToken(BOLD + RED)).toBe(true);
    expect(isStyleToken("\x1b[1;31m")).toBe(true);
    expect(isStyleToken("")).toBe(true);
  });

  it("rejects plain text and non-strings", () => {
    expect(isStyleToken("red")).toBe(false);
    expect(isStyleToken(`${RED}x`)).toBe(false);
    expect(isStyleToken(31)).toBe(false);
  });
});

describe("resolveStyleNames", () => {
  it("maps names to tokens in order", () => {
    expect(resolveStyleNames(["bold", " Green "])).toBe(BOLD + GREEN);
    expect(resolveStyleNames(["reset"])).toBe(RESET);
  });

  it("skips blanks and rejects unknown names", () => {
    expect(resolveStyleNames(["", "red"])).toBe(RED);
    expect(resolveStyleNames(["red", "sparkly"])).toBeNull();
  });
});

describe("stripAnsi", () => {
  it("removes SGR sequences", () => {
    expect(stripAnsi(`${BOLD}${RED}[x]${RESET} ok`)).toBe("[x] ok");
  });
});
