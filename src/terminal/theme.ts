import chalk, { Chalk } from "chalk";

const hasForceColor =
  typeof process.env.FORCE_COLOR === "string" &&
  process.env.FORCE_COLOR.trim().length > 0 &&
  process.env.FORCE_COLOR.trim() !== "0";

const baseChalk = process.env.NO_COLOR && !hasForceColor ? new Chalk({ level: 0 }) : chalk;

/** Colors for the CLI's own messages; traced output is styled by the tracer. */
export const theme = {
  error: baseChalk.red,
  muted: baseChalk.gray,
} as const;
