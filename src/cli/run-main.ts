import process from "node:process";

import { CommanderError } from "commander";

import { defaultRuntime, type RuntimeEnv } from "../runtime.js";
import { theme } from "../terminal/theme.js";
import { formatTraceError } from "../tracer/errors.js";
import { buildProgram } from "./program.js";

export async function runCli(
  argv: string[] = process.argv,
  runtime: RuntimeEnv = defaultRuntime,
): Promise<void> {
  const program = buildProgram(runtime);
  try {
    await program.parseAsync(argv);
  } catch (err) {
    if (err instanceof CommanderError) {
      // help/version and usage errors were already printed by commander
      runtime.exit(err.exitCode);
    }
    runtime.error(theme.error(`[linetrace] ${formatTraceError(err)}`));
    runtime.exit(1);
  }
}
