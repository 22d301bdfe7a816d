import { Command } from "commander";

import { defaultRuntime, type RuntimeEnv } from "../runtime.js";
import { registerDemoCli } from "./demo-cli.js";
import { registerPrintCli } from "./print-cli.js";

export const CLI_VERSION = "0.1.0";

export function buildProgram(runtime: RuntimeEnv = defaultRuntime): Command {
  const program = new Command();
  program
    .name("linetrace")
    .description("Traceable console printing with per-category streams")
    .version(CLI_VERSION)
    .showHelpAfterError()
    // Set before the subcommands exist so they inherit it.
    .exitOverride();
  registerPrintCli(program, runtime);
  registerDemoCli(program, runtime);
  return program;
}
