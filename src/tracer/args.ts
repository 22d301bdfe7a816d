import { Command } from "commander";

export type TraceFlags = {
  silent: boolean;
  color: boolean;
};

/**
 * Picks the tracer's own flags (`--silent`/`-s`, `--no-color`/`-n`) out of a
 * `process.argv`-shaped array. Everything else belongs to the host program and
 * is ignored.
 */
export function parseTraceFlags(argv: readonly string[]): TraceFlags {
  const program = new Command()
    .name("linetrace")
    .helpOption(false)
    .allowUnknownOption()
    .allowExcessArguments()
    .exitOverride()
    .configureOutput({
      writeOut: () => {},
      writeErr: () => {},
    })
    .option("-s, --silent", "disable standard output")
    .option("-n, --no-color", "disable ANSI colors");
  program.parse([...argv], { from: "node" });
  const opts = program.opts<{ silent?: boolean; color?: boolean }>();
  return {
    silent: opts.silent === true,
    color: opts.color !== false,
  };
}
