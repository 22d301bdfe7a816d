export type TracerFlagOptions = {
  silent?: boolean;
  color?: boolean;
};

/**
 * Rebuilds an argv the tracer's own flag parser understands from options
 * commander already consumed.
 */
export function buildTracerArgv(opts: TracerFlagOptions, programName = "linetrace"): string[] {
  const argv = [process.execPath, programName];
  if (opts.silent) argv.push("--silent");
  if (opts.color === false) argv.push("--no-color");
  return argv;
}
