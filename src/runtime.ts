import type { TraceDestination } from "./tracer/types.js";

/** Process surface the CLI runs against; tests swap in sinks and a fake exit. */
export type RuntimeEnv = {
  log: typeof console.log;
  error: typeof console.error;
  exit: (code: number) => never;
  stdout: TraceDestination;
  stderr: TraceDestination;
  env: NodeJS.ProcessEnv;
  now?: () => Date;
};

export const defaultRuntime: RuntimeEnv = {
  log: (...args: Parameters<typeof console.log>) => {
    console.log(...args);
  },
  error: (...args: Parameters<typeof console.error>) => {
    console.error(...args);
  },
  exit: (code) => {
    process.exit(code);
    throw new Error("unreachable"); // satisfies tests when mocked
  },
  stdout: process.stdout,
  stderr: process.stderr,
  env: process.env,
};
