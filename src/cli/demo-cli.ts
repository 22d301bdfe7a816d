import fs from "node:fs";
import path from "node:path";

import type { Command } from "commander";

import { defaultRuntime, type RuntimeEnv } from "../runtime.js";
import { BOLD, composeStyle, CYAN, FAINT, GREEN, ITALIC } from "../terminal/styles.js";
import { theme } from "../terminal/theme.js";
import { unwrapResult } from "../tracer/errors.js";
import { createTracer, type Tracer } from "../tracer/tracer.js";
import { buildTracerArgv, type TracerFlagOptions } from "./tracer-flags.js";

export const DEFAULT_DEMO_LOG_FILE = "linetrace-demo.txt";

type DemoCliOptions = TracerFlagOptions & {
  logFile?: string;
};

function closeFile(stream: fs.WriteStream): Promise<void> {
  return new Promise((resolve, reject) => {
    stream.once("error", reject);
    stream.end(() => resolve());
  });
}

/** Walks through every print mode, the lock, and stream redirection. */
export async function runDemo(tracer: Tracer, logFile: string): Promise<void> {
  const demo = tracer.scope("runDemo");

  // Standard prints obey --silent; errors and warnings never do.
  await demo.print("This is a number! %d", 5);
  await demo.print("Nothing to format, just text!");
  await demo.error("Welp, this is an error (%s)!", "ignore verbosity");
  await demo.error("Another error :(");
  await demo.warn("This is a warning!");
  await demo.warn("Numbers: %d, %d, %d", 1, 2, 3);

  await demo.styled(ITALIC + CYAN, "This is a custom color print message!");
  await demo.styled(composeStyle(BOLD, FAINT, GREEN), "Hello, %s!", "world");

  unwrapResult(tracer.setColorfulness(false));
  await demo.styled(GREEN, "This text should be in green, but colorfulness is disabled!");

  unwrapResult(tracer.setAutoNewline(false));
  await demo.print("Hello, ");
  unwrapResult(tracer.setShowTrace(false));
  unwrapResult(tracer.setAutoNewline(true));
  await demo.print("World!");

  const hold = await tracer.lock();
  try {
    const locked = hold.scope("runDemo");
    await locked.print("Here is a print without a trace.");
    await locked.error("Here is an error print without a trace.");
  } finally {
    unwrapResult(tracer.unlock(hold));
  }
  unwrapResult(tracer.setShowTrace(true));

  const original = unwrapResult(tracer.getStream("standard"));
  const file = fs.createWriteStream(logFile, { encoding: "utf8" });
  try {
    unwrapResult(tracer.setStream("standard", file));
    await demo.print("Hello, text file!");
    await demo.print("The number five: %d", 5);
    unwrapResult(tracer.setStream("standard", original));
    await demo.print("Wrote to output text file, `%s`.", path.basename(logFile));
    await demo.to(file, "Another line in the same open %s!", "file");
  } finally {
    unwrapResult(tracer.setStream("standard", original));
    await closeFile(file);
  }
}

export function registerDemoCli(program: Command, runtime: RuntimeEnv = defaultRuntime) {
  program
    .command("demo")
    .description("Print a tour of every trace mode")
    .option("-s, --silent", "Suppress standard prints (warnings and errors still print)")
    .option("-n, --no-color", "Disable ANSI colors")
    .option("--log-file <path>", "File the redirected prints go to", DEFAULT_DEMO_LOG_FILE)
    .action(async (opts: DemoCliOptions) => {
      const tracer = createTracer({
        stdout: runtime.stdout,
        stderr: runtime.stderr,
        env: runtime.env,
        now: runtime.now,
      });
      unwrapResult(tracer.initialize(buildTracerArgv(opts), { source: import.meta.url }));
      const logFile = path.resolve(opts.logFile ?? DEFAULT_DEMO_LOG_FILE);
      try {
        await runDemo(tracer, logFile);
      } finally {
        await tracer.teardown();
      }
      runtime.log(theme.muted(`Redirected output written to ${logFile}`));
    });
}
