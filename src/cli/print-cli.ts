import type { Command } from "commander";

import { defaultRuntime, type RuntimeEnv } from "../runtime.js";
import { resolveStyleNames } from "../terminal/styles.js";
import { TraceError, unwrapResult } from "../tracer/errors.js";
import { createTracer } from "../tracer/tracer.js";
import { buildTracerArgv, type TracerFlagOptions } from "./tracer-flags.js";

type PrintCliOptions = TracerFlagOptions & {
  fn: string;
  style?: string;
  warning?: boolean;
  error?: boolean;
  trace?: boolean;
  newline?: boolean;
  file?: string;
};

function parseStyleOption(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const style = resolveStyleNames(value.split(","));
  if (style === null) {
    throw new TraceError(
      "INVALID_CONFIG_VALUE",
      `Unknown style in "${value}" (use colors, bold, faint, italic, underline or reset)`,
    );
  }
  return style;
}

export function registerPrintCli(program: Command, runtime: RuntimeEnv = defaultRuntime) {
  program
    .command("print")
    .description("Print one traced message (printf-style template plus arguments)")
    .argument("<template>", "Message template, e.g. \"value=%d\"")
    .argument("[args...]", "Template arguments")
    .option("--fn <name>", "Function name shown in the trace header", "shell")
    .option("--style <names>", "Comma-separated style names, e.g. bold,cyan")
    .option("--warning", "Print as a warning (ignores --silent)")
    .option("--error", "Print as an error (ignores --silent)")
    .option("--no-trace", "Omit the [time][file][function] header")
    .option("--no-newline", "Do not end the message with a newline")
    .option("--file <name>", "File name shown in the trace header", "shell")
    .option("-s, --silent", "Suppress standard prints")
    .option("-n, --no-color", "Disable ANSI colors")
    .action(async (template: string, args: string[], opts: PrintCliOptions) => {
      if (opts.warning && opts.error) {
        throw new TraceError("INVALID_CONFIG_VALUE", "Choose either --warning or --error");
      }
      const style = parseStyleOption(opts.style);
      const tracer = createTracer({
        stdout: runtime.stdout,
        stderr: runtime.stderr,
        env: runtime.env,
        now: runtime.now,
      });
      unwrapResult(tracer.initialize(buildTracerArgv(opts)));
      unwrapResult(
        tracer.applySettings({
          filename: opts.file,
          showTrace: opts.trace !== false,
          autoNewline: opts.newline !== false,
        }),
      );
      try {
        if (opts.error) {
          await tracer.errorPrint(opts.fn, template, ...args);
        } else if (opts.warning) {
          await tracer.warningPrint(opts.fn, template, ...args);
        } else if (style !== undefined) {
          await tracer.styledPrint(opts.fn, style, template, ...args);
        } else {
          await tracer.standardPrint(opts.fn, template, ...args);
        }
      } finally {
        await tracer.teardown();
      }
    });
}
