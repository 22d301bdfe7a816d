import { readTraceConfigFile, resolveConfigPath } from "../config/config.js";
import { getDiagnosticLogger } from "../logging/diagnostics.js";
import { createSafeStreamWriter, type SafeStreamWriter } from "../terminal/stream-writer.js";
import { ERROR_STYLE, isStyleToken, RESET, WARNING_STYLE } from "../terminal/styles.js";
import { parseTraceFlags } from "./args.js";
import { fail, formatErrorMessage, ok, TraceError, type TraceResult } from "./errors.js";
import { MESSAGE_BUFFER_CAPACITY, MessageCapacitySchema } from "./format.js";
import { resolveSourceFilename } from "./header.js";
import { TraceLock, type LockHold } from "./lock.js";
import { renderPrintSegments } from "./render.js";
import { TraceSettingsStore, type TraceSettings, type TraceSettingsInput } from "./settings.js";
import { StreamRegistry } from "./streams.js";
import type {
  PrintCategory,
  RedirectFlags,
  StreamCategory,
  TraceDestination,
} from "./types.js";

export type TracerOptions = {
  /** Defaults to `process.stdout`; probed once for a terminal at initialize. */
  stdout?: TraceDestination;
  /** Defaults to `process.stderr`; probed once for a terminal at initialize. */
  stderr?: TraceDestination;
  env?: NodeJS.ProcessEnv;
  now?: () => Date;
  /** Message buffer capacity; rendered bodies keep `capacity - 1` code points. */
  capacity?: number;
};

export type InitializeOptions = {
  /** Identity of the calling source, usually `import.meta.url`. */
  source?: string | URL;
  /** JSON5 settings file; falls back to `LINETRACE_CONFIG`. */
  configPath?: string;
};

type PrintRequest = {
  category: PrintCategory;
  fn: string;
  style: string;
  template: string;
  args: readonly unknown[];
  destination?: TraceDestination;
};

export type ScopedTracer = {
  fn: string;
  print: (template: string, ...args: unknown[]) => Promise<void>;
  styled: (style: string, template: string, ...args: unknown[]) => Promise<void>;
  warn: (template: string, ...args: unknown[]) => Promise<void>;
  error: (template: string, ...args: unknown[]) => Promise<void>;
  to: (destination: TraceDestination, template: string, ...args: unknown[]) => Promise<void>;
};

/**
 * A hold on the print lock. Prints made through it run as the holder; every
 * other print waits until `unlock()`.
 */
export type TracerHold = {
  standardPrint: Tracer["standardPrint"];
  styledPrint: Tracer["styledPrint"];
  warningPrint: Tracer["warningPrint"];
  errorPrint: Tracer["errorPrint"];
  customPrint: Tracer["customPrint"];
  scope: (fn: string) => ScopedTracer;
  /** Runs `fn` as the holder, so plain tracer calls inside it join the hold. */
  run: LockHold["run"];
  /** Tears the tracer down and ends this hold with it. */
  teardown: () => Promise<void>;
  unlock: () => TraceResult<boolean>;
  isActive: () => boolean;
};

function bindScope(scope: ScopedTracer, run: LockHold["run"]): ScopedTracer {
  return {
    fn: scope.fn,
    print: (template, ...args) => run(() => scope.print(template, ...args)),
    styled: (style, template, ...args) => run(() => scope.styled(style, template, ...args)),
    warn: (template, ...args) => run(() => scope.warn(template, ...args)),
    error: (template, ...args) => run(() => scope.error(template, ...args)),
    to: (destination, template, ...args) => run(() => scope.to(destination, template, ...args)),
  };
}

function isTruthyEnvValue(value: string | undefined): boolean {
  return typeof value === "string" && value.trim().length > 0;
}

export class Tracer {
  private readonly settings = new TraceSettingsStore();
  private readonly streams = new StreamRegistry();
  private readonly printLock = new TraceLock();
  private readonly writer: SafeStreamWriter;
  private readonly stdout: TraceDestination;
  private readonly stderr: TraceDestination;
  private readonly env: NodeJS.ProcessEnv;
  private readonly now: () => Date;
  private readonly capacity: number;
  private initialized = false;

  constructor(options: TracerOptions = {}) {
    this.stdout = options.stdout ?? process.stdout;
    this.stderr = options.stderr ?? process.stderr;
    this.env = options.env ?? process.env;
    this.now = options.now ?? (() => new Date());
    const capacity = MessageCapacitySchema.safeParse(options.capacity ?? MESSAGE_BUFFER_CAPACITY);
    if (!capacity.success) {
      throw new TraceError(
        "INVALID_CONFIG_VALUE",
        `Invalid capacity: ${String(options.capacity)} (expected a positive integer)`,
      );
    }
    this.capacity = capacity.data;
    this.writer = createSafeStreamWriter({
      onBrokenPipe: (err) => {
        this.diag().warn("destination closed after broken pipe", { code: err.code });
      },
      onStreamError: (err) => {
        this.diag().error("destination emitted an error", { error: err.message });
      },
    });
  }

  /**
   * Binds the standard streams, probes them for redirection and applies, in
   * order: defaults, source filename, config file, `NO_COLOR`, and the
   * `--silent`/`--no-color` flags found in `processArgs`.
   */
  initialize(processArgs: readonly string[] = [], options: InitializeOptions = {}): TraceResult {
    const configPath = resolveConfigPath(options.configPath, this.env);
    let fileSettings: TraceSettingsInput | undefined;
    if (configPath) {
      const loaded = readTraceConfigFile(configPath);
      if (!loaded.ok) {
        this.diag().warn("config file rejected", { path: configPath, error: loaded.error.message });
        return loaded;
      }
      fileSettings = loaded.value;
    }

    let flags: ReturnType<typeof parseTraceFlags>;
    try {
      flags = parseTraceFlags(processArgs);
    } catch (err) {
      return fail("INVALID_CONFIG_VALUE", `Invalid arguments: ${formatErrorMessage(err)}`, err);
    }

    this.settings.reset();
    this.settings.setFilename(resolveSourceFilename(options.source));
    if (fileSettings) {
      const applied = this.settings.apply(fileSettings);
      if (!applied.ok) return applied;
    }
    if (isTruthyEnvValue(this.env.NO_COLOR)) this.settings.setToggle("colorfulness", false);
    if (flags.silent) this.settings.setToggle("verbosity", false);
    if (!flags.color) this.settings.setToggle("colorfulness", false);

    const redirected = this.streams.bind({ stdout: this.stdout, stderr: this.stderr });
    this.writer.reset();
    this.initialized = true;
    this.diag().debug("tracer initialized", {
      filename: this.settings.get("filename"),
      redirected,
      configPath,
    });
    return ok();
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  /**
   * Waits for the print lock, then unbinds every stream. Prints afterwards
   * reject. Called as a holder, it also ends that hold.
   */
  async teardown(): Promise<void> {
    await this.printLock.withLock(() => {
      this.initialized = false;
      this.streams.unbind();
      this.printLock.releaseCurrent();
    });
  }

  standardPrint(fn: string, template: string, ...args: unknown[]): Promise<void> {
    return this.print({ category: "standard", fn, style: RESET, template, args });
  }

  styledPrint(fn: string, style: string, template: string, ...args: unknown[]): Promise<void> {
    if (!isStyleToken(style)) {
      return Promise.reject(
        new TraceError("INVALID_CONFIG_VALUE", `Not an ANSI style token: ${JSON.stringify(style)}`),
      );
    }
    return this.print({ category: "standard", fn, style, template, args });
  }

  warningPrint(fn: string, template: string, ...args: unknown[]): Promise<void> {
    return this.print({ category: "warning", fn, style: WARNING_STYLE, template, args });
  }

  errorPrint(fn: string, template: string, ...args: unknown[]): Promise<void> {
    return this.print({ category: "error", fn, style: ERROR_STYLE, template, args });
  }

  /** Writes to `destination` whatever the verbosity and the stream table say. */
  customPrint(
    fn: string,
    destination: TraceDestination,
    template: string,
    ...args: unknown[]
  ): Promise<void> {
    return this.print({ category: "custom", fn, style: RESET, template, args, destination });
  }

  scope(fn: string): ScopedTracer {
    return {
      fn,
      print: (template, ...args) => this.standardPrint(fn, template, ...args),
      styled: (style, template, ...args) => this.styledPrint(fn, style, template, ...args),
      warn: (template, ...args) => this.warningPrint(fn, template, ...args),
      error: (template, ...args) => this.errorPrint(fn, template, ...args),
      to: (destination, template, ...args) =>
        this.customPrint(fn, destination, template, ...args),
    };
  }

  /** Resolves once the print lock is held; print through the returned hold. */
  async lock(): Promise<TracerHold> {
    const hold = await this.printLock.lock();
    return {
      standardPrint: (fn, template, ...args) =>
        hold.run(() => this.standardPrint(fn, template, ...args)),
      styledPrint: (fn, style, template, ...args) =>
        hold.run(() => this.styledPrint(fn, style, template, ...args)),
      warningPrint: (fn, template, ...args) =>
        hold.run(() => this.warningPrint(fn, template, ...args)),
      errorPrint: (fn, template, ...args) => hold.run(() => this.errorPrint(fn, template, ...args)),
      customPrint: (fn, destination, template, ...args) =>
        hold.run(() => this.customPrint(fn, destination, template, ...args)),
      scope: (fn) => bindScope(this.scope(fn), hold.run),
      run: hold.run,
      teardown: () => hold.run(() => this.teardown()),
      unlock: hold.unlock,
      isActive: hold.isActive,
    };
  }

  /**
   * Releases `hold`, or without one the hold the calling context runs under
   * (inside `withLock` or `TracerHold.run`).
   */
  unlock(hold?: TracerHold): TraceResult<boolean> {
    return hold ? hold.unlock() : this.printLock.unlock();
  }

  withLock<T>(fn: () => Promise<T> | T): Promise<T> {
    return this.printLock.withLock(fn);
  }

  isLocked(): boolean {
    return this.printLock.isHeld();
  }

  getVerbosity(): boolean {
    return this.settings.get("verbosity");
  }

  setVerbosity(value: boolean): TraceResult {
    return this.settings.setToggle("verbosity", value);
  }

  getColorfulness(): boolean {
    return this.settings.get("colorfulness");
  }

  setColorfulness(value: boolean): TraceResult {
    return this.settings.setToggle("colorfulness", value);
  }

  getAutoNewline(): boolean {
    return this.settings.get("autoNewline");
  }

  setAutoNewline(value: boolean): TraceResult {
    return this.settings.setToggle("autoNewline", value);
  }

  getShowTrace(): boolean {
    return this.settings.get("showTrace");
  }

  setShowTrace(value: boolean): TraceResult {
    return this.settings.setToggle("showTrace", value);
  }

  getFilename(): string {
    return this.settings.get("filename");
  }

  setFilename(value: string): TraceResult {
    return this.settings.setFilename(value);
  }

  /** All-or-nothing update of several settings at once. */
  applySettings(input: TraceSettingsInput): TraceResult {
    return this.settings.apply(input);
  }

  getSettings(): Readonly<TraceSettings> {
    return this.settings.snapshot();
  }

  setStream(category: StreamCategory, destination: TraceDestination): TraceResult {
    return this.streams.set(category, destination);
  }

  getStream(category: StreamCategory): TraceResult<TraceDestination> {
    return this.streams.get(category);
  }

  isRedirected(category: PrintCategory): boolean {
    return this.streams.isRedirected(category);
  }

  getRedirectFlags(): RedirectFlags {
    return this.streams.redirectFlags();
  }

  private async print(request: PrintRequest): Promise<void> {
    if (!this.initialized) {
      throw new TraceError("UNINITIALIZED_STATE", "Tracer used before initialize()");
    }
    await this.printLock.withLock(() => this.emit(request));
  }

  private async emit(request: PrintRequest): Promise<void> {
    // Re-checked under the lock: a teardown may have run while this call queued.
    if (!this.initialized) {
      throw new TraceError("UNINITIALIZED_STATE", "Tracer was torn down");
    }
    const settings = this.settings.snapshot();
    if (request.category === "standard" && !settings.verbosity) return;
    const destination = this.resolveDestination(request);
    const colorful = settings.colorfulness && !this.streams.isRedirected(request.category);
    const segments = renderPrintSegments(request, {
      settings,
      colorful,
      time: this.now(),
      capacity: this.capacity,
    });
    for (const segment of segments) {
      await this.writer.write(destination, segment);
    }
  }

  private resolveDestination(request: PrintRequest): TraceDestination {
    if (request.category === "custom") {
      if (!request.destination) {
        throw new TraceError("DESTINATION_UNAVAILABLE", "Custom print without a destination");
      }
      return request.destination;
    }
    const bound = this.streams.get(request.category);
    if (!bound.ok) throw bound.error;
    return bound.value;
  }

  private diag() {
    return getDiagnosticLogger("tracer");
  }
}

export function createTracer(options: TracerOptions = {}): Tracer {
  return new Tracer(options);
}
