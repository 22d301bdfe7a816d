export { createTracer, Tracer } from "./tracer/tracer.js";
export type {
  InitializeOptions,
  ScopedTracer,
  TracerHold,
  TracerOptions,
} from "./tracer/tracer.js";
export { getDefaultTracer, resetDefaultTracer } from "./tracer/default.js";
export {
  extractErrorCode,
  formatErrorMessage,
  formatTraceError,
  isTraceError,
  TraceError,
} from "./tracer/errors.js";
export type { TraceErrorCode, TraceResult } from "./tracer/errors.js";
export {
  DEFAULT_TRACE_SETTINGS,
  FILENAME_MAX_LENGTH,
  TraceSettingsSchema,
  UNKNOWN_FILENAME,
} from "./tracer/settings.js";
export type { TraceSettings, TraceSettingsInput } from "./tracer/settings.js";
export { PRINT_CATEGORIES, STREAM_CATEGORIES } from "./tracer/types.js";
export type {
  PrintCategory,
  RedirectFlags,
  StreamCategory,
  TraceDestination,
} from "./tracer/types.js";
export { countDirectives, formatMessage, MESSAGE_BUFFER_CAPACITY } from "./tracer/format.js";
export { buildTraceHeader, formatTraceTime } from "./tracer/header.js";
export { parseTraceFlags } from "./tracer/args.js";
export type { TraceFlags } from "./tracer/args.js";
export { readTraceConfigFile, resolveConfigPath } from "./config/config.js";
export {
  BLACK,
  BLUE,
  BOLD,
  composeStyle,
  CYAN,
  ERROR_STYLE,
  FAINT,
  GREEN,
  ITALIC,
  MAGENTA,
  RED,
  RESET,
  resolveStyleNames,
  stripAnsi,
  UNDERLINE,
  WARNING_STYLE,
  WHITE,
  YELLOW,
} from "./terminal/styles.js";
export {
  getDiagnosticLogger,
  registerDiagnosticTransport,
  resetDiagnosticLogger,
  setDiagnosticOverride,
} from "./logging/diagnostics.js";
export type {
  DiagnosticLevel,
  DiagnosticRecord,
  DiagnosticTransport,
} from "./logging/diagnostics.js";
