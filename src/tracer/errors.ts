export type TraceErrorCode =
  | "INVALID_CONFIG_VALUE"
  | "INVALID_CATEGORY"
  | "UNINITIALIZED_STATE"
  | "LOCK_NOT_OWNED"
  | "DESTINATION_UNAVAILABLE";

export class TraceError extends Error {
  code: TraceErrorCode;

  constructor(code: TraceErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.name = "TraceError";
  }
}

export type TraceResult<T = void> = { ok: true; value: T } | { ok: false; error: TraceError };

export function ok(): TraceResult<void>;
export function ok<T>(value: T): TraceResult<T>;
export function ok<T>(value?: T): TraceResult<T | undefined> {
  return { ok: true, value };
}

export function fail<T = void>(
  code: TraceErrorCode,
  message: string,
  cause?: unknown,
): TraceResult<T> {
  return {
    ok: false,
    error: new TraceError(code, message, cause === undefined ? undefined : { cause }),
  };
}

export function isTraceError(err: unknown): err is TraceError {
  return err instanceof TraceError;
}

export function extractErrorCode(err: unknown): string | undefined {
  if (!err || typeof err !== "object") return undefined;
  const code = (err as { code?: unknown }).code;
  if (typeof code === "string") return code;
  if (typeof code === "number") return String(code);
  return undefined;
}

export function formatErrorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message || err.name || "Error";
  }
  if (typeof err === "string") return err;
  if (typeof err === "number" || typeof err === "boolean" || typeof err === "bigint") {
    return String(err);
  }
  try {
    return JSON.stringify(err);
  } catch {
    return Object.prototype.toString.call(err);
  }
}

export function formatTraceError(err: unknown): string {
  const code = extractErrorCode(err);
  const message = formatErrorMessage(err);
  return code ? `${code}: ${message}` : message;
}

export function unwrapResult<T>(result: TraceResult<T>): T {
  if (!result.ok) throw result.error;
  return result.value;
}
