import { z } from "zod";

import { fail, ok, type TraceResult } from "./errors.js";

export const FILENAME_MAX_LENGTH = 31;
export const UNKNOWN_FILENAME = "?";

export type TraceSettings = {
  verbosity: boolean;
  colorfulness: boolean;
  autoNewline: boolean;
  showTrace: boolean;
  filename: string;
};

export type ToggleSetting = Exclude<keyof TraceSettings, "filename">;

export const DEFAULT_TRACE_SETTINGS: Readonly<TraceSettings> = Object.freeze({
  verbosity: true,
  colorfulness: true,
  autoNewline: true,
  showTrace: true,
  filename: UNKNOWN_FILENAME,
});

const ToggleSchema = z.boolean();
const FilenameSchema = z.string().min(1);

export const TraceSettingsSchema = z
  .object({
    verbosity: ToggleSchema.optional(),
    colorfulness: ToggleSchema.optional(),
    autoNewline: ToggleSchema.optional(),
    showTrace: ToggleSchema.optional(),
    filename: FilenameSchema.optional(),
  })
  .strict();

export type TraceSettingsInput = z.infer<typeof TraceSettingsSchema>;

const SETTING_LABELS: Record<keyof TraceSettings, string> = {
  verbosity: "verbosity",
  colorfulness: "colorfulness",
  autoNewline: "auto newline",
  showTrace: "show trace",
  filename: "filename",
};

export function clampFilename(value: string): string {
  return Array.from(value).slice(0, FILENAME_MAX_LENGTH).join("");
}

function describeValue(value: unknown): string {
  if (typeof value === "string") return JSON.stringify(value);
  if (value === null) return "null";
  if (typeof value === "object") return Array.isArray(value) ? "array" : "object";
  return String(value);
}

export function formatSchemaIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join(".") : "<root>";
      return `${where}: ${issue.message}`;
    })
    .join("; ");
}

/**
 * Mutable tracer configuration. Setters validate and either apply the value or
 * report `INVALID_CONFIG_VALUE` without touching the current value.
 */
export class TraceSettingsStore {
  private current: TraceSettings;

  constructor(initial: Partial<TraceSettings> = {}) {
    this.current = { ...DEFAULT_TRACE_SETTINGS, ...initial };
    this.current.filename = clampFilename(this.current.filename);
  }

  get<K extends keyof TraceSettings>(key: K): TraceSettings[K] {
    return this.current[key];
  }

  setToggle(key: ToggleSetting, value: boolean): TraceResult {
    const parsed = ToggleSchema.safeParse(value);
    if (!parsed.success) {
      return fail(
        "INVALID_CONFIG_VALUE",
        `Invalid ${SETTING_LABELS[key]} value: ${describeValue(value)} (expected true or false)`,
      );
    }
    this.current[key] = parsed.data;
    return ok();
  }

  setFilename(value: string): TraceResult {
    const parsed = FilenameSchema.safeParse(value);
    if (!parsed.success) {
      return fail(
        "INVALID_CONFIG_VALUE",
        `Invalid filename value: ${describeValue(value)} (expected a non-empty string)`,
      );
    }
    this.current.filename = clampFilename(parsed.data);
    return ok();
  }

  apply(input: unknown): TraceResult {
    const parsed = TraceSettingsSchema.safeParse(input);
    if (!parsed.success) {
      return fail(
        "INVALID_CONFIG_VALUE",
        `Invalid tracer settings: ${formatSchemaIssues(parsed.error)}`,
      );
    }
    const data = parsed.data;
    this.current = {
      verbosity: data.verbosity ?? this.current.verbosity,
      colorfulness: data.colorfulness ?? this.current.colorfulness,
      autoNewline: data.autoNewline ?? this.current.autoNewline,
      showTrace: data.showTrace ?? this.current.showTrace,
      filename: data.filename === undefined ? this.current.filename : clampFilename(data.filename),
    };
    return ok();
  }

  reset(): void {
    this.current = { ...DEFAULT_TRACE_SETTINGS };
  }

  snapshot(): Readonly<TraceSettings> {
    return Object.freeze({ ...this.current });
  }
}
