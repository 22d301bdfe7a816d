import fs from "node:fs";
import path from "node:path";

import json5 from "json5";

import { fail, formatErrorMessage, ok, type TraceResult } from "../tracer/errors.js";
import {
  formatSchemaIssues,
  TraceSettingsSchema,
  type TraceSettingsInput,
} from "../tracer/settings.js";

export function resolveConfigPath(
  explicit?: string,
  env: NodeJS.ProcessEnv = process.env,
): string | undefined {
  const candidate = explicit?.trim() || env.LINETRACE_CONFIG?.trim();
  return candidate ? path.resolve(candidate) : undefined;
}

/**
 * Reads tracer settings from a JSON5 file. A missing file yields `undefined`;
 * an unreadable or invalid one yields `INVALID_CONFIG_VALUE`.
 */
export function readTraceConfigFile(
  configPath: string,
): TraceResult<TraceSettingsInput | undefined> {
  if (!fs.existsSync(configPath)) return ok(undefined);
  let parsed: unknown;
  try {
    parsed = json5.parse(fs.readFileSync(configPath, "utf-8"));
  } catch (err) {
    return fail(
      "INVALID_CONFIG_VALUE",
      `Could not parse ${configPath}: ${formatErrorMessage(err)}`,
      err,
    );
  }
  const result = TraceSettingsSchema.safeParse(parsed);
  if (!result.success) {
    return fail(
      "INVALID_CONFIG_VALUE",
      `Invalid config ${configPath}: ${formatSchemaIssues(result.error)}`,
    );
  }
  return ok(result.data);
}
