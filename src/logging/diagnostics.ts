import fs from "node:fs";
import path from "node:path";

import { Logger as TsLogger } from "tslog";

export const DIAGNOSTIC_LEVELS = [
  "silent",
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
] as const;

export type DiagnosticLevel = (typeof DIAGNOSTIC_LEVELS)[number];

export type DiagnosticSettings = {
  level?: DiagnosticLevel;
  file?: string;
};

export type DiagnosticRecord = {
  time: string;
  level: string;
  logger?: string;
  message: string;
  meta?: Record<string, unknown>;
};

export type DiagnosticTransport = (record: DiagnosticRecord) => void;

type LogObj = Record<string, unknown>;

type ResolvedSettings = {
  level: DiagnosticLevel;
  file?: string;
};

const ROOT_NAME = "linetrace";

type DiagnosticsState = {
  cachedLogger: TsLogger<LogObj> | null;
  cachedSettings: ResolvedSettings | null;
  overrideSettings: DiagnosticSettings | null;
};

const diagnosticsState: DiagnosticsState = {
  cachedLogger: null,
  cachedSettings: null,
  overrideSettings: null,
};

const externalTransports = new Set<DiagnosticTransport>();

function isDiagnosticLevel(value: string): value is DiagnosticLevel {
  return DIAGNOSTIC_LEVELS.some((level) => level === value);
}

export function normalizeDiagnosticLevel(
  level?: string,
  fallback: DiagnosticLevel = "warn",
): DiagnosticLevel {
  const candidate = (level ?? fallback).trim().toLowerCase();
  return isDiagnosticLevel(candidate) ? candidate : fallback;
}

// tslog ids: silly=0 trace=1 debug=2 info=3 warn=4 error=5 fatal=6
export function levelToMinLevel(level: DiagnosticLevel): number {
  const map: Record<DiagnosticLevel, number> = {
    trace: 1,
    debug: 2,
    info: 3,
    warn: 4,
    error: 5,
    fatal: 6,
    silent: 7,
  };
  return map[level];
}

function resolveSettings(): ResolvedSettings {
  const override = diagnosticsState.overrideSettings;
  const level = normalizeDiagnosticLevel(override?.level ?? process.env.LINETRACE_LOG_LEVEL);
  const file = override?.file ?? (process.env.LINETRACE_LOG_FILE?.trim() || undefined);
  return { level, file };
}

function settingsChanged(a: ResolvedSettings | null, b: ResolvedSettings) {
  if (!a) return true;
  return a.level !== b.level || a.file !== b.file;
}

function readMeta(logObj: LogObj): { level: string; name?: string; date?: Date } {
  const meta = logObj._meta;
  if (!meta || typeof meta !== "object") return { level: "info" };
  const level =
    "logLevelName" in meta && typeof meta.logLevelName === "string"
      ? meta.logLevelName.toLowerCase()
      : "info";
  const name = "name" in meta && typeof meta.name === "string" ? meta.name : undefined;
  const date = "date" in meta && meta.date instanceof Date ? meta.date : undefined;
  return { level, name, date };
}

export function toDiagnosticRecord(logObj: LogObj): DiagnosticRecord {
  const { level, name, date } = readMeta(logObj);
  const first = logObj["0"];
  const second = logObj["1"];
  const record: DiagnosticRecord = {
    time: (date ?? new Date()).toISOString(),
    level,
    logger: name,
    message: typeof first === "string" ? first : JSON.stringify(first ?? ""),
  };
  if (second && typeof second === "object" && !Array.isArray(second)) {
    record.meta = { ...second };
  }
  return record;
}

function buildLogger(settings: ResolvedSettings): TsLogger<LogObj> {
  const logger = new TsLogger<LogObj>({
    name: ROOT_NAME,
    minLevel: levelToMinLevel(settings.level),
    type: "hidden",
  });
  const file = settings.file;
  if (file) {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    logger.attachTransport((logObj) => {
      try {
        fs.appendFileSync(file, `${JSON.stringify(toDiagnosticRecord(logObj))}\n`, "utf8");
      } catch {
        // never block on logging failures
      }
    });
  }
  logger.attachTransport((logObj) => {
    if (externalTransports.size === 0) return;
    const record = toDiagnosticRecord(logObj);
    for (const transport of externalTransports) {
      try {
        transport(record);
      } catch {
        // ignore transport failures
      }
    }
  });
  return logger;
}

export function getDiagnosticLogger(name?: string): TsLogger<LogObj> {
  const settings = resolveSettings();
  let logger = diagnosticsState.cachedLogger;
  if (!logger || settingsChanged(diagnosticsState.cachedSettings, settings)) {
    logger = buildLogger(settings);
    diagnosticsState.cachedLogger = logger;
    diagnosticsState.cachedSettings = settings;
  }
  return name ? logger.getSubLogger({ name }) : logger;
}

export function registerDiagnosticTransport(transport: DiagnosticTransport): () => void {
  externalTransports.add(transport);
  return () => {
    externalTransports.delete(transport);
  };
}

// Test helpers
export function setDiagnosticOverride(settings: DiagnosticSettings | null): void {
  diagnosticsState.overrideSettings = settings;
  diagnosticsState.cachedLogger = null;
  diagnosticsState.cachedSettings = null;
}

export function resetDiagnosticLogger(): void {
  diagnosticsState.cachedLogger = null;
  diagnosticsState.cachedSettings = null;
  diagnosticsState.overrideSettings = null;
}
