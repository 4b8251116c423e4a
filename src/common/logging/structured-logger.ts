import {
  getEnv,
  type LogLevel as ConfiguredLogLevel,
} from "../../config/environment";

type LogLevel = "INFO" | "WARN" | "ERROR";

interface LoggerSettings {
  readonly nodeEnv: string;
  readonly configVersion?: string;
  readonly configCorrelationId?: string;
  readonly logJson: boolean;
  readonly logLevel: ConfiguredLogLevel;
}

type SanitizedData = Record<string, unknown>;

interface LogError {
  readonly code?: string;
  readonly message: string;
  readonly stack?: string;
}

export interface LogOptions {
  readonly requestId?: string;
  readonly correlationId?: string;
  readonly endpoint?: string;
  readonly durationMs?: number;
  readonly status?: string | number;
  readonly data?: Record<string, unknown>;
  readonly error?: LogError;
}

const SERVICE_NAME = "achievement-verifier";
const LOG_SCHEMA_VERSION = "2026-10-19";
const MAX_STRING_LENGTH = 256;
const SAFE_DATA_KEYS = new Set([
  "ip",
  "userAgent",
  "method",
  "url",
  "statusCode",
  "reason",
  "stage",
  "kind",
  "decision",
  "isValid",
  "overall",
  "components",
  "caption",
  "keywordRatio",
  "ocrConfidence",
  "regionCount",
  "fieldScores",
  "imageWidth",
  "imageHeight",
]);
const SENSITIVE_KEY_MARKERS = [
  "token",
  "secret",
  "authorization",
  "password",
  "apikey",
  "cookie",
];
const LEVEL_SEVERITY: Readonly<Record<ConfiguredLogLevel | LogLevel, number>> = {
  trace: 10,
  debug: 20,
  info: 30,
  INFO: 30,
  warn: 40,
  WARN: 40,
  error: 50,
  ERROR: 50,
  fatal: 60,
};
const SAMPLED_EVENTS = new Map<string, number>([
  ["http.request", 0.05],
  ["http.response", 0.05],
]);

function sanitizeString(value: string): string {
  if (value.length <= MAX_STRING_LENGTH) {
    return value;
  }
  return `${value.substring(0, MAX_STRING_LENGTH)}…`;
}

function sanitizeNumberRecord(
  value: object,
): Record<string, number> | undefined {
  const entries = Object.entries(value).filter(
    (entry): entry is [string, number] => typeof entry[1] === "number",
  );
  return entries.length > 0 ? Object.fromEntries(entries) : undefined;
}

function sanitizeData(
  data: Record<string, unknown> | undefined,
): SanitizedData | undefined {
  if (!data) {
    return undefined;
  }

  const sanitizedEntries: [string, unknown][] = [];

  for (const [key, rawValue] of Object.entries(data)) {
    if (rawValue === undefined || rawValue === null) {
      continue;
    }

    const lowerKey = key.toLowerCase();
    if (SENSITIVE_KEY_MARKERS.some((marker) => lowerKey.includes(marker))) {
      sanitizedEntries.push([key, "[REDACTED]"]);
      continue;
    }

    if (!SAFE_DATA_KEYS.has(key)) {
      continue;
    }

    if (typeof rawValue === "string") {
      sanitizedEntries.push([key, sanitizeString(rawValue)]);
      continue;
    }

    if (Array.isArray(rawValue)) {
      const truncated = rawValue
        .slice(0, 25)
        .map((item) =>
          typeof item === "string" ? sanitizeString(item) : item,
        );
      sanitizedEntries.push([key, truncated]);
      continue;
    }

    if (typeof rawValue === "number" || typeof rawValue === "boolean") {
      sanitizedEntries.push([key, rawValue]);
      continue;
    }

    // Score maps (components, fieldScores) are flattened to their numeric entries.
    if (typeof rawValue === "object") {
      const numbers = sanitizeNumberRecord(rawValue);
      if (numbers) {
        sanitizedEntries.push([key, numbers]);
      }
    }
  }

  if (sanitizedEntries.length === 0) {
    return undefined;
  }

  return Object.fromEntries(sanitizedEntries);
}

function sanitizeError(
  error: LogError | undefined,
  includeStack: boolean,
): LogError | undefined {
  if (!error) {
    return undefined;
  }

  return {
    code: error.code,
    message: sanitizeString(error.message),
    stack:
      includeStack && error.stack ? sanitizeString(error.stack) : undefined,
  };
}

function stripUndefined(
  entry: Record<string, unknown>,
): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(entry).filter(([, value]) => value !== undefined),
  );
}

/**
 * A broken environment must not turn a log call into a ConfigurationError that
 * hides the failure being logged.
 */
function resolveLoggerSettings(): LoggerSettings {
  try {
    const env = getEnv();
    return {
      nodeEnv: env.service.nodeEnv,
      configVersion: env.service.configVersion,
      configCorrelationId: env.service.configCorrelationId,
      logJson: env.telemetry.logJson,
      logLevel: env.service.logLevel,
    };
  } catch {
    return {
      nodeEnv: process.env.NODE_ENV ?? "development",
      logJson: true,
      logLevel: "info",
    };
  }
}

function shouldSample(
  level: LogLevel,
  event: string,
  options: LogOptions,
): boolean {
  if (level !== "INFO") {
    return false;
  }

  if (typeof options.status === "number" && options.status >= 400) {
    return false;
  }

  const rate = SAMPLED_EVENTS.get(event);
  if (!rate) {
    return false;
  }

  return Math.random() > rate;
}

export class StructuredLogger {
  static info(event: string, options: LogOptions = {}): void {
    this.log("INFO", event, options);
  }

  static warn(event: string, options: LogOptions = {}): void {
    this.log("WARN", event, options);
  }

  static error(event: string, options: LogOptions = {}): void {
    this.log("ERROR", event, options);
  }

  private static log(
    level: LogLevel,
    event: string,
    options: LogOptions,
  ): void {
    const settings = resolveLoggerSettings();
    if (LEVEL_SEVERITY[level] < LEVEL_SEVERITY[settings.logLevel]) {
      return;
    }
    if (shouldSample(level, event, options)) {
      return;
    }

    const includeStack = settings.nodeEnv !== "production";

    const entry = stripUndefined({
      ts: new Date().toISOString(),
      level,
      schemaVersion: LOG_SCHEMA_VERSION,
      service: SERVICE_NAME,
      env: settings.nodeEnv,
      version: settings.configVersion,
      event,
      requestId: options.requestId,
      correlationId: options.correlationId ?? settings.configCorrelationId,
      endpoint: options.endpoint,
      durationMs: options.durationMs,
      status: options.status,
      data: sanitizeData(options.data),
      error: sanitizeError(options.error, includeStack),
    });

    if (!settings.logJson) {
      const line = `[${entry.ts}] ${level} ${event}${
        entry.data ? ` ${JSON.stringify(entry.data)}` : ""
      }`;
      this.write(level, line);
      return;
    }

    this.write(level, JSON.stringify(entry));
  }

  private static write(level: LogLevel, line: string): void {
    switch (level) {
      case "ERROR":
        console.error(line);
        break;
      case "WARN":
        console.warn(line);
        break;
      default:
        console.log(line);
        break;
    }
  }
}
