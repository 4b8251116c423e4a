import { randomUUID } from "crypto";
import { ConfigurationError } from "../common/errors/verification.errors";

export type EnvironmentMode = "development" | "test" | "production";
export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace";
export type Sensitivity = "public" | "internal" | "secret";

export type ScoreComponent =
  | "image_type_match"
  | "student_name_match"
  | "roll_number_match"
  | "institution_match"
  | "skill_match"
  | "ocr_confidence";

export const SCORE_COMPONENTS: readonly ScoreComponent[] = [
  "image_type_match",
  "student_name_match",
  "roll_number_match",
  "institution_match",
  "skill_match",
  "ocr_confidence",
];

const CONFIG_VERSION = "2026-10-19";

export interface EnvVarMetadata {
  readonly key: string;
  readonly category:
    | "service"
    | "verification"
    | "capability"
    | "telemetry"
    | "forbidden";
  readonly description: string;
  readonly required: boolean;
  readonly defaultValue?: string;
  readonly allowed?: readonly string[];
  readonly sensitivity: Sensitivity;
  readonly example?: string;
}

export const ENVIRONMENT_VARIABLES: readonly EnvVarMetadata[] = [
  {
    key: "NODE_ENV",
    category: "service",
    description: "Deployment mode controlling safety guards and logging",
    required: false,
    defaultValue: "development",
    allowed: ["development", "test", "production"],
    sensitivity: "public",
    example: "production",
  },
  {
    key: "PORT",
    category: "service",
    description: "HTTP listening port",
    required: false,
    defaultValue: "3001",
    sensitivity: "public",
    example: "8080",
  },
  {
    key: "LOG_LEVEL",
    category: "service",
    description: "Log verbosity",
    required: false,
    defaultValue: "info",
    allowed: ["fatal", "error", "warn", "info", "debug", "trace"],
    sensitivity: "public",
    example: "warn",
  },
  {
    key: "CORS_ORIGIN",
    category: "service",
    description: "Comma-separated list of allowed origins",
    required: false,
    sensitivity: "public",
    example: "https://admin.example.com,https://portal.example.com",
  },
  {
    key: "MAX_UPLOAD_BYTES",
    category: "service",
    description: "Largest accepted document upload in bytes",
    required: false,
    defaultValue: "10485760",
    sensitivity: "public",
    example: "5242880",
  },
  {
    key: "VERIFICATION_MAX_IMAGE_DIMENSION",
    category: "verification",
    description: "Longest side (px) of the normalized image; larger uploads are downscaled",
    required: false,
    defaultValue: "1920",
    sensitivity: "public",
    example: "1600",
  },
  {
    key: "VERIFICATION_KEYWORD_THRESHOLD",
    category: "verification",
    description: "Keyword ratio at which a caption answer marks the document plausible",
    required: false,
    defaultValue: "0.6",
    sensitivity: "public",
  },
  {
    key: "VERIFICATION_APPROVE_THRESHOLD",
    category: "verification",
    description: "Overall confidence strictly above which a claim is auto-approved",
    required: false,
    defaultValue: "0.85",
    sensitivity: "public",
  },
  {
    key: "VERIFICATION_REVIEW_THRESHOLD",
    category: "verification",
    description: "Overall confidence at or above which a claim goes to human review",
    required: false,
    defaultValue: "0.6",
    sensitivity: "public",
  },
  {
    key: "VERIFICATION_FIELD_THRESHOLD",
    category: "verification",
    description: "Per-field score below which the outcome message names the field as a mismatch",
    required: false,
    defaultValue: "0.6",
    sensitivity: "public",
  },
  {
    key: "VERIFICATION_WEIGHTS",
    category: "verification",
    description: "Comma-separated component=weight pairs for the overall confidence mean",
    required: false,
    defaultValue: "all components weighted 1",
    sensitivity: "public",
    example: "image_type_match=2,ocr_confidence=0.5",
  },
  {
    key: "VERIFICATION_REQUEST_TIMEOUT_MS",
    category: "verification",
    description: "Total time budget for one verification request",
    required: false,
    defaultValue: "60000",
    sensitivity: "internal",
  },
  {
    key: "CAPTIONING_URL",
    category: "capability",
    description: "Visual question answering endpoint used for document classification",
    required: false,
    defaultValue: "http://localhost:8500/vqa",
    sensitivity: "internal",
    example: "http://vision.internal:8500/vqa",
  },
  {
    key: "CAPTIONING_API_KEY",
    category: "capability",
    description: "Bearer token sent to the captioning endpoint",
    required: false,
    sensitivity: "secret",
  },
  {
    key: "CAPTIONING_TIMEOUT_MS",
    category: "capability",
    description: "Per-call timeout for the captioning capability",
    required: false,
    defaultValue: "30000",
    sensitivity: "internal",
  },
  {
    key: "CAPTIONING_CONCURRENCY",
    category: "capability",
    description: "Concurrent captioning calls allowed (sized to accelerator memory)",
    required: false,
    defaultValue: "2",
    sensitivity: "internal",
  },
  {
    key: "OCR_LANGUAGE",
    category: "capability",
    description: "Tesseract language pack(s), e.g. eng or eng+hin",
    required: false,
    defaultValue: "eng",
    sensitivity: "public",
  },
  {
    key: "OCR_TIMEOUT_MS",
    category: "capability",
    description: "Per-call timeout for the OCR capability",
    required: false,
    defaultValue: "30000",
    sensitivity: "internal",
  },
  {
    key: "OCR_CONCURRENCY",
    category: "capability",
    description: "Concurrent OCR calls allowed",
    required: false,
    defaultValue: "2",
    sensitivity: "internal",
  },
  {
    key: "METRICS_ENABLED",
    category: "telemetry",
    description: "Enable the /metrics endpoint",
    required: false,
    defaultValue: "true",
    sensitivity: "internal",
  },
  {
    key: "LOG_JSON",
    category: "telemetry",
    description: "Emit structured JSON logs",
    required: false,
    defaultValue: "true",
    sensitivity: "internal",
  },
  {
    key: "DISABLE_RATE_LIMIT",
    category: "forbidden",
    description: "Disables HTTP rate limiting (for load testing only)",
    required: false,
    defaultValue: "false",
    sensitivity: "internal",
  },
] as const;

export type ComponentWeights = Readonly<Record<ScoreComponent, number>>;

export interface VerificationSettings {
  readonly maxImageDimension: number;
  readonly keywordRatioThreshold: number;
  readonly approveThreshold: number;
  readonly reviewThreshold: number;
  readonly fieldMatchThreshold: number;
  readonly weights: ComponentWeights;
  readonly requestTimeoutMs: number;
}

export interface CapabilitySettings {
  readonly captioningUrl: string;
  readonly captioningApiKey?: string;
  readonly captioningTimeoutMs: number;
  readonly captioningConcurrency: number;
  readonly ocrLanguage: string;
  readonly ocrTimeoutMs: number;
  readonly ocrConcurrency: number;
}

export interface EnvironmentConfig {
  readonly service: {
    readonly nodeEnv: EnvironmentMode;
    readonly port: number;
    readonly logLevel: LogLevel;
    readonly configVersion: string;
    readonly configCorrelationId: string;
    readonly corsOrigins: readonly string[];
    readonly maxUploadBytes: number;
  };
  readonly verification: VerificationSettings;
  readonly capabilities: CapabilitySettings;
  readonly telemetry: {
    readonly metricsEnabled: boolean;
    readonly logJson: boolean;
  };
  readonly flags: {
    readonly disableRateLimit: boolean;
  };
}

export const DEFAULT_COMPONENT_WEIGHTS: ComponentWeights = {
  image_type_match: 1,
  student_name_match: 1,
  roll_number_match: 1,
  institution_match: 1,
  skill_match: 1,
  ocr_confidence: 1,
};

export const DEFAULT_VERIFICATION_SETTINGS: VerificationSettings = {
  maxImageDimension: 1920,
  keywordRatioThreshold: 0.6,
  approveThreshold: 0.85,
  reviewThreshold: 0.6,
  fieldMatchThreshold: 0.6,
  weights: DEFAULT_COMPONENT_WEIGHTS,
  requestTimeoutMs: 60_000,
};

const TRUE_VALUES = new Set(["1", "true", "t", "yes", "y", "on"]);
const FALSE_VALUES = new Set(["0", "false", "f", "no", "n", "off"]);
const LOG_LEVELS: readonly LogLevel[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
];
const ENVIRONMENT_MODES: readonly EnvironmentMode[] = [
  "development",
  "test",
  "production",
];

let cachedConfig: EnvironmentConfig | null = null;
let resolvedConfigLogged = false;

function normalizeKeyList(
  raw: string | undefined,
  fallback: string[],
): string[] {
  const source = raw ?? fallback.join(",");

  if (!source) {
    return [];
  }

  const seen = new Set<string>();

  return source
    .split(/[,|]/)
    .map((entry) => entry.trim())
    .filter(Boolean)
    .filter((entry) => {
      if (seen.has(entry)) {
        return false;
      }
      seen.add(entry);
      return true;
    });
}

function parseBoolean(
  value: string | undefined,
  defaultValue: boolean,
  key: string,
  errors: string[],
): boolean {
  if (value === undefined || value === "") {
    return defaultValue;
  }

  const normalized = value.toLowerCase().trim();

  if (TRUE_VALUES.has(normalized)) {
    return true;
  }

  if (FALSE_VALUES.has(normalized)) {
    return false;
  }

  errors.push(`${key} must be a boolean-like value (true/false)`);
  return defaultValue;
}

function parseNumber(
  value: string | undefined,
  key: string,
  errors: string[],
  options: {
    min?: number;
    max?: number;
    defaultValue: number;
    integer?: boolean;
  },
): number {
  if (value === undefined || value.trim() === "") {
    return options.defaultValue;
  }

  const parsed = Number(value);

  if (!Number.isFinite(parsed)) {
    errors.push(`${key} must be a valid number`);
    return options.defaultValue;
  }

  if (options.integer && !Number.isInteger(parsed)) {
    errors.push(`${key} must be an integer`);
    return options.defaultValue;
  }

  if (options.min !== undefined && parsed < options.min) {
    errors.push(`${key} must be >= ${options.min}`);
  }

  if (options.max !== undefined && parsed > options.max) {
    errors.push(`${key} must be <= ${options.max}`);
  }

  return parsed;
}

function isScoreComponent(value: string): value is ScoreComponent {
  return SCORE_COMPONENTS.some((component) => component === value);
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function isEnvironmentMode(value: string): value is EnvironmentMode {
  return ENVIRONMENT_MODES.some((mode) => mode === value);
}

/**
 * Parses `component=weight` pairs. Components not named keep the default weight of 1.
 */
export function parseComponentWeights(
  raw: string | undefined,
  errors: string[],
): ComponentWeights {
  const weights: Record<ScoreComponent, number> = {
    ...DEFAULT_COMPONENT_WEIGHTS,
  };

  for (const entry of normalizeKeyList(raw, [])) {
    const [name, rawWeight] = entry.split("=").map((part) => part.trim());

    if (!name || rawWeight === undefined) {
      errors.push(
        `VERIFICATION_WEIGHTS entry "${entry}" must look like component=weight`,
      );
      continue;
    }

    if (!isScoreComponent(name)) {
      errors.push(
        `VERIFICATION_WEIGHTS names unknown component "${name}". Known components: ${SCORE_COMPONENTS.join(", ")}`,
      );
      continue;
    }

    const weight = Number(rawWeight);
    if (rawWeight === "" || !Number.isFinite(weight)) {
      errors.push(`VERIFICATION_WEIGHTS weight for ${name} must be a number`);
      continue;
    }

    weights[name] = weight;
  }

  return weights;
}

/**
 * Invariants shared by env loading and programmatic construction of the decision engine.
 */
export function collectVerificationSettingsErrors(
  settings: VerificationSettings,
): string[] {
  const errors: string[] = [];
  const unitInterval: Array<[string, number]> = [
    ["keywordRatioThreshold", settings.keywordRatioThreshold],
    ["approveThreshold", settings.approveThreshold],
    ["reviewThreshold", settings.reviewThreshold],
    ["fieldMatchThreshold", settings.fieldMatchThreshold],
  ];

  for (const [name, value] of unitInterval) {
    if (!Number.isFinite(value) || value < 0 || value > 1) {
      errors.push(`${name} must be within [0, 1] (received ${value})`);
    }
  }

  if (settings.reviewThreshold > settings.approveThreshold) {
    errors.push(
      `reviewThreshold (${settings.reviewThreshold}) cannot exceed approveThreshold (${settings.approveThreshold})`,
    );
  }

  if (
    !Number.isInteger(settings.maxImageDimension) ||
    settings.maxImageDimension < 1
  ) {
    errors.push(
      `maxImageDimension must be a positive integer (received ${settings.maxImageDimension})`,
    );
  }

  if (
    !Number.isFinite(settings.requestTimeoutMs) ||
    settings.requestTimeoutMs <= 0
  ) {
    errors.push(
      `requestTimeoutMs must be positive (received ${settings.requestTimeoutMs})`,
    );
  }

  let totalWeight = 0;
  for (const component of SCORE_COMPONENTS) {
    const weight = settings.weights[component];
    if (!Number.isFinite(weight) || weight < 0) {
      errors.push(`weight for ${component} must be a finite number >= 0`);
      continue;
    }
    totalWeight += weight;
  }

  if (totalWeight <= 0) {
    errors.push("at least one component weight must be positive");
  }

  return errors;
}

export function validateVerificationSettings(
  settings: VerificationSettings,
): VerificationSettings {
  const errors = collectVerificationSettingsErrors(settings);
  if (errors.length > 0) {
    throw new ConfigurationError(errors);
  }
  return settings;
}

/** Catalogued variables the source sets explicitly; values are never included. */
export function explicitlyConfiguredKeys(
  source: Record<string, string | undefined>,
): string[] {
  return ENVIRONMENT_VARIABLES.filter((variable) => {
    const value = source[variable.key];
    return value !== undefined && value.trim() !== "";
  }).map((variable) => variable.key);
}

function maskSecret(value: string | undefined): string | undefined {
  if (!value) {
    return value;
  }
  if (value.length <= 6) {
    return "***";
  }
  return `${value.slice(0, 3)}***${value.slice(-2)}`;
}

export function loadEnvironment(
  overrides?: Record<string, string | undefined>,
): EnvironmentConfig {
  if (!overrides && cachedConfig) {
    return cachedConfig;
  }

  const source: Record<string, string | undefined> = {
    ...process.env,
    ...overrides,
  };
  const errors: string[] = [];

  const nodeEnvRaw = source.NODE_ENV?.trim().toLowerCase();
  const nodeEnv: EnvironmentMode = ((): EnvironmentMode => {
    if (!nodeEnvRaw) {
      return "development";
    }
    if (isEnvironmentMode(nodeEnvRaw)) {
      return nodeEnvRaw;
    }
    errors.push(
      `NODE_ENV must be development|test|production (received: ${source.NODE_ENV})`,
    );
    return "development";
  })();

  const port = parseNumber(source.PORT, "PORT", errors, {
    min: 1024,
    max: 65535,
    integer: true,
    defaultValue: 3001,
  });

  const logLevelRaw = source.LOG_LEVEL?.trim().toLowerCase();
  const logLevel: LogLevel = ((): LogLevel => {
    if (!logLevelRaw) {
      return "info";
    }
    if (isLogLevel(logLevelRaw)) {
      return logLevelRaw;
    }
    errors.push(
      `LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")} (received: ${source.LOG_LEVEL})`,
    );
    return "info";
  })();

  const maxUploadBytes = parseNumber(
    source.MAX_UPLOAD_BYTES,
    "MAX_UPLOAD_BYTES",
    errors,
    { min: 1024, integer: true, defaultValue: 10 * 1024 * 1024 },
  );

  const verification: VerificationSettings = {
    maxImageDimension: parseNumber(
      source.VERIFICATION_MAX_IMAGE_DIMENSION,
      "VERIFICATION_MAX_IMAGE_DIMENSION",
      errors,
      {
        min: 64,
        max: 10_000,
        integer: true,
        defaultValue: DEFAULT_VERIFICATION_SETTINGS.maxImageDimension,
      },
    ),
    keywordRatioThreshold: parseNumber(
      source.VERIFICATION_KEYWORD_THRESHOLD,
      "VERIFICATION_KEYWORD_THRESHOLD",
      errors,
      {
        min: 0,
        max: 1,
        defaultValue: DEFAULT_VERIFICATION_SETTINGS.keywordRatioThreshold,
      },
    ),
    approveThreshold: parseNumber(
      source.VERIFICATION_APPROVE_THRESHOLD,
      "VERIFICATION_APPROVE_THRESHOLD",
      errors,
      {
        min: 0,
        max: 1,
        defaultValue: DEFAULT_VERIFICATION_SETTINGS.approveThreshold,
      },
    ),
    reviewThreshold: parseNumber(
      source.VERIFICATION_REVIEW_THRESHOLD,
      "VERIFICATION_REVIEW_THRESHOLD",
      errors,
      {
        min: 0,
        max: 1,
        defaultValue: DEFAULT_VERIFICATION_SETTINGS.reviewThreshold,
      },
    ),
    fieldMatchThreshold: parseNumber(
      source.VERIFICATION_FIELD_THRESHOLD,
      "VERIFICATION_FIELD_THRESHOLD",
      errors,
      {
        min: 0,
        max: 1,
        defaultValue: DEFAULT_VERIFICATION_SETTINGS.fieldMatchThreshold,
      },
    ),
    weights: parseComponentWeights(source.VERIFICATION_WEIGHTS, errors),
    requestTimeoutMs: parseNumber(
      source.VERIFICATION_REQUEST_TIMEOUT_MS,
      "VERIFICATION_REQUEST_TIMEOUT_MS",
      errors,
      {
        min: 1000,
        max: 600_000,
        integer: true,
        defaultValue: DEFAULT_VERIFICATION_SETTINGS.requestTimeoutMs,
      },
    ),
  };

  // Range checks above already reported per-key problems; only cross-field rules remain.
  if (errors.length === 0) {
    errors.push(...collectVerificationSettingsErrors(verification));
  }

  const captioningUrl =
    source.CAPTIONING_URL?.trim() || "http://localhost:8500/vqa";
  try {
    new URL(captioningUrl);
  } catch {
    errors.push(`CAPTIONING_URL must be an absolute URL (received: ${captioningUrl})`);
  }

  const capabilities: CapabilitySettings = {
    captioningUrl,
    captioningApiKey: source.CAPTIONING_API_KEY?.trim() || undefined,
    captioningTimeoutMs: parseNumber(
      source.CAPTIONING_TIMEOUT_MS,
      "CAPTIONING_TIMEOUT_MS",
      errors,
      { min: 100, max: 600_000, integer: true, defaultValue: 30_000 },
    ),
    captioningConcurrency: parseNumber(
      source.CAPTIONING_CONCURRENCY,
      "CAPTIONING_CONCURRENCY",
      errors,
      { min: 1, max: 64, integer: true, defaultValue: 2 },
    ),
    ocrLanguage: source.OCR_LANGUAGE?.trim() || "eng",
    ocrTimeoutMs: parseNumber(source.OCR_TIMEOUT_MS, "OCR_TIMEOUT_MS", errors, {
      min: 100,
      max: 600_000,
      integer: true,
      defaultValue: 30_000,
    }),
    ocrConcurrency: parseNumber(
      source.OCR_CONCURRENCY,
      "OCR_CONCURRENCY",
      errors,
      { min: 1, max: 64, integer: true, defaultValue: 2 },
    ),
  };

  const metricsEnabled = parseBoolean(
    source.METRICS_ENABLED,
    true,
    "METRICS_ENABLED",
    errors,
  );
  const logJson = parseBoolean(source.LOG_JSON, true, "LOG_JSON", errors);
  const disableRateLimit = parseBoolean(
    source.DISABLE_RATE_LIMIT,
    false,
    "DISABLE_RATE_LIMIT",
    errors,
  );

  if (nodeEnv === "production" && disableRateLimit) {
    errors.push(
      "Forbidden flag DISABLE_RATE_LIMIT cannot be enabled in production",
    );
  }

  const corsOrigins = normalizeKeyList(source.CORS_ORIGIN, []);

  if (errors.length > 0) {
    throw new ConfigurationError(errors);
  }

  const config: EnvironmentConfig = {
    service: {
      nodeEnv,
      port,
      logLevel,
      configVersion: CONFIG_VERSION,
      configCorrelationId: randomUUID(),
      corsOrigins,
      maxUploadBytes,
    },
    verification,
    capabilities,
    telemetry: {
      metricsEnabled,
      logJson,
    },
    flags: {
      disableRateLimit,
    },
  };

  cachedConfig = config;
  emitResolvedConfigLog(config, explicitlyConfiguredKeys(source));

  return config;
}

export function getEnv(): EnvironmentConfig {
  if (!cachedConfig) {
    cachedConfig = loadEnvironment();
  }
  return cachedConfig;
}

export function resetEnvironmentCacheForTests(): void {
  cachedConfig = null;
  resolvedConfigLogged = false;
}

function emitResolvedConfigLog(
  config: EnvironmentConfig,
  explicitKeys: readonly string[],
): void {
  if (resolvedConfigLogged || config.service.nodeEnv === "test") {
    return;
  }

  const payload = {
    event: "resolvedConfig",
    version: config.service.configVersion,
    correlationId: config.service.configCorrelationId,
    timestamp: new Date().toISOString(),
    explicitKeys,
    service: config.service,
    verification: config.verification,
    capabilities: {
      ...config.capabilities,
      captioningApiKey: maskSecret(config.capabilities.captioningApiKey),
    },
    telemetry: config.telemetry,
    flags: config.flags,
  };

  console.info(JSON.stringify(payload));
  resolvedConfigLogged = true;
}
