import { ConfigurationError } from "../../src/common/errors/verification.errors";
import {
  DEFAULT_VERIFICATION_SETTINGS,
  collectVerificationSettingsErrors,
  explicitlyConfiguredKeys,
  loadEnvironment,
  parseComponentWeights,
  resetEnvironmentCacheForTests,
} from "../../src/config/environment";

const VERIFICATION_KEYS = {
  VERIFICATION_MAX_IMAGE_DIMENSION: undefined,
  VERIFICATION_KEYWORD_THRESHOLD: undefined,
  VERIFICATION_APPROVE_THRESHOLD: undefined,
  VERIFICATION_REVIEW_THRESHOLD: undefined,
  VERIFICATION_FIELD_THRESHOLD: undefined,
  VERIFICATION_WEIGHTS: undefined,
  VERIFICATION_REQUEST_TIMEOUT_MS: undefined,
};

function configurationReasons(load: () => unknown): readonly string[] {
  try {
    load();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return error.reasons;
    }
    throw error;
  }
  throw new Error("expected a ConfigurationError");
}

describe("environment", () => {
  afterEach(() => {
    resetEnvironmentCacheForTests();
  });

  it("falls back to the documented verification defaults", () => {
    const config = loadEnvironment(VERIFICATION_KEYS);

    expect(config.verification).toEqual(DEFAULT_VERIFICATION_SETTINGS);
    expect(config.service.nodeEnv).toBe("test");
    expect(config.capabilities.ocrLanguage).toBe("eng");
  });

  it("reads component weights and thresholds from the environment", () => {
    const config = loadEnvironment({
      ...VERIFICATION_KEYS,
      VERIFICATION_WEIGHTS: "image_type_match=2, ocr_confidence=0.5",
      VERIFICATION_APPROVE_THRESHOLD: "0.9",
    });

    expect(config.verification.approveThreshold).toBe(0.9);
    expect(config.verification.weights).toEqual({
      image_type_match: 2,
      student_name_match: 1,
      roll_number_match: 1,
      institution_match: 1,
      skill_match: 1,
      ocr_confidence: 0.5,
    });
  });

  it("rejects a review threshold above the approve threshold", () => {
    const reasons = configurationReasons(() =>
      loadEnvironment({
        ...VERIFICATION_KEYS,
        VERIFICATION_APPROVE_THRESHOLD: "0.5",
        VERIFICATION_REVIEW_THRESHOLD: "0.7",
      }),
    );

    expect(reasons).toEqual([
      "reviewThreshold (0.7) cannot exceed approveThreshold (0.5)",
    ]);
  });

  it("rejects thresholds outside the unit interval", () => {
    const reasons = configurationReasons(() =>
      loadEnvironment({
        ...VERIFICATION_KEYS,
        VERIFICATION_APPROVE_THRESHOLD: "1.5",
      }),
    );

    expect(reasons).toEqual(["VERIFICATION_APPROVE_THRESHOLD must be <= 1"]);
  });

  it("rejects weights for unknown components", () => {
    const errors: string[] = [];
    parseComponentWeights("photo_match=1", errors);

    expect(errors).toEqual([
      'VERIFICATION_WEIGHTS names unknown component "photo_match". Known components: image_type_match, student_name_match, roll_number_match, institution_match, skill_match, ocr_confidence',
    ]);
  });

  it("rejects a weight set with no positive weight", () => {
    const errors = collectVerificationSettingsErrors({
      ...DEFAULT_VERIFICATION_SETTINGS,
      weights: {
        image_type_match: 0,
        student_name_match: 0,
        roll_number_match: 0,
        institution_match: 0,
        skill_match: 0,
        ocr_confidence: 0,
      },
    });

    expect(errors).toEqual(["at least one component weight must be positive"]);
  });

  it("refuses to disable rate limiting in production", () => {
    const reasons = configurationReasons(() =>
      loadEnvironment({
        ...VERIFICATION_KEYS,
        NODE_ENV: "production",
        DISABLE_RATE_LIMIT: "true",
      }),
    );

    expect(reasons).toContain(
      "Forbidden flag DISABLE_RATE_LIMIT cannot be enabled in production",
    );
  });

  it("requires an absolute captioning URL", () => {
    const reasons = configurationReasons(() =>
      loadEnvironment({ ...VERIFICATION_KEYS, CAPTIONING_URL: "vision/vqa" }),
    );

    expect(reasons).toEqual([
      "CAPTIONING_URL must be an absolute URL (received: vision/vqa)",
    ]);
  });

  it("lists the catalogued variables that are set, in catalogue order", () => {
    expect(
      explicitlyConfiguredKeys({
        CAPTIONING_API_KEY: "test-secret",
        LOG_LEVEL: "  ",
        UNRELATED_SETTING: "x",
        PORT: "8080",
      }),
    ).toEqual(["PORT", "CAPTIONING_API_KEY"]);
  });
});
