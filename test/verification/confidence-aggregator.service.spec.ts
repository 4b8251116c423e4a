import { ConfigurationError } from "../../src/common/errors/verification.errors";
import {
  DEFAULT_COMPONENT_WEIGHTS,
  DEFAULT_VERIFICATION_SETTINGS,
} from "../../src/config/environment";
import {
  ConfidenceAggregatorService,
  weightedMean,
} from "../../src/verification/confidence-aggregator.service";
import {
  DocumentKind,
  VerificationDecision,
  type ClassificationVerdict,
  type ExtractedText,
  type FieldMatchResult,
} from "../../src/verification/verification.types";

const verdict = (matchRatio: number): ClassificationVerdict => ({
  caption: "yes",
  matchedKeywords: Math.round(matchRatio * 3),
  totalKeywords: 3,
  matchRatio,
  isPlausibleDocument: matchRatio >= 0.6,
});

const extraction = (confidence: number): ExtractedText => ({
  text: confidence > 0 ? "some text" : "",
  confidence,
  regionCount: confidence > 0 ? 1 : 0,
});

const field = (
  kind: FieldMatchResult["field"],
  score: number,
): FieldMatchResult => ({ field: kind, score, matchedTokens: 0, totalTokens: 1 });

describe("ConfidenceAggregatorService", () => {
  const aggregator = new ConfidenceAggregatorService(
    DEFAULT_VERIFICATION_SETTINGS,
  );

  describe("decide", () => {
    it.each([
      [0.851, VerificationDecision.AUTO_APPROVE, true],
      [0.85, VerificationDecision.NEEDS_REVIEW, false],
      [0.6, VerificationDecision.NEEDS_REVIEW, false],
      [0.599, VerificationDecision.AUTO_REJECT, false],
    ])("maps overall %p to %s", (overall, decision, isValid) => {
      const result = aggregator.decide({ overall });

      expect(result.decision).toBe(decision);
      expect(result.isValid).toBe(isValid);
    });

    it("names each weak field in a review message", () => {
      const result = aggregator.decide(
        {
          overall: 0.7,
          imageTypeMatch: 1,
          studentNameMatch: 0.5,
          rollNumberMatch: 1,
          ocrConfidence: 0.8,
        },
        {
          kind: DocumentKind.COLLEGE_ID,
          claimed: { fullName: "Asha Verma", rollNumber: "CS-101" },
        },
      );

      expect(result.message).toBe(
        "College ID requires manual review: Student name 'Asha Verma' does not match the name on the college ID",
      );
    });

    it("names institution and skill from the description", () => {
      const result = aggregator.decide(
        {
          overall: 0.5,
          imageTypeMatch: 1,
          institutionMatch: 0,
          skillMatch: 0.5,
          ocrConfidence: 0.5,
        },
        {
          kind: DocumentKind.CERTIFICATE,
          claimed: { description: "Acme University - Data Science" },
        },
      );

      expect(result.message).toBe(
        "Certificate could not be verified: Institution name 'Acme University' does not match the certificate content; Skill/Achievement 'Data Science' does not match the certificate content",
      );
    });
  });

  describe("aggregate", () => {
    it("approves a well-corroborated certificate", () => {
      const scores = aggregator.aggregate(
        verdict(1),
        [
          field("student_name", 1),
          field("institution", 0.95),
          field("skill", 0.9),
        ],
        extraction(0.98),
      );

      expect(scores.overall).toBeCloseTo(0.966, 6);
      expect(scores).toEqual({
        overall: scores.overall,
        imageTypeMatch: 1,
        studentNameMatch: 1,
        institutionMatch: 0.95,
        skillMatch: 0.9,
        ocrConfidence: 0.98,
      });

      const result = aggregator.decide(scores, {
        kind: DocumentKind.CERTIFICATE,
        claimed: { fullName: "Jane Roe" },
      });
      expect(result).toEqual({
        decision: VerificationDecision.AUTO_APPROVE,
        isValid: true,
        message: "Certificate verified successfully",
      });
    });

    it("rejects a blank image", () => {
      const scores = aggregator.aggregate(
        verdict(0),
        [field("student_name", 0)],
        extraction(0),
      );

      expect(scores.overall).toBe(0);

      const result = aggregator.decide(scores, {
        kind: DocumentKind.CERTIFICATE,
        claimed: { fullName: "Jane Roe" },
      });
      expect(result.decision).toBe(VerificationDecision.AUTO_REJECT);
      expect(result.isValid).toBe(false);
      expect(result.message).toBe(
        "Certificate could not be verified: The uploaded image does not appear to be a valid certificate; " +
          "Could not extract any text from the certificate. Please upload a clearer image; " +
          "Student name 'Jane Roe' does not match the name on the certificate",
      );
    });

    it("drops absent components from the denominator", () => {
      const withRoll = aggregator.aggregate(
        verdict(1),
        [field("student_name", 1), field("roll_number", 0)],
        extraction(0.9),
      );
      const withoutRoll = aggregator.aggregate(
        verdict(1),
        [field("student_name", 1)],
        extraction(0.9),
      );

      expect(withRoll.rollNumberMatch).toBe(0);
      expect(withRoll.overall).toBeCloseTo(2.9 / 4, 10);
      expect(withoutRoll).not.toHaveProperty("rollNumberMatch");
      expect(withoutRoll.overall).toBeCloseTo(2.9 / 3, 10);
    });

    it("sends a score that lands exactly on the approve threshold to review", () => {
      const scores = aggregator.aggregate(
        verdict(1),
        [field("student_name", 1), field("skill", 0.6)],
        extraction(0.8),
      );

      expect(scores.overall).toBe(0.85);
      expect(aggregator.decide(scores).decision).toBe(
        VerificationDecision.NEEDS_REVIEW,
      );
    });

    it("keeps a score that lands exactly on the review threshold in review", () => {
      const scores = aggregator.aggregate(
        verdict(0),
        [field("student_name", 1), field("skill", 0.6)],
        extraction(0.8),
      );

      expect(scores.overall).toBe(0.6);
      expect(aggregator.decide(scores).decision).toBe(
        VerificationDecision.NEEDS_REVIEW,
      );
    });

    it("applies configured weights", () => {
      const weighted = new ConfidenceAggregatorService({
        ...DEFAULT_VERIFICATION_SETTINGS,
        weights: { ...DEFAULT_COMPONENT_WEIGHTS, image_type_match: 2 },
      });

      const scores = weighted.aggregate(verdict(1), [], extraction(0.4));

      expect(scores.overall).toBeCloseTo(0.8, 10);
    });
  });

  it("refuses inconsistent thresholds", () => {
    expect(
      () =>
        new ConfidenceAggregatorService({
          ...DEFAULT_VERIFICATION_SETTINGS,
          reviewThreshold: 0.9,
        }),
    ).toThrow(ConfigurationError);
  });
});

describe("weightedMean", () => {
  it("is 0 when nothing is present", () => {
    expect(
      weightedMean([
        { component: "skill_match", weight: 1, value: undefined },
      ]),
    ).toBe(0);
  });

  it("ignores zero-weight components", () => {
    expect(
      weightedMean([
        { component: "skill_match", weight: 0, value: 0 },
        { component: "ocr_confidence", weight: 1, value: 0.7 },
      ]),
    ).toBeCloseTo(0.7, 10);
  });
});
