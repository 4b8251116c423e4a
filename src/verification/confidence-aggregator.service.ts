import { Inject, Injectable } from "@nestjs/common";
import {
  SCORE_COMPONENTS,
  validateVerificationSettings,
  type ComponentWeights,
  type ScoreComponent,
  type VerificationSettings,
} from "../config/environment";
import { VERIFICATION_SETTINGS } from "./capabilities/capability.interfaces";
import { splitDescription } from "./field-matcher.service";
import {
  DocumentKind,
  VerificationDecision,
  type ClaimedFields,
  type ClassificationVerdict,
  type ConfidenceScores,
  type ExtractedText,
  type FieldKind,
  type FieldMatchResult,
} from "./verification.types";

export interface ScoreEntry {
  readonly component: ScoreComponent;
  readonly weight: number;
  /** `undefined` when the component does not apply to this submission. */
  readonly value: number | undefined;
}

export interface DecisionResult {
  readonly decision: VerificationDecision;
  readonly isValid: boolean;
  readonly message: string;
}

export interface DecisionContext {
  readonly kind: DocumentKind;
  readonly claimed: Readonly<ClaimedFields>;
}

type ComponentKey = Exclude<keyof ConfidenceScores, "overall">;

const COMPONENT_KEYS: Readonly<Record<ScoreComponent, ComponentKey>> = {
  image_type_match: "imageTypeMatch",
  student_name_match: "studentNameMatch",
  roll_number_match: "rollNumberMatch",
  institution_match: "institutionMatch",
  skill_match: "skillMatch",
  ocr_confidence: "ocrConfidence",
};

const FIELD_COMPONENTS: Readonly<Record<FieldKind, ScoreComponent>> = {
  student_name: "student_name_match",
  roll_number: "roll_number_match",
  institution: "institution_match",
  skill: "skill_match",
};

const DOCUMENT_NOUNS: Readonly<Record<DocumentKind, string>> = {
  [DocumentKind.COLLEGE_ID]: "college ID",
  [DocumentKind.CERTIFICATE]: "certificate",
};

const clampUnit = (value: number): number => Math.max(0, Math.min(1, value));

// Floating-point noise (0.8500000000000001) must not move a score across a threshold.
const OVERALL_SCALE = 1e12;
const roundOverall = (value: number): number =>
  Math.round(value * OVERALL_SCALE) / OVERALL_SCALE;

const capitalize = (value: string): string =>
  value.charAt(0).toUpperCase() + value.slice(1);

/**
 * Weighted mean over the entries that carry a value, rounded to 12 decimals.
 * Absent entries drop out of the denominator; a zero total weight yields 0.
 */
export function weightedMean(entries: readonly ScoreEntry[]): number {
  let weightedSum = 0;
  let totalWeight = 0;

  for (const entry of entries) {
    if (entry.value === undefined) {
      continue;
    }
    weightedSum += entry.weight * clampUnit(entry.value);
    totalWeight += entry.weight;
  }

  return totalWeight > 0 ? roundOverall(weightedSum / totalWeight) : 0;
}

export function buildScoreEntries(
  classification: ClassificationVerdict,
  fieldMatches: readonly FieldMatchResult[],
  extraction: ExtractedText,
  weights: ComponentWeights,
): ScoreEntry[] {
  const values = new Map<ScoreComponent, number>([
    ["image_type_match", classification.matchRatio],
    ["ocr_confidence", extraction.confidence],
  ]);
  for (const match of fieldMatches) {
    values.set(FIELD_COMPONENTS[match.field], match.score);
  }

  return SCORE_COMPONENTS.map((component) => ({
    component,
    weight: weights[component],
    value: values.get(component),
  }));
}

@Injectable()
export class ConfidenceAggregatorService {
  constructor(
    @Inject(VERIFICATION_SETTINGS)
    private readonly settings: VerificationSettings,
  ) {
    validateVerificationSettings(settings);
  }

  aggregate(
    classification: ClassificationVerdict,
    fieldMatches: readonly FieldMatchResult[],
    extraction: ExtractedText,
  ): ConfidenceScores {
    const entries = buildScoreEntries(
      classification,
      fieldMatches,
      extraction,
      this.settings.weights,
    );

    const components: Partial<Record<ComponentKey, number>> = {};
    for (const entry of entries) {
      if (entry.value !== undefined) {
        components[COMPONENT_KEYS[entry.component]] = clampUnit(entry.value);
      }
    }

    return { overall: weightedMean(entries), ...components };
  }

  /**
   * Maps the overall score onto a decision. Scores exactly on a threshold take
   * the less severe bucket below it.
   */
  decide(scores: ConfidenceScores, context?: DecisionContext): DecisionResult {
    const { approveThreshold, reviewThreshold } = this.settings;

    let decision: VerificationDecision;
    if (scores.overall > approveThreshold) {
      decision = VerificationDecision.AUTO_APPROVE;
    } else if (scores.overall >= reviewThreshold) {
      decision = VerificationDecision.NEEDS_REVIEW;
    } else {
      decision = VerificationDecision.AUTO_REJECT;
    }

    return {
      decision,
      isValid: decision === VerificationDecision.AUTO_APPROVE,
      message: this.describe(decision, scores, context),
    };
  }

  private describe(
    decision: VerificationDecision,
    scores: ConfidenceScores,
    context: DecisionContext | undefined,
  ): string {
    const noun = context ? DOCUMENT_NOUNS[context.kind] : "document";

    if (decision === VerificationDecision.AUTO_APPROVE) {
      return `${capitalize(noun)} verified successfully`;
    }

    const verdict =
      decision === VerificationDecision.NEEDS_REVIEW
        ? `${capitalize(noun)} requires manual review`
        : `${capitalize(noun)} could not be verified`;

    const reasons = this.collectReasons(scores, noun, context);
    return reasons.length > 0 ? `${verdict}: ${reasons.join("; ")}` : verdict;
  }

  private collectReasons(
    scores: ConfidenceScores,
    noun: string,
    context: DecisionContext | undefined,
  ): string[] {
    const threshold = this.settings.fieldMatchThreshold;
    const weak = (value: number | undefined): boolean =>
      value !== undefined && value < threshold;
    const reasons: string[] = [];

    if (
      scores.imageTypeMatch !== undefined &&
      scores.imageTypeMatch < this.settings.keywordRatioThreshold
    ) {
      reasons.push(`The uploaded image does not appear to be a valid ${noun}`);
    }
    if (scores.ocrConfidence === 0) {
      reasons.push(
        `Could not extract any text from the ${noun}. Please upload a clearer image`,
      );
    }
    if (!context) {
      return reasons;
    }

    const { claimed } = context;
    const { institution, skill } = splitDescription(
      claimed.description,
      claimed.skillLabel,
    );

    if (weak(scores.studentNameMatch) && claimed.fullName) {
      reasons.push(
        `Student name '${claimed.fullName.trim()}' does not match the name on the ${noun}`,
      );
    }
    if (weak(scores.rollNumberMatch) && claimed.rollNumber) {
      reasons.push(
        `Roll number '${claimed.rollNumber.trim()}' does not match the ${noun}`,
      );
    }
    if (weak(scores.institutionMatch) && institution) {
      reasons.push(
        `Institution name '${institution}' does not match the ${noun} content`,
      );
    }
    if (weak(scores.skillMatch) && skill) {
      reasons.push(
        `Skill/Achievement '${skill}' does not match the ${noun} content`,
      );
    }

    return reasons;
  }
}
