import type {
  ConfidenceScores,
  VerificationDecision,
  VerificationOutcome,
} from "../verification.types";

export interface ConfidenceScoresResponse {
  overall: number;
  image_type_match?: number;
  student_name_match?: number;
  roll_number_match?: number;
  institution_match?: number;
  skill_match?: number;
  ocr_confidence?: number;
}

export interface VerificationOutcomeResponse {
  is_valid: boolean;
  decision: VerificationDecision;
  confidence_scores: ConfidenceScoresResponse;
  message: string;
}

type ComponentField = Exclude<keyof ConfidenceScoresResponse, "overall">;

function toConfidenceScoresResponse(
  scores: ConfidenceScores,
): ConfidenceScoresResponse {
  const components: Array<[ComponentField, number | undefined]> = [
    ["image_type_match", scores.imageTypeMatch],
    ["student_name_match", scores.studentNameMatch],
    ["roll_number_match", scores.rollNumberMatch],
    ["institution_match", scores.institutionMatch],
    ["skill_match", scores.skillMatch],
    ["ocr_confidence", scores.ocrConfidence],
  ];

  // Absent components are omitted rather than sent as null.
  const wire: ConfidenceScoresResponse = { overall: scores.overall };
  for (const [field, value] of components) {
    if (value !== undefined) {
      wire[field] = value;
    }
  }
  return wire;
}

/** Flat snake_case wire form. `evidence` stays in-process. */
export function toVerificationOutcomeResponse(
  outcome: VerificationOutcome,
): VerificationOutcomeResponse {
  return {
    is_valid: outcome.isValid,
    decision: outcome.decision,
    confidence_scores: toConfidenceScoresResponse(outcome.confidenceScores),
    message: outcome.message,
  };
}
