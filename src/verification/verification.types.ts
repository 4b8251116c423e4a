export enum DocumentKind {
  COLLEGE_ID = "COLLEGE_ID",
  CERTIFICATE = "CERTIFICATE",
}

export enum VerificationDecision {
  AUTO_APPROVE = "AUTO_APPROVE",
  NEEDS_REVIEW = "NEEDS_REVIEW",
  AUTO_REJECT = "AUTO_REJECT",
}

/**
 * Values the submitter asserts and the pipeline tries to corroborate.
 *
 * `description` follows the form convention `"<institution> - <skill/achievement>"`.
 */
export interface ClaimedFields {
  readonly fullName?: string;
  readonly rollNumber?: string;
  readonly skillLabel?: string;
  readonly description?: string;
}

export interface VerificationRequest {
  readonly image: Buffer;
  readonly kind: DocumentKind;
  readonly claimed: Readonly<ClaimedFields>;
}

export function createVerificationRequest(
  image: Buffer,
  kind: DocumentKind,
  claimed: ClaimedFields,
): VerificationRequest {
  return Object.freeze({
    image,
    kind,
    claimed: Object.freeze({ ...claimed }),
  });
}

export interface NormalizedImage {
  /** Raw interleaved RGB pixels, `width * height * 3` bytes. */
  readonly pixels: Buffer;
  readonly width: number;
  readonly height: number;
  readonly colorMode: "RGB";
  /** Lossless PNG of `pixels`, the form the capabilities consume. */
  readonly encoded: Buffer;
}

export interface ClassificationVerdict {
  readonly caption: string;
  readonly matchedKeywords: number;
  readonly totalKeywords: number;
  readonly matchRatio: number;
  readonly isPlausibleDocument: boolean;
}

export interface BoundingBox {
  readonly x0: number;
  readonly y0: number;
  readonly x1: number;
  readonly y1: number;
}

export interface TextRegion {
  readonly text: string;
  readonly confidence: number;
  readonly boundingBox: BoundingBox;
}

export interface ExtractedText {
  readonly text: string;
  readonly confidence: number;
  readonly regionCount: number;
}

export type FieldKind = "student_name" | "roll_number" | "institution" | "skill";

export interface FieldMatchResult {
  readonly field: FieldKind;
  readonly score: number;
  readonly matchedTokens: number;
  readonly totalTokens: number;
}

export interface ConfidenceScores {
  readonly overall: number;
  readonly imageTypeMatch?: number;
  readonly studentNameMatch?: number;
  readonly rollNumberMatch?: number;
  readonly institutionMatch?: number;
  readonly skillMatch?: number;
  readonly ocrConfidence?: number;
}

export interface VerificationEvidence {
  readonly caption: string;
  readonly extractedText: string;
  readonly fieldMatches: readonly FieldMatchResult[];
}

export interface VerificationOutcome {
  readonly isValid: boolean;
  readonly decision: VerificationDecision;
  readonly confidenceScores: ConfidenceScores;
  readonly message: string;
  /** Audit trail; kept in-process, not serialized to the wire. */
  readonly evidence?: VerificationEvidence;
}

export interface VerifyOptions {
  /** Total budget for the request; defaults to the configured request timeout. */
  readonly timeoutMs?: number;
  readonly correlationId?: string;
}
