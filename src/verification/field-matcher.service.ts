import { Injectable } from "@nestjs/common";
import type {
  ClaimedFields,
  ExtractedText,
  FieldKind,
  FieldMatchResult,
} from "./verification.types";

/** Name parts shorter than this (bare initials) count toward the total but never match. */
export const MIN_NAME_PART_LENGTH = 2;
/** Institution and skill words shorter than this ("of", "in", "AI") are not scored. */
export const MIN_CONTENT_TOKEN_LENGTH = 3;

const SPACED_SEPARATOR = /\s+-\s+/;
const IDENTIFIER_NOISE = /[\s\-_]+/g;

export interface DescriptionParts {
  readonly institution?: string;
  readonly skill?: string;
}

/** Lower-cases and strips punctuation, collapsing runs of whitespace. */
export function normalizeForMatching(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, "")
    .replace(/\s+/g, " ")
    .trim();
}

export function tokenize(value: string, minLength = 1): string[] {
  return normalizeForMatching(value)
    .split(" ")
    .filter((token) => token.length >= minLength);
}

/**
 * Splits `"<institution> - <skill>"`. A spaced hyphen wins over a bare one, so
 * "Full-Stack Academy - Web Development" keeps its institution intact. Without
 * any hyphen, or with nothing after it, the claimed label is the skill.
 */
export function splitDescription(
  description: string | undefined,
  skillLabel: string | undefined,
): DescriptionParts {
  const text = description?.trim() ?? "";
  const labelledSkill = skillLabel?.trim() || undefined;

  const spaced = SPACED_SEPARATOR.exec(text);
  if (spaced) {
    return {
      institution: text.slice(0, spaced.index).trim(),
      skill: text.slice(spaced.index + spaced[0].length).trim() || labelledSkill,
    };
  }

  const hyphenAt = text.indexOf("-");
  if (hyphenAt >= 0) {
    return {
      institution: text.slice(0, hyphenAt).trim(),
      skill: text.slice(hyphenAt + 1).trim() || labelledSkill,
    };
  }

  return { skill: labelledSkill };
}

function tokenRatio(
  field: FieldKind,
  tokens: readonly string[],
  haystack: string,
  isMatch: (token: string) => boolean = (token) => haystack.includes(token),
): FieldMatchResult | undefined {
  if (tokens.length === 0) {
    return undefined;
  }

  const matchedTokens = tokens.filter(isMatch).length;
  return {
    field,
    score: matchedTokens / tokens.length,
    matchedTokens,
    totalTokens: tokens.length,
  };
}

export function matchStudentName(
  fullName: string | undefined,
  normalizedText: string,
): FieldMatchResult | undefined {
  if (!fullName) {
    return undefined;
  }
  return tokenRatio(
    "student_name",
    tokenize(fullName),
    normalizedText,
    (part) =>
      part.length >= MIN_NAME_PART_LENGTH && normalizedText.includes(part),
  );
}

/** Identifiers are all-or-nothing: spacing and hyphenation are ignored, nothing else is. */
export function matchRollNumber(
  rollNumber: string | undefined,
  rawText: string,
): FieldMatchResult | undefined {
  const claimed = (rollNumber ?? "").toLowerCase().replace(IDENTIFIER_NOISE, "");
  if (!claimed) {
    return undefined;
  }

  const found = rawText
    .toLowerCase()
    .replace(IDENTIFIER_NOISE, "")
    .includes(claimed);

  return {
    field: "roll_number",
    score: found ? 1 : 0,
    matchedTokens: found ? 1 : 0,
    totalTokens: 1,
  };
}

export function matchContentField(
  field: Extract<FieldKind, "institution" | "skill">,
  claimed: string | undefined,
  normalizedText: string,
): FieldMatchResult | undefined {
  if (!claimed) {
    return undefined;
  }
  return tokenRatio(
    field,
    tokenize(claimed, MIN_CONTENT_TOKEN_LENGTH),
    normalizedText,
  );
}

@Injectable()
export class FieldMatcherService {
  /**
   * Scores each claimed field against the extracted text. Fields without a
   * claimed value, or whose value has no scorable tokens, are left out.
   */
  match(
    extracted: ExtractedText,
    claimed: Readonly<ClaimedFields>,
  ): FieldMatchResult[] {
    const normalizedText = normalizeForMatching(extracted.text);
    const { institution, skill } = splitDescription(
      claimed.description,
      claimed.skillLabel,
    );

    const results = [
      matchStudentName(claimed.fullName, normalizedText),
      matchRollNumber(claimed.rollNumber, extracted.text),
      matchContentField("institution", institution, normalizedText),
      matchContentField("skill", skill, normalizedText),
    ];

    return results.filter(
      (result): result is FieldMatchResult => result !== undefined,
    );
  }
}
