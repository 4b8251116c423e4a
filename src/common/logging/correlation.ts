import { randomUUID } from "crypto";

const MAX_ID_LENGTH = 64;
// Header values end up in JSON log lines and response headers.
const UNSAFE_ID_CHARACTERS = /[^A-Za-z0-9._:-]/g;

function firstHeaderValue(input: unknown): string | undefined {
  if (typeof input === "string") {
    return input;
  }
  if (Array.isArray(input) && typeof input[0] === "string") {
    return input[0];
  }
  return undefined;
}

export function sanitizeCorrelationId(input: unknown): string | undefined {
  const value = firstHeaderValue(input)
    ?.replace(UNSAFE_ID_CHARACTERS, "")
    .slice(0, MAX_ID_LENGTH);
  return value ? value : undefined;
}

/** First usable candidate wins; a fresh UUID when none is. */
export function resolveCorrelationId(...candidates: unknown[]): string {
  for (const candidate of candidates) {
    const value = sanitizeCorrelationId(candidate);
    if (value) {
      return value;
    }
  }

  return randomUUID();
}
