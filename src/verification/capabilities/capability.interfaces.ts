import type { NormalizedImage, TextRegion } from "../verification.types";

export const CAPTIONING_CAPABILITY = Symbol("CAPTIONING_CAPABILITY");
export const TEXT_EXTRACTION_CAPABILITY = Symbol("TEXT_EXTRACTION_CAPABILITY");
export const CAPTIONING_POOL = Symbol("CAPTIONING_POOL");
export const TEXT_EXTRACTION_POOL = Symbol("TEXT_EXTRACTION_POOL");
export const CAPABILITY_SETTINGS = Symbol("CAPABILITY_SETTINGS");
export const VERIFICATION_SETTINGS = Symbol("VERIFICATION_SETTINGS");

export interface CapabilityCallOptions {
  readonly timeoutMs: number;
  readonly signal: AbortSignal;
}

/**
 * A resident model behind a narrow interface. Opened once at startup,
 * closed on shutdown, shared by every request.
 */
export interface Capability {
  readonly name: string;
  open(): Promise<void>;
  close(): Promise<void>;
}

export interface CaptioningCapability extends Capability {
  /** Answers a free-form question about the image. Rejects when the backend fails. */
  caption(
    image: NormalizedImage,
    prompt: string,
    options: CapabilityCallOptions,
  ): Promise<string>;
}

export interface TextExtractionCapability extends Capability {
  /** Detected text regions with per-region confidence (0..1) and coordinates. */
  extractRegions(
    image: NormalizedImage,
    options: CapabilityCallOptions,
  ): Promise<TextRegion[]>;
}
