import { Inject, Injectable, Logger } from "@nestjs/common";
import type {
  CapabilitySettings,
  VerificationSettings,
} from "../config/environment";
import {
  CAPABILITY_SETTINGS,
  CAPTIONING_CAPABILITY,
  CAPTIONING_POOL,
  VERIFICATION_SETTINGS,
  type CaptioningCapability,
} from "./capabilities/capability.interfaces";
import { CapabilityPool } from "./capabilities/capability-pool";
import {
  DocumentKind,
  type ClassificationVerdict,
  type NormalizedImage,
} from "./verification.types";

interface ClassificationPrompt {
  readonly question: string;
  readonly keywords: readonly string[];
}

/**
 * Keyword overlap against a free-text answer. Negations ("no, not a
 * certificate") still hit "certificate"; callers only see the verdict, so a
 * real classifier can replace this without touching the pipeline.
 */
export const CLASSIFICATION_PROMPTS: Readonly<
  Record<DocumentKind, ClassificationPrompt>
> = {
  [DocumentKind.COLLEGE_ID]: {
    question:
      "Question: Is this a college ID card or student identification card? Answer:",
    keywords: ["yes", "id", "student"],
  },
  [DocumentKind.CERTIFICATE]: {
    question:
      "Question: Is this a certificate, award, or achievement document? Answer:",
    keywords: ["yes", "certificate", "award"],
  },
};

export function scoreCaption(
  caption: string,
  kind: DocumentKind,
  threshold: number,
): ClassificationVerdict {
  const { keywords } = CLASSIFICATION_PROMPTS[kind];
  const answer = caption.toLowerCase();
  const matchedKeywords = keywords.filter((keyword) =>
    answer.includes(keyword),
  ).length;
  const matchRatio = matchedKeywords / keywords.length;

  return {
    caption,
    matchedKeywords,
    totalKeywords: keywords.length,
    matchRatio,
    isPlausibleDocument: matchRatio >= threshold,
  };
}

@Injectable()
export class DocumentClassifierService {
  private readonly logger = new Logger(DocumentClassifierService.name);

  constructor(
    @Inject(CAPTIONING_CAPABILITY)
    private readonly captioning: CaptioningCapability,
    @Inject(CAPTIONING_POOL)
    private readonly pool: CapabilityPool,
    @Inject(CAPABILITY_SETTINGS)
    private readonly capabilitySettings: CapabilitySettings,
    @Inject(VERIFICATION_SETTINGS)
    private readonly settings: VerificationSettings,
  ) {}

  /**
   * Asks the captioning model whether the image is the claimed kind of document.
   *
   * @param budgetMs time left in the request; the call gets the smaller of this and the captioning timeout
   * @throws ModelUnavailableError when the model fails or times out
   */
  async classify(
    image: NormalizedImage,
    kind: DocumentKind,
    budgetMs: number = this.capabilitySettings.captioningTimeoutMs,
  ): Promise<ClassificationVerdict> {
    const { question } = CLASSIFICATION_PROMPTS[kind];
    const timeoutMs = Math.min(
      budgetMs,
      this.capabilitySettings.captioningTimeoutMs,
    );

    const answer = await this.pool.run(
      (signal) =>
        this.captioning.caption(image, question, { timeoutMs, signal }),
      timeoutMs,
    );

    const caption = typeof answer === "string" ? answer.trim() : "";
    if (!caption) {
      this.logger.warn(`Empty caption answer for ${kind}`);
    }

    return scoreCaption(caption, kind, this.settings.keywordRatioThreshold);
  }
}
