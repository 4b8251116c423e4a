import { Inject, Injectable, Logger } from "@nestjs/common";
import {
  DecodeError,
  ModelUnavailableError,
  PipelineError,
  VerificationError,
  type PipelineStage,
} from "../common/errors/verification.errors";
import { StructuredLogger } from "../common/logging/structured-logger";
import type { VerificationSettings } from "../config/environment";
import { TelemetryMetrics } from "../observability/metrics-registry";
import { VERIFICATION_SETTINGS } from "./capabilities/capability.interfaces";
import { ConfidenceAggregatorService } from "./confidence-aggregator.service";
import { DocumentClassifierService } from "./document-classifier.service";
import { FieldMatcherService } from "./field-matcher.service";
import { ImageNormalizerService } from "./image-normalizer.service";
import { TextExtractionService } from "./text-extraction.service";
import {
  VerificationDecision,
  type ClassificationVerdict,
  type ConfidenceScores,
  type ExtractedText,
  type FieldMatchResult,
  type NormalizedImage,
  type VerificationOutcome,
  type VerificationRequest,
  type VerifyOptions,
} from "./verification.types";

export const UNREADABLE_IMAGE_MESSAGE =
  "The uploaded image is unreadable. Please upload a valid image file";

function freezeOutcome(outcome: VerificationOutcome): VerificationOutcome {
  return Object.freeze({
    ...outcome,
    confidenceScores: Object.freeze({ ...outcome.confidenceScores }),
    evidence: outcome.evidence
      ? Object.freeze({
          ...outcome.evidence,
          fieldMatches: Object.freeze([...outcome.evidence.fieldMatches]),
        })
      : undefined,
  });
}

function toLogError(error: unknown): { code?: string; message: string; stack?: string } {
  if (error instanceof VerificationError) {
    return { code: error.code, message: error.message, stack: error.stack };
  }
  if (error instanceof Error) {
    return { message: error.message, stack: error.stack };
  }
  return { message: String(error) };
}

/**
 * Entry point of the verification pipeline:
 * normalize -> (classify | extract) -> match -> aggregate -> decide.
 *
 * Holds no per-request state; concurrent calls share only the capability pools.
 */
@Injectable()
export class VerificationOrchestrator {
  private readonly logger = new Logger(VerificationOrchestrator.name);

  constructor(
    private readonly normalizer: ImageNormalizerService,
    private readonly classifier: DocumentClassifierService,
    private readonly extractor: TextExtractionService,
    private readonly matcher: FieldMatcherService,
    private readonly aggregator: ConfidenceAggregatorService,
    @Inject(VERIFICATION_SETTINGS)
    private readonly settings: VerificationSettings,
  ) {}

  /**
   * An undecodable upload resolves to an AUTO_REJECT outcome.
   *
   * @throws ModelUnavailableError when a capability fails or the budget runs out
   * @throws PipelineError for any other stage failure
   */
  async verify(
    request: VerificationRequest,
    options: VerifyOptions = {},
  ): Promise<VerificationOutcome> {
    const startedAt = Date.now();
    const deadline = startedAt + (options.timeoutMs ?? this.settings.requestTimeoutMs);
    const remaining = (): number => deadline - Date.now();

    try {
      return await this.execute(request, remaining, options.correlationId, startedAt);
    } catch (error) {
      TelemetryMetrics.recordVerification(
        request.kind,
        error instanceof ModelUnavailableError ? "model_unavailable" : "pipeline_error",
      );
      StructuredLogger.error("verification.failed", {
        correlationId: options.correlationId,
        durationMs: Date.now() - startedAt,
        data: {
          kind: request.kind,
          stage:
            error instanceof ModelUnavailableError || error instanceof PipelineError
              ? error.stage
              : undefined,
        },
        error: toLogError(error),
      });
      throw error;
    }
  }

  private async execute(
    request: VerificationRequest,
    remaining: () => number,
    correlationId: string | undefined,
    startedAt: number,
  ): Promise<VerificationOutcome> {
    let image: NormalizedImage;
    try {
      image = await this.runStage("normalize", () =>
        this.normalizer.normalize(request.image),
      );
    } catch (error) {
      if (error instanceof DecodeError) {
        return this.rejectUnreadable(request, error, correlationId, startedAt);
      }
      throw error;
    }

    const [classified, extracted] = await Promise.allSettled([
      this.runStage("classify", () =>
        this.classifier.classify(image, request.kind, remaining()),
      ),
      this.runStage("extract", () => this.extractor.extract(image, remaining())),
    ]);
    if (classified.status === "rejected") {
      throw classified.reason;
    }
    if (extracted.status === "rejected") {
      throw extracted.reason;
    }

    const classification: ClassificationVerdict = classified.value;
    const extraction: ExtractedText = extracted.value;

    const fieldMatches = await this.runStage("match", () =>
      this.matcher.match(extraction, request.claimed),
    );
    const scores = await this.runStage("aggregate", () =>
      this.aggregator.aggregate(classification, fieldMatches, extraction),
    );
    const result = await this.runStage("decide", () =>
      this.aggregator.decide(scores, {
        kind: request.kind,
        claimed: request.claimed,
      }),
    );

    const outcome = freezeOutcome({
      isValid: result.isValid,
      decision: result.decision,
      confidenceScores: scores,
      message: result.message,
      evidence: {
        caption: classification.caption,
        extractedText: extraction.text,
        fieldMatches,
      },
    });

    TelemetryMetrics.recordVerification(request.kind, outcome.decision);
    StructuredLogger.info("verification.completed", {
      correlationId,
      durationMs: Date.now() - startedAt,
      data: {
        kind: request.kind,
        decision: outcome.decision,
        isValid: outcome.isValid,
        overall: scores.overall,
        components: scores,
        caption: classification.caption,
        keywordRatio: classification.matchRatio,
        ocrConfidence: extraction.confidence,
        regionCount: extraction.regionCount,
        fieldScores: this.fieldScores(fieldMatches),
        imageWidth: image.width,
        imageHeight: image.height,
      },
    });

    return outcome;
  }

  private rejectUnreadable(
    request: VerificationRequest,
    error: DecodeError,
    correlationId: string | undefined,
    startedAt: number,
  ): VerificationOutcome {
    const scores: ConfidenceScores = { overall: 0 };

    TelemetryMetrics.recordVerification(
      request.kind,
      VerificationDecision.AUTO_REJECT,
    );
    StructuredLogger.warn("verification.rejected_decode", {
      correlationId,
      durationMs: Date.now() - startedAt,
      data: { kind: request.kind, reason: error.message },
    });

    return freezeOutcome({
      isValid: false,
      decision: VerificationDecision.AUTO_REJECT,
      confidenceScores: scores,
      message: UNREADABLE_IMAGE_MESSAGE,
    });
  }

  private async runStage<T>(
    stage: PipelineStage,
    work: () => T | Promise<T>,
  ): Promise<T> {
    const stageStartedAt = Date.now();
    try {
      return await work();
    } catch (error) {
      if (error instanceof VerificationError) {
        throw error;
      }
      this.logger.error(`Stage ${stage} failed`, error instanceof Error ? error.stack : undefined);
      throw new PipelineError(stage, error);
    } finally {
      TelemetryMetrics.observeStageDuration(stage, Date.now() - stageStartedAt);
    }
  }

  private fieldScores(matches: readonly FieldMatchResult[]): Record<string, number> {
    return Object.fromEntries(matches.map((match) => [match.field, match.score]));
  }
}
