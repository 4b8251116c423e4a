import {
  DEFAULT_VERIFICATION_SETTINGS,
  type CapabilitySettings,
  type VerificationSettings,
} from "../../src/config/environment";
import { CapabilityPool } from "../../src/verification/capabilities/capability-pool";
import type {
  CaptioningCapability,
  TextExtractionCapability,
} from "../../src/verification/capabilities/capability.interfaces";
import { ConfidenceAggregatorService } from "../../src/verification/confidence-aggregator.service";
import { DocumentClassifierService } from "../../src/verification/document-classifier.service";
import { FieldMatcherService } from "../../src/verification/field-matcher.service";
import { ImageNormalizerService } from "../../src/verification/image-normalizer.service";
import { TextExtractionService } from "../../src/verification/text-extraction.service";
import { VerificationOrchestrator } from "../../src/verification/verification-orchestrator.service";

export const TEST_CAPABILITY_SETTINGS: CapabilitySettings = {
  captioningUrl: "http://captioning.test/vqa",
  captioningTimeoutMs: 1000,
  captioningConcurrency: 2,
  ocrLanguage: "eng",
  ocrTimeoutMs: 1000,
  ocrConcurrency: 2,
};

export interface PipelineFixture {
  readonly orchestrator: VerificationOrchestrator;
  readonly captioningPool: CapabilityPool;
  readonly textExtractionPool: CapabilityPool;
}

export function createPipeline(options: {
  captioning: CaptioningCapability;
  ocr: TextExtractionCapability;
  settings?: VerificationSettings;
  capabilitySettings?: CapabilitySettings;
  matcher?: FieldMatcherService;
}): PipelineFixture {
  const settings = options.settings ?? DEFAULT_VERIFICATION_SETTINGS;
  const capabilitySettings =
    options.capabilitySettings ?? TEST_CAPABILITY_SETTINGS;

  const captioningPool = new CapabilityPool(
    options.captioning.name,
    "classify",
    capabilitySettings.captioningConcurrency,
  );
  const textExtractionPool = new CapabilityPool(
    options.ocr.name,
    "extract",
    capabilitySettings.ocrConcurrency,
  );

  const orchestrator = new VerificationOrchestrator(
    new ImageNormalizerService(settings),
    new DocumentClassifierService(
      options.captioning,
      captioningPool,
      capabilitySettings,
      settings,
    ),
    new TextExtractionService(options.ocr, textExtractionPool, capabilitySettings),
    options.matcher ?? new FieldMatcherService(),
    new ConfidenceAggregatorService(settings),
    settings,
  );

  return { orchestrator, captioningPool, textExtractionPool };
}
