import { Module, type Provider } from "@nestjs/common";
import {
  getEnv,
  validateVerificationSettings,
  type CapabilitySettings,
} from "../config/environment";
import { CapabilityLifecycleService } from "./capabilities/capability-lifecycle.service";
import { CapabilityPool } from "./capabilities/capability-pool";
import {
  CAPABILITY_SETTINGS,
  CAPTIONING_CAPABILITY,
  CAPTIONING_POOL,
  TEXT_EXTRACTION_CAPABILITY,
  TEXT_EXTRACTION_POOL,
  VERIFICATION_SETTINGS,
  type CaptioningCapability,
  type TextExtractionCapability,
} from "./capabilities/capability.interfaces";
import { HttpCaptioningCapability } from "./capabilities/http-captioning.capability";
import { TesseractTextExtractionCapability } from "./capabilities/tesseract-ocr.capability";
import { ConfidenceAggregatorService } from "./confidence-aggregator.service";
import { DocumentClassifierService } from "./document-classifier.service";
import { FieldMatcherService } from "./field-matcher.service";
import { ImageNormalizerService } from "./image-normalizer.service";
import { TextExtractionService } from "./text-extraction.service";
import { VerificationController } from "./verification.controller";
import { VerificationOrchestrator } from "./verification-orchestrator.service";

const CAPABILITY_PROVIDERS: Provider[] = [
  {
    provide: VERIFICATION_SETTINGS,
    useFactory: () => validateVerificationSettings(getEnv().verification),
  },
  {
    provide: CAPABILITY_SETTINGS,
    useFactory: () => getEnv().capabilities,
  },
  {
    provide: CAPTIONING_CAPABILITY,
    useFactory: (settings: CapabilitySettings) =>
      new HttpCaptioningCapability(settings),
    inject: [CAPABILITY_SETTINGS],
  },
  {
    provide: TEXT_EXTRACTION_CAPABILITY,
    useFactory: (settings: CapabilitySettings) =>
      new TesseractTextExtractionCapability(settings),
    inject: [CAPABILITY_SETTINGS],
  },
  {
    provide: CAPTIONING_POOL,
    useFactory: (
      settings: CapabilitySettings,
      capability: CaptioningCapability,
    ) =>
      new CapabilityPool(
        capability.name,
        "classify",
        settings.captioningConcurrency,
      ),
    inject: [CAPABILITY_SETTINGS, CAPTIONING_CAPABILITY],
  },
  {
    provide: TEXT_EXTRACTION_POOL,
    useFactory: (
      settings: CapabilitySettings,
      capability: TextExtractionCapability,
    ) => new CapabilityPool(capability.name, "extract", settings.ocrConcurrency),
    inject: [CAPABILITY_SETTINGS, TEXT_EXTRACTION_CAPABILITY],
  },
];

@Module({
  controllers: [VerificationController],
  providers: [
    ...CAPABILITY_PROVIDERS,
    CapabilityLifecycleService,
    ImageNormalizerService,
    DocumentClassifierService,
    TextExtractionService,
    FieldMatcherService,
    ConfidenceAggregatorService,
    VerificationOrchestrator,
  ],
  exports: [VerificationOrchestrator, CapabilityLifecycleService],
})
export class VerificationModule {}
