import { Inject, Injectable } from "@nestjs/common";
import type { CapabilitySettings } from "../config/environment";
import {
  CAPABILITY_SETTINGS,
  TEXT_EXTRACTION_CAPABILITY,
  TEXT_EXTRACTION_POOL,
  type TextExtractionCapability,
} from "./capabilities/capability.interfaces";
import { CapabilityPool } from "./capabilities/capability-pool";
import type {
  ExtractedText,
  NormalizedImage,
  TextRegion,
} from "./verification.types";

interface RowBand {
  top: number;
  bottom: number;
  readonly members: TextRegion[];
}

export const sanitizeConfidence = (confidence: number | undefined): number => {
  if (typeof confidence !== "number" || Number.isNaN(confidence)) {
    return 0;
  }

  return Math.max(0, Math.min(1, confidence));
};

const verticalCenter = (region: TextRegion): number =>
  (region.boundingBox.y0 + region.boundingBox.y1) / 2;

/**
 * Orders regions top-to-bottom, then left-to-right inside a row band. A
 * region joins the current row when its vertical center falls inside the
 * row's vertical extent.
 */
export function orderByReadingOrder(regions: readonly TextRegion[]): TextRegion[] {
  const byTop = [...regions].sort(
    (left, right) =>
      left.boundingBox.y0 - right.boundingBox.y0 ||
      left.boundingBox.x0 - right.boundingBox.x0,
  );

  const rows: RowBand[] = [];
  for (const region of byTop) {
    const row = rows[rows.length - 1];
    const center = verticalCenter(region);

    if (row && center >= row.top && center <= row.bottom) {
      row.members.push(region);
      row.top = Math.min(row.top, region.boundingBox.y0);
      row.bottom = Math.max(row.bottom, region.boundingBox.y1);
      continue;
    }

    rows.push({
      top: region.boundingBox.y0,
      bottom: region.boundingBox.y1,
      members: [region],
    });
  }

  return rows.flatMap((row) =>
    [...row.members].sort(
      (left, right) => left.boundingBox.x0 - right.boundingBox.x0,
    ),
  );
}

export function assembleExtractedText(
  regions: readonly TextRegion[],
): ExtractedText {
  const ordered = orderByReadingOrder(regions)
    .map((region) => ({
      text: region.text.replace(/\s+/g, " ").trim(),
      confidence: sanitizeConfidence(region.confidence),
    }))
    .filter((region) => region.text.length > 0);

  if (ordered.length === 0) {
    return { text: "", confidence: 0, regionCount: 0 };
  }

  const confidenceTotal = ordered.reduce(
    (total, region) => total + region.confidence,
    0,
  );

  return {
    text: ordered.map((region) => region.text).join(" "),
    confidence: confidenceTotal / ordered.length,
    regionCount: ordered.length,
  };
}

@Injectable()
export class TextExtractionService {
  constructor(
    @Inject(TEXT_EXTRACTION_CAPABILITY)
    private readonly ocr: TextExtractionCapability,
    @Inject(TEXT_EXTRACTION_POOL)
    private readonly pool: CapabilityPool,
    @Inject(CAPABILITY_SETTINGS)
    private readonly capabilitySettings: CapabilitySettings,
  ) {}

  /**
   * Runs OCR and linearizes the regions in reading order. An image without
   * text yields empty text with confidence 0.
   *
   * @throws ModelUnavailableError when the OCR backend fails or times out
   */
  async extract(
    image: NormalizedImage,
    budgetMs: number = this.capabilitySettings.ocrTimeoutMs,
  ): Promise<ExtractedText> {
    const timeoutMs = Math.min(budgetMs, this.capabilitySettings.ocrTimeoutMs);

    const regions = await this.pool.run(
      (signal) => this.ocr.extractRegions(image, { timeoutMs, signal }),
      timeoutMs,
    );

    return assembleExtractedText(regions);
  }
}
