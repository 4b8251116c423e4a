import { Logger } from "@nestjs/common";
import * as tesseract from "node-tesseract-ocr";
import { ModelUnavailableError } from "../../common/errors/verification.errors";
import type { CapabilitySettings } from "../../config/environment";
import type { NormalizedImage, TextRegion } from "../verification.types";
import type {
  CapabilityCallOptions,
  TextExtractionCapability,
} from "./capability.interfaces";
import { parseTsvRegions } from "./tesseract-tsv";

/**
 * OCR through the local `tesseract` binary. The PNG is piped on stdin and
 * word-level TSV comes back, grouped here into line regions.
 */
export class TesseractTextExtractionCapability
  implements TextExtractionCapability
{
  readonly name = "tesseract-ocr";
  private readonly logger = new Logger(TesseractTextExtractionCapability.name);
  private opened = false;

  constructor(
    private readonly settings: Pick<CapabilitySettings, "ocrLanguage">,
  ) {}

  async open(): Promise<void> {
    this.opened = true;
    this.logger.log(`OCR ready (lang=${this.settings.ocrLanguage})`);
  }

  async close(): Promise<void> {
    this.opened = false;
  }

  async extractRegions(
    image: NormalizedImage,
    options: CapabilityCallOptions,
  ): Promise<TextRegion[]> {
    if (!this.opened) {
      throw new ModelUnavailableError("extract", "closed");
    }

    const tsv = await tesseract.recognize(image.encoded, {
      lang: this.settings.ocrLanguage,
      oem: 1,
      psm: 3,
      presets: ["tsv"],
    });

    // The child process cannot be interrupted; a late result is discarded.
    if (options.signal.aborted) {
      throw new ModelUnavailableError("extract", "timeout");
    }

    return parseTsvRegions(tsv);
  }
}
