import { Inject, Injectable, Logger } from "@nestjs/common";
import sharp from "sharp";
import { DecodeError } from "../common/errors/verification.errors";
import type { VerificationSettings } from "../config/environment";
import { VERIFICATION_SETTINGS } from "./capabilities/capability.interfaces";
import type { NormalizedImage } from "./verification.types";

const WHITE = { r: 255, g: 255, b: 255 } as const;

@Injectable()
export class ImageNormalizerService {
  private readonly logger = new Logger(ImageNormalizerService.name);

  constructor(
    @Inject(VERIFICATION_SETTINGS)
    private readonly settings: VerificationSettings,
  ) {}

  /**
   * Decodes an upload into an upright RGB image whose longest side is at most
   * `maxImageDimension`. Transparency is composited onto white.
   *
   * @throws DecodeError when the bytes are not a supported image
   */
  async normalize(raw: Buffer): Promise<NormalizedImage> {
    if (raw.length === 0) {
      throw new DecodeError("empty upload");
    }

    let metadata: sharp.Metadata;
    try {
      metadata = await sharp(raw).metadata();
    } catch (error) {
      throw new DecodeError(
        error instanceof Error ? error.message : "unsupported image format",
        error,
      );
    }

    if (!metadata.format || !metadata.width || !metadata.height) {
      throw new DecodeError("missing image dimensions");
    }

    const cap = this.settings.maxImageDimension;
    const pipeline = sharp(raw, { failOn: "error" })
      .rotate()
      .flatten({ background: WHITE })
      .toColourspace("srgb")
      .resize({
        width: cap,
        height: cap,
        fit: "inside",
        withoutEnlargement: true,
        kernel: sharp.kernel.lanczos3,
      })
      .removeAlpha();

    try {
      const { data, info } = await pipeline
        .clone()
        .raw()
        .toBuffer({ resolveWithObject: true });

      if (info.channels !== 3) {
        throw new DecodeError(`expected 3 channels, decoded ${info.channels}`);
      }

      const encoded = await sharp(data, {
        raw: { width: info.width, height: info.height, channels: 3 },
      })
        .png()
        .toBuffer();

      this.logger.debug(
        `Normalized ${metadata.format} ${metadata.width}x${metadata.height} -> ${info.width}x${info.height}`,
      );

      return {
        pixels: data,
        width: info.width,
        height: info.height,
        colorMode: "RGB",
        encoded,
      };
    } catch (error) {
      if (error instanceof DecodeError) {
        throw error;
      }
      throw new DecodeError(
        error instanceof Error ? error.message : "image decode failed",
        error,
      );
    }
  }
}
