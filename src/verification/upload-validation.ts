/** The parts of a multer upload the checks look at. */
export interface UploadedImage {
  readonly mimetype: string;
  readonly size: number;
}

export const ALLOWED_IMAGE_TYPES = [
  "image/jpeg",
  "image/jpg",
  "image/png",
  "image/webp",
] as const;

function isAllowedImageType(mimetype: string): boolean {
  return ALLOWED_IMAGE_TYPES.some((type) => type === mimetype);
}

/**
 * Boundary checks before the pipeline runs. File contents are not inspected:
 * bytes that fail to decode are a verification result (AUTO_REJECT), not an
 * upload error.
 */
export function validateImageUpload(
  file: UploadedImage,
  maxBytes: number,
): string[] {
  const errors: string[] = [];

  if (!isAllowedImageType(file.mimetype)) {
    errors.push(
      `Invalid file type: ${file.mimetype}. Only images (JPEG, PNG, WebP) are allowed.`,
    );
  }

  if (file.size === 0) {
    errors.push("Uploaded file is empty.");
  } else if (file.size > maxBytes) {
    errors.push(
      `File too large: ${file.size} bytes. Maximum allowed: ${maxBytes} bytes.`,
    );
  }

  return errors;
}
