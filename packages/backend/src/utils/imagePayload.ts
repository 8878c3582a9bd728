import { fileTypeFromBuffer } from "file-type";

const DEFAULT_FORMAT = "png";

export interface DecodedImage {
  format: string;
  base64: string;
  bytes: Buffer;
}

export interface ImageValidationOptions {
  maxSizeBytes?: number;
}

export class ImageValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ImageValidationError";
  }
}

/**
 * Splits an encoded image into its format and payload. A `data:image/<fmt>;base64,` prefix
 * names the format; bare base64 defaults to png.
 */
export function decodeImage(encoded: string): DecodedImage {
  let base64 = encoded;
  let format = DEFAULT_FORMAT;

  if (encoded.startsWith("data:")) {
    const commaIndex = encoded.indexOf(",");
    const header = commaIndex === -1 ? encoded : encoded.slice(0, commaIndex);
    base64 = commaIndex === -1 ? "" : encoded.slice(commaIndex + 1);
    const mime = header.split(";")[0] ?? "";
    format = sanitizeFormat(mime.split("/").pop() ?? "");
  }

  return {
    format,
    base64,
    bytes: Buffer.from(base64, "base64")
  };
}

export function toImageDataUrl(encoded: string): string {
  return encoded.startsWith("data:") ? encoded : `data:image/jpeg;base64,${encoded}`;
}

export async function validateImagePayload(
  encoded: string,
  options: ImageValidationOptions = {}
): Promise<DecodedImage> {
  const decoded = decodeImage(encoded);
  if (decoded.bytes.length === 0) {
    throw new ImageValidationError("Image payload is empty or not valid base64.");
  }

  if (options.maxSizeBytes !== undefined && decoded.bytes.length > options.maxSizeBytes) {
    throw new ImageValidationError(
      `Image is too large. Maximum size is ${options.maxSizeBytes} bytes.`
    );
  }

  const detected = await fileTypeFromBuffer(decoded.bytes);
  if (!detected) {
    throw new ImageValidationError("Unable to determine image type.");
  }
  if (!detected.mime.startsWith("image/")) {
    throw new ImageValidationError(`Binary signature is not an image. Detected ${detected.mime}.`);
  }

  return decoded;
}

function sanitizeFormat(raw: string): string {
  const cleaned = raw.toLowerCase().replace(/[^a-z0-9]/g, "");
  return cleaned.length > 0 ? cleaned : DEFAULT_FORMAT;
}
