import pngjs from "pngjs";
import type { PNG as PngImage } from "pngjs";
import QRCode from "qrcode";
import type { QRCodeSegment } from "qrcode";
import type { ImageQuality, QrSize, Result } from "@qr-pass/shared";
import {
  IMAGE_QUALITY_PROFILES,
  QR_ERROR_CORRECTION_LEVEL,
  QR_QUIET_ZONE,
  QR_SIZE_PIXELS,
  QrPassError,
  err,
  isValidHexColor,
  normalizeHexColor,
  ok,
} from "@qr-pass/shared";

const { PNG } = pngjs;

export interface QrImageOptions {
  size: QrSize;
  foreground: string;
  background: string;
  quality: ImageQuality;
}

/** PNG raster of one QR symbol plus the parameters it was rendered with. */
export interface RasterImage {
  png: Buffer;
  width: number;
  height: number;
  /** QR version (1–40), the smallest that fits the payload. */
  version: number;
  /** Modules per side, quiet zone excluded. */
  moduleCount: number;
  /** Pixels per module side. */
  scale: number;
  errorCorrectionLevel: typeof QR_ERROR_CORRECTION_LEVEL;
  foreground: string;
  background: string;
  quality: number;
}

/**
 * Place `source` in the middle of a `size` square filled with its quiet-zone
 * color. Each module keeps the same whole number of pixels.
 */
function centreOnCanvas(source: PngImage, size: number): PngImage {
  const canvas = new PNG({ width: size, height: size });
  // Top-left pixel is quiet zone, i.e. background.
  const fill = source.data.subarray(0, 4);
  for (let i = 0; i < canvas.data.length; i += 4) {
    canvas.data.set(fill, i);
  }

  const offset = Math.floor((size - source.width) / 2);
  const rowBytes = source.width * 4;
  for (let y = 0; y < source.height; y++) {
    source.data.copy(canvas.data, ((y + offset) * size + offset) * 4, y * rowBytes, (y + 1) * rowBytes);
  }
  return canvas;
}

/**
 * Encode `text` as a single byte-mode segment at error-correction level H.
 * The module scale is the largest whole number of pixels that fits the
 * symbol and its quiet zone into the configured size.
 */
export async function encodeQrImage(
  text: string,
  options: QrImageOptions,
): Promise<Result<RasterImage>> {
  if (!isValidHexColor(options.foreground)) {
    return err(QrPassError.invalidColor("qr_color", options.foreground));
  }
  if (!isValidHexColor(options.background)) {
    return err(QrPassError.invalidColor("qr_bg_color", options.background));
  }

  const foreground = normalizeHexColor(options.foreground, "qr_color");
  const background = normalizeHexColor(options.background, "qr_bg_color");
  const size = QR_SIZE_PIXELS[options.size];
  const profile = IMAGE_QUALITY_PROFILES[options.quality];

  const segments: QRCodeSegment[] = [{ mode: "byte", data: Buffer.from(text, "utf8") }];
  const symbol = QRCode.create(segments, { errorCorrectionLevel: QR_ERROR_CORRECTION_LEVEL });
  const moduleCount = symbol.modules.size;

  const scale = Math.floor(size / (moduleCount + 2 * QR_QUIET_ZONE));
  if (scale < 1) {
    return err(
      QrPassError.generationFailed(
        "encode",
        new Error(`QR version ${symbol.version} does not fit in ${size} px`),
      ),
    );
  }

  const raster = await QRCode.toBuffer(segments, {
    type: "png",
    errorCorrectionLevel: QR_ERROR_CORRECTION_LEVEL,
    version: symbol.version,
    margin: QR_QUIET_ZONE,
    scale,
    color: { dark: foreground, light: background },
  });

  const canvas = centreOnCanvas(PNG.sync.read(raster), size);
  const png = PNG.sync.write(canvas, { deflateLevel: profile.deflateLevel });

  return ok({
    png,
    width: size,
    height: size,
    version: symbol.version,
    moduleCount,
    scale,
    errorCorrectionLevel: QR_ERROR_CORRECTION_LEVEL,
    foreground,
    background,
    quality: profile.quality,
  });
}

export function toDataUrl(image: RasterImage): string {
  return `data:image/png;base64,${image.png.toString("base64")}`;
}
