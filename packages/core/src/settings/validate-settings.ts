import type { AppSettings, Result } from "@qr-pass/shared";
import {
  QrPassError,
  autoSaveSchema,
  err,
  imageQualitySchema,
  isValidHexColor,
  languageSchema,
  ok,
  qrSizeSchema,
} from "@qr-pass/shared";
import { validateSavePath } from "./path-probe.js";

/**
 * Gate run before any settings write. Stops at the first violated rule:
 * save path, QR color, QR background color, image quality, QR size,
 * language, auto-save flag.
 */
export async function validateSettings(settings: AppSettings): Promise<Result<AppSettings>> {
  const path = await validateSavePath(settings.savePath);
  if (!path.ok) {
    return path;
  }

  if (!isValidHexColor(settings.qrColor)) {
    return err(QrPassError.invalidColor("qr_color", settings.qrColor));
  }
  if (!isValidHexColor(settings.qrBgColor)) {
    return err(QrPassError.invalidColor("qr_bg_color", settings.qrBgColor));
  }

  // Labels may come from an untyped caller.
  if (!imageQualitySchema.safeParse(settings.imageQuality).success) {
    return err(QrPassError.invalidSetting("image_quality", settings.imageQuality));
  }
  if (!qrSizeSchema.safeParse(settings.qrSize).success) {
    return err(QrPassError.invalidSetting("qr_size", settings.qrSize));
  }
  if (!languageSchema.safeParse(settings.language).success) {
    return err(QrPassError.invalidSetting("language", settings.language));
  }
  if (!autoSaveSchema.safeParse(settings.autoSave).success) {
    return err(QrPassError.invalidSetting("auto_save", settings.autoSave));
  }

  return ok({
    savePath: path.value,
    autoSave: settings.autoSave,
    imageQuality: settings.imageQuality,
    qrSize: settings.qrSize,
    qrColor: settings.qrColor,
    qrBgColor: settings.qrBgColor,
    language: settings.language,
  });
}
