import { z } from "zod";

import { isValidHexColor } from "./color.js";
import { ENV_HOME, ENV_KEY_FILE, ENV_SETTINGS_FILE } from "./constants.js";
import { ImageQuality, Language, QrSize } from "./types.js";

// ---------------------------------------------------------------------------
// Enum schemas (derived from const objects in types.ts)
// ---------------------------------------------------------------------------

const imageQualityValues = Object.values(ImageQuality) as [ImageQuality, ...ImageQuality[]];
export const imageQualitySchema = z.enum(imageQualityValues);

const qrSizeValues = Object.values(QrSize) as [QrSize, ...QrSize[]];
export const qrSizeSchema = z.enum(qrSizeValues);

const languageValues = Object.values(Language) as [Language, ...Language[]];
export const languageSchema = z.enum(languageValues);

export const autoSaveSchema = z.boolean();

export const hexColorSchema = z
  .string()
  .refine(isValidHexColor, { message: "Invalid hex color" });

// ---------------------------------------------------------------------------
// Employee input (API boundary: raw UI field values)
// ---------------------------------------------------------------------------

export const employeeInputSchema = z.object({
  name: z.string(),
  employeeId: z.string(),
  department: z.string(),
  notes: z.string().optional(),
});

// ---------------------------------------------------------------------------
// Settings file schema (for deserializing settings.json)
//
// Every field is optional: missing keys fall back to defaults and each field is
// checked on its own by the settings store, so the raw shape only pins types.
// Unknown keys are stripped.
// ---------------------------------------------------------------------------

export const settingsFileSchema = z.object({
  save_path: z.unknown().optional(),
  auto_save: z.unknown().optional(),
  image_quality: z.unknown().optional(),
  qr_size: z.unknown().optional(),
  qr_color: z.unknown().optional(),
  qr_bg_color: z.unknown().optional(),
  language: z.unknown().optional(),
});
export type RawSettingsFile = z.infer<typeof settingsFileSchema>;

// ---------------------------------------------------------------------------
// Environment overrides
// ---------------------------------------------------------------------------

const nonEmpty = z.string().min(1);

export const appEnvSchema = z.object({
  [ENV_KEY_FILE]: nonEmpty.optional(),
  [ENV_SETTINGS_FILE]: nonEmpty.optional(),
  [ENV_HOME]: nonEmpty.optional(),
});
export type AppEnv = z.infer<typeof appEnvSchema>;
