// ---------------------------------------------------------------------------
// Enumerated setting labels. The label strings are what settings.json stores.
// ---------------------------------------------------------------------------

export const ImageQuality = {
  VERY_HIGH: "عالية جداً",
  HIGH: "عالية",
  MEDIUM: "متوسطة",
  LOW: "منخفضة",
} as const;
export type ImageQuality = (typeof ImageQuality)[keyof typeof ImageQuality];

export const QrSize = {
  SMALL: "صغير",
  MEDIUM: "متوسط",
  LARGE: "كبير",
  EXTRA_LARGE: "كبير جداً",
} as const;
export type QrSize = (typeof QrSize)[keyof typeof QrSize];

export const Language = {
  ARABIC: "ar",
  ENGLISH: "en",
} as const;
export type Language = (typeof Language)[keyof typeof Language];

// -- Exhaustive label → value mappings ---------------------------------------

export const QR_SIZE_PIXELS: Record<QrSize, number> = {
  [QrSize.SMALL]: 200,
  [QrSize.MEDIUM]: 300,
  [QrSize.LARGE]: 400,
  [QrSize.EXTRA_LARGE]: 500,
};

export interface QualityProfile {
  /** Nominal quality value shown to the user (0–100). */
  quality: number;
  /** zlib deflate level used when writing the PNG. */
  deflateLevel: number;
}

export const IMAGE_QUALITY_PROFILES: Record<ImageQuality, QualityProfile> = {
  [ImageQuality.VERY_HIGH]: { quality: 100, deflateLevel: 9 },
  [ImageQuality.HIGH]: { quality: 90, deflateLevel: 9 },
  [ImageQuality.MEDIUM]: { quality: 75, deflateLevel: 6 },
  [ImageQuality.LOW]: { quality: 50, deflateLevel: 3 },
};

// ---------------------------------------------------------------------------
// Domain interfaces
// ---------------------------------------------------------------------------

/** Raw field values as collected by the UI. */
export interface EmployeeInput {
  name: string;
  employeeId: string;
  department: string;
  notes?: string;
}

/** Employee fields that passed validation. Values are kept as entered. */
export interface EmployeeRecord {
  name: string;
  employeeId: string;
  department: string;
  notes: string;
}

/** In-memory application settings. */
export interface AppSettings {
  savePath: string;
  autoSave: boolean;
  imageQuality: ImageQuality;
  qrSize: QrSize;
  qrColor: string;
  qrBgColor: string;
  language: Language;
}

/** Settings as persisted in settings.json. */
export interface SettingsFile {
  save_path: string;
  auto_save: boolean;
  image_quality: ImageQuality;
  qr_size: QrSize;
  qr_color: string;
  qr_bg_color: string;
  language: Language;
}
