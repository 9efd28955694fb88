// Crypto
export { encrypt, decrypt } from "./crypto/aes-cbc.js";
export type { EncryptResult } from "./crypto/aes-cbc.js";
export {
  encryptPayload,
  decryptPayload,
  formatEnvelope,
  parseEnvelope,
} from "./crypto/envelope.js";
export type { CiphertextEnvelope } from "./crypto/envelope.js";
export { createSymmetricKey } from "./crypto/symmetric-key.js";
export type { SymmetricKey } from "./crypto/symmetric-key.js";
export { generateRandomBytes } from "./crypto/random.js";

// Keys
export { KeyStore } from "./keys/key-store.js";
export type { KeyLoadReport, KeyOrigin, KeyStoreOptions } from "./keys/key-store.js";

// Settings
export { SettingsStore, defaultSettings, toSettingsFile } from "./settings/settings-store.js";
export type {
  SettingsLoadReport,
  SettingsSource,
  SettingsStoreOptions,
} from "./settings/settings-store.js";
export { validateSavePath } from "./settings/path-probe.js";
export { validateSettings } from "./settings/validate-settings.js";

// Payload
export {
  validateEmployeeInput,
  serializePayload,
  parsePayload,
  describeEmployee,
} from "./payload/payload-codec.js";

// QR
export { encodeQrImage, toDataUrl } from "./qr/qr-image-encoder.js";
export type { QrImageOptions, RasterImage } from "./qr/qr-image-encoder.js";

// Artifact
export { writeArtifact } from "./artifact/artifact-writer.js";

// Config
export { resolveAppPaths } from "./config.js";
export type { AppPaths, ResolveAppPathsOptions } from "./config.js";

// BadgeEngine
export { BadgeEngine } from "./badge-engine.js";
export type {
  BadgeEngineOptions,
  GenerateOutcome,
  InitReport,
  QrArtifact,
} from "./badge-engine.js";
