// ---------------------------------------------------------------------------
// Configuration constants
// ---------------------------------------------------------------------------

// -- Paths (relative names only; core/ resolves them) ----------------------

export const KEY_FILE_NAME = "encryption_key.bin";
export const SETTINGS_FILE_NAME = "settings.json";
export const DEFAULT_SAVE_DIR_NAME = "QR-pass";

// -- Environment overrides ---------------------------------------------------

export const ENV_KEY_FILE = "QR_PASS_KEY_FILE";
export const ENV_SETTINGS_FILE = "QR_PASS_SETTINGS_FILE";
export const ENV_HOME = "QR_PASS_HOME";

// -- Crypto: AES-256-CBC -----------------------------------------------------

export const AES_ALGORITHM = "aes-256-cbc";
export const AES_KEY_LENGTH = 32; // 256 bits
export const AES_IV_LENGTH = 16; // one block
export const AES_BLOCK_SIZE = 16;

// -- Envelope ----------------------------------------------------------------

export const ENVELOPE_SEPARATOR = ":";

// -- Payload labels (the plaintext format is read by external decoders) ------

export const PAYLOAD_LABEL_NAME = "الاسم";
export const PAYLOAD_LABEL_ID = "الرقم الوظيفي";
export const PAYLOAD_LABEL_DEPARTMENT = "القسم";
export const PAYLOAD_LABEL_NOTES = "معلومات إضافية";
export const PAYLOAD_LABEL_SEPARATOR = ": ";

export const MIN_NAME_LENGTH = 2;
export const MIN_DEPARTMENT_LENGTH = 2;

// -- QR rendering ------------------------------------------------------------

export const QR_ERROR_CORRECTION_LEVEL = "H"; // ~30% damage tolerance
export const QR_QUIET_ZONE = 4; // modules

// -- Artifact ----------------------------------------------------------------

export const ARTIFACT_FILE_PREFIX = "qr_code_";
export const ARTIFACT_FILE_EXTENSION = ".png";

export function artifactFileName(employeeId: string): string {
  return `${ARTIFACT_FILE_PREFIX}${employeeId}${ARTIFACT_FILE_EXTENSION}`;
}

// -- Settings file -----------------------------------------------------------

export const SETTINGS_JSON_INDENT = 4;
export const PROBE_FILE_PREFIX = ".qr-pass-probe";

// -- File permissions --------------------------------------------------------

export const KEY_FILE_MODE = 0o600;
