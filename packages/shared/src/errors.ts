// ---------------------------------------------------------------------------
// Error codes, error kinds and QrPassError class
// ---------------------------------------------------------------------------

export enum ErrorCode {
  // Employee input
  INVALID_NAME = "INVALID_NAME",
  INVALID_ID = "INVALID_ID",
  INVALID_DEPARTMENT = "INVALID_DEPARTMENT",

  // Key file
  KEY_FILE_READ_ERROR = "KEY_FILE_READ_ERROR",
  KEY_FILE_WRITE_ERROR = "KEY_FILE_WRITE_ERROR",
  KEY_FILE_CORRUPTED = "KEY_FILE_CORRUPTED",

  // Settings file
  SETTINGS_FILE_READ_ERROR = "SETTINGS_FILE_READ_ERROR",
  SETTINGS_FILE_PARSE_ERROR = "SETTINGS_FILE_PARSE_ERROR",
  SETTINGS_FILE_WRITE_ERROR = "SETTINGS_FILE_WRITE_ERROR",

  // Pre-write gates
  PATH_NOT_ABSOLUTE = "PATH_NOT_ABSOLUTE",
  PATH_NOT_WRITABLE = "PATH_NOT_WRITABLE",
  INVALID_COLOR = "INVALID_COLOR",
  INVALID_SETTING = "INVALID_SETTING",

  // Pipeline
  GENERATION_FAILED = "GENERATION_FAILED",
  ENCRYPTION_ERROR = "ENCRYPTION_ERROR",
  INVALID_ENVELOPE = "INVALID_ENVELOPE",
  ARTIFACT_WRITE_ERROR = "ARTIFACT_WRITE_ERROR",

  // System
  INTERNAL_ERROR = "INTERNAL_ERROR",
}

export const ErrorKind = {
  VALIDATION: "validation",
  KEY_IO: "key_io",
  SETTINGS_IO: "settings_io",
  PATH_VALIDATION: "path_validation",
  COLOR_FORMAT: "color_format",
  SETTING_VALUE: "setting_value",
  GENERATION: "generation",
  ARTIFACT_IO: "artifact_io",
  INTERNAL: "internal",
} as const;
export type ErrorKind = (typeof ErrorKind)[keyof typeof ErrorKind];

const KIND_MAP: Record<ErrorCode, ErrorKind> = {
  // Employee input
  [ErrorCode.INVALID_NAME]: ErrorKind.VALIDATION,
  [ErrorCode.INVALID_ID]: ErrorKind.VALIDATION,
  [ErrorCode.INVALID_DEPARTMENT]: ErrorKind.VALIDATION,

  // Key file
  [ErrorCode.KEY_FILE_READ_ERROR]: ErrorKind.KEY_IO,
  [ErrorCode.KEY_FILE_WRITE_ERROR]: ErrorKind.KEY_IO,
  [ErrorCode.KEY_FILE_CORRUPTED]: ErrorKind.KEY_IO,

  // Settings file
  [ErrorCode.SETTINGS_FILE_READ_ERROR]: ErrorKind.SETTINGS_IO,
  [ErrorCode.SETTINGS_FILE_PARSE_ERROR]: ErrorKind.SETTINGS_IO,
  [ErrorCode.SETTINGS_FILE_WRITE_ERROR]: ErrorKind.SETTINGS_IO,

  // Pre-write gates
  [ErrorCode.PATH_NOT_ABSOLUTE]: ErrorKind.PATH_VALIDATION,
  [ErrorCode.PATH_NOT_WRITABLE]: ErrorKind.PATH_VALIDATION,
  [ErrorCode.INVALID_COLOR]: ErrorKind.COLOR_FORMAT,
  [ErrorCode.INVALID_SETTING]: ErrorKind.SETTING_VALUE,

  // Pipeline
  [ErrorCode.GENERATION_FAILED]: ErrorKind.GENERATION,
  [ErrorCode.ENCRYPTION_ERROR]: ErrorKind.GENERATION,
  [ErrorCode.INVALID_ENVELOPE]: ErrorKind.GENERATION,
  [ErrorCode.ARTIFACT_WRITE_ERROR]: ErrorKind.ARTIFACT_IO,

  // System
  [ErrorCode.INTERNAL_ERROR]: ErrorKind.INTERNAL,
};

/** Stage of the generation pipeline in which a failure occurred. */
export type GenerationStage = "serialize" | "encrypt" | "encode";

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : "unknown";
}

export class QrPassError extends Error {
  readonly code: ErrorCode;
  readonly kind: ErrorKind;
  readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "QrPassError";
    this.code = code;
    this.kind = KIND_MAP[code];
    this.details = details;
  }

  static invalidName(): QrPassError {
    return new QrPassError(
      ErrorCode.INVALID_NAME,
      "Employee name must contain at least 2 characters on a single line",
    );
  }

  static invalidId(): QrPassError {
    return new QrPassError(ErrorCode.INVALID_ID, "Employee ID must contain digits only");
  }

  static invalidDepartment(): QrPassError {
    return new QrPassError(
      ErrorCode.INVALID_DEPARTMENT,
      "Department must contain at least 2 characters on a single line",
    );
  }

  static keyFileRead(path: string, cause: unknown): QrPassError {
    return new QrPassError(
      ErrorCode.KEY_FILE_READ_ERROR,
      `Failed to read key file: ${describeCause(cause)}`,
      { path },
    );
  }

  static keyFileWrite(path: string, cause: unknown): QrPassError {
    return new QrPassError(
      ErrorCode.KEY_FILE_WRITE_ERROR,
      `Failed to write key file: ${describeCause(cause)}`,
      { path },
    );
  }

  static keyFileCorrupted(path: string, length: number): QrPassError {
    return new QrPassError(
      ErrorCode.KEY_FILE_CORRUPTED,
      `Key file must hold 32 bytes, found ${length}`,
      { path, length },
    );
  }

  static settingsFileRead(path: string, cause: unknown): QrPassError {
    return new QrPassError(
      ErrorCode.SETTINGS_FILE_READ_ERROR,
      `Failed to read settings file: ${describeCause(cause)}`,
      { path },
    );
  }

  static settingsFileParse(path: string, cause: unknown): QrPassError {
    return new QrPassError(
      ErrorCode.SETTINGS_FILE_PARSE_ERROR,
      `Settings file is not valid JSON: ${describeCause(cause)}`,
      { path },
    );
  }

  static settingsFileWrite(path: string, cause: unknown): QrPassError {
    return new QrPassError(
      ErrorCode.SETTINGS_FILE_WRITE_ERROR,
      `Failed to write settings file: ${describeCause(cause)}`,
      { path },
    );
  }

  static pathNotAbsolute(path: string): QrPassError {
    return new QrPassError(ErrorCode.PATH_NOT_ABSOLUTE, `Save path must be absolute: ${path}`, {
      path,
    });
  }

  static pathNotWritable(path: string, cause?: unknown): QrPassError {
    const suffix = cause === undefined ? "" : ` (${describeCause(cause)})`;
    return new QrPassError(
      ErrorCode.PATH_NOT_WRITABLE,
      `Save path is not writable: ${path}${suffix}`,
      { path },
    );
  }

  static invalidColor(field: string, value: string): QrPassError {
    return new QrPassError(
      ErrorCode.INVALID_COLOR,
      `Invalid ${field}: ${value} (expected a hex color such as #000000)`,
      { field, value },
    );
  }

  static invalidSetting(field: string, value: unknown): QrPassError {
    return new QrPassError(ErrorCode.INVALID_SETTING, `Invalid value for ${field}`, {
      field,
      value,
    });
  }

  static generationFailed(stage: GenerationStage, cause: unknown): QrPassError {
    const details: Record<string, unknown> = { stage };
    if (cause instanceof QrPassError) {
      details.cause_code = cause.code;
    }
    return new QrPassError(
      ErrorCode.GENERATION_FAILED,
      `QR generation failed during ${stage}: ${describeCause(cause)}`,
      details,
    );
  }

  static encryptionError(message: string): QrPassError {
    return new QrPassError(ErrorCode.ENCRYPTION_ERROR, message);
  }

  static invalidEnvelope(message: string): QrPassError {
    return new QrPassError(ErrorCode.INVALID_ENVELOPE, `Invalid envelope: ${message}`);
  }

  static artifactWrite(path: string, cause: unknown): QrPassError {
    return new QrPassError(
      ErrorCode.ARTIFACT_WRITE_ERROR,
      `Failed to save QR image: ${describeCause(cause)}`,
      { path },
    );
  }

  static internalError(message: string): QrPassError {
    return new QrPassError(ErrorCode.INTERNAL_ERROR, message);
  }
}
