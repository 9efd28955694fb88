import type {
  AppSettings,
  EmployeeInput,
  EmployeeRecord,
  GenerationStage,
  Logger,
  Result,
} from "@qr-pass/shared";
import { QrPassError, err, ok, silentLogger } from "@qr-pass/shared";
import { writeArtifact } from "./artifact/artifact-writer.js";
import { encryptPayload, formatEnvelope } from "./crypto/envelope.js";
import type { SymmetricKey } from "./crypto/symmetric-key.js";
import type { KeyLoadReport } from "./keys/key-store.js";
import { KeyStore } from "./keys/key-store.js";
import { describeEmployee, serializePayload, validateEmployeeInput } from "./payload/payload-codec.js";
import type { RasterImage } from "./qr/qr-image-encoder.js";
import { encodeQrImage } from "./qr/qr-image-encoder.js";
import type { SettingsLoadReport } from "./settings/settings-store.js";
import { SettingsStore } from "./settings/settings-store.js";

export interface BadgeEngineOptions {
  keyPath: string;
  settingsPath: string;
  /** Base for the default save directory. */
  homeDir: string;
  logger?: Logger;
  /** Called with `true` when generation starts and `false` once it settles. */
  onBusyChange?: (busy: boolean) => void;
}

export interface InitReport {
  key: Omit<KeyLoadReport, "key">;
  settings: SettingsLoadReport;
}

/** One generated code, held in memory for preview until superseded. */
export interface QrArtifact {
  employeeId: string;
  envelopeText: string;
  image: RasterImage;
  preview: string[];
  createdAt: number;
}

export interface GenerateOutcome {
  artifact: QrArtifact;
  /** Set when auto-save wrote the image. */
  savedPath?: string;
  /** Set when auto-save was on but the write failed; the artifact is still valid. */
  saveError?: QrPassError;
}

/**
 * Orchestrates validate → serialize → encrypt → encode → (optional) write.
 * Owns the key store and the settings store; nothing is read from globals.
 */
export class BadgeEngine {
  private readonly keyStore: KeyStore;
  private readonly settingsStore: SettingsStore;
  private readonly logger: Logger;
  private key: SymmetricKey | null = null;

  constructor(private readonly options: BadgeEngineOptions) {
    this.logger = options.logger ?? silentLogger;
    this.keyStore = new KeyStore(options.keyPath, { logger: this.logger });
    this.settingsStore = new SettingsStore(options.settingsPath, {
      homeDir: options.homeDir,
      logger: this.logger,
    });
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Load (or create) the key, then load settings. Fallbacks are reported, never thrown.
   */
  async init(): Promise<InitReport> {
    const { key, ...keyReport } = await this.keyStore.getOrCreateKey();
    this.key = key;

    const settings = await this.settingsStore.load();
    return { key: keyReport, settings };
  }

  get isInitialized(): boolean {
    return this.key !== null;
  }

  // ---------------------------------------------------------------------------
  // Collaborator interface
  // ---------------------------------------------------------------------------

  validateInput(fields: EmployeeInput): Result<EmployeeRecord> {
    return validateEmployeeInput(fields);
  }

  async generateArtifact(
    record: EmployeeRecord,
    settings: AppSettings = this.settingsStore.current(),
  ): Promise<Result<QrArtifact>> {
    const key = this.key;
    if (!key) {
      return err(QrPassError.internalError("BadgeEngine.init() must complete before generating"));
    }

    this.setBusy(true);
    let stage: GenerationStage = "serialize";
    try {
      const plaintext = serializePayload(record);

      stage = "encrypt";
      const envelopeText = formatEnvelope(encryptPayload(plaintext, key));

      stage = "encode";
      const image = await encodeQrImage(envelopeText, {
        size: settings.qrSize,
        foreground: settings.qrColor,
        background: settings.qrBgColor,
        quality: settings.imageQuality,
      });
      if (!image.ok) {
        return image;
      }

      this.logger.info("QR code generated", {
        employee_id: record.employeeId,
        version: image.value.version,
        size: image.value.width,
      });

      return ok({
        employeeId: record.employeeId,
        envelopeText,
        image: image.value,
        preview: describeEmployee(record),
        createdAt: Date.now(),
      });
    } catch (cause) {
      const error = QrPassError.generationFailed(stage, cause);
      this.logger.error("QR generation failed", { stage, code: error.code });
      return err(error);
    } finally {
      this.setBusy(false);
    }
  }

  async persistArtifact(
    artifact: QrArtifact,
    settings: AppSettings = this.settingsStore.current(),
  ): Promise<Result<string>> {
    const written = await writeArtifact(artifact.image.png, settings.savePath, artifact.employeeId);
    if (written.ok) {
      this.logger.info("QR code saved", { path: written.value });
    } else {
      this.logger.error("Failed to save QR code", {
        code: written.error.code,
        reason: written.error.message,
      });
    }
    return written;
  }

  /**
   * Full request: validate, generate and, when auto-save is on, persist.
   * Nothing past validation runs for invalid input.
   */
  async generate(fields: EmployeeInput): Promise<Result<GenerateOutcome>> {
    const record = this.validateInput(fields);
    if (!record.ok) {
      return record;
    }

    const settings = this.settingsStore.current();
    const artifact = await this.generateArtifact(record.value, settings);
    if (!artifact.ok) {
      return artifact;
    }

    if (!settings.autoSave) {
      return ok({ artifact: artifact.value });
    }

    const saved = await this.persistArtifact(artifact.value, settings);
    return saved.ok
      ? ok({ artifact: artifact.value, savedPath: saved.value })
      : ok({ artifact: artifact.value, saveError: saved.error });
  }

  // ---------------------------------------------------------------------------
  // Settings
  // ---------------------------------------------------------------------------

  loadSettings(): Promise<SettingsLoadReport> {
    return this.settingsStore.load();
  }

  saveSettings(settings: AppSettings): Promise<Result<AppSettings>> {
    return this.settingsStore.save(settings);
  }

  resetSettings(): Promise<Result<AppSettings>> {
    return this.settingsStore.reset();
  }

  currentSettings(): AppSettings {
    return this.settingsStore.current();
  }

  private setBusy(busy: boolean): void {
    try {
      this.options.onBusyChange?.(busy);
    } catch (cause) {
      this.logger.warn("Busy indicator callback threw", {
        reason: cause instanceof Error ? cause.message : "unknown",
      });
    }
  }
}
