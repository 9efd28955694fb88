import { readFile } from "node:fs/promises";
import { join } from "node:path";
import type { z } from "zod";
import type { AppSettings, Logger, Result, SettingsFile } from "@qr-pass/shared";
import {
  DEFAULT_SAVE_DIR_NAME,
  ImageQuality,
  Language,
  QrPassError,
  QrSize,
  SETTINGS_JSON_INDENT,
  autoSaveSchema,
  err,
  hexColorSchema,
  imageQualitySchema,
  languageSchema,
  ok,
  qrSizeSchema,
  settingsFileSchema,
  silentLogger,
} from "@qr-pass/shared";
import { writeFileAtomic } from "../fs/atomic-write.js";
import { validateSavePath } from "./path-probe.js";
import { validateSettings } from "./validate-settings.js";

export type SettingsSource = "defaults" | "file";

export interface SettingsLoadReport {
  settings: AppSettings;
  source: SettingsSource;
  warnings: QrPassError[];
}

export interface SettingsStoreOptions {
  /** Home directory for the default save path. */
  homeDir: string;
  logger?: Logger;
}

export function defaultSettings(homeDir: string): AppSettings {
  return {
    savePath: join(homeDir, DEFAULT_SAVE_DIR_NAME),
    autoSave: false,
    imageQuality: ImageQuality.HIGH,
    qrSize: QrSize.MEDIUM,
    qrColor: "#000000",
    qrBgColor: "#FFFFFF",
    language: Language.ARABIC,
  };
}

export function toSettingsFile(settings: AppSettings): SettingsFile {
  return {
    save_path: settings.savePath,
    auto_save: settings.autoSave,
    image_quality: settings.imageQuality,
    qr_size: settings.qrSize,
    qr_color: settings.qrColor,
    qr_bg_color: settings.qrBgColor,
    language: settings.language,
  };
}

function errnoCode(cause: unknown): string | undefined {
  if (cause instanceof Error && "code" in cause && typeof cause.code === "string") {
    return cause.code;
  }
  return undefined;
}

/**
 * Owns settings.json. Loading is permissive (each bad field falls back to its
 * default and is reported); saving is strict (any bad field refuses the whole
 * save and nothing is written).
 */
export class SettingsStore {
  private settings: AppSettings;
  private readonly defaults: AppSettings;
  private readonly logger: Logger;
  private writeQueue: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly settingsPath: string,
    options: SettingsStoreOptions,
  ) {
    this.defaults = defaultSettings(options.homeDir);
    this.settings = { ...this.defaults };
    this.logger = options.logger ?? silentLogger;
  }

  get path(): string {
    return this.settingsPath;
  }

  current(): AppSettings {
    return { ...this.settings };
  }

  // ---------------------------------------------------------------------------
  // Load
  // ---------------------------------------------------------------------------

  async load(): Promise<SettingsLoadReport> {
    const warnings: QrPassError[] = [];
    const finish = (settings: AppSettings, source: SettingsSource): SettingsLoadReport => {
      this.settings = settings;
      for (const warning of warnings) {
        this.logger.warn("Ignoring settings value", {
          code: warning.code,
          reason: warning.message,
          path: this.settingsPath,
        });
      }
      return { settings: { ...settings }, source, warnings };
    };

    let raw: string;
    try {
      raw = await readFile(this.settingsPath, "utf8");
    } catch (cause) {
      if (errnoCode(cause) !== "ENOENT") {
        warnings.push(QrPassError.settingsFileRead(this.settingsPath, cause));
      }
      return finish({ ...this.defaults }, "defaults");
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (cause) {
      warnings.push(QrPassError.settingsFileParse(this.settingsPath, cause));
      return finish({ ...this.defaults }, "defaults");
    }

    const shape = settingsFileSchema.safeParse(parsed);
    if (!shape.success) {
      warnings.push(
        QrPassError.settingsFileParse(this.settingsPath, new Error("expected a JSON object")),
      );
      return finish({ ...this.defaults }, "defaults");
    }
    const file = shape.data;

    const pick = <T>(
      field: keyof SettingsFile,
      value: unknown,
      schema: z.ZodType<T>,
      fallback: T,
    ): T => {
      if (value === undefined) return fallback;
      const result = schema.safeParse(value);
      if (result.success) return result.data;
      warnings.push(
        typeof value === "string" && (field === "qr_color" || field === "qr_bg_color")
          ? QrPassError.invalidColor(field, value)
          : QrPassError.invalidSetting(field, value),
      );
      return fallback;
    };

    const settings: AppSettings = {
      savePath: this.defaults.savePath,
      autoSave: pick("auto_save", file.auto_save, autoSaveSchema, this.defaults.autoSave),
      imageQuality: pick("image_quality", file.image_quality, imageQualitySchema, this.defaults.imageQuality),
      qrSize: pick("qr_size", file.qr_size, qrSizeSchema, this.defaults.qrSize),
      qrColor: pick("qr_color", file.qr_color, hexColorSchema, this.defaults.qrColor),
      qrBgColor: pick("qr_bg_color", file.qr_bg_color, hexColorSchema, this.defaults.qrBgColor),
      language: pick("language", file.language, languageSchema, this.defaults.language),
    };

    if (file.save_path !== undefined) {
      if (typeof file.save_path !== "string") {
        warnings.push(QrPassError.invalidSetting("save_path", file.save_path));
      } else {
        const probe = await validateSavePath(file.save_path);
        if (probe.ok) {
          settings.savePath = probe.value;
        } else {
          warnings.push(probe.error);
        }
      }
    }

    return finish(settings, "file");
  }

  // ---------------------------------------------------------------------------
  // Save / reset
  // ---------------------------------------------------------------------------

  /**
   * Validate every field, then write. Validation order: save path, QR color,
   * QR background color, enumerated labels, language.
   */
  save(settings: AppSettings): Promise<Result<AppSettings>> {
    return this.enqueue(async () => {
      const valid = await validateSettings(settings);
      if (!valid.ok) {
        return valid;
      }

      const written = await this.write(valid.value);
      if (!written.ok) {
        return written;
      }

      this.settings = { ...valid.value };
      this.logger.info("Settings saved", { path: this.settingsPath });
      return ok({ ...valid.value });
    });
  }

  /**
   * Restore defaults in memory and persist them without validation.
   */
  reset(): Promise<Result<AppSettings>> {
    return this.enqueue(async () => {
      this.settings = { ...this.defaults };
      const written = await this.write(this.defaults);
      if (!written.ok) {
        return written;
      }
      this.logger.info("Settings reset to defaults", { path: this.settingsPath });
      return ok({ ...this.defaults });
    });
  }

  private async write(settings: AppSettings): Promise<Result<void>> {
    const data = JSON.stringify(toSettingsFile(settings), null, SETTINGS_JSON_INDENT);
    try {
      await writeFileAtomic(this.settingsPath, data);
      return ok(undefined);
    } catch (cause) {
      const error = QrPassError.settingsFileWrite(this.settingsPath, cause);
      this.logger.error("Failed to write settings", { code: error.code, path: this.settingsPath });
      return err(error);
    }
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.writeQueue.then(task, task);
    this.writeQueue = run.catch(() => undefined);
    return run;
  }
}
