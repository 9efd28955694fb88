import { readFile } from "node:fs/promises";
import type { Logger } from "@qr-pass/shared";
import { AES_KEY_LENGTH, KEY_FILE_MODE, QrPassError, silentLogger } from "@qr-pass/shared";
import { generateRandomBytes, wipeBuffer } from "../crypto/random.js";
import type { SymmetricKey } from "../crypto/symmetric-key.js";
import { createSymmetricKey } from "../crypto/symmetric-key.js";
import { writeFileAtomic, writeFileExclusive } from "../fs/atomic-write.js";

export type KeyOrigin = "loaded" | "generated";

export interface KeyLoadReport {
  key: SymmetricKey;
  origin: KeyOrigin;
  /** False when the key lives in memory only for this process. */
  persisted: boolean;
  warnings: QrPassError[];
}

export interface KeyStoreOptions {
  logger?: Logger;
}

type ReadOutcome =
  | { status: "ok"; bytes: Uint8Array }
  | { status: "missing" }
  | { status: "failed"; warning: QrPassError };

function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * Owns the 256-bit key file (raw 32 bytes, no header).
 *
 * - Existing 32-byte file: loaded verbatim.
 * - Missing file: fresh key, linked into place only if still absent, so that
 *   concurrent first runs settle on a single key and no reader ever sees a
 *   partly written file.
 * - Unreadable or wrong-sized file: fresh key, written with atomic replace.
 * - Write failures never withhold the key; it stays usable in memory and the
 *   report says it was not persisted.
 */
export class KeyStore {
  private keyPromise: Promise<KeyLoadReport> | null = null;
  private readonly logger: Logger;

  constructor(
    private readonly keyPath: string,
    options: KeyStoreOptions = {},
  ) {
    this.logger = options.logger ?? silentLogger;
  }

  get path(): string {
    return this.keyPath;
  }

  /**
   * Resolve the key once per process; later and concurrent callers share the
   * first call's result.
   */
  getOrCreateKey(): Promise<KeyLoadReport> {
    this.keyPromise ??= this.loadOrGenerate();
    return this.keyPromise;
  }

  private async loadOrGenerate(): Promise<KeyLoadReport> {
    const existing = await this.readKeyFile();
    if (existing.status === "ok") {
      return { key: this.toHandle(existing.bytes), origin: "loaded", persisted: true, warnings: [] };
    }

    const warnings: QrPassError[] = [];
    if (existing.status === "failed") {
      warnings.push(existing.warning);
      this.logger.warn("Key file unusable, generating a new key", {
        code: existing.warning.code,
        path: this.keyPath,
      });
    }

    const fresh = generateRandomBytes(AES_KEY_LENGTH);
    const written =
      existing.status === "missing" ? await this.createKeyFile(fresh) : await this.replaceKeyFile(fresh);

    if (written.status === "raced") {
      // Another process created the file first; its key wins.
      wipeBuffer(fresh);
      const winner = await this.readKeyFile();
      if (winner.status === "ok") {
        return { key: this.toHandle(winner.bytes), origin: "loaded", persisted: true, warnings };
      }
      if (winner.status === "failed") {
        warnings.push(winner.warning);
      }
      const fallback = generateRandomBytes(AES_KEY_LENGTH);
      return this.inMemoryOnly(
        fallback,
        warnings,
        QrPassError.keyFileWrite(this.keyPath, new Error("key file created concurrently is unreadable")),
      );
    }

    if (written.status === "failed") {
      return this.inMemoryOnly(fresh, warnings, written.warning);
    }

    this.logger.info("Generated new encryption key", { path: this.keyPath });
    return { key: this.toHandle(fresh), origin: "generated", persisted: true, warnings };
  }

  private inMemoryOnly(
    bytes: Uint8Array,
    warnings: QrPassError[],
    warning: QrPassError,
  ): KeyLoadReport {
    warnings.push(warning);
    this.logger.warn("Encryption key could not be saved; using an in-memory key for this run", {
      code: warning.code,
      path: this.keyPath,
    });
    return { key: this.toHandle(bytes), origin: "generated", persisted: false, warnings };
  }

  private toHandle(bytes: Uint8Array): SymmetricKey {
    const key = createSymmetricKey(bytes);
    wipeBuffer(bytes);
    return key;
  }

  private async readKeyFile(): Promise<ReadOutcome> {
    let raw: Buffer;
    try {
      raw = await readFile(this.keyPath);
    } catch (err) {
      if (errnoCode(err) === "ENOENT") {
        return { status: "missing" };
      }
      return { status: "failed", warning: QrPassError.keyFileRead(this.keyPath, err) };
    }

    if (raw.length !== AES_KEY_LENGTH) {
      return { status: "failed", warning: QrPassError.keyFileCorrupted(this.keyPath, raw.length) };
    }
    return { status: "ok", bytes: new Uint8Array(raw) };
  }

  private async createKeyFile(
    bytes: Uint8Array,
  ): Promise<{ status: "ok" } | { status: "raced" } | { status: "failed"; warning: QrPassError }> {
    try {
      await writeFileExclusive(this.keyPath, bytes, { mode: KEY_FILE_MODE });
      return { status: "ok" };
    } catch (err) {
      if (errnoCode(err) === "EEXIST") {
        return { status: "raced" };
      }
      return { status: "failed", warning: QrPassError.keyFileWrite(this.keyPath, err) };
    }
  }

  private async replaceKeyFile(
    bytes: Uint8Array,
  ): Promise<{ status: "ok" } | { status: "failed"; warning: QrPassError }> {
    try {
      await writeFileAtomic(this.keyPath, bytes, { mode: KEY_FILE_MODE });
      return { status: "ok" };
    } catch (err) {
      return { status: "failed", warning: QrPassError.keyFileWrite(this.keyPath, err) };
    }
  }
}
